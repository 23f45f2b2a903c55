// packages/server/src/gateway/color.ts
import type { HexColor } from '@chatwave/types';
import { randomInt } from 'node:crypto';

/** 색상 생성기 — 테스트에서 결정적 구현으로 교체 */
export type ColorGenerator = () => HexColor;

/** 발신자 정보가 없을 때 쓰는 색 */
export const UNKNOWN_SENDER_COLOR: HexColor = '#000000';

/** 균등 분포 `#rrggbb` */
export const randomColor: ColorGenerator = () =>
  `#${randomInt(0, 0x1000000).toString(16).padStart(6, '0')}`;

export function isHexColor(value: string): value is HexColor {
  return /^#[0-9a-f]{6}$/.test(value);
}
