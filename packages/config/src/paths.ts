// packages/config/src/paths.ts
import { getStateDir } from '@chatwave/infra';
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * 설정 파일 경로 해석 (JSON5)
 *
 * 우선순위:
 *   1. CHATWAVE_CONFIG 환경변수
 *   2. ./chatwave.json5 (존재 시)
 *   3. <stateDir>/chatwave.json5
 *
 * 어느 파일도 없어도 된다 — 파이프라인이 기본값으로 진행.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.CHATWAVE_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }

  const localPath = path.resolve('chatwave.json5');
  if (fs.existsSync(localPath)) {
    return localPath;
  }

  return path.join(getStateDir(), 'chatwave.json5');
}
