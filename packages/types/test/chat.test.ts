import type {
  ChatEnvelope,
  ChatwaveConfig,
  HexColor,
  ResolvedChatwaveConfig,
  WsCloseCode,
} from '@chatwave/types';
import { WS_CLOSE_CODES } from '@chatwave/types';
import { describe, it, expect, expectTypeOf } from 'vitest';

describe('WS_CLOSE_CODES', () => {
  it('정책 위반은 1008이다', () => {
    expect(WS_CLOSE_CODES.POLICY_VIOLATION).toBe(1008);
  });

  it('핸드셰이크 타임아웃은 애플리케이션 범위(4000+) 코드다', () => {
    expect(WS_CLOSE_CODES.HANDSHAKE_TIMEOUT).toBeGreaterThanOrEqual(4000);
  });

  it('WsCloseCode는 상수 값의 유니온이다', () => {
    expectTypeOf<1008>().toMatchTypeOf<WsCloseCode>();
    expectTypeOf<1234>().not.toMatchTypeOf<WsCloseCode>();
  });
});

describe('ChatEnvelope', () => {
  it('message와 color 필드만 갖는다', () => {
    const envelope: ChatEnvelope = { message: 'alice: hi', color: '#a1b2c3' };
    expect(Object.keys(envelope)).toEqual(['message', 'color']);
  });

  it('color는 # 으로 시작하는 문자열이다', () => {
    expectTypeOf<'#000000'>().toMatchTypeOf<HexColor>();
    expectTypeOf<'000000'>().not.toMatchTypeOf<HexColor>();
  });
});

describe('ChatwaveConfig', () => {
  it('빈 객체가 유효한 설정이다 (모든 필드 optional)', () => {
    const config: ChatwaveConfig = {};
    expectTypeOf(config).toMatchTypeOf<ChatwaveConfig>();
  });

  it('sessionStore.driver는 redis | memory 이다', () => {
    expectTypeOf<'redis'>().toMatchTypeOf<NonNullable<NonNullable<ChatwaveConfig['sessionStore']>['driver']>>();
  });

  it('ResolvedChatwaveConfig는 중첩 필드까지 필수다', () => {
    expectTypeOf<ResolvedChatwaveConfig['gateway']['port']>().toEqualTypeOf<number>();
    expectTypeOf<ResolvedChatwaveConfig['gateway']['cors']['origins']>().toEqualTypeOf<string[]>();
    expectTypeOf<ResolvedChatwaveConfig['sessionStore']['driver']>().toEqualTypeOf<'redis' | 'memory'>();
  });
});
