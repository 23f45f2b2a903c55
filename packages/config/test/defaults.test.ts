// packages/config/test/defaults.test.ts
import type { ChatwaveConfig } from '@chatwave/types';
import { describe, it, expect } from 'vitest';
import { applyDefaults, getDefaults } from '../src/defaults.js';

describe('getDefaults', () => {
  it('기본값을 반환한다', () => {
    const defaults = getDefaults();
    expect(defaults.gateway.port).toBe(8000);
    expect(defaults.gateway.basePath).toBe('');
    expect(defaults.auth.sessionTtlSeconds).toBe(86_400);
    expect(defaults.sessionStore.redis).toEqual({
      host: 'localhost',
      port: 6379,
      db: 0,
      keyPrefix: '',
    });
  });

  it('반환값은 frozen이다', () => {
    expect(Object.isFrozen(getDefaults())).toBe(true);
  });
});

describe('applyDefaults', () => {
  it('빈 설정에 모든 기본값을 적용한다', () => {
    expect(applyDefaults({})).toEqual(getDefaults());
  });

  it('유저 값이 기본값을 오버라이드한다', () => {
    const user: ChatwaveConfig = { gateway: { port: 9090 } };
    const result = applyDefaults(user);
    expect(result.gateway.port).toBe(9090);
    // 다른 gateway 기본값은 유지
    expect(result.gateway.host).toBe('0.0.0.0');
    expect(result.gateway.cors).toEqual({ origins: ['*'], maxAge: 600 });
  });

  it('중첩 객체도 필드 단위로 병합한다', () => {
    const result = applyDefaults({
      auth: { rateLimit: { maxFailures: 3 } },
      sessionStore: { redis: { host: 'redis.internal' } },
    });
    expect(result.auth.rateLimit).toEqual({
      maxFailures: 3,
      windowMs: 60_000,
      blockDurationMs: 300_000,
    });
    expect(result.auth.sessionTtlSeconds).toBe(86_400);
    expect(result.sessionStore.redis.host).toBe('redis.internal');
    expect(result.sessionStore.redis.port).toBe(6379);
  });

  it('배열은 유저 값으로 대체한다', () => {
    const result = applyDefaults({ gateway: { cors: { origins: ['https://chat.example'] } } });
    expect(result.gateway.cors.origins).toEqual(['https://chat.example']);
  });

  it('기본값 객체를 변경하지 않는다', () => {
    applyDefaults({ ws: { maxConnections: 2 } });
    expect(getDefaults().ws.maxConnections).toBe(1_000);
  });
});
