// packages/config/src/defaults.ts
import type { ChatwaveConfig, ResolvedChatwaveConfig } from '@chatwave/types';

/**
 * 불변 기본값
 *
 * 모든 optional 필드에 기본값을 제공한다.
 * Zod .default()를 쓰지 않는 이유: 파이프라인에서 명시적 단계로 분리.
 */
const DEFAULTS = Object.freeze<ResolvedChatwaveConfig>({
  app: { name: 'chatwave', version: '0.1.0', env: 'prod' },
  gateway: {
    port: 8000,
    host: '0.0.0.0',
    basePath: '',
    cors: { origins: ['*'], maxAge: 600 },
  },
  ws: {
    heartbeatIntervalMs: 30_000,
    maxPayloadBytes: 64 * 1024,
    handshakeTimeoutMs: 10_000,
    maxConnections: 1_000,
    deliveryTimeoutMs: 5_000,
    maxBufferedBytes: 1024 * 1024, // 1MB
  },
  auth: {
    sessionTtlSeconds: 86_400, // 24시간
    rateLimit: { maxFailures: 10, windowMs: 60_000, blockDurationMs: 300_000 },
  },
  sessionStore: {
    driver: 'redis',
    redis: { host: 'localhost', port: 6379, db: 0, keyPrefix: '' },
  },
  identity: { driver: 'firebase', firebaseCredentialsPath: '' },
  logging: { level: 'info', file: false, pretty: true, maxSizeMb: 10, maxFiles: 5 },
});

/** 기본값을 유저 설정에 병합 (유저 값 우선) */
export function applyDefaults(user: ChatwaveConfig): ResolvedChatwaveConfig {
  const d = DEFAULTS;
  return {
    app: { ...d.app, ...user.app },
    gateway: {
      ...d.gateway,
      ...user.gateway,
      cors: { ...d.gateway.cors, ...user.gateway?.cors },
    },
    ws: { ...d.ws, ...user.ws },
    auth: {
      ...d.auth,
      ...user.auth,
      rateLimit: { ...d.auth.rateLimit, ...user.auth?.rateLimit },
    },
    sessionStore: {
      ...d.sessionStore,
      ...user.sessionStore,
      redis: { ...d.sessionStore.redis, ...user.sessionStore?.redis },
    },
    identity: { ...d.identity, ...user.identity },
    logging: { ...d.logging, ...user.logging },
  };
}

/** 기본값 조회 (읽기 전용) */
export function getDefaults(): Readonly<ResolvedChatwaveConfig> {
  return DEFAULTS;
}
