// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

/** 애플리케이션 메타 스키마 */
const AppSchema = z.strictObject({
  name: z.string(),
  version: z.string(),
  env: z.string().min(1),
});

/** CORS 스키마 */
const CorsSchema = z.strictObject({
  origins: z.array(z.string()),
  maxAge: z.number().int().min(0),
});

/** 게이트웨이(HTTP) 설정 스키마 */
const GatewaySchema = z.strictObject({
  port: z.number().int().min(0).max(65535),
  host: z.string(),
  basePath: z.string().regex(/^(\/[^/\s]+)*\/?$/, 'basePath must look like /segment/segment'),
  cors: CorsSchema.partial(),
});

/** WebSocket 설정 스키마 */
const WsSchema = z.strictObject({
  heartbeatIntervalMs: z.number().int().min(1_000),
  maxPayloadBytes: z.number().int().min(1),
  handshakeTimeoutMs: z.number().int().min(1),
  maxConnections: z.number().int().min(1),
  deliveryTimeoutMs: z.number().int().min(1),
  maxBufferedBytes: z.number().int().min(1),
});

/** 인증 실패 rate limit 스키마 */
const RateLimitSchema = z.strictObject({
  maxFailures: z.number().int().min(1),
  windowMs: z.number().int().min(1),
  blockDurationMs: z.number().int().min(0),
});

/** 인증/세션 스키마 */
const AuthSchema = z.strictObject({
  sessionTtlSeconds: z.number().int().min(1),
  rateLimit: RateLimitSchema.partial(),
});

/** 세션 저장소 스키마 */
const SessionStoreSchema = z.strictObject({
  driver: z.enum(['redis', 'memory']),
  redis: z
    .strictObject({
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      db: z.number().int().min(0),
      keyPrefix: z.string(),
    })
    .partial(),
});

/** 신원 공급자 스키마 */
const IdentitySchema = z.strictObject({
  driver: z.enum(['firebase', 'memory']),
  firebaseCredentialsPath: z.string(),
});

/** 로깅 설정 스키마 */
const LoggingSchema = z.strictObject({
  level: z.enum(LOG_LEVELS),
  file: z.boolean(),
  pretty: z.boolean(),
  maxSizeMb: z.number().min(1),
  maxFiles: z.number().int().min(1),
});

/**
 * ChatwaveConfig 루트 스키마
 *
 * - z.strictObject() 사용: 알 수 없는 키 감지 (오타 방지)
 * - 모든 섹션/필드는 optional (빈 {} 허용)
 * - .default()는 사용하지 않음 — defaults.ts에서 별도 적용
 */
export const ChatwaveConfigSchema = z.strictObject({
  app: AppSchema.partial().optional(),
  gateway: GatewaySchema.partial().optional(),
  ws: WsSchema.partial().optional(),
  auth: AuthSchema.partial().optional(),
  sessionStore: SessionStoreSchema.partial().optional(),
  identity: IdentitySchema.partial().optional(),
  logging: LoggingSchema.partial().optional(),
});

export type ValidatedChatwaveConfig = z.infer<typeof ChatwaveConfigSchema>;
