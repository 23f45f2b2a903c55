import type { DeepRequired, LogLevel } from './common.js';

/** chatwave 루트 설정 타입 */
export interface ChatwaveConfig {
  app?: AppConfig;
  gateway?: GatewayConfig;
  ws?: WsConfig;
  auth?: AuthConfig;
  sessionStore?: SessionStoreConfig;
  identity?: IdentityConfig;
  logging?: LoggingConfig;
}

/** 기본값과 환경변수 오버라이드까지 적용된 설정 -- 모든 필드 존재 */
export type ResolvedChatwaveConfig = DeepRequired<ChatwaveConfig>;

export interface AppConfig {
  name?: string;
  version?: string;
  env?: string;
}

export interface GatewayConfig {
  port?: number;
  host?: string;
  /** 모든 HTTP/WS 경로 앞에 붙는 prefix (예: `/api/v1`) */
  basePath?: string;
  cors?: CorsConfig;
}

export interface CorsConfig {
  origins?: string[];
  maxAge?: number;
}

export interface WsConfig {
  heartbeatIntervalMs?: number;
  maxPayloadBytes?: number;
  handshakeTimeoutMs?: number;
  maxConnections?: number;
  deliveryTimeoutMs?: number;
  maxBufferedBytes?: number;
}

export interface AuthConfig {
  sessionTtlSeconds?: number;
  rateLimit?: RateLimitConfig;
}

export interface RateLimitConfig {
  maxFailures?: number;
  windowMs?: number;
  blockDurationMs?: number;
}

export interface SessionStoreConfig {
  driver?: 'redis' | 'memory';
  redis?: RedisConfig;
}

export interface RedisConfig {
  host?: string;
  port?: number;
  db?: number;
  keyPrefix?: string;
}

export interface IdentityConfig {
  driver?: 'firebase' | 'memory';
  firebaseCredentialsPath?: string;
}

export interface LoggingConfig {
  level?: LogLevel;
  file?: boolean;
  pretty?: boolean;
  maxSizeMb?: number;
  maxFiles?: number;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}
