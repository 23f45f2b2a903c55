// packages/config/src/env-overrides.ts
import type { LogLevel, ResolvedChatwaveConfig } from '@chatwave/types';
import { getEnv } from '@chatwave/infra';
import { ConfigError } from './errors.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * 환경변수 오버라이드 (파일/기본값보다 우선)
 *
 * | 변수                        | 대상                                 |
 * |-----------------------------|--------------------------------------|
 * | APP_NAME / VERSION / ENV    | app.name / app.version / app.env     |
 * | LOG_LEVEL                   | logging.level (대소문자 무시)        |
 * | HOST / PORT                 | gateway.host / gateway.port          |
 * | BASE_URL_<ENV>              | gateway.basePath                     |
 * | REDIS_HOST / REDIS_PORT     | sessionStore.redis.host / port       |
 * | FIREBASE_CREDENTIALS_PATH   | identity.firebaseCredentialsPath     |
 *
 * 각 변수는 CHATWAVE_ 접두사 버전이 우선한다.
 */
export function applyEnvOverrides(
  config: ResolvedChatwaveConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedChatwaveConfig {
  const read = (key: string): string | undefined => {
    const value = getEnv(key, undefined, env);
    return value === '' ? undefined : value;
  };

  const appEnv = read('ENV') ?? config.app.env;
  const basePath = read(`BASE_URL_${appEnv}`) ?? config.gateway.basePath;

  return {
    ...config,
    app: {
      name: read('APP_NAME') ?? config.app.name,
      version: read('VERSION') ?? config.app.version,
      env: appEnv,
    },
    gateway: {
      ...config.gateway,
      host: read('HOST') ?? config.gateway.host,
      port: parsePort('PORT', read('PORT')) ?? config.gateway.port,
      basePath: normalizeBasePath(basePath),
    },
    sessionStore: {
      ...config.sessionStore,
      redis: {
        ...config.sessionStore.redis,
        host: read('REDIS_HOST') ?? config.sessionStore.redis.host,
        port: parsePort('REDIS_PORT', read('REDIS_PORT')) ?? config.sessionStore.redis.port,
      },
    },
    identity: {
      ...config.identity,
      firebaseCredentialsPath:
        read('FIREBASE_CREDENTIALS_PATH') ?? config.identity.firebaseCredentialsPath,
    },
    logging: {
      ...config.logging,
      level: parseLogLevel(read('LOG_LEVEL')) ?? config.logging.level,
    },
  };
}

/** `/`, `/api/`, `api` → ``, `/api`, `/api` */
export function normalizeBasePath(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  if (trimmed === '') {
    return '';
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function parsePort(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid config: ${name} must be a port number, got "${raw}"`, {
      details: { variable: name, value: raw },
    });
  }
  return port;
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) {
    throw new ConfigError(`Invalid config: LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, {
      details: { variable: 'LOG_LEVEL', value: raw },
    });
  }
  return level;
}
