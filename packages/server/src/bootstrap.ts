// packages/server/src/bootstrap.ts
import type { ChatwaveLogger, LoggerConfig } from '@chatwave/infra';
import type { ResolvedChatwaveConfig } from '@chatwave/types';
import { getLogDir } from '@chatwave/infra';
import type { IdentityProvider } from './identity/identity-provider.js';
import type { SessionStore } from './identity/session-store.js';
import { createFirebaseIdentityProvider } from './identity/firebase-identity-provider.js';
import { InMemoryIdentityProvider } from './identity/identity-provider.js';
import { createRedisSessionStore } from './identity/redis-session-store.js';
import { InMemorySessionStore } from './identity/session-store.js';

export interface GatewayStores {
  readonly sessionStore: SessionStore;
  readonly identityProvider: IdentityProvider;
}

/** logging 설정 섹션 → createLogger 옵션 */
export function loggerConfigFrom(config: ResolvedChatwaveConfig): LoggerConfig {
  return {
    name: config.app.name,
    level: config.logging.level,
    console: { enabled: true, pretty: config.logging.pretty },
    file: {
      enabled: config.logging.file,
      path: getLogDir(),
      fileName: `${config.app.name}.log`,
      maxSizeMb: config.logging.maxSizeMb,
      maxFiles: config.logging.maxFiles,
    },
  };
}

/** driver 설정에 따라 세션 저장소와 신원 공급자 생성 */
export function createStores(config: ResolvedChatwaveConfig, logger: ChatwaveLogger): GatewayStores {
  const sessionStore =
    config.sessionStore.driver === 'memory'
      ? new InMemorySessionStore()
      : createRedisSessionStore(config.sessionStore.redis, logger.child('redis'));

  const identityProvider =
    config.identity.driver === 'memory'
      ? new InMemoryIdentityProvider()
      : createFirebaseIdentityProvider(config.identity.firebaseCredentialsPath);

  logger.info(
    `Session store: ${config.sessionStore.driver}, identity provider: ${config.identity.driver}`,
  );
  const usesMemory = config.sessionStore.driver === 'memory' || config.identity.driver === 'memory';
  if (config.app.env === 'prod' && usesMemory) {
    logger.warn('In-memory drivers are not shared between processes and lose data on restart');
  }

  return { sessionStore, identityProvider };
}
