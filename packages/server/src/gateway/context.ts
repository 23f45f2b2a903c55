// packages/server/src/gateway/context.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { Server as HttpServer } from 'node:http';
import type { WebSocketServer } from 'ws';
import type { IdentityProvider } from '../identity/identity-provider.js';
import type { IdentityResolver } from '../identity/identity-resolver.js';
import type { SessionStore } from '../identity/session-store.js';
import type { AuthRateLimiter } from './auth/rate-limit.js';
import type { ChatBroadcaster } from './broadcaster.js';
import type { ConnectionRegistry } from './registry.js';
import type { GatewayServerConfig } from './types.js';

/**
 * 게이트웨이 서버 전체의 공유 상태를 한 곳에 모은 DI 컨테이너.
 * 모듈 전역 레지스트리 없이 테스트마다 독립된 인스턴스를 쓴다.
 */
export interface GatewayServerContext {
  readonly config: GatewayServerConfig;
  readonly httpServer: HttpServer;
  readonly wss: WebSocketServer;
  readonly registry: ConnectionRegistry;
  readonly broadcaster: ChatBroadcaster;
  readonly logger: ChatwaveLogger;
  readonly sessionStore: SessionStore;
  readonly identityProvider: IdentityProvider;
  readonly identityResolver: IdentityResolver;
  readonly rateLimiter: AuthRateLimiter;
}
