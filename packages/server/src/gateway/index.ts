// packages/server/src/gateway/index.ts

// 서버
export {
  createGatewayServer,
  CHAT_WS_PATH,
  type GatewayServer,
  type GatewayServerDeps,
} from './server.js';

// DI 컨테이너
export type { GatewayServerContext } from './context.js';

// 타입
export type {
  GatewayServerConfig,
  GatewayStatus,
  ChatSocket,
  ConnectionEntry,
  ConnectionState,
  RegistryEvent,
  DeliveryResult,
  BroadcastReport,
} from './types.js';

// 에러
export {
  RegistryInvariantViolationError,
  UpstreamUnavailableError,
  AccountExistsError,
  IdentityProviderError,
} from '../errors.js';

// 레지스트리 + 브로드캐스터
export { ConnectionRegistry, type ConnectionRegistryOptions } from './registry.js';
export { ChatBroadcaster, type BroadcasterOptions } from './broadcaster.js';
export { randomColor, isHexColor, UNKNOWN_SENDER_COLOR, type ColorGenerator } from './color.js';

// 연결 처리
export { handleWsConnection, type ChatConnection } from './ws/connection.js';
export { handleHttpRequest } from './router.js';

// 인증
export { authenticate, extractSessionToken, type AdmissionFailure } from './auth/index.js';
export { AuthRateLimiter } from './auth/rate-limit.js';

// 신원
export { IdentityResolver } from '../identity/identity-resolver.js';
export { InMemorySessionStore, type SessionStore } from '../identity/session-store.js';
export { RedisSessionStore, createRedisSessionStore, logRedisErrors } from '../identity/redis-session-store.js';
export { InMemoryIdentityProvider, type IdentityProvider } from '../identity/identity-provider.js';
export {
  FirebaseIdentityProvider,
  createFirebaseIdentityProvider,
} from '../identity/firebase-identity-provider.js';

// 프로세스
export { ProcessLifecycle } from '../process/lifecycle.js';
