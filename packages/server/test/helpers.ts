// packages/server/test/helpers.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { HexColor } from '@chatwave/types';
import type { IncomingMessage } from 'node:http';
import type { WebSocket } from 'ws';
import { getDefaults } from '@chatwave/config';
import { EventEmitter } from 'node:events';
import { vi } from 'vitest';
import type { GatewayServerContext } from '../src/gateway/context.js';
import type { GatewayServerConfig } from '../src/gateway/types.js';
import { AuthRateLimiter } from '../src/gateway/auth/rate-limit.js';
import { ChatBroadcaster } from '../src/gateway/broadcaster.js';
import { ConnectionRegistry } from '../src/gateway/registry.js';
import { InMemoryIdentityProvider } from '../src/identity/identity-provider.js';
import { IdentityResolver } from '../src/identity/identity-resolver.js';
import { InMemorySessionStore } from '../src/identity/session-store.js';

/** Mock WebSocket — send 콜백은 기본적으로 즉시 성공 */
export function createMockWs() {
  const emitter = new EventEmitter();
  const sent: string[] = [];
  let readyState = 1; // OPEN

  const ws = {
    get readyState() {
      return readyState;
    },
    set readyState(v: number) {
      readyState = v;
    },
    CONNECTING: 0,
    OPEN: 1,
    CLOSING: 2,
    CLOSED: 3,
    close: vi.fn((code?: number, _reason?: string) => {
      if (readyState === 3) {
        return;
      }
      readyState = 3;
      emitter.emit('close', code ?? 1005);
    }),
    send: vi.fn((data: string, cb?: (err?: Error) => void) => {
      sent.push(data);
      cb?.();
    }),
    ping: vi.fn(),
    pause: vi.fn(),
    resume: vi.fn(),
    terminate: vi.fn(() => {
      if (readyState !== 3) {
        readyState = 3;
        emitter.emit('close', 1006);
      }
    }),
    on: (event: string, listener: (...args: unknown[]) => void) => {
      emitter.on(event, listener);
      return ws;
    },
    once: (event: string, listener: (...args: unknown[]) => void) => {
      emitter.once(event, listener);
      return ws;
    },
    off: (event: string, listener: (...args: unknown[]) => void) => {
      emitter.off(event, listener);
      return ws;
    },
    emit: (event: string, ...args: unknown[]) => emitter.emit(event, ...args),
    bufferedAmount: 0,
    get sentMessages() {
      return sent;
    },
  };

  return ws;
}

export type MockWs = ReturnType<typeof createMockWs>;

export function asWebSocket(ws: MockWs): WebSocket {
  return ws as unknown as WebSocket;
}

/** 텍스트 프레임 수신 흉내 */
export function receiveText(ws: MockWs, text: string): void {
  ws.emit('message', Buffer.from(text, 'utf8'), false);
}

export function makeReq(
  opts: { url?: string; headers?: Record<string, string>; remoteAddress?: string } = {},
): IncomingMessage {
  return {
    url: opts.url ?? '/ws/chat',
    headers: opts.headers ?? {},
    socket: { remoteAddress: opts.remoteAddress ?? '127.0.0.1' },
  } as unknown as IncomingMessage;
}

/** 기본값 기반 테스트 설정. mutate로 일부만 변경. */
export function makeConfig(mutate?: (config: GatewayServerConfig) => void): GatewayServerConfig {
  const config: GatewayServerConfig = structuredClone(getDefaults());
  config.gateway.host = '127.0.0.1';
  config.gateway.port = 0;
  config.sessionStore.driver = 'memory';
  config.identity.driver = 'memory';
  config.logging.pretty = false;
  mutate?.(config);
  return config;
}

/** 호출만 기록하는 로거 */
export function createMockLogger(): ChatwaveLogger {
  const logger: ChatwaveLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    flush: async () => {},
  };
  return logger;
}

/** 순서대로 색을 돌려주는 결정적 생성기 */
export function sequentialColors(...colors: HexColor[]): () => HexColor {
  let i = 0;
  return () => colors[i++ % colors.length] ?? '#000000';
}

export interface TestContext extends GatewayServerContext {
  readonly sessionStore: InMemorySessionStore;
  readonly identityProvider: InMemoryIdentityProvider;
}

export function makeCtx(
  opts: { config?: GatewayServerConfig; colors?: HexColor[]; logger?: ChatwaveLogger } = {},
): TestContext {
  const config = opts.config ?? makeConfig();
  const logger = opts.logger ?? createMockLogger();
  const registry = new ConnectionRegistry({
    colorGenerator: sequentialColors(...(opts.colors ?? ['#ff0000', '#00ff00', '#0000ff'])),
  });
  const sessionStore = new InMemorySessionStore();

  return {
    config,
    httpServer: {} as GatewayServerContext['httpServer'],
    wss: {} as GatewayServerContext['wss'],
    registry,
    broadcaster: new ChatBroadcaster(registry, {
      deliveryTimeoutMs: config.ws.deliveryTimeoutMs,
      maxBufferedBytes: config.ws.maxBufferedBytes,
      logger,
    }),
    logger,
    sessionStore,
    identityProvider: new InMemoryIdentityProvider(),
    identityResolver: new IdentityResolver(sessionStore, logger),
    rateLimiter: new AuthRateLimiter(config.auth.rateLimit),
  };
}
