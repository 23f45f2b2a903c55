// packages/server/src/gateway/server.ts
import { getEventBus, type ChatwaveLogger } from '@chatwave/infra';
import { WS_CLOSE_CODES } from '@chatwave/types';
import {
  createServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { IdentityProvider } from '../identity/identity-provider.js';
import type { SessionStore } from '../identity/session-store.js';
import type { GatewayServerContext } from './context.js';
import type { GatewayServerConfig } from './types.js';
import { IdentityResolver } from '../identity/identity-resolver.js';
import { AuthRateLimiter } from './auth/rate-limit.js';
import { ChatBroadcaster } from './broadcaster.js';
import type { ColorGenerator } from './color.js';
import { ConnectionRegistry } from './registry.js';
import { handleHttpRequest } from './router.js';
import { handleWsConnection } from './ws/connection.js';
import { startHeartbeat } from './ws/heartbeat.js';

/** WebSocket 채팅 엔드포인트 (basePath 제외) */
export const CHAT_WS_PATH = '/ws/chat';

/** stop() 시 close 핸드셰이크 대기 상한 */
const CLOSE_GRACE_MS = 1_000;

export interface GatewayServerDeps {
  readonly sessionStore: SessionStore;
  readonly identityProvider: IdentityProvider;
  readonly logger: ChatwaveLogger;
  readonly colorGenerator?: ColorGenerator;
}

export interface GatewayServer {
  readonly httpServer: HttpServer;
  readonly wss: WebSocketServer;
  readonly ctx: GatewayServerContext;
  /** listen 완료 후 실제 포트 (port 0 지원) */
  port(): number;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createGatewayServer(
  config: GatewayServerConfig,
  deps: GatewayServerDeps,
): GatewayServer {
  const logger = deps.logger.child('gateway');

  // HTTP 서버 생성
  const httpServer = createServer();

  // WebSocket 서버 (채팅 경로만 업그레이드)
  const wss = new WebSocketServer({
    server: httpServer,
    path: config.gateway.basePath + CHAT_WS_PATH,
    maxPayload: config.ws.maxPayloadBytes,
  });

  const registry = new ConnectionRegistry({ colorGenerator: deps.colorGenerator });

  // DI 컨테이너
  const ctx: GatewayServerContext = {
    config,
    httpServer,
    wss,
    registry,
    broadcaster: new ChatBroadcaster(registry, {
      deliveryTimeoutMs: config.ws.deliveryTimeoutMs,
      maxBufferedBytes: config.ws.maxBufferedBytes,
      logger: logger.child('broadcast'),
    }),
    logger,
    sessionStore: deps.sessionStore,
    identityProvider: deps.identityProvider,
    identityResolver: new IdentityResolver(deps.sessionStore, logger.child('identity')),
    rateLimiter: new AuthRateLimiter(config.auth.rateLimit),
  };

  // HTTP 요청 처리
  httpServer.on('request', (req: IncomingMessage, res: ServerResponse) => {
    handleHttpRequest(req, res, ctx).catch((err: unknown) => {
      logger.error('HTTP request handling failed', err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Internal Server Error' }));
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  // WebSocket 연결 처리
  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    handleWsConnection(ws, req, ctx).catch((err: unknown) => {
      logger.error('WebSocket connection handling failed', err);
      ws.close(WS_CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
    });
  });

  let heartbeatInterval: ReturnType<typeof setInterval> | undefined;

  const boundPort = (): number => {
    const address = httpServer.address();
    return typeof address === 'object' && address !== null ? address.port : config.gateway.port;
  };

  return {
    httpServer,
    wss,
    ctx,
    port: boundPort,

    async start(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(config.gateway.port, config.gateway.host, () => {
          httpServer.off('error', reject);
          resolve();
        });
      });

      heartbeatInterval = startHeartbeat(wss, config.ws.heartbeatIntervalMs);
      const port = boundPort();
      logger.info(`Listening on ${config.gateway.host}:${port}${config.gateway.basePath}`);
      getEventBus().emit('gateway:start', port);
    },

    async stop(): Promise<void> {
      // 1. 하트비트 중지
      if (heartbeatInterval) {
        clearInterval(heartbeatInterval);
        heartbeatInterval = undefined;
      }

      // 2. 승인된 연결 + 인증 중인 연결 종료 (1001)
      ctx.broadcaster.closeAll(WS_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      for (const client of wss.clients) {
        client.close(WS_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      }
      await waitForClientsClosed(wss, CLOSE_GRACE_MS);
      registry.clear();
      ctx.rateLimiter.clear();

      // 3. WebSocket/HTTP 서버 종료
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });

      if (httpServer.listening) {
        await new Promise<void>((resolve, reject) => {
          httpServer.close((err) => (err ? reject(err) : resolve()));
          httpServer.closeAllConnections();
        });
      }

      logger.info('Gateway stopped');
      getEventBus().emit('gateway:stop');
    },
  };
}

/** 모든 클라이언트의 close 대기. 상한 초과 시 남은 소켓은 terminate. */
async function waitForClientsClosed(wss: WebSocketServer, timeoutMs: number): Promise<void> {
  const pending = [...wss.clients].filter((client) => client.readyState !== client.CLOSED);
  if (pending.length === 0) {
    return;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const closed = Promise.all(
    pending.map((client) => new Promise<void>((resolve) => client.once('close', () => resolve()))),
  );
  const timedOut = new Promise<void>((resolve) => {
    timer = setTimeout(() => {
      for (const client of pending) {
        client.terminate();
      }
      resolve();
    }, timeoutMs);
  });

  await Promise.race([closed.then(() => undefined), timedOut]);
  clearTimeout(timer);
}
