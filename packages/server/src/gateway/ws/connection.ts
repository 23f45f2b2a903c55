// packages/server/src/gateway/ws/connection.ts
import type { IncomingMessage } from 'node:http';
import type { RawData, WebSocket } from 'ws';
import { createConnectionId, type ConnectionId, type UserIdentity, WS_CLOSE_CODES } from '@chatwave/types';
import { getEventBus, runWithContext } from '@chatwave/infra';
import { AsyncResource } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { GatewayServerContext } from '../context.js';
import type { ConnectionState } from '../types.js';
import { authenticate, clientIp, type AdmissionFailureReason } from '../auth/index.js';
import { attachPongHandler } from './heartbeat.js';

/** 연결 핸들러 1개의 상태 */
export interface ChatConnection {
  readonly id: ConnectionId;
  readonly ws: WebSocket;
  readonly remoteAddress: string;
  readonly connectedAt: number;
  state: ConnectionState;
  identity?: UserIdentity;
}

const FAILURE_CLOSE_CODES: Record<AdmissionFailureReason, number> = {
  unauthenticated: WS_CLOSE_CODES.POLICY_VIOLATION,
  rate_limited: WS_CLOSE_CODES.POLICY_VIOLATION,
  upstream_unavailable: WS_CLOSE_CODES.INTERNAL_ERROR,
};

/** broadcast를 기다리는 수신 프레임 상한. 넘으면 1008로 닫는다. */
export const MAX_QUEUED_FRAMES = 256;

function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * 새 WebSocket 연결 처리
 *
 * 1. 연결 수 제한 (1013)
 * 2. 핸드셰이크 타임아웃 설정 (4008)
 * 3. 인증 → 실패 시 1008, 신원 저장소 장애 시 1011
 * 4. 레지스트리 승인 → 수신 텍스트 프레임을 도착 순서대로 broadcast
 * 5. close/error 시 레지스트리에서 제거
 *
 * 처리 대기 프레임이 있는 동안 소켓 읽기를 멈추고(ws.pause), 모두 broadcast되면 재개한다.
 * 인증 중 도착한 프레임은 승인 이후 순서대로 처리된다. 승인되지 않으면 버려진다.
 */
export async function handleWsConnection(
  ws: WebSocket,
  req: IncomingMessage,
  ctx: GatewayServerContext,
): Promise<ChatConnection> {
  const conn: ChatConnection = {
    id: createConnectionId(randomUUID()),
    ws,
    remoteAddress: clientIp(req),
    connectedAt: Date.now(),
    state: 'connecting',
  };

  return runWithContext(
    { requestId: conn.id, connectionId: conn.id, startedAt: conn.connectedAt },
    () => runConnection(conn, req, ctx),
  );
}

async function runConnection(
  conn: ChatConnection,
  req: IncomingMessage,
  ctx: GatewayServerContext,
): Promise<ChatConnection> {
  const { ws } = conn;
  const logger = ctx.logger.child('ws');
  const bus = getEventBus();

  if (ctx.registry.occupancy >= ctx.config.ws.maxConnections) {
    conn.state = 'closing';
    ws.close(WS_CLOSE_CODES.TRY_AGAIN_LATER, 'Too many connections');
    return conn;
  }

  // 승인/거절/close 중 먼저 오는 쪽에서 해제
  const releaseSlot = ctx.registry.reserve();
  let admitted = false;
  let queued = 0;

  // 승인 전까지 inbound는 admission 완료를 기다린다
  let inbound: Promise<unknown> = Promise.resolve();

  const handshakeTimer = setTimeout(() => {
    logger.info(`Handshake timeout for ${conn.id}`);
    conn.state = 'closing';
    ws.close(WS_CLOSE_CODES.HANDSHAKE_TIMEOUT, 'Authentication timeout');
  }, ctx.config.ws.handshakeTimeoutMs);

  // 소켓 리스너는 emit 측 컨텍스트에서 실행되므로 연결 컨텍스트에 묶는다
  ws.on('message', AsyncResource.bind((data: RawData, isBinary: boolean) => {
    if (isBinary) {
      conn.state = 'closing';
      ws.close(WS_CLOSE_CODES.UNSUPPORTED_DATA, 'Binary frames are not supported');
      return;
    }

    if (queued >= MAX_QUEUED_FRAMES) {
      logger.warn(`Connection ${conn.id} exceeded ${MAX_QUEUED_FRAMES} queued frames`);
      conn.state = 'closing';
      ws.close(WS_CLOSE_CODES.POLICY_VIOLATION, 'Too many queued messages');
      return;
    }

    const text = rawDataToText(data);
    queued += 1;
    ws.pause();
    inbound = inbound
      .then(async () => {
        if (conn.state !== 'open') {
          return;
        }
        await ctx.broadcaster.broadcast(text, conn.id);
      })
      .catch((err: unknown) => {
        logger.error(`Broadcast from ${conn.id} failed`, err);
      })
      .finally(() => {
        queued -= 1;
        if (queued === 0 && ws.readyState === ws.OPEN) {
          ws.resume();
        }
      });
  }));

  ws.on('error', AsyncResource.bind((err: Error) => {
    logger.warn(`WebSocket error on ${conn.id}: ${err.message}`);
    conn.state = 'closing';
    ctx.registry.remove(conn.id);
    ws.terminate();
  }));

  ws.on('close', AsyncResource.bind((code: number) => {
    clearTimeout(handshakeTimer);
    releaseSlot();
    ctx.registry.remove(conn.id);
    conn.state = 'closed';
    if (admitted) {
      logger.info(`Connection ${conn.id} closed (${code})`);
      bus.emit('gateway:ws:disconnect', conn.id, code);
    }
  }));

  const admission = (async () => {
    conn.state = 'authenticating';

    let authResult: Awaited<ReturnType<typeof authenticate>>;
    try {
      authResult = await authenticate(req, ctx.identityResolver, ctx.rateLimiter);
    } catch (err) {
      logger.error(`Authentication for ${conn.id} failed unexpectedly`, err);
      authResult = {
        ok: false,
        error: { reason: 'upstream_unavailable', message: 'Identity check failed' },
      };
    }
    clearTimeout(handshakeTimer);
    releaseSlot();

    // 인증 도중 닫힌 소켓은 승인하지 않는다
    if (conn.state !== 'authenticating' || ws.readyState !== ws.OPEN) {
      logger.debug(`Connection ${conn.id} closed during authentication`);
      return;
    }

    if (!authResult.ok) {
      logger.info(`Rejected ${conn.id} from ${conn.remoteAddress}: ${authResult.error.message}`);
      conn.state = 'closing';
      ws.close(FAILURE_CLOSE_CODES[authResult.error.reason], authResult.error.message);
      return;
    }

    try {
      ctx.registry.admit(ws, authResult.value, { connectionId: conn.id });
    } catch (err) {
      logger.error(`Failed to admit ${conn.id}`, err);
      conn.state = 'closing';
      ws.close(WS_CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
      return;
    }

    admitted = true;
    conn.identity = authResult.value;
    conn.state = 'open';
    attachPongHandler(ws);
    logger.info(`Connection ${conn.id} admitted for ${authResult.value.userId}`);
    bus.emit('gateway:ws:connect', conn.id, authResult.value.userId);
  })();

  inbound = admission;
  await admission;
  return conn;
}
