// packages/server/src/gateway/ws/heartbeat.ts
import type { WebSocket, WebSocketServer } from 'ws';

/** 마지막 ping 이후 pong 수신 여부 */
const alive = new WeakMap<WebSocket, boolean>();

/**
 * WebSocket 하트비트 시작
 *
 * intervalMs 간격으로 모든 연결에 ping 전송.
 * 직전 ping에 pong이 없던 연결은 terminate → close 이벤트로 레지스트리에서 제거된다.
 *
 * @returns clearInterval에 사용할 interval ID
 */
export function startHeartbeat(
  wss: Pick<WebSocketServer, 'clients'>,
  intervalMs: number,
): ReturnType<typeof setInterval> {
  return setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        ws.terminate();
        continue;
      }

      alive.set(ws, false);
      ws.ping();
    }
  }, intervalMs);
}

/**
 * 개별 연결에 pong 핸들러 등록
 * (ws/connection.ts에서 승인 직후 호출)
 */
export function attachPongHandler(ws: WebSocket, onPong?: () => void): void {
  alive.set(ws, true);
  ws.on('pong', () => {
    alive.set(ws, true);
    onPong?.();
  });
}
