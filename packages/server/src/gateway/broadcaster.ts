// packages/server/src/gateway/broadcaster.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { ChatEnvelope, ConnectionId, DeliveryFailureReason } from '@chatwave/types';
import { getEventBus } from '@chatwave/infra';
import type { ConnectionRegistry } from './registry.js';
import type { BroadcastReport, ConnectionEntry, DeliveryResult } from './types.js';
import { UNKNOWN_SENDER_COLOR } from './color.js';

export interface BroadcasterOptions {
  /** 수신자 1명당 전송 완료 대기 한도 */
  readonly deliveryTimeoutMs: number;
  /** 이 값을 넘게 버퍼링된 수신자는 건너뜀 (slow consumer) */
  readonly maxBufferedBytes: number;
  readonly logger?: ChatwaveLogger;
}

/**
 * ChatBroadcaster — 한 연결의 텍스트를 모든 연결에 `{ message, color }`로 전달
 *
 * | 단계            | 동작                                                   |
 * |-----------------|--------------------------------------------------------|
 * | 발신자 조회     | 없으면 `unknown` / `#000000`                           |
 * | 직렬화          | broadcast 당 1회                                       |
 * | 수신자          | snapshot 전체 (발신자 포함)                            |
 * | 전송            | 수신자별 동시 진행, deliveryTimeoutMs 제한             |
 * | 실패            | DeliveryResult로 반환, warn 로그 + 이벤트. throw 없음  |
 */
export class ChatBroadcaster {
  private readonly deliveryTimeoutMs: number;
  private readonly maxBufferedBytes: number;
  private readonly logger?: ChatwaveLogger;

  constructor(
    private readonly registry: ConnectionRegistry,
    opts: BroadcasterOptions,
  ) {
    this.deliveryTimeoutMs = opts.deliveryTimeoutMs;
    this.maxBufferedBytes = opts.maxBufferedBytes;
    this.logger = opts.logger;
  }

  /** text를 현재 연결 전체에 전송. reject 하지 않는다. */
  async broadcast(text: string, senderId: ConnectionId): Promise<BroadcastReport> {
    const sender = this.registry.get(senderId);
    const envelope: ChatEnvelope = {
      message: `${sender?.displayName ?? 'unknown'}: ${text}`,
      color: sender?.color ?? UNKNOWN_SENDER_COLOR,
    };
    const payload = JSON.stringify(envelope);

    const recipients = this.registry.snapshot();
    const results = await Promise.all(recipients.map((entry) => this.deliver(entry, payload)));

    const failed = results.filter((r) => !r.ok).length;
    getEventBus().emit('chat:broadcast', senderId, recipients.length, failed);
    this.logger?.debug(
      `Broadcast from ${senderId}: ${recipients.length - failed}/${recipients.length} delivered`,
    );

    return {
      senderId,
      payload,
      recipients: recipients.length,
      delivered: recipients.length - failed,
      failed,
      results,
    };
  }

  /** 등록된 모든 소켓 종료 (shutdown 용) */
  closeAll(code: number, reason: string): number {
    let closed = 0;
    for (const entry of this.registry.snapshot()) {
      try {
        entry.socket.close(code, reason);
        closed++;
      } catch (err) {
        this.logger?.warn(`Failed to close ${entry.connectionId}: ${String(err)}`);
      }
    }
    return closed;
  }

  /** 수신자 1명에게 전송 */
  private deliver(entry: ConnectionEntry, payload: string): Promise<DeliveryResult> {
    const { connectionId, socket } = entry;

    // 핸들러가 이미 정리한 연결이면 보내지 않음
    if (this.registry.get(connectionId) !== entry || socket.readyState !== socket.OPEN) {
      return Promise.resolve(this.failure(connectionId, 'closed'));
    }
    if (socket.bufferedAmount > this.maxBufferedBytes) {
      return Promise.resolve(this.failure(connectionId, 'slow_consumer'));
    }

    return new Promise<DeliveryResult>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      const settle = (result: DeliveryResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      timer = setTimeout(
        () => settle(this.failure(connectionId, 'timeout')),
        this.deliveryTimeoutMs,
      );

      try {
        socket.send(payload, (err) => {
          settle(err ? this.failure(connectionId, 'send_error', err) : { connectionId, ok: true });
        });
      } catch (err) {
        settle(this.failure(connectionId, 'send_error', err));
      }
    });
  }

  private failure(
    connectionId: ConnectionId,
    reason: DeliveryFailureReason,
    cause?: unknown,
  ): DeliveryResult {
    const error = cause === undefined ? undefined : cause instanceof Error ? cause.message : String(cause);
    this.logger?.warn(
      `Delivery to ${connectionId} failed (${reason})${error ? `: ${error}` : ''}`,
    );
    getEventBus().emit('chat:delivery:failure', connectionId, reason);
    return { connectionId, ok: false, reason, error };
  }
}
