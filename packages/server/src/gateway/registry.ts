// packages/server/src/gateway/registry.ts
import type { ConnectionId, UserIdentity } from '@chatwave/types';
import { createConnectionId } from '@chatwave/types';
import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import type { ChatSocket, ConnectionEntry, RegistryEvent } from './types.js';
import { RegistryInvariantViolationError } from '../errors.js';
import { randomColor, type ColorGenerator } from './color.js';

export interface ConnectionRegistryOptions {
  readonly colorGenerator?: ColorGenerator;
  readonly now?: () => number;
}

/**
 * 연결 레지스트리 — connectionId → ConnectionEntry
 *
 * - admit/remove/snapshot은 await 없이 동기 실행 (이벤트 루프 단위로 원자적)
 * - snapshot은 동결된 복사본: 이후 admit/remove에 영향받지 않음
 * - 이벤트 발행 (connection_admitted, connection_removed)
 */
export class ConnectionRegistry {
  private readonly entries = new Map<ConnectionId, ConnectionEntry>();
  private readonly emitter = new EventEmitter();
  private readonly colorGenerator: ColorGenerator;
  private readonly now: () => number;
  private pending = 0;

  constructor(opts?: ConnectionRegistryOptions) {
    this.colorGenerator = opts?.colorGenerator ?? randomColor;
    this.now = opts?.now ?? Date.now;
  }

  /** 연결 승인. 같은 id가 이미 있으면 RegistryInvariantViolationError. */
  admit(
    socket: ChatSocket,
    identity: UserIdentity,
    opts?: { connectionId?: ConnectionId },
  ): ConnectionEntry {
    const connectionId = opts?.connectionId ?? createConnectionId(randomUUID());
    if (this.entries.has(connectionId)) {
      throw new RegistryInvariantViolationError(`Connection already admitted: ${connectionId}`, {
        connectionId,
      });
    }

    const entry: ConnectionEntry = Object.freeze({
      connectionId,
      socket,
      userId: identity.userId,
      displayName: identity.displayName || identity.userId,
      color: this.colorGenerator(),
      admittedAt: this.now(),
    });

    this.entries.set(connectionId, entry);
    this.emit({ type: 'connection_admitted', entry });
    return entry;
  }

  /** 연결 제거. 없으면 false (멱등). */
  remove(connectionId: ConnectionId): boolean {
    const entry = this.entries.get(connectionId);
    if (!entry) {
      return false;
    }
    this.entries.delete(connectionId);
    this.emit({ type: 'connection_removed', entry });
    return true;
  }

  /** 연결 조회 */
  get(connectionId: ConnectionId): ConnectionEntry | undefined {
    return this.entries.get(connectionId);
  }

  /** 현재 시점의 동결된 목록 */
  snapshot(): readonly ConnectionEntry[] {
    return Object.freeze([...this.entries.values()]);
  }

  /** 활성 연결 수 */
  get size(): number {
    return this.entries.size;
  }

  /** 승인된 연결 + 인증 중 예약 수 (maxConnections 비교용) */
  get occupancy(): number {
    return this.entries.size + this.pending;
  }

  /**
   * 인증 중인 연결의 자리 예약. 해제 함수 반환.
   * 해제는 여러 번 호출해도 한 번만 반영된다.
   */
  reserve(): () => void {
    this.pending += 1;
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.pending -= 1;
    };
  }

  /** 모든 엔트리 제거 (shutdown 용). 이벤트는 발행하지 않는다. */
  clear(): void {
    this.entries.clear();
  }

  /** 이벤트 리스너 등록. 해제 함수 반환. */
  on(listener: (event: RegistryEvent) => void): () => void {
    this.emitter.on('event', listener);
    return () => this.emitter.off('event', listener);
  }

  private emit(event: RegistryEvent): void {
    this.emitter.emit('event', event);
  }
}
