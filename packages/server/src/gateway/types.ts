// packages/server/src/gateway/types.ts
import type {
  ConnectionId,
  DeliveryFailureReason,
  HexColor,
  ResolvedChatwaveConfig,
  UserId,
} from '@chatwave/types';

export type { GatewayStatus } from '@chatwave/types';

/** 게이트웨이가 사용하는 전체 설정 (기본값 적용 완료) */
export type GatewayServerConfig = ResolvedChatwaveConfig;

// === 전송 계층 ===

/**
 * 레지스트리/브로드캐스터가 보는 소켓 — ws WebSocket의 좁은 뷰
 *
 * 소유권은 연결 핸들러에 있다. 레지스트리는 참조만 보관한다.
 */
export interface ChatSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  readonly OPEN: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

// === 레지스트리 ===

/** 승인된 연결 1개 — 삽입 후 동결 */
export interface ConnectionEntry {
  readonly connectionId: ConnectionId;
  readonly socket: ChatSocket;
  readonly userId: UserId;
  readonly displayName: string;
  readonly color: HexColor;
  readonly admittedAt: number;
}

/** 레지스트리 이벤트 */
export type RegistryEvent =
  | { readonly type: 'connection_admitted'; readonly entry: ConnectionEntry }
  | { readonly type: 'connection_removed'; readonly entry: ConnectionEntry };

// === 브로드캐스트 ===

/** 수신자별 전송 결과 */
export type DeliveryResult =
  | { readonly connectionId: ConnectionId; readonly ok: true }
  | {
      readonly connectionId: ConnectionId;
      readonly ok: false;
      readonly reason: DeliveryFailureReason;
      readonly error?: string;
    };

/** broadcast 1회 결과 */
export interface BroadcastReport {
  readonly senderId: ConnectionId;
  /** 직렬화된 envelope */
  readonly payload: string;
  readonly recipients: number;
  readonly delivered: number;
  readonly failed: number;
  readonly results: readonly DeliveryResult[];
}

// === 연결 상태 ===

/** 연결 핸들러 상태 */
export type ConnectionState = 'connecting' | 'authenticating' | 'open' | 'closing' | 'closed';
