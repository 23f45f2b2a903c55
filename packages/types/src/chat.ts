import type { UserId } from './common.js';

/** `#rrggbb` 표기 색상 */
export type HexColor = `#${string}`;

/** 세션 토큰으로 확인된 사용자 */
export interface UserIdentity {
  readonly userId: UserId;
  /** 저장된 username, 없으면 userId */
  readonly displayName: string;
  readonly email?: string;
}

/** 서버 → 클라이언트 채팅 메시지 */
export interface ChatEnvelope {
  /** `<displayName>: <text>` */
  readonly message: string;
  readonly color: HexColor;
}

/** 식별 실패 사유 */
export type IdentityFailureReason = 'unauthenticated' | 'upstream_unavailable';

export interface IdentityFailure {
  readonly reason: IdentityFailureReason;
  readonly message: string;
}

/** 수신자별 전송 실패 사유 */
export type DeliveryFailureReason = 'closed' | 'slow_consumer' | 'send_error' | 'timeout';

/** WebSocket close 코드 */
export const WS_CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  UNSUPPORTED_DATA: 1003,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  TRY_AGAIN_LATER: 1013,
  HANDSHAKE_TIMEOUT: 4008,
} as const;

export type WsCloseCode = (typeof WS_CLOSE_CODES)[keyof typeof WS_CLOSE_CODES];

/** 게이트웨이 상태 */
export interface GatewayStatus {
  status: 'ok';
  uptime: number;
  connections: number;
}
