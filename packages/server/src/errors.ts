// packages/server/src/errors.ts
import { ChatwaveError } from '@chatwave/infra';

/** 레지스트리 불변식 위반 (중복 connectionId 등) — 버그 신호 */
export class RegistryInvariantViolationError extends ChatwaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRY_INVARIANT', { statusCode: 500, isOperational: false, details });
    this.name = 'RegistryInvariantViolationError';
  }
}

/** 세션 저장소/신원 공급자에 도달할 수 없음 */
export class UpstreamUnavailableError extends ChatwaveError {
  constructor(upstream: string, cause?: unknown) {
    super(`${upstream} is unavailable`, 'UPSTREAM_UNAVAILABLE', {
      statusCode: 503,
      cause: cause instanceof Error ? cause : undefined,
      details: { upstream },
    });
    this.name = 'UpstreamUnavailableError';
  }
}

/** 이미 존재하는 계정 */
export class AccountExistsError extends ChatwaveError {
  constructor(email: string) {
    super(`An account already exists for ${email}`, 'ACCOUNT_EXISTS', {
      statusCode: 400,
      details: { email },
    });
    this.name = 'AccountExistsError';
  }
}

/** 신원 공급자가 거부한 입력 (잘못된 이메일, 약한 비밀번호 등) */
export class IdentityProviderError extends ChatwaveError {
  constructor(message: string, cause?: unknown) {
    super(message, 'IDENTITY_REJECTED', {
      statusCode: 400,
      cause: cause instanceof Error ? cause : undefined,
    });
    this.name = 'IdentityProviderError';
  }
}
