// packages/server/src/identity/identity-resolver.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { IdentityFailure, Result, UserIdentity } from '@chatwave/types';
import type { SessionStore } from './session-store.js';

/**
 * 세션 토큰 → 사용자 신원
 *
 * - 읽기 전용: 저장소에 쓰지 않는다
 * - 저장소 오류는 재시도하지 않고 upstream_unavailable로 반환 (throw 하지 않음)
 */
export class IdentityResolver {
  constructor(
    private readonly store: SessionStore,
    private readonly logger?: ChatwaveLogger,
  ) {}

  async resolve(token: string | undefined): Promise<Result<UserIdentity, IdentityFailure>> {
    if (!token) {
      return fail('unauthenticated', 'Missing session token');
    }

    try {
      const userId = await this.store.get(token);
      if (!userId) {
        return fail('unauthenticated', 'Unknown or expired session token');
      }
      const username = await this.store.getUsername(userId);
      return { ok: true, value: { userId, displayName: username || userId } };
    } catch (err) {
      this.logger?.warn(`Session store lookup failed: ${String(err)}`);
      return fail('upstream_unavailable', 'Session store unavailable');
    }
  }
}

function fail(
  reason: IdentityFailure['reason'],
  message: string,
): Result<UserIdentity, IdentityFailure> {
  return { ok: false, error: { reason, message } };
}
