// packages/server/src/gateway/auth/index.ts
import type { IdentityFailureReason, Result, UserIdentity } from '@chatwave/types';
import type { IncomingMessage } from 'node:http';
import { getEventBus } from '@chatwave/infra';
import type { IdentityResolver } from '../../identity/identity-resolver.js';
import type { AuthRateLimiter } from './rate-limit.js';
import { clientIp, extractSessionToken } from './token.js';

export type AdmissionFailureReason = IdentityFailureReason | 'rate_limited';

export interface AdmissionFailure {
  readonly reason: AdmissionFailureReason;
  readonly message: string;
}

/**
 * WebSocket 승인용 인증
 *
 * 1. 차단된 IP → rate_limited
 * 2. 세션 토큰 추출 (query > x-session-token > Bearer)
 * 3. IdentityResolver로 신원 확인
 * 4. unauthenticated만 실패로 기록
 */
export async function authenticate(
  req: Pick<IncomingMessage, 'url' | 'headers' | 'socket'>,
  resolver: IdentityResolver,
  rateLimiter: AuthRateLimiter,
): Promise<Result<UserIdentity, AdmissionFailure>> {
  const ip = clientIp(req);

  if (rateLimiter.isBlocked(ip)) {
    getEventBus().emit('gateway:auth:failure', ip, 'rate_limited');
    return { ok: false, error: { reason: 'rate_limited', message: 'Too many failed attempts' } };
  }

  const result = await resolver.resolve(extractSessionToken(req)?.token);
  if (result.ok) {
    rateLimiter.recordSuccess(ip);
    return result;
  }

  getEventBus().emit('gateway:auth:failure', ip, result.error.reason);
  if (result.error.reason === 'unauthenticated') {
    rateLimiter.recordFailure(ip);
  }
  return result;
}

export { extractSessionToken, clientIp, requestPath, parseQuery } from './token.js';
export type { ExtractedToken, TokenSource } from './token.js';
export { AuthRateLimiter, type RateLimiterOptions } from './rate-limit.js';
