// packages/server/src/gateway/auth/rate-limit.ts
import { getEventBus } from '@chatwave/infra';

interface RateLimitEntry {
  failures: number;
  lastFailure: number;
  blockedUntil: number;
}

export interface RateLimiterOptions {
  readonly maxFailures?: number;
  readonly windowMs?: number;
  readonly blockDurationMs?: number;
}

/**
 * IP별 인증 실패 Rate Limiter (WS 승인, 로그인 공용)
 *
 * - windowMs 내 maxFailures 회 실패 시 blockDurationMs 차단
 * - 차단 해제 또는 인증 성공 시 카운터 리셋
 * - 기본값: 1분 윈도우, 10회 실패, 5분 차단
 */
export class AuthRateLimiter {
  private readonly entries = new Map<string, RateLimitEntry>();
  private readonly maxFailures: number;
  private readonly windowMs: number;
  private readonly blockDurationMs: number;

  constructor(opts?: RateLimiterOptions) {
    this.maxFailures = opts?.maxFailures ?? 10;
    this.windowMs = opts?.windowMs ?? 60_000;
    this.blockDurationMs = opts?.blockDurationMs ?? 5 * 60_000;
  }

  /** 차단 여부 확인 */
  isBlocked(ip: string): boolean {
    return this.retryAfterMs(ip) > 0;
  }

  /** 차단 해제까지 남은 시간 (차단 아니면 0) */
  retryAfterMs(ip: string): number {
    const entry = this.entries.get(ip);
    if (!entry) {
      return 0;
    }

    const remaining = entry.blockedUntil - Date.now();
    if (remaining > 0) {
      return remaining;
    }

    // 차단 해제 후 리셋
    if (entry.blockedUntil > 0) {
      this.entries.delete(ip);
    }
    return 0;
  }

  /** 실패 기록 */
  recordFailure(ip: string): void {
    const now = Date.now();
    const entry = this.entries.get(ip);

    if (!entry || now - entry.lastFailure > this.windowMs) {
      this.entries.set(ip, { failures: 1, lastFailure: now, blockedUntil: 0 });
      this.blockIfExceeded(ip, now);
      return;
    }

    entry.failures++;
    entry.lastFailure = now;
    this.blockIfExceeded(ip, now);
  }

  /** 성공 기록 — 누적 실패 초기화 (차단 중이면 유지) */
  recordSuccess(ip: string): void {
    if (!this.isBlocked(ip)) {
      this.entries.delete(ip);
    }
  }

  /** 캐시 크기 */
  get size(): number {
    return this.entries.size;
  }

  /** 엔트리 초기화 */
  clear(): void {
    this.entries.clear();
  }

  private blockIfExceeded(ip: string, now: number): void {
    const entry = this.entries.get(ip);
    if (entry && entry.blockedUntil === 0 && entry.failures >= this.maxFailures) {
      entry.blockedUntil = now + this.blockDurationMs;
      getEventBus().emit('gateway:auth:rate_limit', ip, entry.failures);
    }
  }
}
