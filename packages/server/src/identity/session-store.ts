// packages/server/src/identity/session-store.ts
import type { UserId } from '@chatwave/types';
import { createUserId } from '@chatwave/types';

/**
 * 세션 저장소 — `session:<token> → userId` (TTL), `username:<userId> → displayName`
 *
 * 게이트웨이 코어는 get/getUsername만 사용하고 쓰기는 HTTP 인증 라우트가 담당한다.
 * 구현체는 실패 시 throw 한다 (호출 측에서 upstream_unavailable로 변환).
 */
export interface SessionStore {
  set(token: string, userId: UserId, ttlSeconds: number): Promise<void>;
  get(token: string): Promise<UserId | undefined>;
  delete(token: string): Promise<void>;
  setUsername(userId: UserId, displayName: string): Promise<void>;
  getUsername(userId: UserId): Promise<string | undefined>;
  close(): Promise<void>;
}

export const sessionKey = (token: string): string => `session:${token}`;
export const usernameKey = (userId: string): string => `username:${userId}`;

interface MemoryEntry {
  value: string;
  expiresAt: number | undefined;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * 인메모리 세션 저장소 (개발/테스트)
 *
 * 만료는 조회 시점에 clock 기준으로 판정한다.
 * 다시 조회되지 않는 만료 세션은 set 시 최대 1분 간격으로 정리한다.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;
  private lastSweepAt: number;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  async set(token: string, userId: UserId, ttlSeconds: number): Promise<void> {
    this.sweepExpired();
    this.entries.set(sessionKey(token), {
      value: userId,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async get(token: string): Promise<UserId | undefined> {
    const value = this.read(sessionKey(token));
    return value === undefined ? undefined : createUserId(value);
  }

  async delete(token: string): Promise<void> {
    this.entries.delete(sessionKey(token));
  }

  async setUsername(userId: UserId, displayName: string): Promise<void> {
    this.entries.set(usernameKey(userId), { value: displayName, expiresAt: undefined });
  }

  async getUsername(userId: UserId): Promise<string | undefined> {
    return this.read(usernameKey(userId));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** 저장된 키 수 (만료 전 항목 포함) */
  get size(): number {
    return this.entries.size;
  }

  private sweepExpired(): void {
    const now = this.now();
    if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweepAt = now;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  private read(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== undefined && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }
}
