// packages/server/src/identity/redis-session-store.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { RedisConfig, UserId } from '@chatwave/types';
import { createUserId } from '@chatwave/types';
import { Redis } from 'ioredis';
import { sessionKey, usernameKey, type SessionStore } from './session-store.js';

/** RedisSessionStore가 사용하는 명령 부분집합 (ioredis Redis와 호환) */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  quit(): Promise<unknown>;
}

/**
 * Redis 세션 저장소
 *
 * - `session:<token>`: `SET … EX ttl`
 * - `username:<userId>`: 만료 없음
 * - keyPrefix는 ioredis 옵션으로 처리 (모든 키 앞에 붙음)
 */
export class RedisSessionStore implements SessionStore {
  constructor(private readonly client: RedisCommands) {}

  async set(token: string, userId: UserId, ttlSeconds: number): Promise<void> {
    await this.client.set(sessionKey(token), userId, 'EX', ttlSeconds);
  }

  async get(token: string): Promise<UserId | undefined> {
    const value = await this.client.get(sessionKey(token));
    return value === null ? undefined : createUserId(value);
  }

  async delete(token: string): Promise<void> {
    await this.client.del(sessionKey(token));
  }

  async setUsername(userId: UserId, displayName: string): Promise<void> {
    await this.client.set(usernameKey(userId), displayName);
  }

  async getUsername(userId: UserId): Promise<string | undefined> {
    return (await this.client.get(usernameKey(userId))) ?? undefined;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/** 연결 오류 이벤트를 로거로 보낸다. 리스너가 없으면 ioredis가 콘솔에 직접 출력한다. */
export function logRedisErrors(
  client: { on(event: 'error', listener: (err: Error) => void): unknown },
  logger: ChatwaveLogger,
): void {
  client.on('error', (err: Error) => {
    logger.warn(`Redis connection error: ${err.message}`);
  });
}

/** 설정으로 ioredis 클라이언트를 만들어 저장소 생성 (요청당 재시도 1회, 첫 명령 시 연결) */
export function createRedisSessionStore(
  config: Required<RedisConfig>,
  logger: ChatwaveLogger,
): RedisSessionStore {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    keyPrefix: config.keyPrefix || undefined,
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });
  logRedisErrors(client, logger);
  return new RedisSessionStore(client);
}
