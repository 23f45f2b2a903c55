// packages/server/src/identity/identity-provider.ts
import type { UserId, UserIdentity } from '@chatwave/types';
import { createUserId } from '@chatwave/types';
import { randomBytes, randomUUID, scrypt, timingSafeEqual } from 'node:crypto';
import { AccountExistsError, IdentityProviderError } from '../errors.js';

/**
 * 계정 저장소 (Firebase Auth 등)
 *
 * - createAccount: 이미 존재하면 AccountExistsError, 입력 거부는 IdentityProviderError,
 *   공급자 장애는 UpstreamUnavailableError
 * - lookupByEmail: 없으면 undefined
 * - verifyCredentials: 로그인용. 비밀번호를 검증할 수 없는 공급자는 조회 결과만 돌려준다
 */
export interface IdentityProvider {
  createAccount(email: string, password: string): Promise<UserId>;
  lookupByEmail(email: string): Promise<UserIdentity | undefined>;
  verifyCredentials(email: string, password: string): Promise<UserIdentity | undefined>;
}

const MIN_PASSWORD_LENGTH = 6;
const KEY_LENGTH = 32;

interface StoredAccount {
  userId: UserId;
  email: string;
  salt: Buffer;
  hash: Buffer;
}

/** 인메모리 계정 저장소 (개발/테스트). 비밀번호는 scrypt 해시로 보관. */
export class InMemoryIdentityProvider implements IdentityProvider {
  private readonly accounts = new Map<string, StoredAccount>();

  async createAccount(email: string, password: string): Promise<UserId> {
    const normalized = normalizeEmail(email);
    if (!normalized.includes('@')) {
      throw new IdentityProviderError(`Invalid email address: ${email}`);
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new IdentityProviderError(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
      );
    }
    if (this.accounts.has(normalized)) {
      throw new AccountExistsError(normalized);
    }

    const salt = randomBytes(16);
    const hash = await hashPassword(password, salt);
    // 해시 계산 중 같은 이메일로 가입이 끝났을 수 있음
    if (this.accounts.has(normalized)) {
      throw new AccountExistsError(normalized);
    }

    const userId = createUserId(randomUUID());
    this.accounts.set(normalized, { userId, email: normalized, salt, hash });
    return userId;
  }

  async lookupByEmail(email: string): Promise<UserIdentity | undefined> {
    const account = this.accounts.get(normalizeEmail(email));
    return account ? toIdentity(account) : undefined;
  }

  async verifyCredentials(email: string, password: string): Promise<UserIdentity | undefined> {
    const account = this.accounts.get(normalizeEmail(email));
    if (!account) {
      return undefined;
    }
    const hash = await hashPassword(password, account.salt);
    return timingSafeEqual(hash, account.hash) ? toIdentity(account) : undefined;
  }
}

function hashPassword(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toIdentity(account: StoredAccount): UserIdentity {
  return { userId: account.userId, displayName: account.userId, email: account.email };
}
