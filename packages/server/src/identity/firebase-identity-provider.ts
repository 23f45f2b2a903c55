// packages/server/src/identity/firebase-identity-provider.ts
import type { UserId, UserIdentity } from '@chatwave/types';
import { createUserId } from '@chatwave/types';
import { cert, getApps, initializeApp } from 'firebase-admin/app';
import { getAuth } from 'firebase-admin/auth';
import type { IdentityProvider } from './identity-provider.js';
import { AccountExistsError, IdentityProviderError, UpstreamUnavailableError } from '../errors.js';

/** FirebaseIdentityProvider가 사용하는 Admin Auth 부분집합 */
export interface FirebaseAuthClient {
  createUser(props: { email: string; password: string }): Promise<{ uid: string }>;
  getUserByEmail(email: string): Promise<{ uid: string; email?: string; displayName?: string }>;
}

/** 입력 자체가 잘못된 경우 — 공급자 장애가 아님 */
const REJECTED_INPUT_CODES = new Set([
  'auth/invalid-email',
  'auth/invalid-password',
  'auth/weak-password',
]);

/**
 * Firebase Auth 계정 저장소
 *
 * Admin SDK는 비밀번호를 검증할 수 없으므로 verifyCredentials는 이메일 조회로 대신한다.
 */
export class FirebaseIdentityProvider implements IdentityProvider {
  constructor(private readonly auth: FirebaseAuthClient) {}

  async createAccount(email: string, password: string): Promise<UserId> {
    try {
      const user = await this.auth.createUser({ email, password });
      return createUserId(user.uid);
    } catch (err) {
      const code = firebaseErrorCode(err);
      if (code === 'auth/email-already-exists') {
        throw new AccountExistsError(email);
      }
      if (code !== undefined && REJECTED_INPUT_CODES.has(code)) {
        throw new IdentityProviderError(err instanceof Error ? err.message : code, err);
      }
      throw new UpstreamUnavailableError('identity provider', err);
    }
  }

  async lookupByEmail(email: string): Promise<UserIdentity | undefined> {
    try {
      const user = await this.auth.getUserByEmail(email);
      return {
        userId: createUserId(user.uid),
        displayName: user.displayName ?? user.uid,
        email: user.email,
      };
    } catch (err) {
      const code = firebaseErrorCode(err);
      if (code === 'auth/user-not-found' || code === 'auth/invalid-email') {
        return undefined;
      }
      throw new UpstreamUnavailableError('identity provider', err);
    }
  }

  async verifyCredentials(email: string, _password: string): Promise<UserIdentity | undefined> {
    return this.lookupByEmail(email);
  }
}

function firebaseErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Firebase Admin 앱을 초기화하고 공급자 생성
 *
 * credentialsPath가 비어 있으면 GOOGLE_APPLICATION_CREDENTIALS(기본 자격 증명)를 사용한다.
 */
export function createFirebaseIdentityProvider(credentialsPath: string): FirebaseIdentityProvider {
  const app =
    getApps()[0] ?? initializeApp(credentialsPath ? { credential: cert(credentialsPath) } : undefined);
  return new FirebaseIdentityProvider(getAuth(app));
}
