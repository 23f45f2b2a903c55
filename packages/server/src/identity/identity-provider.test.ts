// packages/server/src/identity/identity-provider.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import { AccountExistsError, IdentityProviderError } from '../errors.js';
import { InMemoryIdentityProvider } from './identity-provider.js';

describe('InMemoryIdentityProvider', () => {
  let provider: InMemoryIdentityProvider;

  beforeEach(() => {
    provider = new InMemoryIdentityProvider();
  });

  it('creates an account that can be looked up by normalized email', async () => {
    const userId = await provider.createAccount(' Alice@Example.com ', 'test-password');

    expect(await provider.lookupByEmail('alice@example.com')).toEqual({
      userId,
      displayName: userId,
      email: 'alice@example.com',
    });
  });

  it('rejects a duplicate email', async () => {
    await provider.createAccount('alice@example.com', 'test-password');
    await expect(provider.createAccount('ALICE@example.com', 'other-password')).rejects.toThrow(
      AccountExistsError,
    );
  });

  it('rejects concurrent registrations of the same email', async () => {
    const results = await Promise.allSettled([
      provider.createAccount('alice@example.com', 'test-password'),
      provider.createAccount('alice@example.com', 'test-password'),
    ]);
    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
  });

  it('rejects malformed emails and short passwords', async () => {
    await expect(provider.createAccount('not-an-email', 'test-password')).rejects.toThrow(
      IdentityProviderError,
    );
    await expect(provider.createAccount('alice@example.com', '12345')).rejects.toThrow(
      'Password must be at least 6 characters long',
    );
  });

  it('verifies passwords', async () => {
    const userId = await provider.createAccount('alice@example.com', 'test-password');

    expect((await provider.verifyCredentials('alice@example.com', 'test-password'))?.userId).toBe(userId);
    expect(await provider.verifyCredentials('alice@example.com', 'wrong-password')).toBeUndefined();
    expect(await provider.verifyCredentials('bob@example.com', 'test-password')).toBeUndefined();
  });

  it('returns undefined for unknown emails', async () => {
    expect(await provider.lookupByEmail('nobody@example.com')).toBeUndefined();
  });
});
