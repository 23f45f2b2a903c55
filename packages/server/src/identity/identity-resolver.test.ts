// packages/server/src/identity/identity-resolver.test.ts
import { createUserId } from '@chatwave/types';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMockLogger } from '../../test/helpers.js';
import { IdentityResolver } from './identity-resolver.js';
import { InMemorySessionStore } from './session-store.js';

describe('IdentityResolver', () => {
  let store: InMemorySessionStore;
  let resolver: IdentityResolver;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    store = new InMemorySessionStore();
    logger = createMockLogger();
    resolver = new IdentityResolver(store, logger);
    await store.set('test-token', createUserId('u-1'), 60);
  });

  it('resolves a token to the user and stored username', async () => {
    await store.setUsername(createUserId('u-1'), 'alice');
    expect(await resolver.resolve('test-token')).toEqual({
      ok: true,
      value: { userId: 'u-1', displayName: 'alice' },
    });
  });

  it('uses the userId when no username is stored', async () => {
    expect(await resolver.resolve('test-token')).toEqual({
      ok: true,
      value: { userId: 'u-1', displayName: 'u-1' },
    });
  });

  it('fails with unauthenticated for a missing or unknown token', async () => {
    expect(await resolver.resolve(undefined)).toEqual({
      ok: false,
      error: { reason: 'unauthenticated', message: 'Missing session token' },
    });
    expect(await resolver.resolve('')).toEqual({
      ok: false,
      error: { reason: 'unauthenticated', message: 'Missing session token' },
    });
    expect(await resolver.resolve('other')).toEqual({
      ok: false,
      error: { reason: 'unauthenticated', message: 'Unknown or expired session token' },
    });
  });

  it('reports upstream_unavailable without throwing when the store fails', async () => {
    vi.spyOn(store, 'getUsername').mockRejectedValue(new Error('ETIMEDOUT'));

    expect(await resolver.resolve('test-token')).toEqual({
      ok: false,
      error: { reason: 'upstream_unavailable', message: 'Session store unavailable' },
    });
    expect(logger.warn).toHaveBeenCalledWith('Session store lookup failed: Error: ETIMEDOUT');
  });

  it('never writes to the store', async () => {
    const set = vi.spyOn(store, 'set');
    const del = vi.spyOn(store, 'delete');
    await resolver.resolve('test-token');
    await resolver.resolve('other');
    expect(set).not.toHaveBeenCalled();
    expect(del).not.toHaveBeenCalled();
  });
});
