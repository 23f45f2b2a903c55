// packages/server/src/process/lifecycle.test.ts
import { getEventBus, resetEventBus } from '@chatwave/infra';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { waitFor } from '../../../../test/helpers/wait-for.js';
import { createMockLogger } from '../../test/helpers.js';
import { ProcessLifecycle } from './lifecycle.js';
import { setupGracefulShutdown } from './signal-handler.js';

describe('ProcessLifecycle', () => {
  beforeEach(() => {
    resetEventBus();
  });

  it('runs cleanups in reverse registration order', async () => {
    const order: string[] = [];
    const lifecycle = new ProcessLifecycle({ logger: createMockLogger() });
    lifecycle.register(async () => {
      order.push('logger');
    });
    lifecycle.register(async () => {
      order.push('store');
    });
    lifecycle.register(async () => {
      order.push('server');
    });

    await lifecycle.shutdown();

    expect(order).toEqual(['server', 'store', 'logger']);
  });

  it('continues after a failing cleanup and logs it', async () => {
    const logger = createMockLogger();
    const lifecycle = new ProcessLifecycle({ logger });
    const last = vi.fn(async () => {});
    lifecycle.register(last);
    lifecycle.register(async () => {
      throw new Error('quit failed');
    });

    await lifecycle.shutdown();

    expect(last).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith('Cleanup error: Error: quit failed');
  });

  it('runs each cleanup only once', async () => {
    const cleanup = vi.fn(async () => {});
    const lifecycle = new ProcessLifecycle({ logger: createMockLogger() });
    lifecycle.register(cleanup);

    await lifecycle.shutdown();
    await lifecycle.shutdown();

    expect(cleanup).toHaveBeenCalledOnce();
  });

  it('init installs signal listeners once and shutdown removes them', async () => {
    const before = process.listenerCount('SIGTERM');
    const lifecycle = new ProcessLifecycle({ logger: createMockLogger() });

    lifecycle.init();
    lifecycle.init();
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);

    await lifecycle.shutdown();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});

describe('setupGracefulShutdown', () => {
  beforeEach(() => {
    resetEventBus();
  });

  it('runs cleanups, emits system:shutdown and exits 0 on SIGTERM', async () => {
    const exit = vi.fn();
    const cleanup = vi.fn(async () => {});
    const onShutdown = vi.fn();
    getEventBus().on('system:shutdown', onShutdown);

    const dispose = setupGracefulShutdown(createMockLogger(), () => [cleanup], { exit });
    const listener = process.listeners('SIGTERM').at(-1);
    listener?.('SIGTERM');
    await waitFor(() => exit.mock.calls.length > 0);
    dispose();

    expect(onShutdown).toHaveBeenCalledWith('SIGTERM');
    expect(cleanup).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('forces exit 1 on a second signal', async () => {
    const exit = vi.fn();
    const dispose = setupGracefulShutdown(
      createMockLogger(),
      () => [() => new Promise<void>(() => {})],
      { exit },
    );
    const listener = process.listeners('SIGINT').at(-1);

    listener?.('SIGINT');
    listener?.('SIGINT');
    dispose();

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('exits 1 when cleanups exceed the timeout', async () => {
    vi.useFakeTimers();
    const exit = vi.fn();
    const dispose = setupGracefulShutdown(
      createMockLogger(),
      () => [() => new Promise<void>(() => {})],
      { exit, timeoutMs: 5_000 },
    );

    process.listeners('SIGTERM').at(-1)?.('SIGTERM');
    await vi.advanceTimersByTimeAsync(5_000);
    dispose();

    expect(exit).toHaveBeenCalledWith(1);
  });
});
