import { describe, it, expect, vi, afterEach } from 'vitest';
import { createTypedEmitter, getEventBus, resetEventBus } from '../src/events.js';

interface TestEvents {
  ping: (n: number) => void;
}

describe('createTypedEmitter', () => {
  it('리스너에 인자를 전달한다', () => {
    const emitter = createTypedEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('ping', listener);

    expect(emitter.emit('ping', 7)).toBe(true);
    expect(listener).toHaveBeenCalledWith(7);
    expect(emitter.listenerCount('ping')).toBe(1);
  });

  it('off 이후 호출되지 않는다', () => {
    const emitter = createTypedEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('ping', listener);
    emitter.off('ping', listener);

    expect(emitter.emit('ping', 1)).toBe(false);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('getEventBus', () => {
  afterEach(() => {
    resetEventBus();
  });

  it('싱글턴을 반환한다', () => {
    expect(getEventBus()).toBe(getEventBus());
  });

  it('resetEventBus 후 새 인스턴스를 반환하고 리스너를 제거한다', () => {
    const bus = getEventBus();
    const listener = vi.fn();
    bus.on('gateway:stop', listener);

    resetEventBus();
    bus.emit('gateway:stop');

    expect(listener).not.toHaveBeenCalled();
    expect(getEventBus()).not.toBe(bus);
  });
});
