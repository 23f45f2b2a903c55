import { describe, it, expect, vi } from 'vitest';
import { assertSupportedRuntime, isSupportedVersion } from '../src/runtime-guard.js';

describe('assertSupportedRuntime', () => {
  it('지원 버전에서 정상 통과한다', () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    assertSupportedRuntime('20.12.0');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('미지원 버전에서 exit(1)을 호출한다', () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    assertSupportedRuntime('18.19.0');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});

describe('isSupportedVersion', () => {
  it.each([
    ['20.12.0', true],
    ['20.18.1', true],
    ['22.0.0', true],
    ['20.11.1', false],
    ['18.20.0', false],
  ])('isSupportedVersion(%s) → %s', (version, expected) => {
    expect(isSupportedVersion(version)).toBe(expected);
  });
});
