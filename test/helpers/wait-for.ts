export interface WaitForOptions {
  timeoutMs?: number;
  intervalMs?: number;
}

/**
 * 조건이 값을 돌려줄 때까지 폴링한다.
 * undefined / false 는 "아직", 그 외 값은 그대로 반환.
 */
export async function waitFor<T>(
  probe: () => T | undefined | false | Promise<T | undefined | false>,
  options: WaitForOptions = {},
): Promise<T> {
  const { timeoutMs = 3_000, intervalMs = 10 } = options;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const value = await probe();
    if (value !== undefined && value !== false) {
      return value;
    }
    if (Date.now() >= deadline) {
      throw new Error(`waitFor: condition not met within ${timeoutMs}ms`);
    }
    await new Promise((r) => setTimeout(r, intervalMs));
  }
}
