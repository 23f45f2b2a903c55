// packages/config/src/cache-utils.ts
import type { ResolvedChatwaveConfig } from '@chatwave/types';
import type { ConfigCache } from './types.js';

const DEFAULT_TTL_MS = 200;

/** TTL 캐시 생성 */
export function createConfigCache(ttlMs = DEFAULT_TTL_MS, now: () => number = Date.now): ConfigCache {
  let config: ResolvedChatwaveConfig | null = null;
  let expireAt = 0;

  return {
    get(): ResolvedChatwaveConfig | null {
      if (config !== null && now() < expireAt) {
        return config;
      }
      return null;
    },

    set(newConfig: ResolvedChatwaveConfig): void {
      config = newConfig;
      expireAt = now() + ttlMs;
    },

    invalidate(): void {
      config = null;
      expireAt = 0;
    },
  };
}
