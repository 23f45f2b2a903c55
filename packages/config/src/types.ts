// packages/config/src/types.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { ResolvedChatwaveConfig } from '@chatwave/types';

/** createConfigIO()에 주입하는 의존성 (모두 선택) */
export interface ConfigDeps {
  fs?: Pick<typeof import('node:fs'), 'readFileSync'>;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  cacheTtlMs?: number;
  logger?: Pick<ChatwaveLogger, 'warn' | 'info' | 'debug'>;
}

/** TTL 캐시 */
export interface ConfigCache {
  get(): ResolvedChatwaveConfig | null;
  set(config: ResolvedChatwaveConfig): void;
  invalidate(): void;
}
