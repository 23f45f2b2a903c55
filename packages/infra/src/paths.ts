// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/** chatwave 상태 디렉토리 (로그의 루트) */
export function getStateDir(): string {
  return getEnv('STATE_DIR') ?? path.join(os.homedir(), '.chatwave');
}

/** 로그 디렉토리 */
export function getLogDir(): string {
  return path.join(getStateDir(), 'logs');
}
