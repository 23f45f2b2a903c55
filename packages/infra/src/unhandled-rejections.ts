// packages/infra/src/unhandled-rejections.ts
import { getEventBus } from './events.js';

/**
 * L1: AbortError → warn
 * L2: Fatal (OOM, 시스템) → exit
 * L3: Config (설정/인증) → exit
 * L4: Transient (네트워크, Redis 재연결 등) → warn
 * L5: 기타 → exit
 */
export interface RejectionLogger {
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export function setupUnhandledRejectionHandler(logger: RejectionLogger): () => void {
  const listener = (reason: unknown) => handleUnhandledRejection(reason, logger);
  process.on('unhandledRejection', listener);
  return () => {
    process.off('unhandledRejection', listener);
  };
}

/** 분류 결과에 따라 경고 또는 종료 */
export function handleUnhandledRejection(reason: unknown, logger: RejectionLogger): void {
  const level = classifyError(reason);
  getEventBus().emit('system:unhandledRejection', level, reason);

  switch (level) {
    case 'abort':
    case 'transient':
      logger.warn(`Unhandled rejection (${level}): ${formatReason(reason)}`);
      break;
    default:
      logger.error(`Fatal unhandled rejection (${level}): ${formatReason(reason)}`);
      process.exit(1);
  }
}

export type ErrorLevel = 'abort' | 'fatal' | 'config' | 'transient' | 'unknown';

/** 에러 분류 (테스트에서도 사용) */
export function classifyError(err: unknown): ErrorLevel {
  if (isAbortError(err)) {
    return 'abort';
  }
  if (isFatalError(err)) {
    return 'fatal';
  }
  if (isConfigError(err)) {
    return 'config';
  }
  if (isTransientError(err)) {
    return 'transient';
  }
  return 'unknown';
}

function isAbortError(err: unknown): boolean {
  if (err instanceof DOMException && err.name === 'AbortError') {
    return true;
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return true;
  }
  return false;
}

function isFatalError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const msg = err.message.toLowerCase();
  return (
    msg.includes('out of memory') ||
    msg.includes('heap') ||
    msg.includes('stack overflow') ||
    errnoCode(err) === 'ERR_WORKER_OUT_OF_MEMORY'
  );
}

function isConfigError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const msg = err.message.toLowerCase();
  return (
    msg.includes('invalid config') ||
    msg.includes('config validation') ||
    msg.includes('credential') ||
    msg.includes('authentication')
  );
}

function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  if (TRANSIENT_CODES.has(errnoCode(err) ?? '')) {
    return true;
  }
  // ioredis: 재연결 한도 초과 / 연결 끊김
  return err.name === 'MaxRetriesPerRequestError' || err.message.includes('Connection is closed');
}

function errnoCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

function formatReason(reason: unknown): string {
  if (reason instanceof Error) {
    return `${reason.name}: ${reason.message}`;
  }
  return String(reason);
}
