// packages/server/src/process/signal-handler.ts
import type { ChatwaveLogger } from '@chatwave/infra';
import type { CleanupFn } from '@chatwave/types';
import { getEventBus } from '@chatwave/infra';

export interface GracefulShutdownOptions {
  /** 정리 제한 시간 (기본 30초) */
  timeoutMs?: number;
  /** 테스트용 종료 함수 */
  exit?: (code: number) => void;
}

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * 우아한 종료 핸들러
 *
 * SIGINT/SIGTERM 수신 시:
 * 1. system:shutdown 이벤트 발행
 * 2. 리소스 정리 (CleanupFn[] 순차 실행, 타임아웃)
 * 3. 프로세스 종료 (두 번째 시그널은 즉시 exit 1)
 *
 * @returns 시그널 리스너 해제 함수
 */
export function setupGracefulShutdown(
  logger: ChatwaveLogger,
  getCleanupFns: () => CleanupFn[],
  opts: GracefulShutdownOptions = {},
): () => void {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn(`Forced exit on second ${signal}`);
      exit(1);
      return;
    }

    shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    getEventBus().emit('system:shutdown', signal);

    const timeout = setTimeout(() => {
      logger.error(`Shutdown timeout (${timeoutMs / 1000}s), forcing exit`);
      exit(1);
    }, timeoutMs);

    await runCleanups(getCleanupFns(), logger);
    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    exit(0);
  };

  const listeners = SIGNALS.map((signal) => {
    const listener = (): void => {
      handler(signal).catch((err: unknown) => {
        logger.error(`Shutdown error: ${String(err)}`);
        exit(1);
      });
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
}

/** 정리 함수 순차 실행. 하나가 실패해도 나머지는 계속한다. */
export async function runCleanups(cleanups: CleanupFn[], logger: ChatwaveLogger): Promise<void> {
  for (const cleanup of cleanups) {
    try {
      await cleanup();
    } catch (err) {
      logger.error(`Cleanup error: ${String(err)}`);
    }
  }
}
