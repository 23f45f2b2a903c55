// packages/server/src/main.ts
import { loadConfig } from '@chatwave/config';
import {
  assertPortAvailable,
  assertSupportedRuntime,
  createLogger,
  getEventBus,
  loadDotenv,
  normalizeEnv,
  setupUnhandledRejectionHandler,
} from '@chatwave/infra';
import { createStores, loggerConfigFrom } from './bootstrap.js';
import { createGatewayServer } from './gateway/server.js';
import { ProcessLifecycle } from './process/lifecycle.js';

async function main(): Promise<void> {
  assertSupportedRuntime();
  loadDotenv();
  normalizeEnv();

  const config = loadConfig();
  const logger = createLogger(loggerConfigFrom(config));
  const lifecycle = new ProcessLifecycle({ logger });

  const disposeRejectionHandler = setupUnhandledRejectionHandler(logger);

  // 포트 사용 가능 확인
  await assertPortAvailable(config.gateway.port, config.gateway.host);

  const stores = createStores(config, logger);
  const gateway = createGatewayServer(config, { ...stores, logger });

  // CleanupFn 등록 (LIFO: 서버 → 저장소 → 로거)
  lifecycle.register(async () => {
    disposeRejectionHandler();
    await logger.flush();
  });
  lifecycle.register(() => stores.sessionStore.close());
  lifecycle.register(() => gateway.stop());

  // 시그널 핸들러 초기화
  lifecycle.init();

  await gateway.start();
  logger.info(`${config.app.name} ${config.app.version} (${config.app.env}) ready`);

  // 시스템 준비 이벤트
  getEventBus().emit('system:ready');
}

main().catch((err: unknown) => {
  console.error('Failed to start chat gateway:', err);
  process.exit(1);
});
