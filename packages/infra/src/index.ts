// @chatwave/infra — barrel export

// 에러
export {
  ChatwaveError,
  PortInUseError,
  isChatwaveError,
  wrapError,
  extractErrorInfo,
} from './errors.js';

// 컨텍스트
export { runWithContext, getContext, getRequestId, type RequestContext } from './context.js';

// 환경/설정
export { assertSupportedRuntime, isSupportedVersion } from './runtime-guard.js';
export { loadDotenv } from './dotenv.js';
export { normalizeEnv, getEnv, requireEnv, isTruthyEnvValue } from './env.js';
export { getStateDir, getLogDir } from './paths.js';

// 로깅
export {
  createLogger,
  defaultLoggerFactory,
  type LoggerConfig,
  type LoggerFactory,
  type ChatwaveLogger,
} from './logger.js';
export { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

// 이벤트
export {
  createTypedEmitter,
  getEventBus,
  resetEventBus,
  type EventMap,
  type TypedEmitter,
  type ChatwaveEventMap,
} from './events.js';

// 프로세스
export { assertPortAvailable, isValidPort } from './ports.js';
export {
  setupUnhandledRejectionHandler,
  handleUnhandledRejection,
  type RejectionLogger,
  classifyError,
  type ErrorLevel,
} from './unhandled-rejections.js';
