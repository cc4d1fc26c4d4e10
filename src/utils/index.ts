export { logger, Logger, LogLevel } from './logger.js';
export {
  HandoffError,
  VikunjaApiError,
  ConfigError,
  toHandoffError,
  errorMessage,
} from './errors.js';
export type { HandoffErrorKind, HandoffOperation } from './errors.js';
