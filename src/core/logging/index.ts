// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { parseLogLevel, LOG_LEVELS } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger } from './bootstrap.js';

// Redaction config (for testing/verification)
export { REDACTION_CONFIG } from './redaction.js';
