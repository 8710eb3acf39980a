/**
 * Common utilities shared across modules
 */

export {
    Logger,
    LOG_LEVELS,
    LOG_FORMATS,
    createLogger,
    configureLogger,
} from './logger';
export type { LogLevel, LogFormat, LogEntry, LoggerConfig } from './logger';

export {
    OutlineError,
    isOutlineError,
    describeError,
    systemErrorCode,
} from './errors';
export type { OutlineErrorCode } from './errors';
