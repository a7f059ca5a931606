/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs.
 *
 * Features:
 * - Automatic CI detection (stdout when no console stream is given)
 * - Line or JSON output
 * - Level filtering by event classification
 */

// Types
export type {
    LogLevel,
    LogFormat,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry, sanitizeData } from './formatter.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
