/**
 * Logger Types
 *
 * Type definitions for the patchwork logging system.
 * The logger captures observer events and streams them
 * to console and/or file outputs with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Output format.
 *
 * - line: `[timestamp] [LEVEL] [event] message`
 * - json: one JSON entry per line
 */
export type LogFormat = 'line' | 'json';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level in the log output.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single JSON log entry.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "run:complete",
 *     "message": "Run complete at version 3: 3 applied, 0 skipped",
 *     "context": { "host": "worker-1" }
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Enable logging */
    enabled: boolean;

    /** Minimum level to capture */
    level: LogLevel;

    /** Output format */
    format: LogFormat;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    enabled: true,
    level: 'info',
    format: 'line',
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
