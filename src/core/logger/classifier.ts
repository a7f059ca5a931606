/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:failed' -> error
 * - '*:skip', '*:rolled-back', 'rollback:*' -> warn
 * - '*:start', '*:complete', '*:registered', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:skip$/, /:rolled-back$/, /^rollback:/];

/**
 * Patterns that classify an event as info level.
 * These are significant lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:registered$/,
    /:applied$/,
    /:started$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')           // 'error'
 * classifyEvent('patch:failed')    // 'error'
 * classifyEvent('rollback:start')  // 'warn'
 * classifyEvent('run:start')       // 'info'
 * classifyEvent('patch:before')    // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    for (const pattern of ERROR_PATTERNS) {

        if (pattern.test(event)) {

            return 'error';

        }

    }

    for (const pattern of WARN_PATTERNS) {

        if (pattern.test(event)) {

            return 'warn';

        }

    }

    for (const pattern of INFO_PATTERNS) {

        if (pattern.test(event)) {

            return 'info';

        }

    }

    return 'debug';

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')           // true (errors always logged)
 * shouldLog('run:start', 'info')       // true (info event at info level)
 * shouldLog('patch:before', 'info')    // false (debug event at info level)
 * shouldLog('patch:before', 'verbose') // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') {

        return false;

    }

    if (configLevel === 'verbose') {

        return true;

    }

    return getEntryLevelPriority(classifyEvent(event)) <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Map entry level to priority for comparison.
 * Lower priority = more severe/important.
 */
export function getEntryLevelPriority(level: EntryLevel): number {

    switch (level) {

    case 'error':
        return 1;
    case 'warn':
        return 2;
    case 'info':
        return 3;
    case 'debug':
        return 4;

    }

}
