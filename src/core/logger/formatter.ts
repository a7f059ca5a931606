/**
 * Log Formatter
 *
 * Converts observer events into messages and LogEntry objects,
 * and serializes entries for output. Each entry is a single line.
 */
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


function count(value: unknown): number {

    return Array.isArray(value) ? value.length : 0
}


function list(value: unknown): string {

    return Array.isArray(value) ? value.join(', ') : String(value)
}


function errorMessage(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


function ms(value: unknown): string {

    return typeof value === 'number' ? `${Math.round(value)}ms` : String(value)
}


/**
 * Human-readable message templates for known events.
 * Keys are event names, values generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Registry
    'patch:registered': (d) => d['description']
        ? `Registered patch ${d['version']} (${d['description']})`
        : `Registered patch ${d['version']}`,

    // Per-patch execution
    'patch:skip': (d) => `Skipped patch ${d['version']}: missing ${list(d['missing'])}`,
    'patch:before': (d) => `Applying patch ${d['version']}`,
    'patch:applied': (d) => `Applied patch ${d['version']} (${ms(d['durationMs'])})`,
    'patch:failed': (d) => `Patch ${d['version']} failed: ${errorMessage(d['error'])}`,

    // Run lifecycle
    'run:start': (d) => `Run started from version ${d['baseline']} (${count(d['candidates'])} candidates)`,
    'run:complete': (d) => `Run complete at version ${d['version']}: ${count(d['applied'])} applied, ${count(d['skipped'])} skipped`,
    'run:rolled-back': (d) => `Run rolled back to version ${d['baseline']} after patch ${d['failedVersion']} failed`,

    // Rollback
    'rollback:start': (d) => `Rolling back ${count(d['versions'])} patches after failure at ${d['failedVersion']}`,
    'rollback:patch': (d) => d['status'] === 'failed'
        ? errorMessage(d['error'])
        : `Rollback of patch ${d['version']}: ${d['status']}`,
    'rollback:complete': (d) => `Rollback complete: ${d['reverted']} reverted, ${d['failed']} failed, ${d['skipped']} skipped`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started at ${d['level']} level (${d['format']})`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${errorMessage(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('patch:skip', { version: 3, missing: [1, 2] })
 * // 'Skipped patch 3: missing 1, 2'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "event name" or "event name: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the payload (verbose mode)
 *
 * @example
 * ```typescript
 * const entry = formatEntry('run:start', { name: 'default', baseline: 0, candidates: [1, 2] })
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'run:start',
 * //     message: 'Run started from version 0 (2 candidates)',
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make event data JSON-safe.
 * Errors become name/message pairs; unserializable values become strings.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = { name: value.name, message: value.message }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
