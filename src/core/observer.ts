/**
 * Central event system for patchwork.
 *
 * Core modules emit events, consumers (the logger, host applications)
 * subscribe. Business logic never writes output directly.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('patch:applied', { name, version, durationMs })
 *
 * // In a host - subscribe to events
 * const cleanup = observer.on('run:complete', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^rollback:/, ({ event, data }) => audit(event, data))
 * ```
 */
import { ObserverEngine } from '@logosdx/observer';

import { isDebug } from './environment.js';


/**
 * Outcome of a single rollback attempt.
 */
export type RollbackStatus = 'reverted' | 'failed' | 'skipped';


/**
 * All events emitted by patchwork core modules.
 *
 * Events are namespaced by module:
 * - `patch:*` - Registration and per-patch execution
 * - `run:*` - Run lifecycle
 * - `rollback:*` - Rollback sequence after a failed apply
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all errors
 *
 * Every event raised during a run carries the orchestrator `name`
 * so several orchestrators can share one observer.
 */
export interface PatchworkEvents {

    // Registry
    'patch:registered': { name: string; version: number; description?: string; dependencies: number[] };

    // Per-patch execution
    'patch:skip': { name: string; version: number; missing: number[] };
    'patch:before': { name: string; version: number; description?: string };
    'patch:applied': { name: string; version: number; durationMs: number };
    'patch:failed': { name: string; version: number; error: Error };

    // Run lifecycle
    'run:start': { name: string; baseline: number; candidates: number[] };
    'run:complete': { name: string; baseline: number; version: number; applied: number[]; skipped: number[]; durationMs: number };
    'run:rolled-back': { name: string; baseline: number; failedVersion: number; durationMs: number };

    // Rollback
    'rollback:start': { name: string; failedVersion: number; versions: number[] };
    'rollback:patch': { name: string; version: number; status: RollbackStatus; error?: Error };
    'rollback:complete': { name: string; reverted: number; failed: number; skipped: number };

    // Logger
    'logger:started': { level: string; format: string };

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> };
}

export type PatchworkObserver = ObserverEngine<PatchworkEvents>;


/**
 * Create an isolated observer.
 *
 * Orchestrators accept one so tests and embedded hosts can keep
 * their event streams apart from the shared instance.
 */
export function createObserver(name = 'patchwork'): PatchworkObserver {

    return new ObserverEngine<PatchworkEvents>({
        name,
        spy: isDebug()
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined,
    });
}


/**
 * Shared observer instance.
 *
 * Enable debug mode with `PATCHWORK_DEBUG=1` to see all events as they occur.
 *
 * @example
 * ```typescript
 * import { observer } from './observer'
 *
 * const cleanup = observer.on('patch:failed', (data) => {
 *     console.log(`Patch ${data.version} failed: ${data.error.message}`)
 * })
 *
 * cleanup()
 * ```
 */
export const observer = createObserver();
