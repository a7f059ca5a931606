/**
 * Orchestrator errors.
 */
import type { RollbackReport } from './types.js';


/**
 * Normalize a thrown value into an Error.
 *
 * Patch bodies are caller code and may throw anything.
 */
export function toError(value: unknown): Error {

    if (value instanceof Error) {

        return value;

    }

    return new Error(String(value));

}


/**
 * A patch's apply operation failed.
 *
 * Carries the rollback report for the run as secondary diagnostics.
 * Rollback failures never replace this as the run's outcome.
 *
 * @example
 * ```typescript
 * const result = orchestrator.run()
 * if (result.status === 'rolled-back') {
 *     console.log(result.error.version, result.error.cause.message)
 *     for (const report of result.error.rollbacks) {
 *         console.log(report.version, report.status)
 *     }
 * }
 * ```
 */
export class PatchApplyError extends Error {

    override readonly name = 'PatchApplyError' as const;

    constructor(
        public readonly version: number,
        public override readonly cause: Error,
        public readonly rollbacks: RollbackReport[] = [],
    ) {

        super(`Patch ${version} failed: ${cause.message}`);

    }

}


/**
 * A rollback operation failed. Diagnostic only.
 */
export class RollbackError extends Error {

    override readonly name = 'RollbackError' as const;

    constructor(
        public readonly version: number,
        public override readonly cause: Error,
    ) {

        super(`Rollback of patch ${version} failed: ${cause.message}`);

    }

}


/**
 * Host code threw during a run outside any patch body, typically an
 * event listener. Everything the run had applied is rolled back first.
 */
export class RunAbortedError extends Error {

    override readonly name = 'RunAbortedError' as const;

    constructor(
        public readonly orchestrator: string,
        public override readonly cause: Error,
        public readonly rollbacks: RollbackReport[] = [],
    ) {

        super(`Run of '${orchestrator}' aborted: ${cause.message}`);

    }

}


/**
 * `run()` or `register()` called while a run is in progress.
 */
export class OrchestratorBusyError extends Error {

    override readonly name = 'OrchestratorBusyError' as const;

    constructor(
        public readonly orchestrator: string,
        public readonly operation: 'run' | 'register',
    ) {

        super(`Orchestrator '${orchestrator}' is running: ${operation}() is not allowed until the run finishes`);

    }

}


/**
 * Version cursor asked to move somewhere it cannot go.
 */
export class VersionStateError extends Error {

    override readonly name = 'VersionStateError' as const;

    constructor(
        public readonly current: number,
        public readonly requested: number,
        reason: string,
    ) {

        super(`Cannot move version from ${current} to ${requested}: ${reason}`);

    }

}
