/**
 * Orchestrator types.
 *
 * A run is one forward pass over the registered patches. Its outcome
 * is reported as a discriminated union on `status` rather than thrown,
 * so callers always receive the rollback report alongside the failure.
 */
import type { PatchworkObserver, RollbackStatus } from '../observer.js';
import type { PatchApplyError, RollbackError } from './errors.js';


/**
 * Orchestrator lifecycle states.
 *
 * - `idle`: No run yet
 * - `running`: A run is in progress
 * - `succeeded`: Last run finished without a failed apply
 * - `rolled-back`: Last run hit a failed apply and reverted
 */
export type OrchestratorState = 'idle' | 'running' | 'succeeded' | 'rolled-back';


/**
 * Options for Orchestrator.
 */
export interface OrchestratorOptions {

    /** Name carried on every event. @default 'default' */
    name?: string;

    /** Version the target system is at before any run. @default 0 */
    initialVersion?: number;

    /** Forwarded to the registry. @default true */
    strictDependencies?: boolean;

    /** Observer to emit on. Defaults to the shared instance. */
    observer?: PatchworkObserver;
}


/**
 * A candidate passed over because a dependency had not been applied earlier in the run.
 */
export interface SkippedPatch {
    version: number;

    /** Dependencies absent from the applied set, ascending */
    missing: number[];
}


/**
 * Result of one rollback attempt.
 */
export interface RollbackReport {
    version: number;
    status: RollbackStatus;

    /** Present when status is 'failed' */
    error?: RollbackError;
}


interface RunResultBase {

    /** Orchestrator name */
    name: string;

    /** Version at the start of the run */
    baseline: number;

    /** Version at the end of the run */
    version: number;

    /** Candidates passed over for unmet dependencies */
    skipped: SkippedPatch[];

    durationMs: number;
}


/**
 * Every eligible patch applied.
 *
 * `version` is the highest version applied this run, or the baseline
 * when nothing applied. It can sit below the highest registered version
 * when candidates were skipped.
 */
export interface RunSucceeded extends RunResultBase {
    status: 'succeeded';

    /** Versions applied this run, in order */
    applied: number[];
}


/**
 * An apply failed; everything applied this run was rolled back.
 *
 * `version` always equals `baseline`.
 */
export interface RunRolledBack extends RunResultBase {
    status: 'rolled-back';

    failedVersion: number;

    /** The original apply failure */
    error: PatchApplyError;

    /** One entry per version applied before the failure, most recent first */
    rollbacks: RollbackReport[];
}


export type RunResult = RunSucceeded | RunRolledBack;


/**
 * Dry-run outcome from `plan()`, assuming every apply succeeds.
 */
export interface RunPlan {
    baseline: number;

    /** Version the run would reach */
    target: number;

    /** Versions that would apply, in order */
    apply: number[];

    /** Versions that would be skipped */
    skip: SkippedPatch[];
}


/**
 * Snapshot of where the target system stands against the registry.
 */
export interface VersionStatus {

    /** Current version */
    current: number;

    /** Highest registered version, 0 when empty */
    latest: number;

    /** Registered versions above current, ascending */
    pending: number[];

    /** Whether a run has anything to consider */
    needsMigration: boolean;
}
