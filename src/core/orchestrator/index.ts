/**
 * Orchestrator Module.
 *
 * Ordering, dependency gating, and the apply/rollback state machine.
 */
export { Orchestrator } from './orchestrator.js';
export { VersionState, BaselineSchema } from './state.js';
export {
    PatchApplyError,
    RollbackError,
    RunAbortedError,
    OrchestratorBusyError,
    VersionStateError,
    toError,
} from './errors.js';
export type {
    OrchestratorOptions,
    OrchestratorState,
    SkippedPatch,
    RollbackReport,
    RunResult,
    RunSucceeded,
    RunRolledBack,
    RunPlan,
    VersionStatus,
} from './types.js';
