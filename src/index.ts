/**
 * patchwork
 *
 * Versioned patch orchestration: ordered apply, dependency gating,
 * and reverse-order rollback on failure.
 */
export * from './core/index.js';
export {
    createPatchwork,
    createOrchestrator,
    type CreatePatchworkOptions,
    type PatchworkContext,
} from './sdk/index.js';
