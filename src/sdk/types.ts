/**
 * SDK types.
 */
import type { Writable } from 'node:stream';

import type { PatchworkConfig, PatchworkConfigInput } from '../core/config/index.js';
import type { Logger } from '../core/logger/index.js';
import type { PatchworkObserver } from '../core/observer.js';
import type { Orchestrator } from '../core/orchestrator/index.js';


/**
 * Options for createPatchwork().
 */
export interface CreatePatchworkOptions {

    /**
     * Config overrides.
     *
     * Merged over `PATCHWORK_*` environment variables and schema defaults.
     */
    config?: PatchworkConfigInput;

    /** Observer shared by the orchestrator and logger */
    observer?: PatchworkObserver;

    /** Console stream for the logger */
    console?: Writable;
}


/**
 * A configured orchestrator with its logger.
 */
export interface PatchworkContext {

    /** Resolved config */
    readonly config: PatchworkConfig;

    readonly orchestrator: Orchestrator;

    /** Running logger, or null when logging is disabled */
    readonly logger: Logger | null;

    /** Stop the logger and close its file stream */
    close(): Promise<void>;
}
