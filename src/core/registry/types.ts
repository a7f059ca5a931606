/**
 * Patch registry types.
 *
 * A patch is one versioned unit of migration work. Versions are plain
 * integers and double as the patch identity.
 */
import type { PatchworkObserver } from '../observer.js';


/**
 * Zero-argument unit of work. Signals failure by throwing; any thrown
 * value counts, and non-Error values are wrapped in an Error.
 */
export type PatchOperation = () => void;


/**
 * Patch as supplied by the caller.
 *
 * @example
 * ```typescript
 * const definition: PatchDefinition = {
 *     version: 2,
 *     description: 'Rename theme field',
 *     dependencies: [1],
 *     apply() {
 *         settings.appearance = settings.theme
 *         delete settings.theme
 *     },
 *     rollback() {
 *         settings.theme = settings.appearance
 *         delete settings.appearance
 *     },
 * }
 * ```
 */
export interface PatchDefinition {

    /** Unique positive version, above every version already registered */
    version: number;

    /** Apply the patch */
    apply: PatchOperation;

    /** Undo `apply`. Best effort. */
    rollback?: PatchOperation;

    /** Versions that must be applied earlier in the same run */
    dependencies?: Iterable<number>;

    /** Human-readable label */
    description?: string;
}


/**
 * Patch as stored by the registry.
 */
export interface Patch {
    readonly version: number;
    readonly apply: PatchOperation;
    readonly rollback: PatchOperation | null;
    readonly dependencies: ReadonlySet<number>;
    readonly description: string | null;
}


/**
 * Options for PatchRegistry.
 */
export interface RegistryOptions {

    /** Name carried on emitted events */
    name?: string;

    /**
     * Require every dependency to be registered before the dependent patch.
     *
     * When false, any positive integer is accepted, which makes forward
     * and cyclic declarations possible. Such patches are skipped at run time.
     * @default true
     */
    strictDependencies?: boolean;

    /** Observer to emit on. Defaults to the shared instance. */
    observer?: PatchworkObserver;
}
