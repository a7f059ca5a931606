/**
 * Registry Module.
 *
 * Catalog of versioned patches and their dependencies.
 */
export { PatchRegistry } from './registry.js';
export { VersionSchema, checkVersion } from './schema.js';
export {
    RegistrationError,
    InvalidVersionError,
    InvalidApplyError,
    UnknownDependencyError,
    type RegistrationErrorKind,
} from './errors.js';
export type {
    Patch,
    PatchDefinition,
    PatchOperation,
    RegistryOptions,
} from './types.js';
