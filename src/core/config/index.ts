/**
 * Config module - configuration for patchwork.
 *
 * Handles validation and merging of defaults, environment
 * variables, and explicit overrides.
 */

// Schema & Validation
export {
    PatchworkConfigSchema,
    LoggingSchema,
    LogLevelSchema,
    LogFormatSchema,
    ConfigValidationError,
    parseConfig,
    type PatchworkConfig,
    type PatchworkConfigInput,
    type LoggingConfig,
} from './schema.js';

// Resolver
export { resolveConfig } from './resolver.js';

// Environment variables
export { getEnvConfig } from './env.js';
