/**
 * Config Zod schemas and validation.
 *
 * Validated once at resolution so an orchestrator is never built
 * from an invalid configuration.
 */
import { z } from 'zod';

import { BaselineSchema } from '../orchestrator/state.js';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Log output format.
 */
export const LogFormatSchema = z.enum(['line', 'json']);

/**
 * Logging section.
 */
export const LoggingSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),
    format: LogFormatSchema.default('line'),
    file: z.string().min(1, 'Log file path cannot be empty').optional(),
});

// ─────────────────────────────────────────────────────────────
// Config Schema
// ─────────────────────────────────────────────────────────────

/**
 * Complete config with defaults applied.
 */
export const PatchworkConfigSchema = z.object({
    name: z.string().min(1, 'Name is required').default('default'),
    baseline: BaselineSchema.default(0),
    strict: z.boolean().default(true),
    logging: LoggingSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type PatchworkConfig = z.infer<typeof PatchworkConfigSchema>;
export type PatchworkConfigInput = z.input<typeof PatchworkConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class ConfigValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'ConfigValidationError';

    }

}

/**
 * Parse and validate config, returning defaults for missing fields.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({ baseline: 3 })
 * // config.strict === true (default)
 * // config.logging.level === 'info' (default)
 * ```
 */
export function parseConfig(config: unknown): PatchworkConfig {

    const result = PatchworkConfigSchema.safeParse(config);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
