/**
 * Environment variable configuration.
 *
 * Config properties can be overridden via PATCHWORK_* environment variables.
 * Uses makeNestedConfig to transform flat env vars into the nested config
 * shape. The underscore separator maps directly to object nesting.
 *
 * @example
 * ```bash
 * PATCHWORK_NAME=settings
 * PATCHWORK_BASELINE=3
 * PATCHWORK_STRICT=false
 * PATCHWORK_LOGGING_ENABLED=true
 * PATCHWORK_LOGGING_LEVEL=verbose
 * PATCHWORK_LOGGING_FORMAT=json
 * PATCHWORK_LOGGING_FILE=./patchwork.log
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import type { PatchworkConfigInput } from './schema.js'


/**
 * Meta env vars that control runtime behavior, not config values.
 */
const META_ENV_VARS = new Set([
    'PATCHWORK_DEBUG',     // Observer spy
    'PATCHWORK_HEADLESS',  // Force CI output
])


/**
 * Read config values from environment variables.
 *
 * Numbers and booleans are converted; names and file paths stay strings.
 *
 * @example
 * ```typescript
 * // PATCHWORK_BASELINE=3
 * // PATCHWORK_LOGGING_LEVEL=warn
 *
 * const envConfig = getEnvConfig()
 * // { baseline: 3, logging: { level: 'warn' } }
 * ```
 */
export function getEnvConfig(): PatchworkConfigInput {

    const { allConfigs } = makeNestedConfig<PatchworkConfigInput>(
        process.env as Record<string, string>,
        {
            filter: (key) => key.startsWith('PATCHWORK_') && !META_ENV_VARS.has(key),
            stripPrefix: 'PATCHWORK_',
            forceAllCapToLower: true,
            skipConversion: (key) => {

                const lower = key.toLowerCase()
                return lower.endsWith('name') || lower.endsWith('file')
            },
        }
    )

    return allConfigs()
}
