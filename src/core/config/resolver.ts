/**
 * Config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Schema defaults
 */
import { merge, clone } from '@logosdx/utils'

import { getEnvConfig } from './env.js'
import { parseConfig, type PatchworkConfig, type PatchworkConfigInput } from './schema.js'


/**
 * Resolve the effective config.
 *
 * @throws ConfigValidationError if the merged config is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ name: 'save-data', baseline: 4 })
 * const orchestrator = createOrchestrator(config)
 * ```
 */
export function resolveConfig(overrides: PatchworkConfigInput = {}): PatchworkConfig {

    const merged = merge(clone(getEnvConfig()), overrides)

    return parseConfig(merged)
}
