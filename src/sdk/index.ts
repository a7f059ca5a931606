/**
 * patchwork SDK
 *
 * Builds a configured orchestrator with logging wired to its observer.
 *
 * @example
 * ```typescript
 * import { createPatchwork } from 'patchwork'
 *
 * const ctx = await createPatchwork({ config: { name: 'save-data', baseline: 2 } })
 *
 * ctx.orchestrator.register({ version: 3, apply: addInventorySlots })
 * const result = ctx.orchestrator.run()
 *
 * await ctx.close()
 * ```
 */
import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Writable } from 'node:stream';

import { attempt } from '@logosdx/utils';

import { resolveConfig, type PatchworkConfig } from '../core/config/index.js';
import { Logger } from '../core/logger/index.js';
import { observer as sharedObserver, type PatchworkObserver } from '../core/observer.js';
import { Orchestrator } from '../core/orchestrator/index.js';
import type { CreatePatchworkOptions, PatchworkContext } from './types.js';

// ─────────────────────────────────────────────────────────────
// Factory Functions
// ─────────────────────────────────────────────────────────────

/**
 * Build an orchestrator from a resolved config.
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator(resolveConfig({ baseline: 4 }))
 * orchestrator.currentVersion() // 4
 * ```
 */
export function createOrchestrator(
    config: PatchworkConfig,
    observer: PatchworkObserver = sharedObserver,
): Orchestrator {

    return new Orchestrator({
        name: config.name,
        initialVersion: config.baseline,
        strictDependencies: config.strict,
        observer,
    });

}

/**
 * Resolve config, build the orchestrator, and start logging.
 *
 * When `logging.file` is set the log is appended to that path. A file
 * that cannot be opened, or that fails later, is reported on the
 * observer's `error` event and logging continues on the console stream only.
 *
 * @throws ConfigValidationError if the resolved config is invalid
 */
export async function createPatchwork(
    options: CreatePatchworkOptions = {},
): Promise<PatchworkContext> {

    const config = resolveConfig(options.config);
    const observer = options.observer ?? sharedObserver;
    const orchestrator = createOrchestrator(config, observer);

    let logger: Logger | null = null;

    if (config.logging.enabled && config.logging.level !== 'silent') {

        const file = config.logging.file
            ? await openLogFile(config.logging.file, observer)
            : undefined;

        logger = new Logger({
            config: {
                enabled: config.logging.enabled,
                level: config.logging.level,
                format: config.logging.format,
            },
            context: { name: config.name },
            console: options.console,
            file,
            observer,
        });

        logger.start();

    }

    return {
        config,
        orchestrator,
        logger,
        async close() {

            if (logger) {

                await logger.stop();

            }

        },
    };

}

/**
 * Open a log file for appending, creating its directory.
 *
 * Resolves only once the file is open, so a bad path never surfaces
 * as an unhandled stream error.
 */
async function openLogFile(
    path: string,
    observer: PatchworkObserver,
): Promise<Writable | undefined> {

    const filePath = resolve(path);
    const [, mkdirErr] = await attempt(() => mkdir(dirname(filePath), { recursive: true }));

    if (mkdirErr) {

        observer.emit('error', {
            source: 'logger',
            error: mkdirErr,
            context: { file: filePath },
        });

        return undefined;

    }

    const stream = createWriteStream(filePath, { flags: 'a' });
    const [, openErr] = await attempt(() => once(stream, 'open'));

    if (openErr) {

        observer.emit('error', {
            source: 'logger',
            error: openErr,
            context: { file: filePath },
        });

        return undefined;

    }

    return stream;

}

export type { CreatePatchworkOptions, PatchworkContext } from './types.js';
