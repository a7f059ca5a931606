/**
 * Patch orchestrator.
 *
 * Drives a registry of patches from the current version forward. A run
 * is a single ascending pass: each candidate either applies, is skipped
 * because a dependency has not been applied earlier in the same run, or
 * fails. A failure reverts everything the run applied, newest first, and
 * restores the version the run started from.
 *
 * Skipped patches are not retried within the run. A patch whose
 * dependency has a higher version, or sits in a cycle, never applies.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ initialVersion: 0 })
 *
 * orchestrator.register({ version: 1, apply: addColumn, rollback: dropColumn })
 * orchestrator.register({ version: 2, apply: backfill, dependencies: [1] })
 *
 * const result = orchestrator.run()
 *
 * if (result.status === 'rolled-back') {
 *     console.error(result.error.message)
 * }
 * ```
 */
import { observer as sharedObserver, type PatchworkObserver } from '../observer.js';
import { PatchRegistry } from '../registry/registry.js';
import type { Patch, PatchDefinition } from '../registry/types.js';
import { VersionState } from './state.js';
import {
    OrchestratorBusyError,
    PatchApplyError,
    RollbackError,
    RunAbortedError,
    toError,
} from './errors.js';
import type {
    OrchestratorOptions,
    OrchestratorState,
    RollbackReport,
    RunPlan,
    RunResult,
    RunSucceeded,
    SkippedPatch,
    VersionStatus,
} from './types.js';


export class Orchestrator {

    readonly #name: string;
    readonly #observer: PatchworkObserver;
    readonly #registry: PatchRegistry;
    readonly #version: VersionState;

    #state: OrchestratorState = 'idle';
    #applied: Patch[] = [];

    constructor(options: OrchestratorOptions = {}) {

        this.#name = options.name ?? 'default';
        this.#observer = options.observer ?? sharedObserver;
        this.#version = new VersionState(options.initialVersion ?? 0);
        this.#registry = new PatchRegistry({
            name: this.#name,
            strictDependencies: options.strictDependencies,
            observer: this.#observer,
        });

    }

    get name(): string {

        return this.#name;

    }

    get state(): OrchestratorState {

        return this.#state;

    }

    get registry(): PatchRegistry {

        return this.#registry;

    }

    /**
     * Current version of the target system. Valid in any state.
     */
    currentVersion(): number {

        return this.#version.current;

    }

    /**
     * Versions applied so far in the current (or last successful) run.
     */
    appliedVersions(): number[] {

        return this.#applied.map((patch) => patch.version);

    }

    /**
     * Register a patch.
     *
     * @throws OrchestratorBusyError if a run is in progress
     * @throws RegistrationError subclasses, see PatchRegistry.register
     */
    register(definition: PatchDefinition): Patch {

        if (this.#state === 'running') {

            throw new OrchestratorBusyError(this.#name, 'register');

        }

        return this.#registry.register(definition);

    }

    /**
     * Register a patch and run immediately.
     */
    patch(definition: PatchDefinition): RunResult {

        this.register(definition);

        return this.run();

    }

    /**
     * Apply every eligible patch above the current version.
     *
     * Never throws for patch failures: a failed apply is reported as a
     * `rolled-back` result.
     *
     * @throws OrchestratorBusyError if a run is already in progress
     * @throws RunAbortedError if host code (an event listener) throws mid-run
     */
    run(): RunResult {

        if (this.#state === 'running') {

            throw new OrchestratorBusyError(this.#name, 'run');

        }

        const start = performance.now();
        const baseline = this.#version.current;

        this.#state = 'running';
        this.#applied = [];

        try {

            return this.#pass(baseline, start);

        }
        catch (err) {

            throw this.#abort(baseline, toError(err));

        }

    }

    /**
     * Run, throwing the apply failure instead of returning it.
     *
     * @throws PatchApplyError carrying the rollback report
     * @throws OrchestratorBusyError if a run is already in progress
     */
    runOrThrow(): RunSucceeded {

        const result = this.run();

        if (result.status === 'rolled-back') {

            throw result.error;

        }

        return result;

    }

    /**
     * Dry run.
     *
     * Walks the same pass as `run()` assuming every apply succeeds.
     * Invokes nothing and changes nothing.
     */
    plan(): RunPlan {

        const baseline = this.#version.current;
        const landed = new Set<number>();
        const apply: number[] = [];
        const skip: SkippedPatch[] = [];

        for (const version of this.#registry.sortedVersions()) {

            if (version <= baseline) {

                continue;

            }

            const missing = this.#missingDependencies(version, landed);

            if (missing.length > 0) {

                skip.push({ version, missing });
                continue;

            }

            apply.push(version);
            landed.add(version);

        }

        return {
            baseline,
            target: apply.at(-1) ?? baseline,
            apply,
            skip,
        };

    }

    /**
     * Where the target system stands against the registry.
     */
    status(): VersionStatus {

        const current = this.#version.current;
        const pending = this.#registry
            .sortedVersions()
            .filter((version) => version > current);

        return {
            current,
            latest: this.#registry.highestVersion,
            pending,
            needsMigration: pending.length > 0,
        };

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    #pass(baseline: number, start: number): RunResult {

        const candidates = this.#registry
            .patches()
            .filter((patch) => patch.version > baseline);

        this.#observer.emit('run:start', {
            name: this.#name,
            baseline,
            candidates: candidates.map((patch) => patch.version),
        });

        const landed = new Set<number>();
        const skipped: SkippedPatch[] = [];

        for (const patch of candidates) {

            const { version } = patch;
            const missing = this.#missingDependencies(version, landed);

            if (missing.length > 0) {

                skipped.push({ version, missing });

                this.#observer.emit('patch:skip', {
                    name: this.#name,
                    version,
                    missing,
                });

                continue;

            }

            const error = this.#apply(patch);

            if (error) {

                return this.#rollback(version, error, baseline, skipped, start);

            }

            landed.add(version);

        }

        const applied = this.appliedVersions();
        const durationMs = performance.now() - start;

        this.#state = 'succeeded';

        this.#observer.emit('run:complete', {
            name: this.#name,
            baseline,
            version: this.#version.current,
            applied: [...applied],
            skipped: skipped.map((entry) => entry.version),
            durationMs,
        });

        return {
            status: 'succeeded',
            name: this.#name,
            baseline,
            version: this.#version.current,
            applied,
            skipped,
            durationMs,
        };

    }

    #missingDependencies(version: number, landed: ReadonlySet<number>): number[] {

        const dependencies = this.#registry.dependenciesOf(version);

        if (dependencies.size === 0) {

            return [];

        }

        return [...dependencies]
            .filter((dependency) => !landed.has(dependency))
            .sort((a, b) => a - b);

    }

    /**
     * Apply one patch. Returns the failure, or null on success.
     *
     * Any thrown value is a failure, falsy ones included.
     */
    #apply(patch: Patch): Error | null {

        const { version } = patch;

        this.#observer.emit('patch:before', {
            name: this.#name,
            version,
            description: patch.description ?? undefined,
        });

        const start = performance.now();
        let failure: Error | null = null;

        try {

            patch.apply();

        }
        catch (err) {

            failure = toError(err);

        }

        if (failure) {

            this.#observer.emit('patch:failed', {
                name: this.#name,
                version,
                error: failure,
            });

            return failure;

        }

        this.#applied.push(patch);
        this.#version.advanceTo(version);

        this.#observer.emit('patch:applied', {
            name: this.#name,
            version,
            durationMs: performance.now() - start,
        });

        return null;

    }

    /**
     * Revert everything applied this run and report the original failure.
     *
     * Every applied version gets exactly one attempt, newest first,
     * whether or not earlier attempts failed.
     */
    #rollback(
        failedVersion: number,
        cause: Error,
        baseline: number,
        skipped: SkippedPatch[],
        start: number,
    ): RunResult {

        this.#observer.emit('rollback:start', {
            name: this.#name,
            failedVersion,
            versions: this.appliedVersions().reverse(),
        });

        const rollbacks = this.#revertApplied((report) => {

            this.#observer.emit('rollback:patch', { name: this.#name, ...report });

        });

        this.#version.reset(baseline);
        this.#state = 'rolled-back';

        this.#observer.emit('rollback:complete', {
            name: this.#name,
            reverted: rollbacks.filter((report) => report.status === 'reverted').length,
            failed: rollbacks.filter((report) => report.status === 'failed').length,
            skipped: rollbacks.filter((report) => report.status === 'skipped').length,
        });

        const error = new PatchApplyError(failedVersion, cause, rollbacks);
        const durationMs = performance.now() - start;

        this.#observer.emit('error', {
            source: 'orchestrator',
            error,
            context: { name: this.#name, version: failedVersion },
        });

        this.#observer.emit('run:rolled-back', {
            name: this.#name,
            baseline,
            failedVersion,
            durationMs,
        });

        return {
            status: 'rolled-back',
            name: this.#name,
            baseline,
            version: baseline,
            failedVersion,
            error,
            rollbacks,
            skipped,
            durationMs,
        };

    }

    /**
     * Leave a run that host code broke off.
     *
     * Reverts whatever the run still holds and restores the baseline.
     * Emits nothing: the listener that threw may throw again.
     */
    #abort(baseline: number, cause: Error): RunAbortedError {

        const rollbacks = this.#revertApplied();

        this.#version.reset(baseline);
        this.#state = 'rolled-back';

        return new RunAbortedError(this.#name, cause, rollbacks);

    }

    /**
     * Pop and revert applied patches, newest first.
     *
     * Popping before each attempt means an interrupted sequence can be
     * resumed without reverting any patch twice.
     */
    #revertApplied(onReport?: (report: RollbackReport) => void): RollbackReport[] {

        const rollbacks: RollbackReport[] = [];
        let patch = this.#applied.pop();

        while (patch) {

            const report = this.#revert(patch);

            rollbacks.push(report);
            onReport?.(report);

            patch = this.#applied.pop();

        }

        return rollbacks;

    }

    #revert(patch: Patch): RollbackReport {

        const { version, rollback } = patch;

        if (!rollback) {

            return { version, status: 'skipped' };

        }

        let failure: Error | null = null;

        try {

            rollback();

        }
        catch (err) {

            failure = toError(err);

        }

        if (failure) {

            return { version, status: 'failed', error: new RollbackError(version, failure) };

        }

        return { version, status: 'reverted' };

    }

}
