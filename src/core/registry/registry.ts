/**
 * Patch registry.
 *
 * Catalog of known patches keyed by version. Registration order must
 * follow version order: every new version sits above the highest one
 * ever accepted. A dependency index is maintained alongside the catalog
 * so gating during a run is a constant-time lookup per patch.
 *
 * @example
 * ```typescript
 * const registry = new PatchRegistry()
 *
 * registry.register({ version: 1, apply: createTables })
 * registry.register({ version: 2, apply: seedDefaults, dependencies: [1] })
 *
 * registry.sortedVersions() // [1, 2]
 * ```
 */
import { observer as sharedObserver, type PatchworkObserver } from '../observer.js';
import { checkVersion } from './schema.js';
import {
    InvalidApplyError,
    InvalidVersionError,
    UnknownDependencyError,
} from './errors.js';
import type { Patch, PatchDefinition, RegistryOptions } from './types.js';


const EMPTY_DEPENDENCIES: ReadonlySet<number> = new Set();


export class PatchRegistry {

    readonly #name: string;
    readonly #strict: boolean;
    readonly #observer: PatchworkObserver;

    #patches = new Map<number, Patch>();
    #dependencyIndex = new Map<number, ReadonlySet<number>>();
    #ordered: Patch[] = [];
    #highest = 0;

    constructor(options: RegistryOptions = {}) {

        this.#name = options.name ?? 'default';
        this.#strict = options.strictDependencies ?? true;
        this.#observer = options.observer ?? sharedObserver;

    }

    /**
     * Highest version ever registered, 0 when empty.
     */
    get highestVersion(): number {

        return this.#highest;

    }

    /**
     * Number of registered patches.
     */
    get size(): number {

        return this.#patches.size;

    }

    /**
     * Whether dependencies must already be registered.
     */
    get strictDependencies(): boolean {

        return this.#strict;

    }

    /**
     * Register a patch.
     *
     * Validation runs before any mutation, so a rejected patch leaves
     * the registry exactly as it was.
     *
     * @throws InvalidVersionError if the version is not a positive integer above the highest registered
     * @throws InvalidApplyError if apply or rollback is not a function
     * @throws UnknownDependencyError if a dependency is not registered (strict mode)
     */
    register(definition: PatchDefinition): Patch {

        const { version } = definition;

        const versionIssue = checkVersion(version);

        if (versionIssue) {

            throw new InvalidVersionError(version, this.#highest, versionIssue);

        }

        if (this.#patches.has(version)) {

            throw new InvalidVersionError(version, this.#highest, 'already registered');

        }

        if (version <= this.#highest) {

            throw new InvalidVersionError(
                version,
                this.#highest,
                `must be greater than ${this.#highest}`,
            );

        }

        if (typeof definition.apply !== 'function') {

            throw new InvalidApplyError(version, 'apply');

        }

        if (definition.rollback !== undefined && typeof definition.rollback !== 'function') {

            throw new InvalidApplyError(version, 'rollback');

        }

        const dependencies = this.#collectDependencies(version, definition.dependencies);

        const patch: Patch = {
            version,
            apply: definition.apply,
            rollback: definition.rollback ?? null,
            dependencies,
            description: definition.description ?? null,
        };

        this.#patches.set(version, patch);
        this.#dependencyIndex.set(version, dependencies);
        this.#ordered.push(patch);
        this.#highest = version;

        this.#observer.emit('patch:registered', {
            name: this.#name,
            version,
            description: definition.description,
            dependencies: [...dependencies],
        });

        return patch;

    }

    /**
     * Registered versions in ascending order.
     *
     * Returns a fresh array on every call.
     */
    sortedVersions(): number[] {

        return this.#ordered.map((patch) => patch.version);

    }

    /**
     * Registered patches in ascending version order.
     */
    patches(): Patch[] {

        // Registration is monotonic, so insertion order is already ascending
        return [...this.#ordered];

    }

    get(version: number): Patch | undefined {

        return this.#patches.get(version);

    }

    has(version: number): boolean {

        return this.#patches.has(version);

    }

    /**
     * Dependencies declared by a version. Empty for unknown versions.
     */
    dependenciesOf(version: number): ReadonlySet<number> {

        return this.#dependencyIndex.get(version) ?? EMPTY_DEPENDENCIES;

    }

    #collectDependencies(
        version: number,
        declared: Iterable<number> | undefined,
    ): ReadonlySet<number> {

        if (!declared) {

            return EMPTY_DEPENDENCIES;

        }

        const dependencies = new Set<number>();

        for (const dependency of declared) {

            if (checkVersion(dependency)) {

                throw new UnknownDependencyError(version, dependency);

            }

            if (this.#strict && !this.#patches.has(dependency)) {

                throw new UnknownDependencyError(version, dependency);

            }

            dependencies.add(dependency);

        }

        return dependencies;

    }

}
