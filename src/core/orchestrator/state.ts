/**
 * Version cursor.
 *
 * Holds the single "current version" of the target system. Only the
 * owning orchestrator mutates it: forward on a successful apply,
 * back to the run baseline on rollback.
 */
import { z } from 'zod';

import { VersionStateError } from './errors.js';


/**
 * Starting versions: non-negative safe integers.
 */
export const BaselineSchema = z
    .number()
    .int('must be an integer')
    .nonnegative('must not be negative')
    .max(Number.MAX_SAFE_INTEGER, 'must be a safe integer');


export class VersionState {

    #current: number;

    constructor(initial = 0) {

        const result = BaselineSchema.safeParse(initial);

        if (!result.success) {

            throw new VersionStateError(0, initial, result.error.issues[0]?.message ?? 'invalid version');

        }

        this.#current = initial;

    }

    get current(): number {

        return this.#current;

    }

    /**
     * Move forward to a higher version.
     *
     * @throws VersionStateError if version is not above current
     */
    advanceTo(version: number): void {

        if (version <= this.#current) {

            throw new VersionStateError(this.#current, version, 'versions only move forward');

        }

        this.#current = version;

    }

    /**
     * Restore a run baseline.
     */
    reset(baseline: number): void {

        this.#current = baseline;

    }

}
