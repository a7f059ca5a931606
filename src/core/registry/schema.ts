/**
 * Zod schemas for registry input.
 */
import { z } from 'zod';

/**
 * Patch and dependency versions: positive safe integers.
 */
export const VersionSchema = z
    .number()
    .int('must be an integer')
    .positive('must be positive')
    .max(Number.MAX_SAFE_INTEGER, 'must be a safe integer');

/**
 * Check a version, returning the first issue message on failure.
 */
export function checkVersion(value: number): string | null {

    const result = VersionSchema.safeParse(value);

    if (result.success) {

        return null;

    }

    return result.error.issues[0]?.message ?? 'must be a positive integer';

}
