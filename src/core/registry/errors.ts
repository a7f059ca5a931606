/**
 * Registration errors.
 *
 * All three share a base class and a `kind` discriminator so callers
 * can branch on the category without matching messages.
 */


export type RegistrationErrorKind = 'invalid-version' | 'invalid-apply' | 'unknown-dependency'


/**
 * Base class for every error raised by `PatchRegistry.register()`.
 *
 * The registry is unchanged whenever one of these is thrown.
 *
 * @example
 * ```typescript
 * const [, err] = attemptSync(() => registry.register(definition))
 * if (err instanceof RegistrationError) {
 *     console.log(err.kind, err.version)
 * }
 * ```
 */
export abstract class RegistrationError extends Error {

    abstract readonly kind: RegistrationErrorKind

    constructor(
        public readonly version: number,
        message: string,
    ) {

        super(message)
    }
}


/**
 * Version is not a positive integer, or not above the highest registered version.
 */
export class InvalidVersionError extends RegistrationError {

    override readonly name = 'InvalidVersionError' as const
    override readonly kind = 'invalid-version' as const

    constructor(
        version: number,
        public readonly highest: number,
        public readonly reason: string,
    ) {

        super(version, `Invalid patch version ${version}: ${reason}`)
    }
}


/**
 * Apply (or a supplied rollback) is not callable.
 */
export class InvalidApplyError extends RegistrationError {

    override readonly name = 'InvalidApplyError' as const
    override readonly kind = 'invalid-apply' as const

    constructor(
        version: number,
        public readonly field: 'apply' | 'rollback',
    ) {

        super(version, `Patch ${version}: ${field} must be a function`)
    }
}


/**
 * Dependency does not name a registered version.
 */
export class UnknownDependencyError extends RegistrationError {

    override readonly name = 'UnknownDependencyError' as const
    override readonly kind = 'unknown-dependency' as const

    constructor(
        version: number,
        public readonly dependency: number,
    ) {

        super(version, `Patch ${version} depends on unregistered version ${dependency}`)
    }
}
