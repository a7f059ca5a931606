/**
 * Tests for the patch registry.
 */
import { describe, it, expect, beforeEach } from 'vitest'

import { createObserver, type PatchworkObserver } from '../../../src/core/observer.js'
import {
    PatchRegistry,
    InvalidVersionError,
    InvalidApplyError,
    UnknownDependencyError,
    RegistrationError,
    type PatchDefinition,
} from '../../../src/core/registry/index.js'


const noop = (): void => {}


describe('registry: PatchRegistry', () => {

    let observer: PatchworkObserver
    let registry: PatchRegistry

    beforeEach(() => {

        observer = createObserver('registry-test')
        registry = new PatchRegistry({ observer })
    })

    describe('register', () => {

        it('should store patches with defaults for optional fields', () => {

            const patch = registry.register({ version: 1, apply: noop })

            expect(patch.version).toBe(1)
            expect(patch.rollback).toBeNull()
            expect(patch.description).toBeNull()
            expect(patch.dependencies.size).toBe(0)
            expect(registry.has(1)).toBe(true)
            expect(registry.get(1)).toBe(patch)
            expect(registry.size).toBe(1)
        })

        it('should track the highest registered version', () => {

            expect(registry.highestVersion).toBe(0)

            registry.register({ version: 2, apply: noop })
            registry.register({ version: 7, apply: noop })

            expect(registry.highestVersion).toBe(7)
        })

        it('should collapse duplicate dependencies', () => {

            registry.register({ version: 1, apply: noop })
            registry.register({ version: 2, apply: noop, dependencies: [1, 1] })

            expect([...registry.dependenciesOf(2)]).toEqual([1])
        })

        it('should accept any iterable of dependencies', () => {

            registry.register({ version: 1, apply: noop })
            registry.register({ version: 2, apply: noop })
            registry.register({ version: 3, apply: noop, dependencies: new Set([1, 2]) })

            expect([...registry.dependenciesOf(3)]).toEqual([1, 2])
        })

        it('should return an empty dependency set for unknown versions', () => {

            expect(registry.dependenciesOf(42).size).toBe(0)
        })

        it('should emit patch:registered', () => {

            const events: unknown[] = []
            observer.on('patch:registered', (data) => events.push(data))

            registry.register({ version: 1, apply: noop })
            registry.register({ version: 2, apply: noop, dependencies: [1], description: 'Add inventory' })

            expect(events).toEqual([
                { name: 'default', version: 1, description: undefined, dependencies: [] },
                { name: 'default', version: 2, description: 'Add inventory', dependencies: [1] },
            ])
        })
    })

    describe('sortedVersions', () => {

        it('should return versions in ascending order', () => {

            registry.register({ version: 1, apply: noop })
            registry.register({ version: 4, apply: noop })
            registry.register({ version: 10, apply: noop })

            expect(registry.sortedVersions()).toEqual([1, 4, 10])
        })

        it('should return a fresh array on every call', () => {

            registry.register({ version: 1, apply: noop })

            const first = registry.sortedVersions()
            first.push(99)

            expect(registry.sortedVersions()).toEqual([1])
        })

        it('should be empty for an empty registry', () => {

            expect(registry.sortedVersions()).toEqual([])
        })
    })

    describe('patches', () => {

        it('should return the stored patches in ascending order', () => {

            const first = registry.register({ version: 2, apply: noop })
            const second = registry.register({ version: 5, apply: noop, dependencies: [2] })

            const patches = registry.patches()

            expect(patches).toEqual([first, second])

            patches.pop()

            expect(registry.patches()).toHaveLength(2)
        })
    })

    describe('invalid versions', () => {

        it('should reject a duplicate version', () => {

            registry.register({ version: 1, apply: noop })

            let caught: unknown = null

            try {

                registry.register({ version: 1, apply: noop })
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(InvalidVersionError)
            expect(caught).toBeInstanceOf(RegistrationError)
            expect(caught).toMatchObject({
                kind: 'invalid-version',
                version: 1,
                highest: 1,
                reason: 'already registered',
            })
        })

        it('should reject a version below the highest registered', () => {

            registry.register({ version: 5, apply: noop })

            expect(() => registry.register({ version: 3, apply: noop })).toThrow(
                'Invalid patch version 3: must be greater than 5',
            )
        })

        it('should reject zero and negative versions', () => {

            expect(() => registry.register({ version: 0, apply: noop })).toThrow(
                'Invalid patch version 0: must be positive',
            )
            expect(() => registry.register({ version: -2, apply: noop })).toThrow(
                'Invalid patch version -2: must be positive',
            )
        })

        it('should reject fractional versions', () => {

            expect(() => registry.register({ version: 1.5, apply: noop })).toThrow(
                'Invalid patch version 1.5: must be an integer',
            )
        })

        it('should reject NaN', () => {

            expect(() => registry.register({ version: Number.NaN, apply: noop })).toThrow(InvalidVersionError)
        })
    })

    describe('invalid operations', () => {

        it('should reject a non-function apply', () => {

            const definition = { version: 1, apply: 'not callable' } as unknown as PatchDefinition

            expect(() => registry.register(definition)).toThrow(InvalidApplyError)
            expect(() => registry.register(definition)).toThrow('Patch 1: apply must be a function')
        })

        it('should reject a non-function rollback', () => {

            const definition = { version: 1, apply: noop, rollback: 42 } as unknown as PatchDefinition

            let caught: unknown = null

            try {

                registry.register(definition)
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(InvalidApplyError)
            expect(caught).toMatchObject({ kind: 'invalid-apply', field: 'rollback', version: 1 })
        })

        it('should check the version before the operations', () => {

            const definition = { version: 0, apply: null } as unknown as PatchDefinition

            expect(() => registry.register(definition)).toThrow(InvalidVersionError)
        })
    })

    describe('dependencies', () => {

        it('should reject an unregistered dependency in strict mode', () => {

            registry.register({ version: 1, apply: noop })

            let caught: unknown = null

            try {

                registry.register({ version: 2, apply: noop, dependencies: [1, 3] })
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(UnknownDependencyError)
            expect(caught).toMatchObject({
                kind: 'unknown-dependency',
                version: 2,
                dependency: 3,
                message: 'Patch 2 depends on unregistered version 3',
            })
        })

        it('should reject a self dependency in strict mode', () => {

            expect(() => registry.register({ version: 1, apply: noop, dependencies: [1] })).toThrow(
                UnknownDependencyError,
            )
        })

        it('should accept forward dependencies when not strict', () => {

            const loose = new PatchRegistry({ observer, strictDependencies: false })

            loose.register({ version: 1, apply: noop, dependencies: [3] })

            expect(loose.strictDependencies).toBe(false)
            expect([...loose.dependenciesOf(1)]).toEqual([3])
        })

        it('should still reject non-integer dependencies when not strict', () => {

            const loose = new PatchRegistry({ observer, strictDependencies: false })

            expect(() => loose.register({ version: 1, apply: noop, dependencies: [0] })).toThrow(
                UnknownDependencyError,
            )
        })
    })

    describe('failed registration', () => {

        it('should leave the registry unchanged', () => {

            registry.register({ version: 1, apply: noop })

            const events: unknown[] = []
            observer.on('patch:registered', (data) => events.push(data))

            expect(() => registry.register({ version: 2, apply: noop, dependencies: [9] })).toThrow()

            expect(registry.size).toBe(1)
            expect(registry.highestVersion).toBe(1)
            expect(registry.has(2)).toBe(false)
            expect(registry.sortedVersions()).toEqual([1])
            expect(events).toHaveLength(0)

            // The rejected version is still available
            registry.register({ version: 2, apply: noop, dependencies: [1] })

            expect(registry.sortedVersions()).toEqual([1, 2])
        })
    })
})
