/**
 * Core module exports.
 *
 * All business logic modules are exported from here.
 */

// Observer
export { observer, createObserver } from './observer.js'
export type { PatchworkEvents, PatchworkObserver, RollbackStatus } from './observer.js'

// Registry
export {
    PatchRegistry,
    VersionSchema,
    checkVersion,
    RegistrationError,
    InvalidVersionError,
    InvalidApplyError,
    UnknownDependencyError,
} from './registry/index.js'
export type {
    Patch,
    PatchDefinition,
    PatchOperation,
    RegistryOptions,
    RegistrationErrorKind,
} from './registry/index.js'

// Orchestrator
export {
    Orchestrator,
    VersionState,
    BaselineSchema,
    PatchApplyError,
    RollbackError,
    RunAbortedError,
    OrchestratorBusyError,
    VersionStateError,
    toError,
} from './orchestrator/index.js'
export type {
    OrchestratorOptions,
    OrchestratorState,
    SkippedPatch,
    RollbackReport,
    RunResult,
    RunSucceeded,
    RunRolledBack,
    RunPlan,
    VersionStatus,
} from './orchestrator/index.js'

// Config
export {
    PatchworkConfigSchema,
    ConfigValidationError,
    parseConfig,
    resolveConfig,
    getEnvConfig,
} from './config/index.js'
export type {
    PatchworkConfig,
    PatchworkConfigInput,
    LoggingConfig,
} from './config/index.js'

// Logger
export {
    Logger,
    classifyEvent,
    shouldLog,
    generateMessage,
    formatEntry,
    serializeEntry,
    DEFAULT_LOGGER_CONFIG,
} from './logger/index.js'
export type {
    LogLevel,
    LogFormat,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerOptions,
    LoggerState,
} from './logger/index.js'

// Environment
export { isCi, isDebug } from './environment.js'
