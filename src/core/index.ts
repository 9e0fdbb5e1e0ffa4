/**
 * @module core
 * @description Shared infrastructure for the solver and its collaborators
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Step and outcome logging
 * - `config`: Solver presentation settings
 */

// ==================== Logging ====================

export type {
    LogLevel,
    StepPhase,
    OutcomeStatus,
    BaseLogEntry,
    StepLogEntry,
    OutcomeLogEntry,
    LogEntry,
    StepLogInput,
    OutcomeLogInput,
    SolverLogger,
    LoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Config ====================

export type { SolverConfig } from './config';

export {
    DEFAULT_SOLVER_CONFIG,
    createSolverConfig,
} from './config';

// ==================== Errors ====================

export {
    ErrorCodes,
    SimplexError,
    MalformedInputError,
    ValidationError,
    PivotError,
    isSimplexError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
    MalformedInputDetail,
} from './errors';
