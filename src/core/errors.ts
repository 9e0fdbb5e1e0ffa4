/**
 * @module core/errors
 * @description Unified error types and error codes for the solver and its collaborators
 *
 * Unbounded and infeasible programs are not errors: they come back as
 * variants of `SimplexResult`. Only malformed input, bad configuration and
 * internal defects are thrown.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Input Errors
    /** Dimension mismatch or non-numeric token in the problem data */
    MALFORMED_INPUT: 'MALFORMED_INPUT',
    /** Input file could not be read */
    IO_ERROR: 'IO_ERROR',

    // Validation Errors
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Algorithm Errors
    /** Pivot requested on a zero element or on variables in the wrong partition */
    INVALID_PIVOT: 'INVALID_PIVOT',
    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class
 */
export class SimplexError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'SimplexError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SimplexError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Where malformed data was found
 */
export interface MalformedInputDetail {
    /** Field of the problem (`A`, `b`, `c`, `numVar`, `header`, ...) */
    field: string;
    /** 1-based line number, when the data came from text */
    line?: number;
    /** What was expected at that position */
    expected?: string;
    /** What was found instead */
    received?: string;
}

/**
 * Malformed problem data (dimension mismatch, non-numeric token)
 */
export class MalformedInputError extends SimplexError {
    declare readonly details: MalformedInputDetail;

    constructor(message: string, details: MalformedInputDetail) {
        super(ErrorCodes.MALFORMED_INPUT, message, details);
        this.name = 'MalformedInputError';
    }
}

/**
 * Validation error (invalid solver or command-line configuration)
 */
export class ValidationError extends SimplexError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Pivot precondition breach. Entering/leaving selection never produces one,
 * so seeing it means a defect in the caller.
 */
export class PivotError extends SimplexError {
    readonly entering: number;
    readonly leaving: number;

    constructor(entering: number, leaving: number, reason: string) {
        super(
            ErrorCodes.INVALID_PIVOT,
            `Cannot pivot x${entering} into the row of x${leaving}: ${reason}`,
            { entering, leaving }
        );
        this.name = 'PivotError';
        this.entering = entering;
        this.leaving = leaving;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a SimplexError
 */
export function isSimplexError(error: unknown): error is SimplexError {
    return error instanceof SimplexError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isSimplexError(error) && error.code === code;
}

/**
 * Wrap any error into a SimplexError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): SimplexError {
    if (isSimplexError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SimplexError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new SimplexError(defaultCode, String(error));
}
