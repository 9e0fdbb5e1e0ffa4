/**
 * @packageDocumentation
 * @module dictionary-simplex
 *
 * Two-phase simplex solver for linear programs in standard maximization form,
 * working on a slack-form dictionary.
 *
 * ## Modules
 * - `simplex` - SlackForm, pivot, phase 1 / phase 2 loops, result extraction
 * - `io` - Text format parser, dictionary and result rendering, step tracer
 * - `core` - Errors, logging, configuration
 *
 * ## Usage Example
 * ```typescript
 * import { simplex, io } from 'dictionary-simplex';
 *
 * const problem = io.parseProblem('2 2\n1 1\n1 0\n4 3\n1 2\n');
 * const result = simplex.solve(problem);
 * console.log(io.formatResult(result, 6).join('\n'));
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as simplex from './src/simplex';
export * as io from './src/io';

// ==================== Direct Exports ====================

export { simplex as solveStandardForm, solve, totalPivots } from './src/simplex/solver';
export type {
    LinearProgram,
    SimplexResult,
    OptimalResult,
    UnboundedResult,
    InfeasibleResult,
    SolveOptions,
    SolverStep,
} from './src/simplex/types';
export { MalformedInputError, SimplexError } from './src/core/errors';

// ==================== Version ====================
export const VERSION = '1.0.0';
