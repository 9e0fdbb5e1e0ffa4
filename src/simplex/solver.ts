/**
 * @module simplex/solver
 * @description Two-phase simplex entry points
 *
 * Flow: build the slack form, run phase 1 only when some constant is
 * negative, run phase 2, then read the result. The whole run is synchronous.
 *
 * @example
 * ```typescript
 * const result = simplex([[1, 1], [1, 0]], [4, 3], [1, 2], 2);
 * if (result.status === 'optimal') {
 *     console.log(result.assignment, result.objective); // [0, 4] 8
 * }
 * ```
 */

import { createSlackForm } from './slack-form';
import { needsFeasibilityPhase, runFeasibilityPhase } from './feasibility';
import { runOptimizationPhase } from './optimization';
import { extractResult } from './result';
import type { LinearProgram, PivotCounts, SimplexResult, SolveOptions } from './types';

/**
 * Solve `maximize c·x s.t. A x <= b, x >= 0`.
 *
 * @throws MalformedInputError when the dimensions of `A`, `b`, `c` disagree
 */
export function simplex(
    A: number[][],
    b: number[],
    c: number[],
    numVar: number,
    options: SolveOptions = {}
): SimplexResult {
    const { onStep } = options;
    const form = createSlackForm(A, b, c, numVar);
    const pivots: PivotCounts = { feasibility: 0, optimization: 0 };
    let step = 0;

    onStep?.({ phase: 'initial', step, form });

    const usedFeasibilityPhase = needsFeasibilityPhase(form);
    if (usedFeasibilityPhase) {
        const repaired = runFeasibilityPhase(form, (entering, leaving) => {
            step++;
            onStep?.({ phase: 'feasibility', step, pivot: { entering, leaving }, form });
        });
        pivots.feasibility = repaired.pivots;
        if (repaired.status === 'infeasible') {
            return { status: 'infeasible', pivots, usedFeasibilityPhase };
        }
        // Artificial removed and real objective restored
        onStep?.({ phase: 'feasibility', step, form });
    }

    const outcome = runOptimizationPhase(form, (entering, leaving) => {
        step++;
        onStep?.({ phase: 'optimization', step, pivot: { entering, leaving }, form });
    });
    pivots.optimization = outcome.pivots;

    if (outcome.status === 'unbounded') {
        return { status: 'unbounded', entering: outcome.entering, pivots, usedFeasibilityPhase };
    }

    return { status: 'optimal', ...extractResult(form), pivots, usedFeasibilityPhase };
}

/**
 * Solve a {@link LinearProgram}
 */
export function solve(problem: LinearProgram, options: SolveOptions = {}): SimplexResult {
    return simplex(problem.A, problem.b, problem.c, problem.numVar, options);
}

/**
 * Total pivots across both phases
 */
export function totalPivots(result: SimplexResult): number {
    return result.pivots.feasibility + result.pivots.optimization;
}
