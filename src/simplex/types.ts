/**
 * @module simplex/types
 * @description Type definitions for the dictionary simplex solver
 */

import type { StepPhase } from '../core/logging';

/**
 * Linear program in standard maximization form:
 * maximize c·x subject to A x <= b, x >= 0
 */
export interface LinearProgram {
    /** Constraint matrix, `numCon` rows of `numVar` entries */
    A: number[][];
    /** Right-hand sides, one per constraint */
    b: number[];
    /** Objective coefficients, one per decision variable */
    c: number[];
    /** Number of decision variables */
    numVar: number;
}

/**
 * Partition tag of a variable slot
 */
export type VariableRole = 'basic' | 'nonbasic' | 'inactive';

/**
 * Slack-form dictionary over a dense arena of `numVar + numCon + 1` slots.
 *
 * Basic `i` reads `x_i = rhs[i] + Σ_j coeff[i][j]·x_j` over nonbasic `j`;
 * the objective reads `z = v + Σ_j obj[j]·x_j`. Entries outside the
 * basic-row × nonbasic-column block are meaningless.
 */
export interface SlackForm {
    readonly numVar: number;
    readonly numCon: number;
    /** Slot of the phase-1 artificial variable */
    readonly artificial: number;
    roles: VariableRole[];
    coeff: number[][];
    rhs: number[];
    obj: number[];
    v: number;
}

/**
 * Plain copy of the active part of a dictionary
 */
export interface DictionarySnapshot {
    basic: number[];
    nonbasic: number[];
    /** Row of every basic variable, keyed by nonbasic index */
    rows: Record<number, { constant: number; coefficients: Record<number, number> }>;
    objective: { constant: number; coefficients: Record<number, number> };
}

/**
 * Pivot counts per phase
 */
export interface PivotCounts {
    feasibility: number;
    optimization: number;
}

interface ResultBase {
    pivots: PivotCounts;
    /** Whether the initial dictionary needed repairing */
    usedFeasibilityPhase: boolean;
}

export interface OptimalResult extends ResultBase {
    status: 'optimal';
    /** Value of each decision variable `x0 .. x{numVar-1}` */
    assignment: number[];
    objective: number;
}

export interface UnboundedResult extends ResultBase {
    status: 'unbounded';
    /** Improving variable with no limiting row */
    entering: number;
}

export interface InfeasibleResult extends ResultBase {
    status: 'infeasible';
}

export type SimplexResult = OptimalResult | UnboundedResult | InfeasibleResult;

/**
 * Dictionary state reported after construction and after every pivot
 */
export interface SolverStep {
    phase: StepPhase;
    /** 0 for the initial dictionary, then counts pivots across both phases */
    step: number;
    pivot?: { entering: number; leaving: number };
    form: Readonly<SlackForm>;
}

/**
 * Observer of dictionary transitions
 */
export type StepListener = (step: SolverStep) => void;

/**
 * Solver options
 */
export interface SolveOptions {
    /** Called with the initial dictionary and after every pivot */
    onStep?: StepListener;
}

/**
 * Extra rules for a phase loop
 */
export interface PhaseOptions {
    /** Basic variable that leaves whenever its row ties for the tightest bound */
    preferLeaving?: number;
    /** Checked after every pivot; the loop ends as optimal once it holds */
    stopWhen?: (form: Readonly<SlackForm>) => boolean;
}

/**
 * Outcome of a single phase loop
 */
export type PhaseOutcome =
    | { status: 'optimal'; pivots: number }
    | { status: 'unbounded'; entering: number; pivots: number };
