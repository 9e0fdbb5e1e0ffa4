/**
 * @module simplex/feasibility
 * @description Phase 1: repair a dictionary whose origin is infeasible
 *
 * An artificial variable `a0` is added to every row with coefficient 1 and
 * pivoted into the most negative row, which makes every constant
 * nonnegative. The auxiliary objective `w = -a0` is then maximized with the
 * phase-2 loop, which stops as soon as `a0` leaves the basis and lets `a0`
 * leave on every ratio tie. The program is feasible iff `w` reaches 0.
 *
 * The real objective is set aside while `w` occupies the objective row and
 * is rebuilt afterwards by substituting the final rows into it.
 */

import { ErrorCodes, SimplexError } from '../core/errors';
import { EPS, basicVariables, nonbasicVariables } from './slack-form';
import { pivot } from './pivot';
import { runOptimizationPhase } from './optimization';
import type { SlackForm } from './types';

export type FeasibilityOutcome =
    | { status: 'feasible'; pivots: number }
    | { status: 'infeasible'; pivots: number };

/**
 * Some basic constant is negative
 */
export function needsFeasibilityPhase(form: Readonly<SlackForm>): boolean {
    return basicVariables(form).some(i => form.rhs[i] < 0);
}

/**
 * Most negative row, first index on ties
 */
function mostNegativeRow(form: Readonly<SlackForm>): number {
    const basic = basicVariables(form);
    let row = basic[0];
    for (const i of basic) {
        if (form.rhs[i] < form.rhs[row]) {
            row = i;
        }
    }
    return row;
}

function addArtificial(form: SlackForm): void {
    const a0 = form.artificial;
    for (const i of basicVariables(form)) {
        form.coeff[i][a0] = 1;
    }
    form.roles[a0] = 'nonbasic';
}

/**
 * Take `a0` out of the dictionary. While it is still basic (at value 0) it
 * is first pivoted out on its first nonzero column; a row of zeros is
 * simply dropped.
 *
 * @returns the number of pivots made, 0 or 1
 */
export function evictArtificial(
    form: SlackForm,
    afterPivot?: (entering: number, leaving: number) => void
): number {
    const a0 = form.artificial;
    let pivots = 0;

    if (form.roles[a0] === 'basic') {
        const column = nonbasicVariables(form).find(j => Math.abs(form.coeff[a0][j]) > EPS);
        if (column !== undefined) {
            pivot(form, column, a0);
            pivots++;
            afterPivot?.(column, a0);
        }
    }

    removeArtificial(form);
    return pivots;
}

function removeArtificial(form: SlackForm): void {
    const a0 = form.artificial;
    for (const i of basicVariables(form)) {
        form.coeff[i][a0] = 0;
    }
    form.coeff[a0].fill(0);
    form.rhs[a0] = 0;
    form.obj[a0] = 0;
    form.roles[a0] = 'inactive';
}

/**
 * Rewrite `z = v + Σ c_j·x_j` (over the variables that were nonbasic when
 * phase 1 started) in terms of the current nonbasic set.
 */
function restoreObjective(form: SlackForm, v: number, terms: ReadonlyArray<[number, number]>): void {
    const nonbasic = nonbasicVariables(form);
    form.obj.fill(0);
    form.v = v;

    for (const [j, c] of terms) {
        if (form.roles[j] === 'nonbasic') {
            form.obj[j] += c;
            continue;
        }
        form.v += c * form.rhs[j];
        for (const k of nonbasic) {
            form.obj[k] += c * form.coeff[j][k];
        }
    }
}

/**
 * Turn an infeasible initial dictionary into a feasible one over the
 * original variables, or report that none exists.
 *
 * @param afterPivot - called after every pivot with the pair just exchanged
 */
export function runFeasibilityPhase(
    form: SlackForm,
    afterPivot?: (entering: number, leaving: number) => void
): FeasibilityOutcome {
    const a0 = form.artificial;
    const savedV = form.v;
    const savedTerms = nonbasicVariables(form).map((j): [number, number] => [j, form.obj[j]]);

    addArtificial(form);
    form.obj.fill(0);
    form.v = 0;
    form.obj[a0] = -1;

    const leaving = mostNegativeRow(form);
    pivot(form, a0, leaving);
    let pivots = 1;
    afterPivot?.(a0, leaving);

    // a0 can only decrease through a column with a negative coefficient in its row
    if (!nonbasicVariables(form).some(j => form.coeff[a0][j] < -EPS)) {
        return { status: 'infeasible', pivots };
    }

    const outcome = runOptimizationPhase(form, afterPivot, {
        preferLeaving: a0,
        stopWhen: (current) => current.roles[a0] !== 'basic',
    });
    pivots += outcome.pivots;
    if (outcome.status === 'unbounded') {
        throw new SimplexError(
            ErrorCodes.INTERNAL_ERROR,
            `Auxiliary objective reported unbounded along x${outcome.entering}`,
            { entering: outcome.entering }
        );
    }

    if (form.v < -EPS) {
        return { status: 'infeasible', pivots };
    }

    pivots += evictArtificial(form, afterPivot);
    restoreObjective(form, savedV, savedTerms);

    return { status: 'feasible', pivots };
}
