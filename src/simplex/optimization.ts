/**
 * @module simplex/optimization
 * @description Phase 2: pivot a feasible dictionary toward optimality
 *
 * Entering: first nonbasic variable, by index, with `c(j) > EPS`. Leaving:
 * ratio test over rows with `a(i,e) < -EPS`, first index when bounds agree
 * within `EPS`. These rules do not prevent cycling on degenerate programs and
 * no iteration bound is applied.
 */

import { EPS, basicVariables, nonbasicVariables } from './slack-form';
import { pivot } from './pivot';
import type { PhaseOptions, PhaseOutcome, SlackForm } from './types';

/**
 * First nonbasic variable with `c(j) > EPS`, or `undefined` when the
 * dictionary is optimal
 */
export function selectEntering(form: Readonly<SlackForm>): number | undefined {
    return nonbasicVariables(form).find(j => form.obj[j] > EPS);
}

/**
 * Basic variable whose row bounds `entering` tightest, or `undefined` when
 * no row limits it.
 *
 * @param preferred - takes the place of the first index on a tie
 */
export function selectLeaving(
    form: Readonly<SlackForm>,
    entering: number,
    preferred?: number
): number | undefined {
    let tightest = Infinity;
    let leaving: number | undefined;

    for (const i of basicVariables(form)) {
        const a = form.coeff[i][entering];
        if (a < -EPS) {
            const bound = -form.rhs[i] / a;
            const tie = Math.abs(bound - tightest) <= EPS;
            if (tie ? i === preferred : bound < tightest) {
                tightest = bound;
                leaving = i;
            }
        }
    }

    return leaving;
}

/**
 * Pivot until no entering variable remains or an unbounded direction shows up.
 *
 * @param afterPivot - called after every pivot with the pair just exchanged
 */
export function runOptimizationPhase(
    form: SlackForm,
    afterPivot?: (entering: number, leaving: number) => void,
    options: PhaseOptions = {}
): PhaseOutcome {
    const { preferLeaving, stopWhen } = options;
    let pivots = 0;

    for (let entering = selectEntering(form); entering !== undefined; entering = selectEntering(form)) {
        const leaving = selectLeaving(form, entering, preferLeaving);
        if (leaving === undefined) {
            return { status: 'unbounded', entering, pivots };
        }

        pivot(form, entering, leaving);
        pivots++;
        afterPivot?.(entering, leaving);

        if (stopWhen?.(form)) {
            break;
        }
    }

    return { status: 'optimal', pivots };
}
