/**
 * @module simplex/result
 * @description Read the solution out of a final dictionary
 */

import type { SlackForm } from './types';

/**
 * Decision variable values (basic ones take their constant, nonbasic ones
 * are 0) and the objective value `v`
 */
export function extractResult(form: Readonly<SlackForm>): { assignment: number[]; objective: number } {
    const assignment = Array.from({ length: form.numVar }, (_, i) =>
        form.roles[i] === 'basic' ? form.rhs[i] : 0
    );
    return { assignment, objective: form.v };
}
