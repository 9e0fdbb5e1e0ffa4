/**
 * @module simplex/pivot
 * @description The dictionary pivot, the only operation that moves the basis
 *
 * `pivot(form, e, l)` solves the row of basic `l` for nonbasic `e`,
 * substitutes the result into every other row and into the objective, then
 * swaps the roles of `e` and `l`. Entries smaller than `EPS` in magnitude are
 * then set to zero.
 */

import { PivotError } from '../core/errors';
import { EPS, basicVariables, nonbasicVariables } from './slack-form';
import type { SlackForm } from './types';

/**
 * Exchange nonbasic `entering` with basic `leaving`, in place.
 *
 * @throws PivotError when `entering` is not nonbasic, `leaving` is not basic,
 *   or the pivot element `a(leaving, entering)` is zero
 */
export function pivot(form: SlackForm, entering: number, leaving: number): void {
    if (form.roles[entering] !== 'nonbasic') {
        throw new PivotError(entering, leaving, `x${entering} is not nonbasic`);
    }
    if (form.roles[leaving] !== 'basic') {
        throw new PivotError(entering, leaving, `x${leaving} is not basic`);
    }

    const element = form.coeff[leaving][entering];
    if (element === 0 || !Number.isFinite(element)) {
        throw new PivotError(entering, leaving, `pivot element is ${element}`);
    }

    const basic = basicVariables(form);
    const nonbasic = nonbasicVariables(form);
    const leavingRow = form.coeff[leaving];
    const row = form.coeff[entering];

    // Row of the entering variable, replacing the leaving row
    row.fill(0);
    form.rhs[entering] = -form.rhs[leaving] / element;
    for (const j of nonbasic) {
        if (j !== entering) {
            row[j] = -leavingRow[j] / element;
        }
    }
    row[leaving] = 1 / element;

    // Substitute into the remaining rows
    for (const i of basic) {
        if (i === leaving) continue;
        const target = form.coeff[i];
        const factor = target[entering];
        form.rhs[i] += factor * form.rhs[entering];
        for (const j of nonbasic) {
            if (j !== entering) {
                target[j] += factor * row[j];
            }
        }
        target[leaving] = factor * row[leaving];
        target[entering] = 0;
    }

    // Objective row
    const gain = form.obj[entering];
    form.v += gain * form.rhs[entering];
    for (const j of nonbasic) {
        if (j !== entering) {
            form.obj[j] += gain * row[j];
        }
    }
    form.obj[leaving] = gain * row[leaving];
    form.obj[entering] = 0;

    leavingRow.fill(0);
    form.rhs[leaving] = 0;
    form.roles[entering] = 'basic';
    form.roles[leaving] = 'nonbasic';

    clearResidue(form);
}

function snap(value: number): number {
    return Math.abs(value) < EPS ? 0 : value;
}

function clearResidue(form: SlackForm): void {
    for (const i of basicVariables(form)) {
        form.rhs[i] = snap(form.rhs[i]);
        const target = form.coeff[i];
        for (let j = 0; j < target.length; j++) {
            target[j] = snap(target[j]);
        }
    }
    for (let j = 0; j < form.obj.length; j++) {
        form.obj[j] = snap(form.obj[j]);
    }
    form.v = snap(form.v);
}
