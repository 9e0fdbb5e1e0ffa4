/**
 * @module simplex/slack-form
 * @description Construction and read access for the slack-form dictionary
 *
 * Standard-form rows `A x <= b` become `x_{numVar+r} = b_r - Σ_j A_rj·x_j`.
 * The arena reserves one extra slot for the phase-1 artificial variable,
 * which stays `inactive` outside phase 1.
 */

import { MalformedInputError } from '../core/errors';
import type { DictionarySnapshot, SlackForm } from './types';

// ==================== Validation ====================

function checkVector(values: readonly number[], length: number, field: string): void {
    if (values.length !== length) {
        throw new MalformedInputError(
            `${field} has ${values.length} entries, expected ${length}`,
            { field, expected: `${length} entries`, received: `${values.length} entries` }
        );
    }
    values.forEach((value, index) => {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new MalformedInputError(
                `${field}[${index}] is not a finite real number`,
                { field: `${field}[${index}]`, expected: 'finite real number', received: String(value) }
            );
        }
    });
}

// ==================== Construction ====================

/**
 * Build the initial dictionary of a standard-form program.
 *
 * @throws MalformedInputError when dimensions disagree or an entry is not finite
 */
export function createSlackForm(A: number[][], b: number[], c: number[], numVar: number): SlackForm {
    if (!Number.isInteger(numVar) || numVar < 0) {
        throw new MalformedInputError(
            `numVar must be a nonnegative integer, got ${numVar}`,
            { field: 'numVar', expected: 'nonnegative integer', received: String(numVar) }
        );
    }

    const numCon = A.length;
    checkVector(b, numCon, 'b');
    checkVector(c, numVar, 'c');
    A.forEach((row, r) => checkVector(row, numVar, `A[${r}]`));

    const size = numVar + numCon + 1;
    const roles = Array.from({ length: size }, (_, i) =>
        i < numVar ? 'nonbasic' as const : i < numVar + numCon ? 'basic' as const : 'inactive' as const
    );
    const coeff = Array.from({ length: size }, () => new Array<number>(size).fill(0));
    const rhs = new Array<number>(size).fill(0);
    const obj = new Array<number>(size).fill(0);

    A.forEach((row, r) => {
        const slack = numVar + r;
        row.forEach((value, j) => {
            coeff[slack][j] = -value;
        });
        rhs[slack] = b[r];
    });
    c.forEach((value, j) => {
        obj[j] = value;
    });

    return {
        numVar,
        numCon,
        artificial: numVar + numCon,
        roles,
        coeff,
        rhs,
        obj,
        v: 0,
    };
}

/**
 * Magnitude below which a dictionary entry counts as zero
 */
export const EPS = 1e-9;

// ==================== Read Access ====================

/**
 * Basic variables in ascending index order
 */
export function basicVariables(form: Readonly<SlackForm>): number[] {
    const result: number[] = [];
    form.roles.forEach((role, i) => {
        if (role === 'basic') result.push(i);
    });
    return result;
}

/**
 * Nonbasic variables in ascending index order
 */
export function nonbasicVariables(form: Readonly<SlackForm>): number[] {
    const result: number[] = [];
    form.roles.forEach((role, i) => {
        if (role === 'nonbasic') result.push(i);
    });
    return result;
}

/**
 * `b(i) >= 0` for every basic `i`
 */
export function isFeasible(form: Readonly<SlackForm>): boolean {
    return basicVariables(form).every(i => form.rhs[i] >= 0);
}

/**
 * `c(j) <= EPS` for every nonbasic `j`
 */
export function isOptimal(form: Readonly<SlackForm>): boolean {
    return nonbasicVariables(form).every(j => form.obj[j] <= EPS);
}

/**
 * Copy the active rows and objective out of the arena
 */
export function snapshotSlackForm(form: Readonly<SlackForm>): DictionarySnapshot {
    const basic = basicVariables(form);
    const nonbasic = nonbasicVariables(form);

    const pick = (values: readonly number[]): Record<number, number> => {
        const picked: Record<number, number> = {};
        for (const j of nonbasic) {
            picked[j] = values[j];
        }
        return picked;
    };

    const rows: DictionarySnapshot['rows'] = {};
    for (const i of basic) {
        rows[i] = { constant: form.rhs[i], coefficients: pick(form.coeff[i]) };
    }

    return {
        basic,
        nonbasic,
        rows,
        objective: { constant: form.v, coefficients: pick(form.obj) },
    };
}
