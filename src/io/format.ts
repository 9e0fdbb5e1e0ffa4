/**
 * @module io/format
 * @description Human-readable rendering of dictionaries and results
 */

import type { DictionarySnapshot, SimplexResult } from '../simplex/types';

/**
 * Round to `precision` decimals and drop trailing zeros (and negative zero)
 */
export function formatNumber(value: number, precision: number): string {
    const rounded = Number(value.toFixed(precision));
    return rounded === 0 ? '0' : String(rounded);
}

/**
 * `constant ± |c| x{j} ...`, skipping coefficients that render as zero
 */
export function formatExpression(
    constant: number,
    coefficients: Record<number, number>,
    order: readonly number[],
    precision: number
): string {
    let text = formatNumber(constant, precision);
    for (const j of order) {
        const magnitude = formatNumber(Math.abs(coefficients[j]), precision);
        if (magnitude === '0') continue;
        text += `${coefficients[j] < 0 ? ' - ' : ' + '}${magnitude} x${j}`;
    }
    return text;
}

/**
 * One line per basic variable in index order, then the objective line
 */
export function formatDictionary(snapshot: DictionarySnapshot, precision: number): string[] {
    const lines = snapshot.basic.map(i => {
        const row = snapshot.rows[i];
        return `x${i} = ${formatExpression(row.constant, row.coefficients, snapshot.nonbasic, precision)}`;
    });
    const { constant, coefficients } = snapshot.objective;
    lines.push(`z = ${formatExpression(constant, coefficients, snapshot.nonbasic, precision)}`);
    return lines;
}

/**
 * Final report for a solver result
 */
export function formatResult(result: SimplexResult, precision: number): string[] {
    switch (result.status) {
        case 'optimal':
            return [
                'Solution:',
                ...result.assignment.map((value, i) => `x${i}: ${formatNumber(value, precision)}`),
                `Objective: ${formatNumber(result.objective, precision)}`,
            ];
        case 'unbounded':
            return ['This LP is unbounded.'];
        case 'infeasible':
            return ['This LP is infeasible.'];
    }
}
