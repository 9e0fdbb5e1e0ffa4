/**
 * Formatting Tests
 * Number rendering, dictionary trace lines and final reports
 */

import { describe, it, expect } from 'vitest';
import { formatNumber, formatExpression, formatDictionary, formatResult } from '../src/io/format';
import { createSlackForm, snapshotSlackForm } from '../src/simplex/slack-form';
import { pivot } from '../src/simplex/pivot';
import { solve } from '../src/simplex/solver';
import { PROGRAM_A, PROGRAM_B, PROGRAM_UNBOUNDED, PROGRAM_INFEASIBLE } from './test-utils';

const buildA = () => createSlackForm(PROGRAM_A.A, PROGRAM_A.b, PROGRAM_A.c, PROGRAM_A.numVar);

describe('formatNumber', () => {
    it('should drop trailing zeros', () => {
        expect(formatNumber(5.5, 6)).toBe('5.5');
        expect(formatNumber(3, 6)).toBe('3');
    });

    it('should round to the requested precision', () => {
        expect(formatNumber(1 / 3, 6)).toBe('0.333333');
        expect(formatNumber(2 / 3, 2)).toBe('0.67');
        expect(formatNumber(-34 / 3, 3)).toBe('-11.333');
    });

    it('should print negative zero and tiny values as 0', () => {
        expect(formatNumber(-0, 6)).toBe('0');
        expect(formatNumber(-1e-12, 6)).toBe('0');
    });
});

describe('formatExpression', () => {
    it('should render signs between terms and skip zero coefficients', () => {
        expect(formatExpression(2, { 1: -1, 2: 0, 4: 1.5 }, [1, 2, 4], 6)).toBe('2 - 1 x1 + 1.5 x4');
    });

    it('should render a bare constant', () => {
        expect(formatExpression(-3, { 0: 0 }, [0], 6)).toBe('-3');
    });
});

describe('formatDictionary', () => {
    it('should render the initial dictionary', () => {
        expect(formatDictionary(snapshotSlackForm(buildA()), 6)).toEqual([
            'x3 = 5 - 1 x0 - 1 x1 - 1 x2',
            'x4 = 3 - 1 x0',
            'x5 = 1 - 1 x1',
            'x6 = 4 - 1 x2',
            'z = 0 + 1 x0 + 2 x1 + 0.5 x2',
        ]);
    });

    it('should render the dictionary after a pivot', () => {
        const form = buildA();
        pivot(form, 0, 4);
        expect(formatDictionary(snapshotSlackForm(form), 6)).toEqual([
            'x0 = 3 - 1 x4',
            'x3 = 2 - 1 x1 - 1 x2 + 1 x4',
            'x5 = 1 - 1 x1',
            'x6 = 4 - 1 x2',
            'z = 3 + 2 x1 + 0.5 x2 - 1 x4',
        ]);
    });
});

describe('formatResult', () => {
    it('should list the assignment and the objective', () => {
        expect(formatResult(solve(PROGRAM_A), 6)).toEqual([
            'Solution:',
            'x0: 3',
            'x1: 1',
            'x2: 1',
            'Objective: 5.5',
        ]);
    });

    it('should round fractional solutions', () => {
        expect(formatResult(solve(PROGRAM_B), 4)).toEqual([
            'Solution:',
            'x0: 11.3333',
            'x1: 3.3333',
            'Objective: 21.3333',
        ]);
    });

    it('should report unbounded and infeasible programs', () => {
        expect(formatResult(solve(PROGRAM_UNBOUNDED), 6)).toEqual(['This LP is unbounded.']);
        expect(formatResult(solve(PROGRAM_INFEASIBLE), 6)).toEqual(['This LP is infeasible.']);
    });
});
