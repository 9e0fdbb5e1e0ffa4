/**
 * Solver Tests
 * End-to-end scenarios through the public entry points
 */

import { describe, it, expect } from 'vitest';
import { simplex, solve, totalPivots } from '../src/simplex/solver';
import { isFeasible, isOptimal } from '../src/simplex/slack-form';
import { MalformedInputError } from '../src/core/errors';
import type { SolverStep } from '../src/simplex/types';
import {
    expectDictionaryInvariants,
    PROGRAM_A,
    PROGRAM_B,
    PROGRAM_UNBOUNDED,
    PROGRAM_INFEASIBLE,
    PROGRAM_INFEASIBLE_AFTER_SCAN,
    PROGRAM_LOWER_BOUNDS,
    PROGRAM_EQUALITY_PAIR,
    PROGRAM_DECIMAL_EQUALITY,
    PROGRAM_UNBOUNDED_AFTER_TIE,
    PROGRAM_UNBOUNDED_AFTER_REPAIR,
    arraysClose,
    isClose,
} from './test-utils';

describe('simplex', () => {
    describe('feasible origin', () => {
        it('should solve without phase 1', () => {
            const result = simplex(PROGRAM_A.A, PROGRAM_A.b, PROGRAM_A.c, PROGRAM_A.numVar);
            expect(result).toEqual({
                status: 'optimal',
                assignment: [3, 1, 1],
                objective: 5.5,
                pivots: { feasibility: 0, optimization: 3 },
                usedFeasibilityPhase: false,
            });
        });

        it('should start phase 2 on the initial dictionary when a constant is zero', () => {
            const result = simplex([[1, 1], [1, -1]], [2, 0], [1, 1], 2);
            expect(result.usedFeasibilityPhase).toBe(false);
            expect(result.status).toBe('optimal');
        });
    });

    describe('infeasible origin', () => {
        it('should solve through phase 1', () => {
            const result = solve(PROGRAM_B);
            if (result.status !== 'optimal') throw new Error(`expected optimal, got ${result.status}`);

            expect(result.usedFeasibilityPhase).toBe(true);
            expect(arraysClose(result.assignment, [34 / 3, 10 / 3])).toBe(true);
            expect(isClose(result.objective, 64 / 3)).toBe(true);
            expect(result.pivots).toEqual({ feasibility: 2, optimization: 2 });
        });

        it('should solve a program whose repair needs several pivots', () => {
            const result = solve(PROGRAM_LOWER_BOUNDS);
            expect(result).toEqual({
                status: 'optimal',
                assignment: [3, 1],
                objective: 4,
                pivots: { feasibility: 3, optimization: 1 },
                usedFeasibilityPhase: true,
            });
        });
    });

    describe('degenerate phase 1', () => {
        it('should solve an equality written as two inequalities', () => {
            expect(solve(PROGRAM_EQUALITY_PAIR)).toEqual({
                status: 'optimal',
                assignment: [1],
                objective: 1,
                pivots: { feasibility: 2, optimization: 1 },
                usedFeasibilityPhase: true,
            });
        });

        it('should carry a repaired dictionary with rounding residue into phase 2', () => {
            const result = solve(PROGRAM_DECIMAL_EQUALITY, {
                onStep: ({ phase, form }) => {
                    if (phase === 'optimization') {
                        expect(isFeasible(form)).toBe(true);
                    }
                },
            });
            if (result.status !== 'optimal') throw new Error(`expected optimal, got ${result.status}`);

            expect(arraysClose(result.assignment, [3, 0])).toBe(true);
            expect(isClose(result.objective, 3)).toBe(true);
        });

        it('should detect unboundedness after the artificial variable wins a tie', () => {
            const result = solve(PROGRAM_UNBOUNDED_AFTER_TIE, {
                onStep: ({ phase, form }) => {
                    if (phase === 'optimization') {
                        expect(isFeasible(form)).toBe(true);
                    }
                },
            });

            expect(result).toEqual({
                status: 'unbounded',
                entering: 3,
                pivots: { feasibility: 3, optimization: 1 },
                usedFeasibilityPhase: true,
            });
        });

        it('should stop phase 1 once the artificial variable leaves the basis', () => {
            expect(solve(PROGRAM_UNBOUNDED_AFTER_REPAIR)).toEqual({
                status: 'unbounded',
                entering: 0,
                pivots: { feasibility: 3, optimization: 0 },
                usedFeasibilityPhase: true,
            });
        });

        it('should solve a program with an unbounded direction behind phase 1', () => {
            // with x0 = x2 = 0 every x1 >= 4/3 is feasible
            const result = simplex([[2, -2, 0], [2, -1, 1], [-1, -3, 3]], [1, 1, -4], [3, 4, 1], 3);
            expect(result.status).toBe('unbounded');
        });
    });

    describe('terminal outcomes', () => {
        it('should report an unbounded program', () => {
            expect(solve(PROGRAM_UNBOUNDED)).toEqual({
                status: 'unbounded',
                entering: 0,
                pivots: { feasibility: 0, optimization: 0 },
                usedFeasibilityPhase: false,
            });
        });

        it('should report an infeasible program', () => {
            expect(solve(PROGRAM_INFEASIBLE)).toEqual({
                status: 'infeasible',
                pivots: { feasibility: 1, optimization: 0 },
                usedFeasibilityPhase: true,
            });
        });

        it('should report infeasibility found after auxiliary pivots', () => {
            expect(solve(PROGRAM_INFEASIBLE_AFTER_SCAN).status).toBe('infeasible');
        });

        it('should reject malformed matrices', () => {
            expect(() => simplex([[1, 2], [3]], [1, 1], [1, 1], 2)).toThrow(MalformedInputError);
        });
    });

    describe('step observer', () => {
        it('should report the initial dictionary and every pivot', () => {
            const steps: Array<Omit<SolverStep, 'form'>> = [];
            solve(PROGRAM_A, {
                onStep: ({ form: _form, ...step }) => steps.push(step),
            });

            expect(steps).toEqual([
                { phase: 'initial', step: 0 },
                { phase: 'optimization', step: 1, pivot: { entering: 0, leaving: 4 } },
                { phase: 'optimization', step: 2, pivot: { entering: 1, leaving: 5 } },
                { phase: 'optimization', step: 3, pivot: { entering: 2, leaving: 3 } },
            ]);
        });

        it('should report phase 1 pivots and the restored dictionary', () => {
            const steps: Array<Omit<SolverStep, 'form'>> = [];
            solve(PROGRAM_B, {
                onStep: ({ form: _form, ...step }) => steps.push(step),
            });

            expect(steps).toEqual([
                { phase: 'initial', step: 0 },
                { phase: 'feasibility', step: 1, pivot: { entering: 5, leaving: 3 } },
                { phase: 'feasibility', step: 2, pivot: { entering: 0, leaving: 5 } },
                { phase: 'feasibility', step: 2 },
                { phase: 'optimization', step: 3, pivot: { entering: 1, leaving: 4 } },
                { phase: 'optimization', step: 4, pivot: { entering: 3, leaving: 2 } },
            ]);
        });

        it('should see invariants hold after every step and feasibility throughout phase 2', () => {
            solve(PROGRAM_B, {
                onStep: ({ phase, form }) => {
                    expectDictionaryInvariants(form);
                    if (phase === 'optimization') {
                        expect(isFeasible(form)).toBe(true);
                    }
                },
            });
        });

        it('should end on a dictionary with an optimality certificate', () => {
            const seen: SolverStep[] = [];
            solve(PROGRAM_B, { onStep: (step) => seen.push(step) });
            const last = seen[seen.length - 1];
            expect(last.phase).toBe('optimization');
            expect(isOptimal(last.form)).toBe(true);
        });

        it('should not change the result', () => {
            const observed = solve(PROGRAM_B, { onStep: () => {} });
            expect(observed).toEqual(solve(PROGRAM_B));
        });
    });
});

describe('totalPivots', () => {
    it('should add both phases', () => {
        expect(totalPivots(solve(PROGRAM_B))).toBe(4);
        expect(totalPivots(solve(PROGRAM_A))).toBe(3);
    });
});
