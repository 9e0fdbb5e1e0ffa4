/**
 * @module simplex
 * @description Two-phase simplex over a slack-form dictionary
 *
 * Provides:
 * - SlackForm: dense-arena dictionary and read helpers
 * - pivot: the single state transition
 * - Phase 1 (feasibility) and phase 2 (optimization) loops
 * - Result extraction and the `simplex` / `solve` entry points
 */

export * from './types';
export * from './slack-form';
export * from './pivot';
export * from './optimization';
export * from './feasibility';
export * from './result';
export * from './solver';
