/**
 * @module core/config
 * @description Solver presentation settings
 *
 * None of these values affect the numeric result of a solve.
 */

import { ValidationError } from './errors';

// ==================== Configuration ====================

/**
 * Solver configuration
 */
export interface SolverConfig {
    /** Emit the dictionary after every pivot */
    showSteps: boolean;
    /** Decimal places used when rendering numbers */
    precision: number;
}

/**
 * Default configuration
 */
export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
    showSteps: true,
    precision: 6,
};

const MAX_PRECISION = 20;

/**
 * Merge overrides onto the defaults and validate the result
 */
export function createSolverConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
    const config: SolverConfig = { ...DEFAULT_SOLVER_CONFIG, ...overrides };

    if (!Number.isInteger(config.precision) || config.precision < 0 || config.precision > MAX_PRECISION) {
        throw new ValidationError(
            `precision must be an integer between 0 and ${MAX_PRECISION}, got ${config.precision}`,
            { field: 'precision', value: config.precision }
        );
    }

    return config;
}
