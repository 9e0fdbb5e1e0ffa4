/**
 * @module io/trace
 * @description Step tracer: the "show steps" switch as a captured setting
 */

import type { SolverConfig } from '../core/config';
import type { SolverLogger } from '../core/logging';
import { snapshotSlackForm } from '../simplex/slack-form';
import type { StepListener } from '../simplex/types';
import { formatDictionary } from './format';

/**
 * Listener that renders every dictionary and hands it to `logger`, or does
 * nothing when `config.showSteps` is off
 */
export function createStepTracer(config: SolverConfig, logger: SolverLogger): StepListener {
    if (!config.showSteps) {
        return () => {};
    }

    return ({ phase, step, pivot, form }) => {
        logger.logStep({
            phase,
            step,
            ...(pivot ? { pivot } : {}),
            lines: formatDictionary(snapshotSlackForm(form), config.precision),
        });
    };
}
