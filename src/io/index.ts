/**
 * @module io
 * @description Text collaborators around the solver: parsing, rendering, tracing
 */

export { parseProblem } from './parser';
export {
    formatNumber,
    formatExpression,
    formatDictionary,
    formatResult,
} from './format';
export { createStepTracer } from './trace';
