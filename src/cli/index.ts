/**
 * @module cli
 * @description Command-line runner (Node.js only: reads files through `fs`)
 */

export type { CliIO, CliArgs } from './run';
export { runCli, parseArgs, nodeIO } from './run';
export { USAGE, INPUT_FORMAT, EXAMPLE_PROBLEM } from './config';
