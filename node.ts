/**
 * @packageDocumentation
 * @module dictionary-simplex/node
 *
 * Node.js entry point: everything from the main entry plus the command-line
 * runner, which reads input files through `fs`.
 *
 * ```typescript
 * import { cli } from 'dictionary-simplex/node';
 *
 * const exitCode = await cli.runCli(['problem.txt', '--no-steps']);
 * ```
 *
 * @license MIT
 */

export * from './index';
export * as cli from './src/cli';
