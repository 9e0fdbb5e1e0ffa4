#!/usr/bin/env node
/**
 * @module cli/cli
 * @description Command-line entry point
 *
 * Usage:
 *   npx tsx src/cli/cli.ts problem.txt
 *   npx tsx src/cli/cli.ts problem.txt -no
 *   npm run solve -- problem.txt --precision 3
 */

import { runCli } from './run';

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('');
        console.error('[FAILED] Solver failed:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    });
