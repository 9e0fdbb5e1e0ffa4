/**
 * @module cli/run
 * @description Command-line runner, kept apart from the bin entry so it can
 * be driven with in-memory streams
 */

import { promises as fs } from 'fs';
import { createSolverConfig, type SolverConfig } from '../core/config';
import { ErrorCodes, MalformedInputError, ValidationError, wrapError } from '../core/errors';
import { ConsoleLogger } from '../core/logging';
import { parseProblem } from '../io/parser';
import { formatResult } from '../io/format';
import { createStepTracer } from '../io/trace';
import { solve, totalPivots } from '../simplex/solver';
import { EXAMPLE_PROBLEM, INPUT_FORMAT, USAGE } from './config';

// ==================== IO ====================

/**
 * Side effects of the runner
 */
export interface CliIO {
    readFile(path: string): Promise<string>;
    stdout(line: string): void;
    stderr(line: string): void;
}

export const nodeIO: CliIO = {
    readFile: (path) => fs.readFile(path, 'utf8'),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
};

// ==================== Argument Parsing ====================

export interface CliArgs {
    file?: string;
    showSteps: boolean;
    precision?: number;
    verbose: boolean;
    help: boolean;
}

/**
 * @throws ValidationError on an unknown option, a missing option value or a
 *   second file argument
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        showSteps: true,
        verbose: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--no-steps' || arg.startsWith('-no')) {
            args.showSteps = false;
        } else if (arg === '--verbose' || arg === '-v') {
            args.verbose = true;
        } else if (arg === '--precision' || arg === '-p') {
            const value = argv[++i];
            if (value === undefined || !/^\d+$/.test(value)) {
                throw new ValidationError(`${arg} expects a nonnegative integer`, { option: arg, value });
            }
            args.precision = parseInt(value, 10);
        } else if (arg.startsWith('-')) {
            throw new ValidationError(`Unknown option: ${arg}`, { option: arg });
        } else if (args.file === undefined) {
            args.file = arg;
        } else {
            throw new ValidationError(`Unexpected argument: ${arg}`, { argument: arg });
        }
    }

    return args;
}

// ==================== Main ====================

/**
 * Run the command and resolve to its exit code.
 *
 * Optimal, unbounded and infeasible programs all exit with 0; malformed
 * input, unreadable files and bad options exit with 1.
 */
export async function runCli(argv: readonly string[], io: CliIO = nodeIO): Promise<number> {
    let args: CliArgs;
    let config: SolverConfig;
    try {
        args = parseArgs(argv);
        config = createSolverConfig({
            showSteps: args.showSteps,
            ...(args.precision === undefined ? {} : { precision: args.precision }),
        });
    } catch (error) {
        if (error instanceof ValidationError) {
            io.stderr(error.message);
            io.stderr(USAGE);
            return 1;
        }
        throw error;
    }

    if (args.help) {
        io.stdout(USAGE);
        io.stdout('');
        io.stdout(INPUT_FORMAT);
        return 0;
    }

    let text: string;
    if (args.file === undefined) {
        io.stdout(USAGE);
        io.stdout('');
        text = EXAMPLE_PROBLEM;
    } else {
        try {
            text = await io.readFile(args.file);
        } catch (error) {
            const wrapped = wrapError(error, ErrorCodes.IO_ERROR);
            io.stderr(`Cannot read ${args.file}: ${wrapped.message}`);
            return 1;
        }
    }

    const logger = new ConsoleLogger({
        problem: args.file ?? 'example',
        level: args.verbose ? 'debug' : 'info',
        write: (line) => io.stdout(line),
    });

    try {
        const problem = parseProblem(text);
        const result = solve(problem, { onStep: createStepTracer(config, logger) });

        logger.logOutcome({
            status: result.status,
            ...(result.status === 'optimal' ? { objective: result.objective } : {}),
            pivots: totalPivots(result),
        });

        if (config.showSteps) {
            io.stdout('');
        }
        for (const line of formatResult(result, config.precision)) {
            io.stdout(line);
        }
        return 0;
    } catch (error) {
        if (error instanceof MalformedInputError) {
            io.stderr(`Input error: ${error.message}`);
            io.stderr('');
            io.stderr(INPUT_FORMAT);
            return 1;
        }
        throw error;
    } finally {
        logger.close();
    }
}
