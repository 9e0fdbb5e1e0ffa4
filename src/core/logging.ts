/**
 * @module core/logging
 * @description Structured logging for solver runs
 *
 * Step entries carry an already rendered dictionary so loggers stay free of
 * any formatting policy. Outcome entries summarise a finished run.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Phase that produced a step
 */
export type StepPhase = 'initial' | 'feasibility' | 'optimization';

/**
 * Terminal status of a run
 */
export type OutcomeStatus = 'optimal' | 'unbounded' | 'infeasible';

/**
 * Base log entry structure (all logs include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Problem label (file name or caller-supplied identifier) */
    problem: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * One dictionary transition
 */
export interface StepLogEntry extends BaseLogEntry {
    logType: 'step';
    phase: StepPhase;
    /** 0 for the initial dictionary, then 1, 2, ... per pivot */
    step: number;
    pivot?: { entering: number; leaving: number };
    /** Rendered dictionary, one line per basic variable plus the objective line */
    lines: string[];
}

/**
 * Summary of a finished run
 */
export interface OutcomeLogEntry extends BaseLogEntry {
    logType: 'outcome';
    status: OutcomeStatus;
    objective?: number;
    pivots: number;
}

/**
 * Union of all log entry types
 */
export type LogEntry = StepLogEntry | OutcomeLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'problem'>;

export type StepLogInput = EntryInput<StepLogEntry>;
export type OutcomeLogInput = EntryInput<OutcomeLogEntry>;

/**
 * Logger interface
 */
export interface SolverLogger {
    /** Log a dictionary transition */
    logStep(entry: StepLogInput): void;
    /** Log the final outcome */
    logOutcome(entry: OutcomeLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Problem label stamped on every entry */
    problem: string;
    /** Schema version */
    schemaVersion?: string;
    /** Minimum level for console output */
    level?: LogLevel;
    /** Line sink for console output */
    write?: (line: string) => void;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger ====================

/**
 * Console Logger: print the step trace as text.
 *
 * Steps print at `debug` and `info`; outcome summaries only at `debug`,
 * since callers normally print the result themselves.
 */
export class ConsoleLogger implements SolverLogger {
    private level: LogLevel;
    private write: (line: string) => void;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.write = (line) => console.log(line);
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.write = levelOrConfig.write ?? ((line) => console.log(line));
        }
    }

    logStep(entry: StepLogInput): void {
        if (this.level !== 'debug' && this.level !== 'info') {
            return;
        }
        if (entry.pivot) {
            this.write(`==>Pivot on x${entry.pivot.entering} with row of x${entry.pivot.leaving}`);
        }
        for (const line of entry.lines) {
            this.write(line);
        }
    }

    logOutcome(entry: OutcomeLogInput): void {
        if (this.level === 'debug') {
            const objective = entry.objective === undefined ? '' : `, objective=${entry.objective}`;
            this.write(`[OUTCOME] status=${entry.status}${objective}, pivots=${entry.pivots}`);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: keep entries in memory.
 * Useful for tests and for exporting a run as JSON/JSONL.
 */
export class MemoryLogger implements SolverLogger {
    private config: { problem: string; schemaVersion: string };
    public steps: StepLogEntry[] = [];
    public outcomes: OutcomeLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            problem: config.problem,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            problem: this.config.problem,
            timestamp: Date.now(),
        };
    }

    logStep(entry: StepLogInput): void {
        this.steps.push({
            ...this.createBaseEntry(),
            logType: 'step',
            ...entry,
        });
    }

    logOutcome(entry: OutcomeLogInput): void {
        this.outcomes.push({
            ...this.createBaseEntry(),
            logType: 'outcome',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.steps, ...this.outcomes];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            steps: this.steps,
            outcomes: this.outcomes,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.steps = [];
        this.outcomes = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: write to multiple loggers simultaneously
 */
export class MultiLogger implements SolverLogger {
    private loggers: SolverLogger[];

    constructor(loggers: SolverLogger[]) {
        this.loggers = loggers;
    }

    logStep(entry: StepLogInput): void {
        for (const logger of this.loggers) {
            logger.logStep(entry);
        }
    }

    logOutcome(entry: OutcomeLogInput): void {
        for (const logger of this.loggers) {
            logger.logOutcome(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): SolverLogger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
