/**
 * @module io/parser
 * @description Parse the plain-text problem format
 *
 * ```text
 * numVar numCon
 * A[0][0] ... A[0][numVar-1]
 * ...                          (numCon rows)
 * b[0] ... b[numCon-1]
 * c[0] ... c[numVar-1]
 * ```
 *
 * `#` starts a comment, blank lines are skipped and a vector of length 0
 * takes no line.
 */

import { MalformedInputError } from '../core/errors';
import type { LinearProgram } from '../simplex/types';

const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const COUNT_PATTERN = /^\d+$/;

interface SourceLine {
    /** 1-based line number in the original text */
    line: number;
    tokens: string[];
}

function tokenize(text: string): SourceLine[] {
    const lines: SourceLine[] = [];
    text.split(/\r?\n/).forEach((raw, index) => {
        const hash = raw.indexOf('#');
        const content = hash >= 0 ? raw.slice(0, hash) : raw;
        const tokens = content.trim().split(/\s+/).filter(token => token.length > 0);
        if (tokens.length > 0) {
            lines.push({ line: index + 1, tokens });
        }
    });
    return lines;
}

class LineReader {
    private position = 0;

    constructor(private readonly lines: SourceLine[]) {}

    next(field: string, expected: string): SourceLine {
        const source = this.lines[this.position];
        if (source === undefined) {
            throw new MalformedInputError(
                `Unexpected end of input while reading ${field}: expected ${expected}`,
                { field, expected, received: 'end of input' }
            );
        }
        this.position++;
        return source;
    }

    /** First leftover line, if any */
    rest(): SourceLine | undefined {
        return this.lines[this.position];
    }
}

function parseReal(token: string, field: string, line: number): number {
    const value = Number(token);
    if (!REAL_PATTERN.test(token) || !Number.isFinite(value)) {
        throw new MalformedInputError(
            `Line ${line}: ${field} contains "${token}", which is not a real number`,
            { field, line, expected: 'decimal real number', received: token }
        );
    }
    return value;
}

function parseCount(token: string | undefined, field: string, line: number): number {
    if (token === undefined || !COUNT_PATTERN.test(token)) {
        throw new MalformedInputError(
            `Line ${line}: ${field} must be a nonnegative integer, got ${token === undefined ? 'nothing' : `"${token}"`}`,
            { field, line, expected: 'nonnegative integer', received: token ?? '' }
        );
    }
    return Number(token);
}

function readVector(reader: LineReader, length: number, field: string): number[] {
    if (length === 0) {
        return [];
    }
    const expected = `${length} real number${length === 1 ? '' : 's'}`;
    const source = reader.next(field, expected);
    if (source.tokens.length !== length) {
        throw new MalformedInputError(
            `Line ${source.line}: ${field} has ${source.tokens.length} value${source.tokens.length === 1 ? '' : 's'}, expected ${length}`,
            { field, line: source.line, expected, received: `${source.tokens.length} values` }
        );
    }
    return source.tokens.map(token => parseReal(token, field, source.line));
}

/**
 * Parse problem text into matrices.
 *
 * @throws MalformedInputError on a missing line, a wrong token count, a
 *   non-numeric token or trailing content
 */
export function parseProblem(text: string): LinearProgram {
    const reader = new LineReader(tokenize(text));

    const header = reader.next('header', 'numVar numCon');
    if (header.tokens.length !== 2) {
        throw new MalformedInputError(
            `Line ${header.line}: header must hold exactly two integers "numVar numCon"`,
            { field: 'header', line: header.line, expected: 'numVar numCon', received: header.tokens.join(' ') }
        );
    }
    const numVar = parseCount(header.tokens[0], 'numVar', header.line);
    const numCon = parseCount(header.tokens[1], 'numCon', header.line);

    const A: number[][] = [];
    for (let r = 0; r < numCon; r++) {
        A.push(readVector(reader, numVar, `A[${r}]`));
    }
    const b = readVector(reader, numCon, 'b');
    const c = readVector(reader, numVar, 'c');

    const extra = reader.rest();
    if (extra !== undefined) {
        throw new MalformedInputError(
            `Line ${extra.line}: unexpected content after the objective line`,
            { field: 'trailing', line: extra.line, expected: 'end of input', received: extra.tokens.join(' ') }
        );
    }

    return { A, b, c, numVar };
}
