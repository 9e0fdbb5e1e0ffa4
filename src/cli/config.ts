/**
 * @module cli/config
 * @description Command-line help texts and the built-in example program
 */

export const USAGE = `
Usage:
  simplex <file> [options]

Options:
  -h, --help           Show this help message
  -no, --no-steps      Do not print the dictionary after each pivot
  -p, --precision N    Decimal places in printed numbers (default: 6)
  -v, --verbose        Also print a one-line outcome summary

Without <file>, the built-in example is solved.
`.trim();

export const INPUT_FORMAT = `
The input file describes a maximization problem in standard form:
  line 1:            numVar numCon
  next numCon lines: numVar numbers each (matrix A, one row per constraint)
  next line:         numCon numbers (vector b)
  last line:         numVar numbers (vector c)
Everything after '#' on a line is ignored.

For example, maximize  x0 + 2 x1 + 0.5 x2
             subject to  x0 + x1 + x2 <= 5
                         x0 <= 3
                         x1 <= 1
                         x2 <= 4
                         x0, x1, x2 >= 0
is written as
  3 4
  1 1 1
  1 0 0
  0 1 0
  0 0 1
  5 3 1 4
  1 2 0.5
`.trim();

export const EXAMPLE_PROBLEM = `
3 4        # 3 variables and 4 constraints
1 1 1
1 0 0
0 1 0
0 0 1
5 3 1 4    # vector b
1 2 0.5    # vector c
`;
