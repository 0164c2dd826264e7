/**
 * G-Code Parser Module
 *
 * Turns program text into commands, one line at a time. Words that do not
 * carry a valid number are dropped with a warning rather than failing the
 * line, since printer programs routinely carry vendor-specific noise.
 */

import {
  GCodeCommand,
  LineParseResult,
  ParseWarning,
  ProgramParseResult,
} from "@mewpath/types";

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/** One or more letter-number words with no separator, e.g. "G1X10Y-5" */
const TOKEN_PATTERN = /^(?:[A-Z][+\-.\d]+)+$/;

/** Splits "G1X10Y-5" into ["G1", "X10", "Y-5"] */
const WORD_PATTERN = /[A-Z][^A-Z]+/g;

/** Letters that select a command rather than carry an axis value */
const CODE_LETTERS = new Set(["G", "M"]);

/**
 * Removes "( ... )" blocks and everything after ';'.
 */
function stripComments(line: string): { code: string; comment?: string } {
  const semicolon = line.indexOf(";");
  let code = semicolon >= 0 ? line.slice(0, semicolon) : line;
  const comment =
    semicolon >= 0 ? line.slice(semicolon + 1).trim() : undefined;
  code = code.replace(/\([^)]*\)?/g, " ");
  return { code, comment };
}

/**
 * Normalizes a command number so "G01" and "G1.0" both read "G1".
 */
function normalizeCode(letter: string, value: number): string {
  return `${letter}${value}`;
}

/**
 * Parse a single line of G-code.
 *
 * The first G or M word is the command code. Every other word is stored
 * under its letter in `axisValues`, including letters the caller does not
 * know about (U, A, E, ...). Leading N words are ignored.
 *
 * @param line - Raw line text
 * @param lineNumber - 1-based line number used in commands and warnings
 * @returns The command, or null for blank and comment-only lines, plus any
 *   warnings for dropped words
 *
 * @example
 * ```typescript
 * const { command } = parseLine("G1 X10 U90 ; first pass");
 * // command.code === "G1"
 * // command.axisValues => { X: 10, U: 90 }
 * ```
 */
export function parseLine(line: string, lineNumber: number = 1): LineParseResult {
  const { code: body, comment } = stripComments(line);
  const warnings: ParseWarning[] = [];

  let code: string | null = null;
  const axisValues: Record<string, number> = {};

  // "X 10" is read as "X10"
  const tokens = body.replace(/([A-Za-z])\s+(?=[+\-.\d])/g, "$1").split(/\s+/);

  for (const token of tokens) {
    // Empty tokens and "%" program delimiters
    if (!token || token === "%") continue;

    const upper = token.toUpperCase();
    if (!TOKEN_PATTERN.test(upper)) {
      warnings.push({
        lineNumber,
        word: token,
        message: `Malformed word '${token}'`,
      });
      continue;
    }

    for (const word of upper.match(WORD_PATTERN) ?? []) {
      const letter = word[0];
      const raw = word.slice(1);

      if (!NUMBER_PATTERN.test(raw)) {
        warnings.push({
          lineNumber,
          word,
          message: `Invalid value for word '${letter}': '${raw}'`,
        });
        continue;
      }

      const value = parseFloat(raw);
      if (letter === "N") continue;

      if (CODE_LETTERS.has(letter)) {
        // Only the first code on a line is used
        if (code === null) code = normalizeCode(letter, value);
        continue;
      }

      axisValues[letter] = value;
    }
  }

  if (code === null) {
    return { command: null, warnings };
  }

  const command: GCodeCommand = { code, axisValues, lineNumber };
  if (comment) command.comment = comment;
  return { command, warnings };
}

/**
 * Parse a whole G-code program.
 *
 * @param source - Program text; lines may end in "\n" or "\r\n"
 * @returns Commands in file order, warnings and the source line count
 */
export function parseProgram(source: string): ProgramParseResult {
  const lines = source.split(/\r?\n/);
  const commands: GCodeCommand[] = [];
  const warnings: ParseWarning[] = [];

  lines.forEach((line, index) => {
    const result = parseLine(line, index + 1);
    if (result.command) commands.push(result.command);
    warnings.push(...result.warnings);
  });

  return { commands, warnings, totalLines: lines.length };
}
