/**
 * Shell-style word splitting
 *
 * Supports whitespace separation, single quotes (literal), double quotes
 * (backslash escapes only `"` and `\`) and backslash escapes outside quotes.
 * No operators, globbing or comments: `#`, `|` and `>` are ordinary characters.
 */

import { TokenizeError } from '../core/errors.js';

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

function isSpace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Parse a single-quoted section starting at the opening quote
 */
function parseSingleQuoted(
  input: string,
  startPos: number
): { value: string; endPos: number } {
  const close = input.indexOf("'", startPos + 1);
  if (close === -1) {
    throw new TokenizeError('No closing quotation');
  }
  return { value: input.slice(startPos + 1, close), endPos: close + 1 };
}

/**
 * Parse a double-quoted section starting at the opening quote
 */
function parseDoubleQuoted(
  input: string,
  startPos: number
): { value: string; endPos: number } {
  let result = '';
  let i = startPos + 1;

  while (i < input.length) {
    const char = charAt(input, i);

    if (char === '\\' && i + 1 < input.length) {
      const next = charAt(input, i + 1);
      // Only the quote and the escape character itself are escapable
      result += next === '"' || next === '\\' ? next : char + next;
      i += 2;
    } else if (char === '"') {
      return { value: result, endPos: i + 1 };
    } else {
      result += char;
      i++;
    }
  }

  throw new TokenizeError('No closing quotation');
}

/**
 * Split a line into words the way a POSIX shell would, minus expansion
 */
export function splitWords(input: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let i = 0;

  while (i < input.length) {
    const char = charAt(input, i);

    if (isSpace(char)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
      i++;
    } else if (char === "'") {
      const { value, endPos } = parseSingleQuoted(input, i);
      current += value;
      inWord = true;
      i = endPos;
    } else if (char === '"') {
      const { value, endPos } = parseDoubleQuoted(input, i);
      current += value;
      inWord = true;
      i = endPos;
    } else if (char === '\\') {
      if (i + 1 >= input.length) {
        throw new TokenizeError('No escaped character');
      }
      current += charAt(input, i + 1);
      inWord = true;
      i += 2;
    } else {
      current += char;
      inWord = true;
      i++;
    }
  }

  if (inWord) {
    words.push(current);
  }

  return words;
}
