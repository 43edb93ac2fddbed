/**
 * Script line classifier
 *
 * Turns one raw line into a typed, substituted ScriptLine:
 * - `!...`          suppress echo of the line
 * - `#!...`         shebang (line 1 only), silent comment
 * - `##...`         invisible comment
 * - `#...`          visible comment
 * - blank / `pause` pause, hand control to the operator
 * - `export A=1`    environment update
 * - `A=1 cmd args`  command with inline assignments
 */

import { splitWords } from './tokenizer.js';
import type { Environment, LineType, ScriptLine } from './types.js';
import { createScope, substitute } from './variables.js';

interface Header {
  type: LineType;
  output: boolean;
  raw: string;
  text: string;
}

/**
 * Classify by leading characters only (steps before word splitting)
 */
function classifyHeader(lineNo: number, trimmed: string): Header {
  let text = trimmed;
  let output = true;
  let suppressed = false;

  if (text.startsWith('!')) {
    text = text.slice(1);
    output = false;
    suppressed = true;
  }

  if (lineNo === 1 && text.startsWith('#!')) {
    return { type: 'comment', output: false, raw: text, text };
  }
  if (text.startsWith('##')) {
    return { type: 'comment', output: false, raw: text, text };
  }
  if (text.startsWith('#')) {
    // A suppressed ordinary comment still displays with its `!`
    return {
      type: 'comment',
      output: true,
      raw: suppressed ? `!${text}` : text,
      text,
    };
  }
  if (text === '') {
    return { type: 'pause', output: false, raw: text, text };
  }
  return { type: 'command', output, raw: text, text };
}

/**
 * Classify a raw line
 *
 * @param origin - File path or `<stdin>`
 * @param lineNo - 1-based line number within the origin
 * @param rawText - Line as read, untrimmed
 * @param env - Environment seeding the substitution scope
 */
export function classifyLine(
  origin: string,
  lineNo: number,
  rawText: string,
  env: Environment = process.env
): ScriptLine {
  const header = classifyHeader(lineNo, rawText.trim());

  if (header.type !== 'command') {
    return { origin, lineNo, ...header, vars: {}, args: [] };
  }

  const words = splitWords(header.text);

  if (words[0] === 'pause') {
    return {
      origin,
      lineNo,
      type: 'pause',
      output: false,
      raw: '',
      text: '',
      vars: {},
      args: [],
    };
  }

  let type: LineType = 'command';
  if (words[0] === 'export') {
    type = 'export';
    words.shift();
  }

  // Assignments are substituted left to right so later words see them
  const scope = createScope(env);
  const vars: Record<string, string> = {};
  let word = words[0];
  while (word !== undefined && (word.includes('=') || type === 'export')) {
    words.shift();
    const eq = word.indexOf('=');
    if (eq !== -1) {
      const name = word.slice(0, eq);
      const value = substitute(word.slice(eq + 1), scope);
      scope[name] = value;
      vars[name] = value;
    }
    word = words[0];
  }

  if (words.length === 0) {
    type = 'export';
  }

  return {
    origin,
    lineNo,
    raw: header.raw,
    text: header.text,
    type,
    output: header.output,
    vars,
    args: words.map((w) => substitute(w, scope)),
  };
}

/**
 * Whether a line invokes `.` / `source` (such lines are kept out of transcripts)
 */
export function isSourceCommand(line: ScriptLine): boolean {
  return (
    line.type === 'command' && (line.args[0] === '.' || line.args[0] === 'source')
  );
}
