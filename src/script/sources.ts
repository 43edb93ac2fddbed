/**
 * Input sources and the source stack
 *
 * Script files, nested includes and the operator's terminal all produce
 * ScriptLines; the stack reads from its top source and pops exhausted ones.
 */

import * as fs from 'fs';
import * as readline from 'readline';
import type { Readable } from 'stream';

import { LineError } from '../core/errors.js';
import type { LineReader } from '../process/terminal.js';
import { classifyLine } from './parser.js';
import { type Environment, type ScriptLine, STDIN_ORIGIN } from './types.js';

/**
 * A lazy, finite producer of script lines
 */
export interface InputSource {
  /** Lines from this source may be echoed (false for operator input) */
  readonly echo: boolean;
  /** Next line, or null once exhausted */
  next(): Promise<ScriptLine | null>;
  /** Release any handle held by the source */
  close(): void;
}

export interface ScriptFileOptions {
  /** Environment read when each line is classified */
  env: Environment;
  /** Stream used for `-` (defaults to process.stdin) */
  stdin?: Readable;
}

/**
 * Classify a line, tagging failures with their origin
 */
function classifyOrThrow(
  origin: string,
  lineNo: number,
  text: string,
  env: Environment
): ScriptLine {
  try {
    return classifyLine(origin, lineNo, text, env);
  } catch (error) {
    throw new LineError(origin, lineNo, error);
  }
}

/**
 * Open a file for reading, failing now for anything that is not a stream of
 * lines (a directory only fails on its first read otherwise)
 */
function openReadable(fileName: string): number {
  const fd = fs.openSync(fileName, 'r');
  const stats = fs.fstatSync(fd);
  if (stats.isFile() || stats.isFIFO() || stats.isCharacterDevice()) {
    return fd;
  }
  fs.closeSync(fd);
  throw new Error(
    stats.isDirectory()
      ? `EISDIR: illegal operation on a directory, open '${fileName}'`
      : `Not a readable script file: '${fileName}'`
  );
}

/**
 * Open a script file as an input source
 *
 * The file is opened immediately so a missing file fails here, not on first
 * read. `-` reads the script from standard input.
 */
export function openScriptFile(
  fileName: string,
  options: ScriptFileOptions
): InputSource {
  const { env, stdin = process.stdin } = options;
  const origin = fileName === '-' ? STDIN_ORIGIN : fileName;
  const stream =
    fileName === '-'
      ? stdin
      : fs.createReadStream(fileName, {
          fd: openReadable(fileName),
          encoding: 'utf-8',
        });
  const rl = readline.createInterface({
    input: stream,
    terminal: false,
    crlfDelay: Infinity,
  });
  const lines = rl[Symbol.asyncIterator]();

  let lineNo = 0;
  let inhibitPause = true;
  let closed = false;

  const close = (): void => {
    if (closed) return;
    closed = true;
    rl.close();
    if (stream !== stdin) {
      stream.destroy();
    }
  };

  return {
    echo: true,
    async next(): Promise<ScriptLine | null> {
      while (!closed) {
        let result: IteratorResult<string>;
        try {
          result = await lines.next();
        } catch (error) {
          close();
          throw new LineError(origin, lineNo + 1, error);
        }
        if (result.done) {
          close();
          return null;
        }

        lineNo++;
        let line: ScriptLine;
        try {
          line = classifyOrThrow(origin, lineNo, result.value, env);
        } catch (error) {
          inhibitPause = false;
          throw error;
        }

        // Leading and repeated pauses never reach the operator
        if (line.type === 'pause') {
          if (inhibitPause) continue;
          inhibitPause = true;
        } else {
          inhibitPause = false;
        }
        return line;
      }
      return null;
    },
    close,
  };
}

export interface InteractiveSourceOptions {
  env: Environment;
  /** Computes the prompt shown before each read */
  prompt: () => string;
}

/**
 * Operator input as a source; ends at a blank line (or `pause`) or at end of
 * input
 */
export function createInteractiveSource(
  reader: LineReader,
  options: InteractiveSourceOptions
): InputSource {
  const { env, prompt } = options;
  let lineNo = 0;
  let done = false;

  return {
    echo: false,
    async next(): Promise<ScriptLine | null> {
      if (done) return null;

      const text = await reader.readLine(prompt());
      if (text === null) {
        done = true;
        return null;
      }

      lineNo++;
      const line = classifyOrThrow(STDIN_ORIGIN, lineNo, text, env);
      if (line.type === 'pause') {
        done = true;
        return null;
      }
      return line;
    },
    close(): void {
      done = true;
    },
  };
}

/**
 * A line together with the echo eligibility of its source
 */
export interface SourceEntry {
  echo: boolean;
  line: ScriptLine;
}

export interface SourceStack {
  readonly size: number;
  push(source: InputSource): void;
  /** Next line from the top source, popping exhausted sources; null when empty */
  next(): Promise<SourceEntry | null>;
  /** Close and drop every remaining source */
  close(): void;
}

/**
 * Create an empty source stack
 */
export function createSourceStack(): SourceStack {
  const sources: InputSource[] = [];

  return {
    get size(): number {
      return sources.length;
    },
    push(source: InputSource): void {
      sources.push(source);
    },
    async next(): Promise<SourceEntry | null> {
      let top = sources[sources.length - 1];
      while (top) {
        const line = await top.next();
        if (line) {
          return { echo: top.echo, line };
        }
        sources.pop();
        top.close();
        top = sources[sources.length - 1];
      }
      return null;
    },
    close(): void {
      for (const source of sources.splice(0).reverse()) {
        source.close();
      }
    },
  };
}
