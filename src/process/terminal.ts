/**
 * Operator terminal: line reading with recall history
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';

import { DEFAULT_HISTORY_SIZE } from '../utils/constants.js';

/**
 * Recall history, most recent entry first (readline's ordering)
 */
export interface History {
  readonly entries: readonly string[];
  readonly length: number;
  add(line: string): void;
  replace(entries: readonly string[]): void;
}

/**
 * Create an in-memory recall history
 */
export function createHistory(limit: number = DEFAULT_HISTORY_SIZE): History {
  let entries: string[] = [];

  return {
    get entries(): readonly string[] {
      return entries;
    },
    get length(): number {
      return entries.length;
    },
    add(line: string): void {
      if (line === '' || entries[0] === line) return;
      entries.unshift(line);
      if (entries.length > limit) {
        entries.length = limit;
      }
    },
    replace(next: readonly string[]): void {
      entries = next.slice(0, limit);
    },
  };
}

/**
 * Source of operator input
 */
export interface LineReader {
  /** Resolves with the next line, or null at end of input */
  readLine(prompt: string): Promise<string | null>;
  close(): void;
}

export interface TerminalReaderOptions {
  input?: Readable & { isTTY?: boolean };
  output?: Writable;
  history: History;
}

/**
 * TTY reader: one readline interface per read, so spawned commands get the
 * terminal to themselves between prompts
 */
function createTtyReader(
  input: Readable,
  output: Writable,
  history: History
): LineReader {
  return {
    readLine(prompt: string): Promise<string | null> {
      if (input.readableEnded) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        let settled = false;
        const rl = readline.createInterface({
          input,
          output,
          terminal: true,
          history: [...history.entries],
          historySize: DEFAULT_HISTORY_SIZE,
        });

        const finish = (answer: string | null): void => {
          if (settled) return;
          settled = true;
          rl.close();
          resolve(answer);
        };

        rl.on('history', (entries: string[]) => {
          history.replace(entries);
        });
        rl.on('SIGINT', () => {
          output.write('\n');
          finish(null);
        });
        rl.on('close', () => {
          finish(null);
        });
        rl.question(prompt, (answer) => {
          finish(answer);
        });
      });
    },
    close: () => undefined,
  };
}

/**
 * Piped reader: one interface for the whole run so lines buffered ahead of
 * the current read are not lost
 */
function createPipedReader(
  input: Readable,
  output: Writable,
  history: History
): LineReader {
  const queued: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];
  let rl: readline.Interface | null = null;
  let ended = false;

  // Attached on first read so a script read from stdin gets it first
  const attach = (): void => {
    if (rl || ended) return;
    if (input.readableEnded) {
      ended = true;
      return;
    }
    rl = readline.createInterface({ input, terminal: false });
    rl.on('line', (line) => {
      const waiter = waiting.shift();
      if (waiter) {
        waiter(line);
      } else {
        queued.push(line);
      }
    });
    rl.on('close', () => {
      ended = true;
      for (const waiter of waiting.splice(0)) {
        waiter(null);
      }
    });
  };

  return {
    readLine(prompt: string): Promise<string | null> {
      output.write(prompt);
      attach();
      const take = (line: string | null): string | null => {
        if (line !== null && line.trim() !== '') {
          history.add(line.trim());
        }
        return line;
      };

      const line = queued.shift();
      if (line !== undefined) {
        return Promise.resolve(take(line));
      }
      if (ended) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push((next) => {
          resolve(take(next));
        });
      });
    },
    close(): void {
      rl?.close();
    },
  };
}

/**
 * Create a reader for the operator's terminal (stdin/stdout by default)
 */
export function createTerminalReader(options: TerminalReaderOptions): LineReader {
  const { input = process.stdin, output = process.stdout, history } = options;

  if (input.isTTY) {
    return createTtyReader(input, output, history);
  }
  return createPipedReader(input, output, history);
}
