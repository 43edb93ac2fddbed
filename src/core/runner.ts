/**
 * Execution driver: pulls lines from the source stack, echoes, records and
 * dispatches them, and turns pauses into operator input
 */

import type { HandlerProvider } from '../aliases/loader.js';
import type { AliasRegistry, ScriptContext } from '../aliases/registry.js';
import {
  formatDuration,
  printEcho,
  printLineError,
  printReplay,
} from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { formatPrompt } from '../output/prompt.js';
import { openTranscript, type Transcript } from '../output/transcript.js';
import type { History, LineReader } from '../process/terminal.js';
import {
  createInteractiveSource,
  createSourceStack,
  type Environment,
  isSourceCommand,
  openScriptFile,
  type ScriptLine,
  type SourceEntry,
  type SourceStack,
} from '../script/index.js';
import type { RunnerConfig } from '../types/runner.js';
import { errorMessage, LineError } from './errors.js';

export interface RunnerContext {
  config: RunnerConfig;
  logger: Logger;
  registry: AliasRegistry;
  provider: HandlerProvider;
  reader: LineReader;
  history: History;
  /** Shared environment (process.env in production) */
  env: Environment;
}

/**
 * Outcome of executing a single line
 */
export type LineOutcome =
  | { kind: 'continue' }
  | { kind: 'pause' }
  | { kind: 'exit' }
  | { kind: 'failed'; error: unknown };

export interface RunSummary {
  /** Lines pulled from any source */
  lines: number;
  /** Lines that failed (reported and skipped) */
  errors: number;
  /** Whether the run ended through `exit` */
  exited: boolean;
}

/**
 * Per-run state reachable from handlers
 */
export interface RunState extends ScriptContext {
  exitRequested: boolean;
}

/**
 * Execute one line and report how the run should proceed
 */
export async function executeLine(
  line: ScriptLine,
  ctx: RunState
): Promise<LineOutcome> {
  try {
    switch (line.type) {
      case 'comment':
        return { kind: 'continue' };
      case 'pause':
        return { kind: 'pause' };
      case 'export':
        Object.assign(ctx.env, line.vars);
        return { kind: 'continue' };
      case 'command': {
        const alias = ctx.registry.lookup(line.args[0] ?? '');
        await ctx.registry.execute(alias, ctx, line);
        return ctx.exitRequested ? { kind: 'exit' } : { kind: 'continue' };
      }
    }
  } catch (error) {
    return { kind: 'failed', error };
  }
}

/**
 * Report a failed line with its origin, plus the stack in debug mode
 */
function reportFailure(
  origin: string,
  lineNo: number,
  error: unknown,
  context: RunnerContext
): void {
  const message = errorMessage(error);
  printLineError(origin, lineNo, message);
  if (context.config.debug && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  context.logger.logEvent({
    event: 'line_error',
    origin,
    line: lineNo,
    error: message,
  });
}

/**
 * Run script files to completion
 *
 * @param files - Script files in order (`-` for standard input)
 * @param context - Shared dependencies and configuration
 * @returns Summary of the run
 */
export async function runScript(
  files: string[],
  context: RunnerContext
): Promise<RunSummary> {
  const { config, logger, registry, provider, reader, history, env } = context;
  const startTime = Date.now();
  const summary: RunSummary = { lines: 0, errors: 0, exited: false };

  const prompt = (): string =>
    formatPrompt(config.prompt, {
      nextcmd: history.length + 1,
      cwd: process.cwd(),
    });

  // Opening failures here are startup failures and propagate
  const stack: SourceStack = createSourceStack();
  let transcript: Transcript | null = null;
  try {
    for (const file of [...files].reverse()) {
      stack.push(openScriptFile(file, { env }));
    }
    if (config.output) {
      transcript = openTranscript(config.output);
    }
  } catch (error) {
    stack.close();
    throw error;
  }

  const pushInteractive = (): void => {
    stack.push(createInteractiveSource(reader, { env, prompt }));
  };

  const state: RunState = {
    env,
    registry,
    provider,
    exitRequested: false,
    exit(): void {
      state.exitRequested = true;
    },
    pushFile(fileName: string): void {
      stack.push(openScriptFile(fileName, { env }));
    },
  };

  logger.logEvent({ event: 'run_start', files });

  let recentPause = false;
  let triedFinalPause = false;

  try {
    for (;;) {
      let entry: SourceEntry | null;
      try {
        entry = await stack.next();
      } catch (error) {
        summary.errors++;
        const origin = error instanceof LineError ? error.origin : '<input>';
        const lineNo = error instanceof LineError ? error.lineNo : 0;
        reportFailure(origin, lineNo, error, context);
        continue;
      }

      if (!entry) {
        // Running out of input counts as one final pause
        if (triedFinalPause) break;
        triedFinalPause = true;
        if (!recentPause) {
          recentPause = true;
          pushInteractive();
        }
        continue;
      }

      const { echo, line } = entry;
      summary.lines++;
      logger.logEvent({
        event: 'line',
        origin: line.origin,
        line: line.lineNo,
        kind: line.type,
      });

      if (transcript && !isSourceCommand(line)) {
        transcript.write(line.text);
      }
      if (echo && line.output) {
        printEcho(prompt(), line.raw);
      }
      if (echo && (line.type === 'command' || line.type === 'export')) {
        history.add(line.raw);
      }

      const outcome = await executeLine(line, state);
      switch (outcome.kind) {
        case 'pause':
          logger.logEvent({
            event: 'pause',
            origin: line.origin,
            line: line.lineNo,
          });
          if (!recentPause) {
            recentPause = true;
            pushInteractive();
          }
          break;
        case 'failed':
          summary.errors++;
          reportFailure(line.origin, line.lineNo, outcome.error, context);
          break;
        case 'continue':
          recentPause = false;
          break;
        case 'exit':
          summary.exited = true;
          break;
      }

      if (summary.exited) break;
    }
  } finally {
    stack.close();
    transcript?.close();
  }

  const duration = Date.now() - startTime;
  logger.logEvent({ event: 'run_complete', ...summary, durationMs: duration });
  if (config.debug) {
    printReplay(
      `Run complete: ${summary.lines} lines, ${summary.errors} errors in ${formatDuration(duration)}`
    );
  }

  return summary;
}
