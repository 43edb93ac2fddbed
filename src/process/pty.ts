/**
 * PTY process management for external commands
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import type { Environment } from '../script/types.js';
import { PTY_COLS, PTY_ROWS } from '../utils/constants.js';

export interface CommandProcessOptions {
  file: string;
  args: string[];
  cwd: string;
  env: Environment;
  /** Receives terminal output (defaults to process.stdout) */
  onOutput?: (data: string) => void;
}

export interface CommandResult {
  exitCode: number;
  signal: number | undefined;
  duration: number;
}

/**
 * Forward operator keystrokes to the child while it runs
 * Returns a function that detaches the forwarding
 */
function forwardInput(ptyProcess: IPty): () => void {
  const stdin = process.stdin;
  if (!stdin.isTTY) {
    return () => undefined;
  }

  const onData = (data: Buffer): void => {
    ptyProcess.write(data.toString('utf-8'));
  };
  stdin.setRawMode(true);
  stdin.on('data', onData);
  stdin.resume();

  return () => {
    stdin.off('data', onData);
    stdin.setRawMode(false);
    stdin.pause();
  };
}

/**
 * Spawn a command under a pseudo-terminal and wait for it to exit
 */
export function spawnCommand(
  options: CommandProcessOptions
): Promise<CommandResult> {
  const {
    file,
    args,
    cwd,
    env,
    onOutput = (data: string) => {
      process.stdout.write(data);
    },
  } = options;

  return new Promise((resolve) => {
    const runStart = Date.now();

    const ptyProcess: IPty = pty.spawn(file, args, {
      name: 'xterm-256color',
      cols: process.stdout.columns || PTY_COLS,
      rows: process.stdout.rows || PTY_ROWS,
      cwd,
      env,
    });

    const detach = forwardInput(ptyProcess);

    ptyProcess.onData((data: string) => {
      onOutput(data);
    });

    ptyProcess.onExit(({ exitCode, signal }) => {
      detach();
      const duration = Date.now() - runStart;
      resolve({ exitCode, signal, duration });
    });
  });
}
