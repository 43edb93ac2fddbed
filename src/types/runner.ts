/**
 * Runner configuration types
 */

import { DEFAULT_LOG_DIR, DEFAULT_PROMPT } from '../utils/constants.js';

/**
 * Runner configuration
 */
export interface RunnerConfig {
  /** Transcript file receiving every executed line, or null */
  output: string | null;
  /** Prompt template (`{nextcmd}`, `{cwd}`) */
  prompt: string;
  /** Print stack traces for failed lines and a closing summary */
  debug: boolean;
  enableLog: boolean;
  logDir: string;
}

/**
 * Default runner configuration
 */
export const DEFAULT_CONFIG: RunnerConfig = {
  output: null,
  prompt: DEFAULT_PROMPT,
  debug: false,
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Script files in the order given (`-` for standard input) */
  files: string[];
  config: Partial<RunnerConfig>;
}
