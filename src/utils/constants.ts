/**
 * Centralized constants for the interpreter
 */

// === Prompt ===
/** Default prompt template; `{nextcmd}` is the next history index */
export const DEFAULT_PROMPT = '[{nextcmd}]> ';

// === Terminal ===
/** Maximum recall history entries kept */
export const DEFAULT_HISTORY_SIZE = 1000;

// === PTY Configuration ===
/** Terminal column width when stdout is not a terminal */
export const PTY_COLS = 120;
/** Terminal row count when stdout is not a terminal */
export const PTY_ROWS = 40;

// === Logging ===
/** Default directory for structured run logs */
export const DEFAULT_LOG_DIR = 'logs';
