/**
 * ANSI color codes for terminal output
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
} as const;

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = Math.round(totalSeconds % 60);
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  return `${mins}m${secs}s`;
}

/**
 * Format current timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Print a [REPLAY] status message with timestamp (debug output)
 */
export function printReplay(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.magenta}[REPLAY]${colors.reset} ${message}`
  );
}

/**
 * Report a failed line on stderr as `origin:line: message`
 */
export function printLineError(
  origin: string,
  lineNo: number,
  message: string
): void {
  console.error(
    `${colors.red}${origin}:${lineNo}:${colors.reset} ${message}`
  );
}

/**
 * Echo a script line behind its prompt
 */
export function printEcho(prompt: string, text: string): void {
  console.log(`${colors.bold}${prompt}${colors.reset}${text}`);
}
