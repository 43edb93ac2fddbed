/**
 * Structured run logging to a file
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Replay event for structured logging
 */
export interface ReplayEvent {
  type: 'replay';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  logEvent(event: Omit<ReplayEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  runName: string
): Logger {
  if (!enabled) {
    return {
      logEvent: () => undefined,
      close: () => undefined,
      filePath: null,
    };
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(runName, path.extname(runName)) || 'replay';
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    logEvent(eventData: Omit<ReplayEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'replay' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
