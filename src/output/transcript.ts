/**
 * Transcript output: one line per executed line, written synchronously
 */

import * as fs from 'fs';

export interface Transcript {
  write(text: string): void;
  close(): void;
  filePath: string;
}

/**
 * Create (or truncate) a transcript file
 */
export function openTranscript(filePath: string): Transcript {
  let fd: number | null = fs.openSync(filePath, 'w');

  return {
    write(text: string): void {
      if (fd === null) {
        throw new Error(`Transcript already closed: ${filePath}`);
      }
      fs.writeSync(fd, text + '\n');
    },
    close(): void {
      if (fd !== null) {
        fs.closeSync(fd);
        fd = null;
      }
    },
    filePath,
  };
}
