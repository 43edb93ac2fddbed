/**
 * Types for classified script lines
 */

/**
 * Line categories produced by the classifier
 */
export type LineType = 'comment' | 'pause' | 'command' | 'export';

/**
 * Environment the interpreter reads and writes (process.env by default)
 */
export type Environment = Record<string, string | undefined>;

/**
 * A single classified line, immutable once built
 */
export interface ScriptLine {
  /** File path, or `<stdin>` for standard input and interactive lines */
  readonly origin: string;
  /** 1-based position within the origin */
  readonly lineNo: number;
  /** Display text (echoed behind the prompt) */
  readonly raw: string;
  /** Text with any leading `!` removed (written to the transcript) */
  readonly text: string;
  readonly type: LineType;
  /** Whether the line is echoed before it runs */
  readonly output: boolean;
  /** Inline assignments, or the export set for export lines */
  readonly vars: Readonly<Record<string, string>>;
  /** Substituted words; args[0] is the command name */
  readonly args: readonly string[];
}

/** Origin label for standard input and the interactive terminal */
export const STDIN_ORIGIN = '<stdin>';
