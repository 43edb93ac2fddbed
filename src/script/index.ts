/**
 * Script module - tokenizing, substitution, classification and sources
 */

// Types
export type { Environment, LineType, ScriptLine } from './types.js';
export { STDIN_ORIGIN } from './types.js';

// Classifier
export { classifyLine, isSourceCommand } from './parser.js';
export { splitWords } from './tokenizer.js';

// Variables
export { createScope, expandHome, substitute } from './variables.js';

// Sources
export type {
  InputSource,
  InteractiveSourceOptions,
  ScriptFileOptions,
  SourceEntry,
  SourceStack,
} from './sources.js';
export {
  createInteractiveSource,
  createSourceStack,
  openScriptFile,
} from './sources.js';
