#!/usr/bin/env node
/**
 * script-replay - replays shell command scripts for live demonstrations,
 * pausing for the operator at blank lines
 */

import { registerBuiltins } from './aliases/builtins.js';
import { createModuleLoader } from './aliases/loader.js';
import { createAliasRegistry } from './aliases/registry.js';
import { parseArgs } from './cli/args.js';
import { type RunnerContext, runScript } from './core/runner.js';
import { printReplay } from './output/colors.js';
import { createLogger } from './output/logger.js';
import { createHistory, createTerminalReader } from './process/terminal.js';
import { DEFAULT_CONFIG, type RunnerConfig } from './types/runner.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: RunnerConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const logger = createLogger(
    config.enableLog,
    config.logDir,
    parsed.files[0] ?? 'replay'
  );
  if (config.debug && logger.filePath) {
    printReplay(`Log: ${logger.filePath}`);
  }

  const history = createHistory();
  const reader = createTerminalReader({ history });

  const context: RunnerContext = {
    config,
    logger,
    registry: registerBuiltins(createAliasRegistry()),
    provider: createModuleLoader(),
    reader,
    history,
    env: process.env,
  };

  try {
    await runScript(parsed.files, context);
  } finally {
    reader.close();
    logger.close();
  }
  process.exit(0);
}

// Run main
main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
