/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type { ParsedArgs, RunnerConfig } from '../types/runner.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: script-replay [options] <file...>';

/**
 * Fetch the value following an option, exiting when it is missing
 */
function optionValue(args: string[], index: number, option: string): string {
  const value = args[index];
  if (value === undefined) {
    console.error(`Error: ${option} requires a value`);
    console.error(USAGE);
    process.exit(1);
  }
  return value;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config: Partial<RunnerConfig> = {};
  const files: string[] = [];
  let optionsDone = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (optionsDone || arg === '-' || !arg.startsWith('-')) {
      files.push(arg);
    } else if (arg === '--') {
      optionsDone = true;
    } else if (arg === '--output' || arg === '-o') {
      config.output = optionValue(args, ++i, arg);
    } else if (arg.startsWith('--output=')) {
      config.output = arg.slice('--output='.length);
    } else if (arg === '--prompt' || arg === '-p') {
      config.prompt = optionValue(args, ++i, arg);
    } else if (arg.startsWith('--prompt=')) {
      config.prompt = arg.slice('--prompt='.length);
    } else if (arg === '--debug' || arg === '-d') {
      config.debug = true;
    } else if (arg === '--log') {
      config.enableLog = true;
    } else if (arg === '--log-dir') {
      config.enableLog = true;
      config.logDir = optionValue(args, ++i, arg);
    } else {
      console.error(`Error: unknown option '${arg}'`);
      console.error(USAGE);
      process.exit(1);
    }
  }

  if (files.length === 0) {
    console.error('Error: at least one script file required');
    console.error(USAGE);
    process.exit(1);
  }

  return { files, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
script-replay - replay shell command scripts for live demos

${USAGE}

Each line is echoed behind the prompt and then run. A blank line (or "pause")
hands control to you: type commands, then an empty line to resume the script.

Script syntax:
  NAME=value cmd args        Run cmd with NAME set for that command only
  export NAME=value          Set NAME for the rest of the run
  . file / source file       Run another script, then continue this one
  cd [dir] / unset NAME      Change directory / remove a variable
  import mod                 Load aliases from a module's register() export
  from mod import fn [as x]  Register one function as an alias
  exit                       Stop immediately
  # text / ## text           Visible / invisible comment
  !line                      Run line without echoing it

Options:
  -o, --output <file>   Write every executed line to a transcript file
  -p, --prompt <tmpl>   Prompt template; {nextcmd} and {cwd} are filled in
                        (default "[{nextcmd}]> ")
  -d, --debug           Print stack traces for failed lines
  --log                 Write a structured run log under ./logs
  --log-dir <dir>       Write the run log under <dir>
  -V, --version         Print the version
  -h, --help            Show this help
`);
}
