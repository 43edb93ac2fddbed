/**
 * Built-in aliases: the default command runner plus import, from, cd, unset,
 * exit and source
 */

import * as os from 'os';

import {
  CommandFailedError,
  ImportError,
  ScriptSyntaxError,
} from '../core/errors.js';
import { spawnCommand } from '../process/pty.js';
import type { ScriptLine } from '../script/types.js';
import {
  type AliasHandler,
  type AliasRegistry,
  aliasNameFor,
  type ScriptContext,
} from './registry.js';

/**
 * Read a property from an object or function, if there is one
 */
function getAttribute(target: unknown, name: string): unknown {
  if (
    (typeof target === 'object' && target !== null) ||
    typeof target === 'function'
  ) {
    const value: unknown = Reflect.get(target, name);
    return value;
  }
  return undefined;
}

/**
 * Default alias: run the words as an external command
 * The child sees the shared environment overlaid by the line's assignments.
 */
export async function runExternal(
  ctx: ScriptContext,
  line: ScriptLine
): Promise<void> {
  const [file, ...args] = line.args;
  if (file === undefined) {
    return;
  }

  const { exitCode, signal } = await spawnCommand({
    file,
    args,
    cwd: process.cwd(),
    env: { ...ctx.env, ...line.vars },
  });

  // node-pty reports a signalled child as exit code 0 plus the signal
  if (exitCode !== 0 || signal) {
    throw new CommandFailedError(line.args.join(' '), exitCode, signal);
  }
}

/**
 * `import <module>` - the module registers its own aliases through its
 * exported `register(register)` function
 */
export async function doImport(
  ctx: ScriptContext,
  line: ScriptLine
): Promise<void> {
  const specifier = line.args[1];
  if (line.args.length !== 2 || specifier === undefined) {
    throw new ScriptSyntaxError(
      'Invalid "import" statement; use as "import <module>"'
    );
  }

  const loaded = await ctx.provider.load(specifier);
  const register = getAttribute(loaded, 'register');
  if (typeof register !== 'function') {
    throw new ImportError(
      `Module ${specifier} does not export a register() function`
    );
  }

  const result: unknown = Reflect.apply(register, loaded, [
    ctx.registry.register,
  ]);
  await result;
}

/**
 * `from <module> import <name> [as <alias>]` - register one function
 */
export async function doFrom(
  ctx: ScriptContext,
  line: ScriptLine
): Promise<void> {
  const [, specifier, importWord, attrPath, asWord, aliasName] = line.args;
  const arity = line.args.length;
  if (
    (arity !== 4 && arity !== 6) ||
    importWord !== 'import' ||
    (arity === 6 && asWord !== 'as') ||
    specifier === undefined ||
    attrPath === undefined
  ) {
    throw new ScriptSyntaxError(
      'Invalid "from" statement; use as ' +
        '"from <module> import <func> [as <alias>]"'
    );
  }

  const loaded = await ctx.provider.load(specifier);

  // Walk the dotted path, keeping the owner for `this`
  let owner: unknown = undefined;
  let target: unknown = loaded;
  for (const elem of attrPath.split('.')) {
    owner = target;
    target = getAttribute(target, elem);
  }

  if (typeof target !== 'function') {
    throw new ImportError(`No such callable ${attrPath} in module ${specifier}`);
  }

  const fn = target;
  const handler: AliasHandler = async (handlerCtx, handlerLine) => {
    const result: unknown = Reflect.apply(fn, owner, [handlerCtx, handlerLine]);
    await result;
  };

  const lastElem = attrPath.split('.').pop() ?? attrPath;
  const derived = fn.name && fn.name !== 'default' ? fn.name : lastElem;
  ctx.registry.register(aliasName ?? aliasNameFor(derived), handler);
}

/**
 * `cd [dir]` - change the working directory (home by default)
 */
export function doCd(ctx: ScriptContext, line: ScriptLine): void {
  const directory = line.args[1] ?? ctx.env['HOME'] ?? os.userInfo().homedir;
  process.chdir(directory);
}

/**
 * `unset NAME...` - remove variables from the environment
 */
export function doUnset(ctx: ScriptContext, line: ScriptLine): void {
  for (const name of line.args.slice(1)) {
    if (name in ctx.env) {
      delete ctx.env[name];
    }
  }
}

/**
 * `exit` - stop after this line
 */
export function doExit(ctx: ScriptContext): void {
  ctx.exit();
}

/**
 * `. <file>` / `source <file>` - read another script file next
 */
export function doSource(ctx: ScriptContext, line: ScriptLine): void {
  const fileName = line.args[1];
  if (line.args.length !== 2 || fileName === undefined) {
    throw new ScriptSyntaxError(
      `Invalid "${line.args[0] ?? '.'}" statement; use as ". <file>"`
    );
  }
  ctx.pushFile(fileName);
}

/**
 * Install the built-in aliases on a registry
 */
export function registerBuiltins(registry: AliasRegistry): AliasRegistry {
  registry.register(null, runExternal);
  registry.register('import', doImport);
  registry.register('from', doFrom);
  registry.register('cd', doCd);
  registry.register('unset', doUnset);
  registry.register('exit', doExit);
  registry.register('.', doSource);
  registry.register('source', doSource);
  return registry;
}
