/**
 * Alias registry: command name -> handler, with a fallback for unknown names
 */

import type { HandlerProvider } from './loader.js';
import type { Environment, ScriptLine } from '../script/types.js';

/**
 * What a handler can see and do while a line executes
 */
export interface ScriptContext {
  /** Environment shared by substitution, exports and spawned commands */
  readonly env: Environment;
  readonly registry: AliasRegistry;
  /** Loads modules for `import` and `from` */
  readonly provider: HandlerProvider;
  /** Stop the run after the current line */
  exit(): void;
  /** Read another script file before the rest of the current one */
  pushFile(fileName: string): void;
}

export type AliasHandler = (
  ctx: ScriptContext,
  line: ScriptLine
) => void | Promise<void>;

/**
 * A named handler binding; null names the fallback alias
 */
export interface Alias {
  readonly name: string | null;
  handler: AliasHandler;
}

/**
 * Registration callback handed to handler modules
 */
export interface RegisterFn {
  (handler: AliasHandler): Alias;
  (name: string | null, handler: AliasHandler): Alias;
}

export interface AliasRegistry {
  register: RegisterFn;
  /** Alias bound to name, or the fallback alias */
  lookup(name: string): Alias;
  has(name: string): boolean;
  names(): string[];
  execute(alias: Alias, ctx: ScriptContext, line: ScriptLine): Promise<void>;
}

/**
 * Derive an alias name from a function name
 * `do_cd` and `doCd` both become `cd`
 */
export function aliasNameFor(functionName: string): string {
  if (functionName.startsWith('do_')) {
    return functionName.slice(3);
  }
  const camel = /^do([A-Z])(.*)$/.exec(functionName);
  if (camel) {
    return (camel[1] ?? '').toLowerCase() + (camel[2] ?? '');
  }
  return functionName;
}

/**
 * Create an empty registry
 */
export function createAliasRegistry(): AliasRegistry {
  const aliases = new Map<string | null, Alias>();

  function register(handler: AliasHandler): Alias;
  function register(name: string | null, handler: AliasHandler): Alias;
  function register(
    nameOrHandler: string | null | AliasHandler,
    maybeHandler?: AliasHandler
  ): Alias {
    let name: string | null;
    let handler: AliasHandler;
    if (typeof nameOrHandler === 'function') {
      name = aliasNameFor(nameOrHandler.name);
      handler = nameOrHandler;
    } else if (maybeHandler) {
      name = nameOrHandler;
      handler = maybeHandler;
    } else {
      throw new TypeError('register() requires a handler');
    }

    if (name === '') {
      throw new TypeError('Cannot derive an alias name from an anonymous handler');
    }

    // Rebinding keeps the Alias object so held references see the new handler
    const existing = aliases.get(name);
    if (existing) {
      existing.handler = handler;
      return existing;
    }

    const alias: Alias = { name, handler };
    aliases.set(name, alias);
    return alias;
  }

  return {
    register,
    lookup(name: string): Alias {
      const alias = aliases.get(name) ?? aliases.get(null);
      if (!alias) {
        throw new Error(`No alias named "${name}" and no default alias`);
      }
      return alias;
    },
    has(name: string): boolean {
      return aliases.has(name);
    },
    names(): string[] {
      return [...aliases.keys()].filter((n): n is string => n !== null).sort();
    },
    async execute(
      alias: Alias,
      ctx: ScriptContext,
      line: ScriptLine
    ): Promise<void> {
      await alias.handler(ctx, line);
    },
  };
}
