/**
 * Module loading for `import` and `from`
 */

import * as path from 'path';
import { pathToFileURL } from 'url';

import { errorMessage, ImportError } from '../core/errors.js';

/**
 * Locates and loads handler modules
 */
export interface HandlerProvider {
  load(specifier: string): Promise<unknown>;
}

/**
 * Whether a specifier names a file rather than a package
 */
function isFileSpecifier(specifier: string): boolean {
  return specifier.startsWith('.') || path.isAbsolute(specifier);
}

/**
 * Create a provider backed by dynamic import()
 *
 * @param baseDir - Resolves relative specifiers (defaults to the working
 *   directory at load time)
 */
export function createModuleLoader(baseDir?: string): HandlerProvider {
  return {
    async load(specifier: string): Promise<unknown> {
      const target = isFileSpecifier(specifier)
        ? pathToFileURL(path.resolve(baseDir ?? process.cwd(), specifier)).href
        : specifier;

      try {
        const loaded: unknown = await import(target);
        return loaded;
      } catch (error) {
        throw new ImportError(
          `Cannot load module ${specifier}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    },
  };
}
