/**
 * Variable substitution and home-directory expansion
 */

import * as os from 'os';

import { MalformedTemplateError } from '../core/errors.js';
import type { Environment } from './types.js';

/**
 * Placeholder grammar, tried in order: `$$`, `$name`, `${name}`, anything else
 * (the empty final group marks an invalid placeholder)
 */
const PLACEHOLDER = /\$(?:(\$)|([_a-z][_a-z0-9]*)|\{([_a-z][_a-z0-9]*)\}|())/gi;

/**
 * Build a MalformedTemplateError pointing at the offending `$`
 */
function invalidPlaceholder(text: string, offset: number): MalformedTemplateError {
  const before = text.slice(0, offset).split('\n');
  const line = before.length;
  const col = (before[before.length - 1] ?? '').length + 1;
  return new MalformedTemplateError(
    `Invalid placeholder in string: line ${line}, col ${col}`
  );
}

/**
 * The invoking user's passwd entry, or null when it has none
 */
function currentUser(): os.UserInfo<string> | null {
  try {
    return os.userInfo();
  } catch {
    return null;
  }
}

/**
 * Expand a leading `~` or `~user` to a home directory
 * Only the invoking user can be looked up; other users, and a user with no
 * passwd entry, are left as-is
 */
export function expandHome(text: string, env: Environment = process.env): string {
  if (!text.startsWith('~')) {
    return text;
  }

  const slash = text.indexOf('/', 1);
  const user = slash === -1 ? text.slice(1) : text.slice(1, slash);
  const rest = slash === -1 ? '' : text.slice(slash);

  const envHome = env['HOME'];
  let home: string;
  if (user === '' && envHome !== undefined) {
    home = envHome;
  } else {
    const info = currentUser();
    if (!info || (user !== '' && info.username !== user)) {
      return text;
    }
    home = info.homedir;
  }

  return home.replace(/\/+$/, '') + rest || '/';
}

/**
 * Substitute `$NAME` / `${NAME}` placeholders from scope
 * Unset names become empty strings; `$$` is a literal dollar sign.
 * A leading `~` in the result is expanded afterwards.
 */
export function substitute(text: string, scope: Environment): string {
  const result = text.replace(
    PLACEHOLDER,
    (
      _match: string,
      escaped: string | undefined,
      named: string | undefined,
      braced: string | undefined,
      _invalid: string | undefined,
      offset: number
    ) => {
      if (escaped !== undefined) return '$';
      const name = named ?? braced;
      if (name !== undefined) return scope[name] ?? '';
      throw invalidPlaceholder(text, offset);
    }
  );

  return expandHome(result, scope);
}

/**
 * Copy the string-valued entries of an environment into a fresh scope
 */
export function createScope(env: Environment): Record<string, string> {
  const scope: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      scope[name] = value;
    }
  }
  return scope;
}
