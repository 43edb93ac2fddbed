import * as fs from 'fs';
import * as path from 'path';
import { PassThrough } from 'stream';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { LineError } from '../../src/core/errors.js';
import { classifyLine } from '../../src/script/parser.js';
import {
  createInteractiveSource,
  createSourceStack,
  type InputSource,
  openScriptFile,
} from '../../src/script/sources.js';
import type { ScriptLine } from '../../src/script/types.js';
import {
  createEnv,
  createMockReader,
  createTempFiles,
} from '../helpers/mocks.js';

/**
 * Drain a source into its lines' raw text
 */
async function drain(source: InputSource): Promise<string[]> {
  const out: string[] = [];
  for (;;) {
    const line = await source.next();
    if (!line) return out;
    out.push(`${line.type}:${line.raw}`);
  }
}

/**
 * In-memory source over pre-classified lines
 */
function createFakeSource(texts: string[], echo = true): InputSource {
  const lines: ScriptLine[] = texts.map((t, i) =>
    classifyLine('fake', i + 1, t, {})
  );
  return {
    echo,
    next: () => Promise.resolve(lines.shift() ?? null),
    close: vi.fn(),
  };
}

describe('openScriptFile', () => {
  let dir: string;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('yields classified lines with origin and line numbers', async () => {
    dir = createTempFiles({ 'a.script': '# intro\necho hi\n' });
    const file = path.join(dir, 'a.script');
    const source = openScriptFile(file, { env: createEnv() });

    const first = await source.next();
    const second = await source.next();

    expect(source.echo).toBe(true);
    expect(first?.type).toBe('comment');
    expect(first?.origin).toBe(file);
    expect(first?.lineNo).toBe(1);
    expect(second?.args).toEqual(['echo', 'hi']);
    expect(second?.lineNo).toBe(2);
    expect(await source.next()).toBeNull();
  });

  it('skips leading blank lines', async () => {
    dir = createTempFiles({ 'a.script': '\n\n\nls\n' });
    const source = openScriptFile(path.join(dir, 'a.script'), {
      env: createEnv(),
    });

    expect(await drain(source)).toEqual(['command:ls']);
  });

  it('yields a blank line that follows a command', async () => {
    dir = createTempFiles({ 'a.script': 'one\n\ntwo\n' });
    const source = openScriptFile(path.join(dir, 'a.script'), {
      env: createEnv(),
    });

    expect(await drain(source)).toEqual([
      'command:one',
      'pause:',
      'command:two',
    ]);
  });

  it('collapses a run of blank lines into one pause', async () => {
    dir = createTempFiles({ 'a.script': 'one\n\n\n\npause\ntwo\n\n' });
    const source = openScriptFile(path.join(dir, 'a.script'), {
      env: createEnv(),
    });

    expect(await drain(source)).toEqual([
      'command:one',
      'pause:',
      'command:two',
      'pause:',
    ]);
  });

  it('classifies each line when it is pulled', async () => {
    dir = createTempFiles({ 'a.script': 'echo $X\necho $X\n' });
    const env = createEnv();
    const source = openScriptFile(path.join(dir, 'a.script'), { env });

    const first = await source.next();
    env['X'] = 'set';
    const second = await source.next();

    expect(first?.args).toEqual(['echo', '']);
    expect(second?.args).toEqual(['echo', 'set']);
  });

  it('reports a bad line and keeps reading', async () => {
    dir = createTempFiles({ 'a.script': 'echo "open\nls\n' });
    const file = path.join(dir, 'a.script');
    const source = openScriptFile(file, { env: createEnv() });

    const failure = await source.next().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LineError);
    expect(failure).toMatchObject({ origin: file, lineNo: 1 });
    expect((await source.next())?.args).toEqual(['ls']);
  });

  it('throws immediately for a missing file', () => {
    expect(() =>
      openScriptFile('/nonexistent/dir/missing.script', { env: createEnv() })
    ).toThrow('ENOENT');
  });

  it('throws immediately for a directory', () => {
    dir = createTempFiles({});

    expect(() => openScriptFile(dir, { env: createEnv() })).toThrow(
      `EISDIR: illegal operation on a directory, open '${dir}'`
    );
  });

  it('tags a read failure with the origin and next line number', async () => {
    const stdin = new PassThrough();
    const source = openScriptFile('-', { env: createEnv(), stdin });
    stdin.write('echo first\n');
    await source.next();

    stdin.destroy(new Error('input device gone'));
    const failure = await source.next().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LineError);
    expect(failure).toMatchObject({
      origin: '<stdin>',
      lineNo: 2,
      message: 'input device gone',
    });
    expect(await source.next()).toBeNull();
  });

  it('reads - from standard input', async () => {
    const stdin = new PassThrough();
    const source = openScriptFile('-', { env: createEnv(), stdin });
    stdin.end('echo piped\n');

    const line = await source.next();

    expect(line?.origin).toBe('<stdin>');
    expect(line?.args).toEqual(['echo', 'piped']);
    expect(await source.next()).toBeNull();
  });

  it('returns null after close', async () => {
    dir = createTempFiles({ 'a.script': 'one\ntwo\n' });
    const source = openScriptFile(path.join(dir, 'a.script'), {
      env: createEnv(),
    });

    source.close();

    expect(await source.next()).toBeNull();
  });
});

describe('createInteractiveSource', () => {
  it('reads operator lines until a blank line', async () => {
    const reader = createMockReader(['ls -l', '', 'never read']);
    const source = createInteractiveSource(reader, {
      env: createEnv(),
      prompt: () => 'P> ',
    });

    const line = await source.next();

    expect(source.echo).toBe(false);
    expect(line?.origin).toBe('<stdin>');
    expect(line?.args).toEqual(['ls', '-l']);
    expect(await source.next()).toBeNull();
    expect(await source.next()).toBeNull();
    expect(reader.prompts).toEqual(['P> ', 'P> ']);
  });

  it('ends at end of input', async () => {
    const source = createInteractiveSource(createMockReader([]), {
      env: createEnv(),
      prompt: () => '> ',
    });

    expect(await source.next()).toBeNull();
  });

  it('ends at a pause command', async () => {
    const source = createInteractiveSource(
      createMockReader(['pause', 'ls']),
      { env: createEnv(), prompt: () => '> ' }
    );

    expect(await source.next()).toBeNull();
  });

  it('does not skip blank lines like a file does', async () => {
    const reader = createMockReader(['', 'ls']);
    const source = createInteractiveSource(reader, {
      env: createEnv(),
      prompt: () => '> ',
    });

    expect(await source.next()).toBeNull();
    expect(reader.readLine).toHaveBeenCalledTimes(1);
  });

  it('computes the prompt for every read', async () => {
    let n = 0;
    const reader = createMockReader(['a', 'b']);
    const source = createInteractiveSource(reader, {
      env: createEnv(),
      prompt: () => `[${++n}]> `,
    });

    await drain(source);

    expect(reader.prompts).toEqual(['[1]> ', '[2]> ', '[3]> ']);
  });
});

describe('createSourceStack', () => {
  it('reads from the most recently pushed source first', async () => {
    const stack = createSourceStack();
    stack.push(createFakeSource(['one']));
    stack.push(createFakeSource(['two'], false));

    const first = await stack.next();
    const second = await stack.next();

    expect(first?.line.raw).toBe('two');
    expect(first?.echo).toBe(false);
    expect(second?.line.raw).toBe('one');
    expect(second?.echo).toBe(true);
    expect(await stack.next()).toBeNull();
  });

  it('pops and closes exhausted sources', async () => {
    const stack = createSourceStack();
    const bottom = createFakeSource(['x']);
    const top = createFakeSource([]);
    stack.push(bottom);
    stack.push(top);

    await stack.next();

    expect(top.close).toHaveBeenCalled();
    expect(bottom.close).not.toHaveBeenCalled();
    expect(stack.size).toBe(1);
  });

  it('resumes the lower source after a nested push', async () => {
    const stack = createSourceStack();
    stack.push(createFakeSource(['a1', 'a2']));

    const first = await stack.next();
    stack.push(createFakeSource(['b1']));
    const rest = [await stack.next(), await stack.next()];

    expect(first?.line.raw).toBe('a1');
    expect(rest.map((e) => e?.line.raw)).toEqual(['b1', 'a2']);
  });

  it('returns null when empty', async () => {
    expect(await createSourceStack().next()).toBeNull();
  });

  it('closes every remaining source', () => {
    const stack = createSourceStack();
    const a = createFakeSource(['a']);
    const b = createFakeSource(['b']);
    stack.push(a);
    stack.push(b);

    stack.close();

    expect(a.close).toHaveBeenCalled();
    expect(b.close).toHaveBeenCalled();
    expect(stack.size).toBe(0);
  });
});
