import { describe, expect, it, vi } from 'vitest';

import {
  aliasNameFor,
  createAliasRegistry,
} from '../../src/aliases/registry.js';
import { createCommandLine, createMockContext } from '../helpers/mocks.js';

describe('aliasNameFor', () => {
  it('strips a do_ prefix', () => {
    expect(aliasNameFor('do_deploy')).toBe('deploy');
  });

  it('strips a camel-case do prefix', () => {
    expect(aliasNameFor('doShowSlides')).toBe('showSlides');
  });

  it('keeps other names', () => {
    expect(aliasNameFor('download')).toBe('download');
    expect(aliasNameFor('greet')).toBe('greet');
  });
});

describe('createAliasRegistry', () => {
  it('looks up a registered alias by name', () => {
    const registry = createAliasRegistry();
    const handler = vi.fn();

    registry.register('hello', handler);

    expect(registry.lookup('hello').handler).toBe(handler);
    expect(registry.has('hello')).toBe(true);
  });

  it('falls back to the default alias for unknown names', () => {
    const registry = createAliasRegistry();
    const fallback = vi.fn();
    registry.register(null, fallback);

    const alias = registry.lookup('ls');

    expect(alias.name).toBeNull();
    expect(alias.handler).toBe(fallback);
  });

  it('throws when nothing matches and there is no default', () => {
    const registry = createAliasRegistry();

    expect(() => registry.lookup('ls')).toThrow(
      'No alias named "ls" and no default alias'
    );
  });

  it('derives the name from the handler function', () => {
    const registry = createAliasRegistry();
    function do_greet(): void {
      return undefined;
    }

    const alias = registry.register(do_greet);

    expect(alias.name).toBe('greet');
    expect(registry.names()).toEqual(['greet']);
  });

  it('rejects an anonymous handler without a name', () => {
    const registry = createAliasRegistry();

    expect(() => registry.register(() => undefined)).toThrow(
      'Cannot derive an alias name from an anonymous handler'
    );
  });

  it('replaces the handler in place when re-registered', async () => {
    const registry = createAliasRegistry();
    const first = vi.fn();
    const second = vi.fn();
    const held = registry.register('demo', first);

    const again = registry.register('demo', second);
    const ctx = createMockContext(registry);
    await registry.execute(
      registry.lookup('demo'),
      ctx,
      createCommandLine(['demo'])
    );

    expect(again).toBe(held);
    expect(held.handler).toBe(second);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('passes the context and line to the handler', async () => {
    const registry = createAliasRegistry();
    const handler = vi.fn();
    const alias = registry.register('demo', handler);
    const ctx = createMockContext(registry);
    const line = createCommandLine(['demo', 'x']);

    await registry.execute(alias, ctx, line);

    expect(handler).toHaveBeenCalledWith(ctx, line);
  });

  it('propagates handler errors unchanged', async () => {
    const registry = createAliasRegistry();
    const boom = new Error('boom');
    const alias = registry.register('demo', () => {
      throw boom;
    });

    await expect(
      registry.execute(
        alias,
        createMockContext(registry),
        createCommandLine(['demo'])
      )
    ).rejects.toBe(boom);
  });

  it('keeps registries independent', () => {
    const a = createAliasRegistry();
    const b = createAliasRegistry();

    a.register('only-a', vi.fn());

    expect(a.has('only-a')).toBe(true);
    expect(b.has('only-a')).toBe(false);
  });

  it('lists names without the default alias', () => {
    const registry = createAliasRegistry();
    registry.register(null, vi.fn());
    registry.register('b', vi.fn());
    registry.register('a', vi.fn());

    expect(registry.names()).toEqual(['a', 'b']);
  });
});
