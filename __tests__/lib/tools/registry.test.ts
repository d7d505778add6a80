import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';

import { LLMTransportError, StoreUnavailableError } from '@/lib/errors';
import { SourceCollector } from '@/lib/sources/source-collector';
import { ToolRegistry } from '@/lib/tools/registry';
import type { Tool } from '@/lib/tools/types';

const EchoSchema = z.object({ n: z.number() });

function echoTool(execute?: Tool<z.infer<typeof EchoSchema>>['execute']): Tool<z.infer<typeof EchoSchema>> {
  return {
    name: 'echo',
    description: 'Echo a number',
    inputSchema: EchoSchema,
    execute: execute ?? (async (input) => `n=${input.n}`),
  };
}

const context = { sources: new SourceCollector() };

describe('ToolRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('dispatches by name with validated input', async () => {
    const registry = new ToolRegistry().register(echoTool());

    expect(await registry.execute('echo', { n: 4 }, context)).toBe('n=4');
  });

  it('exposes definitions for the model', () => {
    const registry = new ToolRegistry().register(echoTool());

    expect(registry.names()).toEqual(['echo']);
    expect(registry.has('echo')).toBe(true);
    expect(registry.definitions()).toEqual([
      { name: 'echo', description: 'Echo a number', inputSchema: EchoSchema },
    ]);
  });

  it('rejects duplicate names', () => {
    const registry = new ToolRegistry().register(echoTool());

    expect(() => registry.register(echoTool())).toThrow("Tool 'echo' is already registered");
  });

  it('reports unknown tools as text', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const registry = new ToolRegistry();

    expect(await registry.execute('missing', {}, context)).toBe("Tool 'missing' not found");
  });

  it('reports invalid arguments as text', async () => {
    const execute = vi.fn(async () => 'unused');
    const registry = new ToolRegistry().register(echoTool(execute));

    expect(await registry.execute('echo', { n: 'four' }, context)).toBe(
      "Invalid arguments for tool 'echo': n: Expected number, received string"
    );
    expect(await registry.execute('echo', undefined, context)).toBe(
      "Invalid arguments for tool 'echo': input: Required"
    );
    expect(execute).not.toHaveBeenCalled();
  });

  it('reports recoverable tool failures as text', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const registry = new ToolRegistry().register(
      echoTool(async () => {
        throw new Error('boom');
      })
    );

    expect(await registry.execute('echo', { n: 1 }, context)).toBe("Tool 'echo' failed: boom");
  });

  it('rethrows fatal failures', async () => {
    const store = new ToolRegistry().register(
      echoTool(async () => {
        throw new StoreUnavailableError('index offline');
      })
    );
    const transport = new ToolRegistry().register(
      echoTool(async () => {
        throw new LLMTransportError('provider offline');
      })
    );

    await expect(store.execute('echo', { n: 1 }, context)).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(transport.execute('echo', { n: 1 }, context)).rejects.toBeInstanceOf(LLMTransportError);
  });
});
