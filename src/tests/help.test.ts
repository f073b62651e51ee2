import test from 'ava';
import { z } from 'zod';

import { buildRegistry } from '../core/registry.js';
import type { ToolFactory } from '../core/types.js';
import { help } from '../tools/help.js';
import { createFetchStub, createTestContext } from './helpers/github-stub.js';

const current: ToolFactory = () => ({
  spec: {
    name: 'github_current',
    description: 'A current tool.',
    inputSchema: {
      repo: z.string().optional().describe('Repository reference.'),
      path: z.string(),
    },
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { path: 'README.md' } }],
  },
  invoke: async () => null,
});

const retired: ToolFactory = () => ({
  spec: { name: 'github_retired', description: 'Old.', stability: 'deprecated' },
  invoke: async () => null,
});

const registryWith = (factories: readonly ToolFactory[]) =>
  buildRegistry(factories, createTestContext(createFetchStub({}).fetch));

test('describes registered tools and their inputs', async (t) => {
  const registry = registryWith([current, help]);
  const tool = registry.get('mcp_help');
  if (!tool) return t.fail('mcp_help missing');

  const result = await tool.invoke({});

  t.deepEqual(result, {
    tools: [
      {
        name: 'github_current',
        description: 'A current tool.',
        stability: 'stable',
        since: '0.1.0',
        inputs: [
          { name: 'repo', description: 'Repository reference.', optional: true },
          { name: 'path', description: null, optional: false },
        ],
        examples: [{ args: { path: 'README.md' } }],
        notes: '',
      },
      {
        name: 'mcp_help',
        description: 'List available tools with their inputs, examples and notes.',
        stability: 'stable',
        since: '0.1.0',
        inputs: [{ name: 'includeDeprecated', description: null, optional: true }],
        examples: [],
        notes: '',
      },
    ],
  });
});

test('hides deprecated tools unless asked', async (t) => {
  const registry = registryWith([current, retired, help]);
  const tool = registry.get('mcp_help');
  if (!tool) return t.fail('mcp_help missing');

  const names = async (args: unknown) =>
    z
      .object({ tools: z.array(z.object({ name: z.string(), stability: z.string() })) })
      .parse(await tool.invoke(args))
      .tools.map((entry) => `${entry.name}:${entry.stability}`);

  t.deepEqual(await names({}), ['github_current:stable', 'mcp_help:stable']);
  t.deepEqual(await names({ includeDeprecated: true }), [
    'github_current:stable',
    'github_retired:deprecated',
    'mcp_help:stable',
  ]);
});

test('rejects unknown arguments', async (t) => {
  const tool = registryWith([help]).get('mcp_help');
  if (!tool) return t.fail('mcp_help missing');

  await t.throwsAsync(() => tool.invoke({ verbose: true }));
});
