import test from 'ava';

import { buildRegistry } from '../core/registry.js';
import type { ToolFactory } from '../core/types.js';

const fakeTool: ToolFactory = () => ({
  spec: { name: 'hello', description: 'hi' },
  invoke: async () => ({ ok: true }),
});

const listingTool: ToolFactory = (ctx) => ({
  spec: { name: 'listing', description: 'names the registered tools' },
  invoke: async () => (ctx.listTools?.() ?? []).map((tool) => tool.spec.name),
});

test('registry builds & finds tool', (t) => {
  const reg = buildRegistry([fakeTool], { env: {}, fetch, now: () => new Date() });
  t.truthy(reg.get('hello'));
  t.is(reg.get('missing'), undefined);
  t.is(reg.list().length, 1);
});

test('factories see the whole registry through listTools', async (t) => {
  const reg = buildRegistry([listingTool, fakeTool], { env: {}, fetch, now: () => new Date() });
  const listing = reg.get('listing');
  if (!listing) return t.fail('listing missing');

  t.deepEqual(await listing.invoke({}), ['listing', 'hello']);
});
