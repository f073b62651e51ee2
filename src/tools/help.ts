import { z, type ZodRawShape } from 'zod';

import type { ToolExample, ToolFactory, ToolSpec } from '../core/types.js';

type HelpInputEntry = Readonly<{
  name: string;
  description: string | null;
  optional: boolean;
}>;

type HelpToolEntry = Readonly<{
  name: string;
  description: string;
  stability: NonNullable<ToolSpec['stability']>;
  since: string | null;
  inputs: readonly HelpInputEntry[];
  examples: ReadonlyArray<ToolExample>;
  notes: string;
}>;

const describeInputs = (shape: ZodRawShape | undefined): readonly HelpInputEntry[] =>
  Object.entries(shape ?? {}).map(([name, schema]) => ({
    name,
    description: schema.description ?? null,
    optional: schema.isOptional(),
  }));

const HelpOutputShape = {
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      stability: z.enum(['stable', 'experimental', 'deprecated']),
      since: z.string().nullable(),
      inputs: z.array(
        z.object({
          name: z.string(),
          description: z.string().nullable(),
          optional: z.boolean(),
        }),
      ),
      examples: z.array(
        z.object({ args: z.record(z.unknown()), comment: z.string().optional() }),
      ),
      notes: z.string(),
    }),
  ),
} as const;

export const help: ToolFactory = (ctx) => {
  const Schema = z
    .object({
      includeDeprecated: z.boolean().optional(),
    })
    .strict();

  const spec = {
    name: 'mcp_help',
    description: 'List available tools with their inputs, examples and notes.',
    inputSchema: Schema.shape,
    outputSchema: HelpOutputShape,
    stability: 'stable',
    since: '0.1.0',
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const parsed = Schema.parse(raw ?? {});
    const includeDeprecated = parsed.includeDeprecated ?? false;

    const registry = ctx.listTools?.() ?? [];
    const tools: readonly HelpToolEntry[] = registry.reduce<HelpToolEntry[]>((entries, tool) => {
      const stability = tool.spec.stability ?? 'experimental';
      if (!includeDeprecated && stability === 'deprecated') {
        return entries;
      }

      entries.push({
        name: tool.spec.name,
        description: tool.spec.description,
        stability,
        since: tool.spec.since ?? null,
        inputs: describeInputs(tool.spec.inputSchema),
        examples: tool.spec.examples ?? [],
        notes: tool.spec.notes ?? '',
      });
      return entries;
    }, []);
    return { tools };
  };

  return { spec, invoke };
};

export default help;
