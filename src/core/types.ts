import type { ZodRawShape } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { Logger } from './logger.js';

export type ToolExample = Readonly<{
  args: Readonly<Record<string, unknown>>;
  comment?: string;
}>;

// Piece of metadata about a tool. These feed straight into the agent ui:

// - inflight params & defaults
// - result shape
// - examples (runnable copy-paste)
// - notes (gotchas, etc).
export type ToolSpec = Readonly<{
  name: string;
  description: string;
  // IMPORTANT: the SDK expects a ZodRawShape (a flat object of fields), not a z.object(...)
  inputSchema?: ZodRawShape;
  outputSchema?: ZodRawShape;
  stability?: 'stable' | 'experimental' | 'deprecated';
  since?: string;
  examples?: ReadonlyArray<ToolExample>;
  notes?: string;
}>;

// Runtime instance of a tool.
export type Tool = Readonly<{
  spec: ToolSpec;
  invoke: (args: unknown) => Promise<unknown>;
}>;

// Tool context carried into each factory - env, fetch, clock, logger and the registry view.
export type ToolContext = Readonly<{
  env: Readonly<Record<string, string | undefined>>;
  fetch: typeof fetch;
  now: () => Date;
  cwd?: () => string;
  logger?: Logger;
  listTools?: () => readonly Tool[];
}>;

// Factory that creates a tool given the runtime context.
export type ToolFactory = (ctx: ToolContext) => Tool;

// Transports which can start/stop the Model Context Protocol server.
export type Transport = Readonly<{
  start: (server: McpServer) => Promise<void>;
  stop?: () => Promise<void>;
}>;
