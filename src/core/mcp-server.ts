// src/core/mcp-server.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

import { isResolutionError } from '../repo/errors.js';
import { isGithubApiError } from '../tools/github/api.js';
import { silentLogger, type Logger } from './logger.js';
import type { Tool } from './types.js';

export const SERVER_NAME = 'github-intel-mcp';
export const SERVER_VERSION = '0.1.0';

export type ToolErrorPayload = Readonly<{
  error: string;
  tool: string;
  kind?: string;
  hint?: string;
  status?: number;
}>;

export type CreateMcpServerOptions = Readonly<{
  logger?: Logger;
}>;

const toText = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null) {
    return 'null';
  }

  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const formatZodIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

/** Shape any thrown value into the payload returned with `isError: true`. */
export const describeToolError = (tool: string, error: unknown): ToolErrorPayload => {
  if (isResolutionError(error)) {
    return {
      error: error.message,
      tool,
      kind: error.kind,
      ...(error.hint === undefined ? {} : { hint: error.hint }),
    };
  }
  if (isGithubApiError(error)) {
    return {
      error: error.message,
      tool,
      kind: 'GithubApiError',
      status: error.status,
      ...(error.hint === undefined ? {} : { hint: error.hint }),
    };
  }
  if (error instanceof ZodError) {
    return { error: `Invalid arguments: ${formatZodIssues(error)}`, tool, kind: 'InvalidArguments' };
  }
  if (error instanceof Error) {
    return { error: error.message, tool };
  }
  return { error: String(error), tool };
};

const toSuccessResult = (tool: Tool, result: unknown): CallToolResult => {
  const text = toText(result);
  // structuredContent is only valid (and only checked) when the tool declares an output shape
  if (tool.spec.outputSchema && isRecord(result)) {
    return { content: [{ type: 'text', text }], structuredContent: result };
  }
  return { content: [{ type: 'text', text }] };
};

const toErrorResult = (payload: ToolErrorPayload): CallToolResult => ({
  content: [{ type: 'text', text: toText(payload) }],
  isError: true,
});

export const createMcpServer = (
  tools: readonly Tool[],
  options: CreateMcpServerOptions = {},
): McpServer => {
  const logger = options.logger ?? silentLogger;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const t of tools) {
    server.registerTool(
      t.spec.name,
      {
        title: t.spec.name,
        description: t.spec.description,
        inputSchema: t.spec.inputSchema ?? {},
        ...(t.spec.outputSchema ? { outputSchema: t.spec.outputSchema } : {}),
        annotations: { readOnlyHint: true, openWorldHint: true },
      },
      async (args: unknown): Promise<CallToolResult> => {
        try {
          return toSuccessResult(t, await t.invoke(args));
        } catch (error) {
          const payload = describeToolError(t.spec.name, error);
          logger.warn(`${t.spec.name} failed: ${payload.error}`);
          return toErrorResult(payload);
        }
      },
    );
  }

  return server;
};
