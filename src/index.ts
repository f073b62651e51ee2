import { pathToFileURL } from 'node:url';
import 'dotenv/config';

import { loadConfigWithSource, type ConfigSource } from './config/load-config.js';
import { createLogger, isLogLevel, type LogLevel, type Logger } from './core/logger.js';
import { createMcpServer } from './core/mcp-server.js';
import { buildRegistry } from './core/registry.js';
import { selectTools } from './core/tool-selection.js';
import { stdioTransport } from './core/transports/stdio.js';
import type { ToolContext, ToolFactory } from './core/types.js';
import { githubCompareCommits } from './tools/github/compare.js';
import { githubListCommits } from './tools/github/commits.js';
import { githubGetFile } from './tools/github/contents.js';
import { githubGetIssue, githubListIssues } from './tools/github/issues.js';
import {
  githubGetPull,
  githubListPullFiles,
  githubListPulls,
} from './tools/github/pull-requests.js';
import { githubRateLimitTool } from './tools/github/rate-limit.js';
import { githubRepoInfo, githubResolveRepo } from './tools/github/repository.js';
import {
  githubGetWorkflowRun,
  githubListWorkflowRuns,
  githubWorkflowGetJobLogs,
  githubWorkflowGetRunLogs,
} from './tools/github/workflows.js';
import { help as helpTool } from './tools/help.js';

export * as repo from './repo/index.js';
export { createMcpServer, describeToolError } from './core/mcp-server.js';
export { buildRegistry } from './core/registry.js';
export type { Tool, ToolContext, ToolFactory, ToolSpec } from './core/types.js';

const toolCatalog: ReadonlyMap<string, ToolFactory> = new Map<string, ToolFactory>([
  ['github_resolve_repo', githubResolveRepo],
  ['github_repo_info', githubRepoInfo],
  ['github_get_file', githubGetFile],
  ['github_compare_commits', githubCompareCommits],
  ['github_list_workflow_runs', githubListWorkflowRuns],
  ['github_get_workflow_run', githubGetWorkflowRun],
  ['github_workflow_get_run_logs', githubWorkflowGetRunLogs],
  ['github_workflow_get_job_logs', githubWorkflowGetJobLogs],
  ['github_list_issues', githubListIssues],
  ['github_get_issue', githubGetIssue],
  ['github_list_commits', githubListCommits],
  ['github_list_pulls', githubListPulls],
  ['github_get_pull', githubGetPull],
  ['github_list_pull_files', githubListPullFiles],
  ['github_rate_limit', githubRateLimitTool],
  ['mcp_help', helpTool],
]);

const describeSource = (source: ConfigSource): string => {
  switch (source.type) {
    case 'file':
      return source.path;
    case 'env':
      return 'MCP_CONFIG_JSON';
    case 'default':
      return 'defaults';
  }
};

const pickLogLevel = (
  env: Readonly<Record<string, string | undefined>>,
  configured: LogLevel,
): LogLevel => {
  const override = env.MCP_LOG_LEVEL?.trim().toLowerCase();
  return override && isLogLevel(override) ? override : configured;
};

export type MainOptions = Readonly<{
  env?: Readonly<Record<string, string | undefined>>;
  argv?: readonly string[];
  cwd?: string;
  logger?: Logger;
}>;

export const main = async (options: MainOptions = {}): Promise<void> => {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const { config: cfg, source } = loadConfigWithSource(env, options.argv ?? process.argv, cwd);
  const logger = options.logger ?? createLogger('mcp', pickLogLevel(env, cfg.logLevel));

  logger.debug(`config loaded from ${describeSource(source)}`);
  if (!env.GITHUB_TOKEN?.trim()) {
    logger.warn('GITHUB_TOKEN is not set; requests are unauthenticated and heavily rate limited.');
  }

  const ctx: ToolContext = {
    env,
    fetch: globalThis.fetch.bind(globalThis),
    now: () => new Date(),
    cwd: () => cwd,
    logger: logger.child('tools'),
  };

  const selection = selectTools(toolCatalog, {
    tools: cfg.tools,
    includeHelp: cfg.includeHelp,
    logger,
  });
  const registry = buildRegistry(selection.factories, ctx);
  const server = createMcpServer(registry.list(), { logger: logger.child('server') });
  const transport = stdioTransport({ logger: logger.child('stdio') });
  logger.info(`transport = stdio (${selection.ids.length} tools)`);
  await transport.start(server);
};

const shouldRunMain = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(entry).href === import.meta.url;
  } catch {
    return false;
  }
};

// Export the toolCatalog for testing
export { toolCatalog };

if (shouldRunMain()) {
  main().catch((err: unknown) => {
    console.error('[mcp] fatal', err);
    process.exit(1);
  });
}
