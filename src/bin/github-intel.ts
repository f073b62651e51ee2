#!/usr/bin/env node
import process from 'node:process';

import { CONFIG_FILE_NAME } from '../config/load-config.js';
import { SERVER_NAME, SERVER_VERSION } from '../core/mcp-server.js';
import { main } from '../index.js';

const args = process.argv.slice(2);

const showUsage = (code = 0): never => {
  console.log(`Usage: ${SERVER_NAME} [options]

Serves read-only GitHub repository tools over MCP on stdio.

Options:
  -c, --config <path>  Path to ${CONFIG_FILE_NAME} (default: nearest one from cwd)
  -h, --help           Show this message
  -v, --version        Print the version

Environment:
  GITHUB_TOKEN             Token used for API requests (optional)
  GITHUB_BASE_URL          API root, e.g. a GitHub Enterprise /api/v3 URL
  GITHUB_API_VERSION       X-GitHub-Api-Version header value
  GITHUB_HTTP_TIMEOUT_MS   Request timeout in milliseconds
  GITHUB_USER_AGENT        User-Agent header value
  MCP_CONFIG_JSON          Inline configuration when no file is found
  MCP_LOG_LEVEL            debug | info | warn | error | silent
`);
  process.exit(code);
};

if (args.includes('--help') || args.includes('-h')) {
  showUsage(0);
}

if (args.includes('--version') || args.includes('-v')) {
  console.log(SERVER_VERSION);
  process.exit(0);
}

main().catch((err: unknown) => {
  console.error('[mcp] fatal', err);
  process.exit(1);
});
