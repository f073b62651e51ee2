import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { silentLogger, type Logger } from '../logger.js';
import type { Transport } from '../types.js';

export type StdioTransportOptions = Readonly<{
  logger?: Logger;
}>;

export const stdioTransport = (options: StdioTransportOptions = {}): Transport => {
  const logger = options.logger ?? silentLogger;
  let connected: McpServer | undefined;

  return {
    start: async (server: McpServer) => {
      await server.connect(new StdioServerTransport());
      connected = server;
      logger.info('transport started');
    },
    stop: async () => {
      if (!connected) return;
      const server = connected;
      connected = undefined;
      await server.close();
      logger.info('transport stopped');
    },
  };
};
