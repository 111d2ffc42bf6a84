/**
 * MCP server (stdio): the hotel content tools for desktop/IDE clients.
 * Run: npm run mcp  (or npx tsx src/mcp/server.ts)
 * stdout carries the protocol; all logging goes to stderr.
 */
import '@/config/load-env';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { buildMcpServer } from '@/mcp/build-server';
import { createRuntime } from '@/mcp/runtime';

async function main() {
  const config = loadConfig();
  const server = buildMcpServer(createRuntime(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Hotel content MCP server running on stdio');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
