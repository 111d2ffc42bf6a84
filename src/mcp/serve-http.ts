/**
 * Persistent HTTP MCP server: all hotel content tools on one long-lived process.
 * Run: npm run mcp:serve  (or npx tsx src/mcp/serve-http.ts)
 */
import '@/config/load-env';
import { loadConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { createHttpApp } from '@/mcp/http-app';
import { createRuntime } from '@/mcp/runtime';

function main() {
  const config = loadConfig();
  const app = createHttpApp(createRuntime(config));
  app.listen(config.server.httpPort, () => {
    logger.info(`Hotel content MCP HTTP server listening on port ${config.server.httpPort}`);
  });
}

try {
  main();
} catch (err) {
  console.error('Fatal error:', err);
  process.exit(1);
}
