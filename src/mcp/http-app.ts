/**
 * Express app for the Streamable HTTP transport. Stateless: one server/transport pair per POST,
 * sharing the same handlers.
 */
import express, { type Express, type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '@/services/logger';
import { buildMcpServer } from '@/mcp/build-server';
import type { HotelToolHandlers } from '@/mcp/handlers';

const log = logger.getSubLogger({ name: 'http' });

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0' as const, error: { code, message }, id: null };
}

export function createHttpApp(handlers: HotelToolHandlers): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const server = buildMcpServer(handlers);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch((err: unknown) => log.warn('mcp:transport_close_failed', { error: String(err) }));
      server.close().catch((err: unknown) => log.warn('mcp:server_close_failed', { error: String(err) }));
    });
    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      log.error('mcp:request_failed', { error: err instanceof Error ? err.message : String(err) });
      if (!res.headersSent) {
        res.status(500).json(jsonRpcError(-32603, 'Internal server error'));
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    res.status(405).json(jsonRpcError(-32000, 'Method not allowed'));
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  return app;
}
