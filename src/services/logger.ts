// src/services/logger.ts: structured logging for the MCP server
import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function resolveMinLevel(raw: string | undefined): number {
  return LOG_LEVELS[(raw ?? '').trim().toLowerCase()] ?? LOG_LEVELS.info;
}

export const logger = new Logger<ILogObj>({
  name: 'hotel-content-mcp',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: 'pretty',
  overwrite: {
    // stdout belongs to the stdio transport
    transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
      console.error(logMetaMarkup, ...logArgs, ...logErrors);
    },
  },
});
