/**
 * Shared JSON parse for upstream bodies. The only source of PARSE_ERROR envelopes.
 */
import { logger } from '@/services/logger';
import { envelopeErr, envelopeOk, type Envelope } from '@/mcp/envelope';

export function parseJsonDocument(raw: string, context: string): Envelope<unknown> {
  try {
    return envelopeOk<unknown>(JSON.parse(raw));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('safeParseJson:parse_error', { context, error: message, raw: raw.slice(0, 300) });
    return envelopeErr('PARSE_ERROR', `${context}: document is not valid JSON`);
  }
}
