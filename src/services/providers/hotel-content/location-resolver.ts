/**
 * Resolves a free-text place name to the vendor's numeric CITY location id via the autocomplete endpoint.
 * A fresh call per lookup; no retry, no cache.
 */
import { logger } from '@/services/logger';
import { parseJsonDocument } from '@/services/safe-parse-json';
import { asArray, path } from '@/services/extraction/json-node';
import { envelopeErr, envelopeOk, type Envelope } from '@/mcp/envelope';
import { AUTOCOMPLETE_PATH, type UpstreamClient } from '@/services/providers/hotel-content/upstream-client';

const log = logger.getSubLogger({ name: 'autocomplete' });

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

export interface LocationResolverOptions {
  language: string;
  size: number;
}

export interface LocationLookup {
  resolve(query: string): Promise<Envelope<number>>;
}

/** Base-10 integer in the signed 32-bit range; anything else is undefined. */
export function parseLocationId(raw: unknown): number | undefined {
  if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
  const text = String(raw).trim();
  if (!/^[+-]?\d+$/.test(text)) return undefined;
  const id = Number(text);
  return id >= INT32_MIN && id <= INT32_MAX ? id : undefined;
}

/** First CITY location across `items[].locations[]` in document order whose id parses. */
export function firstCityLocationId(root: unknown): number | undefined {
  const locations = asArray(path(root, 'items')).flatMap((item) => asArray(path(item, 'locations')));
  for (const location of locations) {
    if (path(location, 'locationType') !== 'CITY') continue;
    const rawId = path(location, 'id');
    const id = parseLocationId(rawId);
    if (id === undefined) {
      log.error('autocomplete:unparsable_id', { id: rawId ?? null });
      continue;
    }
    return id;
  }
  return undefined;
}

export class LocationResolver implements LocationLookup {
  constructor(
    private readonly upstream: UpstreamClient,
    private readonly options: LocationResolverOptions,
  ) {}

  async resolve(query: string): Promise<Envelope<number>> {
    const body = { query, language: this.options.language, size: this.options.size };
    log.debug('autocomplete:request', { path: AUTOCOMPLETE_PATH, body });

    const response = await this.upstream.post(AUTOCOMPLETE_PATH, body);
    if (!response.ok) {
      log.error('autocomplete:upstream_failed', { query, code: response.error.code, message: response.error.message });
      return response;
    }

    const parsed = parseJsonDocument(response.data, 'autocomplete');
    if (!parsed.ok) return parsed;

    if (!Array.isArray(path(parsed.data, 'items'))) {
      log.warn('autocomplete:missing_items', { query });
      return envelopeErr('LOCATION_NOT_FOUND', `No location ID found for city: ${query}`);
    }

    const id = firstCityLocationId(parsed.data);
    log.debug('autocomplete:selected', { query, locationId: id ?? null });
    return id === undefined
      ? envelopeErr('LOCATION_NOT_FOUND', `No location ID found for city: ${query}`)
      : envelopeOk(id);
  }
}
