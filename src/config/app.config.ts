/** App configuration: validated once at startup, read-only afterwards. */
import { z } from 'zod';

const DEFAULT_FEED_ID = '1714d37c-2a14-460d-8344-cdff5cf02018';
const DEFAULT_SEARCH_PATH = '/generic-api-service/royal/hotel/search-by-location';
const DEFAULT_RESERVATION_URL =
  'https://www.etstur.com/checkout/checkout/hotel/step1?bookingUuid=de8af0a4-4134-4a09-96c2-9316e89cbed1';

const envSchema = z.object({
  UPSTREAM_BASE_URL: z.string().url(),
  UPSTREAM_AUTH_TOKEN: z.string().min(1),
  UPSTREAM_ACCEPT_LANGUAGE: z.string().min(1).default('tr'),
  UPSTREAM_CURRENCY: z.string().min(1).default('TRY'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SEARCH_FEED_ID: z.string().min(1).default(DEFAULT_FEED_ID),
  SEARCH_LIMIT: z.coerce.number().int().positive().default(5),
  SEARCH_OFFSET: z.coerce.number().int().nonnegative().default(300),
  SEARCH_PATH: z.string().startsWith('/').default(DEFAULT_SEARCH_PATH),
  HOTEL_DETAIL_LANGUAGE: z.string().min(1).default('es'),
  AUTOCOMPLETE_LANGUAGE: z.string().min(1).default('tr'),
  AUTOCOMPLETE_SIZE: z.coerce.number().int().positive().default(30),
  RESERVATION_URL_TEMPLATE: z.string().min(1).default(DEFAULT_RESERVATION_URL),
  RESERVATION_BRAND: z.string().min(1).default('ETSTUR'),
  MCP_HTTP_PORT: z.coerce.number().int().min(1).max(65_535).default(3100),
});

export interface UpstreamConfig {
  baseUrl: string;
  authToken: string;
  acceptLanguage: string;
  currency: string;
  timeoutMs: number;
}

/** Constants injected into every search-by-location request. */
export interface SearchConfig {
  feedId: string;
  limit: number;
  offset: number;
  searchPath: string;
}

export interface ContentConfig {
  /** Path segment of the hotel-detail endpoint, e.g. "es". */
  detailLanguage: string;
  autocompleteLanguage: string;
  autocompleteSize: number;
}

export interface ReservationConfig {
  /** May contain `{hotelCode}` placeholders. */
  urlTemplate: string;
  brand: string;
}

export interface AppConfig {
  upstream: UpstreamConfig;
  search: SearchConfig;
  content: ContentConfig;
  reservation: ReservationConfig;
  server: { httpPort: number };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      authToken: e.UPSTREAM_AUTH_TOKEN,
      acceptLanguage: e.UPSTREAM_ACCEPT_LANGUAGE,
      currency: e.UPSTREAM_CURRENCY,
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
    },
    search: {
      feedId: e.SEARCH_FEED_ID,
      limit: e.SEARCH_LIMIT,
      offset: e.SEARCH_OFFSET,
      searchPath: e.SEARCH_PATH,
    },
    content: {
      detailLanguage: e.HOTEL_DETAIL_LANGUAGE,
      autocompleteLanguage: e.AUTOCOMPLETE_LANGUAGE,
      autocompleteSize: e.AUTOCOMPLETE_SIZE,
    },
    reservation: {
      urlTemplate: e.RESERVATION_URL_TEMPLATE,
      brand: e.RESERVATION_BRAND,
    },
    server: { httpPort: e.MCP_HTTP_PORT },
  };
}
