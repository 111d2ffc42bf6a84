/**
 * HTTP client for the upstream hotel content API. One axios instance per base URL with the static
 * bearer credential and language/currency headers. Never throws: every outcome is an envelope.
 */
import axios, { type AxiosInstance } from 'axios';
import { logger } from '@/services/logger';
import { envelopeErr, envelopeOk, type Envelope } from '@/mcp/envelope';
import type { UpstreamConfig } from '@/config/app.config';

const log = logger.getSubLogger({ name: 'upstream' });

export const AUTOCOMPLETE_PATH = '/content-service/autocomplete/search';

export function hotelDetailPath(language: string, hotelCode: string): string {
  return `/content-service/hotel-detail/${encodeURIComponent(language)}/${encodeURIComponent(hotelCode)}`;
}

type HttpMethod = 'GET' | 'POST';

/** Copy of the request headers for logging, with the credential masked whatever its casing. */
export function redactHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const visible = Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'authorization');
  return { ...Object.fromEntries(visible), Authorization: 'Bearer ***' };
}

/** Raw response bodies in, envelopes out. Implementations must be safe to share across concurrent calls. */
export interface UpstreamClient {
  post(path: string, body: unknown): Promise<Envelope<string>>;
  get(path: string): Promise<Envelope<string>>;
}

export class HttpUpstreamClient implements UpstreamClient {
  private readonly http: AxiosInstance;

  constructor(private readonly config: UpstreamConfig) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.authToken}`,
        'Accept-Language': config.acceptLanguage,
        'X-Currency': config.currency,
        'Content-Type': 'application/json',
      },
      // Bodies are passed through verbatim, so keep them as text.
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
    });

    this.http.interceptors.request.use((request) => {
      log.debug('upstream:request', {
        method: request.method?.toUpperCase(),
        url: `${request.baseURL ?? ''}${request.url ?? ''}`,
        headers: redactHeaders(request.headers.toJSON()),
      });
      return request;
    });
  }

  async post(path: string, body: unknown): Promise<Envelope<string>> {
    return this.send('POST', path, body);
  }

  async get(path: string): Promise<Envelope<string>> {
    return this.send('GET', path);
  }

  private async send(method: HttpMethod, path: string, body?: unknown): Promise<Envelope<string>> {
    try {
      const res = await this.http.request<unknown>({ method, url: path, data: body });
      return envelopeOk(typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? ''));
    } catch (err) {
      return this.toFailure(method, path, err);
    }
  }

  private toFailure(method: HttpMethod, path: string, err: unknown): Envelope<never> {
    if (axios.isAxiosError(err)) {
      if (err.response) {
        const { status, statusText } = err.response;
        const body = typeof err.response.data === 'string' ? err.response.data : '';
        const message = `${[status, statusText].filter(Boolean).join(' ')} from ${method} ${path}`;
        log.error('upstream:error', { method, path, status, body: body.slice(0, 500) });
        return envelopeErr('UPSTREAM_HTTP', message, { status, body });
      }
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        log.error('upstream:error', { method, path, timeoutMs: this.config.timeoutMs });
        return envelopeErr('UPSTREAM_TIMEOUT', `timeout of ${this.config.timeoutMs}ms exceeded calling ${method} ${path}`);
      }
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error('upstream:error', { method, path, error: message });
    return envelopeErr('UPSTREAM_NETWORK', message);
  }
}
