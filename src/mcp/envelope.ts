/**
 * Standard result envelope for everything a tool call depends on (upstream client, resolver, parser).
 * Handlers are the only place an envelope error becomes user-facing text.
 */

export type ErrorCode =
  | 'UPSTREAM_HTTP'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_NETWORK'
  | 'LOCATION_NOT_FOUND'
  | 'PARSE_ERROR';

export interface EnvelopeError {
  code: ErrorCode;
  message: string;
  /** HTTP status, for UPSTREAM_HTTP. */
  status?: number;
  /** Raw upstream response body, when one was received. */
  body?: string;
}

export type Envelope<T> = { ok: true; data: T } | { ok: false; error: EnvelopeError };

export function envelopeOk<T>(data: T): Envelope<T> {
  return { ok: true, data };
}

export function envelopeErr(
  code: ErrorCode,
  message: string,
  extra: { status?: number; body?: string } = {},
): Envelope<never> {
  return {
    ok: false,
    error: {
      code,
      message,
      ...(extra.status != null && { status: extra.status }),
      ...(extra.body != null && { body: extra.body }),
    },
  };
}

