import { describe, it, expect } from 'vitest';
import {
  LocationResolver,
  firstCityLocationId,
  parseLocationId,
} from '@/services/providers/hotel-content/location-resolver';
import { AUTOCOMPLETE_PATH } from '@/services/providers/hotel-content/upstream-client';
import { FakeUpstreamClient } from './helpers/fake-upstream';

const options = { language: 'tr', size: 30 };

describe('parseLocationId', () => {
  it('accepts integer numbers and integer strings', () => {
    expect(parseLocationId(42)).toBe(42);
    expect(parseLocationId('42')).toBe(42);
    expect(parseLocationId(' 7 ')).toBe(7);
    expect(parseLocationId('-3')).toBe(-3);
  });

  it('rejects decimals, words, out-of-range values and non-scalars', () => {
    expect(parseLocationId('42.5')).toBeUndefined();
    expect(parseLocationId(42.5)).toBeUndefined();
    expect(parseLocationId('abc')).toBeUndefined();
    expect(parseLocationId('2147483648')).toBeUndefined();
    expect(parseLocationId(null)).toBeUndefined();
    expect(parseLocationId({ id: 1 })).toBeUndefined();
  });
});

describe('firstCityLocationId', () => {
  it('takes the first CITY in flattened document order', () => {
    const doc = {
      items: [
        { locations: [{ locationType: 'HOTEL', id: '5' }, { locationType: 'CITY', id: '42' }] },
        { locations: [{ locationType: 'CITY', id: '7' }] },
      ],
    };
    expect(firstCityLocationId(doc)).toBe(42);
  });

  it('skips CITY entries whose id does not parse', () => {
    const doc = {
      items: [
        { locations: [{ locationType: 'CITY', id: 'not-a-number' }] },
        { locations: null },
        { locations: [{ locationType: 'CITY', id: 9 }] },
      ],
    };
    expect(firstCityLocationId(doc)).toBe(9);
  });

  it('finds nothing without CITY entries', () => {
    expect(firstCityLocationId({ items: [{ locations: [{ locationType: 'REGION', id: '1' }] }] })).toBeUndefined();
  });
});

describe('LocationResolver', () => {
  it('posts query, language and size to the autocomplete endpoint', async () => {
    const upstream = new FakeUpstreamClient().reply(
      'POST',
      AUTOCOMPLETE_PATH,
      JSON.stringify({ items: [{ locations: [{ locationType: 'CITY', id: '100' }] }] }),
    );
    const result = await new LocationResolver(upstream, options).resolve('Kayseri');

    expect(result).toEqual({ ok: true, data: 100 });
    expect(upstream.calls).toEqual([
      { method: 'POST', path: AUTOCOMPLETE_PATH, body: { query: 'Kayseri', language: 'tr', size: 30 } },
    ]);
  });

  it('reports not found when no CITY matches', async () => {
    const upstream = new FakeUpstreamClient().reply('POST', AUTOCOMPLETE_PATH, JSON.stringify({ items: [] }));
    const result = await new LocationResolver(upstream, options).resolve('Atlantis');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe('LOCATION_NOT_FOUND');
  });

  it('reports not found when items is missing', async () => {
    const upstream = new FakeUpstreamClient().reply('POST', AUTOCOMPLETE_PATH, JSON.stringify({ total: 0 }));
    const result = await new LocationResolver(upstream, options).resolve('Kayseri');
    expect(!result.ok && result.error.code).toBe('LOCATION_NOT_FOUND');
  });

  it('absorbs upstream failures into an error envelope', async () => {
    const upstream = new FakeUpstreamClient().fail('POST', AUTOCOMPLETE_PATH, 503, 'Service Unavailable');
    const result = await new LocationResolver(upstream, options).resolve('Kayseri');
    expect(result).toEqual({
      ok: false,
      error: { code: 'UPSTREAM_HTTP', message: 'Service Unavailable', status: 503 },
    });
  });

  it('reports a parse error for a non-JSON body', async () => {
    const upstream = new FakeUpstreamClient().reply('POST', AUTOCOMPLETE_PATH, 'gateway says hi');
    const result = await new LocationResolver(upstream, options).resolve('Kayseri');
    expect(!result.ok && result.error.code).toBe('PARSE_ERROR');
  });
});
