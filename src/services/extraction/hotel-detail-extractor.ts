/**
 * Projections of the vendor hotel-detail document into flat, display-ready values.
 *
 * Each projection comes in two forms: `*FromDocument(root)` works on an already parsed tree and
 * never fails (absent nodes yield empty values); `extract*(body)` parses the raw body first and
 * reports `{ ok: false }` only when the body is not JSON at all.
 *
 * Document shape (every node optional):
 *   detail.hotelName
 *   detail.location.{city, stateProvinceName, country, location.{lat, lon}}
 *   detail.contact.addressLines[]
 *   detail.financialInfo.tel
 *   detail.star
 *   detail.images[].imageUrls[].url
 *   detail.rooms[].imageLinks[].imageUrls[].url
 *   detail.facilityGroups[].facilities[].name
 *   detail.descriptions.<lang>[].description
 */
import { logger } from '@/services/logger';
import { parseJsonDocument } from '@/services/safe-parse-json';
import { asArray, asNumber, asText, isRecord, path, textsAt } from '@/services/extraction/json-node';

const log = logger.getSubLogger({ name: 'extract' });

export type Extraction<T> = { ok: true; value: T } | { ok: false };

export interface HotelSummary {
  name?: string;
  city?: string;
  state?: string;
  country?: string;
  /** `contact.addressLines` joined with ", ". */
  addressLine?: string;
  latitude?: number;
  longitude?: number;
  phone?: string;
  /** Star rating as the vendor wrote it ("5", "4.5", "HV1"...). */
  starRating?: string;
}

function withDocument<T>(body: string, context: string, project: (root: unknown) => T): Extraction<T> {
  const parsed = parseJsonDocument(body, context);
  if (!parsed.ok) return { ok: false };
  return { ok: true, value: project(parsed.data) };
}

function nonEmpty(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}

export function hotelSummaryFromDocument(root: unknown): HotelSummary {
  const detail = path(root, 'detail');
  const location = path(detail, 'location');
  const summary: HotelSummary = {};

  const name = nonEmpty(asText(path(detail, 'hotelName')));
  if (name) summary.name = name;

  const city = nonEmpty(asText(path(location, 'city')));
  const state = nonEmpty(asText(path(location, 'stateProvinceName')));
  const country = nonEmpty(asText(path(location, 'country')));
  if (city) summary.city = city;
  if (state) summary.state = state;
  if (country) summary.country = country;

  const addressLines = asArray(path(detail, 'contact', 'addressLines'))
    .map((line) => asText(line))
    .filter((line) => line.length > 0);
  if (addressLines.length > 0) summary.addressLine = addressLines.join(', ');

  const coordinates = path(location, 'location');
  if (isRecord(coordinates)) {
    summary.latitude = asNumber(coordinates.lat) ?? 0;
    summary.longitude = asNumber(coordinates.lon) ?? 0;
  }

  const phone = nonEmpty(asText(path(detail, 'financialInfo', 'tel')));
  if (phone) summary.phone = phone;

  const star = nonEmpty(asText(path(detail, 'star')));
  if (star) summary.starRating = star;

  return summary;
}

/** One line per present field, in fixed order, each ending in "\n". */
export function formatHotelSummary(summary: HotelSummary): string {
  const lines: string[] = [];
  if (summary.name) lines.push(`Hotel: ${summary.name}`);

  const place = [summary.city, summary.state, summary.country].filter((p): p is string => !!p);
  if (place.length > 0) lines.push(`Location: ${place.join(', ')}`);

  if (summary.addressLine) lines.push(`Address: ${summary.addressLine}`);
  if (summary.latitude != null && summary.longitude != null) {
    lines.push(`Coordinates: ${summary.latitude}, ${summary.longitude}`);
  }
  if (summary.phone) lines.push(`Phone: ${summary.phone}`);
  if (summary.starRating) lines.push(`Star: ${summary.starRating}`);

  return lines.map((line) => `${line}\n`).join('');
}

export function extractHotelSummary(body: string): Extraction<HotelSummary> {
  return withDocument(body, 'hotel details', (root) => {
    const summary = hotelSummaryFromDocument(root);
    log.debug('extract:summary', { hotelName: summary.name ?? null });
    return summary;
  });
}

function urlsOf(imageBlocks: unknown): string[] {
  return asArray(imageBlocks).flatMap((block) => textsAt(asArray(path(block, 'imageUrls')), 'url'));
}

/** Hotel-level images first, then room by room; order and duplicates kept as sent. */
export function imageUrlsFromDocument(root: unknown): string[] {
  const detail = path(root, 'detail');
  const hotelImages = urlsOf(path(detail, 'images'));
  const roomImages = asArray(path(detail, 'rooms')).flatMap((room) => urlsOf(path(room, 'imageLinks')));
  return [...hotelImages, ...roomImages];
}

export function extractImageUrls(body: string): Extraction<string[]> {
  return withDocument(body, 'hotel images', (root) => {
    const urls = imageUrlsFromDocument(root);
    log.debug('extract:images', { count: urls.length });
    return urls;
  });
}

export function facilityNamesFromDocument(root: unknown): string[] {
  return asArray(path(root, 'detail', 'facilityGroups')).flatMap((group) =>
    textsAt(asArray(path(group, 'facilities')), 'name'),
  );
}

export function extractFacilityNames(body: string): Extraction<string[]> {
  return withDocument(body, 'hotel facilities', (root) => {
    const names = facilityNamesFromDocument(root);
    log.debug('extract:facilities', { count: names.length });
    return names;
  });
}

/**
 * Every non-empty description under every language key, separated by a blank line.
 * Language keys are visited in JSON.parse insertion order, except that integer-like keys
 * come first in ascending order (an ECMAScript property-order rule).
 */
export function descriptionFromDocument(root: unknown): string {
  const descriptions = path(root, 'detail', 'descriptions');
  if (!isRecord(descriptions)) {
    log.warn('extract:descriptions_missing', { found: descriptions === undefined ? 'nothing' : typeof descriptions });
    return '';
  }
  return Object.values(descriptions)
    .flatMap((entries) => textsAt(asArray(entries), 'description'))
    .join('\n\n');
}

export function extractDescription(body: string): Extraction<string> {
  return withDocument(body, 'hotel description', (root) => {
    const text = descriptionFromDocument(root);
    log.debug('extract:description', { characters: text.length });
    return text;
  });
}
