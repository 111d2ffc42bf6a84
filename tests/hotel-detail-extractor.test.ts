import { describe, it, expect } from 'vitest';
import {
  descriptionFromDocument,
  extractDescription,
  extractFacilityNames,
  extractHotelSummary,
  extractImageUrls,
  facilityNamesFromDocument,
  formatHotelSummary,
  hotelSummaryFromDocument,
  imageUrlsFromDocument,
} from '@/services/extraction/hotel-detail-extractor';
import { readFixture } from './helpers/fake-upstream';

const fullBody = readFixture('hotel-detail.json');

describe('hotel summary', () => {
  it('projects every field of a complete document', () => {
    const result = extractHotelSummary(fullBody);
    expect(result).toEqual({
      ok: true,
      value: {
        name: 'Test Grand Hotel',
        city: 'Kayseri',
        state: 'Melikgazi',
        country: 'Türkiye',
        addressLine: 'Example Cad. No:1, Merkez',
        latitude: 38.7205,
        longitude: 35.4826,
        phone: '+90 352 000 00 00',
        starRating: '5',
      },
    });
  });

  it('formats present fields in fixed order', () => {
    const result = extractHotelSummary(fullBody);
    expect(result.ok && formatHotelSummary(result.value)).toBe(
      'Hotel: Test Grand Hotel\n' +
        'Location: Kayseri, Melikgazi, Türkiye\n' +
        'Address: Example Cad. No:1, Merkez\n' +
        'Coordinates: 38.7205, 35.4826\n' +
        'Phone: +90 352 000 00 00\n' +
        'Star: 5\n',
    );
  });

  it('omits location, contact, financialInfo and star when absent', () => {
    const summary = hotelSummaryFromDocument({ detail: { hotelName: 'Bare Inn' } });
    expect(formatHotelSummary(summary)).toBe('Hotel: Bare Inn\n');
  });

  it('joins location parts skipping empty ones', () => {
    const summary = hotelSummaryFromDocument({
      detail: { hotelName: 'H', location: { city: '', stateProvinceName: 'Antalya', country: 'Türkiye' }, star: '4.5' },
    });
    expect(formatHotelSummary(summary)).toBe('Hotel: H\nLocation: Antalya, Türkiye\nStar: 4.5\n');
  });

  it('includes coordinates only when the coordinate node exists, reading missing values as zero', () => {
    const withNode = hotelSummaryFromDocument({ detail: { location: { location: { lat: 41.01 } } } });
    expect(withNode.latitude).toBe(41.01);
    expect(withNode.longitude).toBe(0);
    expect(formatHotelSummary(withNode)).toBe('Coordinates: 41.01, 0\n');

    const withoutNode = hotelSummaryFromDocument({ detail: { location: { city: 'Bodrum' } } });
    expect(withoutNode.latitude).toBeUndefined();
    expect(formatHotelSummary(withoutNode)).toBe('Location: Bodrum\n');
  });

  it('yields an empty summary for a document without detail', () => {
    expect(formatHotelSummary(hotelSummaryFromDocument({}))).toBe('');
    expect(formatHotelSummary(hotelSummaryFromDocument([]))).toBe('');
  });

  it('reports an unparsable body', () => {
    expect(extractHotelSummary('<html>oops</html>')).toEqual({ ok: false });
  });
});

describe('image urls', () => {
  it('lists hotel images then room images in order, keeping duplicates', () => {
    expect(extractImageUrls(fullBody)).toEqual({
      ok: true,
      value: [
        'https://img.example.com/h1.jpg',
        'https://img.example.com/h2.jpg',
        'https://img.example.com/h1.jpg',
        'https://img.example.com/r1a.jpg',
        'https://img.example.com/r3a.jpg',
        'https://img.example.com/r3b.jpg',
      ],
    });
  });

  it('returns room images alone when hotel images are missing', () => {
    const doc = { detail: { rooms: [{ imageLinks: [{ imageUrls: [{ url: 'r.jpg' }, { url: '' }] }] }] } };
    expect(imageUrlsFromDocument(doc)).toEqual(['r.jpg']);
  });

  it('tolerates non-array nodes', () => {
    expect(imageUrlsFromDocument({ detail: { images: { imageUrls: [] }, rooms: 'none' } })).toEqual([]);
  });

  it('reports an unparsable body', () => {
    expect(extractImageUrls('')).toEqual({ ok: false });
  });
});

describe('facility names', () => {
  it('flattens groups then facilities, skipping empty names', () => {
    expect(extractFacilityNames(fullBody)).toEqual({ ok: true, value: ['Free WiFi', 'Parking', 'Spa'] });
  });

  it('is empty when facilityGroups is absent or empty', () => {
    expect(facilityNamesFromDocument({ detail: {} })).toEqual([]);
    expect(facilityNamesFromDocument({ detail: { facilityGroups: [] } })).toEqual([]);
  });
});

describe('description', () => {
  it('joins every non-empty description under every language with one blank line', () => {
    expect(extractDescription(fullBody)).toEqual({
      ok: true,
      value: 'Şehir merkezinde bir otel.\n\nA hotel in the city centre.\n\nClose to the airport.',
    });
  });

  it('is empty when there are no description leaves', () => {
    expect(descriptionFromDocument({ detail: { descriptions: { en: [] } } })).toBe('');
    expect(descriptionFromDocument({ detail: { descriptions: [] } })).toBe('');
    expect(descriptionFromDocument({})).toBe('');
  });

  it('reports an unparsable body', () => {
    expect(extractDescription('{"detail":')).toEqual({ ok: false });
  });
});
