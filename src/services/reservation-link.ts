import type { ReservationConfig } from '@/config/app.config';

const HOTEL_CODE_PLACEHOLDER = /\{hotelCode\}/g;

/** Fills `{hotelCode}` placeholders; a template without one is returned unchanged. */
export function buildReservationUrl(hotelCode: string, urlTemplate: string): string {
  return urlTemplate.replace(HOTEL_CODE_PLACEHOLDER, encodeURIComponent(hotelCode));
}

export function buildReservationMessage(hotelCode: string, config: ReservationConfig): string {
  const url = buildReservationUrl(hotelCode, config.urlTemplate);
  return `${url} here is the link to the reservation. Have a wonderful stay with ${config.brand}!`;
}
