/**
 * In-process MCP tool handlers. Each handler validates, resolves, calls upstream, extracts and
 * renders; every outcome is a string and no error escapes to the protocol layer.
 * The four detail tools share one fetch of the hotel-detail document and differ only in the extractor.
 */
import { logger } from '@/services/logger';
import {
  extractDescription,
  extractFacilityNames,
  extractHotelSummary,
  extractImageUrls,
  formatHotelSummary,
} from '@/services/extraction/hotel-detail-extractor';
import { hotelDetailPath, type UpstreamClient } from '@/services/providers/hotel-content/upstream-client';
import type { LocationLookup } from '@/services/providers/hotel-content/location-resolver';
import { buildReservationMessage } from '@/services/reservation-link';
import type { ReservationConfig, SearchConfig } from '@/config/app.config';
import type { EnvelopeError } from '@/mcp/envelope';
import {
  TOOL_NAMES,
  type HotelCodeInput,
  type LocationHotelSearchInput,
  type LocationHotelSearchRequest,
  type ToolName,
} from '@/mcp/tool-contract';

const log = logger.getSubLogger({ name: 'tool' });

export interface HotelToolDeps {
  upstream: UpstreamClient;
  resolver: LocationLookup;
  search: SearchConfig;
  /** Language segment of the hotel-detail path. */
  detailLanguage: string;
  reservation: ReservationConfig;
}

export interface HotelToolHandlers {
  searchByLocation(input: LocationHotelSearchInput): Promise<string>;
  hotelDetails(input: HotelCodeInput): Promise<string>;
  hotelImages(input: HotelCodeInput): Promise<string>;
  hotelDescription(input: HotelCodeInput): Promise<string>;
  hotelFacilityCheck(input: HotelCodeInput): Promise<string>;
  hotelReservation(input: HotelCodeInput): Promise<string>;
}

/** Trimmed value, or undefined when absent or blank. */
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function bulletList(heading: string, items: string[]): string {
  return `${heading}\n${items.map((item) => `- ${item}\n`).join('')}`;
}

/** Last-resort boundary: an unexpected exception becomes "<label> failed: <message>". */
async function guard(tool: ToolName, label: string, run: () => Promise<string>): Promise<string> {
  try {
    return await run();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error('tool:unexpected_error', { tool, error: message });
    return `${label} failed: ${message}`;
  }
}

export function createHotelToolHandlers(deps: HotelToolDeps): HotelToolHandlers {
  const { upstream, resolver, search, detailLanguage, reservation } = deps;

  /** Fetches the detail document once; upstream failures render through `onError`. */
  async function withHotelDetail(
    tool: ToolName,
    hotelCode: string,
    onError: (error: EnvelopeError) => string,
    render: (body: string) => string,
  ): Promise<string> {
    const response = await upstream.get(hotelDetailPath(detailLanguage, hotelCode));
    if (!response.ok) {
      log.error('tool:upstream_failed', { tool, hotelCode, code: response.error.code, message: response.error.message });
      return onError(response.error);
    }
    return render(response.data);
  }

  function missingSearchField(input: LocationHotelSearchInput): string | undefined {
    if (!present(input.city)) return 'city';
    if (!present(input.checkIn)) return 'checkIn';
    if (!present(input.checkOut)) return 'checkOut';
    if (!present(input.clientNationality)) return 'clientNationality';
    if (!input.rooms || input.rooms.length === 0) return 'rooms';
    return undefined;
  }

  return {
    searchByLocation: (input) =>
      guard(TOOL_NAMES.searchByLocation, 'Hotel search', async () => {
        const missing = missingSearchField(input);
        if (missing) return `Hotel search failed: ${missing} is missing.`;
        const { checkIn = '', checkOut = '', clientNationality = '', rooms = [] } = input;
        const city = input.city?.trim() ?? '';

        const location = await resolver.resolve(city);
        if (!location.ok) return `No location ID found for city: ${city}`;

        const request: LocationHotelSearchRequest = {
          checkIn,
          checkOut,
          clientNationality,
          rooms,
          ...(input.allPricesFlag !== undefined && { allPricesFlag: input.allPricesFlag }),
          limit: search.limit,
          offset: search.offset,
          feedId: search.feedId,
          locationId: location.data,
        };

        const response = await upstream.post(search.searchPath, request);
        if (!response.ok) {
          log.error('tool:upstream_failed', {
            tool: TOOL_NAMES.searchByLocation,
            city,
            code: response.error.code,
            message: response.error.message,
          });
          return response.error.message;
        }
        return response.data;
      }),

    hotelDetails: ({ hotelCode }) =>
      guard(TOOL_NAMES.hotelDetails, 'Hotel details', async () => {
        const code = present(hotelCode);
        if (!code) return 'Hotel details failed: hotelCode is missing.';
        return withHotelDetail(
          TOOL_NAMES.hotelDetails,
          code,
          (error) => `Error retrieving hotel details for ${code}: ${error.message}`,
          (body) => {
            const summary = extractHotelSummary(body);
            if (!summary.ok) return 'Error parsing hotel details';
            const text = formatHotelSummary(summary.value);
            return text || `No details found for hotelCode ${code}.`;
          },
        );
      }),

    hotelImages: ({ hotelCode }) =>
      guard(TOOL_NAMES.hotelImages, 'Hotel images', async () => {
        const code = present(hotelCode);
        if (!code) return 'Hotel images failed: hotelCode is missing.';
        return withHotelDetail(
          TOOL_NAMES.hotelImages,
          code,
          (error) => `Error retrieving hotel images for ${code}: ${error.message}`,
          (body) => {
            const urls = extractImageUrls(body);
            if (!urls.ok) return 'Error parsing hotel images';
            if (urls.value.length === 0) return `No images found for hotelCode ${code}.`;
            return bulletList(`Images for hotelCode ${code}:`, urls.value);
          },
        );
      }),

    hotelDescription: ({ hotelCode }) =>
      guard(TOOL_NAMES.hotelDescription, 'Hotel description', async () => {
        const code = present(hotelCode);
        if (!code) return 'Hotel description failed: hotelCode is missing.';
        return withHotelDetail(
          TOOL_NAMES.hotelDescription,
          code,
          (error) => `Error retrieving hotel description for ${code}: ${error.message}`,
          (body) => {
            const description = extractDescription(body);
            if (!description.ok) return 'Error parsing hotel description';
            if (!description.value) return `No description found for hotelCode ${code}.`;
            return `Description for hotelCode ${code}:\n${description.value}`;
          },
        );
      }),

    hotelFacilityCheck: ({ hotelCode }) =>
      guard(TOOL_NAMES.hotelFacilityCheck, 'Facility check', async () => {
        const code = present(hotelCode);
        if (!code) return 'Facility check failed: hotelCode is missing.';
        return withHotelDetail(
          TOOL_NAMES.hotelFacilityCheck,
          code,
          (error) => `Error retrieving facilities for hotelCode ${code}: ${error.message}`,
          (body) => {
            const names = extractFacilityNames(body);
            if (!names.ok) return 'Error parsing hotel facilities';
            if (names.value.length === 0) return `No facilities found for hotelCode ${code}.`;
            return bulletList(`Facilities for hotelCode ${code}:`, names.value);
          },
        );
      }),

    hotelReservation: ({ hotelCode }) =>
      guard(TOOL_NAMES.hotelReservation, 'Reservation', async () => {
        const code = present(hotelCode);
        if (!code) return 'Reservation failed: hotelCode is missing.';
        return buildReservationMessage(code, reservation);
      }),
  };
}
