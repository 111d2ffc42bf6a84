/**
 * Contract for the hotel content MCP tools: names, descriptions and parameter shapes.
 * Every tool answers with a single text value, success or failure alike.
 *
 * Identifying fields are optional at the protocol level so a missing value reaches the handler,
 * which answers "<field> is missing" instead of a protocol validation fault.
 */
import { z } from 'zod';

export const TOOL_NAMES = {
  searchByLocation: 'hotel_search_by_location',
  hotelDetails: 'hotel_details',
  hotelImages: 'hotel_images',
  hotelDescription: 'hotel_description',
  hotelFacilityCheck: 'hotel_facility_check',
  hotelReservation: 'hotel_reservation',
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  hotel_search_by_location:
    'Search hotels by city name, check-in/out, and guest info. feedId and limit, offset are set internally.',
  hotel_details: 'Get detailed hotel information including location, coordinates, phone and star rating by hotelCode',
  hotel_images: 'Get hotel images by hotelCode',
  hotel_description: 'Get hotel description by hotelCode',
  hotel_facility_check: 'Check hotel facilities by hotelCode',
  hotel_reservation: 'Get the reservation link for a hotel by hotelCode',
};

const roomSchema = z.object({
  adults: z.number().int().min(1).describe('Number of adults in the room'),
  childAges: z
    .array(z.number().int().min(0).max(17))
    .optional()
    .describe('Age of each child in the room; omit or leave empty for none'),
});

export const locationHotelSearchShape = {
  city: z.string().optional().describe('City name, e.g. "Kayseri"'),
  checkIn: z.string().optional().describe('Check-in date, YYYY-MM-DD'),
  checkOut: z.string().optional().describe('Check-out date, YYYY-MM-DD'),
  clientNationality: z.string().optional().describe('Guest nationality as an ISO country code, e.g. "TR"'),
  rooms: z.array(roomSchema).optional().describe('One entry per room'),
  allPricesFlag: z.boolean().optional().describe('Return every price option instead of the cheapest'),
};

export const hotelCodeShape = {
  hotelCode: z.string().optional().describe('Vendor hotel code'),
};

/** One room's occupancy, forwarded to the search endpoint as given. */
export interface RoomOccupancy {
  adults: number;
  childAges?: number[];
}

/** Input for hotel_search_by_location. */
export interface LocationHotelSearchInput {
  city?: string;
  checkIn?: string;
  checkOut?: string;
  clientNationality?: string;
  rooms?: RoomOccupancy[];
  allPricesFlag?: boolean;
}

/** Input for every tool keyed by a hotel code. */
export interface HotelCodeInput {
  hotelCode?: string;
}

/** Body of the search-by-location request: caller fields plus the injected window and location. */
export interface LocationHotelSearchRequest {
  checkIn: string;
  checkOut: string;
  clientNationality: string;
  rooms: RoomOccupancy[];
  allPricesFlag?: boolean;
  limit: number;
  offset: number;
  feedId: string;
  locationId: number;
}
