/**
 * Registers the hotel content tools on an McpServer. Transport-agnostic: stdio and HTTP entry points share it.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HotelToolHandlers } from '@/mcp/handlers';
import { TOOL_DESCRIPTIONS, TOOL_NAMES, hotelCodeShape, locationHotelSearchShape } from '@/mcp/tool-contract';

export const SERVER_NAME = 'hotel-content-mcp';
export const SERVER_VERSION = '1.0.0';

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function buildMcpServer(handlers: HotelToolHandlers): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    TOOL_NAMES.searchByLocation,
    { description: TOOL_DESCRIPTIONS.hotel_search_by_location, inputSchema: locationHotelSearchShape },
    async (args) => textResult(await handlers.searchByLocation(args)),
  );

  server.registerTool(
    TOOL_NAMES.hotelDetails,
    { description: TOOL_DESCRIPTIONS.hotel_details, inputSchema: hotelCodeShape },
    async (args) => textResult(await handlers.hotelDetails(args)),
  );

  server.registerTool(
    TOOL_NAMES.hotelImages,
    { description: TOOL_DESCRIPTIONS.hotel_images, inputSchema: hotelCodeShape },
    async (args) => textResult(await handlers.hotelImages(args)),
  );

  server.registerTool(
    TOOL_NAMES.hotelDescription,
    { description: TOOL_DESCRIPTIONS.hotel_description, inputSchema: hotelCodeShape },
    async (args) => textResult(await handlers.hotelDescription(args)),
  );

  server.registerTool(
    TOOL_NAMES.hotelFacilityCheck,
    { description: TOOL_DESCRIPTIONS.hotel_facility_check, inputSchema: hotelCodeShape },
    async (args) => textResult(await handlers.hotelFacilityCheck(args)),
  );

  server.registerTool(
    TOOL_NAMES.hotelReservation,
    { description: TOOL_DESCRIPTIONS.hotel_reservation, inputSchema: hotelCodeShape },
    async (args) => textResult(await handlers.hotelReservation(args)),
  );

  return server;
}
