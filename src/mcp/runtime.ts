/** Wires configuration into the upstream client, resolver and tool handlers. */
import type { AppConfig } from '@/config/app.config';
import { createHotelToolHandlers, type HotelToolHandlers } from '@/mcp/handlers';
import { HttpUpstreamClient } from '@/services/providers/hotel-content/upstream-client';
import { LocationResolver } from '@/services/providers/hotel-content/location-resolver';

export function createRuntime(config: AppConfig): HotelToolHandlers {
  const upstream = new HttpUpstreamClient(config.upstream);
  const resolver = new LocationResolver(upstream, {
    language: config.content.autocompleteLanguage,
    size: config.content.autocompleteSize,
  });
  return createHotelToolHandlers({
    upstream,
    resolver,
    search: config.search,
    detailLanguage: config.content.detailLanguage,
    reservation: config.reservation,
  });
}
