import type { Coordinate } from "@stopwise/types";

/** A service that resolves a free-text query to a coordinate */
export interface Geocoder {
  /** Short provider name used in logs ("osm", "google", ...) */
  readonly name: string;
  /**
   * Resolve a query.
   * @returns The best match, or null when the provider found nothing
   * @throws When the provider could not be reached or answered with an error
   */
  geocode(query: string): Promise<Coordinate | null>;
}

/** Which provider to try first */
export type GeocoderPreference = "any" | "osm" | "google";

export type ProviderName = "osm" | "google";

/** Resolves an address or "lat, lng" string, throwing when it cannot */
export interface AddressResolver {
  geocode(address: string): Promise<Coordinate>;
}
