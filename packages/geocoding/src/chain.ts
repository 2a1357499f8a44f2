/**
 * Provider chain used by the front end.
 *
 * 1. Coordinate strings ("20.5,-100.4") resolve without a network call
 * 2. Otherwise the city hint is appended and providers are tried in order
 * 3. A provider that errors is logged and skipped
 */

import type { AxiosInstance } from "axios";
import type { Coordinate } from "@stopwise/types";
import { applyCityHint, parseCoordinateString } from "./coordinates.js";
import { AddressNotFoundError } from "./errors.js";
import { GoogleGeocoder } from "./providers/google.js";
import { NominatimGeocoder } from "./providers/nominatim.js";
import type { AddressResolver, Geocoder, GeocoderPreference, ProviderName } from "./types.js";

/** Tries each provider in turn until one returns a coordinate */
export class ChainedGeocoder implements AddressResolver {
  constructor(
    readonly providers: readonly Geocoder[],
    private readonly cityHint?: string,
  ) {}

  /**
   * Resolve an address or coordinate string.
   * @throws AddressNotFoundError when every provider came back empty or failed
   */
  async geocode(address: string): Promise<Coordinate> {
    const direct = parseCoordinateString(address);
    if (direct) return direct;

    const query = applyCityHint(address, this.cityHint);
    for (const provider of this.providers) {
      try {
        const result = await provider.geocode(query);
        if (result) return result;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[geocoding] ${provider.name} failed for "${query}": ${message}`);
      }
    }
    throw new AddressNotFoundError(address);
  }
}

/** Provider order for a preference; anything but "google" starts with OSM */
export function geocoderOrder(preference: GeocoderPreference): ProviderName[] {
  return preference === "google" ? ["google", "osm"] : ["osm", "google"];
}

/** Configuration for {@link createGeocoder} */
export interface GeocoderConfig {
  /** Appended to addresses that don't already mention it */
  cityHint?: string;
  preference?: GeocoderPreference;
  /** Enables the Google provider */
  googleApiKey?: string;
  googleRegion?: string;
  nominatimUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Shared HTTP client for all providers */
  http?: AxiosInstance;
}

/**
 * Build the provider chain from configuration.
 *
 * Google is only part of the chain when an API key is configured.
 */
export function createGeocoder(config: GeocoderConfig = {}): ChainedGeocoder {
  const providers: Geocoder[] = [];
  for (const name of geocoderOrder(config.preference ?? "any")) {
    if (name === "osm") {
      providers.push(
        new NominatimGeocoder({
          endpoint: config.nominatimUrl,
          userAgent: config.userAgent,
          timeoutMs: config.timeoutMs,
          http: config.http,
        }),
      );
    } else if (config.googleApiKey) {
      providers.push(
        new GoogleGeocoder({
          apiKey: config.googleApiKey,
          region: config.googleRegion,
          timeoutMs: config.timeoutMs,
          http: config.http,
        }),
      );
    }
  }
  return new ChainedGeocoder(providers, config.cityHint);
}
