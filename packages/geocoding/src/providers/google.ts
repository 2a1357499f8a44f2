/**
 * Google Geocoding API.
 *
 * https://developers.google.com/maps/documentation/geocoding/requests-geocoding
 */

import axios, { type AxiosInstance } from "axios";
import type { Coordinate } from "@stopwise/types";
import { GeocoderResponseError } from "../errors.js";
import type { Geocoder } from "../types.js";

/** Options for the Google provider */
export interface GoogleGeocoderOptions {
  apiKey: string;
  /** ccTLD region bias (default: "mx") */
  region?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Override for testing or a proxy */
  endpoint?: string;
  /** HTTP client (default: a fresh axios instance) */
  http?: AxiosInstance;
}

/** Subset of the Geocoding API response that we read */
export interface GoogleGeocodeResponse {
  status: string;
  error_message?: string;
  results: {
    formatted_address?: string;
    geometry: { location: { lat: number; lng: number } };
  }[];
}

const DEFAULT_ENDPOINT = "https://maps.googleapis.com/maps/api/geocode/json";
const DEFAULT_REGION = "mx";
const DEFAULT_TIMEOUT_MS = 10_000;

export class GoogleGeocoder implements Geocoder {
  readonly name = "google";
  private readonly apiKey: string;
  private readonly region: string;
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly http: AxiosInstance;

  constructor(options: GoogleGeocoderOptions) {
    this.apiKey = options.apiKey;
    this.region = options.region ?? DEFAULT_REGION;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
    this.http = options.http ?? axios.create();
  }

  async geocode(query: string): Promise<Coordinate | null> {
    const response = await this.http.get<GoogleGeocodeResponse>(this.endpoint, {
      params: { address: query, key: this.apiKey, region: this.region },
      timeout: this.timeoutMs,
    });

    const { status, results, error_message: detail } = response.data;
    if (status === "ZERO_RESULTS") return null;
    if (status !== "OK") {
      throw new GeocoderResponseError(this.name, status, detail);
    }

    const location = results[0]?.geometry.location;
    if (!location) return null;
    return { lat: location.lat, lng: location.lng };
  }
}
