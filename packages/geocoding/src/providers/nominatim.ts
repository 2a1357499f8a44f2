/**
 * OpenStreetMap Nominatim search.
 *
 * https://nominatim.org/release-docs/latest/api/Search/
 * Public instances require an identifying User-Agent.
 */

import axios, { type AxiosInstance } from "axios";
import type { Coordinate } from "@stopwise/types";
import type { Geocoder } from "../types.js";

/** Options for the Nominatim provider */
export interface NominatimOptions {
  /** Base URL (default: https://nominatim.openstreetmap.org) */
  endpoint?: string;
  /** User-Agent header (default: "stopwise") */
  userAgent?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** HTTP client (default: a fresh axios instance) */
  http?: AxiosInstance;
}

/** Subset of a Nominatim search result that we read */
export interface NominatimPlace {
  lat: string;
  lon: string;
  display_name?: string;
}

const DEFAULT_ENDPOINT = "https://nominatim.openstreetmap.org";
const DEFAULT_USER_AGENT = "stopwise";
const DEFAULT_TIMEOUT_MS = 10_000;

export class NominatimGeocoder implements Geocoder {
  readonly name = "osm";
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: NominatimOptions = {}) {
    this.endpoint = (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, "");
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = options.http ?? axios.create();
  }

  async geocode(query: string): Promise<Coordinate | null> {
    const response = await this.http.get<NominatimPlace[]>(`${this.endpoint}/search`, {
      params: { q: query, format: "json", limit: 1 },
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
      timeout: this.timeoutMs,
    });

    const place = Array.isArray(response.data) ? response.data[0] : undefined;
    if (!place) return null;

    const lat = Number.parseFloat(place.lat);
    const lng = Number.parseFloat(place.lon);
    if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null;
    return { lat, lng };
  }
}
