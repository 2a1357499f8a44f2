/**
 * Server configuration from environment variables.
 *
 * Read once at startup. Empty strings count as unset, so a copied
 * .env.example with blank values still loads.
 */

import { z } from "zod";
import type { GeocoderConfig } from "@stopwise/geocoding";
import type { PlanRouteOptions } from "@stopwise/routing";

const emptyAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const lowerOrUndefined = (v: unknown) =>
  typeof v === "string" ? emptyAsUndefined(v.trim().toLowerCase()) : v;

const optionalString = z.preprocess(emptyAsUndefined, z.string().trim().optional());

const envSchema = z.object({
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(3000)),
  CITY_HINT: optionalString,
  GOOGLE_MAPS_KEY: optionalString,
  GOOGLE_REGION: optionalString,
  GEOCODER_PREF: z.preprocess(lowerOrUndefined, z.enum(["any", "osm", "google"]).default("any")),
  NOMINATIM_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  NOMINATIM_USER_AGENT: z.preprocess(emptyAsUndefined, z.string().default("stopwise")),
  GEOCODER_TIMEOUT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(10_000),
  ),
  CHUNK_SIZE: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(2).default(10)),
  CONNECT_LEGS: z.preprocess(lowerOrUndefined, z.enum(["true", "false", "1", "0"]).default("false")),
  MAX_STOPS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(200)),
  TWO_OPT_TIME_LIMIT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().optional(),
  ),
});

export interface AppConfig {
  port: number;
  geocoder: GeocoderConfig;
  planning: PlanRouteOptions;
}

/**
 * Parse configuration from an environment map.
 * @throws ZodError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    geocoder: {
      cityHint: parsed.CITY_HINT,
      preference: parsed.GEOCODER_PREF,
      googleApiKey: parsed.GOOGLE_MAPS_KEY,
      googleRegion: parsed.GOOGLE_REGION,
      nominatimUrl: parsed.NOMINATIM_URL,
      userAgent: parsed.NOMINATIM_USER_AGENT,
      timeoutMs: parsed.GEOCODER_TIMEOUT_MS,
    },
    planning: {
      chunkSize: parsed.CHUNK_SIZE,
      connectLegs: parsed.CONNECT_LEGS === "true" || parsed.CONNECT_LEGS === "1",
      maxStops: parsed.MAX_STOPS,
      twoOpt:
        parsed.TWO_OPT_TIME_LIMIT_MS === undefined
          ? undefined
          : { timeLimitMs: parsed.TWO_OPT_TIME_LIMIT_MS },
    },
  };
}
