/**
 * Free-text helpers that run before any geocoding service is called.
 */

import type { Coordinate } from "@stopwise/types";

/** "20.56912,-100.42088", "20.56912 -100.42088", "20.5, -100.4" */
export const COORDINATE_PATTERN = /^\s*(-?\d{1,2}\.\d+)[,\s]+(-?\d{1,3}\.\d+)\s*$/;

/**
 * Parse a "lat, lng" string.
 *
 * Both parts need a decimal point. Returns null when the text is not a
 * coordinate pair or the values are out of range, so the caller can fall
 * back to address geocoding.
 */
export function parseCoordinateString(text: string): Coordinate | null {
  const match = COORDINATE_PATTERN.exec(text);
  if (!match?.[1] || !match[2]) return null;
  const lat = Number.parseFloat(match[1]);
  const lng = Number.parseFloat(match[2]);
  if (!isValidCoordinate({ lat, lng })) return null;
  return { lat, lng };
}

/** True when latitude and longitude are finite and within WGS84 bounds */
export function isValidCoordinate(c: Coordinate): boolean {
  return (
    Number.isFinite(c.lat) &&
    Number.isFinite(c.lng) &&
    c.lat >= -90 &&
    c.lat <= 90 &&
    c.lng >= -180 &&
    c.lng <= 180
  );
}

/**
 * Append a city hint to an address unless the address already names it
 * (case-insensitive).
 */
export function applyCityHint(address: string, cityHint?: string): string {
  const hint = cityHint?.trim();
  if (!hint) return address;
  if (address.toLowerCase().includes(hint.toLowerCase())) return address;
  return `${address}, ${hint}`;
}
