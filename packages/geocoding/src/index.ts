/**
 * @stopwise/geocoding
 *
 * Turns the lines a courier types (addresses or "lat, lng" pairs) into
 * coordinates for the routing engine.
 */

export {
  COORDINATE_PATTERN,
  parseCoordinateString,
  isValidCoordinate,
  applyCityHint,
} from "./coordinates.js";
export { AddressNotFoundError, GeocoderResponseError } from "./errors.js";
export type { AddressResolver, Geocoder, GeocoderPreference, ProviderName } from "./types.js";
export {
  NominatimGeocoder,
  type NominatimOptions,
  type NominatimPlace,
} from "./providers/nominatim.js";
export {
  GoogleGeocoder,
  type GoogleGeocoderOptions,
  type GoogleGeocodeResponse,
} from "./providers/google.js";
export {
  ChainedGeocoder,
  geocoderOrder,
  createGeocoder,
  type GeocoderConfig,
} from "./chain.js";
