/**
 * Navigation link module.
 *
 * Ordered points -> bounded-size descriptors -> directions URLs.
 */

export { DEFAULT_CHUNK_SIZE, partitionLinks, type PartitionOptions } from "./partition.js";
export {
  GOOGLE_MAPS_DIRECTIONS_BASE,
  formatCoordinate,
  renderGoogleMapsUrl,
  buildMapsLinks,
} from "./maps-url.js";
