/**
 * @stopwise/routing
 *
 * Stop-ordering engine for a single courier starting from a depot.
 *
 * Key concepts:
 * - Point set: depot + stops, depot at index 0
 * - Tour: visiting order as a permutation of point-set indices
 * - Navigation descriptor: origin/waypoints/destination for one map request
 *
 * Pipeline:
 * 1. Nearest-neighbor construction -> initial tour
 * 2. 2-opt improvement -> refined tour
 * 3. Link partitioning -> bounded-size navigation legs
 */

// Errors
export { InvalidPointSetError, TooManyStopsError } from "./errors.js";

// Modules
export * from "./distance/index.js";
export * from "./tour/index.js";
export * from "./links/index.js";
export * from "./plan/index.js";
