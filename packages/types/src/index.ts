/**
 * @stopwise/types
 *
 * Shared domain types for the stop-ordering engine.
 *
 * - Geo: coordinates, labeled points, point sets
 * - Route: tours, navigation descriptors, route plans
 */

export * from "./geo.js";
export * from "./route.js";
