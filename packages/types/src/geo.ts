/**
 * Geographic primitive types.
 */

/** A WGS84 coordinate. Latitude in [-90, 90], longitude in [-180, 180]. */
export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

/** A coordinate paired with the text shown to the user (address line, "Depot", ...) */
export interface LabeledPoint {
  readonly coordinate: Coordinate;
  readonly label: string;
}

/**
 * Ordered coordinates for one optimization request.
 * Index 0 is the depot.
 */
export type PointSet = readonly Coordinate[];
