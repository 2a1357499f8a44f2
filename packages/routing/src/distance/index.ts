export { EARTH_RADIUS_KM, haversineDistanceKm, routeLengthKm, pointAt } from "./haversine.js";
