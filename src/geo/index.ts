/**
 * Geo Module
 *
 * Coordinate types, great-circle distance and viewport geometry.
 */

export type { LatLng, Span, Viewport, GeoBounds } from "./types";

export {
  haversineMeters,
  metersToMiles,
  distanceInMiles,
  isValidLatLng,
  EARTH_RADIUS_METERS,
  METERS_PER_MILE,
} from "./distance";

export {
  paddedBounds,
  containsCoordinate,
  boundsOf,
  fitViewport,
  viewportsClose,
  DEFAULT_VIEWPORT_PADDING,
} from "./viewport";
