/**
 * Geographic Types
 *
 * Coordinate and region types shared by every stage of the pipeline.
 */

/** WGS84 latitude/longitude in degrees */
export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

/** Visible extent of a map region, in degrees */
export interface Span {
  readonly latitudeDelta: number;
  readonly longitudeDelta: number;
}

/** A visible map region: center plus span */
export interface Viewport {
  readonly center: LatLng;
  readonly span: Span;
}

/** Axis-aligned box in degrees. Edges are inclusive. */
export interface GeoBounds {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
