/**
 * Viewport Geometry
 *
 * Bounds, membership and region-fitting for lat/lng viewports.
 */

import type { GeoBounds, LatLng, Viewport } from "./types";

/** Fraction of the latitude span added on every side of the viewport */
export const DEFAULT_VIEWPORT_PADDING = 0.2;

/** Extent multiplier used when fitting a viewport around coordinates */
const FIT_EXTENT_SCALE = 1.3;

/** Smallest span fitViewport will produce, in degrees */
const FIT_MIN_SPAN = 0.1;

/**
 * Compute the padded bounding box of a viewport.
 *
 * Padding is a fraction of the latitude span and is applied to both axes,
 * so a wide viewport gets the same absolute margin east/west as north/south.
 *
 * @param viewport - Visible region
 * @param padding - Fraction of latitudeDelta added beyond each edge
 */
export function paddedBounds(
  viewport: Viewport,
  padding: number = DEFAULT_VIEWPORT_PADDING
): GeoBounds {
  const { center, span } = viewport;
  const pad = span.latitudeDelta * padding;
  const halfLat = span.latitudeDelta / 2;
  const halfLng = span.longitudeDelta / 2;

  return {
    minLat: center.lat - halfLat - pad,
    maxLat: center.lat + halfLat + pad,
    minLng: center.lng - halfLng - pad,
    maxLng: center.lng + halfLng + pad,
  };
}

/** Closed-interval membership test: points on an edge are inside */
export function containsCoordinate(bounds: GeoBounds, c: LatLng): boolean {
  return (
    c.lat >= bounds.minLat &&
    c.lat <= bounds.maxLat &&
    c.lng >= bounds.minLng &&
    c.lng <= bounds.maxLng
  );
}

/**
 * Bounding box of a set of coordinates, or null when empty.
 */
export function boundsOf(coordinates: Iterable<LatLng>): GeoBounds | null {
  let bounds: GeoBounds | null = null;
  for (const c of coordinates) {
    if (!bounds) {
      bounds = { minLat: c.lat, maxLat: c.lat, minLng: c.lng, maxLng: c.lng };
      continue;
    }
    bounds.minLat = Math.min(bounds.minLat, c.lat);
    bounds.maxLat = Math.max(bounds.maxLat, c.lat);
    bounds.minLng = Math.min(bounds.minLng, c.lng);
    bounds.maxLng = Math.max(bounds.maxLng, c.lng);
  }
  return bounds;
}

/**
 * Fit a viewport around every coordinate.
 *
 * Centers on the bounding box and scales its extent by 1.3, never going
 * below a 0.1 degree span so a single point still shows its surroundings.
 */
export function fitViewport(coordinates: Iterable<LatLng>): Viewport | null {
  const bounds = boundsOf(coordinates);
  if (!bounds) return null;

  return {
    center: {
      lat: (bounds.minLat + bounds.maxLat) / 2,
      lng: (bounds.minLng + bounds.maxLng) / 2,
    },
    span: {
      latitudeDelta: Math.max((bounds.maxLat - bounds.minLat) * FIT_EXTENT_SCALE, FIT_MIN_SPAN),
      longitudeDelta: Math.max((bounds.maxLng - bounds.minLng) * FIT_EXTENT_SCALE, FIT_MIN_SPAN),
    },
  };
}

/**
 * True if two viewports differ by no more than the given epsilons.
 * Center and span are compared per axis.
 */
export function viewportsClose(
  a: Viewport,
  b: Viewport,
  centerEpsilon: number,
  spanEpsilon: number
): boolean {
  return (
    Math.abs(a.center.lat - b.center.lat) <= centerEpsilon &&
    Math.abs(a.center.lng - b.center.lng) <= centerEpsilon &&
    Math.abs(a.span.latitudeDelta - b.span.latitudeDelta) <= spanEpsilon &&
    Math.abs(a.span.longitudeDelta - b.span.longitudeDelta) <= spanEpsilon
  );
}
