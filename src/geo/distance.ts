/**
 * Great-circle distance helpers.
 */

import type { LatLng } from "./types";

const DEG_TO_RAD = Math.PI / 180;

/** Mean Earth radius in meters (IUGG) */
export const EARTH_RADIUS_METERS = 6371008.8;

/** Meters in one statute mile */
export const METERS_PER_MILE = 1609.344;

/**
 * Haversine distance between two coordinates.
 *
 * @returns Distance in meters
 */
export function haversineMeters(a: LatLng, b: LatLng): number {
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLng = (b.lng - a.lng) * DEG_TO_RAD;
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;
  // Clamp guards against h drifting past 1 for antipodal points
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function metersToMiles(meters: number): number {
  return meters / METERS_PER_MILE;
}

/** Distance between two coordinates in statute miles */
export function distanceInMiles(a: LatLng, b: LatLng): number {
  return metersToMiles(haversineMeters(a, b));
}

/** True if the coordinate is finite and within WGS84 ranges */
export function isValidLatLng(c: LatLng): boolean {
  return (
    Number.isFinite(c.lat) &&
    Number.isFinite(c.lng) &&
    Math.abs(c.lat) <= 90 &&
    Math.abs(c.lng) <= 180
  );
}
