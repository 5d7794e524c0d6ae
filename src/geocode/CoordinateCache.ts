/**
 * Coordinate cache for one viewing session.
 *
 * Holds resolved coordinates and the set of ids waiting to be geocoded.
 * Both live behind this one object so "cached" and "pending" are always
 * checked and changed together; an id is never in both.
 */

import type { LatLng } from "../geo/types";

export class CoordinateCache {
  /** Resolved coordinates by entity id. Written once, never evicted. */
  private coordinates = new Map<string, LatLng>();

  /** Ids queued or in flight */
  private pending = new Set<string>();

  /** Get the coordinate for an id, if resolved */
  get(id: string): LatLng | undefined {
    return this.coordinates.get(id);
  }

  has(id: string): boolean {
    return this.coordinates.has(id);
  }

  /**
   * Store a coordinate. The first write for an id wins; later writes are
   * ignored. Clears the id's pending mark.
   *
   * @returns true if this call stored the coordinate
   */
  set(id: string, coordinate: LatLng): boolean {
    this.pending.delete(id);
    if (this.coordinates.has(id)) {
      return false;
    }
    this.coordinates.set(id, { lat: coordinate.lat, lng: coordinate.lng });
    this.assertConsistent(id);
    return true;
  }

  isPending(id: string): boolean {
    return this.pending.has(id);
  }

  /**
   * Mark an id as pending unless it is already resolved or pending.
   *
   * @returns true if the caller now owns the lookup for this id
   */
  claim(id: string): boolean {
    if (this.coordinates.has(id) || this.pending.has(id)) {
      return false;
    }
    this.pending.add(id);
    this.assertConsistent(id);
    return true;
  }

  /** Drop a pending mark after a failed lookup so the id can be retried */
  release(id: string): void {
    this.pending.delete(id);
  }

  /** Number of resolved coordinates */
  get size(): number {
    return this.coordinates.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Snapshot of every resolved coordinate */
  entries(): [string, LatLng][] {
    return Array.from(this.coordinates.entries());
  }

  /** Forget everything, including pending marks */
  clear(): void {
    this.coordinates.clear();
    this.pending.clear();
  }

  private assertConsistent(id: string): void {
    if (this.coordinates.has(id) && this.pending.has(id)) {
      throw new Error(`Coordinate cache invariant violated: ${id} is both cached and pending`);
    }
  }
}
