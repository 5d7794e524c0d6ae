/**
 * Spatial Clusterer
 *
 * Groups nearby entities into clusters whose radius shrinks as the user
 * zooms in. Entities are hashed into grid cells about 1.5 cluster radii
 * wide, then grouped greedily inside each cell: the first unprocessed
 * entity anchors a cluster and absorbs every other unprocessed entity in
 * the same cell within the radius.
 *
 * Neighbours on opposite sides of a cell edge are never merged, even when
 * they are closer than the radius. That keeps the pass near-linear.
 */

import type { LatLng } from "../geo/types";
import { haversineMeters } from "../geo/distance";
import { pinFor, type Annotation, type Cluster, type Entity, type Located } from "../types";
import { resolveOptions, type PipelineOptions } from "../config";
import { SpatialGrid } from "./SpatialGrid";

/** Meters per degree of latitude, used to size grid cells */
export const METERS_PER_DEGREE = 111320;

export type SpatialClustererOptions = Pick<
  PipelineOptions,
  | "minIndividualZoom"
  | "maxClusteringZoom"
  | "clusterRadiusMeters"
  | "minZoomFactor"
  | "cellSizeFactor"
>;

/**
 * Stable id for a set of member ids (32-bit FNV-1a over the sorted ids).
 * Equal membership yields an equal id regardless of order.
 */
export function clusterIdFor(memberIds: readonly string[]): string {
  const sorted = [...memberIds].sort();
  let hash = 0x811c9dc5;
  for (const id of sorted) {
    for (let i = 0; i < id.length; i++) {
      hash ^= id.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
    // Unit separator between ids, so ["ab", "c"] and ["a", "bc"] differ
    hash ^= 0x1f;
    hash = Math.imul(hash, 0x01000193);
  }
  return `cluster-${(hash >>> 0).toString(16).padStart(8, "0")}-${sorted.length}`;
}

/** Arithmetic mean of coordinates */
export function centroidOf(coordinates: readonly LatLng[]): LatLng {
  let lat = 0;
  let lng = 0;
  for (const c of coordinates) {
    lat += c.lat;
    lng += c.lng;
  }
  return { lat: lat / coordinates.length, lng: lng / coordinates.length };
}

export class SpatialClusterer<T extends Entity = Entity> {
  private options: SpatialClustererOptions;

  constructor(options: Partial<SpatialClustererOptions> = {}) {
    this.options = resolveOptions(options);
  }

  /**
   * Position of the span between the individual and clustering thresholds,
   * clamped to [minZoomFactor, 1].
   */
  zoomFactor(span: number): number {
    const { minIndividualZoom, maxClusteringZoom, minZoomFactor } = this.options;
    const t = (span - minIndividualZoom) / (maxClusteringZoom - minIndividualZoom);
    return Math.max(minZoomFactor, Math.min(1, t));
  }

  /** Cluster radius in meters for a span */
  clusterRadius(span: number): number {
    return this.options.clusterRadiusMeters * this.zoomFactor(span);
  }

  /** Grid cell size in degrees for a span */
  cellSize(span: number): number {
    return (this.clusterRadius(span) * this.options.cellSizeFactor) / METERS_PER_DEGREE;
  }

  /**
   * Partition located entities into clusters and standalone pins.
   *
   * Every input entity appears exactly once in the output. Clusters come
   * first (in cell order), followed by unclustered pins in input order.
   *
   * @param located - Entities with coordinates; duplicate ids after the first are ignored
   * @param span - Latitude span of the viewport in degrees
   */
  cluster(located: readonly Located<T>[], span: number): Annotation<T>[] {
    const unique = uniqueById(located);
    if (unique.length < 2) {
      return unique.map(pinFor);
    }

    const radius = this.clusterRadius(span);
    const grid = new SpatialGrid<Located<T>>(this.cellSize(span));
    for (const item of unique) {
      grid.insert(item.coordinate, item);
    }

    const processed = new Set<string>();
    const clustered = new Set<string>();
    const annotations: Annotation<T>[] = [];

    for (const cell of grid.occupiedCells()) {
      for (const anchor of cell) {
        if (processed.has(anchor.entity.id)) continue;
        processed.add(anchor.entity.id);

        const members: Located<T>[] = [anchor];
        for (const other of cell) {
          if (processed.has(other.entity.id)) continue;
          if (haversineMeters(anchor.coordinate, other.coordinate) <= radius) {
            members.push(other);
            processed.add(other.entity.id);
          }
        }

        if (members.length > 1) {
          const cluster = makeCluster(members);
          for (const member of members) {
            clustered.add(member.entity.id);
          }
          annotations.push({
            kind: "cluster",
            id: cluster.id,
            cluster,
            coordinate: cluster.coordinate,
          });
        }
      }
    }

    for (const item of unique) {
      if (!clustered.has(item.entity.id)) {
        annotations.push(pinFor(item));
      }
    }

    return annotations;
  }
}

function makeCluster<T extends Entity>(members: Located<T>[]): Cluster<T> {
  return {
    id: clusterIdFor(members.map((m) => m.entity.id)),
    members,
    coordinate: centroidOf(members.map((m) => m.coordinate)),
  };
}

function uniqueById<T extends Entity>(located: readonly Located<T>[]): Located<T>[] {
  const seen = new Set<string>();
  const unique: Located<T>[] = [];
  for (const item of located) {
    if (seen.has(item.entity.id)) continue;
    seen.add(item.entity.id);
    unique.push(item);
  }
  return unique;
}
