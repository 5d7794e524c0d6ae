/**
 * Viewport Filter
 *
 * Picks the entities whose cached coordinate falls inside the padded
 * viewport. Entities without a coordinate are left out of this pass and
 * handed to the geocode scheduler so a later pass can include them.
 */

import type { LatLng, Viewport } from "../geo/types";
import { containsCoordinate, paddedBounds } from "../geo/viewport";
import { distanceInMiles } from "../geo/distance";
import type { Entity, Located } from "../types";
import { resolveOptions, type PipelineOptions } from "../config";
import type { CoordinateCache } from "../geocode/CoordinateCache";

export type ViewportFilterOptions = Pick<
  PipelineOptions,
  "viewportPadding" | "maxVisibleEntities"
>;

/** Receives entities that still need a coordinate */
export interface GeocodeRequester<T extends Entity> {
  requestGeocode(entity: T): boolean;
}

export class ViewportFilter<T extends Entity = Entity> {
  private cache: CoordinateCache;
  private requester: GeocodeRequester<T>;
  private padding: number;
  private maxVisible: number;

  constructor(
    cache: CoordinateCache,
    requester: GeocodeRequester<T>,
    options: Partial<ViewportFilterOptions> = {}
  ) {
    const resolved = resolveOptions(options);
    this.cache = cache;
    this.requester = requester;
    this.padding = resolved.viewportPadding;
    this.maxVisible = resolved.maxVisibleEntities;
  }

  /**
   * Entities visible in the viewport, in input order, capped at
   * maxVisibleEntities.
   */
  filter(entities: Iterable<T>, viewport: Viewport): Located<T>[] {
    const bounds = paddedBounds(viewport, this.padding);
    return this.collect(entities, (coordinate) => containsCoordinate(bounds, coordinate));
  }

  /**
   * Entities within radiusMiles of origin (inclusive), in input order,
   * capped at maxVisibleEntities.
   */
  filterWithinRadius(entities: Iterable<T>, origin: LatLng, radiusMiles: number): Located<T>[] {
    if (!(radiusMiles >= 0)) {
      throw new Error(`Radius must be a non-negative number of miles, got ${radiusMiles}`);
    }
    return this.collect(entities, (coordinate) => distanceInMiles(origin, coordinate) <= radiusMiles);
  }

  private collect(entities: Iterable<T>, accept: (coordinate: LatLng) => boolean): Located<T>[] {
    const visible: Located<T>[] = [];

    for (const entity of entities) {
      const coordinate = this.cache.get(entity.id);
      if (!coordinate) {
        // Every uncached entity is queued, even once the cap is reached
        this.requester.requestGeocode(entity);
        continue;
      }
      if (visible.length < this.maxVisible && accept(coordinate)) {
        visible.push({ entity, coordinate });
      }
    }

    return visible;
  }
}
