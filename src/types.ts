/**
 * Annotation Types
 *
 * Records placed on the map and the annotations derived from them.
 */

import type { LatLng } from "./geo/types";

/**
 * A record to place on the map. Supplied by the caller and never modified
 * by the pipeline; `city` and `region` are free text used for geocoding.
 */
export interface Entity {
  readonly id: string;
  readonly name?: string;
  readonly city?: string | null;
  readonly region?: string | null;
}

/** An entity paired with the coordinate known for it during one pass */
export interface Located<T extends Entity = Entity> {
  readonly entity: T;
  readonly coordinate: LatLng;
}

/** Two or more nearby entities shown as one pin */
export interface Cluster<T extends Entity = Entity> {
  /** Derived from the member ids, so equal membership gives an equal id */
  readonly id: string;
  readonly members: readonly Located<T>[];
  /** Mean of the member coordinates */
  readonly coordinate: LatLng;
}

export interface PinAnnotation<T extends Entity = Entity> {
  readonly kind: "pin";
  readonly id: string;
  readonly entity: T;
  readonly coordinate: LatLng;
}

export interface ClusterAnnotation<T extends Entity = Entity> {
  readonly kind: "cluster";
  readonly id: string;
  readonly cluster: Cluster<T>;
  readonly coordinate: LatLng;
}

/** Everything a renderer receives */
export type Annotation<T extends Entity = Entity> =
  | PinAnnotation<T>
  | ClusterAnnotation<T>;

/** What a tap on an annotation resolves to */
export type TapTarget<T extends Entity = Entity> =
  | { readonly kind: "entity"; readonly entity: T }
  | { readonly kind: "cluster"; readonly clusterId: string; readonly members: readonly T[] };

/** Build a single-entity pin */
export function pinFor<T extends Entity>(located: Located<T>): PinAnnotation<T> {
  return {
    kind: "pin",
    id: located.entity.id,
    entity: located.entity,
    coordinate: located.coordinate,
  };
}

/** True if the entity carries a non-blank city and can be geocoded */
export function hasGeocodableCity(entity: Entity): boolean {
  return typeof entity.city === "string" && entity.city.trim() !== "";
}
