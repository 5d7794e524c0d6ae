/**
 * GeoJSON export of annotation sets, for renderers that take feature
 * collections directly.
 */

import type { Feature, FeatureCollection, Point } from "geojson";
import type { Annotation, Entity } from "./types";

export interface AnnotationProperties {
  kind: "pin" | "cluster";
  id: string;
  /** Entities represented by the feature */
  count: number;
  entityIds: string[];
}

export function annotationToFeature<T extends Entity>(
  annotation: Annotation<T>
): Feature<Point, AnnotationProperties> {
  const entityIds =
    annotation.kind === "pin"
      ? [annotation.entity.id]
      : annotation.cluster.members.map((m) => m.entity.id);

  return {
    type: "Feature",
    id: annotation.id,
    geometry: {
      type: "Point",
      // GeoJSON positions are [longitude, latitude]
      coordinates: [annotation.coordinate.lng, annotation.coordinate.lat],
    },
    properties: {
      kind: annotation.kind,
      id: annotation.id,
      count: entityIds.length,
      entityIds,
    },
  };
}

export function annotationsToGeoJSON<T extends Entity>(
  annotations: readonly Annotation<T>[]
): FeatureCollection<Point, AnnotationProperties> {
  return {
    type: "FeatureCollection",
    features: annotations.map((annotation) => annotationToFeature(annotation)),
  };
}
