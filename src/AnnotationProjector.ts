/**
 * Annotation Projector
 *
 * Chooses between individual pins and clustering for the current zoom and
 * emits the annotation set to a listener, skipping emissions that would
 * repeat the previous set.
 */

import { pinFor, type Annotation, type Entity, type Located } from "./types";
import { resolveOptions, type PipelineOptions } from "./config";
import type { SpatialClusterer } from "./cluster/SpatialClusterer";

export type AnnotationProjectorOptions = Pick<
  PipelineOptions,
  "minIndividualZoom" | "maxClusteringZoom"
>;

/**
 * - `individual`: zoomed in past minIndividualZoom
 * - `medium`: between the thresholds, still individual pins
 * - `clustered`: zoomed out past maxClusteringZoom
 */
export type ZoomMode = "individual" | "medium" | "clustered";

export class AnnotationProjector<T extends Entity = Entity> {
  private clusterer: SpatialClusterer<T>;
  private onAnnotations?: (annotations: readonly Annotation<T>[]) => void;
  private minIndividualZoom: number;
  private maxClusteringZoom: number;

  private lastEmitted: readonly Annotation<T>[] = [];
  private lastSignature: string | null = null;
  private lastEntities: readonly T[] = [];

  constructor(
    clusterer: SpatialClusterer<T>,
    options: Partial<AnnotationProjectorOptions> = {},
    onAnnotations?: (annotations: readonly Annotation<T>[]) => void
  ) {
    const resolved = resolveOptions(options);
    this.clusterer = clusterer;
    this.minIndividualZoom = resolved.minIndividualZoom;
    this.maxClusteringZoom = resolved.maxClusteringZoom;
    this.onAnnotations = onAnnotations;
  }

  zoomMode(span: number): ZoomMode {
    if (span < this.minIndividualZoom) return "individual";
    if (span > this.maxClusteringZoom) return "clustered";
    return "medium";
  }

  /** Compute annotations without touching the emitted state */
  project(located: readonly Located<T>[], span: number): Annotation<T>[] {
    if (this.zoomMode(span) === "clustered") {
      return this.clusterer.cluster(located, span);
    }
    return located.map(pinFor);
  }

  /**
   * Recompute and emit if the result differs from the last emission.
   * Replacing an entity record with a new object under the same id counts
   * as a change.
   *
   * @returns true if the listener was called
   */
  update(located: readonly Located<T>[], span: number): boolean {
    const annotations = this.project(located, span);
    const signature = signatureOf(annotations);
    const entities = entitiesOf(annotations);
    if (signature === this.lastSignature && sameEntities(entities, this.lastEntities)) {
      return false;
    }

    this.lastSignature = signature;
    this.lastEntities = entities;
    this.lastEmitted = annotations;
    this.onAnnotations?.(annotations);
    return true;
  }

  /** The last emitted annotation set */
  get current(): readonly Annotation<T>[] {
    return this.lastEmitted;
  }

  /** Forget the last emission so the next update always emits */
  reset(): void {
    this.lastEmitted = [];
    this.lastSignature = null;
    this.lastEntities = [];
  }
}

/** Identity of an annotation set: ids and positions, in order */
function signatureOf<T extends Entity>(annotations: readonly Annotation<T>[]): string {
  return annotations
    .map((a) => `${a.kind}:${a.id}@${a.coordinate.lat},${a.coordinate.lng}`)
    .join(";");
}

/** Entity records behind an annotation set, in order */
function entitiesOf<T extends Entity>(annotations: readonly Annotation<T>[]): T[] {
  return annotations.flatMap((a) =>
    a.kind === "pin" ? [a.entity] : a.cluster.members.map((m) => m.entity)
  );
}

function sameEntities<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((entity, i) => entity === b[i]);
}
