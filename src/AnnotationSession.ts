/**
 * Annotation Session
 *
 * Wires the pipeline together for one map screen: raw region changes are
 * debounced, settled viewports are filtered against the coordinate cache,
 * and the visible entities are projected into annotations. Entities
 * without coordinates are geocoded in the background; when coordinates
 * land the current viewport is filtered and projected again.
 */

import type { LatLng, Viewport } from "./geo/types";
import { fitViewport } from "./geo/viewport";
import { distanceInMiles } from "./geo/distance";
import type { Annotation, Entity, TapTarget } from "./types";
import { resolveOptions, type PipelineOptions } from "./config";
import { CoordinateCache } from "./geocode/CoordinateCache";
import { GeocodeResolver, type GeocodeProvider } from "./geocode/GeocodeResolver";
import { BatchGeocodeScheduler } from "./geocode/BatchGeocodeScheduler";
import { ViewportDebouncer } from "./viewport/ViewportDebouncer";
import { ViewportFilter } from "./viewport/ViewportFilter";
import { SpatialClusterer } from "./cluster/SpatialClusterer";
import { AnnotationProjector } from "./AnnotationProjector";

export interface AnnotationSessionListeners<T extends Entity> {
  /** New annotation set to render */
  onAnnotations?: (annotations: readonly Annotation<T>[]) => void;
  /** Geocoding stored new coordinates */
  onCoordinatesChanged?: () => void;
}

export class AnnotationSession<T extends Entity = Entity> {
  readonly cache = new CoordinateCache();
  readonly resolver: GeocodeResolver;
  readonly scheduler: BatchGeocodeScheduler<T>;

  private debouncer: ViewportDebouncer;
  private filter: ViewportFilter<T>;
  private projector: AnnotationProjector<T>;
  private listeners: AnnotationSessionListeners<T>;

  private entities: readonly T[] = [];
  private viewport: Viewport | null = null;
  private disposed = false;

  constructor(
    provider: GeocodeProvider,
    options: Partial<PipelineOptions> = {},
    listeners: AnnotationSessionListeners<T> = {}
  ) {
    const resolved = resolveOptions(options);
    this.listeners = listeners;

    this.resolver = new GeocodeResolver(provider, resolved);
    this.scheduler = new BatchGeocodeScheduler<T>(
      this.cache,
      this.resolver,
      resolved,
      () => this.handleCoordinatesChanged()
    );
    this.debouncer = new ViewportDebouncer((viewport) => this.handleSettled(viewport), resolved);
    this.filter = new ViewportFilter<T>(this.cache, this.scheduler, resolved);
    this.projector = new AnnotationProjector<T>(
      new SpatialClusterer<T>(resolved),
      resolved,
      (annotations) => this.listeners.onAnnotations?.(annotations)
    );
  }

  /** Replace the entity list and recompute */
  setEntities(entities: readonly T[]): void {
    this.entities = [...entities];
    this.refresh();
  }

  /** Raw pan/zoom tick; recomputes once the region settles */
  onRegionChanged(viewport: Viewport): void {
    if (this.disposed) return;
    this.debouncer.onRegionChanged(viewport);
  }

  /** Jump to a viewport immediately, bypassing the debounce */
  setViewport(viewport: Viewport): void {
    this.debouncer.cancel();
    this.viewport = viewport;
    this.refresh();
  }

  get currentViewport(): Viewport | null {
    return this.viewport;
  }

  /** Filter and project the current viewport from the current cache */
  refresh(): void {
    if (this.disposed || !this.viewport) return;
    const visible = this.filter.filter(this.entities, this.viewport);
    this.projector.update(visible, this.viewport.span.latitudeDelta);
  }

  get annotations(): readonly Annotation<T>[] {
    return this.projector.current;
  }

  /**
   * Resolve a tapped annotation to its entity or cluster members.
   *
   * An entity id can coincide with a generated cluster id; pass the
   * tapped annotation's kind to tell them apart. Without it pins match
   * first.
   */
  resolveTap(annotationId: string, kind?: Annotation<T>["kind"]): TapTarget<T> | null {
    const candidates = this.projector.current.filter(
      (a) => a.id === annotationId && (kind === undefined || a.kind === kind)
    );
    const annotation = candidates.find((a) => a.kind === "pin") ?? candidates[0];
    if (!annotation) return null;

    if (annotation.kind === "pin") {
      return { kind: "entity", entity: annotation.entity };
    }
    return {
      kind: "cluster",
      clusterId: annotation.id,
      members: annotation.cluster.members.map((m) => m.entity),
    };
  }

  /**
   * Queue geocoding for every entity without a coordinate.
   *
   * @returns Number of entities queued
   */
  preloadCoordinates(): number {
    if (this.disposed) return 0;
    return this.scheduler.preload(this.entities);
  }

  coordinateFor(entity: T): LatLng | undefined {
    return this.cache.get(entity.id);
  }

  /** Miles from a point to an entity, or null if the entity is not geocoded */
  distanceInMilesTo(entity: T, from: LatLng): number | null {
    const coordinate = this.cache.get(entity.id);
    return coordinate ? distanceInMiles(from, coordinate) : null;
  }

  /** Viewport showing every geocoded entity, or null if none are */
  fitToEntities(): Viewport | null {
    const coordinates: LatLng[] = [];
    for (const entity of this.entities) {
      const coordinate = this.cache.get(entity.id);
      if (coordinate) coordinates.push(coordinate);
    }
    return fitViewport(coordinates);
  }

  /** Resolves once background geocoding has gone quiet */
  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  dispose(): void {
    this.disposed = true;
    this.debouncer.cancel();
    this.scheduler.dispose();
  }

  private handleSettled(viewport: Viewport): void {
    this.viewport = viewport;
    this.refresh();
  }

  private handleCoordinatesChanged(): void {
    this.listeners.onCoordinatesChanged?.();
    this.refresh();
  }
}
