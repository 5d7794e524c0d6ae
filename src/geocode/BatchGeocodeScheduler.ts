/**
 * Batch Geocode Scheduler
 *
 * Collects entities that need coordinates, waits for a quiet period so a
 * burst of requests becomes one batch, then resolves the batch in small
 * sequential groups. Results land in the shared CoordinateCache and a
 * "coordinates changed" signal is raised when the most recently scheduled
 * flush finishes.
 */

import type { LatLng } from "../geo/types";
import { hasGeocodableCity, type Entity } from "../types";
import { resolveOptions, type PipelineOptions } from "../config";
import type { CoordinateCache } from "./CoordinateCache";
import type { GeocodeResolver } from "./GeocodeResolver";

export type BatchGeocodeSchedulerOptions = Pick<
  PipelineOptions,
  "geocodeQuiescenceMs" | "geocodeGroupSize" | "geocodeGroupDelayMs"
>;

/** The part of the resolver the scheduler calls */
export type CoordinateResolver = Pick<GeocodeResolver, "resolve">;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BatchGeocodeScheduler<T extends Entity = Entity> {
  private cache: CoordinateCache;
  private resolver: CoordinateResolver;

  /** Callback when new coordinates are available */
  private onCoordinatesChanged?: () => void;

  private quiescenceMs: number;
  private groupSize: number;
  private groupDelayMs: number;

  /** Entities claimed since the last flush started */
  private buffer: T[] = [];

  /** The one scheduled flush. Replaced, never stacked. */
  private flushTimer: ReturnType<typeof setTimeout> | null = null;

  /** Flushes started and not yet finished */
  private runningFlushes = 0;

  /** Coordinates stored since the last signal */
  private hasUnsignaledUpdates = false;

  /** Generation of the most recently scheduled flush */
  private scheduledGeneration = 0;

  /** Latest generation whose flush has finished */
  private completedGeneration = 0;

  private idleWaiters: (() => void)[] = [];
  private disposed = false;

  constructor(
    cache: CoordinateCache,
    resolver: CoordinateResolver,
    options: Partial<BatchGeocodeSchedulerOptions> = {},
    onCoordinatesChanged?: () => void
  ) {
    const resolved = resolveOptions(options);
    this.cache = cache;
    this.resolver = resolver;
    this.quiescenceMs = resolved.geocodeQuiescenceMs;
    this.groupSize = resolved.geocodeGroupSize;
    this.groupDelayMs = resolved.geocodeGroupDelayMs;
    this.onCoordinatesChanged = onCoordinatesChanged;
  }

  /**
   * Queue an entity for geocoding (non-blocking).
   * Entities without a city, already cached, or already pending are skipped.
   *
   * @returns true if the entity was queued by this call
   */
  requestGeocode(entity: T): boolean {
    if (this.disposed) return false;
    if (!hasGeocodableCity(entity)) return false;
    if (!this.cache.claim(entity.id)) return false;

    this.buffer.push(entity);
    this.scheduleFlush();
    return true;
  }

  /**
   * Queue every entity that still lacks a coordinate.
   *
   * @returns Number of entities queued
   */
  preload(entities: Iterable<T>): number {
    let queued = 0;
    for (const entity of entities) {
      if (this.requestGeocode(entity)) queued++;
    }
    return queued;
  }

  /** True when nothing is buffered, scheduled or running */
  get isIdle(): boolean {
    return this.flushTimer === null && this.runningFlushes === 0;
  }

  /** Entities waiting for the next flush */
  get bufferedCount(): number {
    return this.buffer.length;
  }

  /** Resolves once no flush is scheduled or running */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Cancel the scheduled flush and stop signalling.
   * Lookups already issued finish and still fill the cache.
   */
  dispose(): void {
    this.disposed = true;
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    for (const entity of this.buffer) {
      this.cache.release(entity.id);
    }
    this.buffer = [];
    this.resolveIdleWaiters();
  }

  /** Cancel any scheduled flush and start a new quiet period */
  private scheduleFlush(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
    }
    const generation = ++this.scheduledGeneration;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      void this.flush(generation);
    }, this.quiescenceMs);
  }

  private async flush(generation: number): Promise<void> {
    const batch = this.buffer;
    this.buffer = [];
    this.runningFlushes++;

    try {
      for (let start = 0; start < batch.length; start += this.groupSize) {
        if (start > 0 && this.groupDelayMs > 0) {
          await sleep(this.groupDelayMs);
        }
        const group = batch.slice(start, start + this.groupSize);
        const stored = await Promise.all(group.map((entity) => this.resolveEntity(entity)));
        if (stored.includes(true)) {
          this.hasUnsignaledUpdates = true;
        }
      }
    } finally {
      this.runningFlushes--;
      this.finishFlush(generation);
    }
  }

  /**
   * Resolve one entity and record the outcome.
   * A failure only affects this entity; siblings in the group carry on.
   */
  private async resolveEntity(entity: T): Promise<boolean> {
    let coordinate: LatLng | null = null;
    try {
      coordinate = await this.resolver.resolve(entity.city, entity.region);
    } catch (error) {
      console.warn(`Geocoding failed for entity ${entity.id}:`, error);
    }

    if (coordinate) {
      return this.cache.set(entity.id, coordinate);
    }
    this.cache.release(entity.id);
    return false;
  }

  /**
   * The current flush signals as soon as it finishes, carrying any updates
   * older flushes stored before it. Older flushes that finish later send
   * one catch-up signal once the last of them is done.
   */
  private finishFlush(generation: number): void {
    if (generation === this.scheduledGeneration) {
      this.completedGeneration = generation;
      this.signalChanges();
    } else if (this.completedGeneration === this.scheduledGeneration && this.runningFlushes === 0) {
      this.signalChanges();
    }
    this.resolveIdleWaiters();
  }

  private signalChanges(): void {
    if (!this.hasUnsignaledUpdates || this.disposed) return;

    this.hasUnsignaledUpdates = false;
    try {
      this.onCoordinatesChanged?.();
    } catch (error) {
      console.error("Coordinates-changed listener threw:", error);
    }
  }

  private resolveIdleWaiters(): void {
    if (!this.isIdle) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
