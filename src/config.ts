/**
 * Pipeline configuration.
 */

export interface PipelineOptions {
  /** Quiet period before buffered geocode requests are flushed (ms) */
  geocodeQuiescenceMs: number;
  /** Geocode calls issued together in one group */
  geocodeGroupSize: number;
  /** Pause between geocode groups (ms) */
  geocodeGroupDelayMs: number;
  /** Hard cap on simultaneous provider calls */
  maxConcurrentGeocodes: number;
  /** Appended to every lookup address; empty string to omit */
  countrySuffix: string;

  /** Quiet period before a viewport change is considered settled (ms) */
  viewportQuiescenceMs: number;
  /** Center movement below this is jitter (degrees) */
  centerEpsilon: number;
  /** Span change below this is jitter (degrees) */
  spanEpsilon: number;
  /** Fraction of the latitude span added around the viewport */
  viewportPadding: number;
  /** Visible entities considered per pass */
  maxVisibleEntities: number;

  /** Spans below this always show individual pins (degrees) */
  minIndividualZoom: number;
  /** Spans above this are clustered (degrees) */
  maxClusteringZoom: number;
  /** Cluster radius when fully zoomed out (meters) */
  clusterRadiusMeters: number;
  /** Lower clamp of the zoom factor */
  minZoomFactor: number;
  /** Grid cell size as a multiple of the cluster radius */
  cellSizeFactor: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  geocodeQuiescenceMs: 100,
  geocodeGroupSize: 5,
  geocodeGroupDelayMs: 100,
  maxConcurrentGeocodes: 5,
  countrySuffix: "USA",

  viewportQuiescenceMs: 300,
  centerEpsilon: 0.001,
  spanEpsilon: 0.01,
  viewportPadding: 0.2,
  maxVisibleEntities: 500,

  minIndividualZoom: 0.05,
  maxClusteringZoom: 0.5,
  clusterRadiusMeters: 20000,
  minZoomFactor: 0.1,
  cellSizeFactor: 1.5,
};

/**
 * Merge partial options over the defaults and reject impossible values.
 */
export function resolveOptions(options: Partial<PipelineOptions> = {}): PipelineOptions {
  const resolved = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  validateOptions(resolved);
  return resolved;
}

export function validateOptions(options: PipelineOptions): void {
  const positive: (keyof PipelineOptions)[] = [
    "geocodeGroupSize",
    "maxConcurrentGeocodes",
    "maxVisibleEntities",
    "clusterRadiusMeters",
    "cellSizeFactor",
  ];
  for (const key of positive) {
    const value = options[key];
    if (typeof value !== "number" || !(value > 0)) {
      throw new Error(`Invalid pipeline option ${key}: expected a positive number, got ${String(value)}`);
    }
  }

  const nonNegative: (keyof PipelineOptions)[] = [
    "geocodeQuiescenceMs",
    "geocodeGroupDelayMs",
    "viewportQuiescenceMs",
    "centerEpsilon",
    "spanEpsilon",
    "minIndividualZoom",
  ];
  for (const key of nonNegative) {
    const value = options[key];
    if (typeof value !== "number" || !(value >= 0)) {
      throw new Error(`Invalid pipeline option ${key}: expected a non-negative number, got ${String(value)}`);
    }
  }

  if (!(options.viewportPadding >= 0 && options.viewportPadding <= 1)) {
    throw new Error(`Invalid pipeline option viewportPadding: ${options.viewportPadding} is outside [0, 1]`);
  }
  if (!(options.minZoomFactor >= 0 && options.minZoomFactor <= 1)) {
    throw new Error(`Invalid pipeline option minZoomFactor: ${options.minZoomFactor} is outside [0, 1]`);
  }
  if (!(options.minIndividualZoom < options.maxClusteringZoom)) {
    throw new Error(
      `minIndividualZoom (${options.minIndividualZoom}) must be below maxClusteringZoom (${options.maxClusteringZoom})`
    );
  }
}
