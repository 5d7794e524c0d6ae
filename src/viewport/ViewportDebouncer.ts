/**
 * Viewport Debouncer
 *
 * Collapses a stream of raw pan/zoom ticks into one "settled" event per
 * pause. Every tick restarts the quiet period; when it elapses the latest
 * viewport is emitted, unless it is within jitter of the last emission.
 */

import type { Viewport } from "../geo/types";
import { viewportsClose } from "../geo/viewport";
import { resolveOptions, type PipelineOptions } from "../config";

export type ViewportDebouncerOptions = Pick<
  PipelineOptions,
  "viewportQuiescenceMs" | "centerEpsilon" | "spanEpsilon"
>;

export class ViewportDebouncer {
  private onSettled: (viewport: Viewport) => void;
  private quiescenceMs: number;
  private centerEpsilon: number;
  private spanEpsilon: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private latest: Viewport | null = null;
  private lastEmitted: Viewport | null = null;

  constructor(
    onSettled: (viewport: Viewport) => void,
    options: Partial<ViewportDebouncerOptions> = {}
  ) {
    const resolved = resolveOptions(options);
    this.onSettled = onSettled;
    this.quiescenceMs = resolved.viewportQuiescenceMs;
    this.centerEpsilon = resolved.centerEpsilon;
    this.spanEpsilon = resolved.spanEpsilon;
  }

  /** Call on every raw region change */
  onRegionChanged(viewport: Viewport): void {
    this.latest = viewport;
    if (this.timer !== null) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.emit();
    }, this.quiescenceMs);
  }

  /** Emit the pending viewport now instead of waiting */
  flush(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
    this.emit();
  }

  /** Drop the pending viewport without emitting */
  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.latest = null;
  }

  /** True while a change is waiting out its quiet period */
  get isPending(): boolean {
    return this.timer !== null;
  }

  /** Last viewport passed downstream */
  get lastSettled(): Viewport | null {
    return this.lastEmitted;
  }

  private emit(): void {
    const viewport = this.latest;
    this.latest = null;
    if (!viewport) return;

    if (
      this.lastEmitted &&
      viewportsClose(this.lastEmitted, viewport, this.centerEpsilon, this.spanEpsilon)
    ) {
      return;
    }

    this.lastEmitted = viewport;
    this.onSettled(viewport);
  }
}
