import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BatchGeocodeScheduler } from "./BatchGeocodeScheduler";
import { CoordinateCache } from "./CoordinateCache";
import { GeocodeResolver } from "./GeocodeResolver";
import type { LatLng } from "../geo/types";
import type { Entity } from "../types";

type ResolveFn = (city: string | null | undefined, region?: string | null) => Promise<LatLng | null>;

/** Resolver that answers from a fixed table of cities */
function createTableResolver(table: Record<string, LatLng>) {
  return {
    resolve: vi.fn<Parameters<ResolveFn>, ReturnType<ResolveFn>>(async (city) => {
      if (!city) return null;
      return table[city] ?? null;
    }),
  };
}

/** Resolver whose lookups stay open until the test settles them */
function createControlledResolver() {
  const pending = new Map<string, (value: LatLng | null) => void>();
  const resolver = {
    resolve: vi.fn<Parameters<ResolveFn>, ReturnType<ResolveFn>>(
      (city) =>
        new Promise((resolve) => {
          pending.set(city ?? "", resolve);
        })
    ),
  };
  const settle = (city: string, value: LatLng | null) => {
    const resolve = pending.get(city);
    if (!resolve) throw new Error(`No lookup open for ${city}`);
    pending.delete(city);
    resolve(value);
  };
  return { resolver, settle };
}

const AUSTIN = { lat: 30.27, lng: -97.74 };
const ROUND_ROCK = { lat: 30.51, lng: -97.68 };

describe("BatchGeocodeScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("requestGeocode", () => {
    it("queues an entity at most once while it is pending", async () => {
      const cache = new CoordinateCache();
      const resolver = createTableResolver({ Austin: AUSTIN });
      const scheduler = new BatchGeocodeScheduler(cache, resolver);
      const entity: Entity = { id: "pet-1", city: "Austin", region: "TX" };

      expect(scheduler.requestGeocode(entity)).toBe(true);
      expect(scheduler.requestGeocode(entity)).toBe(false);
      expect(scheduler.requestGeocode({ ...entity })).toBe(false);
      expect(scheduler.bufferedCount).toBe(1);

      await vi.runAllTimersAsync();
      await scheduler.whenIdle();

      expect(resolver.resolve).toHaveBeenCalledTimes(1);
      expect(resolver.resolve).toHaveBeenCalledWith("Austin", "TX");
      expect(cache.get("pet-1")).toEqual(AUSTIN);
    });

    it("skips entities that are already cached", () => {
      const cache = new CoordinateCache();
      cache.set("pet-1", AUSTIN);
      const scheduler = new BatchGeocodeScheduler(cache, createTableResolver({}));

      expect(scheduler.requestGeocode({ id: "pet-1", city: "Austin" })).toBe(false);
      expect(scheduler.isIdle).toBe(true);
    });

    it("never queues an entity without a city", async () => {
      const cache = new CoordinateCache();
      const resolver = createTableResolver({});
      const scheduler = new BatchGeocodeScheduler(cache, resolver);

      expect(scheduler.requestGeocode({ id: "a" })).toBe(false);
      expect(scheduler.requestGeocode({ id: "b", city: null, region: "TX" })).toBe(false);
      expect(scheduler.requestGeocode({ id: "c", city: "   " })).toBe(false);

      expect(cache.pendingCount).toBe(0);
      expect(scheduler.isIdle).toBe(true);
      await vi.runAllTimersAsync();
      expect(resolver.resolve).not.toHaveBeenCalled();
    });
  });

  it("waits for a quiet period before flushing", async () => {
    const cache = new CoordinateCache();
    const resolver = createTableResolver({ Austin: AUSTIN, "Round Rock": ROUND_ROCK });
    const scheduler = new BatchGeocodeScheduler(cache, resolver, { geocodeQuiescenceMs: 100 });

    scheduler.requestGeocode({ id: "a", city: "Austin" });
    await vi.advanceTimersByTimeAsync(60);
    scheduler.requestGeocode({ id: "b", city: "Round Rock" });

    await vi.advanceTimersByTimeAsync(99);
    expect(resolver.resolve).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(resolver.resolve).toHaveBeenCalledTimes(2);
    expect(scheduler.bufferedCount).toBe(0);
  });

  it("resolves a batch in sequential groups with a pause between them", async () => {
    const cache = new CoordinateCache();
    const resolver = createTableResolver({});
    const scheduler = new BatchGeocodeScheduler(cache, resolver, {
      geocodeQuiescenceMs: 100,
      geocodeGroupSize: 5,
      geocodeGroupDelayMs: 100,
    });

    for (let i = 0; i < 12; i++) {
      scheduler.requestGeocode({ id: `e${i}`, city: `City ${i}` });
    }

    await vi.advanceTimersByTimeAsync(100);
    expect(resolver.resolve).toHaveBeenCalledTimes(5);

    await vi.advanceTimersByTimeAsync(99);
    expect(resolver.resolve).toHaveBeenCalledTimes(5);

    await vi.advanceTimersByTimeAsync(1);
    expect(resolver.resolve).toHaveBeenCalledTimes(10);

    await vi.advanceTimersByTimeAsync(100);
    expect(resolver.resolve).toHaveBeenCalledTimes(12);
    expect(resolver.resolve.mock.calls.map(([city]) => city)).toEqual(
      Array.from({ length: 12 }, (_, i) => `City ${i}`)
    );
  });

  it("keeps a failure confined to its own entity", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const cache = new CoordinateCache();
    const lookupError = new Error("service unavailable");
    const resolver = {
      resolve: vi.fn<Parameters<ResolveFn>, ReturnType<ResolveFn>>(async (city) => {
        if (city === "Broken") throw lookupError;
        if (city === "Austin") return AUSTIN;
        return null;
      }),
    };
    const scheduler = new BatchGeocodeScheduler(cache, resolver);

    scheduler.requestGeocode({ id: "good", city: "Austin" });
    scheduler.requestGeocode({ id: "bad", city: "Broken" });
    scheduler.requestGeocode({ id: "unknown", city: "Nowhere" });

    await vi.runAllTimersAsync();
    await scheduler.whenIdle();

    expect(cache.get("good")).toEqual(AUSTIN);
    expect(cache.has("bad")).toBe(false);
    expect(cache.isPending("bad")).toBe(false);
    expect(cache.has("unknown")).toBe(false);
    expect(cache.isPending("unknown")).toBe(false);
    expect(warn).toHaveBeenCalledWith("Geocoding failed for entity bad:", lookupError);
  });

  it("allows another attempt after a failed lookup", async () => {
    const cache = new CoordinateCache();
    const resolver = createTableResolver({});
    const scheduler = new BatchGeocodeScheduler(cache, resolver);
    const entity: Entity = { id: "pet-1", city: "Nowhere" };

    scheduler.requestGeocode(entity);
    await vi.runAllTimersAsync();
    await scheduler.whenIdle();

    expect(scheduler.requestGeocode(entity)).toBe(true);
    await vi.runAllTimersAsync();
    expect(resolver.resolve).toHaveBeenCalledTimes(2);
  });

  describe("coordinates changed signal", () => {
    it("fires once after a batch that stored coordinates", async () => {
      const onChanged = vi.fn();
      const scheduler = new BatchGeocodeScheduler(
        new CoordinateCache(),
        createTableResolver({ Austin: AUSTIN, "Round Rock": ROUND_ROCK }),
        {},
        onChanged
      );

      scheduler.requestGeocode({ id: "a", city: "Austin" });
      scheduler.requestGeocode({ id: "b", city: "Round Rock" });
      await vi.runAllTimersAsync();
      await scheduler.whenIdle();

      expect(onChanged).toHaveBeenCalledTimes(1);
    });

    it("does not fire when nothing was stored", async () => {
      const onChanged = vi.fn();
      const scheduler = new BatchGeocodeScheduler(
        new CoordinateCache(),
        createTableResolver({}),
        {},
        onChanged
      );

      scheduler.requestGeocode({ id: "a", city: "Nowhere" });
      await vi.runAllTimersAsync();
      await scheduler.whenIdle();

      expect(onChanged).not.toHaveBeenCalled();
    });

    it("includes updates from an older flush that finished first", async () => {
      const onChanged = vi.fn();
      const cache = new CoordinateCache();
      const { resolver, settle } = createControlledResolver();
      const scheduler = new BatchGeocodeScheduler(cache, resolver, { geocodeQuiescenceMs: 100 }, onChanged);

      scheduler.requestGeocode({ id: "a", city: "Austin" });
      await vi.advanceTimersByTimeAsync(100);
      expect(resolver.resolve).toHaveBeenCalledTimes(1);

      // A second batch is scheduled while the first is still running
      scheduler.requestGeocode({ id: "b", city: "Round Rock" });
      settle("Austin", AUSTIN);
      await vi.advanceTimersByTimeAsync(10);

      expect(cache.get("a")).toEqual(AUSTIN);
      expect(onChanged).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(90);
      expect(resolver.resolve).toHaveBeenCalledTimes(2);
      settle("Round Rock", null);
      await vi.advanceTimersByTimeAsync(0);
      await scheduler.whenIdle();

      expect(onChanged).toHaveBeenCalledTimes(1);
    });

    it("signals when the newest flush finishes while an older one is still running", async () => {
      const onChanged = vi.fn();
      const cache = new CoordinateCache();
      const { resolver, settle } = createControlledResolver();
      const scheduler = new BatchGeocodeScheduler(cache, resolver, { geocodeQuiescenceMs: 100 }, onChanged);

      scheduler.requestGeocode({ id: "a", city: "Slow" });
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestGeocode({ id: "b", city: "Fast" });
      await vi.advanceTimersByTimeAsync(100);
      expect(resolver.resolve).toHaveBeenCalledTimes(2);

      settle("Fast", ROUND_ROCK);
      await vi.advanceTimersByTimeAsync(0);

      expect(cache.get("b")).toEqual(ROUND_ROCK);
      expect(onChanged).toHaveBeenCalledTimes(1);
      expect(scheduler.isIdle).toBe(false);

      // The older flush still lands and sends one catch-up signal
      settle("Slow", AUSTIN);
      await vi.advanceTimersByTimeAsync(0);
      await scheduler.whenIdle();

      expect(cache.get("a")).toEqual(AUSTIN);
      expect(onChanged).toHaveBeenCalledTimes(2);
    });

    it("sends no catch-up signal when the older flush stored nothing", async () => {
      const onChanged = vi.fn();
      const { resolver, settle } = createControlledResolver();
      const scheduler = new BatchGeocodeScheduler(
        new CoordinateCache(),
        resolver,
        { geocodeQuiescenceMs: 100 },
        onChanged
      );

      scheduler.requestGeocode({ id: "a", city: "Slow" });
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestGeocode({ id: "b", city: "Fast" });
      await vi.advanceTimersByTimeAsync(100);
      settle("Fast", ROUND_ROCK);
      await vi.advanceTimersByTimeAsync(0);
      settle("Slow", null);
      await vi.advanceTimersByTimeAsync(0);
      await scheduler.whenIdle();

      expect(onChanged).toHaveBeenCalledTimes(1);
    });

    it("logs a listener that throws", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const failure = new Error("listener broke");
      const scheduler = new BatchGeocodeScheduler(
        new CoordinateCache(),
        createTableResolver({ Austin: AUSTIN }),
        {},
        () => {
          throw failure;
        }
      );

      scheduler.requestGeocode({ id: "a", city: "Austin" });
      await vi.runAllTimersAsync();
      await scheduler.whenIdle();

      expect(error).toHaveBeenCalledWith("Coordinates-changed listener threw:", failure);
    });
  });

  it("geocodes only the entities that have a city", async () => {
    const onChanged = vi.fn();
    const cache = new CoordinateCache();
    const table: Record<string, LatLng> = {};
    const entities: Entity[] = [];
    for (let i = 0; i < 500; i++) {
      if (i % 25 === 0) {
        table[`City ${i}`] = { lat: 30 + i / 1000, lng: -97 };
        entities.push({ id: `e${i}`, city: `City ${i}`, region: "TX" });
      } else {
        entities.push({ id: `e${i}`, city: null });
      }
    }
    const resolver = createTableResolver(table);
    const scheduler = new BatchGeocodeScheduler(cache, resolver, {}, onChanged);

    expect(scheduler.preload(entities)).toBe(20);
    await vi.runAllTimersAsync();
    await scheduler.whenIdle();

    expect(resolver.resolve).toHaveBeenCalledTimes(20);
    expect(cache.size).toBe(20);
    expect(cache.pendingCount).toBe(0);
    expect(onChanged).toHaveBeenCalledTimes(1);
  });

  it("makes one lookup per distinct address in a group", async () => {
    const cache = new CoordinateCache();
    const geocode = vi.fn(async (address: string): Promise<LatLng | null> =>
      address.startsWith("Austin") ? AUSTIN : ROUND_ROCK
    );
    const scheduler = new BatchGeocodeScheduler(cache, new GeocodeResolver({ geocode }));

    scheduler.requestGeocode({ id: "a1", city: "Austin", region: "TX" });
    scheduler.requestGeocode({ id: "a2", city: "Austin", region: "TX" });
    scheduler.requestGeocode({ id: "r1", city: "Round Rock", region: "TX" });
    scheduler.requestGeocode({ id: "a3", city: "austin", region: "tx" });
    await vi.runAllTimersAsync();
    await scheduler.whenIdle();

    expect(geocode).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(4);
    expect(cache.get("a3")).toEqual(AUSTIN);
  });

  describe("dispose", () => {
    it("drops the buffered batch and releases its ids", async () => {
      const onChanged = vi.fn();
      const cache = new CoordinateCache();
      const resolver = createTableResolver({ Austin: AUSTIN });
      const scheduler = new BatchGeocodeScheduler(cache, resolver, {}, onChanged);

      scheduler.requestGeocode({ id: "a", city: "Austin" });
      scheduler.dispose();
      await vi.runAllTimersAsync();

      expect(resolver.resolve).not.toHaveBeenCalled();
      expect(cache.isPending("a")).toBe(false);
      expect(scheduler.isIdle).toBe(true);
      expect(scheduler.requestGeocode({ id: "a", city: "Austin" })).toBe(false);
      expect(onChanged).not.toHaveBeenCalled();
    });
  });
});
