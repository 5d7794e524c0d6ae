/**
 * Geocode Resolver
 *
 * Turns a city/region pair into a coordinate through an external provider.
 * Limits simultaneous provider calls, coalesces identical in-flight
 * addresses, and converts every failure into a null result.
 */

import type { LatLng } from "../geo/types";
import { isValidLatLng } from "../geo/distance";
import { resolveOptions, type PipelineOptions } from "../config";

/** External address lookup. May throw or return null for unknown places. */
export interface GeocodeProvider {
  geocode(address: string): Promise<LatLng | null>;
}

export type GeocodeResolverOptions = Pick<
  PipelineOptions,
  "maxConcurrentGeocodes" | "countrySuffix"
>;

/** Lookup waiting for a free request slot */
interface QueuedLookup {
  address: string;
  key: string;
  resolve: (coordinate: LatLng | null) => void;
}

/**
 * Build the lookup address for a city and optional region.
 *
 * "Austin", "TX" -> "Austin, TX, USA"; a blank region is skipped, a blank
 * city yields null since there is nothing to look up.
 */
export function formatAddress(
  city: string | null | undefined,
  region: string | null | undefined,
  countrySuffix: string = "USA"
): string | null {
  const trimmedCity = city?.trim() ?? "";
  if (trimmedCity === "") return null;

  const parts = [trimmedCity];
  const trimmedRegion = region?.trim() ?? "";
  if (trimmedRegion !== "") parts.push(trimmedRegion);
  const suffix = countrySuffix.trim();
  if (suffix !== "") parts.push(suffix);

  return parts.join(", ");
}

export class GeocodeResolver {
  private provider: GeocodeProvider;

  /** Lookups in flight or queued, by normalized address */
  private loading = new Map<string, Promise<LatLng | null>>();

  /** Lookups waiting for a request slot */
  private queue: QueuedLookup[] = [];

  /** Maximum concurrent provider calls */
  private maxConcurrentRequests: number;

  private countrySuffix: string;

  /** Current number of active provider calls */
  private activeRequests = 0;

  /** Provider calls issued since construction */
  private requests = 0;

  constructor(provider: GeocodeProvider, options: Partial<GeocodeResolverOptions> = {}) {
    const resolved = resolveOptions(options);
    this.provider = provider;
    this.maxConcurrentRequests = resolved.maxConcurrentGeocodes;
    this.countrySuffix = resolved.countrySuffix;
  }

  /**
   * Resolve a city/region to a coordinate.
   * Never rejects: unknown places, provider errors and invalid results
   * all resolve to null.
   */
  resolve(city: string | null | undefined, region?: string | null): Promise<LatLng | null> {
    const address = formatAddress(city, region, this.countrySuffix);
    if (!address) return Promise.resolve(null);

    const key = address.toLowerCase();
    const inFlight = this.loading.get(key);
    if (inFlight) return inFlight;

    const promise = new Promise<LatLng | null>((resolve) => {
      this.queue.push({ address, key, resolve });
    });
    this.loading.set(key, promise);
    this.processQueue();
    return promise;
  }

  /** Provider calls issued so far */
  get requestCount(): number {
    return this.requests;
  }

  get activeCount(): number {
    return this.activeRequests;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Start queued lookups up to the concurrency limit */
  private processQueue(): void {
    while (this.queue.length > 0 && this.activeRequests < this.maxConcurrentRequests) {
      const next = this.queue.shift();
      if (!next) break;
      this.startLookup(next);
    }
  }

  private startLookup(lookup: QueuedLookup): void {
    this.activeRequests++;
    this.requests++;

    void this.lookup(lookup.address)
      .then(lookup.resolve)
      .finally(() => {
        this.activeRequests--;
        this.loading.delete(lookup.key);
        this.processQueue(); // Start the next queued lookup
      });
  }

  private async lookup(address: string): Promise<LatLng | null> {
    try {
      const result = await this.provider.geocode(address);
      if (!result) return null;

      if (!isValidLatLng(result)) {
        console.warn(`Geocoder returned an invalid coordinate for "${address}": ${result.lat}, ${result.lng}`);
        return null;
      }
      return { lat: result.lat, lng: result.lng };
    } catch (error) {
      console.warn(`Geocoding failed for "${address}":`, error);
      return null;
    }
  }
}
