/**
 * Geocode provider backed by the OpenStreetMap Nominatim search API.
 */

import type { LatLng } from "../geo/types";
import type { GeocodeProvider } from "./GeocodeResolver";
import { fetchWithRetry, type FetchWithRetryOptions } from "./fetchWithRetry";

export const NOMINATIM_SEARCH_URL = "https://nominatim.openstreetmap.org/search";

export interface NominatimOptions {
  /** Identifies the application, as the Nominatim usage policy requires */
  userAgent: string;
  /** Search endpoint, for self-hosted instances */
  endpoint?: string;
  /** Timeout and retry settings for each request */
  fetchOptions?: Pick<FetchWithRetryOptions, "timeoutMs" | "maxRetries" | "retryDelayMs">;
}

interface NominatimResult {
  lat: string;
  lon: string;
  display_name?: string;
}

function isNominatimResult(value: unknown): value is NominatimResult {
  if (typeof value !== "object" || value === null) return false;
  return (
    "lat" in value && typeof value.lat === "string" &&
    "lon" in value && typeof value.lon === "string"
  );
}

export class NominatimGeocodeProvider implements GeocodeProvider {
  private userAgent: string;
  private endpoint: string;
  private fetchOptions: NominatimOptions["fetchOptions"];

  constructor(options: NominatimOptions) {
    if (!options.userAgent || options.userAgent.trim() === "") {
      throw new Error(
        "A User-Agent is required for Nominatim requests. " +
        "Pass an application name and contact, e.g. \"my-app/1.0 (me@example.com)\"."
      );
    }
    this.userAgent = options.userAgent;
    this.endpoint = options.endpoint ?? NOMINATIM_SEARCH_URL;
    this.fetchOptions = options.fetchOptions;
  }

  /** Build the search URL for an address */
  buildUrl(address: string): string {
    return `${this.endpoint}?q=${encodeURIComponent(address)}&format=json&limit=1`;
  }

  async geocode(address: string): Promise<LatLng | null> {
    const res = await fetchWithRetry(this.buildUrl(address), {
      ...this.fetchOptions,
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
    });

    if (!res.ok) return null;

    const data: unknown = await res.json();
    if (!Array.isArray(data) || data.length === 0) return null;

    const first: unknown = data[0];
    if (!isNominatimResult(first)) return null;

    const lat = parseFloat(first.lat);
    const lng = parseFloat(first.lon);
    if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null;

    return { lat, lng };
  }
}
