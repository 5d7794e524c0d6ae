/**
 * Geocode Module
 *
 * Session cache, rate-limited resolver and batch scheduler.
 */

export { CoordinateCache } from "./CoordinateCache";
export {
  GeocodeResolver,
  formatAddress,
  type GeocodeProvider,
  type GeocodeResolverOptions,
} from "./GeocodeResolver";
export {
  BatchGeocodeScheduler,
  type BatchGeocodeSchedulerOptions,
  type CoordinateResolver,
} from "./BatchGeocodeScheduler";
export {
  NominatimGeocodeProvider,
  NOMINATIM_SEARCH_URL,
  type NominatimOptions,
} from "./NominatimGeocodeProvider";
export { fetchWithRetry, type FetchWithRetryOptions } from "./fetchWithRetry";
