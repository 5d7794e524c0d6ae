/**
 * Viewport Module
 *
 * Debounced region changes and viewport membership.
 */

export { ViewportDebouncer, type ViewportDebouncerOptions } from "./ViewportDebouncer";
export {
  ViewportFilter,
  type ViewportFilterOptions,
  type GeocodeRequester,
} from "./ViewportFilter";
