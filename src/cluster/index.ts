/**
 * Cluster Module
 */

export { SpatialGrid } from "./SpatialGrid";
export {
  SpatialClusterer,
  clusterIdFor,
  centroidOf,
  METERS_PER_DEGREE,
  type SpatialClustererOptions,
} from "./SpatialClusterer";
