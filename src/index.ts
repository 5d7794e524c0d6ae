/**
 * petmap - zoom-adaptive map annotations for partially geocoded records
 */

export const VERSION = "0.1.0";

export * from "./geo";
export * from "./geocode";
export * from "./viewport";
export * from "./cluster";

export {
  pinFor,
  hasGeocodableCity,
  type Entity,
  type Located,
  type Cluster,
  type Annotation,
  type PinAnnotation,
  type ClusterAnnotation,
  type TapTarget,
} from "./types";
export {
  DEFAULT_PIPELINE_OPTIONS,
  resolveOptions,
  validateOptions,
  type PipelineOptions,
} from "./config";
export {
  AnnotationProjector,
  type AnnotationProjectorOptions,
  type ZoomMode,
} from "./AnnotationProjector";
export { AnnotationSession, type AnnotationSessionListeners } from "./AnnotationSession";
export {
  annotationsToGeoJSON,
  annotationToFeature,
  type AnnotationProperties,
} from "./geojson";
