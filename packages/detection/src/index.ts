/**
 * @adaptive-signal/detection
 *
 * Turns per-vehicle detections from the camera pipeline into the lane
 * readings the signal controller consumes.
 */

export type { VehicleClassifier, ImageEmbedder } from "./provider.js";
export { EMERGENCY_KEYWORDS, vehicleClassOf } from "./labels.js";
export {
  aggregateCounts,
  decodeCrop,
  resolveLabel,
  type AggregationOptions,
  type AggregationResult,
  type AggregationStats,
} from "./aggregate.js";
export {
  CentroidClassifier,
  ModelLoadError,
  loadCentroidClassifier,
  parseCentroidModel,
  type CentroidModel,
} from "./classifiers/centroid.js";
export { HttpImageEmbedder, type HttpImageEmbedderOptions } from "./embedders/http-embedder.js";
