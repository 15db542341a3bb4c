// Base
export {
  ApiError,
  BaseClient,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { SignalClient } from "./signalClient.js";
export { DetectionClient } from "./detectionClient.js";
export { ConfigClient } from "./configClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Signal
  DecisionReport,
  LaneReading,
  LaneState,
  UpdateSignalResponse,
  SignalStatusResponse,
  // Detections
  DetectedBox,
  DetectionPayload,
  DetectionStats,
  PredictAndUpdateResponse,
  DetectionStatusResponse,
  // Config
  TimingParams,
  ProfileListItem,
  TimingConfigResponse,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
