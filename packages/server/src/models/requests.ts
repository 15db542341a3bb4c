import type { DetectedBox, LaneReading } from "@adaptive-signal/types";

/** Body of POST /api/signal/update */
export type UpdateSignalRequest = LaneReading[];

/** Body of POST /api/detections/predict-and-update */
export interface PredictAndUpdateRequest {
  detections: DetectedBox[];
}
