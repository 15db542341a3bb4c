/**
 * Vehicle detections from the camera pipeline.
 */

/**
 * A single detected vehicle. The label is taken from the first source
 * present: `predLabel`, then `embedding`, then `cropBase64`.
 */
export interface DetectedBox {
  laneId?: string;
  /** Label assigned upstream, if the client already classified the crop */
  predLabel?: string;
  /** Feature vector for the crop */
  embedding?: number[];
  /** Base64-encoded JPEG/PNG of the crop */
  cropBase64?: string;
}

export type VehicleClass = "normal" | "emergency";
