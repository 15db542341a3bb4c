/**
 * API request/response types for the signal server.
 *
 * These mirror the server's models.
 */

import type {
  DecisionReport,
  DetectedBox,
  LaneReading,
  LaneState,
  TimingParams,
} from "@adaptive-signal/types";

export type { DecisionReport, DetectedBox, LaneReading, LaneState, TimingParams };

// ---------------------------------------------------------------------------
// Signal
// ---------------------------------------------------------------------------

export interface UpdateSignalResponse {
  status: "success";
  output: DecisionReport;
}

/** Per-lane controller state; empty before the first update */
export type SignalStatusResponse = Record<string, LaneState>;

// ---------------------------------------------------------------------------
// Detections
// ---------------------------------------------------------------------------

export interface DetectionPayload {
  detections: DetectedBox[];
}

export interface DetectionStats {
  detections: number;
  skipped: number;
  unlabelled: number;
}

export interface PredictAndUpdateResponse {
  counts: LaneReading[];
  stats: DetectionStats;
  controllerResponse: UpdateSignalResponse;
  warning?: { loadErrors: string[] };
}

export interface DetectionStatusResponse {
  classifierLoaded: boolean;
  embedderConfigured: boolean;
  loadErrors: string[];
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface TimingConfigResponse extends TimingParams {
  profile?: ProfileListItem;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  intersection: {
    lanes: number;
    cycle: number;
  };
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
