import type { DecisionReport, LaneReading, LaneState, TimingParams } from "@adaptive-signal/types";
import type { AggregationStats } from "@adaptive-signal/detection";

export interface UpdateSignalResponse {
  status: "success";
  output: DecisionReport;
}

/** Per-lane state, empty before the first update */
export type SignalStatusResponse = Record<string, LaneState>;

export interface PredictAndUpdateResponse {
  counts: LaneReading[];
  stats: AggregationStats;
  controllerResponse: UpdateSignalResponse;
  /** Present when the classifier failed to load at startup */
  warning?: { loadErrors: string[] };
}

export interface DetectionStatusResponse {
  classifierLoaded: boolean;
  embedderConfigured: boolean;
  loadErrors: string[];
}

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface TimingConfigResponse extends TimingParams {
  /** Set when a named profile was requested */
  profile?: ProfileListItem;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  intersection: IntersectionSummary;
}

export interface IntersectionSummary {
  /** Registered lanes, 0 before the first update */
  lanes: number;
  /** Decision cycles run by the current controller */
  cycle: number;
}
