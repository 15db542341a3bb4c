/**
 * Decision cycle output.
 */

import type { LaneState, Phase, TimingParams } from "./lane.js";

/** Per-lane entry of a decision report */
export interface LaneReport {
  phase: Phase;
  wait: number;
  /** Present only on the lane granted green this cycle, seconds */
  greenTime?: number;
}

/** Keyed by lane id, in registration order */
export type DecisionReport = Record<string, LaneReport>;

/** Why a lane was granted green */
export type DecisionReason = "emergency" | "hold" | "fairness";

/** Record of the most recent decision cycle */
export interface DecisionTrace {
  cycle: number;
  laneId: string;
  reason: DecisionReason;
  greenTime: number;
  /** Epoch milliseconds */
  decidedAt: number;
}

/** Full controller state for status reporting */
export interface ControllerSnapshot {
  laneIds: string[];
  lanes: Record<string, LaneState>;
  currentGreen: string | null;
  /** Epoch milliseconds */
  greenStartedAt: number | null;
  currentGreenTime: number;
  lastEmergencyLane: string | null;
  cycle: number;
  lastDecision: DecisionTrace | null;
  params: TimingParams;
}
