/**
 * Green-time estimation.
 *
 * Time to clear the queue at the configured clearance rate, plus a bonus
 * for how long the lane waited and for each emergency vehicle, clamped to
 * [minGreen, maxGreen].
 */

import type { TimingParams } from "@adaptive-signal/types";
import type { LaneCounts } from "../lanes/index.js";

/** Seconds added per cycle waited. Independent of `waitBoost`. */
export const WAIT_BONUS_SECONDS = 0.4;
/** Seconds added per emergency vehicle */
export const EMERGENCY_BONUS_SECONDS = 2.0;

export type GreenTimeParams = Pick<TimingParams, "minGreen" | "maxGreen" | "clearanceRate">;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

export function estimateGreenTime(lane: LaneCounts, params: GreenTimeParams): number {
  const clearTime = lane.normal / params.clearanceRate;
  const waitBonus = lane.wait * WAIT_BONUS_SECONDS;
  const emergencyBonus = lane.emergency * EMERGENCY_BONUS_SECONDS;
  return clamp(clearTime + waitBonus + emergencyBonus, params.minGreen, params.maxGreen);
}
