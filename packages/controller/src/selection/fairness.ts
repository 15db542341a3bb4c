/**
 * Ordinary-traffic selection.
 *
 * score = normal * (1 + wait * waitBoost), plus a flat bonus once a lane
 * has waited `starvationLimit` cycles. The bonus dwarfs any realistic
 * demand score, so a starved lane is served next even with an empty queue.
 */

import type { TimingParams } from "@adaptive-signal/types";
import type { LaneCounts, LaneSnapshot } from "../lanes/index.js";

export const STARVATION_BONUS = 1000;

export type FairnessParams = Pick<TimingParams, "waitBoost" | "starvationLimit">;

export interface LaneScore {
  laneId: string;
  /** Demand component before the starvation bonus */
  demand: number;
  starved: boolean;
  score: number;
}

export function isStarved(lane: LaneCounts, params: FairnessParams): boolean {
  return lane.wait >= params.starvationLimit;
}

export function fairnessScore(lane: LaneCounts, params: FairnessParams): number {
  const demand = lane.normal * (1 + lane.wait * params.waitBoost);
  return isStarved(lane, params) ? demand + STARVATION_BONUS : demand;
}

/** Score every lane, in registration order. */
export function scoreLanes(
  laneIds: readonly string[],
  snapshot: LaneSnapshot,
  params: FairnessParams,
): LaneScore[] {
  const scores: LaneScore[] = [];
  for (const laneId of laneIds) {
    const lane = snapshot.get(laneId);
    if (!lane) continue;
    const starved = isStarved(lane, params);
    scores.push({
      laneId,
      demand: lane.normal * (1 + lane.wait * params.waitBoost),
      starved,
      score: fairnessScore(lane, params),
    });
  }
  return scores;
}

/**
 * Highest-scoring lane; the first in registration order wins a tie.
 * Null only when there are no lanes.
 */
export function selectFairnessLane(
  laneIds: readonly string[],
  snapshot: LaneSnapshot,
  params: FairnessParams,
): string | null {
  let best: LaneScore | null = null;
  for (const entry of scoreLanes(laneIds, snapshot, params)) {
    if (best === null || entry.score > best.score) best = entry;
  }
  return best?.laneId ?? null;
}
