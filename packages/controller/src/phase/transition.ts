/**
 * Red → yellow → green transition for the lane granted green.
 *
 * Every lane drops to red, the chosen lane is marked yellow and then
 * immediately green within the same call. Yellow is never left standing:
 * `yellowTime` is reported but does not delay the grant.
 */

import type { LaneStore } from "../lanes/index.js";

export interface GreenPhase {
  laneId: string;
  /** Epoch milliseconds the green phase began */
  startedAt: number;
}

export function transitionTo(store: LaneStore, laneId: string, now: number): GreenPhase {
  store.setAllPhases("red");
  store.setPhase(laneId, "yellow");
  store.setPhase(laneId, "green");
  return { laneId, startedAt: now };
}
