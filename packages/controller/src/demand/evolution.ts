/**
 * Synthetic queue evolution between readings.
 *
 * The lane granted green discharges at the clearance rate for its green
 * time; every other lane picks up 0-3 new arrivals. Stands in for a live
 * feed, so when readings arrive every cycle its output is overwritten by
 * the next cycle's counts.
 */

import type { LaneSnapshot } from "../lanes/index.js";
import { randomInt, type RandomSource } from "./random.js";

export const MAX_ARRIVALS_PER_CYCLE = 3;

export interface DemandStep {
  cleared: number;
  /** New arrivals per lane, chosen lane excluded */
  arrivals: Record<string, number>;
}

/** Vehicles the chosen lane discharges during its green. */
export function vehiclesCleared(normal: number, clearanceRate: number, greenTime: number): number {
  return Math.min(normal, Math.floor(clearanceRate * greenTime));
}

/** Mutates `snapshot` in place. */
export function evolveDemand(
  snapshot: LaneSnapshot,
  chosen: string,
  greenTime: number,
  clearanceRate: number,
  random: RandomSource,
): DemandStep {
  let cleared = 0;
  const arrivals: [string, number][] = [];

  for (const [laneId, counts] of snapshot) {
    if (laneId === chosen) {
      cleared = vehiclesCleared(counts.normal, clearanceRate, greenTime);
      counts.normal -= cleared;
    } else {
      const arrived = randomInt(random, 0, MAX_ARRIVALS_PER_CYCLE);
      counts.normal += arrived;
      arrivals.push([laneId, arrived]);
    }
  }

  return { cleared, arrivals: Object.fromEntries(arrivals) };
}
