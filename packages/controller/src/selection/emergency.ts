/**
 * Emergency preemption.
 *
 * The lane carrying the most emergency vehicles wins outright. Ties are
 * broken round-robin: scan registration order starting just after the lane
 * last granted green for an emergency, so persistently tied lanes alternate.
 */

import type { LaneSnapshot } from "../lanes/index.js";

export class EmergencySelector {
  /** Registration index of the last emergency grant, -1 if none */
  private lastIndex = -1;

  constructor(private readonly laneIds: readonly string[]) {}

  get lastLane(): string | null {
    return this.laneIds[this.lastIndex] ?? null;
  }

  /**
   * Pick the lane to preempt for, or null when no lane reports an
   * emergency vehicle. Remembers the pick for the next tie-break.
   */
  select(snapshot: LaneSnapshot): string | null {
    let max = 0;
    for (const counts of snapshot.values()) {
      if (counts.emergency > max) max = counts.emergency;
    }
    if (max === 0) return null;

    const n = this.laneIds.length;
    const start = (this.lastIndex + 1) % n;
    for (let i = 0; i < n; i++) {
      const index = (start + i) % n;
      const laneId = this.laneIds[index];
      if (laneId !== undefined && snapshot.get(laneId)?.emergency === max) {
        this.lastIndex = index;
        return laneId;
      }
    }
    return null;
  }
}
