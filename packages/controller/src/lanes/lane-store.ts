/**
 * Per-lane state held between decision cycles.
 *
 * Lanes keep the order in which they were registered; that order drives
 * every tie-break in the selectors and the key order of reports.
 */

import type { LaneReading, LaneState, Phase } from "@adaptive-signal/types";

/** The per-cycle working view of one lane */
export interface LaneCounts {
  normal: number;
  emergency: number;
  wait: number;
}

/** Working snapshot for one cycle, keyed by lane id */
export type LaneSnapshot = Map<string, LaneCounts>;

function initialState(): LaneState {
  return { normal: 0, emergency: 0, wait: 0, phase: "red" };
}

export class LaneStore {
  private ids: string[] = [];
  private lanes = new Map<string, LaneState>();

  constructor(laneIds: readonly string[] = []) {
    this.register(laneIds);
  }

  /** Lane ids in registration order */
  get laneIds(): readonly string[] {
    return this.ids;
  }

  get size(): number {
    return this.ids.length;
  }

  /** Discard all state and register a fresh lane set. */
  register(laneIds: readonly string[]): void {
    this.ids = [];
    this.lanes = new Map();
    for (const id of laneIds) {
      if (this.lanes.has(id)) continue;
      this.ids.push(id);
      this.lanes.set(id, initialState());
    }
  }

  /** True when `laneIds` names exactly the registered lanes, in any order. */
  hasLaneSet(laneIds: readonly string[]): boolean {
    const incoming = new Set(laneIds);
    if (incoming.size !== this.lanes.size) return false;
    for (const id of incoming) {
      if (!this.lanes.has(id)) return false;
    }
    return true;
  }

  get(laneId: string): LaneState | undefined {
    return this.lanes.get(laneId);
  }

  /**
   * Build this cycle's working snapshot: counts from the readings,
   * wait carried over from stored state. Lanes missing from the readings
   * keep their stored counts.
   */
  merge(readings: readonly LaneReading[]): LaneSnapshot {
    const byId = new Map(readings.map((r) => [r.laneId, r]));
    const snapshot: LaneSnapshot = new Map();
    for (const [id, state] of this.lanes) {
      const reading = byId.get(id);
      snapshot.set(id, {
        normal: reading?.normal ?? state.normal,
        emergency: reading?.emergency ?? state.emergency,
        wait: state.wait,
      });
    }
    return snapshot;
  }

  /** Chosen lane's wait resets to 0; every other lane ages by one cycle. */
  updateWaits(chosen: string): void {
    for (const [id, state] of this.lanes) {
      state.wait = id === chosen ? 0 : state.wait + 1;
    }
  }

  setPhase(laneId: string, phase: Phase): void {
    const state = this.lanes.get(laneId);
    if (state) state.phase = phase;
  }

  setAllPhases(phase: Phase): void {
    for (const state of this.lanes.values()) {
      state.phase = phase;
    }
  }

  /** Write the snapshot's queue counts back into stored state. */
  persistCounts(snapshot: LaneSnapshot): void {
    for (const [id, counts] of snapshot) {
      const state = this.lanes.get(id);
      if (!state) continue;
      state.normal = counts.normal;
      state.emergency = counts.emergency;
    }
  }

  /**
   * Copy of every lane's state, keyed in registration order. Lane ids
   * become own keys, `__proto__` included.
   */
  toRecord(): Record<string, LaneState> {
    return Object.fromEntries([...this.lanes].map(([id, state]): [string, LaneState] => [id, { ...state }]));
  }
}
