/**
 * Hosts the intersection's signal controller.
 *
 * The registry owns the single controller instance and replaces it when an
 * update arrives with a different set of lane ids. `update` never awaits,
 * so the lane-set check, the replacement and the decision run as one
 * uninterrupted step.
 */

import type { DecisionReport, LaneReading, LaneState, TimingParams } from "@adaptive-signal/types";
import {
  SignalController,
  assertValidReadings,
  loadBaseTiming,
  loadTimingProfile,
  type RandomSource,
} from "@adaptive-signal/controller";
import type { IntersectionSummary } from "../models/responses.js";

export interface ControllerRegistryOptions {
  params: TimingParams;
  debug?: boolean;
  now?: () => number;
  random?: RandomSource;
}

function sameLaneSet(current: readonly string[], incoming: readonly string[]): boolean {
  if (current.length !== incoming.length) return false;
  const known = new Set(current);
  return incoming.every((id) => known.has(id));
}

/** Resolve the timing the server runs with: a named profile, or the base config. */
export function resolveServerTiming(timingProfile?: string, configsRoot?: string): TimingParams {
  if (!timingProfile) return loadBaseTiming(configsRoot);
  const { _profile, ...params } = loadTimingProfile(timingProfile, configsRoot);
  console.log(`[config] Using timing profile "${_profile.name}"`);
  return params;
}

export class ControllerRegistry {
  readonly params: TimingParams;
  private controller: SignalController | null = null;

  constructor(private readonly options: ControllerRegistryOptions) {
    this.params = { ...options.params };
  }

  /** Run one decision cycle, creating a fresh controller when the lane set changes. */
  update(readings: readonly LaneReading[]): DecisionReport {
    assertValidReadings(readings);
    if (readings.length === 0) return {};

    const laneIds = readings.map((r) => r.laneId);
    if (this.controller === null || !sameLaneSet(this.controller.laneIds, laneIds)) {
      if (this.controller !== null) {
        console.log(`[signal] Lanes changed to ${laneIds.join(",")}, starting a new controller`);
      }
      this.controller = new SignalController(laneIds, {
        params: this.params,
        debug: this.options.debug,
        now: this.options.now,
        random: this.options.random,
      });
    }

    return this.controller.decide(readings);
  }

  /** Per-lane state of the current controller, empty before the first update. */
  status(): Record<string, LaneState> {
    return this.controller?.inspect().lanes ?? {};
  }

  summary(): IntersectionSummary {
    if (this.controller === null) return { lanes: 0, cycle: 0 };
    const snapshot = this.controller.inspect();
    return { lanes: snapshot.laneIds.length, cycle: snapshot.cycle };
  }
}
