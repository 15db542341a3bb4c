/**
 * Signal controller: one decision cycle per `decide` call.
 *
 * Emergency preemption first; otherwise the current green is held until
 * its allotted time runs out, after which the fairness selector picks the
 * next lane. The chosen lane's green time comes from its demand, the phase
 * labels switch over, and the demand model ages the queues.
 *
 * `decide` is synchronous and never yields, so a call cannot interleave
 * with another on the same instance.
 */

import type {
  ControllerSnapshot,
  DecisionReason,
  DecisionReport,
  DecisionTrace,
  LaneReport,
  LaneReading,
  TimingParams,
} from "@adaptive-signal/types";
import { LaneStore, assertValidReadings, type LaneSnapshot } from "./lanes/index.js";
import { EmergencySelector, isStarved, selectFairnessLane } from "./selection/index.js";
import { estimateGreenTime, resolveTimingParams } from "./timing/index.js";
import { transitionTo } from "./phase/transition.js";
import { evolveDemand, type RandomSource } from "./demand/index.js";

export interface SignalControllerOptions {
  /** Overrides on top of the controller defaults */
  params?: Partial<TimingParams>;
  /** Arrival source for the demand model (default: Math.random) */
  random?: RandomSource;
  /** Wall clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** Log a summary of every cycle */
  debug?: boolean;
}

export class SignalController {
  readonly params: TimingParams;

  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly debug: boolean;

  private store: LaneStore;
  private emergency: EmergencySelector;
  private currentGreen: string | null = null;
  private greenStartedAt: number | null = null;
  private currentGreenTime: number;
  private cycle = 0;
  private lastDecision: DecisionTrace | null = null;

  constructor(laneIds: readonly string[] = [], options: SignalControllerOptions = {}) {
    this.params = resolveTimingParams(options.params);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;

    this.store = new LaneStore(laneIds);
    this.emergency = new EmergencySelector(this.store.laneIds);
    this.currentGreenTime = this.params.minGreen;
  }

  get laneIds(): readonly string[] {
    return this.store.laneIds;
  }

  /**
   * Run one decision cycle.
   *
   * Readings are authoritative for this cycle's counts. If their lane-id
   * set differs from the registered one, all history is dropped and the
   * lanes are registered afresh in reading order.
   */
  decide(readings: readonly LaneReading[]): DecisionReport {
    assertValidReadings(readings);
    if (readings.length === 0) return {};

    const laneIds = readings.map((r) => r.laneId);
    if (!this.store.hasLaneSet(laneIds)) {
      if (this.store.size > 0) {
        console.log(
          `[signal] Lane set changed (${this.store.laneIds.join(",")} → ${laneIds.join(",")}), resetting state`,
        );
      }
      this.reset(laneIds);
    }

    const now = this.now();
    const snapshot = this.store.merge(readings);
    const { laneId: chosen, reason } = this.choose(snapshot, now);

    this.store.updateWaits(chosen);

    const chosenCounts = snapshot.get(chosen) ?? { normal: 0, emergency: 0, wait: 0 };
    this.currentGreenTime = estimateGreenTime(chosenCounts, this.params);

    const green = transitionTo(this.store, chosen, now);
    this.currentGreen = green.laneId;
    this.greenStartedAt = green.startedAt;

    evolveDemand(snapshot, chosen, this.currentGreenTime, this.params.clearanceRate, this.random);
    this.store.persistCounts(snapshot);

    this.cycle++;
    this.lastDecision = {
      cycle: this.cycle,
      laneId: chosen,
      reason,
      greenTime: this.currentGreenTime,
      decidedAt: now,
    };

    if (this.debug) this.logCycle();

    return this.report();
  }

  inspect(): ControllerSnapshot {
    return {
      laneIds: [...this.store.laneIds],
      lanes: this.store.toRecord(),
      currentGreen: this.currentGreen,
      greenStartedAt: this.greenStartedAt,
      currentGreenTime: this.currentGreenTime,
      lastEmergencyLane: this.emergency.lastLane,
      cycle: this.cycle,
      lastDecision: this.lastDecision ? { ...this.lastDecision } : null,
      params: { ...this.params },
    };
  }

  private reset(laneIds: readonly string[]): void {
    this.store = new LaneStore(laneIds);
    this.emergency = new EmergencySelector(this.store.laneIds);
    this.currentGreen = null;
    this.greenStartedAt = null;
    this.currentGreenTime = this.params.minGreen;
  }

  private choose(snapshot: LaneSnapshot, now: number): { laneId: string; reason: DecisionReason } {
    const emergencyLane = this.emergency.select(snapshot);
    if (emergencyLane !== null) {
      return { laneId: emergencyLane, reason: "emergency" };
    }

    if (this.currentGreen !== null && this.isHolding(snapshot, now)) {
      return { laneId: this.currentGreen, reason: "hold" };
    }

    const laneId = selectFairnessLane(this.store.laneIds, snapshot, this.params);
    // Readings are non-empty here, so there is always a lane to pick
    return { laneId: laneId ?? this.store.laneIds[0] ?? "", reason: "fairness" };
  }

  /**
   * The current green keeps running while its allotted time has not
   * elapsed, unless another lane has reached the starvation limit.
   */
  private isHolding(snapshot: LaneSnapshot, now: number): boolean {
    if (this.currentGreen === null || this.greenStartedAt === null) return false;
    const elapsedSeconds = (now - this.greenStartedAt) / 1000;
    if (elapsedSeconds >= this.currentGreenTime) return false;

    for (const [laneId, counts] of snapshot) {
      if (laneId !== this.currentGreen && isStarved(counts, this.params)) return false;
    }
    return true;
  }

  private report(): DecisionReport {
    return Object.fromEntries(
      Object.entries(this.store.toRecord()).map(([laneId, state]): [string, LaneReport] => [
        laneId,
        laneId === this.currentGreen
          ? { phase: state.phase, wait: state.wait, greenTime: this.currentGreenTime }
          : { phase: state.phase, wait: state.wait },
      ]),
    );
  }

  private logCycle(): void {
    const lanes = this.store.toRecord();
    console.log(
      `[signal] cycle ${this.cycle}: green=${this.currentGreen} (${this.lastDecision?.reason}) ` +
        `for ${this.currentGreenTime.toFixed(1)}s, waits=[${Object.values(lanes)
          .map((l) => l.wait)
          .join(",")}]`,
    );
  }
}
