/**
 * Lanes and their signal phases.
 */

/** Signal phase assigned to a lane */
export type Phase = "red" | "yellow" | "green";

/** Counts reported for one lane in one cycle */
export interface LaneReading {
  laneId: string;
  /** Ordinary vehicles queued on the lane */
  normal: number;
  /** Emergency vehicles queued on the lane */
  emergency: number;
}

/** Per-lane state held by the controller between cycles */
export interface LaneState {
  normal: number;
  emergency: number;
  /** Consecutive cycles since this lane last held green */
  wait: number;
  phase: Phase;
}

/** Tuning knobs for selection and timing */
export interface TimingParams {
  /** Lower bound on a green phase, seconds */
  minGreen: number;
  /** Upper bound on a green phase, seconds */
  maxGreen: number;
  /** Carried for reporting only; the transition does not wait on it */
  yellowTime: number;
  /** Per-cycle multiplier applied to queue length when ranking lanes */
  waitBoost: number;
  /** Cycles of waiting after which a lane is served regardless of demand */
  starvationLimit: number;
  /** Vehicles served per second of green */
  clearanceRate: number;
}
