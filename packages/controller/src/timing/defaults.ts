import type { TimingParams } from "@adaptive-signal/types";
import { InvalidTimingParamsError } from "../errors.js";

/** Controller defaults when no configuration is supplied */
export const DEFAULT_TIMING_PARAMS: Readonly<TimingParams> = {
  minGreen: 3,
  maxGreen: 15,
  yellowTime: 2,
  waitBoost: 0.4,
  starvationLimit: 8,
  clearanceRate: 3,
};

const TIMING_KEYS = [
  "minGreen",
  "maxGreen",
  "yellowTime",
  "waitBoost",
  "starvationLimit",
  "clearanceRate",
] as const satisfies readonly (keyof TimingParams)[];

/** Keep only the known, finite numeric fields of an untrusted object. */
export function pickTimingOverrides(raw: unknown): Partial<TimingParams> {
  const out: Partial<TimingParams> = {};
  if (raw === null || typeof raw !== "object") return out;
  for (const key of TIMING_KEYS) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === "number" && Number.isFinite(value)) {
      out[key] = value;
    }
  }
  return out;
}

export function validateTimingParams(params: TimingParams): TimingParams {
  if (params.minGreen < 0) {
    throw new InvalidTimingParamsError(`minGreen must not be negative (got ${params.minGreen})`);
  }
  if (params.maxGreen < params.minGreen) {
    throw new InvalidTimingParamsError(
      `maxGreen (${params.maxGreen}) must be at least minGreen (${params.minGreen})`,
    );
  }
  if (params.clearanceRate <= 0) {
    throw new InvalidTimingParamsError(`clearanceRate must be positive (got ${params.clearanceRate})`);
  }
  if (params.waitBoost < 0 || params.yellowTime < 0 || params.starvationLimit < 0) {
    throw new InvalidTimingParamsError("waitBoost, yellowTime and starvationLimit must not be negative");
  }
  return params;
}

/** Defaults overlaid with the given overrides, validated. */
export function resolveTimingParams(overrides: Partial<TimingParams> = {}): TimingParams {
  return validateTimingParams({ ...DEFAULT_TIMING_PARAMS, ...pickTimingOverrides(overrides) });
}
