export {
  WAIT_BONUS_SECONDS,
  EMERGENCY_BONUS_SECONDS,
  clamp,
  estimateGreenTime,
  type GreenTimeParams,
} from "./green-time.js";
export {
  DEFAULT_TIMING_PARAMS,
  pickTimingOverrides,
  resolveTimingParams,
  validateTimingParams,
} from "./defaults.js";
export {
  findConfigsRoot,
  loadBaseTiming,
  loadTimingProfile,
  listTimingProfiles,
  type TimingProfile,
  type TimingProfileInfo,
} from "./timing-config.js";
