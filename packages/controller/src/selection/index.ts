export { EmergencySelector } from "./emergency.js";
export {
  STARVATION_BONUS,
  fairnessScore,
  isStarved,
  scoreLanes,
  selectFairnessLane,
  type FairnessParams,
  type LaneScore,
} from "./fairness.js";
