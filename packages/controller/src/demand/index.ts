export { createSeededRandom, randomInt, type RandomSource } from "./random.js";
export {
  MAX_ARRIVALS_PER_CYCLE,
  evolveDemand,
  vehiclesCleared,
  type DemandStep,
} from "./evolution.js";
