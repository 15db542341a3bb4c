/**
 * Standalone simulation: run the controller against synthetic traffic.
 *
 * Each cycle adds 0-3 vehicles per lane and, with 10% probability, an
 * emergency vehicle. Queues carry forward from the controller's own
 * demand model, so this runs without a live feed.
 *
 * Usage: npm run simulate -- [cycles] [seed] [profile]
 */

import type { LaneReading } from "@adaptive-signal/types";
import {
  SignalController,
  createSeededRandom,
  loadBaseTiming,
  loadTimingProfile,
  randomInt,
} from "../src/index.js";

const cycles = parseInt(process.argv[2] ?? "10", 10);
const seed = parseInt(process.argv[3] ?? "42", 10);
const profile = process.argv[4];

const random = createSeededRandom(seed);
const params = profile ? loadTimingProfile(profile) : loadBaseTiming();

// Each cycle is treated as one max-green apart so holds expire between cycles
let clock = 0;
const controller = new SignalController(["Lane_1", "Lane_2", "Lane_3", "Lane_4"], {
  params,
  random,
  now: () => clock,
  debug: true,
});

let readings: LaneReading[] = controller.laneIds.map((laneId) => ({
  laneId,
  normal: randomInt(random, 2, 6),
  emergency: 0,
}));

for (let cycle = 1; cycle <= cycles; cycle++) {
  readings = readings.map((r) => ({
    laneId: r.laneId,
    normal: r.normal + randomInt(random, 0, 3),
    emergency: random() < 0.1 ? 1 : 0,
  }));

  const report = controller.decide(readings);
  console.log(`[simulate] cycle ${cycle}:`, JSON.stringify(report));

  // Carry the controller's evolved queues into the next cycle
  const { lanes } = controller.inspect();
  readings = readings.map((r) => ({ ...r, normal: lanes[r.laneId]?.normal ?? r.normal }));
  clock += params.maxGreen * 1000;
}
