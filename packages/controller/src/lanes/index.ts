export { LaneStore, type LaneCounts, type LaneSnapshot } from "./lane-store.js";
export { findReadingIssues, assertValidReadings } from "./readings.js";
