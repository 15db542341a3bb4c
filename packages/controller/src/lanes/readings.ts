/**
 * Lane reading validation.
 *
 * Counts must be non-negative integers and lane ids unique and non-empty.
 * Negative values are rejected rather than clamped.
 */

import type { LaneReading } from "@adaptive-signal/types";
import { InvalidReadingError, type ReadingIssue } from "../errors.js";

function checkCount(
  value: unknown,
  field: string,
  issues: ReadingIssue[],
): void {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    issues.push({ field, message: "must be an integer", value });
  } else if (value < 0) {
    issues.push({ field, message: "must not be negative", value });
  }
}

/** Collect every problem in a batch of readings. Empty when the batch is usable. */
export function findReadingIssues(readings: readonly LaneReading[]): ReadingIssue[] {
  const issues: ReadingIssue[] = [];
  const seen = new Set<string>();

  readings.forEach((reading, i) => {
    const prefix = `readings[${i}]`;
    if (typeof reading.laneId !== "string" || reading.laneId.length === 0) {
      issues.push({ field: `${prefix}.laneId`, message: "must be a non-empty string", value: reading.laneId });
    } else if (seen.has(reading.laneId)) {
      issues.push({ field: `${prefix}.laneId`, message: "is duplicated", value: reading.laneId });
    } else {
      seen.add(reading.laneId);
    }
    checkCount(reading.normal, `${prefix}.normal`, issues);
    checkCount(reading.emergency, `${prefix}.emergency`, issues);
  });

  return issues;
}

export function assertValidReadings(readings: readonly LaneReading[]): void {
  const issues = findReadingIssues(readings);
  if (issues.length > 0) {
    throw new InvalidReadingError(issues);
  }
}
