import { describe, it, expect } from "vitest";
import { evolveDemand, vehiclesCleared } from "./evolution.js";
import { createSeededRandom, randomInt } from "./random.js";
import type { LaneSnapshot } from "../lanes/index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function snapshotOf(normals: Record<string, number>): LaneSnapshot {
  return new Map(
    Object.entries(normals).map(([id, normal]) => [id, { normal, emergency: 0, wait: 0 }]),
  );
}

/** Replays a fixed list of values, then repeats the last */
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

// ─── vehiclesCleared ────────────────────────────────────────────────────────

describe("vehiclesCleared", () => {
  it("clears floor(rate * green) vehicles", () => {
    // floor(2.5 * 3) = 7
    expect(vehiclesCleared(20, 2.5, 3)).toBe(7);
  });

  it("never clears more than the queue", () => {
    expect(vehiclesCleared(2, 2.5, 3)).toBe(2);
  });
});

// ─── evolveDemand ───────────────────────────────────────────────────────────

describe("evolveDemand", () => {
  it("discharges the chosen lane and adds arrivals elsewhere", () => {
    const snapshot = snapshotOf({ a: 4, b: 10, c: 1 });
    // a → floor(0 * 4) = 0, c → floor(0.9 * 4) = 3
    const step = evolveDemand(snapshot, "b", 3, 2.5, sequence(0, 0.9));

    expect(step).toEqual({ cleared: 7, arrivals: { a: 0, c: 3 } });
    expect(snapshot.get("a")?.normal).toBe(4);
    expect(snapshot.get("b")?.normal).toBe(3);
    expect(snapshot.get("c")?.normal).toBe(4);
  });

  it("is reproducible with the same seed", () => {
    const first = snapshotOf({ a: 5, b: 5, c: 5 });
    const second = snapshotOf({ a: 5, b: 5, c: 5 });
    evolveDemand(first, "a", 3, 3, createSeededRandom(7));
    evolveDemand(second, "a", 3, 3, createSeededRandom(7));
    expect(first).toEqual(second);
  });
});

// ─── Random sources ─────────────────────────────────────────────────────────

describe("createSeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it("produces values in [0, 1)", () => {
    const random = createSeededRandom(1);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("randomInt", () => {
  it("covers both ends of the range", () => {
    expect(randomInt(() => 0, 0, 3)).toBe(0);
    expect(randomInt(() => 0.999, 0, 3)).toBe(3);
    expect(randomInt(() => 0.5, 0, 3)).toBe(2);
  });
});
