import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DetectedBox } from "@adaptive-signal/types";
import { aggregateCounts, decodeCrop, resolveLabel } from "./aggregate.js";
import { vehicleClassOf } from "./labels.js";
import type { ImageEmbedder, VehicleClassifier } from "./provider.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeClassifier(label: string): VehicleClassifier {
  return { name: "Mock Classifier", classify: vi.fn().mockResolvedValue(label) };
}

function makeFailingClassifier(): VehicleClassifier {
  return { name: "Broken Classifier", classify: vi.fn().mockRejectedValue(new Error("boom")) };
}

function makeEmbedder(vector: number[]): ImageEmbedder {
  return { name: "Mock Embedder", embed: vi.fn().mockResolvedValue(vector) };
}

const CROP = Buffer.from("fake-jpeg-bytes").toString("base64");

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── vehicleClassOf ─────────────────────────────────────────────────────────

describe("vehicleClassOf", () => {
  it("matches emergency keywords case-insensitively", () => {
    expect(vehicleClassOf("Ambulance")).toBe("emergency");
    expect(vehicleClassOf("fire_truck")).toBe("emergency");
    expect(vehicleClassOf("POLICE-car")).toBe("emergency");
    expect(vehicleClassOf("emergency")).toBe("emergency");
  });

  it("treats other labels and missing labels as normal", () => {
    expect(vehicleClassOf("car")).toBe("normal");
    expect(vehicleClassOf("bus")).toBe("normal");
    expect(vehicleClassOf(null)).toBe("normal");
    expect(vehicleClassOf("")).toBe("normal");
  });
});

// ─── resolveLabel ───────────────────────────────────────────────────────────

describe("resolveLabel", () => {
  it("prefers the upstream label over the embedding", async () => {
    const classifier = makeClassifier("ambulance");
    const label = await resolveLabel({ laneId: "a", predLabel: "car", embedding: [1, 2] }, { classifier });
    expect(label).toBe("car");
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("classifies the embedding when no label is given", async () => {
    const classifier = makeClassifier("police");
    expect(await resolveLabel({ laneId: "a", embedding: [0.1, 0.2] }, { classifier })).toBe("police");
    expect(classifier.classify).toHaveBeenCalledWith([0.1, 0.2]);
  });

  it("embeds then classifies an image crop", async () => {
    const classifier = makeClassifier("truck");
    const embedder = makeEmbedder([3, 4]);
    const label = await resolveLabel({ laneId: "a", cropBase64: CROP }, { classifier, embedder });
    expect(label).toBe("truck");
    expect(embedder.embed).toHaveBeenCalledWith(Buffer.from("fake-jpeg-bytes"));
    expect(classifier.classify).toHaveBeenCalledWith([3, 4]);
  });

  it("returns null without a classifier", async () => {
    expect(await resolveLabel({ laneId: "a", embedding: [1] }, {})).toBeNull();
  });

  it("returns null when the classifier throws", async () => {
    const label = await resolveLabel({ laneId: "a", embedding: [1] }, { classifier: makeFailingClassifier() });
    expect(label).toBeNull();
  });

  it("returns null for an undecodable crop", async () => {
    const embedder = makeEmbedder([1]);
    const label = await resolveLabel(
      { laneId: "a", cropBase64: "not base64!" },
      { classifier: makeClassifier("car"), embedder },
    );
    expect(label).toBeNull();
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("returns null for a detection with no label source", async () => {
    expect(await resolveLabel({ laneId: "a" }, { classifier: makeClassifier("car") })).toBeNull();
  });
});

// ─── aggregateCounts ────────────────────────────────────────────────────────

describe("aggregateCounts", () => {
  it("counts labelled detections per lane in first-seen order", async () => {
    const detections: DetectedBox[] = [
      { laneId: "south", predLabel: "car" },
      { laneId: "north", predLabel: "ambulance" },
      { laneId: "south", predLabel: "bus" },
      { laneId: "north", predLabel: "car" },
      { laneId: "south", predLabel: "Fire Engine" },
    ];
    const { readings, stats } = await aggregateCounts(detections);
    expect(readings).toEqual([
      { laneId: "south", normal: 2, emergency: 1 },
      { laneId: "north", normal: 1, emergency: 1 },
    ]);
    expect(stats).toEqual({ detections: 5, skipped: 0, unlabelled: 0 });
  });

  it("counts failed classifications as normal vehicles", async () => {
    const { readings, stats } = await aggregateCounts(
      [
        { laneId: "east", embedding: [1, 2] },
        { laneId: "east", cropBase64: CROP },
        { laneId: "east" },
      ],
      { classifier: makeFailingClassifier() },
    );
    expect(readings).toEqual([{ laneId: "east", normal: 3, emergency: 0 }]);
    expect(stats).toEqual({ detections: 3, skipped: 0, unlabelled: 2 });
  });

  it("prefers an upstream label over a failing classifier", async () => {
    const { readings, stats } = await aggregateCounts(
      [{ laneId: "east", predLabel: "police", embedding: [1, 2] }],
      { classifier: makeFailingClassifier() },
    );
    expect(readings).toEqual([{ laneId: "east", normal: 0, emergency: 1 }]);
    expect(stats).toEqual({ detections: 1, skipped: 0, unlabelled: 0 });
  });

  it("skips detections without a lane", async () => {
    const { readings, stats } = await aggregateCounts([
      { predLabel: "ambulance" },
      { laneId: "", predLabel: "car" },
      { laneId: "west", predLabel: "car" },
    ]);
    expect(readings).toEqual([{ laneId: "west", normal: 1, emergency: 0 }]);
    expect(stats.skipped).toBe(2);
  });

  it("returns no readings for no detections", async () => {
    expect(await aggregateCounts([])).toEqual({
      readings: [],
      stats: { detections: 0, skipped: 0, unlabelled: 0 },
    });
  });

  it("classifies crops end to end", async () => {
    const { readings } = await aggregateCounts(
      [{ laneId: "north", cropBase64: CROP }],
      { classifier: makeClassifier("ambulance"), embedder: makeEmbedder([0.5]) },
    );
    expect(readings).toEqual([{ laneId: "north", normal: 0, emergency: 1 }]);
  });
});

// ─── decodeCrop ─────────────────────────────────────────────────────────────

describe("decodeCrop", () => {
  it("decodes padded base64 and ignores whitespace", () => {
    expect(decodeCrop("aGVs\nbG8=").toString("utf-8")).toBe("hello");
  });

  it("rejects malformed input", () => {
    expect(() => decodeCrop("")).toThrow("crop is not valid base64");
    expect(() => decodeCrop("abc")).toThrow("crop is not valid base64");
    expect(() => decodeCrop("ab$=")).toThrow("crop is not valid base64");
  });
});
