/**
 * Detection → lane reading aggregation.
 *
 * Each detection is labelled from the first source it carries:
 * 1. `predLabel` assigned upstream
 * 2. `embedding` run through the classifier
 * 3. `cropBase64` embedded, then classified
 *
 * A detection that cannot be labelled (missing classifier, failed
 * request, bad image data) still counts, as a normal vehicle. Lanes come
 * out in the order they were first seen.
 */

import type { DetectedBox, LaneReading } from "@adaptive-signal/types";
import type { ImageEmbedder, VehicleClassifier } from "./provider.js";
import { vehicleClassOf } from "./labels.js";

export interface AggregationOptions {
  classifier?: VehicleClassifier | null;
  embedder?: ImageEmbedder | null;
}

export interface AggregationStats {
  /** Detections counted */
  detections: number;
  /** Detections skipped for lacking a lane id */
  skipped: number;
  /** Detections that fell back to normal after a labelling failure */
  unlabelled: number;
}

export interface AggregationResult {
  readings: LaneReading[];
  stats: AggregationStats;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/** Decode a base64 image, rejecting empty or malformed input. */
export function decodeCrop(cropBase64: string): Buffer {
  const compact = cropBase64.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new Error("crop is not valid base64");
  }
  return Buffer.from(compact, "base64");
}

async function labelFromEmbedding(
  embedding: readonly number[],
  classifier: VehicleClassifier | null | undefined,
): Promise<string> {
  if (!classifier) throw new Error("Classifier not loaded");
  return classifier.classify(embedding);
}

/**
 * Resolve a detection's label, or null when none can be produced.
 * Never throws: every failure degrades to an unlabelled detection.
 */
export async function resolveLabel(
  detection: DetectedBox,
  options: AggregationOptions,
): Promise<string | null> {
  if (detection.predLabel) return detection.predLabel;

  try {
    if (detection.embedding !== undefined) {
      return await labelFromEmbedding(detection.embedding, options.classifier);
    }
    if (detection.cropBase64) {
      if (!options.embedder) throw new Error("Embedder not configured");
      const embedding = await options.embedder.embed(decodeCrop(detection.cropBase64));
      return await labelFromEmbedding(embedding, options.classifier);
    }
  } catch (err) {
    console.warn(
      `[detection] Labelling failed for lane ${detection.laneId}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return null;
}

export async function aggregateCounts(
  detections: readonly DetectedBox[],
  options: AggregationOptions = {},
): Promise<AggregationResult> {
  const counts = new Map<string, LaneReading>();
  const stats: AggregationStats = { detections: 0, skipped: 0, unlabelled: 0 };

  for (const detection of detections) {
    const laneId = detection.laneId;
    if (laneId === undefined || laneId === "") {
      stats.skipped++;
      continue;
    }

    let reading = counts.get(laneId);
    if (!reading) {
      reading = { laneId, normal: 0, emergency: 0 };
      counts.set(laneId, reading);
    }

    const label = await resolveLabel(detection, options);
    const hadSource = detection.embedding !== undefined || Boolean(detection.cropBase64);
    if (label === null && hadSource) stats.unlabelled++;

    if (vehicleClassOf(label) === "emergency") {
      reading.emergency++;
    } else {
      reading.normal++;
    }
    stats.detections++;
  }

  return { readings: [...counts.values()], stats };
}
