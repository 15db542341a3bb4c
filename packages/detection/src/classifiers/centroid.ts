/**
 * Nearest-centroid classifier over a JSON model.
 *
 * Model file format:
 *   { "labels": ["car", "ambulance"], "centroids": [[...], [...]] }
 * One centroid per label, all of the same dimension.
 */

import { readFileSync } from "node:fs";
import type { VehicleClassifier } from "../provider.js";

export interface CentroidModel {
  labels: string[];
  centroids: number[][];
}

export class ModelLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelLoadError";
  }
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

/** Validate an untrusted model object. */
export function parseCentroidModel(raw: unknown): CentroidModel {
  if (raw === null || typeof raw !== "object") {
    throw new ModelLoadError("model must be an object");
  }
  const labels: unknown = Reflect.get(raw, "labels");
  const centroids: unknown = Reflect.get(raw, "centroids");

  if (!Array.isArray(labels) || !labels.every((l): l is string => typeof l === "string")) {
    throw new ModelLoadError("model.labels must be an array of strings");
  }
  if (!Array.isArray(centroids) || !centroids.every(isNumberArray)) {
    throw new ModelLoadError("model.centroids must be an array of number arrays");
  }
  if (labels.length === 0 || labels.length !== centroids.length) {
    throw new ModelLoadError(
      `model needs one centroid per label (got ${labels.length} labels, ${centroids.length} centroids)`,
    );
  }
  const dim = centroids[0]?.length ?? 0;
  if (dim === 0 || centroids.some((c) => c.length !== dim)) {
    throw new ModelLoadError("model centroids must share a non-zero dimension");
  }
  return { labels, centroids };
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

export class CentroidClassifier implements VehicleClassifier {
  readonly name = "Nearest Centroid";

  constructor(private readonly model: CentroidModel) {}

  get dimension(): number {
    return this.model.centroids[0]?.length ?? 0;
  }

  async classify(embedding: readonly number[]): Promise<string> {
    if (embedding.length !== this.dimension) {
      throw new Error(
        `Embedding has ${embedding.length} dimensions, model expects ${this.dimension}`,
      );
    }
    let bestLabel = "";
    let bestDistance = Infinity;
    this.model.centroids.forEach((centroid, i) => {
      const distance = squaredDistance(embedding, centroid);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestLabel = this.model.labels[i] ?? "";
      }
    });
    return bestLabel;
  }
}

export function loadCentroidClassifier(modelPath: string): CentroidClassifier {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(modelPath, "utf-8"));
  } catch (err) {
    throw new ModelLoadError(
      `cannot read ${modelPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return new CentroidClassifier(parseCentroidModel(raw));
}
