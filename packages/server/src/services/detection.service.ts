/**
 * Detection service: labels a batch of detections, counts them per lane
 * and forwards the counts to the signal controller.
 *
 * The classifier is loaded once, best-effort. A missing or broken model
 * leaves the service running; detections that need it count as normal
 * vehicles and every response carries the load errors as a warning.
 */

import type { DetectedBox, LaneReading } from "@adaptive-signal/types";
import {
  HttpImageEmbedder,
  aggregateCounts,
  loadCentroidClassifier,
  type ImageEmbedder,
  type VehicleClassifier,
} from "@adaptive-signal/detection";
import { SignalClient } from "@adaptive-signal/clients-core";
import { ForwardingError } from "../errors.js";
import type {
  DetectionStatusResponse,
  PredictAndUpdateResponse,
  UpdateSignalResponse,
} from "../models/responses.js";

/** Anything that can take lane counts to the signal controller. */
export interface SignalForwarder {
  update(readings: LaneReading[]): Promise<UpdateSignalResponse>;
}

export interface DetectionServiceOptions {
  signalApiUrl: string;
  classifierModelPath?: string;
  embedderUrl?: string;
  /** Overrides for the collaborators built from the settings above */
  classifier?: VehicleClassifier;
  embedder?: ImageEmbedder;
  forwarder?: SignalForwarder;
}

/** The controller may be waking from idle, so allow it a minute. */
const FORWARD_TIMEOUT_MS = 60_000;

export class DetectionService {
  readonly loadErrors: string[] = [];
  private readonly classifier: VehicleClassifier | null;
  private readonly embedder: ImageEmbedder | null;
  private readonly forwarder: SignalForwarder;
  private readonly signalApiUrl: string;

  constructor(options: DetectionServiceOptions) {
    this.signalApiUrl = options.signalApiUrl;
    this.classifier = options.classifier ?? this.loadClassifier(options.classifierModelPath);
    this.embedder =
      options.embedder ?? (options.embedderUrl ? new HttpImageEmbedder({ url: options.embedderUrl }) : null);
    this.forwarder =
      options.forwarder ?? new SignalClient({ baseUrl: options.signalApiUrl, timeout: FORWARD_TIMEOUT_MS });
  }

  private loadClassifier(modelPath: string | undefined): VehicleClassifier | null {
    if (!modelPath) return null;
    try {
      const classifier = loadCentroidClassifier(modelPath);
      console.log(`[detection] Loaded classifier from ${modelPath}`);
      return classifier;
    } catch (err) {
      const message = `classifier load: ${err instanceof Error ? err.message : String(err)}`;
      console.warn(`[detection] ${message}`);
      this.loadErrors.push(message);
      return null;
    }
  }

  async predictAndUpdate(detections: readonly DetectedBox[]): Promise<PredictAndUpdateResponse> {
    const { readings, stats } = await aggregateCounts(detections, {
      classifier: this.classifier,
      embedder: this.embedder,
    });

    let controllerResponse: UpdateSignalResponse;
    try {
      controllerResponse = await this.forwarder.update(readings);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      console.error(`[detection] Forwarding to ${this.signalApiUrl} failed: ${error}`);
      throw new ForwardingError(error, readings);
    }

    const response: PredictAndUpdateResponse = { counts: readings, stats, controllerResponse };
    if (this.loadErrors.length > 0) {
      response.warning = { loadErrors: [...this.loadErrors] };
    }
    return response;
  }

  status(): DetectionStatusResponse {
    return {
      classifierLoaded: this.classifier !== null,
      embedderConfigured: this.embedder !== null,
      loadErrors: [...this.loadErrors],
    };
  }
}
