import { Controller } from "@tsoa/runtime";
import type { PredictAndUpdateRequest } from "../models/requests.js";
import type { DetectionStatusResponse, PredictAndUpdateResponse } from "../models/responses.js";
import type { DetectionService } from "../services/detection.service.js";

export class DetectionController extends Controller {
  constructor(private readonly service: DetectionService) {
    super();
  }

  /** Count detections per lane and forward the counts to the signal controller */
  public async predictAndUpdate(body: PredictAndUpdateRequest): Promise<PredictAndUpdateResponse> {
    return this.service.predictAndUpdate(body.detections);
  }

  /** Classifier and embedder availability */
  public async getDetectionStatus(): Promise<DetectionStatusResponse> {
    return this.service.status();
  }
}
