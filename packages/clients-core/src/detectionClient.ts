import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  DetectionPayload,
  DetectionStatusResponse,
  PredictAndUpdateResponse,
} from "./types.js";

export class DetectionClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/detections", config);
  }

  /** Aggregate detections into lane counts and forward them to the controller */
  public async predictAndUpdate(payload: DetectionPayload): Promise<PredictAndUpdateResponse> {
    return this.client.post<PredictAndUpdateResponse>({
      path: "predict-and-update",
      body: payload,
    });
  }

  /** Classifier and embedder availability */
  public async getStatus(): Promise<DetectionStatusResponse> {
    return this.client.get<DetectionStatusResponse>({ path: "status" });
  }
}
