import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { LaneReading, SignalStatusResponse, UpdateSignalResponse } from "./types.js";

export class SignalClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/signal", config);
  }

  /** Run one decision cycle with the given lane readings */
  public async update(readings: LaneReading[]): Promise<UpdateSignalResponse> {
    return this.client.post<UpdateSignalResponse>({
      path: "update",
      body: readings,
    });
  }

  /** Current per-lane controller state */
  public async getStatus(): Promise<SignalStatusResponse> {
    return this.client.get<SignalStatusResponse>({ path: "status" });
  }
}
