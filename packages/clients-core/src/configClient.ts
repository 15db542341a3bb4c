import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ProfileListItem, TimingConfigResponse } from "./types.js";

export class ConfigClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/config", config);
  }

  /** Effective timing parameters, optionally for a named profile */
  public async getTiming(profile?: string): Promise<TimingConfigResponse> {
    return this.client.get<TimingConfigResponse>({
      path: "timing",
      query: profile ? { profile } : undefined,
    });
  }

  /** List all available timing profiles */
  public async listProfiles(): Promise<ProfileListItem[]> {
    return this.client.get<ProfileListItem[]>({ path: "profiles" });
  }
}
