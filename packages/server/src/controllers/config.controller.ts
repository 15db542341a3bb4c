import { Controller } from "@tsoa/runtime";
import type { TimingParams } from "@adaptive-signal/types";
import { listTimingProfiles, loadTimingProfile } from "@adaptive-signal/controller";
import type { ProfileListItem, TimingConfigResponse } from "../models/responses.js";

export class ConfigController extends Controller {
  /**
   * @param effective timing the running controller uses
   * @param configsRoot directory holding `base/` and `profiles/`
   */
  constructor(
    private readonly effective: TimingParams,
    private readonly configsRoot?: string,
  ) {
    super();
  }

  /** Effective timing parameters, or a named profile merged onto the base */
  public async getTiming(profile?: string): Promise<TimingConfigResponse> {
    if (!profile) return { ...this.effective };
    const { _profile, ...params } = loadTimingProfile(profile, this.configsRoot);
    return { ...params, profile: _profile };
  }

  /** List all available timing profiles */
  public async getProfiles(): Promise<ProfileListItem[]> {
    return listTimingProfiles(this.configsRoot);
  }
}
