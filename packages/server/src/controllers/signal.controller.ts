import { Controller } from "@tsoa/runtime";
import type { UpdateSignalRequest } from "../models/requests.js";
import type { SignalStatusResponse, UpdateSignalResponse } from "../models/responses.js";
import type { ControllerRegistry } from "../services/controller-registry.service.js";

export class SignalController extends Controller {
  constructor(private readonly registry: ControllerRegistry) {
    super();
  }

  /** Run one decision cycle with the latest lane counts */
  public async update(body: UpdateSignalRequest): Promise<UpdateSignalResponse> {
    return { status: "success", output: this.registry.update(body) };
  }

  /** Per-lane state, or an empty object before the first update */
  public async getSignalStatus(): Promise<SignalStatusResponse> {
    return this.registry.status();
  }
}
