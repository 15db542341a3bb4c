import { Controller } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { ControllerRegistry } from "../services/controller-registry.service.js";

export class HealthController extends Controller {
  constructor(private readonly registry: ControllerRegistry) {
    super();
  }

  /** Health check with the intersection's lane count and cycle */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      intersection: this.registry.summary(),
    };
  }
}
