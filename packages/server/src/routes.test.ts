import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { once } from "node:events";
import type { Server } from "node:http";
import type { TimingParams } from "@adaptive-signal/types";
import {
  ApiError,
  BaseClient,
  ConfigClient,
  DetectionClient,
  HealthClient,
  SignalClient,
  type ClientConfig,
} from "@adaptive-signal/clients-core";

import { createApp } from "./app.js";
import { ControllerRegistry } from "./services/controller-registry.service.js";
import { DetectionService } from "./services/detection.service.js";
import type { UpdateSignalResponse } from "./models/responses.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const TIMING: TimingParams = {
  minGreen: 3,
  maxGreen: 12,
  yellowTime: 2,
  waitBoost: 0.4,
  starvationLimit: 8,
  clearanceRate: 2.5,
};

const forward = vi.fn(async (): Promise<UpdateSignalResponse> => ({ status: "success", output: {} }));

async function failure(request: Promise<unknown>): Promise<ApiError> {
  const error = await request.catch((e: unknown) => e);
  if (!(error instanceof ApiError)) throw new Error("expected the request to fail");
  return error;
}

// ─── App over loopback ──────────────────────────────────────────────────────

describe("routes", () => {
  let server: Server;
  let config: ClientConfig;

  beforeAll(async () => {
    const app = createApp({
      timing: TIMING,
      registry: new ControllerRegistry({ params: TIMING, now: () => 0, random: () => 0 }),
      detection: new DetectionService({ signalApiUrl: "http://signal.test", forwarder: { update: forward } }),
    });
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    config = { baseUrl: `http://127.0.0.1:${address.port}` };
  });

  afterAll(async () => {
    server.close();
    await once(server, "close");
  });

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    forward.mockClear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs a decision cycle on update", async () => {
    const signal = new SignalClient(config);
    // 3 / 2.5 = 1.2s, raised to minGreen
    expect(await signal.update([{ laneId: "A", normal: 3, emergency: 0 }])).toEqual({
      status: "success",
      output: { A: { phase: "green", wait: 0, greenTime: 3 } },
    });
    expect(Object.keys(await signal.getStatus())).toEqual(["A"]);
  });

  it("keeps a lane named __proto__ in the response", async () => {
    const response = await new SignalClient(config).update([
      { laneId: "__proto__", normal: 5, emergency: 0 },
      { laneId: "B", normal: 0, emergency: 0 },
    ]);
    expect(Object.keys(response.output)).toEqual(["__proto__", "B"]);
  });

  it("answers an invalid update body with 422", async () => {
    const client = new BaseClient("api/signal", config);
    const error = await failure(client.post({ path: "update", body: { laneId: "A" } }));

    expect(error.status).toBe(422);
    expect(error.body).toEqual({
      message: "Validation failed",
      details: { readings: { message: "must be an array of lane readings" } },
    });
  });

  it("answers duplicate lanes with 422", async () => {
    const error = await failure(
      new SignalClient(config).update([
        { laneId: "A", normal: 1, emergency: 0 },
        { laneId: "A", normal: 1, emergency: 0 },
      ]),
    );
    expect(error.message).toBe("422: Validation failed");
  });

  it("passes the profile query through", async () => {
    const timing = await new ConfigClient(config).getTiming("rush-hour");
    expect(timing.maxGreen).toBe(20);
    expect(timing.profile?.name).toBe("rush-hour");
  });

  it("returns the running timing without a profile", async () => {
    expect(await new ConfigClient(config).getTiming()).toEqual(TIMING);
  });

  it("answers an unknown profile with 404", async () => {
    const error = await failure(new ConfigClient(config).getTiming("missing"));
    expect(error.status).toBe(404);
    expect(error.body).toEqual({ message: "Timing profile not found: missing" });
  });

  it("forwards detection counts", async () => {
    const response = await new DetectionClient(config).predictAndUpdate({
      detections: [{ laneId: "N", predLabel: "ambulance" }],
    });
    expect(response.counts).toEqual([{ laneId: "N", normal: 0, emergency: 1 }]);
    expect(forward).toHaveBeenCalledWith([{ laneId: "N", normal: 0, emergency: 1 }]);
  });

  it("answers a forwarding failure with 502", async () => {
    forward.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    const error = await failure(
      new DetectionClient(config).predictAndUpdate({ detections: [{ laneId: "N", predLabel: "bus" }] }),
    );

    expect(error.status).toBe(502);
    expect(error.body).toEqual({
      message: "Failed to forward lane counts to the signal controller",
      details: { error: "connect ECONNREFUSED", laneInput: [{ laneId: "N", normal: 1, emergency: 0 }] },
    });
  });

  it("reports health", async () => {
    const health = await new HealthClient(config).getHealth();
    expect(health.status).toBe("ok");
    expect(health.intersection.lanes).toBeGreaterThan(0);
  });
});
