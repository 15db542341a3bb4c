/**
 * Route table. Paths live here, not on the controller classes.
 *
 * Each handler validates the request body, calls a fresh controller instance
 * and replies with the status the controller set (200 by default).
 * Failures go to the error middleware.
 */

import express, { type Request, type RequestHandler, type Router } from "express";
import type { Controller } from "@tsoa/runtime";
import type { TimingParams } from "@adaptive-signal/types";
import { SignalController } from "./controllers/signal.controller.js";
import { DetectionController } from "./controllers/detection.controller.js";
import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import type { ControllerRegistry } from "./services/controller-registry.service.js";
import type { DetectionService } from "./services/detection.service.js";
import { parseDetectionPayload, parseLaneReadings } from "./validation.js";

export interface AppServices {
  registry: ControllerRegistry;
  detection: DetectionService;
  /** Timing the running controller uses */
  timing: TimingParams;
  configsRoot?: string;
}

function handle<C extends Controller, T>(
  create: () => C,
  run: (controller: C, req: Request) => Promise<T>,
): RequestHandler {
  return (req, res, next) => {
    const controller = create();
    run(controller, req)
      .then((result) => {
        res.status(controller.getStatus() ?? 200).json(result);
      })
      .catch(next);
  };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

export function registerRoutes(services: AppServices): Router {
  const router = express.Router();
  const signal = () => new SignalController(services.registry);
  const detections = () => new DetectionController(services.detection);
  const config = () => new ConfigController(services.timing, services.configsRoot);

  router.post(
    "/api/signal/update",
    handle(signal, async (c, req) => c.update(parseLaneReadings(req.body))),
  );
  router.get("/api/signal/status", handle(signal, (c) => c.getSignalStatus()));

  router.post(
    "/api/detections/predict-and-update",
    handle(detections, async (c, req) => c.predictAndUpdate(parseDetectionPayload(req.body))),
  );
  router.get("/api/detections/status", handle(detections, (c) => c.getDetectionStatus()));

  router.get("/api/config/timing", handle(config, (c, req) => c.getTiming(queryString(req, "profile"))));
  router.get("/api/config/profiles", handle(config, (c) => c.getProfiles()));

  router.get(
    "/health",
    handle(
      () => new HealthController(services.registry),
      (c) => c.getHealth(),
    ),
  );

  return router;
}
