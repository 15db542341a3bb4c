import express from "express";
import cors from "cors";
import { registerRoutes, type AppServices } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import { ControllerRegistry, resolveServerTiming } from "./services/controller-registry.service.js";
import { DetectionService } from "./services/detection.service.js";

export function createServices(config: ServerConfig): AppServices {
  const timing = resolveServerTiming(config.timingProfile);
  return {
    timing,
    registry: new ControllerRegistry({ params: timing, debug: config.debug }),
    detection: new DetectionService({
      signalApiUrl: config.signalApiUrl,
      classifierModelPath: config.classifierModelPath,
      embedderUrl: config.embedderUrl,
    }),
  };
}

export function createApp(services: AppServices = createServices(loadServerConfig())): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.use(registerRoutes(services));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
