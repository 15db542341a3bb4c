/**
 * Server settings, read once from the environment at startup.
 */

export interface ServerConfig {
  port: number;
  /** Where the detection endpoint forwards lane counts */
  signalApiUrl: string;
  /** Remote image embedder; crops are unlabelled without it */
  embedderUrl?: string;
  /** Nearest-centroid model JSON */
  classifierModelPath?: string;
  /** Named timing profile to run the controller with */
  timingProfile?: string;
  /** Log a summary of every decision cycle */
  debug: boolean;
}

const DEFAULT_PORT = 3000;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsedPort = parseInt(env["PORT"] ?? "", 10);
  const port = Number.isNaN(parsedPort) ? DEFAULT_PORT : parsedPort;

  return {
    port,
    signalApiUrl: nonEmpty(env["SIGNAL_API_URL"]) ?? `http://localhost:${port}`,
    embedderUrl: nonEmpty(env["EMBEDDER_URL"]),
    classifierModelPath: nonEmpty(env["CLASSIFIER_MODEL_PATH"]),
    timingProfile: nonEmpty(env["TIMING_PROFILE"]),
    debug: ["1", "true", "yes"].includes((env["SIGNAL_DEBUG"] ?? "").toLowerCase()),
  };
}
