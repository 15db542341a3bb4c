/**
 * Layered JSON config for timing parameters.
 *
 * `configs/timing/base/default.json` holds the deployment's base values;
 * `configs/timing/profiles/*.json` hold named partial overrides that merge
 * on top of the base. Missing or malformed base files fall back to the
 * hardcoded defaults.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { TimingParams } from "@adaptive-signal/types";
import { ProfileNotFoundError } from "../errors.js";
import { DEFAULT_TIMING_PARAMS, pickTimingOverrides, validateTimingParams } from "./defaults.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TimingProfileInfo {
  name: string;
  description: string;
}

export interface TimingProfile extends TimingProfileInfo {
  overrides: Partial<TimingParams>;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/timing/`.
 * Works from both source and compiled paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "timing");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/controller/src/timing
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "timing");
}

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

function parseProfile(raw: unknown, fallbackName: string): TimingProfile {
  const record = raw !== null && typeof raw === "object" ? raw : {};
  const name: unknown = Reflect.get(record, "name");
  const description: unknown = Reflect.get(record, "description");
  return {
    name: typeof name === "string" ? name : fallbackName,
    description: typeof description === "string" ? description : "",
    overrides: pickTimingOverrides(Reflect.get(record, "overrides")),
  };
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load the base timing config. Falls back to hardcoded defaults. */
export function loadBaseTiming(configsRoot: string = findConfigsRoot()): TimingParams {
  const filePath = join(configsRoot, "base", "default.json");
  try {
    return validateTimingParams({ ...DEFAULT_TIMING_PARAMS, ...pickTimingOverrides(readJson(filePath)) });
  } catch (err) {
    if (existsSync(filePath)) {
      console.warn(`[config] Ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { ...DEFAULT_TIMING_PARAMS };
  }
}

/** Load a named profile merged on top of the base. */
export function loadTimingProfile(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): TimingParams & { _profile: TimingProfileInfo } {
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!/^[a-z0-9-]+$/i.test(profileName) || !existsSync(filePath)) {
    throw new ProfileNotFoundError(profileName);
  }

  const profile = parseProfile(readJson(filePath), profileName);
  const merged = validateTimingParams({ ...loadBaseTiming(configsRoot), ...profile.overrides });

  return {
    ...merged,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listTimingProfiles(configsRoot: string = findConfigsRoot()): TimingProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: TimingProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    try {
      const profile = parseProfile(readJson(join(profilesDir, file)), file.replace(/\.json$/, ""));
      profiles.push({ name: profile.name, description: profile.description });
    } catch {
      console.warn(`[config] Skipping malformed profile ${file}`);
    }
  }
  return profiles;
}
