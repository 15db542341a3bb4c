import type { VehicleClass } from "@adaptive-signal/types";

/** Substrings that mark a label as an emergency vehicle */
export const EMERGENCY_KEYWORDS = ["ambulance", "emergency", "police", "fire"] as const;

/** Unlabelled detections still count, as ordinary traffic. */
export function vehicleClassOf(label: string | null): VehicleClass {
  if (!label) return "normal";
  const lower = label.toLowerCase();
  return EMERGENCY_KEYWORDS.some((k) => lower.includes(k)) ? "emergency" : "normal";
}
