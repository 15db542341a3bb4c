/**
 * @adaptive-signal/types
 *
 * Shared domain types for the adaptive signal controller.
 *
 * - Lane: One approach to the intersection and its signal phase
 * - Decision: The report produced by one decision cycle
 * - Detection: Per-vehicle observations that aggregate into lane readings
 */

export * from "./lane.js";
export * from "./decision.js";
export * from "./detection.js";
