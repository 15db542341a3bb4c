/**
 * @adaptive-signal/controller
 *
 * Decision core of the adaptive signal: picks which lane gets the next
 * green phase and for how long.
 *
 * Pipeline per cycle:
 * 1. Merge readings with retained wait counters
 * 2. Emergency preemption, else hold the running green, else fairness
 * 3. Age waits, estimate green time, switch phases
 * 4. Evolve synthetic demand
 */

export { SignalController, type SignalControllerOptions } from "./signal-controller.js";
export * from "./errors.js";
export * from "./lanes/index.js";
export * from "./selection/index.js";
export * from "./timing/index.js";
export * from "./phase/transition.js";
export * from "./demand/index.js";
