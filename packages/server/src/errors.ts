import type { LaneReading } from "@adaptive-signal/types";

/** The signal controller could not be reached, or rejected the counts. */
export class ForwardingError extends Error {
  readonly status = 502;
  readonly details: { error: string; laneInput: LaneReading[] };

  constructor(error: string, laneInput: LaneReading[]) {
    super("Failed to forward lane counts to the signal controller");
    this.name = "ForwardingError";
    this.details = { error, laneInput };
  }
}
