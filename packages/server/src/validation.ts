/**
 * Request body validation.
 *
 * Bodies arrive as untyped JSON. The zod schemas below check their shape
 * and strip unknown fields; the lane rules zod cannot see (unique lane ids)
 * come from the controller's own reading checks. Every failure is thrown
 * as tsoa's `ValidateError`, which the error middleware answers with 422.
 */

import { z } from "zod";
import { ValidateError, type FieldErrors } from "@tsoa/runtime";
import type { DetectedBox, LaneReading } from "@adaptive-signal/types";
import { findReadingIssues, type ReadingIssue } from "@adaptive-signal/controller";

const VALIDATION_FAILED = "Validation failed";

const count = z
  .number({ required_error: "must be an integer", invalid_type_error: "must be an integer" })
  .int({ message: "must be an integer" })
  .nonnegative({ message: "must not be negative" });

const laneReadingSchema = z.object(
  {
    laneId: z
      .string({ required_error: "must be a non-empty string", invalid_type_error: "must be a non-empty string" })
      .min(1, { message: "must be a non-empty string" }),
    normal: count,
    emergency: count,
  },
  { invalid_type_error: "must be an object" },
);

export const laneReadingsSchema = z.array(laneReadingSchema, {
  required_error: "must be an array of lane readings",
  invalid_type_error: "must be an array of lane readings",
});

/** An optional string field; `null` reads as absent. */
const optionalText = z
  .string({ invalid_type_error: "must be a string" })
  .nullish()
  .transform((value) => value ?? undefined);

const detectionSchema = z.object(
  {
    laneId: optionalText,
    predLabel: optionalText,
    cropBase64: optionalText,
    embedding: z
      .array(z.number({ invalid_type_error: "must be a number" }).finite({ message: "must be a number" }), {
        invalid_type_error: "must be an array of numbers",
      })
      .nullish()
      .transform((value) => value ?? undefined),
  },
  { invalid_type_error: "must be an object" },
);

export const detectionPayloadSchema = z.object(
  {
    detections: z.array(detectionSchema, {
      required_error: "must be an array of detections",
      invalid_type_error: "must be an array of detections",
    }),
  },
  { required_error: "must be an object", invalid_type_error: "must be an object" },
);

/** `readings`, `[0]`, `normal` → `readings[0].normal` */
function fieldName(root: string, path: readonly (string | number)[]): string {
  const name = path.reduce<string>(
    (acc, key) => (typeof key === "number" ? `${acc}[${key}]` : acc ? `${acc}.${key}` : key),
    root,
  );
  return name || "body";
}

export function zodFieldErrors(error: z.ZodError, root = ""): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const name = fieldName(root, issue.path);
    // First issue per field wins
    if (!(name in fields)) fields[name] = { message: issue.message };
  }
  return fields;
}

export function toFieldErrors(issues: readonly ReadingIssue[]): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of issues) {
    fields[issue.field] = { message: issue.message, value: issue.value };
  }
  return fields;
}

/** Parse the body of a signal update: an array of `{ laneId, normal, emergency }`. */
export function parseLaneReadings(body: unknown): LaneReading[] {
  const parsed = laneReadingsSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidateError(zodFieldErrors(parsed.error, "readings"), VALIDATION_FAILED);
  }

  const issues = findReadingIssues(parsed.data);
  if (issues.length > 0) {
    throw new ValidateError(toFieldErrors(issues), VALIDATION_FAILED);
  }
  return parsed.data;
}

/** Parse the body of a detection batch: `{ detections: DetectedBox[] }`. */
export function parseDetectionPayload(body: unknown): { detections: DetectedBox[] } {
  const parsed = detectionPayloadSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidateError(zodFieldErrors(parsed.error), VALIDATION_FAILED);
  }
  return parsed.data;
}
