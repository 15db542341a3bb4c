import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { InvalidReadingError } from "@adaptive-signal/controller";
import { toFieldErrors } from "../validation.js";

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.fields,
    });
    return;
  }

  if (err instanceof InvalidReadingError) {
    console.warn(`[validation] ${err.message}`);
    res.status(422).json({
      message: "Validation failed",
      details: toFieldErrors(err.issues),
    });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    const status: unknown = Reflect.get(err, "status");
    const details: unknown = Reflect.get(err, "details");
    res
      .status(typeof status === "number" ? status : 500)
      .json(details === undefined ? { message: err.message } : { message: err.message, details });
    return;
  }

  next(err);
}
