import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Request, Response } from "express";
import { ValidateError } from "@tsoa/runtime";
import { InvalidReadingError, ProfileNotFoundError } from "@adaptive-signal/controller";
import { errorHandler } from "./error-handler.js";
import { ForwardingError } from "../errors.js";

interface FakeResponse {
  status(code: number): FakeResponse;
  json(body: unknown): FakeResponse;
}

function makeResponse() {
  const captured: { status: number | null; body: unknown } = { status: null, body: undefined };
  const res: FakeResponse = {
    status(code: number) {
      captured.status = code;
      return res;
    },
    json(body: unknown) {
      captured.body = body;
      return res;
    },
  };
  return { res: res as unknown as Response, captured };
}

const req = {} as Request;

describe("errorHandler", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers validation errors with 422", () => {
    const { res, captured } = makeResponse();
    const fields = { readings: { message: "must be an array of lane readings", value: 1 } };
    errorHandler(new ValidateError(fields, "Validation failed"), req, res, vi.fn());
    expect(captured).toEqual({ status: 422, body: { message: "Validation failed", details: fields } });
  });

  it("answers invalid readings from the controller with 422", () => {
    const { res, captured } = makeResponse();
    const err = new InvalidReadingError([{ field: "readings[0].normal", message: "must not be negative", value: -1 }]);
    errorHandler(err, req, res, vi.fn());
    expect(captured).toEqual({
      status: 422,
      body: {
        message: "Validation failed",
        details: { "readings[0].normal": { message: "must not be negative", value: -1 } },
      },
    });
  });

  it("uses the status an error carries", () => {
    const { res, captured } = makeResponse();
    errorHandler(new ProfileNotFoundError("missing"), req, res, vi.fn());
    expect(captured).toEqual({ status: 404, body: { message: "Timing profile not found: missing" } });
  });

  it("includes error details for forwarding failures", () => {
    const { res, captured } = makeResponse();
    const laneInput = [{ laneId: "A", normal: 2, emergency: 0 }];
    errorHandler(new ForwardingError("connect ECONNREFUSED", laneInput), req, res, vi.fn());
    expect(captured).toEqual({
      status: 502,
      body: {
        message: "Failed to forward lane counts to the signal controller",
        details: { error: "connect ECONNREFUSED", laneInput },
      },
    });
  });

  it("defaults to 500", () => {
    const { res, captured } = makeResponse();
    errorHandler(new Error("boom"), req, res, vi.fn());
    expect(captured).toEqual({ status: 500, body: { message: "boom" } });
  });

  it("passes non-errors on", () => {
    const { res, captured } = makeResponse();
    const next = vi.fn();
    errorHandler("odd", req, res, next);
    expect(next).toHaveBeenCalledWith("odd");
    expect(captured.status).toBeNull();
  });
});
