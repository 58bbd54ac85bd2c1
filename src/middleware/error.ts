import type { Request, Response, NextFunction } from "express";
import { MacroBridgeError } from "../errors";
import type { ErrorResponse } from "../types";
import { logger } from "../utils/logger";

function hasStatus(err: unknown): err is { status: number; message?: unknown } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  let status = 500;
  let body: ErrorResponse = { error: "internal_error", message: "An unexpected error occurred" };

  if (err instanceof MacroBridgeError) {
    status = err.status;
    body = { error: err.kind, message: err.message };
    if (Object.keys(err.details).length > 0) body.details = err.details;
  } else if (hasStatus(err) && err.status < 500) {
    // body-parser failures (malformed JSON, oversized payloads) carry a 4xx status
    status = err.status;
    body = { error: "invalid_request", message: typeof err.message === "string" ? err.message : "Invalid request" };
  }

  const extra = { status, path: req.path, error: body.error, message: err instanceof Error ? err.message : String(err) };
  if (status >= 500) logger.error("request_error", extra);
  else logger.warn("request_error", extra);
  res.status(status).json(body);
}
