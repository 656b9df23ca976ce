// src/middleware/errors.ts
import type { Request, Response, NextFunction } from "express";
import { moduleLogger } from "../logger.js";
import { GatewayError, isAppError, ValidationError } from "../errors.js";

const log = moduleLogger("http");

export type ErrorBody = {
  status: "error";
  code: string;
  message: string;
  errors?: Record<string, string>;
};

/** Shape any thrown value as the API's error body. */
export function toErrorResponse(err: unknown): { httpStatus: number; body: ErrorBody } {
  if (isAppError(err)) {
    const body: ErrorBody = { status: "error", code: err.code, message: err.message };
    if (err instanceof ValidationError && Object.keys(err.details).length) {
      body.errors = err.details;
    }
    return { httpStatus: err.status, body };
  }
  return {
    httpStatus: 500,
    body: { status: "error", code: "internal_error", message: "Internal Server Error" },
  };
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ status: "error", code: "not_found", message: "Not Found" } satisfies ErrorBody);
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // Body parser failures (malformed JSON) carry their own 4xx status.
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ status: "error", code: "validation_error", message: "Malformed JSON body" });
    return;
  }

  const { httpStatus, body } = toErrorResponse(err);
  if (httpStatus >= 500) {
    const detail = err instanceof GatewayError ? err.detail : undefined;
    log.error({ err, detail, method: req.method, path: req.path }, "request failed");
  } else {
    log.info({ code: body.code, method: req.method, path: req.path }, body.message);
  }
  res.status(httpStatus).json(body);
}
