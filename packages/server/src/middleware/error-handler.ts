import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { DtedError } from "@dted-terrain/dted";
import type { ErrorResponse } from "../models/responses.js";

export interface ErrorReply {
  status: number;
  body: ErrorResponse;
}

function statusOf(err: Error): number {
  return "status" in err && typeof err.status === "number" ? err.status : 500;
}

/**
 * Map a thrown value to a status and JSON body, logging it on the way.
 * Returns null for values that are not errors.
 */
export function describeError(err: unknown): ErrorReply | null {
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    return {
      status: 422,
      body: { message: "Validation failed", details: err.fields },
    };
  }

  // A tile that exists but cannot be decoded
  if (err instanceof DtedError) {
    console.warn(`[dted] ${err.name}: ${err.message}`);
    return { status: 422, body: { message: err.message } };
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    return { status: statusOf(err), body: { message: err.message } };
  }

  return null;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  const reply = describeError(err);
  if (!reply) {
    next(err);
    return;
  }
  res.status(reply.status).json(reply.body);
}
