import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import type { ErrorResponse } from "../models/responses.js";

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[error] ${err.stack ?? err.message}`);
    } else {
      console.warn(`[error] ${err.name}: ${err.message}`);
    }
    res.status(status).json({ message: err.message });
    return;
  }

  console.error(`[error] Non-error thrown: ${String(err)}`);
  res.status(500).json({ message: "Internal server error" });
}

/** HTTP status carried by domain errors (`status`) or body-parser errors (`statusCode`) */
function statusOf(err: Error): number {
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 600 ? status : 500;
}
