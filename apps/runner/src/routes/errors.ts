import type { Context } from "hono";
import {
  AdmissionError,
  ConflictError,
  ConnectorNotFoundError,
  ConnectorUnavailableError,
  LaunchError,
  NotFoundError,
  errorMessage,
} from "../errors.js";

export interface ErrorBody {
  error: string;
  details?: string;
}

export type ErrorStatus = 400 | 404 | 429 | 500;

/** Maps request-time failures to an HTTP status and body. */
export function toHttpError(err: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (err instanceof NotFoundError) {
    return { status: 404, body: { error: "Process not found" } };
  }
  if (err instanceof AdmissionError) {
    return { status: 429, body: { error: "Maximum concurrent processes reached", details: err.message } };
  }
  if (err instanceof ConnectorNotFoundError || err instanceof ConnectorUnavailableError) {
    return { status: 400, body: { error: `Connector '${err.connector}' not found or unavailable` } };
  }
  if (err instanceof ConflictError) {
    return { status: 400, body: { error: err.message } };
  }
  if (err instanceof LaunchError) {
    return { status: 500, body: { error: "Failed to spawn process", details: err.message } };
  }
  return { status: 500, body: { error: "Internal server error", details: errorMessage(err) } };
}

export function errorResponse(c: Context, err: unknown): Response {
  const { status, body } = toHttpError(err);
  return c.json(body, status);
}
