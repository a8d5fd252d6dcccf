import type { Context } from "hono";
import { InvalidInputError, createLogger, isSpoolTagError, toError, type SpoolTagErrorCode } from "@spooltag/shared";

const logger = createLogger("bridge:http");

export type ErrorStatus = 400 | 408 | 409 | 500 | 501 | 502 | 503;

const STATUS_BY_CODE: Record<SpoolTagErrorCode, ErrorStatus> = {
  INVALID_INPUT: 400,
  MALFORMED_IMAGE: 400,
  FIELD_OUT_OF_RANGE: 400,
  AUTHENTICATION_FAILED: 502,
  NO_BRIDGE_CONNECTED: 503,
  REQUEST_IN_PROGRESS: 409,
  TIMEOUT: 408,
  PROTOCOL_VIOLATION: 502,
  UNSUPPORTED_OPERATION: 501,
  AGENT_ERROR: 502,
};

export function statusForError(error: unknown): ErrorStatus {
  return isSpoolTagError(error) ? STATUS_BY_CODE[error.code] : 500;
}

/**
 * `{ error: { code, message } }` with the status mapped from the error code.
 */
export function errorResponse(c: Context, error: unknown): Response {
  const status = statusForError(error);
  if (isSpoolTagError(error)) {
    return c.json({ error: { code: error.code, message: error.message } }, status);
  }
  logger.error("Unhandled error in request", toError(error), { path: c.req.path });
  return c.json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } }, status);
}

/**
 * Read a JSON object body. Anything else is INVALID_INPUT.
 */
export async function readJsonObject(c: Context): Promise<object> {
  const body: unknown = await c.req.json().catch(() => undefined);
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  return body;
}
