/**
 * Error taxonomy shared by the bridge, the agent and the CLI.
 *
 * Every error carries a stable `code` so it can cross the HTTP API and be
 * rebuilt on the other side (see {@link errorFromCode}).
 */

export type SpoolTagErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_IMAGE"
  | "FIELD_OUT_OF_RANGE"
  | "AUTHENTICATION_FAILED"
  | "NO_BRIDGE_CONNECTED"
  | "REQUEST_IN_PROGRESS"
  | "TIMEOUT"
  | "PROTOCOL_VIOLATION"
  | "UNSUPPORTED_OPERATION"
  | "AGENT_ERROR";

export class SpoolTagError extends Error {
  constructor(
    readonly code: SpoolTagErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SpoolTagError";
  }
}

/** Malformed key-derivation input, hex, or API payload. */
export class InvalidInputError extends SpoolTagError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/** Wrong block count or block size. */
export class MalformedImageError extends SpoolTagError {
  constructor(message: string) {
    super("MALFORMED_IMAGE", message);
    this.name = "MalformedImageError";
  }
}

export class FieldOutOfRangeError extends SpoolTagError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, constraint: string) {
    super(
      "FIELD_OUT_OF_RANGE",
      `${field} out of range (${constraint}): ${String(value)}`,
    );
    this.name = "FieldOutOfRangeError";
    this.field = field;
    this.value = value;
  }
}

/**
 * Sector authentication failure. Agent-local: recovered by zero-filling
 * (read) or skipping (write) and never returned to a bridge caller.
 */
export class AuthenticationFailedError extends SpoolTagError {
  readonly sector: number;

  constructor(sector: number) {
    super("AUTHENTICATION_FAILED", `Authentication failed for sector ${sector}`);
    this.name = "AuthenticationFailedError";
    this.sector = sector;
  }
}

export class NoBridgeConnectedError extends SpoolTagError {
  constructor(message = "No NFC agent connected to the bridge") {
    super("NO_BRIDGE_CONNECTED", message);
    this.name = "NoBridgeConnectedError";
  }
}

export class RequestInProgressError extends SpoolTagError {
  readonly pendingRequestId: string | null;

  constructor(pendingRequestId: string | null, message?: string) {
    super(
      "REQUEST_IN_PROGRESS",
      message ??
        `Another tag operation is already waiting for a tag (${pendingRequestId ?? "unknown"})`,
    );
    this.name = "RequestInProgressError";
    this.pendingRequestId = pendingRequestId;
  }
}

export class BridgeTimeoutError extends SpoolTagError {
  constructor(message = "Timed out waiting for the tag. Hold a tag near the phone") {
    super("TIMEOUT", message);
    this.name = "BridgeTimeoutError";
  }
}

/** Unmatched correlation id or malformed envelope. */
export class ProtocolViolationError extends SpoolTagError {
  constructor(message: string) {
    super("PROTOCOL_VIOLATION", message);
    this.name = "ProtocolViolationError";
  }
}

export class UnsupportedOperationError extends SpoolTagError {
  constructor(message: string) {
    super("UNSUPPORTED_OPERATION", message);
    this.name = "UnsupportedOperationError";
  }
}

/** The agent reported a failure (no tag, reader fault) for the current request. */
export class AgentError extends SpoolTagError {
  constructor(message: string) {
    super("AGENT_ERROR", message);
    this.name = "AgentError";
  }
}

const ERROR_CODES: readonly SpoolTagErrorCode[] = [
  "INVALID_INPUT",
  "MALFORMED_IMAGE",
  "FIELD_OUT_OF_RANGE",
  "AUTHENTICATION_FAILED",
  "NO_BRIDGE_CONNECTED",
  "REQUEST_IN_PROGRESS",
  "TIMEOUT",
  "PROTOCOL_VIOLATION",
  "UNSUPPORTED_OPERATION",
  "AGENT_ERROR",
];

export function isSpoolTagErrorCode(value: unknown): value is SpoolTagErrorCode {
  return ERROR_CODES.some((code) => code === value);
}

export function isSpoolTagError(error: unknown): error is SpoolTagError {
  return error instanceof SpoolTagError;
}

/**
 * Rebuild a typed error from a wire code and message.
 * Field and sector details are not carried over the wire.
 */
export function errorFromCode(code: string, message: string): SpoolTagError {
  switch (code) {
    case "INVALID_INPUT":
      return new InvalidInputError(message);
    case "MALFORMED_IMAGE":
      return new MalformedImageError(message);
    case "NO_BRIDGE_CONNECTED":
      return new NoBridgeConnectedError(message);
    case "REQUEST_IN_PROGRESS":
      return new RequestInProgressError(null, message);
    case "TIMEOUT":
      return new BridgeTimeoutError(message);
    case "PROTOCOL_VIOLATION":
      return new ProtocolViolationError(message);
    case "UNSUPPORTED_OPERATION":
      return new UnsupportedOperationError(message);
    case "AGENT_ERROR":
      return new AgentError(message);
    default:
      if (isSpoolTagErrorCode(code)) {
        return new SpoolTagError(code, message);
      }
      return new AgentError(message);
  }
}

/**
 * Normalize an arbitrary thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
