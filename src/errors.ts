// CHANGE: Typed gate errors with stable codes and cancellation helpers.
// WHY: Callers and the CLI distinguish a missing snapshot from a store failure by code.

/**
 * Gate error codes
 */
export const ErrorCodes = {
  SNAPSHOT_NOT_FOUND: "SNAPSHOT_NOT_FOUND",
  MALFORMED_SCAN_RECORD: "MALFORMED_SCAN_RECORD",
  STORE_FAILURE: "STORE_FAILURE",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  CANCELLED: "CANCELLED"
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for every failure raised by the gate.
 */
export class GateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = "GateError";
  }
}

/**
 * A snapshot identifier did not resolve in the snapshot store.
 */
export class SnapshotNotFoundError extends GateError {
  constructor(public readonly snapshotId: string) {
    super(ErrorCodes.SNAPSHOT_NOT_FOUND, `Snapshot not found: ${snapshotId}`);
    this.name = "SnapshotNotFoundError";
  }
}

/**
 * A scan document could not be read or parsed.
 */
export class MalformedScanRecordError extends GateError {
  constructor(
    public readonly source: string,
    detail: string,
    options?: { readonly cause?: unknown }
  ) {
    super(ErrorCodes.MALFORMED_SCAN_RECORD, `Malformed scan record ${source}: ${detail}`, options);
    this.name = "MalformedScanRecordError";
  }
}

/**
 * A backing store failed for a reason other than a missing snapshot.
 */
export class StoreFailureError extends GateError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(ErrorCodes.STORE_FAILURE, message, options);
    this.name = "StoreFailureError";
  }
}

export class InvalidArgumentError extends GateError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_ARGUMENT, message);
    this.name = "InvalidArgumentError";
  }
}

export class CancelledError extends GateError {
  constructor(operation: string) {
    super(ErrorCodes.CANCELLED, `${operation} cancelled`);
    this.name = "CancelledError";
  }
}

/**
 * Throw when the caller aborted the run.
 */
export function ensureNotAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
