/**
 * Error taxonomy shared by the CLI, the MCP tools and the pipeline.
 *
 * Validation and bundle errors are raised before any network call that
 * would create state. Resolution errors come out of the owner-type
 * fallback. Transport errors wrap whatever the GraphQL client threw,
 * prefixed with the operation that failed. Partial bulk failures are not
 * errors at all: they are collected into a BulkResult.
 */

export type GhxErrorKind =
  | "validation"
  | "bundle"
  | "resolution"
  | "transport"
  | "cancelled";

export abstract class GhxError extends Error {
  abstract readonly kind: GhxErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends GhxError {
  readonly kind = "validation" as const;
}

export class BundleError extends GhxError {
  readonly kind = "bundle" as const;
}

export class ResolutionError extends GhxError {
  readonly kind = "resolution" as const;
}

export class TransportError extends GhxError {
  readonly kind = "transport" as const;
  readonly operation: string;
  readonly status?: number;

  constructor(operation: string, cause: unknown, status?: number) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
    this.status = status;
  }
}

export class CancelledError extends GhxError {
  readonly kind = "cancelled" as const;

  constructor(message = "operation cancelled") {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  validation: 2,
  bundle: 2,
  resolution: 3,
  transport: 4,
  cancelled: 130,
} as const;

/**
 * A bulk run that attempted every target exits with this code even when
 * some items failed; the failures are reported, not raised.
 */
export const BULK_PARTIAL_FAILURE_EXIT_CODE = EXIT_CODES.success;

export function exitCodeFor(error: unknown): number {
  if (error instanceof GhxError) return EXIT_CODES[error.kind];
  return EXIT_CODES.unexpected;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Throw CancelledError when the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
