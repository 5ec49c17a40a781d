/**
 * Outbound chat failures, reduced to what the core reacts to.
 *
 * - forbidden: the recipient blocked the bot (HTTP 403); permanent
 * - not_modified: an edit carried the same content as the message already has
 * - transient: everything else
 */
export type TransportErrorKind = "forbidden" | "not_modified" | "transient";

export class TransportError extends Error {
  readonly kind: TransportErrorKind;
  /** The platform's own error code, kept for delivery bookkeeping */
  readonly code: string;

  constructor(kind: TransportErrorKind, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
    this.code = code;
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Anything that is not already a TransportError is treated as transient.
 */
export function toTransportError(error: unknown): TransportError {
  if (isTransportError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError("transient", "unknown", message, { cause: error });
}
