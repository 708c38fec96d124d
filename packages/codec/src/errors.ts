/**
 * Codec Errors
 *
 * Every failing codec operation throws a ShortUuidError. The `code` tells
 * callers which input was rejected; `details` carries the offending value.
 */

export type ShortUuidErrorCode =
  | "INVALID_ALPHABET"
  | "INVALID_LENGTH"
  | "INVALID_UUID"
  | "INVALID_CHARACTER"
  | "VALUE_OUT_OF_RANGE"
  | "INVALID_CONFIG";

export type ShortUuidErrorDetails = Readonly<Record<string, string | number>>;

export class ShortUuidError extends Error {
  constructor(
    message: string,
    public readonly code: ShortUuidErrorCode,
    public readonly details?: ShortUuidErrorDetails
  ) {
    super(message);
    this.name = "ShortUuidError";
  }
}

export function isShortUuidError(error: unknown): error is ShortUuidError {
  return error instanceof ShortUuidError;
}
