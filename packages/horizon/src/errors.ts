/**
 * Horizon error type.
 *
 * The code is what the API's error handler maps to an HTTP status.
 */

export type HorizonErrorCode =
  | "ACCOUNT_NOT_FOUND"
  | "INVALID_ADDRESS"
  | "HORIZON_UNAVAILABLE"
  | "NOT_CONNECTED";

export class HorizonError extends Error {
  readonly code: HorizonErrorCode;

  constructor(code: HorizonErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HorizonError";
    this.code = code;
  }
}
