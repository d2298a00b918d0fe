/**
 * Error raised for anything that goes wrong while talking to the airport
 * database. The underlying failure is kept as `cause`.
 */

export type AirportSearchErrorKind =
  | "network"
  | "http"
  | "malformed-response"
  | "session-closed";

export class AirportSearchError extends Error {
  kind: AirportSearchErrorKind;
  /** HTTP status when kind is "http" */
  status?: number;

  constructor(
    kind: AirportSearchErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.kind = kind;
    this.status = options?.status;
    this.name = "AirportSearchError";
  }
}

export function isAirportSearchError(error: unknown): error is AirportSearchError {
  return error instanceof AirportSearchError;
}
