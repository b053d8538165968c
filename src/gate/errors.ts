/**
 * Fatal error types for the gate layer.
 *
 * Validation outcomes (missing knowledge, unconfirmed or placeholder
 * resources, unknown actions) are never thrown; they are returned as
 * structured results. A GateError means a programming contract was broken.
 */

export type GateErrorCode =
  | "REQUIREMENT_TABLE_INVALID"
  | "HANDLER_MISSING"
  | "CONFIG_INVALID";

export class GateError extends Error {
  public readonly code: GateErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: GateErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GateError";
    this.code = code;
    this.details = details ?? {};
  }
}
