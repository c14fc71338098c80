import type { FailureReason } from "./types";

export class OutageTrackerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "OutageTrackerError";
  }
}

export class ConfigError extends OutageTrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

export type FetchErrorKind = "Timeout" | "HttpStatus" | "NetworkError";

export class FetchError extends OutageTrackerError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, "FETCH_ERROR", details);
    this.name = "FetchError";
  }
}

export type ParseErrorKind = "NoRecognizedFormat" | "MalformedStructure";

export class ParseError extends OutageTrackerError {
  constructor(
    public readonly kind: ParseErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, "PARSE_ERROR", details);
    this.name = "ParseError";
  }
}

export type AddressLookupErrorKind = "NotFound" | "UpstreamError";

export class AddressLookupError extends OutageTrackerError {
  constructor(
    public readonly kind: AddressLookupErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, "ADDRESS_LOOKUP_ERROR", details);
    this.name = "AddressLookupError";
  }
}

export type DeliveryErrorKind = "RecipientUnreachable" | "TransientFailure";

export class DeliveryError extends OutageTrackerError {
  constructor(
    public readonly kind: DeliveryErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, "DELIVERY_ERROR", details);
    this.name = "DeliveryError";
  }
}

export class StorageError extends OutageTrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "STORAGE_ERROR", details);
    this.name = "StorageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Maps anything thrown inside a fetch/parse step to the reason carried by a failed outcome. */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof FetchError || error instanceof ParseError) {
    return error.kind;
  }
  if (error instanceof AddressLookupError) {
    return error.kind === "NotFound" ? "AddressNotFound" : "UpstreamError";
  }
  return "Unexpected";
}
