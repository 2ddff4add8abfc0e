/**
 * Structured errors for the shipping assistant.
 * Engines return these inside a ShippingResult; the chat layer turns them into user-facing text.
 */

export type ShippingErrorCode =
  | "AUTH_FAILED"
  | "UPSTREAM_ERROR"
  | "UPSTREAM_TIMEOUT"
  | "NETWORK_ERROR"
  | "MALFORMED_RESPONSE"
  | "ORDER_NOT_FOUND"
  | "EXTRACTION_PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_TOOL"
  | "MODEL_ERROR";

export interface ShippingErrorDetails {
  code: ShippingErrorCode;
  message: string;
  /** HTTP status of a failed provider call */
  httpStatus?: number;
  /** Raw provider body, for logs only */
  body?: string;
  /** Offending order number for ORDER_NOT_FOUND */
  orderNumber?: string;
  /** Field paths that failed validation */
  fields?: string[];
  /** Underlying cause for logging */
  cause?: unknown;
}

export class ShippingError extends Error {
  readonly details: ShippingErrorDetails;

  constructor(details: ShippingErrorDetails) {
    super(details.message);
    this.name = "ShippingError";
    this.details = details;
    Object.setPrototypeOf(this, ShippingError.prototype);
  }

  get code(): ShippingErrorCode {
    return this.details.code;
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  /** Serialize for logs and tool output; provider bodies and causes are left out */
  toJSON(): ShippingErrorDetails {
    return { ...this.details, body: undefined, cause: undefined };
  }
}

export function authError(message: string, cause?: unknown): ShippingError {
  return new ShippingError({ code: "AUTH_FAILED", message, cause });
}

/** Non-2xx from any provider endpoint */
export function upstreamError(operation: string, httpStatus: number, body: string): ShippingError {
  return new ShippingError({
    code: "UPSTREAM_ERROR",
    message: `${operation} failed with HTTP ${httpStatus}`,
    httpStatus,
    body,
  });
}

export function timeoutError(operation: string): ShippingError {
  return new ShippingError({
    code: "UPSTREAM_TIMEOUT",
    message: `Request timed out: ${operation}`,
  });
}

export function networkError(message: string, cause?: unknown): ShippingError {
  return new ShippingError({ code: "NETWORK_ERROR", message, cause });
}

export function malformedResponseError(message: string, cause?: unknown): ShippingError {
  return new ShippingError({ code: "MALFORMED_RESPONSE", message, cause });
}

export function orderNotFoundError(orderNumber: string): ShippingError {
  return new ShippingError({
    code: "ORDER_NOT_FOUND",
    message: `Order ${orderNumber} not found`,
    orderNumber,
  });
}

export function extractionParseError(message: string, cause?: unknown): ShippingError {
  return new ShippingError({ code: "EXTRACTION_PARSE_ERROR", message, cause });
}

export function validationError(message: string, fields?: string[], cause?: unknown): ShippingError {
  return new ShippingError({ code: "VALIDATION_ERROR", message, fields, cause });
}

export function unknownToolError(name: string): ShippingError {
  return new ShippingError({ code: "UNKNOWN_TOOL", message: `Unknown tool: ${name}` });
}

export function modelError(message: string, cause?: unknown): ShippingError {
  return new ShippingError({ code: "MODEL_ERROR", message, cause });
}

export function isShippingError(e: unknown): e is ShippingError {
  return e instanceof ShippingError;
}
