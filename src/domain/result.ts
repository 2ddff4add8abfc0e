/** Success-or-error result returned across every operation boundary. */

import type { ShippingError } from "./errors.js";

/** Result of an operation that can fail with a structured error */
export type ShippingResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ShippingError };

export function ok<T>(value: T): ShippingResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ShippingError): ShippingResult<T> {
  return { ok: false, error };
}
