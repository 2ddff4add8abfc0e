/** Turns structured errors into text the user sees; provider bodies never leak. */

import type { ShippingError, ShippingErrorDetails } from "../domain/errors.js";

export const FALLBACK_MESSAGE = "We are unable to process your request at the moment. Please try again.";

function baseMessage(d: ShippingErrorDetails): string {
  switch (d.code) {
    case "ORDER_NOT_FOUND":
      return `I couldn't find an order with the number ${d.orderNumber ?? "you gave"}. Could you double-check it?`;
    case "VALIDATION_ERROR":
      return d.fields && d.fields.length > 0
        ? `Some details are missing or invalid: ${d.fields.join(", ")}. Could you provide them?`
        : "Some of the details look invalid. Could you check them and try again?";
    case "EXTRACTION_PARSE_ERROR":
      return "I couldn't make sense of those shipment details. Please try again.";
    case "UPSTREAM_TIMEOUT":
      return "The shipping service took too long to respond.";
    case "UPSTREAM_ERROR":
      return d.httpStatus !== undefined && d.httpStatus < 500
        ? "The shipping service rejected the request. Please check the details and try again."
        : "The shipping service is having trouble right now.";
    default:
      return FALLBACK_MESSAGE;
  }
}

/**
 * Natural-language text for a failed operation. Provider bodies never appear;
 * for operations that change shipments the user is told nothing was retried.
 */
export function userMessageFor(error: ShippingError, idempotent = true): string {
  const text = baseMessage(error.details);
  const rejectedLocally = error.code === "ORDER_NOT_FOUND" || error.code === "VALIDATION_ERROR";
  if (!idempotent && !rejectedLocally) {
    return `${text} Nothing was retried, so please check your shipments and confirm before I try again.`;
  }
  return text;
}
