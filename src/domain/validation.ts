/**
 * Runtime validation for domain models using Zod.
 * Validate every descriptor before building provider payloads or calling the provider.
 */

import { z } from "zod";
import type { ShipmentDescriptor } from "./types.js";
import type { ShippingResult } from "./result.js";
import { validationError } from "./errors.js";

const requiredText = z.string().trim().min(1);

export const addressSchema = z.object({
  addressLines: z.array(z.string().trim()).min(1).max(3).refine((lines) => lines[0] !== "", {
    message: "First address line is required",
  }),
  city: requiredText,
  stateProvinceCode: requiredText,
  postalCode: requiredText,
  countryCode: z.string().trim().length(2),
  name: z.string().optional(),
  phone: z.string().optional(),
  company: z.string().optional(),
});

export const parcelSchema = z.object({
  length: z.number().positive(),
  width: z.number().positive(),
  height: z.number().positive(),
  dimensionUnit: z.enum(["in", "cm"]),
  weight: z.number().positive(),
  weightUnit: z.enum(["oz", "lb", "g", "kg"]),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

/** YYYY-MM-DD (UTC) for a shipment date */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export const shipmentDescriptorSchema = z.object({
  fromAddress: addressSchema,
  toAddress: addressSchema,
  parcel: parcelSchema,
  parcelType: requiredText,
  dateOfShipment: isoDate,
  serviceId: z.string().min(1).optional(),
});

export const orderSchema = z.object({
  orderNumber: requiredText,
  fromAddress: addressSchema,
  toAddress: addressSchema,
  parcel: parcelSchema,
  parcelType: z.string().min(1).optional(),
});

export const orderListSchema = z.array(orderSchema);

/** "fromAddress.postalCode: Required; parcel.weight: ..." */
export function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
}

export function issuePaths(error: z.ZodError): string[] {
  return [...new Set(error.errors.map((e) => e.path.join(".")))];
}

/** Validate a descriptor; failures carry the offending field paths */
export function parseShipmentDescriptor(input: unknown): ShippingResult<ShipmentDescriptor> {
  const parsed = shipmentDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: validationError(describeIssues(parsed.error), issuePaths(parsed.error), parsed.error),
    };
  }
  return { ok: true, value: parsed.data };
}
