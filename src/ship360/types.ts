/**
 * Ship360 API request/response shapes (external API contract).
 * Used only inside the ship360 adapter; domain types stay in domain/.
 */

import { z } from "zod";

export interface Ship360Address {
  addressLine1: string;
  addressLine2: string;
  addressLine3: string;
  cityTown: string;
  stateProvince: string;
  postalCode: string;
  countryCode: string;
  name: string;
  phone: string;
  company: string;
}

export interface Ship360Parcel {
  length: number;
  width: number;
  height: number;
  dimUnit: "IN" | "CM";
  weight: number;
  weightUnit: "OZ" | "LB" | "GM" | "KG";
}

/** Body of POST {rateShopUrl} */
export interface Ship360RateShopRequest {
  dateOfShipment: string;
  fromAddress: Ship360Address;
  toAddress: Ship360Address;
  parcel: Ship360Parcel;
  parcelType: string;
  serviceId?: string;
}

/** Body of POST {shipmentsUrl} */
export interface Ship360CreateShipmentRequest {
  size: string;
  type: "SHIPPING_LABEL";
  fromAddress: Ship360Address;
  toAddress: Ship360Address;
  parcel: Ship360Parcel;
  carrierAccountId: string;
  parcelType: string;
  serviceId?: string;
  shipmentOptions: {
    addToManifest: boolean;
    packageDescription: string;
  };
  metadata: Array<{ name: string; value: string }>;
}

/** Optional provider field; null or an unexpected type reads as absent */
function loose<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const dayCount = loose(z.union([z.number(), z.string()]));

export const rateQuoteSchema = z
  .object({
    carrier: loose(z.string()),
    serviceId: loose(z.string()),
    parcelType: loose(z.string()),
    totalCarrierCharge: loose(z.union([z.number(), z.string()])),
    currencyCode: loose(z.string()),
    carrierAccountId: loose(z.string()),
    deliveryCommitment: loose(
      z
        .object({
          minEstimatedNumberOfDays: dayCount,
          maxEstimatedNumberOfDays: dayCount,
          estimatedDeliveryDateTime: loose(z.string()),
        })
        .passthrough()
    ),
  })
  .passthrough();

export const rateShopResponseSchema = z.object({ rates: z.array(z.unknown()) }).passthrough();

export const createShipmentResponseSchema = z
  .object({
    parcelTrackingNumber: z.string(),
    shipmentId: z.string(),
    labelLayout: z.array(z.object({ contents: z.string() }).passthrough()).min(1),
  })
  .passthrough();

const eventRecord = z.record(z.unknown());

export const trackingResponseSchema = z
  .object({
    trackingNumber: z.string().optional(),
    carrier: z.string().optional(),
    currentStatus: z.string(),
    estimatedDeliveryDate: z.string().optional(),
    scanDetailsList: z.array(eventRecord).default([]),
  })
  .passthrough();

export const shipmentsResponseSchema = z
  .object({
    shipments: z.array(eventRecord).default([]),
    page: z.number().optional(),
    size: z.number().optional(),
    totalElements: z.number().optional(),
    totalPages: z.number().optional(),
  })
  .passthrough();

export const cancelResponseSchema = z
  .object({
    carrier: z.string(),
    totalCarrierCharge: z.union([z.number(), z.string()]),
    status: z.string(),
    parcelTrackingNumber: z.string(),
  })
  .passthrough();

export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
    token_type: z.string().optional(),
  })
  .passthrough();
