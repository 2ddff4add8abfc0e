/**
 * Maps domain types to Ship360 request bodies and Ship360 responses back to domain results.
 * Single place for Ship360-specific payload shapes; no raw Ship360 types leak to callers.
 */

import type {
  Address,
  CancellationStatus,
  DimensionUnit,
  LabelRequest,
  LabelResult,
  Order,
  Parcel,
  RateQuote,
  ShipmentDescriptor,
  ShipmentPage,
  TrackingInfo,
  WeightUnit,
} from "../domain/types.js";
import { malformedResponseError } from "../domain/errors.js";
import {
  cancelResponseSchema,
  createShipmentResponseSchema,
  rateQuoteSchema,
  rateShopResponseSchema,
  shipmentsResponseSchema,
  trackingResponseSchema,
  type Ship360Address,
  type Ship360CreateShipmentRequest,
  type Ship360Parcel,
  type Ship360RateShopRequest,
} from "./types.js";

export const DEFAULT_PARCEL_TYPE = "PKG";
const LABEL_TYPE = "SHIPPING_LABEL";

const DIM_UNITS: Record<DimensionUnit, Ship360Parcel["dimUnit"]> = { in: "IN", cm: "CM" };
const WEIGHT_UNITS: Record<WeightUnit, Ship360Parcel["weightUnit"]> = {
  oz: "OZ",
  lb: "LB",
  g: "GM",
  kg: "KG",
};

export function toShip360Address(addr: Address): Ship360Address {
  return {
    addressLine1: addr.addressLines[0] ?? "",
    addressLine2: addr.addressLines[1] ?? "",
    addressLine3: addr.addressLines[2] ?? "",
    cityTown: addr.city,
    stateProvince: addr.stateProvinceCode,
    postalCode: addr.postalCode,
    countryCode: addr.countryCode,
    name: addr.name ?? "",
    phone: addr.phone ?? "",
    company: addr.company ?? "",
  };
}

/** Inverse of toShip360Address: blank lines and blank optional fields are dropped */
export function fromShip360Address(addr: Ship360Address): Address {
  const lines = [addr.addressLine1, addr.addressLine2, addr.addressLine3].filter((l) => l !== "");
  return {
    addressLines: lines,
    city: addr.cityTown,
    stateProvinceCode: addr.stateProvince,
    postalCode: addr.postalCode,
    countryCode: addr.countryCode,
    ...(addr.name ? { name: addr.name } : {}),
    ...(addr.phone ? { phone: addr.phone } : {}),
    ...(addr.company ? { company: addr.company } : {}),
  };
}

export function toShip360Parcel(parcel: Parcel): Ship360Parcel {
  return {
    length: parcel.length,
    width: parcel.width,
    height: parcel.height,
    dimUnit: DIM_UNITS[parcel.dimensionUnit],
    weight: parcel.weight,
    weightUnit: WEIGHT_UNITS[parcel.weightUnit],
  };
}

export function buildRateShopRequest(descriptor: ShipmentDescriptor): Ship360RateShopRequest {
  return {
    dateOfShipment: descriptor.dateOfShipment,
    fromAddress: toShip360Address(descriptor.fromAddress),
    toAddress: toShip360Address(descriptor.toAddress),
    parcel: toShip360Parcel(descriptor.parcel),
    parcelType: descriptor.parcelType,
    ...(descriptor.serviceId ? { serviceId: descriptor.serviceId } : {}),
  };
}

/**
 * Build the shipment-creation body for an order. Address and parcel fields are
 * copied as-is; the order number travels in metadata.
 */
export function buildCreateShipmentRequest(order: Order, label: LabelRequest): Ship360CreateShipmentRequest {
  return {
    size: label.labelSize,
    type: LABEL_TYPE,
    fromAddress: toShip360Address(order.fromAddress),
    toAddress: toShip360Address(order.toAddress),
    parcel: toShip360Parcel(order.parcel),
    carrierAccountId: label.carrierAccountId,
    parcelType: order.parcelType ?? DEFAULT_PARCEL_TYPE,
    ...(label.serviceId ? { serviceId: label.serviceId } : {}),
    shipmentOptions: {
      addToManifest: true,
      packageDescription: label.packageDescription ?? `Order ${order.orderNumber}`,
    },
    metadata: [{ name: "orderNumber", value: order.orderNumber }],
  };
}

function parseJson(body: string, what: string): unknown {
  try {
    return JSON.parse(body);
  } catch (e) {
    throw malformedResponseError(`Malformed JSON in ${what} response`, e);
  }
}

/**
 * Extract quotes from a rate-shop response. A body without a usable `rates`
 * array yields no quotes rather than an error; non-object entries are skipped.
 */
export function parseRateShopResponse(body: string): RateQuote[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return [];
  }
  const parsed = rateShopResponseSchema.safeParse(data);
  if (!parsed.success) return [];
  const quotes: RateQuote[] = [];
  for (const entry of parsed.data.rates) {
    const quote = rateQuoteSchema.safeParse(entry);
    if (quote.success) quotes.push(quote.data);
  }
  return quotes;
}

export function parseCreateShipmentResponse(body: string): LabelResult {
  const parsed = createShipmentResponseSchema.safeParse(parseJson(body, "shipment creation"));
  if (!parsed.success) {
    throw malformedResponseError("Shipment creation response is missing label fields", parsed.error);
  }
  const [layout] = parsed.data.labelLayout;
  return {
    trackingNumber: parsed.data.parcelTrackingNumber,
    shipmentId: parsed.data.shipmentId,
    labelContent: layout?.contents ?? "",
  };
}

export function parseTrackingResponse(body: string, trackingNumber: string): TrackingInfo {
  const parsed = trackingResponseSchema.safeParse(parseJson(body, "tracking"));
  if (!parsed.success) {
    throw malformedResponseError("Tracking response is missing currentStatus", parsed.error);
  }
  const data = parsed.data;
  const latest = data.scanDetailsList[0];
  const description = latest?.["scanDescription"];
  return {
    trackingNumber: data.trackingNumber ?? trackingNumber,
    carrier: data.carrier,
    status: data.currentStatus,
    eventDescription: typeof description === "string" ? description : undefined,
    estimatedDeliveryDate: data.estimatedDeliveryDate,
    history: data.scanDetailsList,
  };
}

export function parseShipmentsResponse(body: string): ShipmentPage {
  const parsed = shipmentsResponseSchema.safeParse(parseJson(body, "shipments"));
  if (!parsed.success) {
    throw malformedResponseError("Unexpected shipments response shape", parsed.error);
  }
  const { shipments, page, size, totalElements, totalPages } = parsed.data;
  return { shipments, page, size, totalElements, totalPages };
}

export function parseCancelResponse(body: string): CancellationStatus {
  const parsed = cancelResponseSchema.safeParse(parseJson(body, "cancellation"));
  if (!parsed.success) {
    throw malformedResponseError("Cancellation response is missing status fields", parsed.error);
  }
  const { carrier, totalCarrierCharge, status, parcelTrackingNumber } = parsed.data;
  return { carrier, totalCarrierCharge, status, parcelTrackingNumber };
}
