/**
 * Shared test data and a stubbed Ship360 adapter.
 */

import type { Order, ShipmentDescriptor } from "../domain/types.js";
import { StubHttpClient, jsonResponse } from "../http/stub-client.js";
import type { ShippingProvider } from "../provider/types.js";
import { createShip360Adapter } from "../ship360/adapter.js";

export const urls = {
  token: "https://sandbox.test/auth/api/v1/token",
  rateShop: "https://sandbox.test/shipping/api/v1/rates",
  shipments: "https://sandbox.test/shipping/api/v1/shipments",
  tracking: "https://sandbox.test/shipping/api/v1/track",
};

export const sampleOrder: Order = {
  orderNumber: "ORD-2001",
  fromAddress: {
    addressLines: ["27 Waterview Dr"],
    city: "Shelton",
    stateProvinceCode: "CT",
    postalCode: "06484",
    countryCode: "US",
    name: "Shipping Desk",
    phone: "203-555-0100",
    company: "Example Outfitters",
  },
  toAddress: {
    addressLines: ["410 Market St", "Suite 200"],
    city: "San Francisco",
    stateProvinceCode: "CA",
    postalCode: "94105",
    countryCode: "US",
    name: "Jordan Reyes",
  },
  parcel: { length: 10, width: 6, height: 4, dimensionUnit: "in", weight: 32, weightUnit: "oz" },
};

export const sampleDescriptor: ShipmentDescriptor = {
  fromAddress: sampleOrder.fromAddress,
  toAddress: sampleOrder.toAddress,
  parcel: sampleOrder.parcel,
  parcelType: "PKG",
  dateOfShipment: "2025-03-14",
};

export function tokenResponse(accessToken = "test-token") {
  return jsonResponse(200, { access_token: accessToken, token_type: "Bearer", expires_in: 3600 });
}

export function rateQuote(charge: number | string, minDays: number, maxDays: number, extra: Record<string, unknown> = {}) {
  return {
    carrier: "USPS",
    serviceId: "PM",
    parcelType: "PKG",
    totalCarrierCharge: charge,
    currencyCode: "USD",
    carrierAccountId: "acct-usps",
    deliveryCommitment: {
      minEstimatedNumberOfDays: minDays,
      maxEstimatedNumberOfDays: maxDays,
      estimatedDeliveryDateTime: "2025-03-18T20:00:00Z",
    },
    ...extra,
  };
}

/** Adapter over a stub whose token endpoint always answers */
export function stubbedAdapter(timeoutMs?: number): { http: StubHttpClient; adapter: ShippingProvider } {
  const http = new StubHttpClient();
  http.route("/auth/", [tokenResponse(), tokenResponse(), tokenResponse()]);
  const adapter = createShip360Adapter(
    {
      tokenUrl: urls.token,
      username: "test-user",
      password: "test-secret",
      rateShopUrl: urls.rateShop,
      shipmentsUrl: urls.shipments,
      trackingUrl: urls.tracking,
      timeoutMs,
    },
    http
  );
  return { http, adapter };
}
