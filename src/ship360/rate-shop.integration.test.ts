/**
 * Integration tests: Ship360 rate shopping end-to-end with stubbed HTTP.
 * Verifies request building, filtering, auth lifecycle, and error handling.
 */

import { describe, it, expect } from "vitest";
import { HttpError } from "../http/client.js";
import { jsonResponse } from "../http/stub-client.js";
import { rateQuote, sampleDescriptor, stubbedAdapter, urls } from "../testing/fixtures.js";

function ratesBody() {
  return jsonResponse(200, {
    rates: [rateQuote(25, 2, 4), rateQuote(0, 1, 1), rateQuote(10.5, 1, 2, { serviceId: "FCM" })],
  });
}

describe("Ship360 rate shop (stubbed)", () => {
  it("sends an authorized compact request and returns filtered, sorted quotes", async () => {
    const { http, adapter } = stubbedAdapter(5000);
    http.setResponse(ratesBody());

    const result = await adapter.rates.rateShop(sampleDescriptor);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.filteredCount).toBe(2);
    expect(result.value.totalOptions).toBe(2);
    expect(result.value.shippingOptions.map((q) => q.serviceId)).toEqual(["FCM", "PM"]);
    expect(result.value.shippingOptions[0]?.carrierAccountId).toBe("acct-usps");

    const requests = http.getRecordedRequests();
    expect(requests.map((r) => r.url)).toEqual([urls.token, urls.rateShop]);
    const rateReq = requests[1];
    expect(rateReq.method).toBe("POST");
    expect(rateReq.timeoutMs).toBe(5000);
    expect(rateReq.headers?.Authorization).toBe("Bearer test-token");
    expect(rateReq.headers?.compactResponse).toBe("true");
    const body = JSON.parse(rateReq.body ?? "{}");
    expect(body.dateOfShipment).toBe("2025-03-14");
    expect(body.fromAddress.postalCode).toBe("06484");
    expect(body.toAddress.addressLine2).toBe("Suite 200");
    expect(body.parcel.dimUnit).toBe("IN");
  });

  it("applies price and duration filters", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponse(ratesBody());

    const result = await adapter.rates.rateShop(sampleDescriptor, { maxPrice: 20, durationValue: 2 });

    expect(result.ok && result.value.shippingOptions.map((q) => q.totalCarrierCharge)).toEqual([10.5]);
    expect(result.ok && result.value.filteredCount).toBe(2);
  });

  it("reuses the token across calls", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponses([ratesBody(), ratesBody()]);

    await adapter.rates.rateShop(sampleDescriptor);
    await adapter.rates.rateShop(sampleDescriptor);

    const tokenCalls = http.getRecordedRequests().filter((r) => r.url === urls.token);
    expect(tokenCalls).toHaveLength(1);
  });

  it("returns an empty result when the response has no rates", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponse(jsonResponse(200, { message: "no services" }));

    const result = await adapter.rates.rateShop(sampleDescriptor);

    expect(result).toEqual({ ok: true, value: { totalOptions: 0, filteredCount: 0, shippingOptions: [] } });
  });

  it("maps non-2xx to UPSTREAM_ERROR without exposing the body", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponse({ status: 500, headers: {}, body: "internal details" });

    const result = await adapter.rates.rateShop(sampleDescriptor);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details).toMatchObject({
      code: "UPSTREAM_ERROR",
      httpStatus: 500,
      message: "Ship360 rate shop failed with HTTP 500",
    });
    expect(result.error.toJSON().body).toBeUndefined();
  });

  it("drops the cached token after a 401", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponses([{ status: 401, headers: {}, body: "expired" }, ratesBody()]);

    const first = await adapter.rates.rateShop(sampleDescriptor);
    const second = await adapter.rates.rateShop(sampleDescriptor);

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(true);
    expect(http.getRecordedRequests().filter((r) => r.url === urls.token)).toHaveLength(2);
  });

  it("maps a timeout to UPSTREAM_TIMEOUT", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponse(async (request) => {
      throw new HttpError("Request timed out", request, "ETIMEDOUT");
    });

    const result = await adapter.rates.rateShop(sampleDescriptor);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("UPSTREAM_TIMEOUT");
    expect(result.error.message).toBe("Request timed out: Ship360 rate shop");
  });

  it("maps transport failures to NETWORK_ERROR", async () => {
    const { http, adapter } = stubbedAdapter();
    http.setResponse(async (request) => {
      throw new HttpError("socket hang up", request, "ECONNRESET");
    });

    const result = await adapter.rates.rateShop(sampleDescriptor);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details).toMatchObject({ code: "NETWORK_ERROR", message: "socket hang up" });
  });
});
