/**
 * Ship360 shipment listing and cancellation.
 */

import type { CancellationStatus, ShipmentPage, ShipmentQuery } from "../domain/types.js";
import type { ShippingResult } from "../domain/result.js";
import type { ShipmentOperation } from "../provider/types.js";
import { parseCancelResponse, parseShipmentsResponse } from "./mapper.js";
import { joinUrl, runOperation, sendAuthorized, type Ship360CallContext } from "./request.js";

export interface Ship360ShipmentsConfig {
  shipmentsUrl: string;
}

/** Query string with only the parameters that carry a value; dates pass through unchecked */
export function buildShipmentsQuery(query: ShipmentQuery): string {
  const params = new URLSearchParams();
  if (query.startDate) params.set("startDate", query.startDate);
  if (query.endDate) params.set("endDate", query.endDate);
  if (query.page !== undefined) params.set("page", String(query.page));
  if (query.size !== undefined) params.set("size", String(query.size));
  const qs = params.toString();
  return qs ? `?${qs}` : "";
}

export class Ship360ShipmentOperation implements ShipmentOperation {
  constructor(
    private readonly config: Ship360ShipmentsConfig,
    private readonly ctx: Ship360CallContext
  ) {}

  async listShipments(query: ShipmentQuery = {}): Promise<ShippingResult<ShipmentPage>> {
    return runOperation(this.ctx, "Ship360 list shipments", async () => {
      const url = `${this.config.shipmentsUrl}${buildShipmentsQuery(query)}`;
      const res = await sendAuthorized(this.ctx, "Ship360 list shipments", { method: "GET", url });
      return parseShipmentsResponse(res.body);
    });
  }

  async cancelShipment(shipmentId: string): Promise<ShippingResult<CancellationStatus>> {
    return runOperation(this.ctx, "Ship360 cancel shipment", async () => {
      const res = await sendAuthorized(this.ctx, "Ship360 cancel shipment", {
        method: "DELETE",
        url: joinUrl(this.config.shipmentsUrl, shipmentId),
      });
      const status = parseCancelResponse(res.body);
      this.ctx.logger.info({ shipmentId, status: status.status }, "shipment cancelled");
      return status;
    });
  }
}
