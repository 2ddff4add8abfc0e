/**
 * Ship360 label creation. Each call creates a real (or sandbox) shipment, so it
 * is attempted exactly once.
 */

import type { LabelRequest, LabelResult, Order } from "../domain/types.js";
import type { ShippingResult } from "../domain/result.js";
import type { LabelOperation } from "../provider/types.js";
import { buildCreateShipmentRequest, parseCreateShipmentResponse } from "./mapper.js";
import { runOperation, sendAuthorized, type Ship360CallContext } from "./request.js";

export interface Ship360LabelConfig {
  shipmentsUrl: string;
}

export class Ship360LabelOperation implements LabelOperation {
  constructor(
    private readonly config: Ship360LabelConfig,
    private readonly ctx: Ship360CallContext
  ) {}

  async createLabel(order: Order, label: LabelRequest): Promise<ShippingResult<LabelResult>> {
    return runOperation(this.ctx, "Ship360 create shipment", async () => {
      const res = await sendAuthorized(this.ctx, "Ship360 create shipment", {
        method: "POST",
        url: this.config.shipmentsUrl,
        body: buildCreateShipmentRequest(order, label),
      });
      const result = parseCreateShipmentResponse(res.body);
      this.ctx.logger.info(
        { orderNumber: order.orderNumber, shipmentId: result.shipmentId },
        "shipment created"
      );
      return result;
    });
  }
}
