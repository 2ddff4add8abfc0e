/** Ship360 parcel tracking by tracking number. */

import type { TrackingInfo } from "../domain/types.js";
import type { ShippingResult } from "../domain/result.js";
import type { TrackingOperation } from "../provider/types.js";
import { parseTrackingResponse } from "./mapper.js";
import { joinUrl, runOperation, sendAuthorized, type Ship360CallContext } from "./request.js";

export interface Ship360TrackingConfig {
  trackingUrl: string;
}

export class Ship360TrackingOperation implements TrackingOperation {
  constructor(
    private readonly config: Ship360TrackingConfig,
    private readonly ctx: Ship360CallContext
  ) {}

  async getTracking(trackingNumber: string, carrier?: string): Promise<ShippingResult<TrackingInfo>> {
    return runOperation(this.ctx, "Ship360 tracking", async () => {
      let url = joinUrl(this.config.trackingUrl, trackingNumber);
      if (carrier) {
        url += `?${new URLSearchParams({ carrier: carrier.toUpperCase() }).toString()}`;
      }
      const res = await sendAuthorized(this.ctx, "Ship360 tracking", { method: "GET", url });
      return parseTrackingResponse(res.body, trackingNumber);
    });
  }
}
