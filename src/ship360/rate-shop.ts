/**
 * Ship360 rate shopping: one quote call, then the filter/sort pipeline.
 */

import type { RateShopFilters, RateShopResult, ShipmentDescriptor } from "../domain/types.js";
import type { ShippingResult } from "../domain/result.js";
import type { RateShopOperation } from "../provider/types.js";
import { buildRateShopRequest, parseRateShopResponse } from "./mapper.js";
import { applyRateFilters } from "./rate-filter.js";
import { runOperation, sendAuthorized, type Ship360CallContext } from "./request.js";

export interface Ship360RateShopConfig {
  rateShopUrl: string;
}

export class Ship360RateShopOperation implements RateShopOperation {
  constructor(
    private readonly config: Ship360RateShopConfig,
    private readonly ctx: Ship360CallContext
  ) {}

  async rateShop(
    descriptor: ShipmentDescriptor,
    filters: RateShopFilters = {}
  ): Promise<ShippingResult<RateShopResult>> {
    return runOperation(this.ctx, "Ship360 rate shop", async () => {
      const res = await sendAuthorized(this.ctx, "Ship360 rate shop", {
        method: "POST",
        url: this.config.rateShopUrl,
        headers: { compactResponse: "true" },
        body: buildRateShopRequest(descriptor),
      });
      const quotes = parseRateShopResponse(res.body);
      const result = applyRateFilters(quotes, filters);
      this.ctx.logger.info(
        {
          received: quotes.length,
          filteredCount: result.filteredCount,
          totalOptions: result.totalOptions,
          maxPrice: filters.maxPrice,
          durationValue: filters.durationValue,
        },
        "rate shop filtered"
      );
      return result;
    });
  }
}
