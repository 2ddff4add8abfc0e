/**
 * Ship360 provider adapter: composes the token client and every operation
 * around one HTTP client and one cached token.
 */

import type { IHttpClient } from "../http/client.js";
import type { ShippingProvider } from "../provider/types.js";
import { createLogger, type Logger } from "../logger.js";
import { Ship360TokenClient } from "./auth.js";
import { Ship360LabelOperation } from "./label.js";
import { Ship360RateShopOperation } from "./rate-shop.js";
import type { Ship360CallContext } from "./request.js";
import { Ship360ShipmentOperation } from "./shipments.js";
import { Ship360TrackingOperation } from "./tracking.js";

export interface Ship360AdapterConfig {
  tokenUrl: string;
  username: string;
  password: string;
  rateShopUrl: string;
  shipmentsUrl: string;
  trackingUrl: string;
  timeoutMs?: number;
  refreshMarginSeconds?: number;
  now?: () => number;
  logger?: Logger;
}

export function createShip360Adapter(config: Ship360AdapterConfig, http: IHttpClient): ShippingProvider {
  const logger = config.logger ?? createLogger("ship360");
  const auth = new Ship360TokenClient(
    {
      tokenUrl: config.tokenUrl,
      username: config.username,
      password: config.password,
      timeoutMs: config.timeoutMs,
      refreshMarginSeconds: config.refreshMarginSeconds,
      now: config.now,
      logger: logger.child({ component: "auth" }),
    },
    http
  );
  const ctx: Ship360CallContext = { auth, http, timeoutMs: config.timeoutMs, logger };
  return {
    providerId: "ship360",
    rates: new Ship360RateShopOperation({ rateShopUrl: config.rateShopUrl }, ctx),
    labels: new Ship360LabelOperation({ shipmentsUrl: config.shipmentsUrl }, ctx),
    tracking: new Ship360TrackingOperation({ trackingUrl: config.trackingUrl }, ctx),
    shipments: new Ship360ShipmentOperation({ shipmentsUrl: config.shipmentsUrl }, ctx),
  };
}
