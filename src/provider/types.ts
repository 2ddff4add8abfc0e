/**
 * Provider abstraction: the adapter implements these interfaces.
 * The service facade and tools depend only on them, never on Ship360 payloads.
 */

import type {
  CancellationStatus,
  LabelRequest,
  LabelResult,
  Order,
  RateShopFilters,
  RateShopResult,
  ShipmentDescriptor,
  ShipmentPage,
  ShipmentQuery,
  TrackingInfo,
} from "../domain/types.js";
import type { ShippingResult } from "../domain/result.js";

export interface RateShopOperation {
  /** Quote a shipment, then filter and sort the quotes. Read-only; one upstream call. */
  rateShop(descriptor: ShipmentDescriptor, filters?: RateShopFilters): Promise<ShippingResult<RateShopResult>>;
}

export interface LabelOperation {
  /** Creates a shipment. Not idempotent: callers must not retry blindly. */
  createLabel(order: Order, label: LabelRequest): Promise<ShippingResult<LabelResult>>;
}

export interface TrackingOperation {
  getTracking(trackingNumber: string, carrier?: string): Promise<ShippingResult<TrackingInfo>>;
}

export interface ShipmentOperation {
  listShipments(query?: ShipmentQuery): Promise<ShippingResult<ShipmentPage>>;
  /** Not idempotent */
  cancelShipment(shipmentId: string): Promise<ShippingResult<CancellationStatus>>;
}

/** A shipping provider exposes every operation the assistant can call */
export interface ShippingProvider {
  readonly providerId: string;
  readonly rates: RateShopOperation;
  readonly labels: LabelOperation;
  readonly tracking: TrackingOperation;
  readonly shipments: ShipmentOperation;
}
