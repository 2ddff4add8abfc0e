/**
 * Shipping service facade: resolves orders, validates input, delegates to the
 * provider and returns normalized results. Callers never see provider payloads.
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
import { orderNotFoundError, validationError } from "../domain/errors.js";
import { fail, type ShippingResult } from "../domain/result.js";
import { isoDay, parseShipmentDescriptor } from "../domain/validation.js";
import type { ShippingProvider } from "../provider/types.js";
import type { OrderLookup } from "../orders/order-lookup.js";
import { DEFAULT_PARCEL_TYPE } from "../ship360/mapper.js";

export interface ShippingServiceConfig {
  provider: ShippingProvider;
  orders: OrderLookup;
  /** Clock used for the shipment date of order-based quotes */
  now?: () => Date;
}

export class ShippingService {
  private readonly now: () => Date;

  constructor(private readonly config: ShippingServiceConfig) {
    this.now = config.now ?? (() => new Date());
  }

  /** Descriptor for shipping an order today */
  descriptorForOrder(order: Order): ShipmentDescriptor {
    return {
      fromAddress: order.fromAddress,
      toAddress: order.toAddress,
      parcel: order.parcel,
      parcelType: order.parcelType ?? DEFAULT_PARCEL_TYPE,
      dateOfShipment: isoDay(this.now()),
    };
  }

  /**
   * Quote an order by number. An unknown order fails with ORDER_NOT_FOUND
   * before any provider call.
   */
  async rateShopForOrder(orderNumber: string, filters?: RateShopFilters): Promise<ShippingResult<RateShopResult>> {
    const order = this.config.orders.get(orderNumber);
    if (!order) {
      return fail(orderNotFoundError(orderNumber));
    }
    return this.config.provider.rates.rateShop(this.descriptorForOrder(order), filters);
  }

  /** Quote an arbitrary descriptor; validated before any provider call */
  async rateShop(descriptor: unknown, filters?: RateShopFilters): Promise<ShippingResult<RateShopResult>> {
    const parsed = parseShipmentDescriptor(descriptor);
    if (!parsed.ok) {
      return parsed;
    }
    return this.config.provider.rates.rateShop(parsed.value, filters);
  }

  async createLabel(orderNumber: string, label: LabelRequest): Promise<ShippingResult<LabelResult>> {
    const order = this.config.orders.get(orderNumber);
    if (!order) {
      return fail(orderNotFoundError(orderNumber));
    }
    if (label.carrierAccountId.trim() === "") {
      return fail(validationError("carrierAccountId is required", ["carrierAccountId"]));
    }
    return this.config.provider.labels.createLabel(order, label);
  }

  async getTracking(trackingNumber: string, carrier?: string): Promise<ShippingResult<TrackingInfo>> {
    if (trackingNumber.trim() === "") {
      return fail(validationError("trackingNumber is required", ["trackingNumber"]));
    }
    return this.config.provider.tracking.getTracking(trackingNumber.trim(), carrier);
  }

  async listShipments(query?: ShipmentQuery): Promise<ShippingResult<ShipmentPage>> {
    return this.config.provider.shipments.listShipments(query);
  }

  async cancelShipment(shipmentId: string): Promise<ShippingResult<CancellationStatus>> {
    if (shipmentId.trim() === "") {
      return fail(validationError("shipmentId is required", ["shipmentId"]));
    }
    return this.config.provider.shipments.cancelShipment(shipmentId.trim());
  }
}
