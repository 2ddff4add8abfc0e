/**
 * Domain types for the shipping assistant.
 * Engines, tools and the chat layer work only with these; provider wire shapes stay in ship360/.
 */

/** Postal address used for both ends of a shipment */
export interface Address {
  /** Street lines; the first is required, at most three */
  readonly addressLines: readonly string[];
  readonly city: string;
  /** State/province code (e.g. CT, NY) */
  readonly stateProvinceCode: string;
  readonly postalCode: string;
  /** ISO 3166-1 alpha-2 country code */
  readonly countryCode: string;
  readonly name?: string;
  readonly phone?: string;
  readonly company?: string;
}

export type DimensionUnit = "in" | "cm";
export type WeightUnit = "oz" | "lb" | "g" | "kg";

/** Parcel dimensions and weight */
export interface Parcel {
  readonly length: number;
  readonly width: number;
  readonly height: number;
  readonly dimensionUnit: DimensionUnit;
  readonly weight: number;
  readonly weightUnit: WeightUnit;
}

/** Everything the provider needs to quote a shipment */
export interface ShipmentDescriptor {
  readonly fromAddress: Address;
  readonly toAddress: Address;
  readonly parcel: Parcel;
  /** Provider parcel type code, e.g. "PKG" */
  readonly parcelType: string;
  /** ISO date (YYYY-MM-DD) */
  readonly dateOfShipment: string;
  /** Restrict the quote to one provider service */
  readonly serviceId?: string;
}

/** Seed order record, looked up by orderNumber */
export interface Order {
  readonly orderNumber: string;
  readonly fromAddress: Address;
  readonly toAddress: Address;
  readonly parcel: Parcel;
  readonly parcelType?: string;
}

export interface DeliveryCommitment {
  readonly minEstimatedNumberOfDays?: number | string;
  readonly maxEstimatedNumberOfDays?: number | string;
  readonly estimatedDeliveryDateTime?: string;
  readonly [field: string]: unknown;
}

/**
 * A single quote as returned by the provider. Kept verbatim so that a selected
 * quote can be handed back for label creation.
 */
export interface RateQuote {
  readonly carrier?: string;
  readonly serviceId?: string;
  readonly parcelType?: string;
  /** Usually a number; some sandboxes send numeric strings */
  readonly totalCarrierCharge?: number | string;
  readonly currencyCode?: string;
  readonly deliveryCommitment?: DeliveryCommitment;
  readonly carrierAccountId?: string;
  readonly [field: string]: unknown;
}

export type DurationOperator = "less_than" | "less_than_or_equal";

export interface RateShopFilters {
  /** Upper bound on totalCarrierCharge; 0 or absent means no bound */
  maxPrice?: number;
  /** Delivery-days bound; 0 or absent means no bound */
  durationValue?: number;
  durationOperator?: DurationOperator;
}

export interface RateShopResult {
  /** Quotes left after every filter */
  totalOptions: number;
  /** Quotes with a positive charge, before price and duration filters */
  filteredCount: number;
  /** Ascending by totalCarrierCharge */
  shippingOptions: RateQuote[];
}

/** Label sizes the provider is known to accept; not enforced locally */
export const KNOWN_LABEL_SIZES = ["DOC_4X6", "DOC_8X11"] as const;

export interface LabelRequest {
  carrierAccountId: string;
  serviceId?: string;
  labelSize: string;
  packageDescription?: string;
}

export interface LabelResult {
  trackingNumber: string;
  shipmentId: string;
  /** Label URL or encoded document, as the provider returned it */
  labelContent: string;
}

export type TrackingEvent = Record<string, unknown>;

export interface TrackingInfo {
  trackingNumber: string;
  carrier?: string;
  status: string;
  /** Description of the most recent event */
  eventDescription?: string;
  estimatedDeliveryDate?: string;
  /** Provider event history, unmodified */
  history: TrackingEvent[];
}

export interface ShipmentQuery {
  startDate?: string;
  endDate?: string;
  page?: number;
  size?: number;
}

export interface ShipmentPage {
  shipments: Array<Record<string, unknown>>;
  page?: number;
  size?: number;
  totalElements?: number;
  totalPages?: number;
}

export interface CancellationStatus {
  carrier: string;
  totalCarrierCharge: number | string;
  status: string;
  parcelTrackingNumber: string;
}
