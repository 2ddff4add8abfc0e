/**
 * The fixed tool table offered to the model. Each tool validates its
 * arguments with zod and delegates to the shipping service.
 */

import { z } from "zod";
import { ok, type ShippingResult } from "../domain/result.js";
import { KNOWN_LABEL_SIZES, type LabelResult, type RateShopFilters } from "../domain/types.js";
import type { SlotExtractor } from "../extraction/slot-extractor.js";
import type { ShippingService } from "../service/shipping-service.js";
import { limitOptions } from "../ship360/rate-filter.js";
import type { ToolDefinition, ToolReply } from "./types.js";

export interface ToolDependencies {
  shipping: ShippingService;
  extractor: SlotExtractor;
}

function defineTool<S extends z.ZodTypeAny>(tool: ToolDefinition<S>): ToolDefinition<S> {
  return tool;
}

function okData<T>(result: ShippingResult<T>): ShippingResult<ToolReply> {
  return result.ok ? ok<ToolReply>({ status: "ok", data: result.value }) : result;
}

const optionalAmount = z.coerce.number().nonnegative().optional();

const filterArgs = {
  maxPrice: optionalAmount,
  durationValue: optionalAmount,
  durationOperator: z.enum(["less_than", "less_than_or_equal"]).optional(),
  maxResults: z.coerce.number().int().positive().optional(),
};

const filterProperties = {
  maxPrice: { type: "number", description: "Maximum total carrier charge. 0 or omitted means no limit." },
  durationValue: { type: "number", description: "Maximum delivery time in days. 0 or omitted means no limit." },
  durationOperator: {
    type: "string",
    enum: ["less_than", "less_than_or_equal"],
    description: "How durationValue is compared. Defaults to less_than_or_equal.",
  },
  maxResults: { type: "integer", description: "Return at most this many options, cheapest first." },
};

/**
 * What the model sees of a new label. A URL is passed on; an inline document
 * is replaced by its length so it never lands in the conversation history.
 */
export function labelReference(label: LabelResult): Record<string, string | number> {
  const { trackingNumber, shipmentId, labelContent } = label;
  return /^https?:\/\//i.test(labelContent)
    ? { trackingNumber, shipmentId, labelUrl: labelContent }
    : { trackingNumber, shipmentId, labelDocumentLength: labelContent.length };
}

function filtersOf(args: RateShopFilters): RateShopFilters {
  return { maxPrice: args.maxPrice, durationValue: args.durationValue, durationOperator: args.durationOperator };
}

export function createShippingTools(deps: ToolDependencies): ToolDefinition[] {
  const { shipping, extractor } = deps;

  const rateShop = defineTool({
    name: "RateShop",
    description:
      "Get shipping rates for an existing order by its order number. Options are sorted by price, cheapest first.",
    parameters: {
      type: "object",
      properties: { orderId: { type: "string", description: "Order number, e.g. ORD-1001" }, ...filterProperties },
      required: ["orderId"],
    },
    argsSchema: z.object({ orderId: z.string().trim().min(1), ...filterArgs }),
    idempotent: true,
    async handler(args) {
      const result = await shipping.rateShopForOrder(args.orderId, filtersOf(args));
      return okData(result.ok ? ok(limitOptions(result.value, args.maxResults)) : result);
    },
  });

  const rateShopFromDescription = defineTool({
    name: "RateShopFromDescription",
    description:
      "Get shipping rates for a shipment described in free text: origin and destination addresses, parcel dimensions and weight, and ship date.",
    parameters: {
      type: "object",
      properties: {
        description: { type: "string", description: "The user's description of the shipment, verbatim." },
        ...filterProperties,
      },
      required: ["description"],
    },
    argsSchema: z.object({ description: z.string().trim().min(1), ...filterArgs }),
    idempotent: true,
    async handler(args) {
      const extracted = await extractor.extract(args.description);
      if (!extracted.ok) return extracted;
      if (!extracted.value.complete) {
        return { ok: true, value: { status: "needs_input", message: extracted.value.message } };
      }
      const result = await shipping.rateShop(extracted.value.descriptor, filtersOf(args));
      return okData(result.ok ? ok(limitOptions(result.value, args.maxResults)) : result);
    },
  });

  const createShippingLabel = defineTool({
    name: "CreateShippingLabel",
    description:
      "Create a shipping label for an order using the rate option the user selected. Only call after the user has chosen an option.",
    parameters: {
      type: "object",
      properties: {
        orderId: { type: "string", description: "Order number" },
        carrierAccountId: { type: "string", description: "carrierAccountId of the selected rate option" },
        shippingLabelSize: { type: "string", enum: [...KNOWN_LABEL_SIZES], description: "Label size" },
        serviceId: { type: "string", description: "serviceId of the selected rate option" },
      },
      required: ["orderId", "carrierAccountId", "shippingLabelSize"],
    },
    argsSchema: z.object({
      orderId: z.string().trim().min(1),
      carrierAccountId: z.string().trim().min(1),
      shippingLabelSize: z.string().trim().min(1),
      serviceId: z.string().trim().min(1).optional(),
    }),
    idempotent: false,
    async handler(args) {
      const result = await shipping.createLabel(args.orderId, {
        carrierAccountId: args.carrierAccountId,
        labelSize: args.shippingLabelSize,
        serviceId: args.serviceId,
      });
      return okData(result.ok ? ok(labelReference(result.value)) : result);
    },
  });

  const trackShipment = defineTool({
    name: "TrackShipment",
    description: "Get the current status and event history of a parcel by tracking number.",
    parameters: {
      type: "object",
      properties: {
        trackingNumber: { type: "string", description: "Parcel tracking number" },
        carrier: { type: "string", description: "Carrier code, e.g. USPS or UPS" },
      },
      required: ["trackingNumber"],
    },
    argsSchema: z.object({ trackingNumber: z.string().trim().min(1), carrier: z.string().trim().min(1).optional() }),
    idempotent: true,
    async handler(args) {
      return okData(await shipping.getTracking(args.trackingNumber, args.carrier));
    },
  });

  const listShipments = defineTool({
    name: "ListShipments",
    description: "List shipments created in a date range, one page at a time.",
    parameters: {
      type: "object",
      properties: {
        startDate: { type: "string", description: "ISO 8601 start of the range" },
        endDate: { type: "string", description: "ISO 8601 end of the range" },
        page: { type: "integer", description: "Zero-based page number" },
        size: { type: "integer", description: "Page size" },
      },
    },
    argsSchema: z.object({
      startDate: z.string().optional(),
      endDate: z.string().optional(),
      page: z.coerce.number().int().nonnegative().optional(),
      size: z.coerce.number().int().positive().optional(),
    }),
    idempotent: true,
    async handler(args) {
      return okData(await shipping.listShipments(args));
    },
  });

  const cancelShipment = defineTool({
    name: "CancelShipment",
    description: "Cancel a shipment by its shipment id. Only call after the user has confirmed.",
    parameters: {
      type: "object",
      properties: { shipmentId: { type: "string", description: "Shipment id returned when the label was created" } },
      required: ["shipmentId"],
    },
    argsSchema: z.object({ shipmentId: z.string().trim().min(1) }),
    idempotent: false,
    async handler(args) {
      return okData(await shipping.cancelShipment(args.shipmentId));
    },
  });

  return [rateShop, rateShopFromDescription, createShippingLabel, trackShipment, listShipments, cancelShipment];
}
