/** Tool definitions and the outcomes the dispatcher hands to the chat loop. */

import type { z } from "zod";
import type { ShippingError } from "../domain/errors.js";
import type { ShippingResult } from "../domain/result.js";
import type { ToolSpec } from "../llm/types.js";

export type ToolName =
  | "RateShop"
  | "RateShopFromDescription"
  | "CreateShippingLabel"
  | "TrackShipment"
  | "ListShipments"
  | "CancelShipment";

/** What a tool handler hands back: data for the model, or a question for the user */
export type ToolReply = { status: "ok"; data: unknown } | { status: "needs_input"; message: string };

export type ToolOutcome =
  | { status: "ok"; tool: ToolName; data: unknown }
  | { status: "needs_input"; tool: ToolName; message: string }
  | { status: "error"; tool: string; idempotent: boolean; error: ShippingError };

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: ToolName;
  description: string;
  /** JSON Schema advertised to the model */
  parameters: Record<string, unknown>;
  /** Validates and normalizes the model's arguments */
  argsSchema: S;
  /** False for tools that create or cancel shipments */
  idempotent: boolean;
  handler(args: z.output<S>): Promise<ShippingResult<ToolReply>>;
}

export function toToolSpec(tool: ToolDefinition): ToolSpec {
  return { name: tool.name, description: tool.description, parameters: tool.parameters };
}
