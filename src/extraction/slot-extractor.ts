/**
 * Free-text shipment description → validated ShipmentDescriptor, via one
 * JSON-mode completion call.
 */

import { z } from "zod";
import { extractionParseError, isShippingError, modelError } from "../domain/errors.js";
import type { ShippingResult } from "../domain/result.js";
import type { ShipmentDescriptor } from "../domain/types.js";
import { isoDay, parseShipmentDescriptor } from "../domain/validation.js";
import type { CompletionClient } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import { buildExtractionPrompt } from "./prompts.js";

export type ExtractionResult =
  | { complete: true; descriptor: ShipmentDescriptor }
  | { complete: false; message: string; missingFields: string[] };

export interface SlotExtractorOptions {
  now?: () => Date;
  logger?: Logger;
}

const extractionEnvelopeSchema = z
  .object({
    infoComplete: z.boolean().default(false),
    message: z.string().default(""),
  })
  .passthrough();

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Drop a surrounding markdown code fence, if the model added one */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  return match?.[1] ?? trimmed;
}

const DEFAULT_CLARIFICATION = "Could you share the missing shipment details?";

export class SlotExtractor {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly completion: CompletionClient,
    options: SlotExtractorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger("extraction");
  }

  async extract(freeText: string): Promise<ShippingResult<ExtractionResult>> {
    let reply: string;
    try {
      reply = await this.completion.complete(
        [
          { role: "system", content: buildExtractionPrompt(isoDay(this.now())) },
          { role: "user", content: freeText },
        ],
        { json: true }
      );
    } catch (error) {
      return {
        ok: false,
        error: isShippingError(error) ? error : modelError("Extraction completion failed", error),
      };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stripCodeFence(reply));
    } catch (error) {
      this.log.warn("extraction reply was not JSON");
      return { ok: false, error: extractionParseError("Extraction reply was not valid JSON", error) };
    }

    const envelope = extractionEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return { ok: false, error: extractionParseError("Extraction reply was not a JSON object") };
    }

    const { infoComplete, message, ...fields } = envelope.data;
    if (!infoComplete) {
      return { ok: true, value: { complete: false, message: message || DEFAULT_CLARIFICATION, missingFields: [] } };
    }

    const descriptor = parseShipmentDescriptor(fields);
    if (!descriptor.ok) {
      const missingFields = descriptor.error.details.fields ?? [];
      this.log.info({ missingFields }, "extracted descriptor incomplete");
      return {
        ok: true,
        value: {
          complete: false,
          message: `I still need a few details: ${missingFields.join(", ")}.`,
          missingFields,
        },
      };
    }
    return { ok: true, value: { complete: true, descriptor: descriptor.value } };
  }
}
