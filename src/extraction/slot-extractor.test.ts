import { describe, it, expect, vi } from "vitest";
import { modelError } from "../domain/errors.js";
import type { CompletionClient } from "../llm/types.js";
import { sampleDescriptor } from "../testing/fixtures.js";
import { SlotExtractor, stripCodeFence } from "./slot-extractor.js";

const today = new Date("2025-03-14T10:00:00Z");

function extractorReplying(reply: string) {
  const complete = vi.fn<CompletionClient["complete"]>().mockResolvedValue(reply);
  return { complete, extractor: new SlotExtractor({ complete }, { now: () => today }) };
}

describe("stripCodeFence", () => {
  it("removes json fences", () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFence('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("leaves bare JSON alone", () => {
    expect(stripCodeFence(' {"a":1} ')).toBe('{"a":1}');
  });
});

describe("SlotExtractor", () => {
  it("asks for JSON with today's date in the instructions", async () => {
    const { complete, extractor } = extractorReplying(JSON.stringify({ infoComplete: false, message: "Where to?" }));
    await extractor.extract("ship a box to Chicago");

    expect(complete).toHaveBeenCalledTimes(1);
    const [messages, options] = complete.mock.calls[0];
    expect(options).toEqual({ json: true });
    expect(messages[0].role).toBe("system");
    expect(messages[0].content).toContain("Today's date is 2025-03-14.");
    expect(messages[1]).toEqual({ role: "user", content: "ship a box to Chicago" });
  });

  it("returns a validated descriptor when the model reports complete info", async () => {
    const { extractor } = extractorReplying(
      "```json\n" + JSON.stringify({ ...sampleDescriptor, infoComplete: true, message: "" }) + "\n```"
    );

    const result = await extractor.extract("ship it");

    expect(result).toEqual({ ok: true, value: { complete: true, descriptor: sampleDescriptor } });
  });

  it("passes the model's clarification through when info is incomplete", async () => {
    const { extractor } = extractorReplying(
      JSON.stringify({ infoComplete: false, message: "What is the parcel weight?" })
    );

    const result = await extractor.extract("ship a box to Chicago");

    expect(result).toEqual({
      ok: true,
      value: { complete: false, message: "What is the parcel weight?", missingFields: [] },
    });
  });

  it("turns a locally invalid descriptor into a clarification", async () => {
    const { extractor } = extractorReplying(
      JSON.stringify({
        ...sampleDescriptor,
        toAddress: { ...sampleDescriptor.toAddress, postalCode: "" },
        infoComplete: true,
      })
    );

    const result = await extractor.extract("ship it");

    expect(result).toEqual({
      ok: true,
      value: {
        complete: false,
        message: "I still need a few details: toAddress.postalCode.",
        missingFields: ["toAddress.postalCode"],
      },
    });
  });

  it("fails with EXTRACTION_PARSE_ERROR on non-JSON output", async () => {
    const { extractor } = extractorReplying("Sure! The shipment goes to Chicago.");

    const result = await extractor.extract("ship it");

    expect(!result.ok && result.error.code).toBe("EXTRACTION_PARSE_ERROR");
  });

  it("fails with EXTRACTION_PARSE_ERROR when the JSON is not an object", async () => {
    const { extractor } = extractorReplying("[1, 2]");

    const result = await extractor.extract("ship it");

    expect(!result.ok && result.error.code).toBe("EXTRACTION_PARSE_ERROR");
  });

  it("reports a failed completion as MODEL_ERROR", async () => {
    const complete = vi.fn<CompletionClient["complete"]>().mockRejectedValue(new Error("socket closed"));
    const extractor = new SlotExtractor({ complete });

    const result = await extractor.extract("ship it");

    expect(!result.ok && result.error.code).toBe("MODEL_ERROR");
  });

  it("keeps a structured model error as it is", async () => {
    const failure = modelError("Completion failed: 429");
    const complete = vi.fn<CompletionClient["complete"]>().mockRejectedValue(failure);
    const extractor = new SlotExtractor({ complete });

    const result = await extractor.extract("ship it");

    expect(!result.ok && result.error).toBe(failure);
  });
});
