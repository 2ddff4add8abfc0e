import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { ThreadMessage } from "../conversation/types.js";
import { ThreadStore } from "../conversation/thread-store.js";
import { orderNotFoundError, upstreamError } from "../domain/errors.js";
import type { ActionInvocation, ActionOracle, ToolSpec } from "../llm/types.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import type { ToolDefinition } from "../tools/types.js";
import { ChatService, MAX_TOOL_RESULT_CHARS, recentMessages } from "./chat-service.js";
import { FALLBACK_MESSAGE } from "./user-messages.js";

class ScriptedOracle implements ActionOracle {
  readonly histories: ThreadMessage[][] = [];
  readonly advertised: string[][] = [];

  constructor(private readonly script: Array<ActionInvocation | Error>) {}

  async chooseAction(history: readonly ThreadMessage[], tools: readonly ToolSpec[]): Promise<ActionInvocation> {
    this.histories.push([...history]);
    this.advertised.push(tools.map((t) => t.name));
    const next = this.script.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

const trackArgs = z.object({ trackingNumber: z.string() });
const cancelArgs = z.object({ shipmentId: z.string() });
const rateArgs = z.object({ orderId: z.string() });

const trackTool: ToolDefinition<typeof trackArgs> = {
  name: "TrackShipment",
  description: "track",
  parameters: { type: "object" },
  argsSchema: trackArgs,
  idempotent: true,
  async handler(args) {
    return { ok: true, value: { status: "ok", data: { trackingNumber: args.trackingNumber, status: "Delivered" } } };
  },
};

const cancelTool: ToolDefinition<typeof cancelArgs> = {
  name: "CancelShipment",
  description: "cancel",
  parameters: { type: "object" },
  argsSchema: cancelArgs,
  idempotent: false,
  async handler() {
    return { ok: false, error: upstreamError("Ship360 cancel shipment", 500, "stack trace here") };
  },
};

const rateTool: ToolDefinition<typeof rateArgs> = {
  name: "RateShop",
  description: "rates",
  parameters: { type: "object" },
  argsSchema: rateArgs,
  idempotent: true,
  async handler(args) {
    if (args.orderId === "ORD-9") return { ok: false, error: orderNotFoundError("ORD-9") };
    return { ok: true, value: { status: "needs_input", message: "Which order did you mean?" } };
  },
};

function track(callId: string, trackingNumber = "TRK1"): ActionInvocation {
  return { kind: "tool", callId, name: "TrackShipment", arguments: JSON.stringify({ trackingNumber }) };
}

const listArgs = z.object({});

const listTool: ToolDefinition<typeof listArgs> = {
  name: "ListShipments",
  description: "list",
  parameters: { type: "object" },
  argsSchema: listArgs,
  idempotent: true,
  async handler() {
    const shipments = Array.from({ length: 500 }, (_, i) => ({ shipmentId: `SHP-${i}`, status: "CREATED" }));
    return { ok: true, value: { status: "ok", data: { shipments } } };
  },
};

interface SetupOptions {
  maxToolCalls?: number;
  maxHistoryMessages?: number;
  tools?: ToolDefinition[];
}

function setup(script: Array<ActionInvocation | Error>, options: SetupOptions = {}) {
  const oracle = new ScriptedOracle(script);
  const threads = new ThreadStore();
  const dispatcher = new ToolDispatcher(options.tools ?? [trackTool, cancelTool, rateTool]);
  const chat = new ChatService({
    oracle,
    dispatcher,
    threads,
    maxToolCalls: options.maxToolCalls,
    maxHistoryMessages: options.maxHistoryMessages,
    systemPrompt: "You ship things.",
  });
  return { oracle, threads, chat };
}

const turn = { userId: "u1", sessionId: "s1" };

describe("ChatService", () => {
  it("answers directly and records the exchange", async () => {
    const { oracle, threads, chat } = setup([{ kind: "reply", content: "Hello! How can I help?" }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "hi" });

    expect(reply).toEqual({ content: "Hello! How can I help?", isTaskComplete: true, requireUserInput: false });
    expect(oracle.histories[0]).toEqual([
      { role: "system", content: "You ship things." },
      { role: "user", content: "hi" },
    ]);
    expect(oracle.advertised[0]).toEqual(["TrackShipment", "CancelShipment", "RateShop"]);
    expect(threads.getOrCreate("u1", "s1").messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello! How can I help?" },
    ]);
  });

  it("feeds tool results back to the model and keeps them in the thread", async () => {
    const { oracle, threads, chat } = setup([track("call-1"), { kind: "reply", content: "It was delivered." }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "where is TRK1?" });

    expect(reply.content).toBe("It was delivered.");
    const toolRecord: ThreadMessage = {
      role: "tool",
      toolCallId: "call-1",
      name: "TrackShipment",
      arguments: JSON.stringify({ trackingNumber: "TRK1" }),
      content: JSON.stringify({ trackingNumber: "TRK1", status: "Delivered" }),
    };
    expect(oracle.histories[1]?.[2]).toEqual(toolRecord);
    expect(threads.getOrCreate("u1", "s1").messages).toEqual([
      { role: "user", content: "where is TRK1?" },
      toolRecord,
      { role: "assistant", content: "It was delivered." },
    ]);
  });

  it("carries earlier turns into the next one", async () => {
    const { oracle, chat } = setup([
      track("call-1"),
      { kind: "reply", content: "Delivered." },
      { kind: "reply", content: "You asked about TRK1." },
    ]);

    await chat.handleTurn({ ...turn, prompt: "track TRK1" });
    await chat.handleTurn({ ...turn, prompt: "what did I ask?" });

    const history = oracle.histories[2] ?? [];
    expect(history.map((m) => m.role)).toEqual(["system", "user", "tool", "assistant", "user"]);
  });

  it("returns a clarification when a tool needs input", async () => {
    const { chat } = setup([{ kind: "tool", callId: "c1", name: "RateShop", arguments: '{"orderId":"?"}' }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "rates please" });

    expect(reply).toEqual({ content: "Which order did you mean?", isTaskComplete: false, requireUserInput: true });
  });

  it("explains a missing order", async () => {
    const { chat } = setup([{ kind: "tool", callId: "c1", name: "RateShop", arguments: '{"orderId":"ORD-9"}' }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "rates for ORD-9" });

    expect(reply.content).toBe("I couldn't find an order with the number ORD-9. Could you double-check it?");
    expect(reply.requireUserInput).toBe(true);
  });

  it("says nothing was retried when a shipment change fails", async () => {
    const { threads, chat } = setup([
      { kind: "tool", callId: "c1", name: "CancelShipment", arguments: '{"shipmentId":"SHP-1"}' },
    ]);

    const reply = await chat.handleTurn({ ...turn, prompt: "cancel SHP-1" });

    expect(reply.content).toBe(
      "The shipping service is having trouble right now. Nothing was retried, so please check your shipments and confirm before I try again."
    );
    const record = threads.getOrCreate("u1", "s1").messages[1];
    expect(record?.role).toBe("tool");
    expect(record?.content).not.toContain("stack trace here");
  });

  it("stops after the tool call bound", async () => {
    const { oracle, chat } = setup([track("c1"), track("c2"), track("c3"), track("c4")], { maxToolCalls: 2 });

    const reply = await chat.handleTurn({ ...turn, prompt: "keep tracking" });

    expect(reply).toEqual({ content: FALLBACK_MESSAGE, isTaskComplete: false, requireUserInput: true });
    expect(oracle.histories).toHaveLength(3);
  });

  it("falls back when the model fails and still records the turn", async () => {
    const { threads, chat } = setup([new Error("connection reset")]);

    const reply = await chat.handleTurn({ ...turn, prompt: "hi" });

    expect(reply.content).toBe(FALLBACK_MESSAGE);
    expect(threads.getOrCreate("u1", "s1").messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: FALLBACK_MESSAGE },
    ]);
  });

  it("falls back on an empty model reply", async () => {
    const { chat } = setup([{ kind: "reply", content: "  " }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "hi" });

    expect(reply.content).toBe(FALLBACK_MESSAGE);
  });

  it("reports an unknown tool as a fallback", async () => {
    const { chat } = setup([{ kind: "tool", callId: "c1", name: "Teleport", arguments: "{}" }]);

    const reply = await chat.handleTurn({ ...turn, prompt: "teleport my parcel" });

    expect(reply.content).toBe(FALLBACK_MESSAGE);
  });

  it("stores an oversized tool result as a bounded preview", async () => {
    const { threads, chat } = setup(
      [{ kind: "tool", callId: "c1", name: "ListShipments", arguments: "{}" }, { kind: "reply", content: "500 shipments." }],
      { tools: [listTool] }
    );

    await chat.handleTurn({ ...turn, prompt: "list my shipments" });

    const record = threads.getOrCreate("u1", "s1").messages[1];
    const content = record?.content ?? "";
    expect(content.length).toBeLessThanOrEqual(MAX_TOOL_RESULT_CHARS);
    expect(JSON.parse(content)).toMatchObject({ truncated: true });
  });

  it("replays only the most recent messages", async () => {
    const { oracle, chat } = setup(
      [
        { kind: "reply", content: "1" },
        { kind: "reply", content: "2" },
        { kind: "reply", content: "3" },
        { kind: "reply", content: "4" },
      ],
      { maxHistoryMessages: 4 }
    );

    for (const prompt of ["first", "second", "third", "fourth"]) {
      await chat.handleTurn({ ...turn, prompt });
    }

    expect(oracle.histories[3]).toEqual([
      { role: "system", content: "You ship things." },
      { role: "user", content: "second" },
      { role: "assistant", content: "2" },
      { role: "user", content: "third" },
      { role: "assistant", content: "3" },
      { role: "user", content: "fourth" },
    ]);
  });
});

describe("recentMessages", () => {
  const messages: ThreadMessage[] = [
    { role: "user", content: "track TRK1" },
    { role: "tool", toolCallId: "c1", name: "TrackShipment", arguments: "{}", content: "{}" },
    { role: "assistant", content: "Delivered." },
    { role: "user", content: "thanks" },
    { role: "assistant", content: "You're welcome." },
  ];

  it("keeps a short thread whole", () => {
    expect(recentMessages(messages, 10)).toBe(messages);
  });

  it("starts the window at a user message", () => {
    expect(recentMessages(messages, 4)).toEqual(messages.slice(3));
  });
});
