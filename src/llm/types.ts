/** Narrow model interfaces the chat loop and slot extractor depend on. */

import type { ChatMessage, ThreadMessage } from "../conversation/types.js";

/** What the model decided to do next */
export type ActionInvocation =
  | { kind: "reply"; content: string }
  | { kind: "tool"; callId: string; name: string; arguments: string };

/**
 * The language model as a decision oracle: given the conversation so far,
 * either answer or name one tool to call.
 */
export interface ActionOracle {
  chooseAction(history: readonly ThreadMessage[], tools: readonly ToolSpec[]): Promise<ActionInvocation>;
}

export interface CompletionOptions {
  /** Ask the model for a single JSON object */
  json?: boolean;
  temperature?: number;
}

/** Plain completion, used for slot extraction */
export interface CompletionClient {
  complete(messages: readonly ChatMessage[], options?: CompletionOptions): Promise<string>;
}

/** Function-tool description advertised to the model */
export interface ToolSpec {
  name: string;
  description: string;
  /** JSON Schema of the arguments object */
  parameters: Record<string, unknown>;
}
