/**
 * One conversational turn: the model picks tools until it can answer, within
 * a fixed bound. Tool results are kept in the thread so later turns can refer
 * to them (e.g. a selected rate option's carrierAccountId).
 */

import type { ChatMessage, ThreadMessage, ToolMessage } from "../conversation/types.js";
import { SYSTEM_PROMPT } from "../conversation/prompts.js";
import type { ThreadStore } from "../conversation/thread-store.js";
import { isShippingError } from "../domain/errors.js";
import type { ActionInvocation, ActionOracle } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import type { ToolDispatcher } from "../tools/dispatcher.js";
import type { ToolOutcome } from "../tools/types.js";
import { FALLBACK_MESSAGE, userMessageFor } from "./user-messages.js";

export interface ChatTurn {
  userId: string;
  sessionId: string;
  prompt: string;
}

export interface ChatReply {
  content: string;
  isTaskComplete: boolean;
  requireUserInput: boolean;
}

export interface ChatServiceConfig {
  oracle: ActionOracle;
  dispatcher: ToolDispatcher;
  threads: ThreadStore;
  /** Tool calls allowed in one turn before giving up */
  maxToolCalls?: number;
  /** Most recent thread messages replayed to the model each turn */
  maxHistoryMessages?: number;
  systemPrompt?: string;
  logger?: Logger;
}

export const DEFAULT_MAX_TOOL_CALLS = 5;
export const DEFAULT_MAX_HISTORY_MESSAGES = 40;
/** Tool results longer than this are stored as a preview */
export const MAX_TOOL_RESULT_CHARS = 8_000;
const TOOL_RESULT_PREVIEW_CHARS = 2_000;

const answered = (content: string): ChatReply => ({ content, isTaskComplete: true, requireUserInput: false });
const askUser = (content: string): ChatReply => ({ content, isTaskComplete: false, requireUserInput: true });

function boundedContent(content: string): string {
  if (content.length <= MAX_TOOL_RESULT_CHARS) return content;
  return JSON.stringify({
    truncated: true,
    length: content.length,
    preview: content.slice(0, TOOL_RESULT_PREVIEW_CHARS),
  });
}

function toolResultContent(outcome: ToolOutcome): string {
  switch (outcome.status) {
    case "ok":
      return boundedContent(JSON.stringify(outcome.data));
    case "needs_input":
      return JSON.stringify({ needsInput: outcome.message });
    case "error":
      return JSON.stringify({ error: outcome.error.toJSON() });
  }
}

/**
 * The last `max` messages of a thread, starting at a user message so the
 * model never sees a tool result without the request that led to it.
 */
export function recentMessages(messages: readonly ThreadMessage[], max: number): readonly ThreadMessage[] {
  if (messages.length <= max) return messages;
  const tail = messages.slice(messages.length - max);
  const start = tail.findIndex((m) => m.role === "user");
  return start === -1 ? [] : tail.slice(start);
}

export class ChatService {
  private readonly maxToolCalls: number;
  private readonly maxHistoryMessages: number;
  private readonly systemPrompt: string;
  private readonly log: Logger;

  constructor(private readonly config: ChatServiceConfig) {
    this.maxToolCalls = config.maxToolCalls ?? DEFAULT_MAX_TOOL_CALLS;
    this.maxHistoryMessages = config.maxHistoryMessages ?? DEFAULT_MAX_HISTORY_MESSAGES;
    this.systemPrompt = config.systemPrompt ?? SYSTEM_PROMPT;
    this.log = config.logger ?? createLogger("chat");
  }

  async handleTurn(turn: ChatTurn): Promise<ChatReply> {
    const { userId, sessionId } = turn;
    const thread = this.config.threads.getOrCreate(userId, sessionId);
    const system: ChatMessage = { role: "system", content: this.systemPrompt };
    const turnMessages: ThreadMessage[] = [{ role: "user", content: turn.prompt }];

    const history = recentMessages(thread.messages, this.maxHistoryMessages);

    const reply = await this.runLoop([system, ...history], turnMessages);
    this.config.threads.appendAndTouch(userId, sessionId, ...turnMessages, { role: "assistant", content: reply.content });
    return reply;
  }

  /** Drives the model; pushes tool records onto turnMessages as it goes */
  private async runLoop(prefix: readonly ThreadMessage[], turnMessages: ThreadMessage[]): Promise<ChatReply> {
    let toolCalls = 0;
    for (;;) {
      let action: ActionInvocation;
      try {
        action = await this.config.oracle.chooseAction([...prefix, ...turnMessages], this.config.dispatcher.specs());
      } catch (error) {
        this.log.error({ err: error }, "model call failed");
        return askUser(isShippingError(error) ? userMessageFor(error) : FALLBACK_MESSAGE);
      }

      if (action.kind === "reply") {
        return action.content.trim() === "" ? askUser(FALLBACK_MESSAGE) : answered(action.content);
      }

      if (toolCalls >= this.maxToolCalls) {
        this.log.warn({ toolCalls }, "tool call bound reached");
        return askUser(FALLBACK_MESSAGE);
      }
      toolCalls++;

      const outcome = await this.config.dispatcher.dispatch(action.name, action.arguments);
      const record: ToolMessage = {
        role: "tool",
        toolCallId: action.callId,
        name: action.name,
        arguments: action.arguments,
        content: toolResultContent(outcome),
      };
      turnMessages.push(record);

      if (outcome.status === "needs_input") {
        return askUser(outcome.message);
      }
      if (outcome.status === "error") {
        return askUser(userMessageFor(outcome.error, outcome.idempotent));
      }
    }
  }
}
