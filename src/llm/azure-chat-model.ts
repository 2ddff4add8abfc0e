/**
 * Azure OpenAI chat completions behind the ActionOracle and CompletionClient interfaces.
 */

import { AzureOpenAI } from "openai";
import type OpenAI from "openai";
import type { ChatMessage, ThreadMessage } from "../conversation/types.js";
import { modelError } from "../domain/errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { ActionInvocation, ActionOracle, CompletionClient, CompletionOptions, ToolSpec } from "./types.js";

export interface AzureChatModelConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
  timeoutMs?: number;
  logger?: Logger;
}

/** Thread messages in chat-completions form; each tool record becomes a call plus its result */
export function toChatCompletionMessages(history: readonly ThreadMessage[]): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [];
  for (const m of history) {
    if (m.role === "tool") {
      messages.push({
        role: "assistant",
        content: null,
        tool_calls: [{ id: m.toolCallId, type: "function", function: { name: m.name, arguments: m.arguments } }],
      });
      messages.push({ role: "tool", tool_call_id: m.toolCallId, content: m.content });
    } else {
      messages.push({ role: m.role, content: m.content });
    }
  }
  return messages;
}

function toChatCompletionTools(tools: readonly ToolSpec[]): OpenAI.ChatCompletionTool[] {
  return tools.map((t): OpenAI.ChatCompletionTool => ({
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

export class AzureChatModel implements ActionOracle, CompletionClient {
  private readonly client: AzureOpenAI;
  private readonly deployment: string;
  private readonly log: Logger;

  constructor(config: AzureChatModelConfig) {
    this.client = new AzureOpenAI({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
      deployment: config.deployment,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
    this.deployment = config.deployment;
    this.log = config.logger ?? createLogger("llm");
  }

  async chooseAction(history: readonly ThreadMessage[], tools: readonly ToolSpec[]): Promise<ActionInvocation> {
    const request: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.deployment,
      messages: toChatCompletionMessages(history),
    };
    if (tools.length > 0) {
      request.tools = toChatCompletionTools(tools);
      request.tool_choice = "auto";
      request.parallel_tool_calls = false;
    }

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(request);
    } catch (error) {
      throw modelError(`Chat completion failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    const message = response.choices[0]?.message;
    if (!message) {
      throw modelError("Chat completion returned no choices");
    }
    const call = message.tool_calls?.[0];
    if (call) {
      this.log.debug({ tool: call.function.name }, "model chose tool");
      return { kind: "tool", callId: call.id, name: call.function.name, arguments: call.function.arguments };
    }
    return { kind: "reply", content: message.content ?? "" };
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const request: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.deployment,
      messages: toChatCompletionMessages(messages),
      temperature: options.temperature ?? 0,
    };
    if (options.json) {
      request.response_format = { type: "json_object" };
    }
    try {
      const response = await this.client.chat.completions.create(request);
      return response.choices[0]?.message.content ?? "";
    } catch (error) {
      throw modelError(`Completion failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }
}
