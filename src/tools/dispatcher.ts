/**
 * Routes a model tool call to its definition. Lookup is a plain map; unknown
 * names and invalid arguments never reach a handler.
 */

import { unknownToolError, validationError } from "../domain/errors.js";
import { describeIssues, issuePaths } from "../domain/validation.js";
import type { ToolSpec } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import { toToolSpec, type ToolDefinition, type ToolOutcome } from "./types.js";

export class ToolDispatcher {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly log: Logger;

  constructor(tools: readonly ToolDefinition[], logger: Logger = createLogger("tools")) {
    this.tools = new Map(tools.map((t) => [t.name, t]));
    this.log = logger;
  }

  specs(): ToolSpec[] {
    return [...this.tools.values()].map(toToolSpec);
  }

  /** Run one tool call; rawArguments is the JSON text the model produced */
  async dispatch(name: string, rawArguments: string): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.log.warn({ tool: name }, "unknown tool requested");
      return { status: "error", tool: name, idempotent: true, error: unknownToolError(name) };
    }

    let json: unknown;
    try {
      json = rawArguments.trim() === "" ? {} : JSON.parse(rawArguments);
    } catch (error) {
      return {
        status: "error",
        tool: name,
        idempotent: tool.idempotent,
        error: validationError(`Arguments for ${name} are not valid JSON`, undefined, error),
      };
    }

    const args = tool.argsSchema.safeParse(json);
    if (!args.success) {
      return {
        status: "error",
        tool: name,
        idempotent: tool.idempotent,
        error: validationError(describeIssues(args.error), issuePaths(args.error), args.error),
      };
    }

    this.log.info({ tool: name }, "dispatching tool");
    const result = await tool.handler(args.data);

    if (!result.ok) {
      this.log.warn({ tool: name, code: result.error.code }, "tool failed");
      return { status: "error", tool: name, idempotent: tool.idempotent, error: result.error };
    }
    const reply = result.value;
    return reply.status === "ok"
      ? { status: "ok", tool: tool.name, data: reply.data }
      : { status: "needs_input", tool: tool.name, message: reply.message };
  }
}
