/** A plain chat message */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/** One tool call made during a turn, together with its result */
export interface ToolMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  /** Arguments as the model sent them (JSON text) */
  arguments: string;
  /** Tool result as JSON text */
  content: string;
}

export type ThreadMessage = ChatMessage | ToolMessage;

export interface ConversationThread {
  readonly userId: string;
  readonly sessionId: string;
  readonly createdAt: number;
  /** Epoch ms of the last getOrCreate/append */
  lastAccess: number;
  readonly messages: ThreadMessage[];
}
