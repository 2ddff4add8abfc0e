/**
 * Composition root: builds every owned service from config and wires them
 * together. Nothing below this file reads config or creates singletons.
 */

import type { Config } from "./config.js";
import { ThreadStore } from "./conversation/thread-store.js";
import { SlotExtractor } from "./extraction/slot-extractor.js";
import { FetchHttpClient, type IHttpClient } from "./http/client.js";
import { AzureChatModel } from "./llm/azure-chat-model.js";
import type { ActionOracle, CompletionClient } from "./llm/types.js";
import { createLogger, setLogLevel } from "./logger.js";
import { OrderLookup } from "./orders/order-lookup.js";
import { ChatService } from "./service/chat-service.js";
import { ShippingService } from "./service/shipping-service.js";
import { createShip360Adapter } from "./ship360/adapter.js";
import { createShippingTools } from "./tools/definitions.js";
import { ToolDispatcher } from "./tools/dispatcher.js";

/** Replacements for the pieces that talk to the outside world */
export interface AssistantOverrides {
  http?: IHttpClient;
  orders?: OrderLookup;
  /** Used for both tool choice and extraction */
  model?: ActionOracle & CompletionClient;
  now?: () => number;
}

export interface ShippingAssistant {
  chat: ChatService;
  shipping: ShippingService;
  threads: ThreadStore;
  dispatcher: ToolDispatcher;
  /** Stops the thread sweeper */
  shutdown(): void;
}

export async function createShippingAssistant(
  config: Config,
  overrides: AssistantOverrides = {}
): Promise<ShippingAssistant> {
  setLogLevel(config.LOG_LEVEL);
  const log = createLogger("app");
  const now = overrides.now ?? Date.now;

  const http = overrides.http ?? new FetchHttpClient(config.HTTP_TIMEOUT_MS);
  const provider = createShip360Adapter(
    {
      tokenUrl: config.SP360_TOKEN_URL,
      username: config.SP360_TOKEN_USERNAME,
      password: config.SP360_TOKEN_PASSWORD,
      rateShopUrl: config.SP360_RATE_SHOP_URL,
      shipmentsUrl: config.SP360_SHIPMENTS_URL,
      trackingUrl: config.SP360_TRACKING_URL,
      timeoutMs: config.HTTP_TIMEOUT_MS,
      refreshMarginSeconds: config.TOKEN_REFRESH_MARGIN_SECONDS,
      now,
    },
    http
  );
  const orders = overrides.orders ?? (await OrderLookup.fromFile(config.ORDERS_FILE));
  const shipping = new ShippingService({ provider, orders, now: () => new Date(now()) });

  const threads = new ThreadStore({ ttlSeconds: config.THREAD_TTL_SECONDS, now });
  const stopSweeper = threads.startSweeper(config.THREAD_SWEEP_INTERVAL_SECONDS);

  const model =
    overrides.model ??
    new AzureChatModel({
      endpoint: config.AZURE_OPENAI_ENDPOINT,
      apiKey: config.AZURE_OPENAI_API_KEY,
      apiVersion: config.AZURE_OPENAI_API_VERSION,
      deployment: config.AZURE_OPENAI_CHAT_DEPLOYMENT_NAME,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    });
  const extractor = new SlotExtractor(model, { now: () => new Date(now()) });
  const dispatcher = new ToolDispatcher(createShippingTools({ shipping, extractor }));

  const chat = new ChatService({
    oracle: model,
    dispatcher,
    threads,
    maxToolCalls: config.MAX_TOOL_CALLS_PER_TURN,
    maxHistoryMessages: config.MAX_HISTORY_MESSAGES,
  });

  log.info({ orders: orders.size, provider: provider.providerId }, "shipping assistant ready");
  return { chat, shipping, threads, dispatcher, shutdown: stopSweeper };
}
