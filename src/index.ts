/**
 * Conversational shipping assistant over the Ship360 API.
 *
 * Public API: domain types, the assistant factory, services and errors.
 */

export * from "./domain/index.js";
export type { ShippingProvider } from "./provider/types.js";
export { createShippingAssistant } from "./app.js";
export type { AssistantOverrides, ShippingAssistant } from "./app.js";
export { ChatService } from "./service/chat-service.js";
export type { ChatReply, ChatServiceConfig, ChatTurn } from "./service/chat-service.js";
export { ShippingService } from "./service/shipping-service.js";
export type { ShippingServiceConfig } from "./service/shipping-service.js";
export { createShip360Adapter } from "./ship360/adapter.js";
export type { Ship360AdapterConfig } from "./ship360/adapter.js";
export { ThreadStore } from "./conversation/thread-store.js";
export { OrderLookup } from "./orders/order-lookup.js";
export { FetchHttpClient } from "./http/client.js";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/client.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
