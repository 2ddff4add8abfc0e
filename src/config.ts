/**
 * Configuration loaded from environment variables.
 * All secrets and endpoint URLs live here; nothing in business logic reads process.env.
 */

import { z } from "zod";

const required = (name: string) => z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);
const requiredUrl = (name: string) => required(name).url(`${name} must be a URL`);

const configSchema = z.object({
  // Ship360 credentials and endpoints
  SP360_TOKEN_URL: requiredUrl("SP360_TOKEN_URL"),
  SP360_TOKEN_USERNAME: required("SP360_TOKEN_USERNAME"),
  SP360_TOKEN_PASSWORD: required("SP360_TOKEN_PASSWORD"),
  SP360_RATE_SHOP_URL: requiredUrl("SP360_RATE_SHOP_URL"),
  SP360_SHIPMENTS_URL: requiredUrl("SP360_SHIPMENTS_URL"),
  SP360_TRACKING_URL: requiredUrl("SP360_TRACKING_URL"),

  // Azure OpenAI
  AZURE_OPENAI_ENDPOINT: requiredUrl("AZURE_OPENAI_ENDPOINT"),
  AZURE_OPENAI_API_KEY: required("AZURE_OPENAI_API_KEY"),
  AZURE_OPENAI_API_VERSION: required("AZURE_OPENAI_API_VERSION"),
  AZURE_OPENAI_CHAT_DEPLOYMENT_NAME: required("AZURE_OPENAI_CHAT_DEPLOYMENT_NAME"),

  // Optional
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TOKEN_REFRESH_MARGIN_SECONDS: z.coerce.number().int().nonnegative().default(30),
  THREAD_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  THREAD_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  MAX_TOOL_CALLS_PER_TURN: z.coerce.number().int().positive().default(5),
  MAX_HISTORY_MESSAGES: z.coerce.number().int().positive().default(40),
  ORDERS_FILE: z.string().min(1).default("data/orders.json"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate config from process.env.
 * Throws one error naming every missing or invalid variable, so startup fails fast.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    SP360_TOKEN_URL: env.SP360_TOKEN_URL,
    SP360_TOKEN_USERNAME: env.SP360_TOKEN_USERNAME,
    SP360_TOKEN_PASSWORD: env.SP360_TOKEN_PASSWORD,
    SP360_RATE_SHOP_URL: env.SP360_RATE_SHOP_URL,
    SP360_SHIPMENTS_URL: env.SP360_SHIPMENTS_URL,
    SP360_TRACKING_URL: env.SP360_TRACKING_URL,
    AZURE_OPENAI_ENDPOINT: env.AZURE_OPENAI_ENDPOINT,
    AZURE_OPENAI_API_KEY: env.AZURE_OPENAI_API_KEY,
    AZURE_OPENAI_API_VERSION: env.AZURE_OPENAI_API_VERSION,
    AZURE_OPENAI_CHAT_DEPLOYMENT_NAME: env.AZURE_OPENAI_CHAT_DEPLOYMENT_NAME,
    HTTP_TIMEOUT_MS: env.HTTP_TIMEOUT_MS,
    TOKEN_REFRESH_MARGIN_SECONDS: env.TOKEN_REFRESH_MARGIN_SECONDS,
    THREAD_TTL_SECONDS: env.THREAD_TTL_SECONDS,
    THREAD_SWEEP_INTERVAL_SECONDS: env.THREAD_SWEEP_INTERVAL_SECONDS,
    MAX_TOOL_CALLS_PER_TURN: env.MAX_TOOL_CALLS_PER_TURN,
    MAX_HISTORY_MESSAGES: env.MAX_HISTORY_MESSAGES,
    ORDERS_FILE: env.ORDERS_FILE,
    LOG_LEVEL: env.LOG_LEVEL,
  };
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.errors.map((e) => e.message).join("; ");
    throw new Error(`Invalid configuration: ${msg}`);
  }
  return parsed.data;
}
