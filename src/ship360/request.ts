/**
 * Authorized provider call shared by every Ship360 operation: bearer token,
 * per-call timeout, status mapping, and a single attempt.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from "../http/client.js";
import { isHttpTimeout } from "../http/client.js";
import {
  isShippingError,
  networkError,
  timeoutError,
  upstreamError,
  type ShippingError,
} from "../domain/errors.js";
import type { ShippingResult } from "../domain/result.js";
import type { Logger } from "../logger.js";
import type { TokenProvider } from "./auth.js";

export interface Ship360CallContext {
  auth: TokenProvider;
  http: IHttpClient;
  timeoutMs?: number;
  logger: Logger;
}

export interface AuthorizedRequest {
  method: HttpRequest["method"];
  url: string;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Send one authorized request. Resolves with the 2xx response; rejects with a
 * ShippingError for auth failures, timeouts, transport errors and non-2xx
 * statuses. A 401/403 also drops the cached token.
 */
export async function sendAuthorized(
  ctx: Ship360CallContext,
  operation: string,
  request: AuthorizedRequest
): Promise<HttpResponse> {
  const token = await ctx.auth.getValidToken();
  const started = Date.now();
  const res = await ctx.http.send({
    method: request.method,
    url: request.url,
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
      ...request.headers,
    },
    body: request.body === undefined ? undefined : JSON.stringify(request.body),
    timeoutMs: ctx.timeoutMs,
  });
  ctx.logger.info({ operation, status: res.status, durationMs: Date.now() - started }, "provider call");

  if (res.status === 401 || res.status === 403) {
    ctx.auth.invalidateToken();
  }
  if (res.status < 200 || res.status >= 300) {
    throw upstreamError(operation, res.status, res.body);
  }
  return res;
}

/** Normalize anything thrown during a provider call */
export function toShippingError(err: unknown, operation: string): ShippingError {
  if (isShippingError(err)) return err;
  if (isHttpTimeout(err)) return timeoutError(operation);
  return networkError(err instanceof Error ? err.message : `Unknown error during ${operation}`, err);
}

/**
 * Run a provider call and convert any failure into a result, so nothing
 * throws past the operation boundary.
 */
export async function runOperation<T>(
  ctx: Ship360CallContext,
  operation: string,
  call: () => Promise<T>
): Promise<ShippingResult<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (err) {
    const error = toShippingError(err, operation);
    ctx.logger.warn({ operation, code: error.code, httpStatus: error.httpStatus }, "provider call failed");
    return { ok: false, error };
  }
}

/** Join a base URL and a path segment, encoding the segment */
export function joinUrl(base: string, segment: string): string {
  return `${base.replace(/\/$/, "")}/${encodeURIComponent(segment)}`;
}
