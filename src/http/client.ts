/**
 * HTTP client abstraction. Allows stubbing in tests without touching provider logic.
 */

export interface HttpRequest {
  method: "GET" | "POST" | "PUT" | "DELETE";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type HttpErrorCode = "ETIMEDOUT" | "ECONNRESET" | "ENOTFOUND" | "ABORT_ERR";

export class HttpError extends Error {
  readonly request: HttpRequest;
  readonly code?: HttpErrorCode;

  constructor(message: string, request: HttpRequest, code?: HttpErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "HttpError";
    this.request = request;
    this.code = code;
  }
}

export function isHttpTimeout(e: unknown): boolean {
  return e instanceof HttpError && e.code === "ETIMEDOUT";
}

/**
 * Minimal HTTP client interface. Default implementation uses global fetch.
 * Tests inject a stub that returns controlled responses.
 */
export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Default implementation using fetch with timeout.
 */
export class FetchHttpClient implements IHttpClient {
  constructor(private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs ?? this.defaultTimeoutMs);
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: {
          "Content-Type": "application/json",
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      });
      const body = await res.text();
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => (headers[k] = v));
      return { status: res.status, headers, body };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new HttpError(`Request timed out: ${request.url}`, request, "ETIMEDOUT", err);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new HttpError(`Request failed: ${request.url}: ${message}`, request, undefined, err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
