/**
 * Stub HTTP client for tests: record requests and return configured responses.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from "./client.js";

export type StubResponse = HttpResponse | ((request: HttpRequest) => Promise<HttpResponse>);

/**
 * Returns queued responses in order, one per request. Routes registered with
 * `route()` take precedence for matching URLs, so token and API calls can be
 * answered independently.
 */
export class StubHttpClient implements IHttpClient {
  private responses: StubResponse[] = [];
  private routes: Array<{ match: (url: string) => boolean; responses: StubResponse[] }> = [];
  private recordedRequests: HttpRequest[] = [];

  /** Set one response to return for the next request */
  setResponse(res: StubResponse): void {
    this.responses = [res];
  }

  /** Set a sequence of responses (one per request) */
  setResponses(res: StubResponse[]): void {
    this.responses = [...res];
  }

  /** Append a response to the queue */
  addResponse(res: StubResponse): void {
    this.responses.push(res);
  }

  /** Queue responses for requests whose URL contains `fragment` */
  route(fragment: string, responses: StubResponse[]): void {
    this.routes.push({ match: (url) => url.includes(fragment), responses: [...responses] });
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  /** Clear recorded requests, routes and response queue */
  reset(): void {
    this.recordedRequests = [];
    this.responses = [];
    this.routes = [];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push(request);
    const route = this.routes.find((r) => r.match(request.url) && r.responses.length > 0);
    const next = route ? route.responses.shift() : this.responses.shift();
    if (next === undefined) {
      return {
        status: 500,
        headers: {},
        body: JSON.stringify({ error: "No stub response configured" }),
      };
    }
    if (typeof next === "function") {
      return next(request);
    }
    return next;
  }
}

/** JSON response helper for stubs */
export function jsonResponse(status: number, body: unknown): HttpResponse {
  return { status, headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}
