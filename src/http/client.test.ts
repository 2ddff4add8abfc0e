import { afterEach, describe, it, expect, vi } from "vitest";
import { FetchHttpClient, HttpError, isHttpTimeout } from "./client.js";

describe("FetchHttpClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns status, headers and body text", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', { status: 201, headers: { "x-request-id": "req-1" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    const res = await new FetchHttpClient().send({
      method: "POST",
      url: "https://sandbox.test/rates",
      headers: { Authorization: "Bearer test-token" },
      body: "{}",
    });

    expect(res.status).toBe(201);
    expect(res.body).toBe('{"ok":true}');
    expect(res.headers["x-request-id"]).toBe("req-1");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://sandbox.test/rates");
    expect(init).toMatchObject({
      method: "POST",
      body: "{}",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
    });
  });

  it("aborts after the timeout and reports ETIMEDOUT", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => {
              reject(new DOMException("The operation was aborted.", "AbortError"));
            });
          })
      )
    );

    const error = await new FetchHttpClient(20).send({ method: "GET", url: "https://sandbox.test/slow" }).catch((e) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(isHttpTimeout(error)).toBe(true);
  });

  it("wraps other failures", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const error = await new FetchHttpClient().send({ method: "GET", url: "https://sandbox.test/x" }).catch((e) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(isHttpTimeout(error)).toBe(false);
    expect(error.message).toBe("Request failed: https://sandbox.test/x: fetch failed");
  });
});
