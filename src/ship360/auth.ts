/**
 * Ship360 token client: bearer token acquisition, caching, and transparent refresh.
 * Callers never deal with tokens; operations request a valid token when needed.
 */

import type { IHttpClient } from "../http/client.js";
import { isHttpTimeout } from "../http/client.js";
import { authError, isShippingError, networkError, timeoutError } from "../domain/errors.js";
import { createLogger, type Logger } from "../logger.js";
import { tokenResponseSchema } from "./types.js";

export interface Ship360AuthConfig {
  tokenUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  /** Refresh this many seconds before the provider's stated expiry */
  refreshMarginSeconds?: number;
  /** Clock, in epoch ms; injectable for tests */
  now?: () => number;
  logger?: Logger;
}

export interface CachedToken {
  accessToken: string;
  expiresAtMs: number;
}

const DEFAULT_REFRESH_MARGIN_SECONDS = 30;

/** Anything that can hand out a bearer token and forget it after a 401 */
export interface TokenProvider {
  getValidToken(): Promise<string>;
  invalidateToken(): void;
}

/**
 * Obtains and caches access tokens, refreshes when expired.
 * Single-flight: one in-flight request for a new token; concurrent callers await the same promise.
 */
export class Ship360TokenClient implements TokenProvider {
  private readonly config: Ship360AuthConfig;
  private readonly http: IHttpClient;
  private readonly now: () => number;
  private readonly log: Logger;
  private cached: CachedToken | null = null;
  private refreshPromise: Promise<CachedToken> | null = null;

  constructor(config: Ship360AuthConfig, http: IHttpClient) {
    this.config = config;
    this.http = http;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createLogger("ship360.auth");
  }

  /**
   * Returns a valid access token, acquiring or refreshing as needed.
   * Transparent to caller: they never see expiry or refresh logic.
   */
  async getValidToken(): Promise<string> {
    const cached = this.cached;
    if (cached && this.now() < cached.expiresAtMs) {
      return cached.accessToken;
    }
    if (!this.refreshPromise) {
      this.refreshPromise = this.acquireToken().finally(() => {
        this.refreshPromise = null;
      });
    }
    const token = await this.refreshPromise;
    this.cached = token;
    return token.accessToken;
  }

  /** Force next call to getValidToken() to fetch a new token (e.g. after 401). */
  invalidateToken(): void {
    this.cached = null;
  }

  private async acquireToken(): Promise<CachedToken> {
    const auth = Buffer.from(`${this.config.username}:${this.config.password}`, "utf-8").toString("base64");
    const issuedAt = this.now();

    try {
      const res = await this.http.send({
        method: "POST",
        url: this.config.tokenUrl,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Basic ${auth}`,
        },
        timeoutMs: this.config.timeoutMs,
      });

      if (res.status < 200 || res.status >= 300) {
        this.log.warn({ status: res.status }, "token request rejected");
        throw authError(`Ship360 token endpoint returned ${res.status}`, res.body);
      }

      const data = parseTokenResponse(res.body);
      const marginSeconds = this.config.refreshMarginSeconds ?? DEFAULT_REFRESH_MARGIN_SECONDS;
      const expiresAtMs = issuedAt + (data.expiresIn - marginSeconds) * 1000;
      this.log.info({ expiresInSeconds: data.expiresIn }, "token refreshed");
      return { accessToken: data.accessToken, expiresAtMs };
    } catch (err) {
      if (isShippingError(err)) throw err;
      if (isHttpTimeout(err)) throw timeoutError("Ship360 token request");
      throw networkError(err instanceof Error ? err.message : "Token request failed", err);
    }
  }
}

function parseTokenResponse(body: string): { accessToken: string; expiresIn: number } {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    throw authError("Malformed token response", e);
  }
  const parsed = tokenResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw authError("Token response is missing access_token or expires_in", parsed.error);
  }
  return { accessToken: parsed.data.access_token, expiresIn: parsed.data.expires_in };
}
