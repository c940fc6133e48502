/**
 * Connection manager for the Infinitode leaderboard client.
 *
 * Owns the HTTP context shared by every request: the production and beta
 * base URLs, the log sink, and the set of in-flight requests. Each GET
 * is an independent exchange; nothing is retried or cached.
 *
 * @module connection
 */

import { NetworkError, SessionClosedError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { ClientConfig, ConnectionState, QueryParams, RequestOptions } from "./types.js";

export const DEFAULT_BASE_URL = "https://infinitode.prineside.com/";
export const DEFAULT_BETA_BASE_URL = "https://beta.infinitode.prineside.com/";
const DEFAULT_USER_AGENT = "infinitode-client/1.0.0";

/** Ensure exactly one trailing slash so relative paths resolve under it. */
function normalizeBase(url: string): string {
  return url.replace(/\/+$/, "") + "/";
}

export class ConnectionManager {
  readonly baseUrl: string;
  readonly betaBaseUrl: string;
  readonly logger: Logger;
  private readonly userAgent: string;

  private _state: ConnectionState = "open";

  /** Controllers of requests that have not settled yet. */
  private readonly inFlight = new Set<AbortController>();

  constructor(config: ClientConfig = {}) {
    this.baseUrl = normalizeBase(config.baseUrl ?? DEFAULT_BASE_URL);
    this.betaBaseUrl = normalizeBase(config.betaBaseUrl ?? DEFAULT_BETA_BASE_URL);
    this.logger = config.logger ?? createConsoleLogger();
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  }

  // ============================================================
  //  Lifecycle
  // ============================================================

  get state(): ConnectionState { return this._state; }
  get isClosed(): boolean { return this._state === "closed"; }

  /**
   * Make the session usable. Construction already opens it, so this
   * only guards against reuse after {@link close}.
   */
  open(): this {
    if (this._state === "closed") {
      throw new SessionClosedError();
    }
    return this;
  }

  /**
   * Abort in-flight requests and refuse new ones. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    if (this._state === "closed") return;
    this._state = "closed";
    for (const controller of this.inFlight) {
      controller.abort(new SessionClosedError());
    }
    this.inFlight.clear();
  }

  // ============================================================
  //  HTTP Client
  // ============================================================

  /** Base URL for the production or beta servers. */
  resolveBase(beta = false): string {
    return beta ? this.betaBaseUrl : this.baseUrl;
  }

  /** Absolute URL for `path` with `params` appended as the query string. */
  buildUrl(path: string, params: QueryParams = {}, beta = false): string {
    const url = new URL(path.replace(/^\/+/, ""), this.resolveBase(beta));
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Perform one GET and return the body text.
   *
   * Rejects with {@link NetworkError} on connection failure or a non-2xx
   * status (carrying status and body), and with {@link SessionClosedError}
   * once the session is closed.
   */
  async get(path: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<string> {
    if (this._state === "closed") {
      throw new SessionClosedError(options.endpoint);
    }

    const url = this.buildUrl(path, params, options.beta);
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }
    this.inFlight.add(controller);

    this.logger.log("info", "request", {
      method: "GET",
      url,
      endpoint: options.endpoint ?? null,
    });

    try {
      let response: Response;
      let body: string;
      try {
        response = await fetch(url, {
          method: "GET",
          headers: { "User-Agent": this.userAgent },
          signal: controller.signal,
        });
        body = await response.text();
      } catch (err) {
        if (this.isClosed) {
          throw new SessionClosedError(options.endpoint);
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new NetworkError(`Cannot reach ${url}: ${message}`, {
          endpoint: options.endpoint,
          cause: err,
        });
      }

      this.logger.log("debug", "response.body", {
        url,
        status: response.status,
        body,
      });

      if (!response.ok) {
        throw new NetworkError(
          `Request failed (${response.status})${options.endpoint ? ` for ${options.endpoint}` : ""}`,
          { endpoint: options.endpoint, status: response.status, body },
        );
      }

      return body;
    } finally {
      this.inFlight.delete(controller);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
