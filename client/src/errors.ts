/**
 * Error hierarchy for the Infinitode leaderboard client.
 *
 * Every failure surfaces as a subclass of {@link InfinitodeError}; the
 * client never retries or recovers on its own.
 *
 * @example
 * ```ts
 * try {
 *   await client.leaderboards({ mapname: "5.1" });
 * } catch (err) {
 *   if (err instanceof NetworkError) {
 *     console.log(`HTTP ${err.status} from ${err.endpoint}`);
 *   }
 * }
 * ```
 *
 * @module errors
 */

import type { Endpoint } from "./types.js";

/** Base class for all client errors. */
export class InfinitodeError extends Error {
  /** Operation that failed, when the error comes from one. */
  readonly endpoint: Endpoint | undefined;

  constructor(message: string, endpoint?: Endpoint) {
    super(message);
    this.name = "InfinitodeError";
    this.endpoint = endpoint;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A required argument is missing or an argument is invalid. Raised before any request. */
export class BadArgumentError extends InfinitodeError {
  /** Name of the offending parameter. */
  readonly param: string;

  constructor(param: string, message: string, endpoint?: Endpoint) {
    super(endpoint ? `${endpoint}: ${message}` : message, endpoint);
    this.name = "BadArgumentError";
    this.param = param;
  }
}

/** Connection failure or non-2xx response. */
export class NetworkError extends InfinitodeError {
  /** HTTP status, absent when no response arrived. */
  readonly status: number | undefined;
  /** Response body, when one was read. */
  readonly body: string | undefined;

  constructor(
    message: string,
    options: { endpoint?: Endpoint; status?: number; body?: string; cause?: unknown } = {},
  ) {
    super(message, options.endpoint);
    this.name = "NetworkError";
    this.status = options.status;
    this.body = options.body;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** A request was attempted on a closed session. */
export class SessionClosedError extends NetworkError {
  constructor(endpoint?: Endpoint) {
    super("Session is closed", { endpoint });
    this.name = "SessionClosedError";
  }
}

/** The service answered with a non-success status envelope. */
export class ApiError extends InfinitodeError {
  constructor(message: string, endpoint?: Endpoint) {
    super(endpoint ? `${endpoint}: ${message}` : message, endpoint);
    this.name = "ApiError";
  }
}

/** A JSON response lacks a required key or carries an unparseable value. */
export class MalformedResponseError extends InfinitodeError {
  readonly key: string;

  constructor(endpoint: Endpoint, key: string, reason: string) {
    super(`${endpoint}: malformed response (${key}: ${reason})`, endpoint);
    this.name = "MalformedResponseError";
    this.key = key;
  }
}

/** An HTML page lacks a marker the scraper relies on. */
export class PageStructureError extends InfinitodeError {
  readonly marker: string;

  constructor(endpoint: Endpoint, marker: string) {
    super(`${endpoint}: unexpected page structure (missing ${marker})`, endpoint);
    this.name = "PageStructureError";
    this.marker = marker;
  }
}

/** Leaderboard position outside `[0, length)`. */
export class OutOfRangeError extends InfinitodeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Index ${index} out of range for leaderboard of length ${length}`);
    this.name = "OutOfRangeError";
    this.index = index;
    this.length = length;
  }
}

/** A follow-up Player field was read before it was fetched. */
export class NotFetchedError extends InfinitodeError {
  constructor(field: string, fetcher: string) {
    super(`${field} has not been fetched yet. Call ${fetcher}() first`);
    this.name = "NotFetchedError";
  }
}
