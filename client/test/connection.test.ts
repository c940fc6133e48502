import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConnectionManager, DEFAULT_BASE_URL } from "../src/connection.js";
import { NetworkError, SessionClosedError } from "../src/errors.js";
import type { Logger, LogLevel } from "../src/logger.js";
import { silentLogger } from "../src/logger.js";
import { stubFetch, htmlResponse, requestedUrl } from "./helpers.js";
import type { FetchMock } from "./helpers.js";

describe("ConnectionManager", () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("base URLs", () => {
    it("defaults to the production servers", () => {
      const conn = new ConnectionManager({ logger: silentLogger });
      expect(conn.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(conn.resolveBase(false)).toBe("https://infinitode.prineside.com/");
      expect(conn.resolveBase(true)).toBe("https://beta.infinitode.prineside.com/");
    });

    it("adds a trailing slash to configured URLs", () => {
      const conn = new ConnectionManager({ baseUrl: "http://localhost:8080//", logger: silentLogger });
      expect(conn.baseUrl).toBe("http://localhost:8080/");
    });

    it("builds query strings and drops undefined params", () => {
      const conn = new ConnectionManager({ baseUrl: "http://localhost:8080", logger: silentLogger });
      const url = conn.buildUrl("xdx/", { url: "seasonal_leaderboard", playerid: undefined, n: 3 });
      expect(url).toBe("http://localhost:8080/xdx/?url=seasonal_leaderboard&n=3");
    });
  });

  describe("get", () => {
    it("returns the body text of a 2xx response", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("<html></html>"));
      const conn = new ConnectionManager({ logger: silentLogger });

      await expect(conn.get("xdx/", { url: "seasonal_leaderboard" })).resolves.toBe("<html></html>");
      expect(requestedUrl(fetchMock).searchParams.get("url")).toBe("seasonal_leaderboard");
    });

    it("sends a User-Agent header", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("ok"));
      const conn = new ConnectionManager({ logger: silentLogger, userAgent: "test-agent/0.0.1" });
      await conn.get("");

      const init = fetchMock.mock.calls[0][1];
      expect(init?.headers).toEqual({ "User-Agent": "test-agent/0.0.1" });
    });

    it("wraps non-2xx responses with status and body", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("Service Unavailable", 503));
      const conn = new ConnectionManager({ logger: silentLogger });

      const err = await conn.get("", {}, { endpoint: "leaderboards" }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NetworkError);
      if (!(err instanceof NetworkError)) return;
      expect(err.status).toBe(503);
      expect(err.body).toBe("Service Unavailable");
      expect(err.endpoint).toBe("leaderboards");
      expect(err.message).toBe("Request failed (503) for leaderboards");
    });

    it("wraps connection failures", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      const conn = new ConnectionManager({ baseUrl: "http://localhost:1", logger: silentLogger });

      await expect(conn.get("")).rejects.toThrow("Cannot reach http://localhost:1/: fetch failed");
    });

    it("logs requests at info and bodies at debug", async () => {
      fetchMock.mockResolvedValueOnce(htmlResponse("body text"));
      const entries: Array<{ level: LogLevel; event: string; details: Record<string, unknown> }> = [];
      const logger: Logger = { log: (level, event, details) => entries.push({ level, event, details }) };
      const conn = new ConnectionManager({ baseUrl: "http://localhost:8080", logger });

      await conn.get("xdx/", {}, { endpoint: "seasonalLeaderboard" });

      expect(entries).toEqual([
        {
          level: "info",
          event: "request",
          details: { method: "GET", url: "http://localhost:8080/xdx/", endpoint: "seasonalLeaderboard" },
        },
        {
          level: "debug",
          event: "response.body",
          details: { url: "http://localhost:8080/xdx/", status: 200, body: "body text" },
        },
      ]);
    });
  });

  describe("lifecycle", () => {
    it("starts open and closes idempotently", async () => {
      const conn = new ConnectionManager({ logger: silentLogger });
      expect(conn.state).toBe("open");
      await conn.close();
      await conn.close();
      expect(conn.state).toBe("closed");
      expect(conn.isClosed).toBe(true);
    });

    it("refuses requests after close without fetching", async () => {
      const conn = new ConnectionManager({ logger: silentLogger });
      await conn.close();

      await expect(conn.get("")).rejects.toBeInstanceOf(SessionClosedError);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(() => conn.open()).toThrow(SessionClosedError);
    });

    it("aborts in-flight requests on close", async () => {
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      );
      const conn = new ConnectionManager({ logger: silentLogger });

      const pending = conn.get("", {}, { endpoint: "leaderboards" });
      await conn.close();

      await expect(pending).rejects.toBeInstanceOf(SessionClosedError);
    });

    it("forwards the caller's abort signal to a single request", async () => {
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted by caller")));
          }),
      );
      const conn = new ConnectionManager({ logger: silentLogger });
      const controller = new AbortController();

      const pending = conn.get("", {}, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow("aborted by caller");
      expect(conn.state).toBe("open");
    });
  });
});
