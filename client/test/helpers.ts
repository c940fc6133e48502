import { readFileSync } from "node:fs";
import { vi } from "vitest";

/** Replace global fetch with a mock that fails unless a response is queued. */
export function stubFetch() {
  const mock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    throw new Error("unexpected fetch");
  });
  vi.stubGlobal("fetch", mock);
  return mock;
}

export type FetchMock = ReturnType<typeof stubFetch>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { "Content-Type": "text/html" } });
}

/** URL of the `index`-th fetch call. */
export function requestedUrl(mock: FetchMock, index = 0): URL {
  const call = mock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${mock.mock.calls.length} time(s)`);
  }
  return new URL(String(call[0]));
}

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}

/** `count` leaderboard entries with descending scores. */
export function scoreEntries(count: number): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, i) => ({
    playerid: `U-TEST-${String(i).padStart(4, "0")}-AAAAAA`,
    nickname: `player${i + 1}`,
    score: 10_000 - i * 10,
    level: 20,
    hasPfp: false,
  }));
}

export function successEnvelope(
  leaderboards: Record<string, unknown>[],
  player: Record<string, unknown> = { total: leaderboards.length },
): Record<string, unknown> {
  return { status: "success", player, leaderboards };
}
