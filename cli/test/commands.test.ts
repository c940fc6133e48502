import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import chalk from "chalk";
import type { MockInstance } from "vitest";
import { createProgram } from "../src/program.js";
import {
  htmlResponse,
  jsonResponse,
  readFixture,
  requestedUrl,
  scoreEntries,
  stubFetch,
  successEnvelope,
} from "../../client/test/helpers.js";
import type { FetchMock } from "../../client/test/helpers.js";

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(args, { from: "user" });
}

function printed(log: MockInstance): string[] {
  return log.mock.calls.map((call) => String(call[0]));
}

describe("commands", () => {
  let fetchMock: FetchMock;
  let log: MockInstance;
  let error: MockInstance;
  let savedPlayer: string | undefined;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    fetchMock = stubFetch();
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    vi.stubEnv("INFINITODE_BASE_URL", "");
    vi.stubEnv("INFINITODE_BETA_BASE_URL", "");
    vi.stubEnv("INFINITODE_LOG_LEVEL", "");
    savedPlayer = process.env.INFINITODE_PLAYER_ID;
    delete process.env.INFINITODE_PLAYER_ID;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    if (savedPlayer === undefined) {
      delete process.env.INFINITODE_PLAYER_ID;
    } else {
      process.env.INFINITODE_PLAYER_ID = savedPlayer;
    }
  });

  it("prints a leaderboard as JSON", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(successEnvelope(scoreEntries(2), { total: 90 })));

    await run("leaderboard", "5.1", "--mode", "waves", "--json");

    const output: unknown = JSON.parse(printed(log)[0] ?? "");
    expect(output).toMatchObject({
      method: "leaderboards",
      mapname: "5.1",
      mode: "waves",
      difficulty: "NORMAL",
      total: 90,
      scores: [
        { rank: 1, nickname: "player1", score: 10000 },
        { rank: 2, nickname: "player2", score: 9990 },
      ],
    });
    expect(requestedUrl(fetchMock).searchParams.get("mode")).toBe("waves");
  });

  it("prints a leaderboard table", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(successEnvelope(scoreEntries(30), { total: 90 })));

    await run("leaderboard", "5.1", "--mode", "waves", "--limit", "3");

    const lines = printed(log);
    expect(lines[0]).toBe("");
    expect(lines[1]).toBe("  Map 5.1 · waves · NORMAL");
    expect(lines).toContain("  3 shown, 90 ranked");
    expect(lines).toContain("  Use --limit 30 to see every entry");
  });

  it("queries the beta host with --beta", async () => {
    fetchMock.mockResolvedValueOnce(htmlResponse(readFixture("seasonal.html")));

    await run("--beta", "season", "--json");

    expect(requestedUrl(fetchMock).origin).toBe("https://beta.infinitode.prineside.com");
    expect(JSON.parse(printed(log)[0] ?? "")).toMatchObject({ method: "seasonalLeaderboard", season: "7" });
  });

  it("fails without a playerid when none is configured", async () => {
    await expect(run("rank", "5.1")).rejects.toThrow("process.exit(1)");

    expect(error).toHaveBeenCalledWith("\nFailed: No playerid given. Pass one or set INFINITODE_PLAYER_ID in .env");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("falls back to the configured player", async () => {
    vi.stubEnv("INFINITODE_PLAYER_ID", "U-AAAA-BBBB-CCCCCC");
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ status: "success", player: { rank: 5, score: 700, total: 90 }, leaderboards: [] }),
    );

    await run("rank", "5.1", "--json");

    expect(requestedUrl(fetchMock).searchParams.get("playerid")).toBe("U-AAAA-BBBB-CCCCCC");
    expect(JSON.parse(printed(log)[0] ?? "")).toMatchObject({ playerid: "U-AAAA-BBBB-CCCCCC", rank: 5, score: 700 });
  });
});
