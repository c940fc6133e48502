/**
 * Leaderboard manager for the Infinitode leaderboard client.
 *
 * Wraps the service's leaderboard endpoints: per-map boards, a player's
 * rank on a map, the in-game runtime board, the skill point board, the
 * daily quest board, and the scraped seasonal board.
 *
 * @module leaderboard
 */

import type { ConnectionManager } from "./connection.js";
import { Leaderboard } from "./models/leaderboard.js";
import { Score } from "./models/score.js";
import { parseSeasonalPage } from "./parsers/html.js";
import { parseLeaderboardResponse, parseRankResponse } from "./parsers/json.js";
import {
  formatUtcDate,
  normalizeDifficulty,
  normalizeMapname,
  normalizeMode,
  optionalPlayerId,
  parseIsoDate,
  requirePlayerId,
} from "./validation.js";
import type {
  BoardContext,
  DailyQuestLeaderboardsParams,
  Endpoint,
  LeaderboardsParams,
  LeaderboardsRankParams,
  QueryParams,
  RuntimeLeaderboardsParams,
  SeasonalLeaderboardParams,
  SkillPointLeaderboardParams,
} from "./types.js";

/** Fixed query parameters of every JSON API call, after `m` and `a`. */
const API_QUERY = {
  apiv: 1,
  g: "com.prineside.tdi2",
  v: 282,
} as const;

/** Game mode sent with every per-map request. */
const GAMEMODE = "BASIC_LEVELS";

const ACTIONS = {
  leaderboards: "getLeaderboards",
  leaderboardsRank: "getLeaderboardsRank",
  runtimeLeaderboards: "getRuntimeLeaderboards",
  skillPointLeaderboard: "getSkillPointLeaderboard",
  dailyQuestLeaderboards: "getDailyQuestLeaderboards",
} as const;

type ApiEndpoint = keyof typeof ACTIONS;

export class LeaderboardManager {
  private readonly connection: ConnectionManager;

  constructor(connection: ConnectionManager) {
    this.connection = connection;
  }

  /**
   * Top 200 scores of a map.
   *
   * @example
   * ```ts
   * const board = await client.leaderboards({ mapname: 5.1, mode: "waves" });
   * console.log(board.at(0).nickname);
   * ```
   */
  async leaderboards(params: LeaderboardsParams): Promise<Leaderboard> {
    const endpoint = "leaderboards";
    const context = this.mapContext(endpoint, params);
    const playerid = optionalPlayerId(params.playerid, endpoint);

    const text = await this.callApi(endpoint, this.mapQuery(context, playerid), params);
    return Leaderboard.fromRecord(context, parseLeaderboardResponse(endpoint, text, playerid));
  }

  /**
   * A single player's score on a map, wherever it ranks.
   */
  async leaderboardsRank(params: LeaderboardsRankParams): Promise<Score> {
    const endpoint = "leaderboardsRank";
    const context = this.mapContext(endpoint, params);
    const playerid = requirePlayerId(params.playerid, endpoint);

    const text = await this.callApi(endpoint, this.mapQuery(context, playerid), params);
    return new Score(context, parseRankResponse(endpoint, text, playerid));
  }

  /**
   * The board shown in-game while playing: the top scores plus one
   * entry per top-percentile bucket (1%–99%).
   */
  async runtimeLeaderboards(params: RuntimeLeaderboardsParams): Promise<Leaderboard> {
    const endpoint = "runtimeLeaderboards";
    const context = this.mapContext(endpoint, params);
    const playerid = requirePlayerId(params.playerid, endpoint);

    const text = await this.callApi(endpoint, this.mapQuery(context, playerid), params);
    return Leaderboard.fromRecord(context, parseLeaderboardResponse(endpoint, text, playerid));
  }

  /**
   * Top 3 skill point owners.
   */
  async skillPointLeaderboard(params: SkillPointLeaderboardParams = {}): Promise<Leaderboard> {
    const endpoint = "skillPointLeaderboard";
    const playerid = optionalPlayerId(params.playerid, endpoint);
    const context: BoardContext = { method: endpoint, mapname: "SP", mode: "score", difficulty: "NORMAL" };

    const text = await this.callApi(endpoint, { playerid }, params);
    return Leaderboard.fromRecord(context, parseLeaderboardResponse(endpoint, text, playerid));
  }

  /**
   * Top 200 daily quest players of a day. The service keeps only the
   * last few days; older dates come back as an empty board.
   */
  async dailyQuestLeaderboards(params: DailyQuestLeaderboardsParams = {}): Promise<Leaderboard> {
    const endpoint = "dailyQuestLeaderboards";
    const playerid = optionalPlayerId(params.playerid, endpoint);
    const date = this.normalizeDate(params.date, params.warn ?? true);
    const context: BoardContext = { method: endpoint, mapname: "DQ", mode: "score", difficulty: "NORMAL" };

    const text = await this.callApi(endpoint, { date, playerid }, params);
    return Leaderboard.fromRecord(context, parseLeaderboardResponse(endpoint, text, playerid), { date });
  }

  /**
   * Top 100 of the current season, scraped from the seasonal page.
   */
  async seasonalLeaderboard(params: SeasonalLeaderboardParams = {}): Promise<Leaderboard> {
    const endpoint = "seasonalLeaderboard";
    const text = await this.connection.get(
      "xdx/",
      { url: "seasonal_leaderboard" },
      { beta: params.beta, signal: params.signal, endpoint },
    );
    const context: BoardContext = { method: endpoint, mapname: "season", mode: "score", difficulty: "NORMAL" };
    return Leaderboard.fromRecord(context, parseSeasonalPage(text));
  }

  // ------------------------------------------------------------------
  //  Internal Helpers
  // ------------------------------------------------------------------

  private mapContext(
    endpoint: Endpoint,
    params: { mapname: string | number; mode?: string; difficulty?: string },
  ): BoardContext {
    return {
      method: endpoint,
      mapname: normalizeMapname(params.mapname, endpoint),
      mode: normalizeMode(params.mode, endpoint),
      difficulty: normalizeDifficulty(params.difficulty, endpoint),
    };
  }

  private mapQuery(context: BoardContext, playerid: string | undefined): QueryParams {
    return {
      gamemode: GAMEMODE,
      difficulty: context.difficulty,
      playerid,
      mapname: context.mapname,
      mode: context.mode,
    };
  }

  private callApi(
    endpoint: ApiEndpoint,
    query: QueryParams,
    options: { beta?: boolean; signal?: AbortSignal },
  ): Promise<string> {
    return this.connection.get(
      "",
      { m: "api", a: ACTIONS[endpoint], ...API_QUERY, ...query },
      { beta: options.beta, signal: options.signal, endpoint },
    );
  }

  /** "YYYY-MM-DD"; today (UTC) when absent or unparseable. */
  private normalizeDate(date: Date | string | undefined, warn: boolean): string {
    if (date === undefined) return formatUtcDate(new Date());
    if (date instanceof Date) {
      if (!Number.isNaN(date.getTime())) return formatUtcDate(date);
    } else {
      const parsed = parseIsoDate(date);
      if (parsed) return parsed;
    }
    const today = formatUtcDate(new Date());
    if (warn) {
      this.connection.logger.log("warn", "date.invalid", {
        endpoint: "dailyQuestLeaderboards",
        date: String(date),
        fallback: today,
      });
    }
    return today;
  }
}
