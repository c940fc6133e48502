/**
 * Infinitode Leaderboard Client — Entry Point
 *
 * Typed access to the Infinitode leaderboard service: per-map,
 * runtime, skill point, daily quest and seasonal boards, and player
 * profiles.
 *
 * @example
 * ```ts
 * import { InfinitodeClient } from "infinitode-client";
 *
 * await InfinitodeClient.with({}, async (client) => {
 *   const board = await client.leaderboards({ mapname: "5.1", mode: "waves" });
 *   console.log(board.formatScores());
 *
 *   const player = await client.player({ playerid: board.at(0).playerid });
 *   await player.fetchDailyQuest(client);
 *   console.log(player.nickname, player.dailyQuest?.rank);
 * });
 * ```
 *
 * @packageDocumentation
 */

import { ConnectionManager } from "./connection.js";
import { LeaderboardManager } from "./leaderboard.js";
import { PlayerManager } from "./players.js";
import type { Leaderboard } from "./models/leaderboard.js";
import type { Player, FollowUpSource } from "./models/player.js";
import type { Score, PlayerSource } from "./models/score.js";
import type {
  ClientConfig,
  ConnectionState,
  DailyQuestLeaderboardsParams,
  LeaderboardsParams,
  LeaderboardsRankParams,
  PlayerParams,
  RuntimeLeaderboardsParams,
  SeasonalLeaderboardParams,
  SkillPointLeaderboardParams,
} from "./types.js";

// ---- Type re-exports ----
export type {
  ClientConfig,
  ConnectionState,
  QueryParams,
  RequestOptions,
  Mode,
  Difficulty,
  MapName,
  Endpoint,
  LeaderboardsParams,
  LeaderboardsRankParams,
  RuntimeLeaderboardsParams,
  SkillPointLeaderboardParams,
  DailyQuestLeaderboardsParams,
  SeasonalLeaderboardParams,
  PlayerParams,
  BadgeRecord,
  ScoreRecord,
  LeaderboardRecord,
  PlayerLevelRecord,
  PlayerBadge,
  PlayerRecord,
  BoardContext,
} from "./types.js";
export { MODES, DIFFICULTIES } from "./types.js";

// ---- Module re-exports ----
export { ConnectionManager, DEFAULT_BASE_URL, DEFAULT_BETA_BASE_URL } from "./connection.js";
export { LeaderboardManager } from "./leaderboard.js";
export { PlayerManager } from "./players.js";
export { Badge } from "./models/badge.js";
export { Score } from "./models/score.js";
export type { PlayerSource } from "./models/score.js";
export { Leaderboard } from "./models/leaderboard.js";
export type { LeaderboardMeta } from "./models/leaderboard.js";
export { Player } from "./models/player.js";
export type { FollowUpSource } from "./models/player.js";
export {
  InfinitodeError,
  BadArgumentError,
  NetworkError,
  SessionClosedError,
  ApiError,
  MalformedResponseError,
  PageStructureError,
  OutOfRangeError,
  NotFetchedError,
} from "./errors.js";
export { createConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { KNOWN_MAPS, isKnownMap } from "./maps.js";
export { isValidPlayerId } from "./validation.js";
export { parseLeaderboardResponse, parseRankResponse, decodeEnvelope } from "./parsers/json.js";
export { parseSeasonalPage, parsePlayerPage } from "./parsers/html.js";

/**
 * The Infinitode leaderboard client.
 *
 * Owns one {@link ConnectionManager}; every operation validates its
 * arguments, issues a single GET, and returns typed objects. Close it
 * when done, or use {@link InfinitodeClient.with} to have it closed for you.
 */
export class InfinitodeClient implements PlayerSource, FollowUpSource {
  /** Connection manager — HTTP session, base URLs, logging. */
  public readonly connection: ConnectionManager;

  /** Leaderboard manager — the six leaderboard endpoints. */
  public readonly boards: LeaderboardManager;

  /** Player manager — profile pages. */
  public readonly players: PlayerManager;

  constructor(config: ClientConfig = {}) {
    this.connection = new ConnectionManager(config);
    this.boards = new LeaderboardManager(this.connection);
    this.players = new PlayerManager(this.connection);
  }

  /** Create a client and check it is usable. */
  static open(config: ClientConfig = {}): InfinitodeClient {
    const client = new InfinitodeClient(config);
    client.connection.open();
    return client;
  }

  /**
   * Run `fn` with a fresh client and close it afterwards, whether `fn`
   * resolves or throws.
   */
  static async with<T>(config: ClientConfig, fn: (client: InfinitodeClient) => Promise<T>): Promise<T> {
    const client = InfinitodeClient.open(config);
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  /** Close the session. In-flight requests are aborted; later calls fail. */
  async close(): Promise<void> {
    return this.connection.close();
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  // ============================================================
  //  Operations
  // ============================================================

  /** Top 200 of a map. See {@link LeaderboardManager.leaderboards}. */
  leaderboards(params: LeaderboardsParams): Promise<Leaderboard> {
    return this.boards.leaderboards(params);
  }

  /** One player's score on a map. */
  leaderboardsRank(params: LeaderboardsRankParams): Promise<Score> {
    return this.boards.leaderboardsRank(params);
  }

  /** In-game runtime board with percentile entries. */
  runtimeLeaderboards(params: RuntimeLeaderboardsParams): Promise<Leaderboard> {
    return this.boards.runtimeLeaderboards(params);
  }

  /** Top 3 skill point owners. */
  skillPointLeaderboard(params: SkillPointLeaderboardParams = {}): Promise<Leaderboard> {
    return this.boards.skillPointLeaderboard(params);
  }

  /** Daily quest board of a day (default today, UTC). */
  dailyQuestLeaderboards(params: DailyQuestLeaderboardsParams = {}): Promise<Leaderboard> {
    return this.boards.dailyQuestLeaderboards(params);
  }

  /** Top 100 of the current season. */
  seasonalLeaderboard(params: SeasonalLeaderboardParams = {}): Promise<Leaderboard> {
    return this.boards.seasonalLeaderboard(params);
  }

  /** A player's profile. */
  player(params: PlayerParams): Promise<Player> {
    return this.players.get(params);
  }
}
