/**
 * Type definitions for the Infinitode leaderboard client.
 *
 * @module types
 */

import type { Logger } from "./logger.js";

// ============================================================
//                     CONFIGURATION
// ============================================================

/** Configuration for {@link InfinitodeClient} and {@link ConnectionManager}. */
export interface ClientConfig {
  /** Production base URL (default: "https://infinitode.prineside.com/") */
  baseUrl?: string;

  /** Beta servers base URL (default: "https://beta.infinitode.prineside.com/") */
  betaBaseUrl?: string;

  /**
   * Log sink. Receives an `info` entry per outgoing request and a
   * `debug` entry with every raw response body.
   * Defaults to a console logger at level "warn".
   */
  logger?: Logger;

  /** User-Agent header sent with every request. */
  userAgent?: string;
}

// ============================================================
//                     CONNECTION
// ============================================================

/** Lifetime state of a connection. */
export type ConnectionState = "open" | "closed";

/** Query parameters for a GET. `undefined` values are dropped. */
export type QueryParams = Record<string, string | number | undefined>;

/** Per-request options. */
export interface RequestOptions {
  /** Route the request to the beta servers. */
  beta?: boolean;
  /** Aborts this request only. */
  signal?: AbortSignal;
  /** Endpoint name used in logs and errors. */
  endpoint?: Endpoint;
}

// ============================================================
//                     GAME ENUMS
// ============================================================

export const MODES = ["score", "waves"] as const;

export const DIFFICULTIES = ["EASY", "NORMAL", "ENDLESS_I"] as const;

/** Leaderboard mode. */
export type Mode = (typeof MODES)[number];

/** Leaderboard difficulty. */
export type Difficulty = (typeof DIFFICULTIES)[number];

/** A map name as accepted from callers; numbers are stringified. */
export type MapName = string | number;

/** Names of the public operations, used to tag results and errors. */
export type Endpoint =
  | "leaderboards"
  | "leaderboardsRank"
  | "runtimeLeaderboards"
  | "skillPointLeaderboard"
  | "dailyQuestLeaderboards"
  | "seasonalLeaderboard"
  | "player";

// ============================================================
//                     OPERATION PARAMETERS
// ============================================================

interface BetaOption {
  /** Query the beta servers instead of production. */
  beta?: boolean;
  /** Aborts the underlying request. */
  signal?: AbortSignal;
}

export interface LeaderboardsParams extends BetaOption {
  mapname: MapName;
  playerid?: string;
  mode?: Mode;
  difficulty?: Difficulty;
}

export interface LeaderboardsRankParams extends BetaOption {
  mapname: MapName;
  playerid: string;
  mode?: Mode;
  difficulty?: Difficulty;
}

export interface RuntimeLeaderboardsParams extends BetaOption {
  mapname: MapName;
  playerid: string;
  mode?: Mode;
  difficulty?: Difficulty;
}

export interface SkillPointLeaderboardParams extends BetaOption {
  playerid?: string;
}

export interface DailyQuestLeaderboardsParams extends BetaOption {
  /** `Date` or "YYYY-MM-DD". Defaults to today (UTC). */
  date?: Date | string;
  playerid?: string;
  /** Log a warning when `date` cannot be parsed (default: true). */
  warn?: boolean;
}

export type SeasonalLeaderboardParams = BetaOption;

export interface PlayerParams extends BetaOption {
  playerid: string;
}

// ============================================================
//                     NORMALIZED RECORDS
// ============================================================

/** Pinned badge as sent by the service. */
export interface BadgeRecord {
  iconImg: string;
  iconColor: string;
  overlayImg: string;
  overlayColor: string;
}

/** One leaderboard entry after validation and numeric coercion. */
export interface ScoreRecord {
  playerid: string;
  rank?: number;
  score?: number;
  nickname?: string;
  level?: number;
  hasPfp?: boolean;
  pinnedBadge?: BadgeRecord;
  position?: number;
  top?: number;
  total?: number;
}

/** A whole leaderboard response after validation. */
export interface LeaderboardRecord {
  entries: ScoreRecord[];
  /** Total ranked players. */
  total: number;
  /** The queried player's own entry, as sent by the service. */
  player?: ScoreRecord;
  season?: string;
  raw: Record<string, unknown>;
}

/** One row of the per-map table on a profile page. */
export interface PlayerLevelRecord {
  mapname: string;
  rank?: number;
  score?: number;
  total?: number;
  top?: number;
}

/** Badge shown on a profile page. */
export interface PlayerBadge {
  rarity: string;
  color: string;
}

/** A profile page after scraping. */
export interface PlayerRecord {
  playerid: string;
  nickname: string;
  level: number;
  xp: number;
  xpMax: number;
  seasonLevel: number;
  seasonXp: number;
  seasonXpMax: number;
  totalScore: number;
  totalRank: number;
  totalTop?: number;
  replays: number;
  issues: number;
  createdAt: string;
  levels: PlayerLevelRecord[];
  badges: Record<string, PlayerBadge>;
}

/** Map/mode/difficulty a Score or Leaderboard belongs to. */
export interface BoardContext {
  method: Endpoint;
  mapname: string;
  mode: Mode;
  difficulty: Difficulty;
}
