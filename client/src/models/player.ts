/**
 * An account profile scraped from the profile page, plus the daily quest
 * and skill point scores that need a follow-up request.
 *
 * @module models/player
 */

import { NotFetchedError } from "../errors.js";
import { normalizeMapname } from "../validation.js";
import { Score } from "./score.js";
import type { Leaderboard } from "./leaderboard.js";
import type {
  DailyQuestLeaderboardsParams,
  MapName,
  PlayerBadge,
  PlayerRecord,
  SkillPointLeaderboardParams,
} from "../types.js";

/** Anything that can load the follow-up boards; {@link InfinitodeClient} satisfies it. */
export interface FollowUpSource {
  dailyQuestLeaderboards(params?: DailyQuestLeaderboardsParams): Promise<Leaderboard>;
  skillPointLeaderboard(params?: SkillPointLeaderboardParams): Promise<Leaderboard>;
}

/** Follow-up slot: `{ fetched: false }` until the request has run. */
type FollowUp = { fetched: false } | { fetched: true; score: Score | undefined };

export class Player {
  readonly playerid: string;
  readonly nickname: string;
  /** XP level. */
  readonly level: number;
  /** XP within the current level. */
  readonly xp: number;
  /** XP needed for the next level. */
  readonly xpMax: number;
  readonly seasonLevel: number;
  readonly seasonXp: number;
  readonly seasonXpMax: number;
  /** Seasonal total score. */
  readonly totalScore: number;
  /** Seasonal placement; 0 when unranked. */
  readonly totalRank: number;
  /** Seasonal top percentile. */
  readonly totalTop: number | undefined;
  /** Verified replays. */
  readonly replays: number;
  /** Replays that failed verification. */
  readonly issues: number;
  /** Account creation day, "YYYY-MM-DD". */
  readonly createdAt: string;
  /** Badge icon → rarity and colour. */
  readonly badges: Readonly<Record<string, PlayerBadge>>;
  /** Whether the profile came from the beta servers. */
  readonly beta: boolean;
  /**
   * Avatar URL. Always set; points at a missing image when the player
   * has no profile picture.
   */
  readonly avatarLink: string;

  private readonly levels: ReadonlyMap<string, Score>;
  private dailyQuestSlot: FollowUp = { fetched: false };
  private skillPointSlot: FollowUp = { fetched: false };

  constructor(record: PlayerRecord, options: { baseUrl: string; beta?: boolean }) {
    this.playerid = record.playerid;
    this.nickname = record.nickname;
    this.level = record.level;
    this.xp = record.xp;
    this.xpMax = record.xpMax;
    this.seasonLevel = record.seasonLevel;
    this.seasonXp = record.seasonXp;
    this.seasonXpMax = record.seasonXpMax;
    this.totalScore = record.totalScore;
    this.totalRank = record.totalRank;
    this.totalTop = record.totalTop;
    this.replays = record.replays;
    this.issues = record.issues;
    this.createdAt = record.createdAt;
    this.badges = Object.freeze({ ...record.badges });
    this.beta = options.beta ?? false;
    this.avatarLink = `${options.baseUrl}img/avatars/${encodeURIComponent(record.playerid)}-128.png`;

    const levels = new Map<string, Score>();
    for (const row of record.levels) {
      levels.set(
        row.mapname,
        new Score(
          { method: "player", mapname: row.mapname, mode: "score", difficulty: "NORMAL" },
          {
            playerid: record.playerid,
            rank: row.rank,
            score: row.score,
            total: row.total,
            top: row.top,
            level: record.level,
            nickname: record.nickname,
          },
        ),
      );
    }
    this.levels = levels;
  }

  /** Maps listed on the profile. */
  get mapnames(): string[] {
    return [...this.levels.keys()];
  }

  /**
   * The player's own score on `mapname`, from the profile page. Unranked
   * and unlisted maps give a Score without rank or score.
   *
   * @throws BadArgumentError when `mapname` is not a known map.
   */
  score(mapname: MapName): Score {
    const listed = this.levels.get(String(mapname).trim());
    if (listed) return listed;

    const known = normalizeMapname(mapname, "player");
    return new Score(
      { method: "player", mapname: known, mode: "score", difficulty: "NORMAL" },
      { playerid: this.playerid, nickname: this.nickname, level: this.level },
    );
  }

  /**
   * Daily quest score.
   *
   * @throws NotFetchedError before {@link fetchDailyQuest} has run.
   */
  get dailyQuest(): Score | undefined {
    if (!this.dailyQuestSlot.fetched) {
      throw new NotFetchedError("dailyQuest", "fetchDailyQuest");
    }
    return this.dailyQuestSlot.score;
  }

  /**
   * Skill point score.
   *
   * @throws NotFetchedError before {@link fetchSkillPoint} has run.
   */
  get skillPoint(): Score | undefined {
    if (!this.skillPointSlot.fetched) {
      throw new NotFetchedError("skillPoint", "fetchSkillPoint");
    }
    return this.skillPointSlot.score;
  }

  /**
   * Load today's daily quest placement and keep it on the player. Later
   * calls resolve to the kept score without a request. Resolves to
   * `undefined` when the player is unranked.
   */
  async fetchDailyQuest(source: FollowUpSource): Promise<Score | undefined> {
    if (this.dailyQuestSlot.fetched) return this.dailyQuestSlot.score;
    const board = await source.dailyQuestLeaderboards({ playerid: this.playerid, beta: this.beta });
    this.dailyQuestSlot = { fetched: true, score: board.player };
    return board.player;
  }

  /**
   * Load the skill point placement and keep it on the player. Later
   * calls resolve to the kept score without a request. Resolves to
   * `undefined` when the player is unranked.
   */
  async fetchSkillPoint(source: FollowUpSource): Promise<Score | undefined> {
    if (this.skillPointSlot.fetched) return this.skillPointSlot.score;
    const board = await source.skillPointLeaderboard({ playerid: this.playerid, beta: this.beta });
    this.skillPointSlot = { fetched: true, score: board.player };
    return board.player;
  }

  toJSON(): Record<string, unknown> {
    return {
      playerid: this.playerid,
      nickname: this.nickname,
      level: this.level,
      xp: this.xp,
      xpMax: this.xpMax,
      seasonLevel: this.seasonLevel,
      seasonXp: this.seasonXp,
      seasonXpMax: this.seasonXpMax,
      totalScore: this.totalScore,
      totalRank: this.totalRank,
      totalTop: this.totalTop,
      replays: this.replays,
      issues: this.issues,
      createdAt: this.createdAt,
      avatarLink: this.avatarLink,
      badges: this.badges,
      levels: Object.fromEntries([...this.levels].map(([k, s]) => [k, s.toJSON()])),
      dailyQuest: this.dailyQuestSlot.fetched ? this.dailyQuestSlot.score?.toJSON() : undefined,
      skillPoint: this.skillPointSlot.fetched ? this.skillPointSlot.score?.toJSON() : undefined,
    };
  }
}
