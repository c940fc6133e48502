/**
 * A single placement of one player on one leaderboard.
 *
 * @module models/score
 */

import { Badge } from "./badge.js";
import { InfinitodeError } from "../errors.js";
import type { Player } from "./player.js";
import type {
  BoardContext,
  Difficulty,
  Endpoint,
  Mode,
  PlayerParams,
  ScoreRecord,
} from "../types.js";

/** Anything that can load a profile; {@link InfinitodeClient} satisfies it. */
export interface PlayerSource {
  player(params: PlayerParams): Promise<Player>;
}

const NICKNAME_WIDTH = 22;
const NICKNAME_MAX = 21;

export class Score {
  /** Operation that produced this score. */
  readonly method: Endpoint;
  readonly mapname: string;
  readonly mode: Mode;
  readonly difficulty: Difficulty;
  readonly playerid: string;

  /** 1-based placement; absent when the player is unranked. */
  readonly rank: number | undefined;
  /** Points (or waves). Absent for blank entries, which EASY boards send. */
  readonly score: number | undefined;

  readonly nickname: string | undefined;
  /** XP level of the player. */
  readonly level: number | undefined;
  readonly hasPfp: boolean | undefined;
  readonly pinnedBadge: Badge | undefined;
  /** Placement as reported by the server; unreliable beyond the top 200. */
  readonly position: number | undefined;
  /** Top percentile, e.g. `12.5` for "12.5%". */
  readonly top: number | undefined;
  /** Ranked players on the board, when the service sends it. */
  readonly total: number | undefined;

  private _player: Player | undefined;

  constructor(context: BoardContext, record: ScoreRecord) {
    this.method = context.method;
    this.mapname = context.mapname;
    this.mode = context.mode;
    this.difficulty = context.difficulty;
    this.playerid = record.playerid;
    this.rank = record.rank;
    this.score = record.score;
    this.nickname = record.nickname;
    this.level = record.level;
    this.hasPfp = record.hasPfp;
    this.pinnedBadge = record.pinnedBadge ? new Badge(record.pinnedBadge) : undefined;
    this.position = record.position;
    this.top = record.top;
    this.total = record.total;
  }

  /** Whether the entry carries a score at all. */
  get hasScore(): boolean {
    return this.score !== undefined;
  }

  /** The profile, once {@link fetchPlayer} has loaded it. */
  get player(): Player | undefined {
    return this._player;
  }

  /**
   * Load the profile of this score's player. The result is kept, so
   * later calls return it without a request.
   */
  async fetchPlayer(source: PlayerSource): Promise<Player> {
    if (this._player === undefined) {
      this._player = await source.player({ playerid: this.playerid });
    }
    return this._player;
  }

  /**
   * One fixed-width line: rank, nickname and score with thousands separators.
   */
  format(): string {
    if (this.nickname === undefined) {
      throw new InfinitodeError(
        "Score cannot be formatted: there is no nickname attached to it",
        this.method,
      );
    }
    const nickname = this.nickname.length < NICKNAME_MAX
      ? this.nickname
      : `${this.nickname.slice(0, 19)}...`;
    const rank = this.rank === undefined ? "-" : String(this.rank);
    const score = this.score === undefined ? "-" : this.score.toLocaleString("en-US");
    return `#${rank.padEnd(5)} ${nickname.padEnd(NICKNAME_WIDTH)} ${score}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      method: this.method,
      mapname: this.mapname,
      mode: this.mode,
      difficulty: this.difficulty,
      playerid: this.playerid,
      rank: this.rank,
      score: this.score,
      nickname: this.nickname,
      level: this.level,
      hasPfp: this.hasPfp,
      pinnedBadge: this.pinnedBadge?.toJSON(),
      position: this.position,
      top: this.top,
      total: this.total,
    };
  }
}
