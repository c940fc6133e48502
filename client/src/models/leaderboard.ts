/**
 * An ordered, immutable run of Scores with board metadata.
 *
 * @module models/leaderboard
 */

import { OutOfRangeError } from "../errors.js";
import { Score } from "./score.js";
import type { BoardContext, Difficulty, Endpoint, LeaderboardRecord, Mode } from "../types.js";

/** Metadata shared by a board and every slice taken from it. */
export interface LeaderboardMeta extends BoardContext {
  total: number;
  date?: string;
  season?: string;
  player?: Score;
  raw: Record<string, unknown>;
}

export class Leaderboard implements Iterable<Score> {
  /** Operation that produced this board. */
  readonly method: Endpoint;
  readonly mapname: string;
  readonly mode: Mode;
  readonly difficulty: Difficulty;
  /** Total ranked players on the board. */
  readonly total: number;
  /** Day of a daily quest board ("YYYY-MM-DD"). */
  readonly date: string | undefined;
  /** Season of the seasonal board. */
  readonly season: string | undefined;
  /**
   * The queried player's own entry, present only when a playerid was
   * given and the player is ranked. May lie outside the returned window.
   */
  readonly player: Score | undefined;
  /** Decoded response the board was built from. */
  readonly raw: Record<string, unknown>;

  private readonly scores: readonly Score[];

  constructor(meta: LeaderboardMeta, scores: readonly Score[]) {
    this.method = meta.method;
    this.mapname = meta.mapname;
    this.mode = meta.mode;
    this.difficulty = meta.difficulty;
    this.total = meta.total;
    this.date = meta.date;
    this.season = meta.season;
    this.player = meta.player;
    this.raw = meta.raw;
    this.scores = Object.freeze([...scores]);
  }

  /**
   * Build a board from a parsed response. Entries are ranked 1..n in
   * response order.
   */
  static fromRecord(
    context: BoardContext,
    record: LeaderboardRecord,
    extra: { date?: string } = {},
  ): Leaderboard {
    const scores = record.entries.map(
      (entry, i) => new Score(context, { ...entry, rank: i + 1 }),
    );
    return new Leaderboard(
      {
        ...context,
        total: record.total,
        date: extra.date,
        season: record.season,
        player: record.player ? new Score(context, record.player) : undefined,
        raw: record.raw,
      },
      scores,
    );
  }

  get length(): number {
    return this.scores.length;
  }

  get isEmpty(): boolean {
    return this.scores.length === 0;
  }

  /**
   * Score at position `index`.
   *
   * @throws OutOfRangeError when `index` is outside `[0, length)`.
   */
  at(index: number): Score {
    if (!Number.isInteger(index) || index < 0 || index >= this.scores.length) {
      throw new OutOfRangeError(index, this.scores.length);
    }
    return this.scores[index];
  }

  /**
   * A new board with the same metadata and the entries `Array.prototype.slice`
   * would select. Bounds are clamped; negative values count from the end.
   */
  slice(start?: number, end?: number): Leaderboard {
    return new Leaderboard(this.meta(), this.scores.slice(start, end));
  }

  includes(score: Score): boolean {
    return this.scores.includes(score);
  }

  find(predicate: (score: Score, index: number) => boolean): Score | undefined {
    return this.scores.find(predicate);
  }

  /** First score whose `key` equals `value`, e.g. `getScore("nickname", "Sprylos")`. */
  getScore<K extends keyof Score>(key: K, value: Score[K]): Score | undefined {
    return this.scores.find((s) => s[key] === value);
  }

  /** Copy of the underlying entries. */
  toArray(): Score[] {
    return [...this.scores];
  }

  /** Every entry formatted with {@link Score.format}, one per line. */
  formatScores(): string {
    return this.scores.map((s) => s.format()).join("\n");
  }

  [Symbol.iterator](): Iterator<Score> {
    return this.scores[Symbol.iterator]();
  }

  toJSON(): Record<string, unknown> {
    return {
      method: this.method,
      mapname: this.mapname,
      mode: this.mode,
      difficulty: this.difficulty,
      total: this.total,
      date: this.date,
      season: this.season,
      player: this.player?.toJSON(),
      scores: this.scores.map((s) => s.toJSON()),
    };
  }

  private meta(): LeaderboardMeta {
    return {
      method: this.method,
      mapname: this.mapname,
      mode: this.mode,
      difficulty: this.difficulty,
      total: this.total,
      date: this.date,
      season: this.season,
      player: this.player,
      raw: this.raw,
    };
  }
}
