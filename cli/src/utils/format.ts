/**
 * Terminal rendering for leaderboards, scores and profiles.
 *
 * Every renderer returns lines; commands decide where to print them.
 *
 * @module utils/format
 */

import chalk from "chalk";
import type { Leaderboard, Player, Score } from "infinitode-client";

const COLUMN_WIDTHS = [7, 24, 14];

export function padRight(str: string, width: number): string {
  const stripped = str.replace(/\x1B\[\d+m/g, "");
  const pad = Math.max(0, width - stripped.length);
  return str + " ".repeat(pad);
}

export function formatNumber(value: number | undefined): string {
  return value === undefined ? "-" : value.toLocaleString("en-US");
}

export function formatTop(top: number | undefined): string {
  return top === undefined ? "-" : `${top}%`;
}

/** Cells padded to the column widths; the last cell is left as is. */
function row(cells: string[]): string {
  return "  " + cells.map((cell, i) => (i < cells.length - 1 ? padRight(cell, COLUMN_WIDTHS[i] ?? 0) : cell)).join("");
}

export function boardTitle(board: Leaderboard): string {
  switch (board.method) {
    case "skillPointLeaderboard":
      return "Skill points";
    case "dailyQuestLeaderboards":
      return `Daily quest ${board.date ?? ""}`.trim();
    case "seasonalLeaderboard":
      return `Season ${board.season ?? "?"}`;
    case "runtimeLeaderboards":
      return `Runtime ${board.mapname} · ${board.mode} · ${board.difficulty}`;
    default:
      return `Map ${board.mapname} · ${board.mode} · ${board.difficulty}`;
  }
}

/**
 * Table of a board's entries, followed by the queried player's own
 * placement when the board carries one.
 */
export function renderLeaderboard(board: Leaderboard, options: { showTop?: boolean } = {}): string[] {
  const lines = [chalk.bold(`  ${boardTitle(board)}`), ""];

  if (board.isEmpty) {
    lines.push(chalk.dim("  No entries."));
  } else {
    lines.push(chalk.dim(row(["#", "Player", "Score", ...(options.showTop ? ["Top"] : [])])));
    lines.push(chalk.dim("  " + "─".repeat(options.showTop ? 50 : 45)));
    for (const score of board) {
      const cells = [
        chalk.yellow(score.rank === undefined ? "-" : String(score.rank)),
        score.nickname || chalk.dim(score.playerid),
        formatNumber(score.score),
      ];
      if (options.showTop) cells.push(score.top === undefined ? "" : formatTop(score.top));
      lines.push(row(cells).trimEnd());
    }
  }

  if (board.player) {
    const own = board.player;
    lines.push("");
    lines.push(
      `  ${chalk.bold("Queried player:")} #${own.rank ?? "-"} ${own.nickname ?? own.playerid} ${formatNumber(own.score)}` +
      (own.top === undefined ? "" : ` (top ${formatTop(own.top)})`),
    );
  }

  lines.push("");
  lines.push(chalk.dim(`  ${board.length} shown, ${formatNumber(board.total)} ranked`));
  return lines;
}

/** Detail view of a single placement. */
export function renderScore(score: Score): string[] {
  return [
    `  ${chalk.bold("Player:")}  ${score.nickname ?? "-"} ${chalk.dim(`(${score.playerid})`)}`,
    `  ${chalk.bold("Map:")}     ${score.mapname} · ${score.mode} · ${score.difficulty}`,
    `  ${chalk.bold("Rank:")}    ${score.rank === undefined ? "unranked" : `#${score.rank}`}` +
      (score.total === undefined ? "" : ` of ${formatNumber(score.total)}`),
    `  ${chalk.bold("Score:")}   ${chalk.yellow(formatNumber(score.score))}`,
    `  ${chalk.bold("Top:")}     ${formatTop(score.top)}`,
  ];
}

export interface FollowUps {
  dailyQuest: Score | undefined;
  skillPoint: Score | undefined;
}

/** Profile view; `followUps` adds the daily quest and skill point lines. */
export function renderPlayer(player: Player, followUps?: FollowUps): string[] {
  const lines = [
    `  ${chalk.bold(player.nickname)} ${chalk.dim(player.playerid)}`,
    "",
    `  Level:        ${player.level} (${formatNumber(player.xp)} / ${formatNumber(player.xpMax)} XP)`,
    `  Season:       level ${player.seasonLevel} (${formatNumber(player.seasonXp)} / ${formatNumber(player.seasonXpMax)} XP)`,
    `  Season total: ${formatNumber(player.totalScore)}, rank ${player.totalRank || "-"}, top ${formatTop(player.totalTop)}`,
    `  Replays:      ${formatNumber(player.replays)} verified, ${formatNumber(player.issues)} with issues`,
    `  Joined:       ${player.createdAt}`,
  ];

  if (followUps) {
    const placement = (s: Score | undefined) => (s?.rank === undefined ? "unranked" : `#${s.rank} (${formatNumber(s.score)})`);
    lines.push(`  Daily quest:  ${placement(followUps.dailyQuest)}`);
    lines.push(`  Skill points: ${placement(followUps.skillPoint)}`);
  }

  const mapnames = player.mapnames;
  if (mapnames.length > 0) {
    lines.push("", chalk.bold("  Maps:"));
    for (const mapname of mapnames) {
      const score = player.score(mapname);
      const detail = score.rank === undefined
        ? chalk.dim("not ranked")
        : `#${score.rank} of ${formatNumber(score.total)}  ${formatNumber(score.score)}  top ${formatTop(score.top)}`;
      lines.push(`    ${padRight(mapname, 8)}${detail}`);
    }
  }

  const badges = Object.entries(player.badges);
  if (badges.length > 0) {
    lines.push("", chalk.bold("  Badges:"));
    for (const [icon, badge] of badges) {
      lines.push(`    ${padRight(icon, 20)}${badge.rarity}`);
    }
  }

  return lines;
}
