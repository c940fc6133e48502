/**
 * Scrapers for the two endpoints that only serve HTML: the seasonal
 * leaderboard and the player profile.
 *
 * Values are read positionally from fixed layout markers. When a
 * required marker is missing the page format has changed, and the
 * scrape fails with {@link PageStructureError} instead of returning a
 * partial record.
 *
 * @module parsers/html
 */

import { PageStructureError } from "../errors.js";
import { findComments, findElement, findElements, stripComments } from "./markup.js";
import type { MarkupElement } from "./markup.js";
import type {
  LeaderboardRecord,
  PlayerBadge,
  PlayerLevelRecord,
  PlayerRecord,
  ScoreRecord,
} from "../types.js";

// ============================================================
//  Constants
// ============================================================

const RARITIES = new Set([
  "not-received",
  "common",
  "rare",
  "very-rare",
  "epic",
  "legendary",
  "supreme",
  "artifact",
]);

const MONTHS: Record<string, number> = {
  january: 1, february: 2, march: 3, april: 4, may: 5, june: 6,
  july: 7, august: 8, september: 9, october: 10, november: 11, december: 12,
};

/** Season XP defaults for players without a season block. */
const DEFAULT_SEASON = { seasonXp: 0, seasonXpMax: 500, seasonLevel: 1 };

// ============================================================
//  Helpers
// ============================================================

/** Integer from text such as "12,345"; `undefined` when there is none. */
function parseIntText(text: string): number | undefined {
  const cleaned = text.replace(/[,\s]/g, "");
  if (!/^-?\d+$/.test(cleaned)) return undefined;
  return parseInt(cleaned, 10);
}

/** Percentile from text such as "12.5%" or "- Top 3.2%"; "-%" is absent. */
export function parseTopText(text: string): number | undefined {
  const match = /(\d+(?:\.\d+)?)\s*%/.exec(text);
  return match ? parseFloat(match[1]) : undefined;
}

/** Unwrap an i18n argument list attribute such as `["1,234"]`. */
function i18nArgument(value: string): string {
  return value.replace(/^\s*\[\s*"?/, "").replace(/"?\s*\]\s*$/, "");
}

function requireElement(
  html: string,
  tag: string,
  filter: Record<string, string | true>,
  endpoint: "seasonalLeaderboard" | "player",
): MarkupElement {
  const el = findElement(html, tag, filter);
  if (!el) {
    throw new PageStructureError(endpoint, describeMarker(tag, filter));
  }
  return el;
}

function describeMarker(tag: string, filter: Record<string, string | true>): string {
  const attrs = Object.entries(filter)
    .map(([k, v]) => (v === true ? `[${k}]` : `[${k}="${v}"]`))
    .join("");
  return `${tag}${attrs}`;
}

/** "a / b" as two integers. */
function parseRatio(text: string): [number, number] | undefined {
  const match = /^\s*([\d,]+)\s*\/\s*([\d,]+)\s*$/.exec(text);
  if (!match) return undefined;
  const a = parseIntText(match[1]);
  const b = parseIntText(match[2]);
  return a === undefined || b === undefined ? undefined : [a, b];
}

/** Last path segment after `prefix`, without a file extension. */
function assetName(src: string, prefix: string): string | undefined {
  const at = src.lastIndexOf(prefix);
  if (at < 0) return undefined;
  return src.slice(at + prefix.length).replace(/\.[a-z0-9]+$/i, "");
}

// ============================================================
//  Seasonal leaderboard
// ============================================================

/**
 * Scrape the seasonal leaderboard page (top 100 of the season).
 *
 * Markers: the season and player count labels, one `div[x="90"]` per
 * row, and per row a name label carrying the player link plus a
 * right-aligned score label.
 */
export function parseSeasonalPage(html: string): LeaderboardRecord {
  const endpoint = "seasonalLeaderboard";
  const doc = stripComments(html);

  const seasonLabel = requireElement(doc, "label", { i18n: "season_formatted", i18nf: true }, endpoint);
  const season = i18nArgument(seasonLabel.attrs.i18nf).trim();
  if (!season) {
    throw new PageStructureError(endpoint, "season number");
  }

  const countLabel = requireElement(doc, "label", { i18n: "player_count_formatted", i18nf: true }, endpoint);
  const total = parseIntText(i18nArgument(countLabel.attrs.i18nf));
  if (total === undefined) {
    throw new PageStructureError(endpoint, "player count");
  }

  const rows = findElements(doc, "div", { x: "90" });
  if (rows.length === 0) {
    throw new PageStructureError(endpoint, 'div[x="90"]');
  }
  const names = findElements(doc, "label", { color: "LIGHT_BLUE:P300" });
  const scores = findElements(doc, "label", { nowrap: "true", "text-align": "right" });
  if (names.length < rows.length) {
    throw new PageStructureError(endpoint, 'label[color="LIGHT_BLUE:P300"]');
  }
  if (scores.length < rows.length) {
    throw new PageStructureError(endpoint, 'label[nowrap="true"][text-align="right"]');
  }

  const entries: ScoreRecord[] = rows.map((_row, i) => {
    const name = names[i];
    const playerid = /id=([^&"'\s]+)/.exec(name.attrs.click ?? "")?.[1];
    if (!playerid) {
      throw new PageStructureError(endpoint, `player link of row ${i + 1}`);
    }
    const score = parseIntText(scores[i].text);
    if (score === undefined) {
      throw new PageStructureError(endpoint, `score of row ${i + 1}`);
    }
    return { playerid, nickname: name.text, score };
  });

  return {
    entries,
    total,
    season,
    raw: { season, total, entries },
  };
}

// ============================================================
//  Player profile
// ============================================================

/**
 * Scrape a profile page.
 *
 * Required: the nickname label, the XP block and the trailing info
 * table. Totals, season progress, the level comment, per-map rows and
 * badges fall back to defaults when absent.
 */
export function parsePlayerPage(html: string, playerid: string): PlayerRecord {
  const doc = stripComments(html);

  const nicknameLabel = findElements(doc, "label").find((l) => !("i18n" in l.attrs));
  if (!nicknameLabel || !nicknameLabel.text) {
    throw new PageStructureError("player", "nickname label");
  }
  const nickname = nicknameLabel.text;
  const level = parseLevel(html);

  return {
    playerid,
    nickname,
    level,
    ...parseTotals(doc),
    ...parseXp(doc),
    ...parseSeason(doc),
    levels: parseLevels(doc),
    badges: parseBadges(doc),
    ...parseMisc(doc),
  };
}

function parseTotals(doc: string): Pick<PlayerRecord, "totalScore" | "totalRank" | "totalTop"> {
  const block = findElement(doc, "div", { width: "522", height: "140", align: "center" });
  const labels = block ? findElements(block.inner, "label") : [];
  if (labels.length < 4) {
    return { totalScore: 0, totalRank: 0, totalTop: undefined };
  }
  return {
    totalScore: parseIntText(labels[1].text) ?? 0,
    totalRank: parseIntText(labels[2].text) ?? 0,
    totalTop: parseTopText(labels[3].text),
  };
}

/** The XP level sits in a comment: `<!-- <label>Level:</label><label>42</label> -->`. */
function parseLevel(html: string): number {
  for (const comment of findComments(html)) {
    if (!comment.includes("Level:")) continue;
    const match = /Level:[\s\S]*?>\s*(\d+)\s*</.exec(comment);
    if (match) return parseInt(match[1], 10);
  }
  return 1;
}

function parseXp(doc: string): Pick<PlayerRecord, "xp" | "xpMax"> {
  const block = requireElement(doc, "div", { width: "330", height: "64" }, "player");
  const label = findElement(block.inner, "label");
  const ratio = label ? parseRatio(label.text) : undefined;
  if (!ratio) {
    throw new PageStructureError("player", "xp label");
  }
  return { xp: ratio[0], xpMax: ratio[1] };
}

function parseSeason(doc: string): Pick<PlayerRecord, "seasonXp" | "seasonXpMax" | "seasonLevel"> {
  const block = findElement(doc, "div", {
    width: "530",
    align: "center",
    height: "64",
    "pad-bottom": "10",
  });
  if (!block) return { ...DEFAULT_SEASON };

  const label = findElement(block.inner, "label");
  const ratio = label ? parseRatio(label.text) : undefined;
  if (!ratio) {
    throw new PageStructureError("player", "season xp label");
  }

  const levelBlock = findElement(block.inner, "div", { x: "466", width: "64", height: "64" });
  const seasonLevel = levelBlock?.attrs.data
    ? parseIntText(levelBlock.attrs.data.split(":")[1] ?? "") ?? 1
    : 1;

  return { seasonXp: ratio[0], seasonXpMax: ratio[1], seasonLevel };
}

/** Per-map rows; the first row is the table header. */
function parseLevels(doc: string): PlayerLevelRecord[] {
  const rows = findElements(doc, "div", { width: "800", height: "40" }).slice(1);
  const levels: PlayerLevelRecord[] = [];
  for (const row of rows) {
    const labels = findElements(row.inner, "label");
    if (labels.length === 0) continue;
    const mapname = labels[0].text;
    if (findElement(row.inner, "label", { i18n: "not_ranked" })) {
      levels.push({ mapname });
      continue;
    }
    if (labels.length < 4) {
      throw new PageStructureError("player", `score row for ${mapname}`);
    }
    levels.push({
      mapname,
      score: parseIntText(labels[1].text),
      rank: parseIntText(labels[2].text),
      total: parseIntText(labels[3].text.replace("/", "")),
      top: parseTopText(labels[labels.length - 1].text),
    });
  }
  return levels;
}

function parseBadges(doc: string): Record<string, PlayerBadge> {
  const badges: Record<string, PlayerBadge> = {};
  for (const block of findElements(doc, "div", { width: "80", height: "80" })) {
    const imgs = findElements(block.inner, "img");
    if (imgs.length < 2) continue;
    const rarity = assetName(imgs[0].attrs.src ?? "", "bg-");
    const icon = assetName(imgs[1].attrs.src ?? "", "icon-");
    if (!rarity || !icon || !RARITIES.has(rarity)) continue;
    badges[icon] = { rarity, color: imgs[imgs.length - 1].attrs.color ?? "" };
  }
  return badges;
}

/**
 * The last info table ends with three labels: verified replays, replays
 * with issues, and the registration date.
 */
function parseMisc(doc: string): Pick<PlayerRecord, "replays" | "issues" | "createdAt"> {
  const tables = findElements(doc, "table", { width: "800", align: "center" });
  const table = tables[tables.length - 1];
  if (!table) {
    throw new PageStructureError("player", 'table[width="800"][align="center"]');
  }
  const labels = findElements(table.inner, "label");
  if (labels.length < 3) {
    throw new PageStructureError("player", "info labels");
  }
  const [replaysLabel, issuesLabel, createdLabel] = labels.slice(-3);

  const replayNumbers = replaysLabel.text.match(/\d[\d,]*/g) ?? [];
  const issueNumbers = issuesLabel.text.match(/\d[\d,]*/g) ?? [];
  const createdAt = parseRegistrationDate(createdLabel.text);
  if (!createdAt) {
    throw new PageStructureError("player", "registration date");
  }

  return {
    replays: parseIntText(replayNumbers[replayNumbers.length - 1] ?? "") ?? 0,
    issues: parseIntText(issueNumbers[0] ?? "") ?? 0,
    createdAt,
  };
}

/** "Joined 5th March 2021" → "2021-03-05". */
export function parseRegistrationDate(text: string): string | undefined {
  const match = /(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]+)\s+(\d{4})/.exec(text);
  if (!match) return undefined;
  const month = MONTHS[match[2].toLowerCase()];
  if (month === undefined) return undefined;
  const day = match[1].padStart(2, "0");
  return `${match[3]}-${String(month).padStart(2, "0")}-${day}`;
}
