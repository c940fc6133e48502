/**
 * Decoders for the JSON API endpoints.
 *
 * Every response is an envelope `{ status, message?, player, leaderboards? }`.
 * Required keys are checked per endpoint and numeric fields are coerced;
 * any mismatch fails with {@link MalformedResponseError} before a domain
 * object is built.
 *
 * @module parsers/json
 */

import { ApiError, MalformedResponseError } from "../errors.js";
import type { BadgeRecord, Endpoint, LeaderboardRecord, ScoreRecord } from "../types.js";

type JsonObject = Record<string, unknown>;

const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================
//  Field coercion
// ============================================================

/**
 * A number, numeric text ("1,234" allowed), or absent. Blank and null
 * mean absent; anything else is malformed.
 */
export function optionalNumber(endpoint: Endpoint, key: string, value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new MalformedResponseError(endpoint, key, `not a finite number: ${value}`);
    }
    return value;
  }
  if (typeof value === "string") {
    const cleaned = value.trim().replace(/,/g, "");
    if (cleaned === "") return undefined;
    if (!NUMERIC_TEXT.test(cleaned)) {
      throw new MalformedResponseError(endpoint, key, `not numeric: "${value}"`);
    }
    return Number(cleaned);
  }
  throw new MalformedResponseError(endpoint, key, `expected a number, got ${typeof value}`);
}

function optionalInteger(endpoint: Endpoint, key: string, value: unknown): number | undefined {
  const n = optionalNumber(endpoint, key, value);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new MalformedResponseError(endpoint, key, `not an integer: ${n}`);
  }
  return n;
}

/** Ranks start at 1; 0 is how the service reports "unranked". */
function optionalRank(endpoint: Endpoint, key: string, value: unknown): number | undefined {
  const n = optionalInteger(endpoint, key, value);
  if (n === undefined || n === 0) return undefined;
  if (n < 0) {
    throw new MalformedResponseError(endpoint, key, `negative rank: ${n}`);
  }
  return n;
}

/** Percentile as a number or text such as "12.5%"; "-%" and blank are absent. */
export function optionalPercent(endpoint: Endpoint, key: string, value: unknown): number | undefined {
  if (typeof value === "string") {
    const cleaned = value.replace(/top|%|\s/gi, "");
    if (cleaned === "" || cleaned === "-") return undefined;
    return optionalNumber(endpoint, key, cleaned);
  }
  return optionalNumber(endpoint, key, value);
}

function optionalString(endpoint: Endpoint, key: string, value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  throw new MalformedResponseError(endpoint, key, `expected a string, got ${typeof value}`);
}

function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  return undefined;
}

function optionalBadge(endpoint: Endpoint, key: string, value: unknown): BadgeRecord | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) {
    throw new MalformedResponseError(endpoint, key, "expected an object");
  }
  const fields = ["iconImg", "iconColor", "overlayImg", "overlayColor"] as const;
  for (const field of fields) {
    if (typeof value[field] !== "string") {
      throw new MalformedResponseError(endpoint, `${key}.${field}`, "missing");
    }
  }
  return {
    iconImg: String(value.iconImg),
    iconColor: String(value.iconColor),
    overlayImg: String(value.overlayImg),
    overlayColor: String(value.overlayColor),
  };
}

function requireKey(endpoint: Endpoint, obj: JsonObject, key: string, path = key): unknown {
  if (!(key in obj)) {
    throw new MalformedResponseError(endpoint, path, "missing");
  }
  return obj[key];
}

// ============================================================
//  Envelope
// ============================================================

/**
 * Decode the body and check the status envelope.
 *
 * @throws MalformedResponseError when the body is not a JSON object or lacks `status`.
 * @throws ApiError when `status` is not "success".
 */
export function decodeEnvelope(endpoint: Endpoint, text: string): JsonObject {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new MalformedResponseError(endpoint, "body", "not valid JSON");
  }
  if (!isObject(payload)) {
    throw new MalformedResponseError(endpoint, "body", "expected a JSON object");
  }
  const status = requireKey(endpoint, payload, "status");
  if (status !== "success") {
    const message = typeof payload.message === "string" ? payload.message : `status "${String(status)}"`;
    throw new ApiError(`Error response from server: ${message}`, endpoint);
  }
  return payload;
}

// ============================================================
//  Records
// ============================================================

/**
 * Normalize one score object. `playerid` comes from the object itself
 * or, for the caller's own entry, from `fallbackPlayerId`.
 */
export function parseScoreRecord(
  endpoint: Endpoint,
  value: unknown,
  path: string,
  fallbackPlayerId?: string,
): ScoreRecord {
  if (!isObject(value)) {
    throw new MalformedResponseError(endpoint, path, "expected an object");
  }
  const playerid = fallbackPlayerId !== undefined && !("playerid" in value)
    ? fallbackPlayerId
    : optionalString(endpoint, `${path}.playerid`, requireKey(endpoint, value, "playerid", `${path}.playerid`));
  if (!playerid) {
    throw new MalformedResponseError(endpoint, `${path}.playerid`, "blank");
  }

  return {
    playerid,
    rank: optionalRank(endpoint, `${path}.rank`, value.rank),
    score: optionalNumber(endpoint, `${path}.score`, value.score),
    nickname: optionalString(endpoint, `${path}.nickname`, value.nickname),
    level: optionalInteger(endpoint, `${path}.level`, value.level),
    hasPfp: optionalBoolean(value.hasPfp),
    pinnedBadge: optionalBadge(endpoint, `${path}.pinnedBadge`, value.pinnedBadge),
    position: optionalInteger(endpoint, `${path}.position`, value.position),
    top: optionalPercent(endpoint, `${path}.top`, value.top),
    total: optionalInteger(endpoint, `${path}.total`, value.total),
  };
}

/**
 * Parse a leaderboard response (`leaderboards`, `runtimeLeaderboards`,
 * `skillPointLeaderboard`, `dailyQuestLeaderboards`).
 *
 * The caller's own entry is kept only when `playerid` was sent and the
 * service reports a rank, a score and a total for it.
 */
export function parseLeaderboardResponse(
  endpoint: Endpoint,
  text: string,
  playerid?: string,
): LeaderboardRecord {
  const payload = decodeEnvelope(endpoint, text);

  const list = requireKey(endpoint, payload, "leaderboards");
  if (!Array.isArray(list)) {
    throw new MalformedResponseError(endpoint, "leaderboards", "expected an array");
  }
  const player = requireKey(endpoint, payload, "player");
  if (!isObject(player)) {
    throw new MalformedResponseError(endpoint, "player", "expected an object");
  }
  const total = optionalInteger(endpoint, "player.total", requireKey(endpoint, player, "total", "player.total")) ?? 0;

  const entries = list.map((entry, i) => parseScoreRecord(endpoint, entry, `leaderboards[${i}]`));

  let own: ScoreRecord | undefined;
  if (playerid !== undefined) {
    const record = parseScoreRecord(endpoint, player, "player", playerid);
    if (record.rank !== undefined && record.score && total) {
      own = record;
    }
  }

  return { entries, total, player: own, raw: payload };
}

/** Parse a `leaderboardsRank` response: the `player` object of the envelope. */
export function parseRankResponse(endpoint: Endpoint, text: string, playerid: string): ScoreRecord {
  const payload = decodeEnvelope(endpoint, text);
  return parseScoreRecord(endpoint, requireKey(endpoint, payload, "player"), "player", playerid);
}
