/**
 * Argument validation and normalization for the public operations.
 *
 * Everything here runs before a request is built, so a bad argument
 * never reaches the network.
 *
 * @module validation
 */

import { BadArgumentError } from "./errors.js";
import { isKnownMap } from "./maps.js";
import { DIFFICULTIES, MODES } from "./types.js";
import type { Difficulty, Endpoint, MapName, Mode } from "./types.js";

/** Player id: "U-" then two groups of 4 and one of 6 upper-case alphanumerics. */
const PLAYER_ID_REGEX = /^U-[A-Z0-9]{4}-[A-Z0-9]{4}-[A-Z0-9]{6}$/;

/** Calendar date as sent to the daily quest endpoint. */
const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isValidPlayerId(value: string): boolean {
  return PLAYER_ID_REGEX.test(value);
}

/**
 * Stringify and check a map name. `5.1` and `"5.1"` normalize to the same value.
 */
export function normalizeMapname(value: MapName | undefined, endpoint: Endpoint): string {
  if (value == null || String(value).trim() === "") {
    throw new BadArgumentError("mapname", "mapname is required", endpoint);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new BadArgumentError("mapname", `Invalid map: ${value}`, endpoint);
  }
  const mapname = String(value).trim();
  if (!isKnownMap(mapname)) {
    throw new BadArgumentError("mapname", `Invalid map: ${mapname}`, endpoint);
  }
  return mapname;
}

/** Require a well-formed player id. Blank counts as missing. */
export function requirePlayerId(value: string | undefined, endpoint: Endpoint): string {
  if (value == null || value.trim() === "") {
    throw new BadArgumentError("playerid", "playerid is required", endpoint);
  }
  return checkPlayerId(value.trim(), endpoint);
}

/** Validate a player id when one was given; blank means none. */
export function optionalPlayerId(value: string | undefined, endpoint: Endpoint): string | undefined {
  if (value == null || value.trim() === "") return undefined;
  return checkPlayerId(value.trim(), endpoint);
}

function checkPlayerId(value: string, endpoint: Endpoint): string {
  if (!isValidPlayerId(value)) {
    throw new BadArgumentError("playerid", `Invalid playerid: ${value}`, endpoint);
  }
  return value;
}

export function normalizeMode(value: string | undefined, endpoint: Endpoint): Mode {
  if (value === undefined) return "score";
  const mode = MODES.find((m) => m === value);
  if (!mode) {
    throw new BadArgumentError(
      "mode",
      `Invalid mode (must be one of ${MODES.join(", ")}): ${value}`,
      endpoint,
    );
  }
  return mode;
}

export function normalizeDifficulty(value: string | undefined, endpoint: Endpoint): Difficulty {
  if (value === undefined) return "NORMAL";
  const difficulty = DIFFICULTIES.find((d) => d === value);
  if (!difficulty) {
    throw new BadArgumentError(
      "difficulty",
      `Invalid difficulty (must be one of ${DIFFICULTIES.join(", ")}): ${value}`,
      endpoint,
    );
  }
  return difficulty;
}

/** Format a Date as "YYYY-MM-DD" in UTC. */
export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a "YYYY-MM-DD" string, returning it unchanged when it names a
 * real calendar day and `undefined` otherwise.
 */
export function parseIsoDate(value: string): string | undefined {
  const match = ISO_DATE_REGEX.exec(value.trim());
  if (!match) return undefined;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return undefined;
  }
  return formatUtcDate(date);
}
