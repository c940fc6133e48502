/**
 * Known map names, loaded from `data/maps.json`.
 *
 * @module maps
 */

import { readFileSync } from "node:fs";

function loadMaps(): ReadonlySet<string> {
  const text = readFileSync(new URL("./data/maps.json", import.meta.url), "utf-8");
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed) || !parsed.every((m): m is string => typeof m === "string")) {
    throw new Error("data/maps.json must be an array of strings");
  }
  return new Set(parsed);
}

/** Every map the leaderboard endpoints accept. */
export const KNOWN_MAPS: ReadonlySet<string> = loadMaps();

/** Whether `mapname` (already stringified) is a known map. */
export function isKnownMap(mapname: string): boolean {
  return KNOWN_MAPS.has(mapname);
}
