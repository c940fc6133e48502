/**
 * Configuration loader for the Infinitode CLI.
 *
 * Loads infinitode.yaml + .env, resolves env var placeholders,
 * validates the result, and provides typed config to all commands.
 *
 * Resolution order: CLI flags > env vars > YAML values > defaults.
 *
 * @module config
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import yaml from "js-yaml";
import {
  DEFAULT_BASE_URL,
  DEFAULT_BETA_BASE_URL,
  isLogLevel,
  isValidPlayerId,
} from "infinitode-client";

// ── Types ─────────────────────────────────────────────────────

export interface InfinitodeCliConfig {
  baseUrl: string;
  betaBaseUrl: string;
  /** Default playerid for commands that take one. Loaded from: INFINITODE_PLAYER_ID. */
  player: string | undefined;
  /** One of debug, info, warn, error. */
  logLevel: string;
  /** Query the beta servers. */
  beta: boolean;
}

interface RawYaml {
  baseUrl?: string;
  betaBaseUrl?: string;
  player?: string;
  logLevel?: string;
  beta?: boolean;
}

// ── Env var resolution ────────────────────────────────────────

/**
 * Replace ${VAR} placeholders in a string with process.env values.
 * Warns on unresolved vars (missing from env).
 */
export function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const envVal = process.env[varName.trim()];
    if (envVal === undefined) {
      console.warn(
        `Warning: Environment variable \${${varName}} not found. Set it in .env or your shell.`,
      );
      return "";
    }
    return envVal;
  });
}

/**
 * Pick the known keys out of a parsed YAML document, resolving
 * placeholders in string values. Unknown keys and wrongly typed
 * values are ignored.
 */
function readRawYaml(doc: unknown): RawYaml {
  if (doc === null || typeof doc !== "object" || Array.isArray(doc)) return {};
  const fields = new Map<string, unknown>(Object.entries(doc));

  const str = (key: string): string | undefined => {
    const value = fields.get(key);
    if (typeof value === "string") return resolveEnvVars(value);
    if (typeof value === "number") return String(value);
    return undefined;
  };
  const beta = fields.get("beta");

  return {
    baseUrl: str("baseUrl"),
    betaBaseUrl: str("betaBaseUrl"),
    player: str("player"),
    logLevel: str("logLevel"),
    beta: typeof beta === "boolean" ? beta : undefined,
  };
}

/** Empty strings count as unset. */
function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

// ── Main loader ───────────────────────────────────────────────

export interface LoadConfigOptions {
  configPath?: string;
  /** Directory holding .env and infinitode.yaml (default: process.cwd()). */
  cwd?: string;
  beta?: boolean;
  /** Log each request. */
  verbose?: boolean;
  /** Log each request and response body. */
  debug?: boolean;
}

/**
 * Load Infinitode CLI configuration.
 *
 * 1. Load .env from the working directory
 * 2. Parse infinitode.yaml
 * 3. Resolve ${VAR} placeholders
 * 4. Apply CLI flag overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): InfinitodeCliConfig {
  const cwd = options.cwd ?? process.cwd();

  // 1. Load .env
  const envPath = resolve(cwd, ".env");
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  // 2-3. Find, parse and resolve YAML
  const configFile = options.configPath ? resolve(cwd, options.configPath) : resolve(cwd, "infinitode.yaml");
  let raw: RawYaml = {};
  if (existsSync(configFile)) {
    raw = readRawYaml(yaml.load(readFileSync(configFile, "utf-8")));
  } else if (options.configPath) {
    throw new Error(`Config file not found: ${configFile}`);
  }

  // 4. Build config with resolution order: CLI flags > env > YAML > defaults
  const flagLevel = options.debug ? "debug" : options.verbose ? "info" : undefined;

  return {
    baseUrl: envValue("INFINITODE_BASE_URL") ?? raw.baseUrl ?? DEFAULT_BASE_URL,
    betaBaseUrl: envValue("INFINITODE_BETA_BASE_URL") ?? raw.betaBaseUrl ?? DEFAULT_BETA_BASE_URL,
    player: envValue("INFINITODE_PLAYER_ID") ?? (raw.player || undefined),
    logLevel: flagLevel ?? envValue("INFINITODE_LOG_LEVEL") ?? raw.logLevel ?? "warn",
    beta: options.beta || raw.beta || false,
  };
}

/**
 * Validate a loaded config.
 * Returns error messages (empty array = valid).
 */
export function validateConfig(config: InfinitodeCliConfig): string[] {
  const errors: string[] = [];

  for (const [name, url] of [["baseUrl", config.baseUrl], ["betaBaseUrl", config.betaBaseUrl]] as const) {
    if (!URL.canParse(url)) {
      errors.push(`Invalid ${name}: ${url}. Set ${name} in infinitode.yaml or the matching INFINITODE_* variable in .env`);
    }
  }

  if (config.player !== undefined && !isValidPlayerId(config.player)) {
    errors.push(`Invalid default player id: ${config.player}. Expected the form U-XXXX-XXXX-XXXXXX`);
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`Invalid log level: ${config.logLevel}. Use one of debug, info, warn, error`);
  }

  return errors;
}

/**
 * The playerid for a command: the argument if given, else the configured default.
 */
export function resolvePlayerId(config: InfinitodeCliConfig, argument: string | undefined): string | undefined {
  return argument ?? config.player;
}
