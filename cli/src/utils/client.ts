/**
 * Client setup shared by every command.
 *
 * @module utils/client
 */

import chalk from "chalk";
import {
  DIFFICULTIES,
  InfinitodeClient,
  MODES,
  createConsoleLogger,
  isLogLevel,
} from "infinitode-client";
import type { Difficulty, Mode } from "infinitode-client";
import { loadConfig, validateConfig } from "../config.js";
import type { InfinitodeCliConfig } from "../config.js";

/** Options declared on the root program. */
export interface GlobalOptions {
  config?: string;
  beta?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

export function createClient(config: InfinitodeCliConfig): InfinitodeClient {
  return new InfinitodeClient({
    baseUrl: config.baseUrl,
    betaBaseUrl: config.betaBaseUrl,
    logger: createConsoleLogger(isLogLevel(config.logLevel) ? config.logLevel : "warn"),
  });
}

/**
 * Load and validate config, then run `fn` with a client that is closed
 * afterwards. Invalid config exits the process.
 */
export async function withClient(
  globalOpts: GlobalOptions,
  fn: (client: InfinitodeClient, config: InfinitodeCliConfig) => Promise<void>,
): Promise<void> {
  const config = loadConfig({
    configPath: globalOpts.config,
    beta: globalOpts.beta,
    verbose: globalOpts.verbose,
    debug: globalOpts.debug,
  });

  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const e of errors) console.error(chalk.red(`  ✗ ${e}`));
    process.exit(1);
  }

  const client = createClient(config);
  try {
    await fn(client, config);
  } finally {
    await client.close();
  }
}

export function exitWithError(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`\nFailed: ${msg}`));
  process.exit(1);
}

export function parseMode(value: string | undefined): Mode | undefined {
  return MODES.find((m) => m === value);
}

export function parseDifficulty(value: string | undefined): Difficulty | undefined {
  return DIFFICULTIES.find((d) => d === value);
}

/** Entry count for table output, clamped to 1..300. */
export function parseLimit(value: string | undefined, fallback = 25): number {
  const n = parseInt(value ?? "", 10);
  return Math.min(Math.max(Number.isNaN(n) ? fallback : n, 1), 300);
}
