/**
 * Root command definition, kept apart from the entry point so it can be
 * built without parsing `process.argv`.
 *
 * @module program
 */

import { Command } from "commander";
import chalk from "chalk";
import { registerLeaderboardCommands } from "./commands/leaderboard.js";
import { registerRankCommand } from "./commands/rank.js";
import { registerPlayerCommand } from "./commands/player.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("infinitode")
    .description("Browse Infinitode leaderboards and player profiles")
    .version("1.0.0")
    .option("--config <path>", "Path to infinitode.yaml config file")
    .option("--beta", "Query the beta servers")
    .option("--verbose", "Log each request")
    .option("--debug", "Log each request and response body")
    .addHelpText(
      "after",
      `
${chalk.bold("Examples:")}
  ${chalk.cyan("infinitode leaderboard 5.1 --mode waves")}   ${chalk.dim("# top scores of a map")}
  ${chalk.cyan("infinitode rank 5.1 U-XXXX-XXXX-XXXXXX")}    ${chalk.dim("# one player's placement")}
  ${chalk.cyan("infinitode daily-quest 2024-06-01")}         ${chalk.dim("# daily quest board of a day")}
  ${chalk.cyan("infinitode player --follow-ups")}            ${chalk.dim("# profile of INFINITODE_PLAYER_ID")}
`,
    );

  // ── Register all commands ───────────────────────────────────
  registerLeaderboardCommands(program);
  registerRankCommand(program);
  registerPlayerCommand(program);

  return program;
}
