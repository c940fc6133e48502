/**
 * Board commands: `leaderboard`, `runtime`, `skill-points`, `daily-quest`
 * and `season`.
 *
 * @module commands/leaderboard
 */

import chalk from "chalk";
import ora from "ora";
import { Option } from "commander";
import type { Command } from "commander";
import { DIFFICULTIES, MODES } from "infinitode-client";
import type { Leaderboard } from "infinitode-client";
import { resolvePlayerId } from "../config.js";
import {
  exitWithError,
  parseDifficulty,
  parseLimit,
  parseMode,
  withClient,
} from "../utils/client.js";
import type { GlobalOptions } from "../utils/client.js";
import { boardTitle, formatNumber, renderLeaderboard } from "../utils/format.js";

interface BoardOptions {
  limit?: string;
  json?: boolean;
}

interface MapBoardOptions extends BoardOptions {
  mode?: string;
  difficulty?: string;
  player?: string;
}

function modeOption(): Option {
  return new Option("--mode <mode>", "Leaderboard mode").choices([...MODES]);
}

function difficultyOption(): Option {
  return new Option("--difficulty <difficulty>", "Difficulty").choices([...DIFFICULTIES]);
}

/**
 * Register the board commands.
 */
export function registerLeaderboardCommands(program: Command): void {
  program
    .command("leaderboard <mapname>")
    .description("Show the top scores of a map")
    .addOption(modeOption())
    .addOption(difficultyOption())
    .option("--player <playerid>", "Also show this player's placement")
    .option("--limit <n>", "Max entries to show", "25")
    .option("--json", "Output the leaderboard as JSON")
    .action(async (mapname: string, opts: MapBoardOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), (client, config) =>
          showBoard(
            "leaderboard",
            () =>
              client.leaderboards({
                mapname,
                mode: parseMode(opts.mode),
                difficulty: parseDifficulty(opts.difficulty),
                playerid: opts.player,
                beta: config.beta,
              }),
            opts,
          ),
        );
      } catch (err) {
        exitWithError(err);
      }
    });

  program
    .command("runtime <mapname> [playerid]")
    .description("Show the in-game board of a map with top-percentile entries")
    .addOption(modeOption())
    .addOption(difficultyOption())
    .option("--limit <n>", "Max entries to show", "150")
    .option("--json", "Output the leaderboard as JSON")
    .action(async (mapname: string, playerid: string | undefined, opts: MapBoardOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), (client, config) => {
          const id = resolvePlayerId(config, playerid);
          if (!id) {
            throw new Error("No playerid given. Pass one or set INFINITODE_PLAYER_ID in .env");
          }
          return showBoard(
            "runtime leaderboard",
            () =>
              client.runtimeLeaderboards({
                mapname,
                playerid: id,
                mode: parseMode(opts.mode),
                difficulty: parseDifficulty(opts.difficulty),
                beta: config.beta,
              }),
            opts,
            true,
          );
        });
      } catch (err) {
        exitWithError(err);
      }
    });

  program
    .command("skill-points [playerid]")
    .description("Show the top skill point owners")
    .option("--json", "Output the leaderboard as JSON")
    .action(async (playerid: string | undefined, opts: BoardOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), (client, config) =>
          showBoard(
            "skill point leaderboard",
            () => client.skillPointLeaderboard({ playerid: resolvePlayerId(config, playerid), beta: config.beta }),
            opts,
          ),
        );
      } catch (err) {
        exitWithError(err);
      }
    });

  program
    .command("daily-quest [date]")
    .description("Show the daily quest board of a day (YYYY-MM-DD, default today)")
    .option("--player <playerid>", "Also show this player's placement")
    .option("--limit <n>", "Max entries to show", "25")
    .option("--json", "Output the leaderboard as JSON")
    .action(async (date: string | undefined, opts: MapBoardOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), (client, config) =>
          showBoard(
            "daily quest leaderboard",
            () =>
              client.dailyQuestLeaderboards({
                date,
                playerid: resolvePlayerId(config, opts.player),
                beta: config.beta,
              }),
            opts,
          ),
        );
      } catch (err) {
        exitWithError(err);
      }
    });

  program
    .command("season")
    .description("Show the top 100 of the current season")
    .option("--limit <n>", "Max entries to show", "25")
    .option("--json", "Output the leaderboard as JSON")
    .action(async (opts: BoardOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), (client, config) =>
          showBoard("seasonal leaderboard", () => client.seasonalLeaderboard({ beta: config.beta }), opts),
        );
      } catch (err) {
        exitWithError(err);
      }
    });
}

async function showBoard(
  label: string,
  load: () => Promise<Leaderboard>,
  opts: BoardOptions,
  showTop = false,
): Promise<void> {
  const spinner = ora(`Fetching ${label}...`).start();

  let board: Leaderboard;
  try {
    board = await load();
  } catch (err) {
    spinner.fail(`Failed to fetch ${label}`);
    throw err;
  }
  spinner.succeed(`${boardTitle(board)}: ${board.length} entries (${formatNumber(board.total)} ranked)`);

  if (opts.json) {
    console.log(JSON.stringify(board, null, 2));
    return;
  }

  const limit = parseLimit(opts.limit);
  console.log("");
  for (const line of renderLeaderboard(board.slice(0, limit), { showTop })) {
    console.log(line);
  }
  if (board.length > limit) {
    console.log(chalk.dim(`  Use --limit ${board.length} to see every entry`));
  }
  console.log("");
}
