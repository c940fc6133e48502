/**
 * `infinitode rank` — One player's placement on a map.
 *
 * @module commands/rank
 */

import ora from "ora";
import { Option } from "commander";
import type { Command } from "commander";
import { DIFFICULTIES, MODES } from "infinitode-client";
import { resolvePlayerId } from "../config.js";
import { exitWithError, parseDifficulty, parseMode, withClient } from "../utils/client.js";
import type { GlobalOptions } from "../utils/client.js";
import { renderScore } from "../utils/format.js";

interface RankOptions {
  mode?: string;
  difficulty?: string;
  json?: boolean;
}

/**
 * Register the `infinitode rank` command.
 */
export function registerRankCommand(program: Command): void {
  program
    .command("rank <mapname> [playerid]")
    .description("Show a player's rank and score on a map")
    .addOption(new Option("--mode <mode>", "Leaderboard mode").choices([...MODES]))
    .addOption(new Option("--difficulty <difficulty>", "Difficulty").choices([...DIFFICULTIES]))
    .option("--json", "Output the score as JSON")
    .action(async (mapname: string, playerid: string | undefined, opts: RankOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), async (client, config) => {
          const id = resolvePlayerId(config, playerid);
          if (!id) {
            throw new Error("No playerid given. Pass one or set INFINITODE_PLAYER_ID in .env");
          }

          const spinner = ora(`Fetching rank on ${mapname}...`).start();
          const score = await client
            .leaderboardsRank({
              mapname,
              playerid: id,
              mode: parseMode(opts.mode),
              difficulty: parseDifficulty(opts.difficulty),
              beta: config.beta,
            })
            .catch((err: unknown) => {
              spinner.fail("Failed to fetch rank");
              throw err;
            });
          spinner.succeed(`Rank of ${id} on ${score.mapname}`);

          if (opts.json) {
            console.log(JSON.stringify(score, null, 2));
            return;
          }

          console.log("");
          for (const line of renderScore(score)) console.log(line);
          console.log("");
        });
      } catch (err) {
        exitWithError(err);
      }
    });
}
