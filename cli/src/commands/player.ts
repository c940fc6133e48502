/**
 * `infinitode player` — Show a player's profile.
 *
 * @module commands/player
 */

import ora from "ora";
import type { Command } from "commander";
import { resolvePlayerId } from "../config.js";
import { exitWithError, withClient } from "../utils/client.js";
import type { GlobalOptions } from "../utils/client.js";
import { renderPlayer } from "../utils/format.js";
import type { FollowUps } from "../utils/format.js";

interface PlayerOptions {
  followUps?: boolean;
  json?: boolean;
}

/**
 * Register the `infinitode player` command.
 */
export function registerPlayerCommand(program: Command): void {
  program
    .command("player [playerid]")
    .description("Show a player's profile")
    .option("--follow-ups", "Also fetch daily quest and skill point placements")
    .option("--json", "Output the profile as JSON")
    .action(async (playerid: string | undefined, opts: PlayerOptions) => {
      try {
        await withClient(program.opts<GlobalOptions>(), async (client, config) => {
          const id = resolvePlayerId(config, playerid);
          if (!id) {
            throw new Error("No playerid given. Pass one or set INFINITODE_PLAYER_ID in .env");
          }

          const spinner = ora(`Fetching profile of ${id}...`).start();
          let followUps: FollowUps | undefined;
          try {
            const player = await client.player({ playerid: id, beta: config.beta });
            if (opts.followUps) {
              spinner.text = "Fetching daily quest and skill point placements...";
              const [dailyQuest, skillPoint] = await Promise.all([
                player.fetchDailyQuest(client),
                player.fetchSkillPoint(client),
              ]);
              followUps = { dailyQuest, skillPoint };
            }
            spinner.succeed(`Profile of ${player.nickname}`);

            if (opts.json) {
              console.log(JSON.stringify(player, null, 2));
              return;
            }

            console.log("");
            for (const line of renderPlayer(player, followUps)) console.log(line);
            console.log("");
          } catch (err) {
            spinner.fail("Failed to fetch profile");
            throw err;
          }
        });
      } catch (err) {
        exitWithError(err);
      }
    });
}
