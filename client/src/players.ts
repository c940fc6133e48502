/**
 * Player manager for the Infinitode leaderboard client.
 *
 * The profile has no JSON endpoint, so it is scraped from the public
 * profile page.
 *
 * @module players
 */

import type { ConnectionManager } from "./connection.js";
import { Player } from "./models/player.js";
import { parsePlayerPage } from "./parsers/html.js";
import { requirePlayerId } from "./validation.js";
import type { PlayerParams } from "./types.js";

export class PlayerManager {
  private readonly connection: ConnectionManager;

  constructor(connection: ConnectionManager) {
    this.connection = connection;
  }

  /**
   * Load a player's profile.
   *
   * @param params.playerid - Player id, e.g. "U-E9BP-FSN9-H6ENMQ".
   */
  async get(params: PlayerParams): Promise<Player> {
    const endpoint = "player";
    const playerid = requirePlayerId(params.playerid, endpoint);

    const text = await this.connection.get(
      "xdx/index.php",
      { url: "profile/view", id: playerid },
      { beta: params.beta, signal: params.signal, endpoint },
    );
    return new Player(parsePlayerPage(text, playerid), {
      baseUrl: this.connection.resolveBase(params.beta),
      beta: params.beta,
    });
  }
}
