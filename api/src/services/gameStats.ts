import { getStore } from "./store.js";
import { findPlayer, getPlayer } from "./players.js";
import { getGame, listGames, markGameCompleted } from "./games.js";
import { aggregateSeasonStats } from "./stats.js";
import { NotFoundError } from "../lib/errors.js";
import type { GameStatsEntryInput } from "../lib/validation.js";
import type { GameStats, PlayerSeasonStats } from "../../../shared/types.js";

const statKey = (gs: Pick<GameStats, "game_id" | "player_id">) => `${gs.game_id}:${gs.player_id}`;

export async function getGameStats(gameId: string): Promise<GameStats[]> {
  await getGame(gameId);
  const all = await getStore().load("game_stats");
  return all.filter((gs) => gs.game_id === gameId);
}

/**
 * Upsert stat lines for several players in one game, keyed by
 * (game_id, player_id), in a single write. Every player must exist;
 * nothing is written otherwise. Saving stats completes a scheduled game.
 */
export async function saveGameStats(gameId: string, entries: GameStatsEntryInput[]): Promise<GameStats[]> {
  await getGame(gameId);

  for (const entry of entries) {
    if (!(await findPlayer(entry.player_id))) {
      throw new NotFoundError("Player", entry.player_id);
    }
  }

  // A player listed twice in one request keeps the later line.
  const incoming = new Map<string, GameStats>();
  for (const entry of entries) {
    const line: GameStats = { ...entry, game_id: gameId };
    incoming.set(statKey(line), line);
  }

  const store = getStore();
  const all = await store.load("game_stats");
  const byKey = new Map(all.map((gs) => [statKey(gs), gs]));
  for (const [key, line] of incoming) {
    byKey.set(key, line);
  }
  await store.save("game_stats", [...byKey.values()]);

  await markGameCompleted(gameId);
  return [...incoming.values()];
}

/** A player's stat lines, most recent game first. */
export async function getPlayerGameStats(playerId: string): Promise<GameStats[]> {
  await getPlayer(playerId);

  const all = await getStore().load("game_stats");
  const games = await listGames();
  const dateById = new Map(games.map((g) => [g.id, g.date]));

  return all
    .filter((gs) => gs.player_id === playerId)
    .sort((a, b) => (dateById.get(b.game_id) ?? "").localeCompare(dateById.get(a.game_id) ?? ""));
}

export async function getPlayerSeasonStats(playerId: string): Promise<PlayerSeasonStats> {
  const lines = await getPlayerGameStats(playerId);
  return { player_id: playerId, ...aggregateSeasonStats(lines) };
}
