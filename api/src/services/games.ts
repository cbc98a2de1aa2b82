import { v4 as uuid } from "uuid";
import { getStore } from "./store.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import type { GameCreateInput, GameUpdateInput } from "../lib/validation.js";
import type { Game, GameResult, GameStatus } from "../../../shared/types.js";

/** Shape of a game as it may sit on disk: older records predate source/status. */
export type StoredGame = Partial<Game> & Pick<Game, "id">;

/** A game with a result is over; otherwise it is still on the schedule. */
export function inferStatus(result: GameResult | null | undefined): GameStatus {
  return result ? "completed" : "scheduled";
}

export function isLegacyGame(game: StoredGame): boolean {
  return game.source === undefined || game.status === undefined;
}

/** Fill in every field a stored record may be missing. */
export function normalizeGame(game: StoredGame): Game {
  const result = game.result ?? null;
  return {
    id: game.id,
    date: game.date ?? "",
    opponent: game.opponent ?? "",
    home_away: game.home_away ?? "home",
    result,
    score_us: game.score_us ?? null,
    score_them: game.score_them ?? null,
    notes: game.notes ?? "",
    source: game.source ?? "manual",
    status: game.status ?? inferStatus(result),
    created_at: game.created_at ?? null,
  };
}

/**
 * Load every game, normalized. Legacy records are rewritten to disk in
 * normalized form the first time they are read.
 */
async function loadGames(): Promise<Game[]> {
  const store = getStore();
  const stored: StoredGame[] = await store.load("games");
  const games = stored.map(normalizeGame);

  if (stored.some(isLegacyGame)) {
    console.log("[Games] Normalizing legacy game records");
    await store.save("games", games);
  }
  return games;
}

/** All games, most recent date first. */
export async function listGames(): Promise<Game[]> {
  const games = await loadGames();
  return games.sort((a, b) => b.date.localeCompare(a.date));
}

export async function findGame(id: string): Promise<Game | null> {
  const games = await loadGames();
  return games.find((g) => g.id === id) ?? null;
}

export async function getGame(id: string): Promise<Game> {
  const game = await findGame(id);
  if (!game) throw new NotFoundError("Game", id);
  return game;
}

export async function createGame(input: GameCreateInput): Promise<Game> {
  const result = input.result ?? null;
  const game: Game = {
    id: uuid(),
    date: input.date,
    opponent: input.opponent,
    home_away: input.home_away,
    result,
    score_us: input.score_us ?? null,
    score_them: input.score_them ?? null,
    notes: input.notes,
    source: input.source,
    status: input.status ?? inferStatus(result),
    created_at: new Date().toISOString(),
  };

  const store = getStore();
  const games = await loadGames();
  games.push(game);
  await store.save("games", games);
  return game;
}

/**
 * Apply a partial update. Recording a result without an explicit status
 * completes the game.
 */
export async function updateGame(id: string, input: GameUpdateInput): Promise<Game> {
  if (Object.values(input).every((value) => value === undefined)) {
    throw new ValidationError("No fields provided to update");
  }

  const store = getStore();
  const games = await loadGames();
  const index = games.findIndex((g) => g.id === id);
  if (index === -1) throw new NotFoundError("Game", id);

  const updated: Game = { ...games[index], ...input, id };
  if (input.result !== undefined && input.status === undefined) {
    updated.status = "completed";
  }

  games[index] = updated;
  await store.save("games", games);
  return updated;
}

/** Mark a scheduled game completed. No-op for games already completed. */
export async function markGameCompleted(id: string): Promise<Game> {
  const game = await getGame(id);
  if (game.status === "completed") return game;
  return updateGame(id, { status: "completed" });
}

/** Delete a game together with every stat line recorded for it. */
export async function deleteGame(id: string): Promise<number> {
  const store = getStore();
  const games = await loadGames();
  const remaining = games.filter((g) => g.id !== id);

  if (remaining.length === games.length) {
    throw new NotFoundError("Game", id);
  }
  await store.save("games", remaining);

  const stats = await store.load("game_stats");
  const keptStats = stats.filter((gs) => gs.game_id !== id);
  const removed = stats.length - keptStats.length;
  if (removed > 0) await store.save("game_stats", keptStats);

  console.log(`[Games] Deleted game ${id} and ${removed} stat line(s)`);
  return removed;
}
