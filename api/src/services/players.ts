import { v4 as uuid } from "uuid";
import { getStore } from "./store.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import type { PlayerCreateInput, PlayerUpdateInput } from "../lib/validation.js";
import type { CascadeSummary, Player } from "../../../shared/types.js";

export async function listPlayers(): Promise<Player[]> {
  return getStore().load("players");
}

export async function findPlayer(id: string): Promise<Player | null> {
  const players = await listPlayers();
  return players.find((p) => p.id === id) ?? null;
}

export async function getPlayer(id: string): Promise<Player> {
  const player = await findPlayer(id);
  if (!player) throw new NotFoundError("Player", id);
  return player;
}

/**
 * Add a player to the roster. Returns the stored record with its new ID.
 */
export async function createPlayer(input: PlayerCreateInput): Promise<Player> {
  const store = getStore();
  const player: Player = {
    id: uuid(),
    name: input.name,
    number: input.number ?? null,
    primary_position: input.primary_position,
    secondary_positions: input.secondary_positions,
    bats: input.bats,
    throws: input.throws,
    status: input.status,
    notes: input.notes,
  };

  const players = await store.load("players");
  players.push(player);
  await store.save("players", players);
  return player;
}

/**
 * Merge the provided fields into an existing player. Fields left undefined
 * are untouched; the ID never changes.
 */
export async function updatePlayer(id: string, input: PlayerUpdateInput): Promise<Player> {
  if (Object.values(input).every((value) => value === undefined)) {
    throw new ValidationError("No fields provided to update");
  }

  const store = getStore();
  const players = await store.load("players");
  const index = players.findIndex((p) => p.id === id);
  if (index === -1) throw new NotFoundError("Player", id);

  const updated: Player = { ...players[index], ...input, id };
  players[index] = updated;
  await store.save("players", players);
  return updated;
}

/**
 * Null out every reference to a player in the current lineup, the current
 * field, and each saved configuration's own lineup/field copies.
 */
export async function cascadeDeletePlayerReferences(playerId: string): Promise<CascadeSummary> {
  const store = getStore();
  const summary: CascadeSummary = {
    lineup_slots_cleared: 0,
    field_positions_cleared: 0,
    configurations_updated: 0,
  };

  const lineup = await store.load("lineup");
  for (const slot of lineup) {
    if (slot.player_id === playerId) {
      slot.player_id = null;
      summary.lineup_slots_cleared++;
    }
  }
  if (summary.lineup_slots_cleared > 0) await store.save("lineup", lineup);

  const field = await store.load("field");
  for (const pos of field) {
    if (pos.player_id === playerId) {
      pos.player_id = null;
      summary.field_positions_cleared++;
    }
  }
  if (summary.field_positions_cleared > 0) await store.save("field", field);

  const configs = await store.load("configurations");
  for (const config of configs) {
    let modified = false;
    for (const entry of [...config.lineup, ...config.field_positions]) {
      if (entry.player_id === playerId) {
        entry.player_id = null;
        modified = true;
      }
    }
    if (modified) summary.configurations_updated++;
  }
  if (summary.configurations_updated > 0) await store.save("configurations", configs);

  return summary;
}

/**
 * Remove a player and clear their lineup/field/configuration references.
 * Game stats recorded for the player are kept.
 */
export async function deletePlayer(id: string): Promise<CascadeSummary> {
  const store = getStore();
  const players = await store.load("players");
  const remaining = players.filter((p) => p.id !== id);

  if (remaining.length === players.length) {
    throw new NotFoundError("Player", id);
  }

  const summary = await cascadeDeletePlayerReferences(id);
  await store.save("players", remaining);

  console.log(`[Players] Deleted player ${id}. Cleanup:`, summary);
  return summary;
}
