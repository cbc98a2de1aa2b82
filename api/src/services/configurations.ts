import { v4 as uuid } from "uuid";
import { getStore } from "./store.js";
import { NotFoundError } from "../lib/errors.js";
import type { ConfigurationCreateInput } from "../lib/validation.js";
import type { Configuration } from "../../../shared/types.js";

export async function listConfigurations(): Promise<Configuration[]> {
  return getStore().load("configurations");
}

/**
 * Insert or replace a configuration by ID (last write wins). Insertion order
 * of existing entries is preserved.
 */
export async function upsertConfiguration(config: Configuration): Promise<Configuration> {
  const store = getStore();
  const configs = await store.load("configurations");

  const byId = new Map(configs.map((c) => [c.id, c]));
  byId.set(config.id, config);

  await store.save("configurations", [...byId.values()]);
  return config;
}

/**
 * Save a lineup + field snapshot under a name. The lineup and field are
 * copied so later edits to the live lineup don't leak into the snapshot.
 */
export async function createConfiguration(input: ConfigurationCreateInput): Promise<Configuration> {
  const config: Configuration = {
    id: uuid(),
    name: input.name,
    lineup: input.lineup.map((slot) => ({ ...slot })),
    field_positions: input.field_positions.map((pos) => ({ ...pos })),
    use_dh: input.use_dh,
    notes: input.notes,
    last_used_timestamp: new Date().toISOString(),
  };
  return upsertConfiguration(config);
}

/**
 * Load a saved configuration. Loading counts as a use, so the stored
 * last_used_timestamp is bumped.
 */
export async function loadConfiguration(id: string): Promise<Configuration> {
  const configs = await listConfigurations();
  const config = configs.find((c) => c.id === id);
  if (!config) throw new NotFoundError("Configuration", id);

  return upsertConfiguration({ ...config, last_used_timestamp: new Date().toISOString() });
}

export async function deleteConfiguration(id: string): Promise<void> {
  const store = getStore();
  const configs = await store.load("configurations");
  const remaining = configs.filter((c) => c.id !== id);

  if (remaining.length === configs.length) {
    throw new NotFoundError("Configuration", id);
  }
  await store.save("configurations", remaining);
}
