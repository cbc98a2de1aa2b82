import fs from "node:fs/promises";
import path from "node:path";
import { BASE_POSITIONS } from "../../../shared/types.js";
import type {
  Configuration,
  FieldPosition,
  Game,
  GameStats,
  LineupSlot,
  Player,
} from "../../../shared/types.js";

/** Every collection persisted as `<name>.json` in the data directory. */
export interface Collections {
  players: Player[];
  lineup: LineupSlot[];
  field: FieldPosition[];
  configurations: Configuration[];
  games: Game[];
  game_stats: GameStats[];
}

export type CollectionName = keyof Collections;

export const COLLECTION_NAMES: readonly CollectionName[] = [
  "players",
  "lineup",
  "field",
  "configurations",
  "games",
  "game_stats",
];

export function defaultLineup(): LineupSlot[] {
  return Array.from({ length: 9 }, (_, i) => ({ slot_number: i + 1, player_id: null }));
}

export function defaultField(): FieldPosition[] {
  return BASE_POSITIONS.map((position) => ({ position, player_id: null }));
}

const DEFAULTS: { [K in CollectionName]: () => Collections[K] } = {
  players: () => [],
  lineup: defaultLineup,
  field: defaultField,
  configurations: () => [],
  games: () => [],
  game_stats: () => [],
};

/**
 * Flat JSON-file store. Collections are read and written whole; writes go
 * through a temp file + rename and are serialized by a single lock.
 *
 * A load-modify-save cycle is not atomic as a whole: two concurrent updates
 * to the same collection resolve as last write wins.
 */
export class JsonStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(readonly dataDir: string) {}

  async init(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });

    for (const name of COLLECTION_NAMES) {
      try {
        await fs.access(this.filePath(name));
      } catch {
        await this.save(name, DEFAULTS[name]());
      }
    }
  }

  filePath(name: CollectionName): string {
    return path.join(this.dataDir, `${name}.json`);
  }

  async load<K extends CollectionName>(name: K): Promise<Collections[K]> {
    const raw = await fs.readFile(this.filePath(name), "utf-8");
    const records: Collections[K] = JSON.parse(raw);
    return records;
  }

  /** Atomically replace a collection. Resolves once this write is on disk. */
  save<K extends CollectionName>(name: K, records: Collections[K]): Promise<void> {
    const write = this.writeQueue.then(() => this.writeAtomic(name, records));
    // Keep the queue alive after a failed write; the caller still sees the rejection.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async writeAtomic(name: CollectionName, records: unknown): Promise<void> {
    const target = this.filePath(name);
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, JSON.stringify(records, null, 2), "utf-8");
    await fs.rename(temp, target);
  }
}

let store: JsonStore | undefined;

export function getStore(): JsonStore {
  if (!store) {
    throw new Error("Store not initialized. Call initStore() first.");
  }
  return store;
}

export async function initStore(dataDir: string): Promise<JsonStore> {
  const next = new JsonStore(dataDir);
  await next.init();
  store = next;
  console.log(`[Store] Data directory: ${dataDir}`);
  return next;
}
