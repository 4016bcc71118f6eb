import fs from "fs";
import path from "path";
import type { Game, Npc, PlayerId, Result } from "../engine/types";
import { type NpcError, NpcRegistry } from "../engine/npc";
import { RecordFormatError, gameFromRecord, gameToRecord, npcFromRecord, npcToRecord } from "./records";

/**
 * A JSON document holding `name -> record`, rewritten whole on every save.
 * A missing file reads as empty. Records that fail to decode are logged,
 * skipped and written back untouched. A file that cannot be parsed at all is
 * logged, read as empty and never overwritten.
 */
class JsonTable<T> {
  private rejected = new Map<string, unknown>();
  private unreadable = false;

  constructor(
    private file: string,
    private decode: (data: unknown) => T,
    private encode: (value: T) => unknown
  ) {}

  readAll(): Map<string, T> {
    this.rejected = new Map();
    this.unreadable = false;
    if (!fs.existsSync(this.file)) return new Map();

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.file, "utf8"));
    } catch (err) {
      console.warn(`Ignoring unreadable ${this.file}:`, err instanceof Error ? err.message : err);
      this.unreadable = true;
      return new Map();
    }
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      console.warn(`Ignoring ${this.file}: top level is not an object`);
      this.unreadable = true;
      return new Map();
    }

    const entries = new Map<string, T>();
    for (const [name, record] of Object.entries(raw)) {
      try {
        entries.set(name, this.decode(record));
      } catch (err) {
        if (!(err instanceof RecordFormatError)) throw err;
        console.warn(`Skipping record "${name}" in ${this.file}: ${err.message}`);
        this.rejected.set(name, record);
      }
    }
    return entries;
  }

  /** Raw records skipped by the last read, keyed by name. */
  skipped(): ReadonlyMap<string, unknown> {
    return this.rejected;
  }

  /** Writes `entries` plus the records skipped by the last read. */
  writeAll(entries: Map<string, T>): void {
    if (this.unreadable) {
      throw new Error(`Refusing to overwrite unreadable ${this.file}`);
    }
    const data: Record<string, unknown> = Object.fromEntries(this.rejected);
    for (const [name, value] of entries) data[name] = this.encode(value);
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.writeFileSync(this.file, JSON.stringify(data, null, 2));
  }
}

/** Negative id of a skipped NPC record, when it still carries a usable one. */
function skippedNpcId(record: unknown): PlayerId | null {
  if (typeof record !== "object" || record === null || !("id" in record)) return null;
  const id = record.id;
  return typeof id === "number" && Number.isSafeInteger(id) && id < 0 ? id : null;
}

/**
 * File-backed directory of named games and NPCs.
 * The command layer treats it as the single source of truth per process; the
 * NPC registry is hydrated from disk on construction so id allocation resumes
 * below every stored NPC, every skipped NPC record and every NPC seated in a
 * stored game.
 */
export class GameDirectory {
  private games: JsonTable<Game>;
  private npcTable: JsonTable<Npc>;
  readonly npcs: NpcRegistry;

  constructor(dataDir: string, npcs: NpcRegistry = new NpcRegistry()) {
    this.games = new JsonTable(path.join(dataDir, "games.json"), gameFromRecord, gameToRecord);
    this.npcTable = new JsonTable(path.join(dataDir, "npcs.json"), npcFromRecord, npcToRecord);
    this.npcs = npcs;
    this.npcs.load([...this.npcTable.readAll().values()]);
    const skipped = [...this.npcTable.skipped().values()].map(skippedNpcId);
    this.npcs.reserve([...skipped.filter((id): id is PlayerId => id !== null), ...this.seatedIds()]);
  }

  /** Fetches a game by name or null when missing. */
  loadGame(name: string): Game | null {
    return this.games.readAll().get(name) ?? null;
  }

  /** Inserts or replaces the record stored under `game.name`. */
  saveGame(game: Game): Game {
    const all = this.games.readAll();
    all.set(game.name, game);
    this.games.writeAll(all);
    return game;
  }

  deleteGame(name: string): boolean {
    const all = this.games.readAll();
    if (!all.delete(name)) return false;
    this.games.writeAll(all);
    return true;
  }

  /** True for stored games, including records that could not be decoded. */
  gameExists(name: string): boolean {
    return this.games.readAll().has(name) || this.games.skipped().has(name);
  }

  listGames(): Game[] {
    return Array.from(this.games.readAll().values());
  }

  /**
   * Load-modify-store a game snapshot.
   * Commands run one at a time on the event loop, so this is the critical section
   * for read-modify-write of a game record.
   */
  withGame(name: string, updater: (current: Game) => Game): Game | null {
    const current = this.loadGame(name);
    if (!current) return null;
    return this.saveGame(updater(current));
  }

  loadNpc(name: string): Npc | null {
    return this.npcs.get(name);
  }

  getNpcById(id: PlayerId): Npc | null {
    return this.npcs.getById(id);
  }

  npcExists(name: string): boolean {
    return this.npcs.exists(name);
  }

  listNpcs(): Npc[] {
    return this.npcs.list();
  }

  /** Registers a new NPC and writes the NPC table. */
  createNpc(name: string, profile?: string): Result<Npc, NpcError> {
    const created = this.npcs.create(name, profile);
    if (created.ok) this.flushNpcs();
    return created;
  }

  /** Persists an NPC that is already registered (e.g. after a profile edit). */
  saveNpc(npc: Npc): Npc {
    const all = this.npcs.list().filter(existing => existing.id !== npc.id);
    this.npcs.load([...all, npc]);
    this.flushNpcs();
    return npc;
  }

  /** Removes the NPC record. Cleaning it out of games is the caller's job. */
  deleteNpc(name: string): Npc | null {
    const removed = this.npcs.delete(name);
    if (removed) this.flushNpcs();
    return removed;
  }

  private seatedIds(): PlayerId[] {
    return this.listGames().flatMap(game => game.players);
  }

  private flushNpcs(): void {
    this.npcTable.writeAll(new Map(this.npcs.list().map((npc): [string, Npc] => [npc.name, npc])));
  }
}
