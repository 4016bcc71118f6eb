import type { Npc, PlayerId, Result } from "./types";
import { parseVoteTarget } from "./votes";

/**
 * Hands out NPC ids downward from -1. Owns its cursor so that loading stored
 * NPCs can move it past every id already in use.
 */
export class NpcIdAllocator {
  private nextId: PlayerId = -1;

  next(): PlayerId {
    const id = this.nextId;
    this.nextId -= 1;
    return id;
  }

  /** Ensures ids at or above `id` are never handed out again. */
  advancePast(id: PlayerId): void {
    if (id <= this.nextId) {
      this.nextId = id - 1;
    }
  }

  peek(): PlayerId {
    return this.nextId;
  }
}

export type NpcError = "DUPLICATE_NAME" | "INVALID_NAME";

export function defaultProfile(name: string): string {
  return `An NPC player named ${name}`;
}

const key = (name: string) => name.trim().toLowerCase();

/** In-memory NPC registry. Names are unique regardless of case. */
export class NpcRegistry {
  private npcs = new Map<string, Npc>();

  constructor(private allocator: NpcIdAllocator = new NpcIdAllocator()) {}

  /** Replaces the registry contents with stored NPCs and advances the allocator past them. */
  load(npcs: readonly Npc[]): void {
    this.npcs.clear();
    for (const npc of npcs) {
      this.npcs.set(key(npc.name), { ...npc });
      this.allocator.advancePast(npc.id);
    }
  }

  /** Keeps the allocator below ids held elsewhere, such as NPCs seated in stored games. */
  reserve(ids: Iterable<PlayerId>): void {
    for (const id of ids) {
      if (id < 0) this.allocator.advancePast(id);
    }
  }

  /** Names must be non-blank and must not read as a vote target (sentinel, id or mention). */
  create(name: string, profile?: string): Result<Npc, NpcError> {
    const trimmed = name.trim();
    if (trimmed.length === 0 || parseVoteTarget(trimmed) !== null) return { ok: false, error: "INVALID_NAME" };
    if (this.npcs.has(key(trimmed))) return { ok: false, error: "DUPLICATE_NAME" };

    const npc: Npc = {
      id: this.allocator.next(),
      name: trimmed,
      profile: profile?.trim() || defaultProfile(trimmed)
    };
    this.npcs.set(key(trimmed), npc);
    return { ok: true, value: npc };
  }

  get(name: string): Npc | null {
    return this.npcs.get(key(name)) ?? null;
  }

  getById(id: PlayerId): Npc | null {
    for (const npc of this.npcs.values()) {
      if (npc.id === id) return npc;
    }
    return null;
  }

  exists(name: string): boolean {
    return this.npcs.has(key(name));
  }

  /** Removes the NPC, returning it so callers can clean up the games it sat in. */
  delete(name: string): Npc | null {
    const npc = this.get(name);
    if (!npc) return null;
    this.npcs.delete(key(name));
    return npc;
  }

  list(): Npc[] {
    return Array.from(this.npcs.values());
  }
}
