/** Utility helpers shared across engine modules. */
import type { PlayerId } from "./types";

export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** NPCs live in the negative id space. */
export function isNpcId(id: PlayerId): boolean {
  return id < 0;
}

/** Placeholder label used when an id has no resolved display name. */
export function fallbackName(id: PlayerId): string {
  return isNpcId(id) ? `NPC ${id}` : `User ${id}`;
}

/** "1 vote", "2 votes". */
export function pluralVotes(count: number): string {
  return `${count} vote${count === 1 ? "" : "s"}`;
}
