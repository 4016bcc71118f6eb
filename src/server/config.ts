import { MIN_PLAYERS } from "../engine/assign";
import type { PlayerId } from "../engine/types";

export interface ServerConfig {
  port: number;
  dataDir: string;
  /** Users allowed to manage every game, on top of each game's creator. */
  moderatorIds: PlayerId[];
  minPlayers: number;
}

function parseIdList(raw: string | undefined): PlayerId[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map(part => part.trim())
    .filter(part => /^\d+$/.test(part))
    .map(Number);
}

/** Reads settings from the environment. The player minimum never drops below what role assignment needs. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const minPlayers = env.MIN_PLAYERS ? Number(env.MIN_PLAYERS) : MIN_PLAYERS;
  return {
    port: env.PORT ? Number(env.PORT) : 3000,
    dataDir: env.DATA_DIR ?? "data",
    moderatorIds: parseIdList(env.MODERATOR_IDS),
    minPlayers: Number.isInteger(minPlayers) ? Math.max(MIN_PLAYERS, minPlayers) : MIN_PLAYERS
  };
}
