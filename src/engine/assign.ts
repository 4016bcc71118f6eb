import type { PlayerId, Result, RoleName } from "./types";
import { ROLE_ORDER } from "./roles";
import { type RandomFn, defaultRandom, shuffle } from "./utils";

/** Smallest table the role rules are defined for. */
export const MIN_PLAYERS = 3;

export type RoleDistribution = Record<RoleName, number>;

export type DistributionError = "NOT_ENOUGH_PLAYERS";

/**
 * Role counts for a table of `playerCount` seats:
 * - a quarter saboteurs, rounded up, at least one,
 * - one Security Officer from 6 players,
 * - one Engineer from 8 players,
 * - everyone else Crew Member.
 */
export function getRoleDistribution(playerCount: number): Result<RoleDistribution, DistributionError> {
  if (!Number.isInteger(playerCount) || playerCount < MIN_PLAYERS) {
    return { ok: false, error: "NOT_ENOUGH_PLAYERS" };
  }

  const saboteurs = Math.max(1, Math.floor((playerCount + 3) / 4));
  const securityOfficers = playerCount >= 6 ? 1 : 0;
  const engineers = playerCount >= 8 ? 1 : 0;

  return {
    ok: true,
    value: {
      "Crew Member": playerCount - saboteurs - securityOfficers - engineers,
      Saboteur: saboteurs,
      "Security Officer": securityOfficers,
      Engineer: engineers
    }
  };
}

/**
 * One-time role assignment. The role multiset is shuffled and zipped against
 * `playerIds` in the order given, so every id receives exactly one role.
 */
export function assignRoles(
  playerIds: readonly PlayerId[],
  random: RandomFn = defaultRandom
): Result<Record<PlayerId, RoleName>, DistributionError> {
  const distribution = getRoleDistribution(playerIds.length);
  if (!distribution.ok) return distribution;

  const pool: RoleName[] = [];
  for (const role of ROLE_ORDER) {
    for (let i = 0; i < distribution.value[role]; i++) pool.push(role);
  }

  const shuffled = shuffle(pool, random);
  const assignments: Record<PlayerId, RoleName> = {};
  playerIds.forEach((id, index) => {
    assignments[id] = shuffled[index];
  });
  return { ok: true, value: assignments };
}
