import type { PlayerId, RoleName, Winner } from "./types";
import { getTeam } from "./roles";

/**
 * Computes the winner (if any) from the living roster.
 * - Crew by default when nobody is left alive.
 * - Without roles (legacy mode) the game is over once one player or fewer remains.
 * - Crew wins once every saboteur is gone.
 * - Saboteurs win at half or more of the living players.
 */
export function checkWin(alivePlayers: readonly PlayerId[], roles: Readonly<Record<PlayerId, RoleName>>): Winner | null {
  const aliveCount = alivePlayers.length;
  if (aliveCount === 0) return "CREW";

  if (Object.keys(roles).length === 0) {
    return aliveCount <= 1 ? "GAME_OVER" : null;
  }

  const saboteursAlive = alivePlayers.filter(id => {
    const role = roles[id];
    return role !== undefined && getTeam(role) === "saboteur";
  }).length;

  if (saboteursAlive === 0) return "CREW";
  if (saboteursAlive >= aliveCount / 2) return "SABOTEUR";
  return null;
}
