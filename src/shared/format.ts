import type { Game, PlayerId, RoleName, VoteOutcome, VoteRecord, Winner } from "../engine/types";
import { getRoleDistribution } from "../engine/assign";
import { ROLE_CATALOG, ROLE_ORDER, getRoleInfo } from "../engine/roles";
import { fallbackName, pluralVotes } from "../engine/utils";

/** Pre-resolved display names. Ids missing from the map get a placeholder label. */
export type NameLookup = ReadonlyMap<PlayerId, string>;

export function nameOf(names: NameLookup, id: PlayerId): string {
  return names.get(id) ?? fallbackName(id);
}

/**
 * Live vote board: one line per candidate ballot in casting order, grouped
 * abstain/veto lines, then the tally sorted by count.
 */
export function formatVoteMessage(votes: VoteRecord, names: NameLookup): string {
  const lines = ["📊 **Current Votes**", ""];
  const tally = new Map<PlayerId, number>();
  const abstainers: string[] = [];
  const vetoers: string[] = [];

  for (const [voterId, target] of votes) {
    const voter = nameOf(names, voterId);
    if (target.kind === "abstain") {
      abstainers.push(voter);
    } else if (target.kind === "veto") {
      vetoers.push(voter);
    } else {
      lines.push(`• ${voter} → ${nameOf(names, target.id)}`);
      tally.set(target.id, (tally.get(target.id) ?? 0) + 1);
    }
  }

  if (abstainers.length > 0) lines.push(`• ${abstainers.join(", ")} → **Abstain**`);
  if (vetoers.length > 0) lines.push(`• ${vetoers.join(", ")} → **Veto**`);

  if (votes.size === 0) {
    lines.push("No votes yet. Vote for a player, or Abstain, or Veto.");
    return lines.join("\n");
  }

  lines.push("", "**Tally:**");
  const sorted = [...tally.entries()].sort(([, a], [, b]) => b - a);
  for (const [targetId, count] of sorted) {
    lines.push(`  ${nameOf(names, targetId)}: ${pluralVotes(count)}`);
  }
  if (abstainers.length > 0) lines.push(`  Abstain: ${pluralVotes(abstainers.length)}`);
  if (vetoers.length > 0) lines.push(`  Veto: ${pluralVotes(vetoers.length)}`);

  return lines.join("\n");
}

/** End-of-day announcement. Reveals the eliminated player's role when roles are known. */
export function formatDayEndMessage(
  outcome: VoteOutcome,
  names: NameLookup,
  day: number,
  roles: Readonly<Record<PlayerId, RoleName>> = {}
): string {
  const lines = [`🌙 **Day ${day} has ended!**`, ""];

  switch (outcome.result) {
    case "ELIMINATION": {
      const id = outcome.eliminatedId;
      if (id === null) break;
      const votes = outcome.tally.get(id) ?? 0;
      lines.push(`**${nameOf(names, id)}** has been eliminated with **${votes}** vote${votes === 1 ? "" : "s"}!`);
      const role = roles[id];
      if (role !== undefined) {
        const info = getRoleInfo(role);
        lines.push(`They were: ${info.emoji} **${info.name}**`);
      }
      break;
    }
    case "TIE": {
      const top = Math.max(...outcome.tally.values());
      const tied = [...outcome.tally.entries()].filter(([, count]) => count === top).map(([id]) => nameOf(names, id));
      lines.push(`The vote ended in a **tie** between ${tied.join(", ")}.`);
      lines.push("**No one has been eliminated.**");
      break;
    }
    case "NO_VOTES":
      lines.push("**No votes were cast.**");
      lines.push("**No one has been eliminated.**");
      break;
    case "MAJORITY_ABSTAIN":
      lines.push("The **majority abstained** from voting.");
      lines.push("**No one has been eliminated.**");
      break;
    default: {
      const exhaustive: never = outcome.result;
      throw new Error(`Unknown vote result ${exhaustive}`);
    }
  }

  return lines.join("\n");
}

export function formatWinner(winner: Winner): string {
  switch (winner) {
    case "CREW":
      return `${ROLE_CATALOG["Crew Member"].emoji} **The Crew wins!** Every saboteur has been found.`;
    case "SABOTEUR":
      return `${ROLE_CATALOG.Saboteur.emoji} **The Saboteurs win!** They now hold half of the crew.`;
    case "GAME_OVER":
      return "🏁 **The game is over!**";
  }
}

/** Role counts for a table size, or null below the minimum. */
export function formatRoleDistribution(playerCount: number): string | null {
  const distribution = getRoleDistribution(playerCount);
  if (!distribution.ok) return null;

  const lines = [`📊 **Role Distribution (${playerCount} players):**`, ""];
  for (const role of ROLE_ORDER) {
    const count = distribution.value[role];
    if (count > 0) lines.push(`- ${ROLE_CATALOG[role].emoji} **${role}**: ${count}`);
  }
  return lines.join("\n");
}

/** Roster in join order with eliminated players struck through. */
export function formatPlayerList(game: Game, names: NameLookup): string {
  const lines = [`**Players (${game.players.length}):**`];
  if (game.players.length === 0) {
    lines.push("None yet");
    return lines.join("\n");
  }
  for (const id of game.players) {
    const name = nameOf(names, id);
    lines.push(game.eliminatedPlayers.includes(id) ? `• ~~${name}~~ (eliminated)` : `• ${name}`);
  }
  return lines.join("\n");
}
