import type { PlayerId, VoteOutcome, VoteRecord, VoteTarget } from "./types";

export const ABSTAIN: VoteTarget = { kind: "abstain" };
export const VETO: VoteTarget = { kind: "veto" };

export function candidate(id: PlayerId): VoteTarget {
  return { kind: "candidate", id };
}

const MENTION = /^<@!?(\d+)>$/;
const INTEGER = /^-?\d+$/;

/**
 * Parses raw command text into a ballot. Accepts "abstain"/"veto" in any case,
 * a user mention (`<@123>` or `<@!123>`), or a bare integer id (NPCs are negative).
 * Returns null when the text names none of those.
 */
export function parseVoteTarget(raw: string): VoteTarget | null {
  const text = raw.trim();
  const upper = text.toUpperCase();
  if (upper === "ABSTAIN") return ABSTAIN;
  if (upper === "VETO") return VETO;

  const mention = MENTION.exec(text);
  if (mention) return candidate(Number(mention[1]));
  if (INTEGER.test(text)) return candidate(Number(text));
  return null;
}

/**
 * Resolves a day's ballots.
 * - No candidate votes and no abstentions (vetoes alone included) → NO_VOTES.
 * - Abstentions above half of every recorded vote → MAJORITY_ABSTAIN.
 * - Several candidates sharing the top count → TIE, nobody leaves.
 * - Otherwise the single leader is eliminated.
 *
 * Every recorded ballot counts, including one cast by a voter eliminated since.
 * The alive list is accepted for callers that want to report against it and
 * does not filter the count.
 */
export function countVotes(votes: VoteRecord, _alivePlayers: readonly PlayerId[]): VoteOutcome {
  const tally = new Map<PlayerId, number>();
  let abstainCount = 0;

  for (const target of votes.values()) {
    switch (target.kind) {
      case "abstain":
        abstainCount++;
        break;
      case "veto":
        break;
      case "candidate":
        tally.set(target.id, (tally.get(target.id) ?? 0) + 1);
        break;
    }
  }

  if (tally.size === 0 && abstainCount === 0) {
    return { eliminatedId: null, result: "NO_VOTES", tally: new Map() };
  }

  if (abstainCount > votes.size / 2) {
    return { eliminatedId: null, result: "MAJORITY_ABSTAIN", tally };
  }

  if (tally.size > 0) {
    const topScore = Math.max(...tally.values());
    const leaders = [...tally.entries()].filter(([, score]) => score === topScore).map(([id]) => id);
    if (leaders.length > 1) {
      return { eliminatedId: null, result: "TIE", tally };
    }
    return { eliminatedId: leaders[0], result: "ELIMINATION", tally };
  }

  return { eliminatedId: null, result: "MAJORITY_ABSTAIN", tally };
}
