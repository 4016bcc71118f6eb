/**
 * Core domain types for the Crew vs Saboteurs moderator.
 * Keep this file dependency-free so it can be shared across layers.
 */

/**
 * Participant identifier. Real users are non-negative, NPCs are negative,
 * so the two spaces never collide.
 */
export type PlayerId = number;

/** Lifecycle of a game. Moves forward only. */
export type GameStatus = "SIGNUP" | "ACTIVE" | "ENDED";

export type Team = "crew" | "saboteur";

export type RoleName = "Crew Member" | "Saboteur" | "Security Officer" | "Engineer";

/** Night abilities announced to players but not resolved yet. */
export type SpecialAbility = "investigate" | "protect";

/** Immutable catalog entry describing a role. */
export interface RoleInfo {
  name: RoleName;
  team: Team;
  description: string;
  emoji: string;
  special?: SpecialAbility;
}

/** Opaque platform handles created for every day of an active game. */
export interface DayChannels {
  votesChannelId: string;
  discussionChannelId: string;
  votesMessageId: string;
}

/**
 * Immutable snapshot of one match.
 * Key invariants:
 * - `currentDay === 0` iff `status === "SIGNUP"`.
 * - `eliminatedPlayers` only holds ids found in `players`.
 * - `roles` is empty before start and covers every player after.
 */
export interface Game {
  name: string;
  creatorId: PlayerId;
  signupThreadId: string | null;
  status: GameStatus;
  currentDay: number;
  players: PlayerId[];
  eliminatedPlayers: PlayerId[];
  roles: Record<PlayerId, RoleName>;
  channelsByDay: Record<number, DayChannels>;
}

/** Synthetic participant used to fill seats while testing. */
export interface Npc {
  id: PlayerId;
  name: string;
  profile: string;
}

/** Ballot cast during a day. */
export type VoteTarget =
  | { kind: "candidate"; id: PlayerId }
  | { kind: "abstain" }
  | { kind: "veto" };

/** One day's votes, keyed by voter. Later votes overwrite earlier ones. */
export type VoteRecord = ReadonlyMap<PlayerId, VoteTarget>;

export type VoteResultKind = "ELIMINATION" | "TIE" | "NO_VOTES" | "MAJORITY_ABSTAIN";

export interface VoteOutcome {
  eliminatedId: PlayerId | null;
  result: VoteResultKind;
  tally: Map<PlayerId, number>;
}

/** `GAME_OVER` only comes out of the no-roles mode. */
export type Winner = "CREW" | "SABOTEUR" | "GAME_OVER";

/** Success-or-failure value for operations whose failure is an expected outcome. */
export type Result<T, E extends string> = { ok: true; value: T } | { ok: false; error: E };

/** Application-level error for refused commands. Surfaces to clients as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: string, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}
