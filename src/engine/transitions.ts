import {
  type DayChannels,
  type Game,
  GameRuleError,
  type PlayerId,
  type RoleName,
  type VoteOutcome,
  type VoteRecord,
  type Winner
} from "./types";
import { countVotes } from "./votes";
import { checkWin } from "./win";

/** Why a transition left the game untouched. */
export type TransitionFailure =
  | "ALREADY_PRESENT"
  | "NOT_PRESENT"
  | "ALREADY_ELIMINATED"
  | "NOT_IN_SIGNUP"
  | "NOT_ACTIVE";

/**
 * Outcome of a guarded transition. On failure the original snapshot comes back
 * unchanged so callers can keep using it.
 */
export type Transition =
  | { ok: true; game: Game }
  | { ok: false; game: Game; reason: TransitionFailure };

function fail(game: Game, reason: TransitionFailure): Transition {
  return { ok: false, game, reason };
}

/** Creates a fresh game in signup. */
export function createGame(name: string, creatorId: PlayerId, signupThreadId: string | null = null): Game {
  return {
    name,
    creatorId,
    signupThreadId,
    status: "SIGNUP",
    currentDay: 0,
    players: [],
    eliminatedPlayers: [],
    roles: {},
    channelsByDay: {}
  };
}

/**
 * Appends a participant in join order. Status is not checked here; the command
 * layer only calls this during signup.
 */
export function addPlayer(game: Game, playerId: PlayerId): Transition {
  if (game.players.includes(playerId)) return fail(game, "ALREADY_PRESENT");
  return { ok: true, game: { ...game, players: [...game.players, playerId] } };
}

/**
 * Drops a participant in any status, along with their role and elimination
 * entry. Used when an NPC is deleted.
 */
export function removePlayer(game: Game, playerId: PlayerId): Transition {
  if (!game.players.includes(playerId)) return fail(game, "NOT_PRESENT");
  const roles = { ...game.roles };
  delete roles[playerId];
  return {
    ok: true,
    game: {
      ...game,
      players: game.players.filter(id => id !== playerId),
      eliminatedPlayers: game.eliminatedPlayers.filter(id => id !== playerId),
      roles
    }
  };
}

/**
 * Moves signup to day 1. The player minimum and role assignment are the
 * caller's job.
 */
export function startGame(game: Game): Transition {
  if (game.status !== "SIGNUP") return fail(game, "NOT_IN_SIGNUP");
  return { ok: true, game: { ...game, status: "ACTIVE", currentDay: 1 } };
}

/** Attaches the one-time role mapping produced at start. */
export function setRoles(game: Game, roles: Readonly<Record<PlayerId, RoleName>>): Game {
  return { ...game, roles: { ...roles } };
}

/** Idempotent; membership is not validated here. */
export function eliminate(game: Game, playerId: PlayerId): Transition {
  if (game.eliminatedPlayers.includes(playerId)) return fail(game, "ALREADY_ELIMINATED");
  return { ok: true, game: { ...game, eliminatedPlayers: [...game.eliminatedPlayers, playerId] } };
}

/** Bumps the day counter while active. Channels for the new day are attached afterwards. */
export function advanceDay(game: Game): Transition {
  if (game.status !== "ACTIVE") return fail(game, "NOT_ACTIVE");
  return { ok: true, game: { ...game, currentDay: game.currentDay + 1 } };
}

export function attachDayChannels(game: Game, day: number, channels: DayChannels): Game {
  return { ...game, channelsByDay: { ...game.channelsByDay, [day]: { ...channels } } };
}

/** Terminal. */
export function endGame(game: Game): Game {
  return { ...game, status: "ENDED" };
}

export function isAlive(game: Game, playerId: PlayerId): boolean {
  return game.players.includes(playerId) && !game.eliminatedPlayers.includes(playerId);
}

/** Living players in join order. */
export function alivePlayers(game: Game): PlayerId[] {
  return game.players.filter(id => isAlive(game, id));
}

export function dayChannels(game: Game, day: number = game.currentDay): DayChannels | null {
  return game.channelsByDay[day] ?? null;
}

/** Everything the end of a day decided, committed before anyone announces it. */
export interface DayResolution {
  game: Game;
  day: number;
  outcome: VoteOutcome;
  winner: Winner | null;
}

/**
 * Closes the current day: tallies the ballots, eliminates the leader (if any),
 * evaluates the win condition on the survivors, then either ends the game or
 * advances to the next day.
 */
export function resolveDay(game: Game, votes: VoteRecord): DayResolution {
  if (game.status !== "ACTIVE") {
    throw new GameRuleError("INVALID_STATUS", `Game ${game.name} is not active`);
  }

  const day = game.currentDay;
  const outcome = countVotes(votes, alivePlayers(game));

  let next = game;
  if (outcome.eliminatedId !== null) {
    next = eliminate(next, outcome.eliminatedId).game;
  }

  const winner = checkWin(alivePlayers(next), next.roles);
  if (winner) {
    return { game: endGame(next), day, outcome, winner };
  }
  return { game: advanceDay(next).game, day, outcome, winner: null };
}
