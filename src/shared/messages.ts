import type { Game, GameStatus, PlayerId, RoleName } from "../engine/types";
import { alivePlayers } from "../engine/transitions";

/**
 * Commands a client may issue over the WebSocket channel. Every command after
 * HELLO runs as the identified user; `channelId` is the channel the command is
 * typed in, which is how the moderator finds the game and day.
 */
export type ClientMessage =
  /** Binds the socket to a user id and display name. */
  | { type: "HELLO"; payload: { userId: PlayerId; name: string } }
  | { type: "NEW_GAME"; payload: { name: string } }
  | { type: "JOIN"; payload: { channelId: string } }
  /** Creator or moderator only. */
  | { type: "START"; payload: { name: string } }
  /** Target is a mention, a player id, an NPC name, "Abstain" or "Veto". */
  | { type: "VOTE"; payload: { channelId: string; target: string } }
  /** Creator or moderator only. */
  | { type: "END_DAY"; payload: { name: string } }
  | { type: "PLAYERS"; payload: { name: string } }
  | { type: "GET_GAME"; payload: { name: string } }
  | { type: "ROLE_DISTRIBUTION"; payload: { players: number } }
  | { type: "NPC_CREATE"; payload: { name: string; persona?: string } }
  | { type: "NPC_LIST"; payload: Record<string, never> }
  | { type: "NPC_DELETE"; payload: { name: string } }
  | { type: "NPC_JOIN"; payload: { channelId: string; npcName: string } }
  | { type: "NPC_VOTE"; payload: { channelId: string; npcName: string; target: string } }
  | { type: "NPC_SAY"; payload: { channelId: string; npcName: string; text: string } };

export type ClientMessageType = ClientMessage["type"];

/** Public roster entry. */
export interface PublicPlayerView {
  playerId: PlayerId;
  alive: boolean;
  /** Only filled for the viewer, or for everyone once the game has ended. */
  role: RoleName | null;
}

/** Sanitized game snapshot tailored for a specific viewer. */
export interface GameView {
  name: string;
  creatorId: PlayerId;
  status: GameStatus;
  currentDay: number;
  players: PublicPlayerView[];
  aliveCount: number;
  /** Channels of the day in progress, when it has any. */
  votesChannelId: string | null;
  discussionChannelId: string | null;
}

/**
 * Builds a per-viewer view. Roles stay hidden except the viewer's own until the
 * game has ended, when every role is revealed.
 */
export function buildGameView(game: Game, viewerId: PlayerId | null): GameView {
  const revealAll = game.status === "ENDED";
  const alive = new Set(alivePlayers(game));
  const today = game.channelsByDay[game.currentDay];

  return {
    name: game.name,
    creatorId: game.creatorId,
    status: game.status,
    currentDay: game.currentDay,
    players: game.players.map(id => ({
      playerId: id,
      alive: alive.has(id),
      role: revealAll || id === viewerId ? game.roles[id] ?? null : null
    })),
    aliveCount: alive.size,
    votesChannelId: today?.votesChannelId ?? null,
    discussionChannelId: today?.discussionChannelId ?? null
  };
}

/**
 * Messages emitted by the server. Replies answer the issuing socket; channel
 * traffic fans out to every identified socket; direct messages reach only the
 * addressed user.
 */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "WELCOME"; payload: { userId: PlayerId } }
  | { type: "REPLY"; payload: { command: ClientMessageType; text: string; ephemeral: boolean; channelId?: string } }
  | { type: "GAME_VIEW"; payload: { game: GameView } }
  | { type: "CHANNEL_POST"; payload: { channelId: string; channelName: string; messageId: string; text: string } }
  | { type: "CHANNEL_EDIT"; payload: { channelId: string; channelName: string; messageId: string; text: string } }
  | { type: "CHANNEL_ARCHIVED"; payload: { channelId: string; channelName: string } }
  | { type: "DIRECT"; payload: { text: string } };
