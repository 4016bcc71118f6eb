import type { Game } from "../engine/types";

/** Which part of which game a channel handle belongs to. */
export interface ChannelLocation {
  game: Game;
  /** 0 for the signup thread. */
  day: number;
  kind: "SIGNUP" | "VOTES" | "DISCUSSION";
}

/**
 * Finds the game (and day) a command was issued from. Day channels are checked
 * before signup threads so a thread reused as a day channel resolves to its day.
 */
export function locateChannel(games: readonly Game[], channelId: string): ChannelLocation | null {
  for (const game of games) {
    for (const [day, channels] of Object.entries(game.channelsByDay)) {
      if (channels.votesChannelId === channelId) {
        return { game, day: Number(day), kind: "VOTES" };
      }
      if (channels.discussionChannelId === channelId) {
        return { game, day: Number(day), kind: "DISCUSSION" };
      }
    }
  }
  const signup = games.find(game => game.signupThreadId === channelId);
  return signup ? { game: signup, day: 0, kind: "SIGNUP" } : null;
}
