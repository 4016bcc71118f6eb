import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Moderator, type ModeratorOptions } from "../../src/server/moderator";
import { type PlatformEvent, RoomPlatform } from "../../src/server/platform";
import { GameDirectory } from "../../src/server/store";
import { dayChannels } from "../../src/engine/transitions";
import type { DayChannels, Game, PlayerId } from "../../src/engine/types";

const USERS: Array<[PlayerId, string]> = [
  [1, "Ana"],
  [2, "Ben"],
  [3, "Cy"],
  [4, "Dee"],
  [5, "Eve"]
];

let dataDir: string;
let directory: GameDirectory;
let platform: RoomPlatform;
let events: PlatformEvent[];

function setup(customPlatform: RoomPlatform = new RoomPlatform(), options: ModeratorOptions = {}): Moderator {
  platform = customPlatform;
  for (const [id, name] of USERS) platform.registerUser(id, name);
  events = [];
  platform.subscribe(event => events.push(event));
  // random() = 0 always deals the saboteur seats deterministically.
  return new Moderator(directory, platform, { random: () => 0, ...options });
}

/** Creates "orbit" as user 1 and seats the given users. Returns the signup thread. */
async function openGame(moderator: Moderator, players: PlayerId[]): Promise<string> {
  const created = await moderator.newGame({ userId: 1, channelId: null }, "orbit");
  const threadId = created.channelId;
  if (!threadId) throw new Error("no signup thread");
  for (const userId of players) {
    await moderator.join({ userId, channelId: threadId });
  }
  return threadId;
}

function storedGame(): Game {
  const game = directory.loadGame("orbit");
  if (!game) throw new Error("game missing");
  return game;
}

function channelsFor(day: number): DayChannels {
  const channels = dayChannels(storedGame(), day);
  if (!channels) throw new Error(`no channels for day ${day}`);
  return channels;
}

function roomMessages(channelId: string): string[] {
  return platform.getRoom(channelId)?.messages.map(message => message.text) ?? [];
}

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "crew-moderator-"));
  directory = new GameDirectory(dataDir);
});

afterEach(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("signups", () => {
  it("creates a game with a signup thread", async () => {
    const moderator = setup();
    const reply = await moderator.newGame({ userId: 1, channelId: null }, "  orbit ");
    expect(reply.text).toBe("🎮 Game 'orbit' created! Signups are open.");
    expect(reply.channelId).toBe(storedGame().signupThreadId);
    expect(platform.getRoom(reply.channelId ?? "")?.name).toBe("orbit-signup");
    expect(storedGame().status).toBe("SIGNUP");
  });

  it("refuses duplicate and empty names", async () => {
    const moderator = setup();
    await moderator.newGame({ userId: 1, channelId: null }, "orbit");
    await expect(moderator.newGame({ userId: 2, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "GAME_EXISTS",
      message: "A game named 'orbit' already exists!"
    });
    await expect(moderator.newGame({ userId: 2, channelId: null }, "   ")).rejects.toMatchObject({ code: "INVALID_NAME" });
  });

  it("keeps the first of two concurrent games with the same name", async () => {
    const moderator = setup();
    const [first, second] = await Promise.allSettled([
      moderator.newGame({ userId: 1, channelId: null }, "orbit"),
      moderator.newGame({ userId: 2, channelId: null }, "orbit")
    ]);
    expect(first.status).toBe("fulfilled");
    expect(second).toMatchObject({ status: "rejected", reason: { code: "GAME_EXISTS" } });
    expect(storedGame().creatorId).toBe(1);
  });

  it("seats players from the signup thread and refreshes the board", async () => {
    const moderator = setup();
    const threadId = await openGame(moderator, [1]);
    const reply = await moderator.join({ userId: 2, channelId: threadId });
    expect(reply.text).toBe("✅ Ben has joined orbit!");
    expect(storedGame().players).toEqual([1, 2]);

    const board = roomMessages(threadId).at(-1);
    expect(board?.split("\n").slice(-3)).toEqual(["**Players (2):**", "• Ana", "• Ben"]);
  });

  it("refuses a second join and joins outside game channels", async () => {
    const moderator = setup();
    const threadId = await openGame(moderator, [2]);
    await expect(moderator.join({ userId: 2, channelId: threadId })).rejects.toMatchObject({
      code: "ALREADY_JOINED",
      message: "You have already joined this game!"
    });
    await expect(moderator.join({ userId: 3, channelId: "lobby" })).rejects.toMatchObject({
      code: "NOT_A_GAME_CHANNEL"
    });
    await expect(moderator.join({ userId: 3, channelId: null })).rejects.toMatchObject({ code: "NOT_A_GAME_CHANNEL" });
  });

  it("lists the roster with its status", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 3]);
    const reply = await moderator.players("orbit");
    expect(reply).toEqual({ text: "🎮 **orbit** (Signups open)\n**Players (2):**\n• Ana\n• Cy", ephemeral: true });
  });

  it("falls back to placeholder names when the platform lookup fails", async () => {
    class FlakyPlatform extends RoomPlatform {
      async displayName(): Promise<string | null> {
        throw new Error("lookup failed");
      }
    }
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const moderator = setup(new FlakyPlatform());
    await openGame(moderator, [1]);
    const reply = await moderator.players("orbit");
    expect(reply.text).toBe("🎮 **orbit** (Signups open)\n**Players (1):**\n• User 1");
    expect(warn).toHaveBeenCalledWith("Failed to resolve display name for 1:", "lookup failed");
  });
});

describe("starting", () => {
  it("requires the creator or a moderator", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 2, 3]);
    await expect(moderator.start({ userId: 2, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "NOT_ALLOWED",
      message: "You don't have permission to start this game!"
    });
  });

  it("lets configured moderators start any game", async () => {
    const moderator = setup(new RoomPlatform(), { moderatorIds: [9] });
    await openGame(moderator, [1, 2, 3]);
    await moderator.start({ userId: 9, channelId: null }, "orbit");
    expect(storedGame().status).toBe("ACTIVE");
  });

  it("requires enough players", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 2]);
    await expect(moderator.start({ userId: 1, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "NOT_ENOUGH_PLAYERS",
      message: "Need at least 3 players to start! Currently have 2."
    });
    expect(storedGame().status).toBe("SIGNUP");
  });

  it("honours a higher configured minimum", async () => {
    const moderator = setup(new RoomPlatform(), { minPlayers: 5 });
    await openGame(moderator, [1, 2, 3, 4]);
    await expect(moderator.start({ userId: 1, channelId: null }, "orbit")).rejects.toMatchObject({
      message: "Need at least 5 players to start! Currently have 4."
    });
  });

  it("reports unknown games", async () => {
    const moderator = setup();
    await expect(moderator.start({ userId: 1, channelId: null }, "nowhere")).rejects.toMatchObject({
      code: "GAME_NOT_FOUND",
      message: "No game named 'nowhere' found!"
    });
  });

  it("assigns roles, opens day 1 and sends role cards", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 2, 3]);
    const reply = await moderator.start({ userId: 1, channelId: null }, "orbit");

    const intro = "🌅 **orbit - Day 1 Begins!**\n\n**Alive Players (3):** Ana, Ben, Cy";
    expect(reply.text).toBe(intro);

    const game = storedGame();
    expect(game.status).toBe("ACTIVE");
    expect(game.currentDay).toBe(1);
    expect(game.roles).toEqual({ 1: "Crew Member", 2: "Saboteur", 3: "Crew Member" });

    const channels = channelsFor(1);
    expect(reply.channelId).toBe(channels.discussionChannelId);
    expect(platform.getRoom(channels.votesChannelId)?.name).toBe("orbit-day-1-votes");
    expect(roomMessages(channels.votesChannelId)).toEqual([
      "📊 **Current Votes**\n\nNo votes yet. Vote for a player, or Abstain, or Veto.",
      intro
    ]);
    expect(roomMessages(channels.discussionChannelId)).toEqual([intro]);

    const directs = events.filter(event => event.type === "DIRECT");
    expect(directs.map(event => (event.type === "DIRECT" ? event.userId : null))).toEqual([1, 2, 3]);
    expect(directs[1]).toEqual({
      type: "DIRECT",
      userId: 2,
      text: "Your role in **orbit**: 🔪 **Saboteur**\nAn imposter trying to sabotage the mission. Coordinate with fellow saboteurs!"
    });
  });

  it("tells saboteurs who their partners are", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 2, 3, 4, 5]);
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    expect(storedGame().roles[3]).toBe("Saboteur");
    expect(storedGame().roles[4]).toBe("Saboteur");

    const toCy = events.find(event => event.type === "DIRECT" && event.userId === 3);
    expect(toCy?.type === "DIRECT" ? toCy.text.split("\n").at(-1) : null).toBe("Fellow saboteurs: Dee");
  });

  it("refuses to start twice", async () => {
    const moderator = setup();
    await openGame(moderator, [1, 2, 3]);
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    await expect(moderator.start({ userId: 1, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "INVALID_STATUS",
      message: "Game 'orbit' has already started or ended!"
    });
  });
});

describe("voting and day resolution", () => {
  async function startedGame(players: PlayerId[]): Promise<Moderator> {
    const moderator = setup();
    await openGame(moderator, players);
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    return moderator;
  }

  it("records votes and updates the board", async () => {
    const moderator = await startedGame([1, 2, 3]);
    const { votesChannelId, votesMessageId } = channelsFor(1);

    const reply = await moderator.vote({ userId: 1, channelId: votesChannelId }, "<@2>");
    expect(reply).toEqual({ text: "✅ Your vote for Ben has been recorded!", ephemeral: true });
    const board = platform.getRoom(votesChannelId)?.messages.find(message => message.id === votesMessageId);
    expect(board?.text).toBe("📊 **Current Votes**\n\n• Ana → Ben\n\n**Tally:**\n  Ben: 1 vote");

    const abstain = await moderator.vote({ userId: 2, channelId: votesChannelId }, "abstain");
    expect(abstain.text).toBe("✅ Your vote to **Abstain** has been recorded!");
  });

  it("replaces an earlier ballot", async () => {
    const moderator = await startedGame([1, 2, 3]);
    const { votesChannelId } = channelsFor(1);
    await moderator.vote({ userId: 1, channelId: votesChannelId }, "2");
    await moderator.vote({ userId: 1, channelId: votesChannelId }, "3");
    expect(moderator.votes.get("orbit", 1)).toEqual(new Map([[1, { kind: "candidate", id: 3 }]]));
  });

  it("rejects voters and targets outside the living roster", async () => {
    const moderator = await startedGame([1, 2, 3]);
    const { votesChannelId } = channelsFor(1);
    await expect(moderator.vote({ userId: 4, channelId: votesChannelId }, "2")).rejects.toMatchObject({
      code: "NOT_A_PLAYER",
      message: "You are not a player in this game!"
    });
    await expect(moderator.vote({ userId: 1, channelId: votesChannelId }, "<@4>")).rejects.toMatchObject({
      code: "INVALID_TARGET"
    });
    await expect(moderator.vote({ userId: 1, channelId: votesChannelId }, "nobody")).rejects.toMatchObject({
      code: "INVALID_TARGET"
    });
  });

  it("refuses votes before the game starts", async () => {
    const moderator = setup();
    const threadId = await openGame(moderator, [1, 2, 3]);
    await expect(moderator.vote({ userId: 1, channelId: threadId }, "2")).rejects.toMatchObject({
      code: "INVALID_STATUS",
      message: "This game is not currently active!"
    });
  });

  it("ends the game when the saboteur is voted out", async () => {
    const moderator = await startedGame([1, 2, 3]);
    const channels = channelsFor(1);
    await moderator.vote({ userId: 1, channelId: channels.votesChannelId }, "<@2>");
    await moderator.vote({ userId: 3, channelId: channels.discussionChannelId }, "2");

    const reply = await moderator.endDay({ userId: 1, channelId: null }, "orbit");
    const text = [
      "🏁 **orbit - Game Over!**",
      "",
      "🌙 **Day 1 has ended!**",
      "",
      "**Ben** has been eliminated with **2** votes!",
      "They were: 🔪 **Saboteur**",
      "",
      "👨‍🚀 **The Crew wins!** Every saboteur has been found."
    ].join("\n");
    expect(reply.text).toBe(text);
    expect(reply.resolution.winner).toBe("CREW");
    expect(storedGame().status).toBe("ENDED");
    expect(storedGame().currentDay).toBe(1);
    expect(roomMessages(channels.discussionChannelId).at(-1)).toBe(text);
    expect(moderator.votes.get("orbit", 1).size).toBe(0);

    await expect(moderator.endDay({ userId: 1, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "INVALID_STATUS",
      message: "Game 'orbit' is not currently active!"
    });
  });

  it("advances to the next day, archiving the finished one", async () => {
    const moderator = await startedGame([1, 2, 3, 4]);
    expect(storedGame().roles[3]).toBe("Saboteur");
    const day1 = channelsFor(1);
    await moderator.vote({ userId: 1, channelId: day1.votesChannelId }, "<@4>");
    await moderator.vote({ userId: 2, channelId: day1.votesChannelId }, "<@4>");

    const reply = await moderator.endDay({ userId: 1, channelId: null }, "orbit");
    const announcement = "🌙 **Day 1 has ended!**\n\n**Dee** has been eliminated with **2** votes!\nThey were: 👨‍🚀 **Crew Member**";
    const intro = "🌅 **orbit - Day 2 Begins!**\n\n**Alive Players (3):** Ana, Ben, Cy";
    expect(reply.text).toBe(`${announcement}\n\n${intro}`);
    expect(reply.resolution.winner).toBeNull();

    const game = storedGame();
    expect(game.currentDay).toBe(2);
    expect(game.eliminatedPlayers).toEqual([4]);

    const day2 = channelsFor(2);
    expect(platform.getRoom(day2.votesChannelId)?.name).toBe("orbit-day-2-votes");
    expect(roomMessages(day2.discussionChannelId)).toEqual([intro]);
    expect(platform.getRoom(day1.votesChannelId)?.readOnly).toBe(true);
    expect(platform.getRoom(day1.discussionChannelId)?.readOnly).toBe(true);
    expect(roomMessages(day1.votesChannelId).at(-1)).toBe(announcement);

    await expect(moderator.vote({ userId: 1, channelId: day1.votesChannelId }, "2")).rejects.toMatchObject({
      code: "DAY_CLOSED"
    });
    await expect(moderator.vote({ userId: 4, channelId: day2.votesChannelId }, "2")).rejects.toMatchObject({
      code: "PLAYER_ELIMINATED",
      message: "You are eliminated and cannot act!"
    });
    await expect(moderator.vote({ userId: 1, channelId: day2.votesChannelId }, "<@4>")).rejects.toMatchObject({
      code: "INVALID_TARGET"
    });
  });

  it("only lets managers end the day", async () => {
    const moderator = await startedGame([1, 2, 3]);
    await expect(moderator.endDay({ userId: 2, channelId: null }, "orbit")).rejects.toMatchObject({
      code: "NOT_ALLOWED",
      message: "You don't have permission to manage this game!"
    });
  });

  it("keeps the committed day when the platform fails afterwards", async () => {
    class BrokenArchivePlatform extends RoomPlatform {
      async archiveDay(): Promise<void> {
        throw new Error("archive unavailable");
      }
    }
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const moderator = setup(new BrokenArchivePlatform());
    await openGame(moderator, [1, 2, 3, 4]);
    await moderator.start({ userId: 1, channelId: null }, "orbit");

    const reply = await moderator.endDay({ userId: 1, channelId: null }, "orbit");
    expect(reply.text.endsWith("\n\n⚠️ The game was updated, but the channels could not be.")).toBe(true);
    expect(reply.resolution.outcome.result).toBe("NO_VOTES");
    expect(storedGame().currentDay).toBe(2);
    expect(error).toHaveBeenCalled();
  });
});

describe("NPCs", () => {
  it("creates, lists and refuses duplicates", () => {
    const moderator = setup();
    expect(moderator.npcList().text).toBe("📋 No NPCs have been created yet.");
    expect(moderator.npcCreate("Zed").text).toBe("🤖 **NPC Created: Zed**\n**Persona:** An NPC player named Zed\n**ID:** -1");
    expect(moderator.npcCreate("Quinn", "Asks questions").text).toBe(
      "🤖 **NPC Created: Quinn**\n**Persona:** Asks questions\n**ID:** -2"
    );
    expect(() => moderator.npcCreate("zed")).toThrowError("An NPC named 'zed' already exists!");
    expect(() => moderator.npcCreate("Veto")).toThrowError(
      "NPC names cannot be empty, a number or a vote keyword like Abstain or Veto"
    );
    expect(moderator.npcList().text).toBe(
      "🤖 **NPCs**\n\n**Zed** (ID: -1)\n└ *Persona:* An NPC player named Zed\n\n**Quinn** (ID: -2)\n└ *Persona:* Asks questions"
    );
  });

  it("joins, votes and speaks as an NPC", async () => {
    const moderator = setup();
    moderator.npcCreate("Zed");
    const threadId = await openGame(moderator, [1, 2]);
    const joined = await moderator.npcJoin({ userId: 1, channelId: threadId }, "zed");
    expect(joined.text).toBe("✅ NPC 'Zed' joined game 'orbit'!");
    expect(storedGame().players).toEqual([1, 2, -1]);

    await moderator.start({ userId: 1, channelId: null }, "orbit");
    const { votesChannelId, discussionChannelId } = channelsFor(1);

    const voted = await moderator.npcVote({ userId: 1, channelId: votesChannelId }, "Zed", "<@1>");
    expect(voted.text).toBe("✅ NPC 'Zed' voted for Ana!");

    const targeted = await moderator.vote({ userId: 2, channelId: votesChannelId }, "Zed");
    expect(targeted.text).toBe("✅ Your vote for 🤖 Zed has been recorded!");

    const vetoed = await moderator.npcVote({ userId: 1, channelId: discussionChannelId }, "Zed", "veto");
    expect(vetoed.text).toBe("✅ NPC 'Zed' voted to **Veto**!");
    expect(roomMessages(discussionChannelId).at(-1)).toBe("🗳️ 🤖 **Zed** has cast their vote!");

    const said = await moderator.npcSay({ userId: 1, channelId: discussionChannelId }, "Zed", " hello crew ");
    expect(said.text).toBe("✅ Sent message as Zed.");
    expect(roomMessages(discussionChannelId).at(-1)).toBe("**🤖 Zed** (*An NPC player named Zed*): hello crew");

    await expect(moderator.npcSay({ userId: 1, channelId: discussionChannelId }, "Zed", "   ")).rejects.toMatchObject({
      code: "BAD_TEXT"
    });
  });

  it("skips NPCs when sending role cards", async () => {
    const moderator = setup();
    moderator.npcCreate("Zed");
    const threadId = await openGame(moderator, [1, 2]);
    await moderator.npcJoin({ userId: 1, channelId: threadId }, "Zed");
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    const recipients = events.flatMap(event => (event.type === "DIRECT" ? [event.userId] : []));
    expect(recipients).toEqual([1, 2]);
  });

  it("removes a deleted NPC from its games and ballots", async () => {
    const moderator = setup();
    moderator.npcCreate("Zed");
    const threadId = await openGame(moderator, [1, 2, 3]);
    await moderator.npcJoin({ userId: 1, channelId: threadId }, "Zed");
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    const { votesChannelId } = channelsFor(1);
    await moderator.vote({ userId: 1, channelId: votesChannelId }, "Zed");
    await moderator.npcVote({ userId: 1, channelId: votesChannelId }, "Zed", "2");

    const reply = moderator.npcDelete("ZED");
    expect(reply.text).toBe("✅ NPC 'Zed' has been deleted and removed from 1 game!");
    expect(storedGame().players).toEqual([1, 2, 3]);
    expect(storedGame().roles[-1]).toBeUndefined();
    expect(moderator.votes.get("orbit", 1).size).toBe(0);
    expect(() => moderator.npcDelete("Zed")).toThrowError("NPC 'Zed' not found!");
  });

  it("refuses NPCs that are not seated", async () => {
    const moderator = setup();
    moderator.npcCreate("Zed");
    await openGame(moderator, [1, 2, 3]);
    await moderator.start({ userId: 1, channelId: null }, "orbit");
    const { votesChannelId } = channelsFor(1);
    await expect(moderator.npcVote({ userId: 1, channelId: votesChannelId }, "Zed", "2")).rejects.toMatchObject({
      code: "NOT_A_PLAYER",
      message: "NPC 'Zed' is not a player in this game!"
    });
    await expect(moderator.npcVote({ userId: 1, channelId: votesChannelId }, "Nobody", "2")).rejects.toMatchObject({
      code: "NPC_NOT_FOUND"
    });
  });
});

describe("roleDistribution", () => {
  it("formats the table or refuses small games", () => {
    const moderator = setup();
    expect(moderator.roleDistribution(3).text.split("\n")[0]).toBe("📊 **Role Distribution (3 players):**");
    expect(() => moderator.roleDistribution(2)).toThrowError("Need at least 3 players to start a game");
  });
});
