import { type Game, GameRuleError, type Npc, type PlayerId, type VoteRecord, type VoteTarget } from "../engine/types";
import * as transitions from "../engine/transitions";
import { MIN_PLAYERS, assignRoles } from "../engine/assign";
import { getRoleInfo, getTeam } from "../engine/roles";
import { candidate, parseVoteTarget } from "../engine/votes";
import { type RandomFn, defaultRandom, fallbackName, isNpcId } from "../engine/utils";
import {
  type NameLookup,
  formatDayEndMessage,
  formatPlayerList,
  formatRoleDistribution,
  formatVoteMessage,
  formatWinner,
  nameOf
} from "../shared/format";
import { type ChannelLocation, locateChannel } from "./channels";
import type { Platform } from "./platform";
import type { GameDirectory } from "./store";

/** Who issued a command and from which channel. */
export interface Actor {
  userId: PlayerId;
  channelId: string | null;
}

export interface CommandReply {
  text: string;
  /** Shown only to the issuer. */
  ephemeral: boolean;
  /** Channel the issuer should move to, when the command opened one. */
  channelId?: string;
}

export interface DayEndReply extends CommandReply {
  resolution: transitions.DayResolution;
}

export interface ModeratorOptions {
  moderatorIds?: readonly PlayerId[];
  minPlayers?: number;
  random?: RandomFn;
}

const MAX_SAY_LENGTH = 2000;

/**
 * Ballots for the day in progress, per game. Held in memory only; a restart
 * loses the open day's votes.
 */
export class VoteBook {
  private votes = new Map<string, Map<number, Map<PlayerId, VoteTarget>>>();

  /** Records (or replaces) a voter's ballot and returns the day's ballots. */
  record(gameName: string, day: number, voterId: PlayerId, target: VoteTarget): VoteRecord {
    const byDay = this.votes.get(gameName) ?? new Map<number, Map<PlayerId, VoteTarget>>();
    const ballots = byDay.get(day) ?? new Map<PlayerId, VoteTarget>();
    ballots.set(voterId, target);
    byDay.set(day, ballots);
    this.votes.set(gameName, byDay);
    return ballots;
  }

  get(gameName: string, day: number): VoteRecord {
    return this.votes.get(gameName)?.get(day) ?? new Map();
  }

  discardDay(gameName: string, day: number): void {
    this.votes.get(gameName)?.delete(day);
  }

  forget(gameName: string): void {
    this.votes.delete(gameName);
  }

  /** Drops every ballot cast by or for a participant that left the game. */
  removeParticipant(gameName: string, playerId: PlayerId): void {
    const byDay = this.votes.get(gameName);
    if (!byDay) return;
    for (const ballots of byDay.values()) {
      ballots.delete(playerId);
      for (const [voterId, target] of ballots) {
        if (target.kind === "candidate" && target.id === playerId) ballots.delete(voterId);
      }
    }
  }
}

/**
 * Command surface of the bot. Every command validates against the stored game,
 * commits the new state through the directory, and only then talks to the
 * platform, so a failed announcement never reopens a decided day.
 * Refusals are thrown as GameRuleError for the transport to report.
 */
export class Moderator {
  readonly votes = new VoteBook();
  private moderatorIds: Set<PlayerId>;
  private minPlayers: number;
  private random: RandomFn;

  constructor(
    private directory: GameDirectory,
    private platform: Platform,
    options: ModeratorOptions = {}
  ) {
    this.moderatorIds = new Set(options.moderatorIds ?? []);
    this.minPlayers = Math.max(MIN_PLAYERS, options.minPlayers ?? MIN_PLAYERS);
    this.random = options.random ?? defaultRandom;
  }

  /** Creators manage their own games; configured moderators manage all of them. */
  canManage(userId: PlayerId, game: Game): boolean {
    return userId === game.creatorId || this.moderatorIds.has(userId);
  }

  /** /new_game: opens a signup thread and stores the game. */
  async newGame(actor: Actor, name: string): Promise<CommandReply> {
    const gameName = name.trim();
    if (gameName.length === 0) {
      throw new GameRuleError("INVALID_NAME", "Game names cannot be empty");
    }
    if (this.directory.gameExists(gameName)) {
      throw new GameRuleError("GAME_EXISTS", `A game named '${gameName}' already exists!`);
    }

    const threadId = await this.platform.createSignupThread(gameName);
    // Another /new_game for the same name may have been saved while the thread was created.
    if (this.directory.gameExists(gameName)) {
      throw new GameRuleError("GAME_EXISTS", `A game named '${gameName}' already exists!`);
    }
    const game = this.directory.saveGame(transitions.createGame(gameName, actor.userId, threadId));
    const names = await this.resolveNames([game.creatorId]);
    const posted = await this.announce(`signup board for ${gameName}`, () =>
      this.platform.post(threadId, this.signupText(game, names))
    );

    return {
      text: `🎮 Game '${gameName}' created! Signups are open.${posted ? "" : this.warning()}`,
      ephemeral: false,
      channelId: threadId
    };
  }

  /** /join: seats the issuer in the game whose signup thread they are in. */
  async join(actor: Actor): Promise<CommandReply> {
    const location = this.requireLocation(actor);
    const game = await this.seat(location, actor.userId, "You have");
    const names = await this.resolveNames([actor.userId]);
    return { text: `✅ ${nameOf(names, actor.userId)} has joined ${game.name}!`, ephemeral: false };
  }

  /** /start: assigns roles, moves to day 1 and opens the first day's channels. */
  async start(actor: Actor, name: string): Promise<CommandReply> {
    const game = this.requireGame(name);
    this.requireManager(actor, game, "start");
    if (game.status !== "SIGNUP") {
      throw new GameRuleError("INVALID_STATUS", `Game '${game.name}' has already started or ended!`);
    }
    if (game.players.length < this.minPlayers) {
      throw new GameRuleError(
        "NOT_ENOUGH_PLAYERS",
        `Need at least ${this.minPlayers} players to start! Currently have ${game.players.length}.`
      );
    }

    const roles = assignRoles(game.players, this.random);
    if (!roles.ok) {
      throw new GameRuleError("NOT_ENOUGH_PLAYERS", `Need at least ${MIN_PLAYERS} players to assign roles`);
    }
    const started = transitions.startGame(transitions.setRoles(game, roles.value));
    if (!started.ok) {
      throw new GameRuleError("INVALID_STATUS", `Game '${game.name}' has already started or ended!`);
    }

    let current = this.directory.saveGame(started.game);
    console.log(`Game ${current.name} started with ${current.players.length} players`);
    const names = await this.resolveNames(current.players);
    const intro = this.dayIntroText(current, 1, names);

    const announced = await this.announce(`day 1 of ${current.name}`, async () => {
      current = await this.openDay(current, 1, names);
      await this.postToDay(current, 1, intro);
      await this.sendRoleCards(current, names);
    });

    return {
      text: `${intro}${announced ? "" : this.warning()}`,
      ephemeral: false,
      channelId: transitions.dayChannels(current, 1)?.discussionChannelId
    };
  }

  /** /vote: records the issuer's ballot for the day whose channel they are in. */
  async vote(actor: Actor, rawTarget: string): Promise<CommandReply> {
    const location = this.requireLocation(actor);
    const { target, label } = await this.castVote(location, actor.userId, rawTarget, "You are");
    const text =
      target.kind === "candidate"
        ? `✅ Your vote for ${label} has been recorded!`
        : `✅ Your vote to ${label} has been recorded!`;
    return { text, ephemeral: true };
  }

  /**
   * /end_day: resolves the day's ballots, stores the result, then announces it
   * and either closes the game or opens the next day's channels.
   */
  async endDay(actor: Actor, name: string): Promise<DayEndReply> {
    const game = this.requireGame(name);
    this.requireManager(actor, game, "manage");
    if (game.status !== "ACTIVE") {
      throw new GameRuleError("INVALID_STATUS", `Game '${game.name}' is not currently active!`);
    }

    const resolution = transitions.resolveDay(game, this.votes.get(game.name, game.currentDay));
    let current = this.directory.saveGame(resolution.game);
    this.votes.discardDay(game.name, resolution.day);
    console.log(
      `Day ${resolution.day} of ${game.name} resolved: ${resolution.outcome.result}` +
        (resolution.winner ? `, winner ${resolution.winner}` : "")
    );

    const names = await this.resolveNames(current.players);
    const announcement = formatDayEndMessage(resolution.outcome, names, resolution.day, current.roles);
    const previous = transitions.dayChannels(current, resolution.day);

    if (resolution.winner) {
      this.votes.forget(game.name);
      const text = `🏁 **${current.name} - Game Over!**\n\n${announcement}\n\n${formatWinner(resolution.winner)}`;
      const announced = await this.announce(`game over for ${current.name}`, async () => {
        await this.postToDay(current, resolution.day, text);
      });
      return { text: `${text}${announced ? "" : this.warning()}`, ephemeral: false, resolution };
    }

    const nextDay = current.currentDay;
    const intro = this.dayIntroText(current, nextDay, names);
    const announced = await this.announce(`day ${nextDay} of ${current.name}`, async () => {
      current = await this.openDay(current, nextDay, names);
      if (previous) {
        await this.platform.archiveDay(previous);
        await this.postToDay(current, resolution.day, announcement);
      }
      await this.postToDay(current, nextDay, intro);
    });

    return {
      text: `${announcement}\n\n${intro}${announced ? "" : this.warning()}`,
      ephemeral: false,
      resolution
    };
  }

  /** /players: roster with eliminations. */
  async players(name: string): Promise<CommandReply> {
    const game = this.requireGame(name);
    const names = await this.resolveNames(game.players);
    const status =
      game.status === "ACTIVE" ? `Day ${game.currentDay}` : game.status === "SIGNUP" ? "Signups open" : "Ended";
    return { text: `🎮 **${game.name}** (${status})\n${formatPlayerList(game, names)}`, ephemeral: true };
  }

  /** Role counts a table of the given size would get. */
  roleDistribution(playerCount: number): CommandReply {
    const text = formatRoleDistribution(playerCount);
    if (text === null) {
      throw new GameRuleError("NOT_ENOUGH_PLAYERS", `Need at least ${MIN_PLAYERS} players to start a game`);
    }
    return { text, ephemeral: true };
  }

  npcCreate(name: string, persona?: string): CommandReply {
    const created = this.directory.createNpc(name, persona);
    if (!created.ok) {
      if (created.error === "DUPLICATE_NAME") {
        throw new GameRuleError("NPC_EXISTS", `An NPC named '${name.trim()}' already exists!`);
      }
      throw new GameRuleError(
        "INVALID_NAME",
        "NPC names cannot be empty, a number or a vote keyword like Abstain or Veto"
      );
    }
    const npc = created.value;
    return {
      text: `🤖 **NPC Created: ${npc.name}**\n**Persona:** ${npc.profile}\n**ID:** ${npc.id}`,
      ephemeral: false
    };
  }

  npcList(): CommandReply {
    const npcs = this.directory.listNpcs();
    if (npcs.length === 0) {
      return { text: "📋 No NPCs have been created yet.", ephemeral: true };
    }
    const entries = npcs.map(npc => `**${npc.name}** (ID: ${npc.id})\n└ *Persona:* ${npc.profile}`);
    return { text: `🤖 **NPCs**\n\n${entries.join("\n\n")}`, ephemeral: true };
  }

  /** Deletes an NPC and takes it out of every game it joined. */
  npcDelete(name: string): CommandReply {
    const npc = this.requireNpc(name);
    let cleaned = 0;
    for (const game of this.directory.listGames()) {
      const removed = transitions.removePlayer(game, npc.id);
      if (!removed.ok) continue;
      this.directory.saveGame(removed.game);
      this.votes.removeParticipant(game.name, npc.id);
      cleaned++;
    }
    this.directory.deleteNpc(npc.name);
    const suffix = cleaned > 0 ? ` and removed from ${cleaned} game${cleaned === 1 ? "" : "s"}` : "";
    return { text: `✅ NPC '${npc.name}' has been deleted${suffix}!`, ephemeral: true };
  }

  /** Seats an NPC in the game whose signup thread the command came from. */
  async npcJoin(actor: Actor, npcName: string): Promise<CommandReply> {
    const location = this.requireLocation(actor);
    const npc = this.requireNpc(npcName);
    const game = await this.seat(location, npc.id, `NPC '${npc.name}' has`);
    return { text: `✅ NPC '${npc.name}' joined game '${game.name}'!`, ephemeral: true };
  }

  async npcVote(actor: Actor, npcName: string, rawTarget: string): Promise<CommandReply> {
    const location = this.requireLocation(actor);
    const npc = this.requireNpc(npcName);
    const { target, label } = await this.castVote(location, npc.id, rawTarget, `NPC '${npc.name}' is`);
    if (location.kind !== "VOTES" && actor.channelId) {
      const channelId = actor.channelId;
      await this.announce(`vote notice for ${npc.name}`, () =>
        this.platform.post(channelId, `🗳️ 🤖 **${npc.name}** has cast their vote!`)
      );
    }
    const verb = target.kind === "candidate" ? "voted for" : "voted to";
    return { text: `✅ NPC '${npc.name}' ${verb} ${label}!`, ephemeral: true };
  }

  /** Posts a line of dialogue as an NPC in the issuing channel. */
  async npcSay(actor: Actor, npcName: string, message: string): Promise<CommandReply> {
    const location = this.requireLocation(actor);
    const npc = this.requireNpc(npcName);
    this.requireLivingParticipant(location.game, npc.id, `NPC '${npc.name}' is`);

    const text = message.trim();
    if (text.length === 0 || text.length > MAX_SAY_LENGTH) {
      throw new GameRuleError("BAD_TEXT", `Messages must be 1-${MAX_SAY_LENGTH} characters`);
    }
    if (!actor.channelId) {
      throw new GameRuleError("NOT_A_GAME_CHANNEL", "This channel is not a game channel!");
    }
    await this.platform.post(actor.channelId, `**🤖 ${npc.name}** (*${npc.profile}*): ${text}`);
    return { text: `✅ Sent message as ${npc.name}.`, ephemeral: true };
  }

  /**
   * Display labels for participants. NPCs come from the registry, real users
   * from the platform, falling back to a placeholder when either lookup fails.
   */
  async resolveNames(ids: readonly PlayerId[]): Promise<Map<PlayerId, string>> {
    const names = new Map<PlayerId, string>();
    for (const id of ids) {
      if (isNpcId(id)) {
        const npc = this.directory.getNpcById(id);
        names.set(id, `🤖 ${npc ? npc.name : fallbackName(id)}`);
        continue;
      }
      let name: string | null = null;
      try {
        name = await this.platform.displayName(id);
      } catch (err) {
        console.warn(`Failed to resolve display name for ${id}:`, err instanceof Error ? err.message : err);
      }
      names.set(id, name ?? fallbackName(id));
    }
    return names;
  }

  private requireGame(name: string): Game {
    const game = this.directory.loadGame(name.trim());
    if (!game) {
      throw new GameRuleError("GAME_NOT_FOUND", `No game named '${name.trim()}' found!`);
    }
    return game;
  }

  private requireNpc(name: string): Npc {
    const npc = this.directory.loadNpc(name);
    if (!npc) {
      throw new GameRuleError("NPC_NOT_FOUND", `NPC '${name.trim()}' not found!`);
    }
    return npc;
  }

  private requireManager(actor: Actor, game: Game, verb: string): void {
    if (!this.canManage(actor.userId, game)) {
      throw new GameRuleError("NOT_ALLOWED", `You don't have permission to ${verb} this game!`);
    }
  }

  private requireLocation(actor: Actor): ChannelLocation {
    const location = actor.channelId ? locateChannel(this.directory.listGames(), actor.channelId) : null;
    if (!location) {
      throw new GameRuleError("NOT_A_GAME_CHANNEL", "This channel is not a game channel!");
    }
    return location;
  }

  private requireLivingParticipant(game: Game, playerId: PlayerId, subject: string): void {
    if (!game.players.includes(playerId)) {
      throw new GameRuleError("NOT_A_PLAYER", `${subject} not a player in this game!`);
    }
    if (!transitions.isAlive(game, playerId)) {
      throw new GameRuleError("PLAYER_ELIMINATED", `${subject} eliminated and cannot act!`);
    }
  }

  /** Adds a participant during signup and refreshes the signup board. */
  private async seat(location: ChannelLocation, playerId: PlayerId, subject: string): Promise<Game> {
    if (location.game.status !== "SIGNUP") {
      throw new GameRuleError("INVALID_STATUS", "This game has already started or ended!");
    }
    const added = transitions.addPlayer(location.game, playerId);
    if (!added.ok) {
      throw new GameRuleError("ALREADY_JOINED", `${subject} already joined this game!`);
    }
    const game = this.directory.saveGame(added.game);
    const threadId = game.signupThreadId;
    if (threadId) {
      const names = await this.resolveNames([game.creatorId, ...game.players]);
      await this.announce(`signup board for ${game.name}`, () =>
        this.platform.post(threadId, this.signupText(game, names))
      );
    }
    return game;
  }

  private async castVote(
    location: ChannelLocation,
    voterId: PlayerId,
    rawTarget: string,
    subject: string
  ): Promise<{ target: VoteTarget; label: string }> {
    const { game, day } = location;
    if (game.status !== "ACTIVE") {
      throw new GameRuleError("INVALID_STATUS", "This game is not currently active!");
    }
    if (day !== game.currentDay) {
      throw new GameRuleError("DAY_CLOSED", `Voting for day ${day} has closed.`);
    }
    this.requireLivingParticipant(game, voterId, subject);

    const target = this.parseTarget(rawTarget);
    if (!target) {
      throw new GameRuleError("INVALID_TARGET", "Invalid vote target! Use a mention, an NPC name, 'Abstain', or 'Veto'.");
    }
    if (target.kind === "candidate") {
      if (!game.players.includes(target.id)) {
        throw new GameRuleError("INVALID_TARGET", "That player is not in this game!");
      }
      if (!transitions.isAlive(game, target.id)) {
        throw new GameRuleError("INVALID_TARGET", "That player has been eliminated!");
      }
    }

    const ballots = this.votes.record(game.name, day, voterId, target);
    const names = await this.resolveNames(game.players);
    const channels = transitions.dayChannels(game, day);
    if (channels) {
      await this.announce(`vote board for ${game.name}`, () =>
        this.platform.editMessage(channels.votesChannelId, channels.votesMessageId, formatVoteMessage(ballots, names))
      );
    }

    const label =
      target.kind === "candidate" ? nameOf(names, target.id) : target.kind === "abstain" ? "**Abstain**" : "**Veto**";
    return { target, label };
  }

  /** Mentions, ids and sentinels first, then NPC names. */
  private parseTarget(rawTarget: string): VoteTarget | null {
    const parsed = parseVoteTarget(rawTarget);
    if (parsed) return parsed;
    const npc = this.directory.loadNpc(rawTarget);
    return npc ? candidate(npc.id) : null;
  }

  /** Creates a day's channels with an empty vote board and stores the handles. */
  private async openDay(game: Game, day: number, names: NameLookup): Promise<Game> {
    const channels = await this.platform.createDayChannels(game.name, day, formatVoteMessage(new Map(), names));
    const updated = this.directory.withGame(game.name, current => transitions.attachDayChannels(current, day, channels));
    return updated ?? transitions.attachDayChannels(game, day, channels);
  }

  private async postToDay(game: Game, day: number, text: string): Promise<void> {
    const channels = transitions.dayChannels(game, day);
    if (!channels) return;
    await this.platform.post(channels.votesChannelId, text);
    await this.platform.post(channels.discussionChannelId, text);
  }

  /** Private role cards. NPCs have no inbox and are skipped. */
  private async sendRoleCards(game: Game, names: NameLookup): Promise<void> {
    const saboteurs = game.players.filter(id => getTeam(game.roles[id]) === "saboteur");
    for (const id of game.players) {
      if (isNpcId(id)) continue;
      const info = getRoleInfo(game.roles[id]);
      const lines = [`Your role in **${game.name}**: ${info.emoji} **${info.name}**`, info.description];
      if (info.team === "saboteur" && saboteurs.length > 1) {
        const partners = saboteurs.filter(other => other !== id).map(other => nameOf(names, other));
        lines.push(`Fellow saboteurs: ${partners.join(", ")}`);
      }
      await this.platform.sendDirect(id, lines.join("\n"));
    }
  }

  private signupText(game: Game, names: NameLookup): string {
    return [
      `🎮 **${game.name} - Signup**`,
      `A game created by ${nameOf(names, game.creatorId)}!`,
      `Use /join to join the game. Once enough players have joined, a moderator can use /start ${game.name} to begin!`,
      "",
      formatPlayerList(game, names)
    ].join("\n");
  }

  private dayIntroText(game: Game, day: number, names: NameLookup): string {
    const alive = transitions.alivePlayers(game).map(id => nameOf(names, id));
    return `🌅 **${game.name} - Day ${day} Begins!**\n\n**Alive Players (${alive.length}):** ${alive.join(", ")}`;
  }

  /**
   * Runs platform-side follow-up to an already committed change. Failures are
   * logged and reported to the issuer; the committed state stands.
   */
  private async announce(what: string, task: () => Promise<unknown>): Promise<boolean> {
    try {
      await task();
      return true;
    } catch (err) {
      console.error(`Failed to post ${what}`, err);
      return false;
    }
  }

  private warning(): string {
    return "\n\n⚠️ The game was updated, but the channels could not be.";
  }
}
