import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { type ClientMessage, type ServerMessage, buildGameView } from "../shared/messages";
import { GameRuleError, type PlayerId } from "../engine/types";
import { type Actor, type CommandReply, Moderator } from "./moderator";
import { type PlatformEvent, RoomPlatform } from "./platform";
import type { GameDirectory } from "./store";

/**
 * WebSocket gateway responsible for:
 * - binding sockets to user identities,
 * - routing client commands into the moderator,
 * - replying to the issuer, and
 * - fanning platform traffic (channel posts, edits, direct messages) out to sockets.
 */
export class WebSocketGateway {
  private identities = new Map<WebSocket, PlayerId>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private moderator: Moderator,
    private platform: RoomPlatform,
    private directory: GameDirectory
  ) {}

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.identities.delete(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    this.unsubscribe = this.platform.subscribe(event => this.relay(event));
    wss.on("close", () => this.unsubscribe?.());
    return wss;
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  handleMessage(socket: WebSocket, raw: string): void {
    let message: ClientMessage;
    try {
      message = JSON.parse(raw);
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
        return;
      }
      throw err;
    }
    this.handleClientMessage(socket, message).catch(err => this.reportError(socket, err));
  }

  /** Executes the correct handler for the parsed client message. */
  private async handleClientMessage(socket: WebSocket, msg: ClientMessage): Promise<void> {
    if (typeof msg !== "object" || msg === null || typeof msg.type !== "string") {
      throw new GameRuleError("INVALID_TYPE", "Unknown message type");
    }
    if (msg.type === "HELLO") {
      this.handleHello(socket, msg.payload);
      return;
    }

    const userId = this.requireIdentity(socket);
    const inChannel = (channelId: string): Actor => ({ userId, channelId });
    const anywhere: Actor = { userId, channelId: null };

    let reply: CommandReply;
    switch (msg.type) {
      case "NEW_GAME":
        reply = await this.moderator.newGame(anywhere, msg.payload.name);
        break;
      case "JOIN":
        reply = await this.moderator.join(inChannel(msg.payload.channelId));
        break;
      case "START":
        reply = await this.moderator.start(anywhere, msg.payload.name);
        break;
      case "VOTE":
        reply = await this.moderator.vote(inChannel(msg.payload.channelId), msg.payload.target);
        break;
      case "END_DAY": {
        const { text, ephemeral } = await this.moderator.endDay(anywhere, msg.payload.name);
        reply = { text, ephemeral };
        break;
      }
      case "PLAYERS":
        reply = await this.moderator.players(msg.payload.name);
        break;
      case "GET_GAME": {
        const game = this.directory.loadGame(msg.payload.name);
        if (!game) {
          throw new GameRuleError("GAME_NOT_FOUND", `No game named '${msg.payload.name}' found!`);
        }
        this.send(socket, { type: "GAME_VIEW", payload: { game: buildGameView(game, userId) } });
        return;
      }
      case "ROLE_DISTRIBUTION":
        reply = this.moderator.roleDistribution(msg.payload.players);
        break;
      case "NPC_CREATE":
        reply = this.moderator.npcCreate(msg.payload.name, msg.payload.persona);
        break;
      case "NPC_LIST":
        reply = this.moderator.npcList();
        break;
      case "NPC_DELETE":
        reply = this.moderator.npcDelete(msg.payload.name);
        break;
      case "NPC_JOIN":
        reply = await this.moderator.npcJoin(inChannel(msg.payload.channelId), msg.payload.npcName);
        break;
      case "NPC_VOTE":
        reply = await this.moderator.npcVote(inChannel(msg.payload.channelId), msg.payload.npcName, msg.payload.target);
        break;
      case "NPC_SAY":
        reply = await this.moderator.npcSay(inChannel(msg.payload.channelId), msg.payload.npcName, msg.payload.text);
        break;
      default:
        throw new GameRuleError("INVALID_TYPE", "Unknown message type");
    }

    this.send(socket, { type: "REPLY", payload: { command: msg.type, ...reply } });
  }

  /** HELLO → remembers who the socket speaks for and publishes their display name. */
  private handleHello(socket: WebSocket, payload: { userId: PlayerId; name: string }): void {
    if (!Number.isSafeInteger(payload.userId) || payload.userId < 0) {
      throw new GameRuleError("BAD_IDENTITY", "User ids are non-negative integers");
    }
    const name = payload.name.trim();
    if (name.length === 0) {
      throw new GameRuleError("BAD_IDENTITY", "Display name cannot be empty");
    }
    this.identities.set(socket, payload.userId);
    this.platform.registerUser(payload.userId, name);
    this.send(socket, { type: "WELCOME", payload: { userId: payload.userId } });
  }

  private requireIdentity(socket: WebSocket): PlayerId {
    const userId = this.identities.get(socket);
    if (userId === undefined) {
      throw new GameRuleError("NO_IDENTITY", "Send HELLO before issuing commands");
    }
    return userId;
  }

  /** Turns platform events into socket frames. */
  private relay(event: PlatformEvent): void {
    switch (event.type) {
      case "POST":
      case "EDIT": {
        const { channelId, channelName, messageId, text } = event;
        const type = event.type === "POST" ? "CHANNEL_POST" : "CHANNEL_EDIT";
        this.broadcast({ type, payload: { channelId, channelName, messageId, text } });
        break;
      }
      case "ARCHIVED":
        this.broadcast({ type: "CHANNEL_ARCHIVED", payload: { channelId: event.channelId, channelName: event.channelName } });
        break;
      case "DIRECT":
        for (const [socket, userId] of this.identities) {
          if (userId === event.userId) this.send(socket, { type: "DIRECT", payload: { text: event.text } });
        }
        break;
    }
  }

  private reportError(socket: WebSocket, err: unknown): void {
    if (err instanceof GameRuleError) {
      this.sendError(socket, err.code, err.message);
    } else if (err instanceof TypeError) {
      console.error("Malformed command payload", err);
      this.sendError(socket, "BAD_PAYLOAD", "Malformed command payload");
    } else {
      console.error("Handler error", err);
      this.sendError(socket, "SERVER_ERROR", "Internal error");
    }
  }

  private send(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  private broadcast(message: ServerMessage): void {
    for (const socket of this.identities.keys()) {
      this.send(socket, message);
    }
  }
}
