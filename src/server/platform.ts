import { randomUUID } from "crypto";
import type { DayChannels, PlayerId } from "../engine/types";

/**
 * Chat-platform operations the moderator needs. Every handle is opaque to the
 * engine; only the platform knows what it points at.
 */
export interface Platform {
  /** Opens the thread where signups for a game are collected. */
  createSignupThread(gameName: string): Promise<string>;
  /** Creates a day's votes and discussion channels and the vote board message. */
  createDayChannels(gameName: string, day: number, boardText: string): Promise<DayChannels>;
  /** Makes a finished day's channels read-only. */
  archiveDay(channels: DayChannels): Promise<void>;
  post(channelId: string, text: string): Promise<string>;
  editMessage(channelId: string, messageId: string, text: string): Promise<void>;
  sendDirect(userId: PlayerId, text: string): Promise<void>;
  /** Display name of a real user, or null when the platform does not know them. */
  displayName(userId: PlayerId): Promise<string | null>;
}

export interface RoomMessage {
  id: string;
  text: string;
}

export interface Room {
  id: string;
  name: string;
  topic: string;
  readOnly: boolean;
  messages: RoomMessage[];
}

/** Everything that happened on the platform, for subscribers such as the socket gateway. */
export type PlatformEvent =
  | { type: "POST"; channelId: string; channelName: string; messageId: string; text: string }
  | { type: "EDIT"; channelId: string; channelName: string; messageId: string; text: string }
  | { type: "DIRECT"; userId: PlayerId; text: string }
  | { type: "ARCHIVED"; channelId: string; channelName: string };

export type PlatformListener = (event: PlatformEvent) => void;

/**
 * In-process platform: rooms live in memory and every change is pushed to
 * listeners. Handles are random UUIDs.
 */
export class RoomPlatform implements Platform {
  private rooms = new Map<string, Room>();
  private users = new Map<PlayerId, string>();
  private listeners = new Set<PlatformListener>();

  subscribe(listener: PlatformListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Records the display name a user announced on connect. */
  registerUser(userId: PlayerId, name: string): void {
    this.users.set(userId, name);
  }

  getRoom(channelId: string): Room | null {
    return this.rooms.get(channelId) ?? null;
  }

  async createSignupThread(gameName: string): Promise<string> {
    return this.createRoom(`${gameName}-signup`, `Signups for ${gameName}`).id;
  }

  async createDayChannels(gameName: string, day: number, boardText: string): Promise<DayChannels> {
    const votes = this.createRoom(`${gameName}-day-${day}-votes`, `Day ${day} voting for ${gameName}`);
    const discussion = this.createRoom(`${gameName}-day-${day}-discussion`, `Day ${day} discussion for ${gameName}`);
    const votesMessageId = await this.post(votes.id, boardText);
    return { votesChannelId: votes.id, discussionChannelId: discussion.id, votesMessageId };
  }

  async archiveDay(channels: DayChannels): Promise<void> {
    for (const channelId of [channels.votesChannelId, channels.discussionChannelId]) {
      const room = this.requireRoom(channelId);
      room.readOnly = true;
      this.emit({ type: "ARCHIVED", channelId, channelName: room.name });
    }
  }

  async post(channelId: string, text: string): Promise<string> {
    const room = this.requireRoom(channelId);
    const message: RoomMessage = { id: randomUUID(), text };
    room.messages.push(message);
    this.emit({ type: "POST", channelId, channelName: room.name, messageId: message.id, text });
    return message.id;
  }

  async editMessage(channelId: string, messageId: string, text: string): Promise<void> {
    const room = this.requireRoom(channelId);
    const message = room.messages.find(m => m.id === messageId);
    if (!message) {
      throw new Error(`Message ${messageId} not found in ${room.name}`);
    }
    message.text = text;
    this.emit({ type: "EDIT", channelId, channelName: room.name, messageId, text });
  }

  async sendDirect(userId: PlayerId, text: string): Promise<void> {
    this.emit({ type: "DIRECT", userId, text });
  }

  async displayName(userId: PlayerId): Promise<string | null> {
    return this.users.get(userId) ?? null;
  }

  private createRoom(name: string, topic: string): Room {
    const room: Room = { id: randomUUID(), name, topic, readOnly: false, messages: [] };
    this.rooms.set(room.id, room);
    return room;
  }

  private requireRoom(channelId: string): Room {
    const room = this.rooms.get(channelId);
    if (!room) {
      throw new Error(`Channel ${channelId} not found`);
    }
    return room;
  }

  private emit(event: PlatformEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("Platform listener failed", err);
      }
    }
  }
}
