import type { DayChannels, Game, GameStatus, Npc, PlayerId, RoleName } from "../engine/types";
import { isRoleName } from "../engine/roles";

/**
 * On-disk shapes. Object keys are always strings in JSON, so day numbers and
 * player ids are parsed back to integers on load.
 */
export interface DayChannelsRecord {
  votes_channel_id: string;
  discussion_channel_id: string;
  votes_message_id: string;
}

export interface GameRecord {
  name: string;
  creator_id: number;
  signup_thread_id: string | null;
  status: "signup" | "active" | "ended";
  current_day: number;
  players: number[];
  channels: Record<string, DayChannelsRecord>;
  roles: Record<string, string>;
  eliminated_players: number[];
}

export interface NpcRecord {
  id: number;
  name: string;
  profile: string;
}

/** Raised when a stored record does not have the expected shape. */
export class RecordFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordFormatError";
  }
}

const STATUS_TO_RECORD: Record<GameStatus, GameRecord["status"]> = {
  SIGNUP: "signup",
  ACTIVE: "active",
  ENDED: "ended"
};

const STATUS_FROM_RECORD: Record<GameRecord["status"], GameStatus> = {
  signup: "SIGNUP",
  active: "ACTIVE",
  ended: "ENDED"
};

export function gameToRecord(game: Game): GameRecord {
  const channels: Record<string, DayChannelsRecord> = {};
  for (const [day, bundle] of Object.entries(game.channelsByDay)) {
    channels[day] = {
      votes_channel_id: bundle.votesChannelId,
      discussion_channel_id: bundle.discussionChannelId,
      votes_message_id: bundle.votesMessageId
    };
  }
  return {
    name: game.name,
    creator_id: game.creatorId,
    signup_thread_id: game.signupThreadId,
    status: STATUS_TO_RECORD[game.status],
    current_day: game.currentDay,
    players: [...game.players],
    channels,
    roles: { ...game.roles },
    eliminated_players: [...game.eliminatedPlayers]
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireInteger(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new RecordFormatError(`${field} must be an integer`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new RecordFormatError(`${field} ${value} is outside the safe integer range`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new RecordFormatError(`${field} must be a string`);
  }
  return value;
}

/**
 * Platform handles were numeric snowflakes in older files. Values past 2^53
 * were already rounded when parsed, so they are refused rather than stringified.
 */
function requireHandle(value: unknown, field: string): string {
  if (typeof value === "number") return String(requireInteger(value, field));
  return requireString(value, field);
}

function requireIdList(value: unknown, field: string): PlayerId[] {
  if (!Array.isArray(value)) {
    throw new RecordFormatError(`${field} must be an array`);
  }
  return value.map((id, index) => requireInteger(id, `${field}[${index}]`));
}

function parseIntegerKey(key: string, field: string): number {
  if (!/^-?\d+$/.test(key)) {
    throw new RecordFormatError(`${field} key "${key}" is not an integer`);
  }
  const value = Number(key);
  if (!Number.isSafeInteger(value)) {
    throw new RecordFormatError(`${field} key "${key}" is outside the safe integer range`);
  }
  return value;
}

function parseStatus(value: unknown): GameStatus {
  if (value === "signup" || value === "active" || value === "ended") {
    return STATUS_FROM_RECORD[value];
  }
  throw new RecordFormatError(`status "${String(value)}" is not recognised`);
}

function parseChannels(value: unknown): Record<number, DayChannels> {
  if (!isObject(value)) {
    throw new RecordFormatError("channels must be an object");
  }
  const channels: Record<number, DayChannels> = {};
  for (const [key, bundle] of Object.entries(value)) {
    const day = parseIntegerKey(key, "channels");
    if (!isObject(bundle)) {
      throw new RecordFormatError(`channels.${key} must be an object`);
    }
    channels[day] = {
      votesChannelId: requireHandle(bundle.votes_channel_id, `channels.${key}.votes_channel_id`),
      discussionChannelId: requireHandle(bundle.discussion_channel_id, `channels.${key}.discussion_channel_id`),
      votesMessageId: requireHandle(bundle.votes_message_id, `channels.${key}.votes_message_id`)
    };
  }
  return channels;
}

function parseRoles(value: unknown): Record<PlayerId, RoleName> {
  if (!isObject(value)) {
    throw new RecordFormatError("roles must be an object");
  }
  const roles: Record<PlayerId, RoleName> = {};
  for (const [key, role] of Object.entries(value)) {
    const id = parseIntegerKey(key, "roles");
    const name = requireString(role, `roles.${key}`);
    if (!isRoleName(name)) {
      throw new RecordFormatError(`roles.${key} names unknown role "${name}"`);
    }
    roles[id] = name;
  }
  return roles;
}

export function gameFromRecord(data: unknown): Game {
  if (!isObject(data)) {
    throw new RecordFormatError("game record must be an object");
  }
  const signupThread = data.signup_thread_id;
  return {
    name: requireString(data.name, "name"),
    creatorId: requireInteger(data.creator_id, "creator_id"),
    signupThreadId: signupThread === null || signupThread === undefined ? null : requireHandle(signupThread, "signup_thread_id"),
    status: parseStatus(data.status),
    currentDay: requireInteger(data.current_day, "current_day"),
    players: requireIdList(data.players, "players"),
    channelsByDay: parseChannels(data.channels ?? {}),
    roles: parseRoles(data.roles ?? {}),
    eliminatedPlayers: requireIdList(data.eliminated_players ?? [], "eliminated_players")
  };
}

export function npcToRecord(npc: Npc): NpcRecord {
  return { id: npc.id, name: npc.name, profile: npc.profile };
}

export function npcFromRecord(data: unknown): Npc {
  if (!isObject(data)) {
    throw new RecordFormatError("npc record must be an object");
  }
  const id = requireInteger(data.id, "id");
  if (id >= 0) {
    throw new RecordFormatError(`npc id ${id} must be negative`);
  }
  return {
    id,
    name: requireString(data.name, "name"),
    profile: requireString(data.profile, "profile")
  };
}
