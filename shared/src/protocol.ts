import { z } from "zod";
import { SKILL_NAMES } from "./constants.js";

// --- Base schemas ---

export const Vec2Schema = z.object({
  x: z.number(),
  y: z.number(),
});
export type Vec2 = z.infer<typeof Vec2Schema>;

const Channel = z.number().int().min(0).max(255);
export const ColorSchema = z.tuple([Channel, Channel, Channel]);
export type Color = z.infer<typeof ColorSchema>;

export const SkillNameSchema = z.enum(SKILL_NAMES);

export const EntityKind = z.enum(["player", "food"]);
export type EntityKind = z.infer<typeof EntityKind>;

// --- Client → Server ---

export const ConnectPacketSchema = z.object({
  type: z.literal("connect"),
  name: z.string().max(256),
  version: z.string(),
  client_id: z.string().max(128).optional(),
});
export type ConnectPacket = z.infer<typeof ConnectPacketSchema>;

export const MovePacketSchema = z.object({
  type: z.literal("move"),
  dx: z.number(),
  dy: z.number(),
  sequence: z.number().int().nonnegative(),
  timestamp: z.number(),
});
export type MovePacket = z.infer<typeof MovePacketSchema>;

export const SkillPacketSchema = z.object({
  type: z.literal("skill"),
  skill_name: SkillNameSchema,
  target_x: z.number(),
  target_y: z.number(),
  direction: Vec2Schema.optional(),
});
export type SkillPacket = z.infer<typeof SkillPacketSchema>;

export const GetGameStatePacketSchema = z.object({
  type: z.literal("get_game_state"),
  full_update: z.boolean(),
  last_ack: z.number().int(),
});
export type GetGameStatePacket = z.infer<typeof GetGameStatePacketSchema>;

export const PingPacketSchema = z.object({
  type: z.literal("ping"),
  timestamp: z.number(),
  sequence: z.number().int().nonnegative(),
});
export type PingPacket = z.infer<typeof PingPacketSchema>;

// --- Server → Client ---

export const PongPacketSchema = z.object({
  type: z.literal("pong"),
  timestamp: z.number(),
  sequence: z.number().int().nonnegative(),
  server_time: z.number(),
});
export type PongPacket = z.infer<typeof PongPacketSchema>;

export const PlayerIdPacketSchema = z.object({
  type: z.literal("player_id"),
  player_id: z.string(),
  spawn_position: Vec2Schema,
  server_tick_rate: z.number().positive(),
});
export type PlayerIdPacket = z.infer<typeof PlayerIdPacketSchema>;

export const SkillViewSchema = z.object({
  active: z.boolean(),
  ready: z.boolean(),
  radius: z.number(), // effective radius, for rendering the area of effect
});
export type SkillView = z.infer<typeof SkillViewSchema>;

export const PlayerViewSchema = z.object({
  name: z.string(),
  position: Vec2Schema,
  radius: z.number(),
  score: z.number(),
  color: ColorSchema,
  skills: z.object({
    push: SkillViewSchema,
    pull: SkillViewSchema,
  }),
  health: z.number().optional(),
});
export type PlayerView = z.infer<typeof PlayerViewSchema>;

export const FoodViewSchema = z.object({
  id: z.string(),
  position: Vec2Schema,
  type: z.literal("food"),
  value: z.number(),
  radius: z.number(),
  color: ColorSchema,
});
export type FoodView = z.infer<typeof FoodViewSchema>;

export const GameStatePacketSchema = z.object({
  type: z.literal("game_state"),
  players: z.record(z.string(), PlayerViewSchema),
  food: z.array(FoodViewSchema),
  server_tick: z.number().int(),
  timestamp: z.number(),
});
export type GameStatePacket = z.infer<typeof GameStatePacketSchema>;

export const UsernameTakenPacketSchema = z.object({
  type: z.literal("username_taken"),
  message: z.string(),
  suggestions: z.array(z.string()),
});
export type UsernameTakenPacket = z.infer<typeof UsernameTakenPacketSchema>;

export const ServerFullPacketSchema = z.object({
  type: z.literal("server_full"),
  message: z.string(),
  max_players: z.number().int(),
  queue_position: z.number().int().optional(),
});
export type ServerFullPacket = z.infer<typeof ServerFullPacketSchema>;

// --- Unions of all wire packets ---

export const ClientPacketSchema = z.discriminatedUnion("type", [
  ConnectPacketSchema,
  MovePacketSchema,
  SkillPacketSchema,
  GetGameStatePacketSchema,
  PingPacketSchema,
]);
export type ClientPacket = z.infer<typeof ClientPacketSchema>;
export type ClientPacketType = ClientPacket["type"];

export const ServerPacketSchema = z.discriminatedUnion("type", [
  PlayerIdPacketSchema,
  GameStatePacketSchema,
  UsernameTakenPacketSchema,
  ServerFullPacketSchema,
  PongPacketSchema,
]);
export type ServerPacket = z.infer<typeof ServerPacketSchema>;

export const PacketSchema = z.discriminatedUnion("type", [
  ConnectPacketSchema,
  MovePacketSchema,
  SkillPacketSchema,
  GetGameStatePacketSchema,
  PingPacketSchema,
  PongPacketSchema,
  PlayerIdPacketSchema,
  GameStatePacketSchema,
  UsernameTakenPacketSchema,
  ServerFullPacketSchema,
]);
export type Packet = z.infer<typeof PacketSchema>;
