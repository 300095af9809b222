import { z } from "zod";

const Coordinate = z.number().finite();
const PlayerIdSchema = z.number().int().nonnegative();

// Clients sometimes send numbers as strings; whole units are kept.
const Count = z.coerce.number().finite().nonnegative().transform(Math.floor);

// --- Client → server ---

export const JoinMessageSchema = z.object({
  type: z.literal("join"),
  name: z.string().optional(),
  color: z.string().max(64).optional(),
  reconnect: z.boolean().optional(),
  last_score: Count.optional(),
  last_length: Count.optional(),
  previous_id: PlayerIdSchema.optional(),
});

export const InputMessageSchema = z.object({
  type: z.literal("input"),
  dx: Coordinate,
  dy: Coordinate,
});

export const ChatMessageSchema = z.object({
  type: z.literal("chat"),
  text: z.string().default(""),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  JoinMessageSchema,
  InputMessageSchema,
  ChatMessageSchema,
]);

export type JoinMessage = z.infer<typeof JoinMessageSchema>;
export type InputMessage = z.infer<typeof InputMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// --- Server → client ---

export const SnakeViewSchema = z.object({
  id: PlayerIdSchema,
  name: z.string(),
  color: z.string(),
  segments: z.array(z.tuple([Coordinate, Coordinate])),
  score: z.number().int(),
  alive: z.boolean(),
});

export const StateViewSchema = z.object({
  player_id: PlayerIdSchema,
  snakes: z.array(SnakeViewSchema),
  foods: z.array(z.tuple([Coordinate, Coordinate])),
  world_size: z.number(),
});

export const ServerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("join_ack"), player_id: PlayerIdSchema }),
  z.object({
    type: z.literal("chat"),
    player_id: PlayerIdSchema,
    player_name: z.string(),
    text: z.string(),
  }),
  z.object({ type: z.literal("state_update"), state: StateViewSchema }),
  z.object({ type: z.literal("error"), message: z.string() }),
]);

export type ParsedServerMessage = z.infer<typeof ServerMessageSchema>;

// --- HTTP ---

export const PlayerIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const PlayerSummarySchema = z.object({
  id: PlayerIdSchema,
  name: z.string(),
  color: z.string(),
  score: z.number().int(),
  length: z.number().int(),
  status: z.enum(["active", "pendingRespawn", "disconnected"]),
  remoteAddress: z.string().optional(),
});

export const HealthResponseSchema = z.object({
  status: z.literal("ok"),
  running: z.boolean(),
  tick: z.number().int(),
  players: z.number().int(),
  maxPlayers: z.number().int(),
  tls: z.boolean(),
});
