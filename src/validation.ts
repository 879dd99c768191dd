import { z } from "zod";
import { GRID } from "./config.js";
import { GameConfigError } from "./errors.js";
import type { GameConfig } from "./types.js";

export const DirectionSchema = z.enum(["up", "down", "left", "right"]);
export const GameModeSchema = z.enum(["classic", "borderless", "obstacles", "timeChallenge"]);
export const DifficultySchema = z.enum(["easy", "normal", "hard", "expert"]);
export const FoodTypeSchema = z.enum(["regular", "bonus", "speedUp", "speedDown", "ghost", "shrink"]);
export const GameOverReasonSchema = z.enum(["wallCollision", "selfCollision", "obstacleCollision", "timeUp"]);

export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const GameConfigSchema = z.object({
  gridWidth: z.number().int().min(GRID.minSize).max(GRID.maxSize),
  gridHeight: z.number().int().min(GRID.minSize).max(GRID.maxSize),
  gameMode: GameModeSchema,
  difficulty: DifficultySchema,
  baseSpeedMs: z.number().int().min(GRID.minBaseSpeedMs).max(GRID.maxBaseSpeedMs),
  enableEffects: z.boolean(),
  maxObstacles: z.number().int().min(0),
  timeLimitSeconds: z.number().int().positive(),
});

export const PartialGameConfigSchema = GameConfigSchema.partial();

export const HelloSchema = z.object({
  type: z.literal("hello"),
  name: z.string().trim().min(1).max(24).optional(),
  config: PartialGameConfigSchema.optional(),
});

export const DirectionInputSchema = z.object({
  type: z.literal("direction"),
  direction: DirectionSchema,
});

export const ControlSchema = z.object({
  type: z.enum(["pause", "resume", "reset"]),
});

export const ConfigUpdateSchema = z.object({
  type: z.literal("config"),
  config: PartialGameConfigSchema,
});

export const ClientToServerSchema = z.union([HelloSchema, DirectionInputSchema, ControlSchema, ConfigUpdateSchema]);

export type ClientToServerMessage = z.infer<typeof ClientToServerSchema>;

/** Validates a full configuration; malformed input is rejected here, never mid-game. */
export function parseGameConfig(input: unknown): GameConfig {
  const result = GameConfigSchema.safeParse(input);
  if (!result.success) {
    throw new GameConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return result.data;
}

/** Raw frame -> validated message, or null when it should be dropped. */
export function parseClientMessage(data: string): ClientToServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  const result = ClientToServerSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
