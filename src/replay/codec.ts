import { Packr } from "msgpackr";
import { z } from "zod";
import { ReplayError } from "../errors.js";
import {
  DifficultySchema,
  DirectionSchema,
  FoodTypeSchema,
  GameConfigSchema,
  GameModeSchema,
  GameOverReasonSchema,
  PositionSchema,
} from "../validation.js";
import type { ReplayData } from "./types.js";

const EffectKindSchema = z.enum(["speedUp", "speedDown", "ghost", "shrink"]);

export const FoodEffectSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("speedUp"), duration: z.number(), startTime: z.number() }),
  z.object({ kind: z.literal("speedDown"), duration: z.number(), startTime: z.number() }),
  z.object({ kind: z.literal("ghost"), duration: z.number(), startTime: z.number() }),
  z.object({ kind: z.literal("shrink"), duration: z.literal(0), startTime: z.number() }),
]);

const timestamp = z.number();

export const ReplayActionSchema = z.discriminatedUnion("type", [
  z.object({
    timestamp,
    type: z.literal("move"),
    head: PositionSchema,
    body: z.array(PositionSchema),
    direction: DirectionSchema,
  }),
  z.object({
    timestamp,
    type: z.literal("eatFood"),
    score: z.number(),
    snakeLength: z.number().int(),
    foodType: FoodTypeSchema,
  }),
  z.object({ timestamp, type: z.literal("spawnFood"), position: PositionSchema, foodType: FoodTypeSchema }),
  z.object({ timestamp, type: z.literal("directionChange"), from: DirectionSchema, to: DirectionSchema }),
  z.object({ timestamp, type: z.literal("effectActivate"), effect: FoodEffectSchema }),
  z.object({ timestamp, type: z.literal("levelUp"), level: z.number().int(), score: z.number() }),
  z.object({ timestamp, type: z.literal("gameOver"), finalScore: z.number(), reason: GameOverReasonSchema }),
  z.object({ timestamp, type: z.literal("pause") }),
  z.object({ timestamp, type: z.literal("resume") }),
]);

export const ReplayEventSchema = z.discriminatedUnion("type", [
  z.object({ timestamp, type: z.literal("gameStart"), gameMode: GameModeSchema, difficulty: DifficultySchema }),
  z.object({ timestamp, type: z.literal("foodEaten"), score: z.number(), foodType: FoodTypeSchema }),
  z.object({ timestamp, type: z.literal("levelUp"), level: z.number().int(), score: z.number() }),
  z.object({ timestamp, type: z.literal("effectActivated"), effect: EffectKindSchema, score: z.number() }),
  z.object({ timestamp, type: z.literal("collision"), reason: GameOverReasonSchema }),
  z.object({ timestamp, type: z.literal("gameOver"), finalScore: z.number(), reason: GameOverReasonSchema }),
]);

export const ReplayGameStateSchema = z.object({
  snakeHead: PositionSchema,
  snakeBody: z.array(PositionSchema),
  direction: DirectionSchema,
  foodPosition: PositionSchema.nullable(),
  foodType: FoodTypeSchema.nullable(),
  score: z.number(),
  snakeLength: z.number().int(),
  level: z.number().int(),
  isGameOver: z.boolean(),
  activeEffects: z.array(EffectKindSchema),
});

export const ReplayMetadataSchema = z.object({
  playerName: z.string(),
  finalScore: z.number(),
  finalSnakeLength: z.number().int(),
  playTime: z.number(),
  createdAt: z.number(),
  gameMode: GameModeSchema,
  difficulty: DifficultySchema,
  isPersonalBest: z.boolean(),
  tags: z.array(z.string()),
  description: z.string(),
});

export const ReplayDataSchema = z.object({
  gameId: z.string(),
  gameConfig: GameConfigSchema,
  initialState: ReplayGameStateSchema,
  actions: z.array(ReplayActionSchema),
  events: z.array(ReplayEventSchema),
  metadata: ReplayMetadataSchema,
  version: z.string(),
});

const packr = new Packr({ useRecords: false });

export function encodeReplay(replay: ReplayData): Buffer {
  return packr.pack(replay);
}

/**
 * Decodes and structurally checks a stored replay. Integrity rules (timestamp
 * order, empty logs) are left to `validateReplayData`.
 * @throws ReplayError when the bytes are not a replay
 */
export function decodeReplay(bytes: Uint8Array): ReplayData {
  let decoded: unknown;
  try {
    decoded = packr.unpack(bytes);
  } catch (err) {
    throw new ReplayError("replay payload is not valid msgpack", { cause: err });
  }
  const result = ReplayDataSchema.safeParse(decoded);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ReplayError(`malformed replay at ${issue.path.join(".") || "<root>"}: ${issue.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}
