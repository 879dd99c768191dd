import { z } from "zod";
import { DifficultySchema, GameModeSchema, GameOverReasonSchema } from "../validation.js";

export const GameRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.number(),
  gameMode: GameModeSchema,
  difficulty: DifficultySchema,
  finalScore: z.number(),
  maxSnakeLength: z.number().int(),
  playTime: z.number(),
  foodEaten: z.number().int(),
  effectsUsed: z.number().int(),
  gameOverReason: GameOverReasonSchema,
  playerName: z.string(),
});

export const LeaderboardEntrySchema = z.object({
  id: z.string().min(1),
  playerName: z.string(),
  score: z.number(),
  snakeLength: z.number().int(),
  gameMode: GameModeSchema,
  difficulty: DifficultySchema,
  playTime: z.number(),
  foodEaten: z.number().int(),
  effectsUsed: z.number().int(),
  timestamp: z.number(),
  rank: z.number().int(),
  isPersonalBest: z.boolean(),
});

export const PlayerStatisticsSchema = z.object({
  totalGames: z.number().int(),
  totalScore: z.number(),
  highestScore: z.number(),
  totalPlayTime: z.number(),
  averageScore: z.number(),
  gamesWon: z.number().int(),
  longestSnake: z.number().int(),
  totalFoodEaten: z.number().int(),
  totalEffectsUsed: z.number().int(),
  gamesByMode: z.record(GameModeSchema, z.number().int()),
  gamesByDifficulty: z.record(DifficultySchema, z.number().int()),
  lastPlayDate: z.number(),
});

export const GameRecordListSchema = z.array(GameRecordSchema);
export const LeaderboardListSchema = z.array(LeaderboardEntrySchema);
