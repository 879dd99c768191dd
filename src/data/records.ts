import { createId } from "../ids.js";
import { DIFFICULTIES } from "../game/difficulty.js";
import type { Difficulty, GameMode, GameOverReason } from "../types.js";

/** One finished game. The replay, when kept, is stored under the same id. */
export type GameRecord = Readonly<{
  id: string;
  timestamp: number;
  gameMode: GameMode;
  difficulty: Difficulty;
  finalScore: number;
  maxSnakeLength: number;
  playTime: number; // ms
  foodEaten: number;
  effectsUsed: number;
  gameOverReason: GameOverReason;
  playerName: string;
}>;

export const DEFAULT_PLAYER_NAME = "Player";

export type GameRecordInput = Omit<GameRecord, "id" | "timestamp" | "playerName"> & {
  id?: string;
  playerName?: string;
};

export function createGameRecord(input: GameRecordInput, now = Date.now()): GameRecord {
  return {
    ...input,
    id: input.id ?? createId(),
    timestamp: now,
    playerName: input.playerName ?? DEFAULT_PLAYER_NAME,
  };
}

export function scorePerMinute(record: GameRecord): number {
  const minutes = record.playTime / 60000;
  return minutes > 0 ? record.finalScore / minutes : 0;
}

/** Score per minute weighted by the difficulty's score multiplier. */
export function gameEfficiency(record: GameRecord): number {
  return (scorePerMinute(record) * DIFFICULTIES[record.difficulty].scorePercent) / 100;
}

export function isHighScore(record: GameRecord, threshold = 100): boolean {
  return record.finalScore >= threshold;
}
