import { SCORING } from "../config.js";
import type { Difficulty, GameMode } from "../types.js";
import type { GameRecord } from "./records.js";

export type PlayerStatistics = Readonly<{
  totalGames: number;
  totalScore: number;
  highestScore: number;
  totalPlayTime: number;
  averageScore: number;
  gamesWon: number;
  longestSnake: number;
  totalFoodEaten: number;
  totalEffectsUsed: number;
  gamesByMode: Partial<Record<GameMode, number>>;
  gamesByDifficulty: Partial<Record<Difficulty, number>>;
  lastPlayDate: number;
}>;

export function emptyStatistics(): PlayerStatistics {
  return {
    totalGames: 0,
    totalScore: 0,
    highestScore: 0,
    totalPlayTime: 0,
    averageScore: 0,
    gamesWon: 0,
    longestSnake: 0,
    totalFoodEaten: 0,
    totalEffectsUsed: 0,
    gamesByMode: {},
    gamesByDifficulty: {},
    lastPlayDate: 0,
  };
}

export function isWinningGame(record: GameRecord): boolean {
  return record.finalScore >= SCORING.winScore;
}

export function applyRecord(stats: PlayerStatistics, record: GameRecord): PlayerStatistics {
  const totalGames = stats.totalGames + 1;
  const totalScore = stats.totalScore + record.finalScore;
  return {
    totalGames,
    totalScore,
    highestScore: Math.max(stats.highestScore, record.finalScore),
    totalPlayTime: stats.totalPlayTime + record.playTime,
    averageScore: totalScore / totalGames,
    gamesWon: stats.gamesWon + (isWinningGame(record) ? 1 : 0),
    longestSnake: Math.max(stats.longestSnake, record.maxSnakeLength),
    totalFoodEaten: stats.totalFoodEaten + record.foodEaten,
    totalEffectsUsed: stats.totalEffectsUsed + record.effectsUsed,
    gamesByMode: { ...stats.gamesByMode, [record.gameMode]: (stats.gamesByMode[record.gameMode] ?? 0) + 1 },
    gamesByDifficulty: {
      ...stats.gamesByDifficulty,
      [record.difficulty]: (stats.gamesByDifficulty[record.difficulty] ?? 0) + 1,
    },
    lastPlayDate: record.timestamp,
  };
}

export function winRate(stats: PlayerStatistics): number {
  return stats.totalGames > 0 ? stats.gamesWon / stats.totalGames : 0;
}

export function averagePlayTime(stats: PlayerStatistics): number {
  return stats.totalGames > 0 ? Math.floor(stats.totalPlayTime / stats.totalGames) : 0;
}

function mostPlayed<K extends string>(counts: Partial<Record<K, number>>, keys: readonly K[]): K | null {
  let best: K | null = null;
  let bestCount = 0;
  for (const key of keys) {
    const count = counts[key] ?? 0;
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

export function favoriteGameMode(stats: PlayerStatistics): GameMode | null {
  return mostPlayed(stats.gamesByMode, ["classic", "borderless", "obstacles", "timeChallenge"]);
}

export function favoriteDifficulty(stats: PlayerStatistics): Difficulty | null {
  return mostPlayed(stats.gamesByDifficulty, ["easy", "normal", "hard", "expert"]);
}
