import { describe, it, expect } from "vitest";
import type { GameRecord } from "./records.js";
import {
  applyRecord,
  averagePlayTime,
  emptyStatistics,
  favoriteDifficulty,
  favoriteGameMode,
  winRate,
} from "./statistics.js";

const record = (overrides: Partial<GameRecord>): GameRecord => ({
  id: "r",
  timestamp: 0,
  gameMode: "classic",
  difficulty: "normal",
  finalScore: 0,
  maxSnakeLength: 3,
  playTime: 0,
  foodEaten: 0,
  effectsUsed: 0,
  gameOverReason: "wallCollision",
  playerName: "p",
  ...overrides,
});

const games = [
  record({ finalScore: 120, maxSnakeLength: 8, playTime: 60_000, foodEaten: 10, effectsUsed: 2, timestamp: 100 }),
  record({ gameMode: "borderless", finalScore: 30, maxSnakeLength: 4, playTime: 30_001, foodEaten: 3, timestamp: 200 }),
  record({ difficulty: "hard", finalScore: 100, maxSnakeLength: 6, playTime: 20_000, foodEaten: 8, effectsUsed: 1, timestamp: 300 }),
];

describe("player statistics", () => {
  it("accumulates finished games", () => {
    const stats = games.reduce(applyRecord, emptyStatistics());
    expect(stats).toEqual({
      totalGames: 3,
      totalScore: 250,
      highestScore: 120,
      totalPlayTime: 110_001,
      averageScore: 250 / 3,
      gamesWon: 2,
      longestSnake: 8,
      totalFoodEaten: 21,
      totalEffectsUsed: 3,
      gamesByMode: { classic: 2, borderless: 1 },
      gamesByDifficulty: { normal: 2, hard: 1 },
      lastPlayDate: 300,
    });
    expect(winRate(stats)).toBe(2 / 3);
    expect(averagePlayTime(stats)).toBe(36_667);
    expect(favoriteGameMode(stats)).toBe("classic");
    expect(favoriteDifficulty(stats)).toBe("normal");
  });

  it("has no favourites or rates before the first game", () => {
    const stats = emptyStatistics();
    expect(winRate(stats)).toBe(0);
    expect(averagePlayTime(stats)).toBe(0);
    expect(favoriteGameMode(stats)).toBeNull();
    expect(favoriteDifficulty(stats)).toBeNull();
  });

  it("breaks ties by declaration order", () => {
    const stats = [record({ gameMode: "borderless" }), record({ gameMode: "classic" })].reduce(
      applyRecord,
      emptyStatistics(),
    );
    expect(favoriteGameMode(stats)).toBe("classic");
  });
});
