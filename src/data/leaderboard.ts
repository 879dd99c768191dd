import type { Difficulty, GameMode } from "../types.js";
import type { GameRecord } from "./records.js";

export type LeaderboardEntry = Readonly<{
  id: string;
  playerName: string;
  score: number;
  snakeLength: number;
  gameMode: GameMode;
  difficulty: Difficulty;
  playTime: number;
  foodEaten: number;
  effectsUsed: number;
  timestamp: number;
  rank: number; // 0 until ranked
  isPersonalBest: boolean;
}>;

export type LeaderboardSortBy = "score" | "snakeLength" | "playTime" | "efficiency" | "compositeScore" | "timestamp";

export type LeaderboardQuery = {
  gameMode?: GameMode | null;
  difficulty?: Difficulty | null;
  sortBy?: LeaderboardSortBy;
  limit?: number;
  offset?: number;
};

const DIFFICULTY_WEIGHT: Record<Difficulty, number> = { easy: 1.0, normal: 1.2, hard: 1.5, expert: 2.0 };
const MODE_WEIGHT: Record<GameMode, number> = { classic: 1.0, borderless: 1.1, obstacles: 1.3, timeChallenge: 1.2 };

export function entryFromRecord(record: GameRecord, isPersonalBest = false): LeaderboardEntry {
  return {
    id: record.id,
    playerName: record.playerName,
    score: record.finalScore,
    snakeLength: record.maxSnakeLength,
    gameMode: record.gameMode,
    difficulty: record.difficulty,
    playTime: record.playTime,
    foodEaten: record.foodEaten,
    effectsUsed: record.effectsUsed,
    timestamp: record.timestamp,
    rank: 0,
    isPersonalBest,
  };
}

/** Points per second of play. */
export function efficiency(entry: LeaderboardEntry): number {
  return entry.playTime > 0 ? entry.score / (entry.playTime / 1000) : 0;
}

export function compositeScore(entry: LeaderboardEntry): number {
  const base = entry.score + entry.snakeLength * 10 + efficiency(entry) * 100;
  return base * DIFFICULTY_WEIGHT[entry.difficulty] * MODE_WEIGHT[entry.gameMode];
}

export function isValidEntry(entry: LeaderboardEntry): boolean {
  return entry.score > 0 && entry.snakeLength >= 1 && entry.playTime > 0;
}

const COMPARATORS: Record<LeaderboardSortBy, (a: LeaderboardEntry, b: LeaderboardEntry) => number> = {
  score: (a, b) => b.score - a.score,
  snakeLength: (a, b) => b.snakeLength - a.snakeLength,
  playTime: (a, b) => a.playTime - b.playTime,
  efficiency: (a, b) => efficiency(b) - efficiency(a),
  compositeScore: (a, b) => compositeScore(b) - compositeScore(a),
  timestamp: (a, b) => b.timestamp - a.timestamp,
};

/** Stable sort, then ranks 1..n in the resulting order. */
export function rankEntries(entries: readonly LeaderboardEntry[], sortBy: LeaderboardSortBy = "score"): LeaderboardEntry[] {
  return [...entries].sort(COMPARATORS[sortBy]).map((entry, index) => ({ ...entry, rank: index + 1 }));
}

export function filterEntries(entries: readonly LeaderboardEntry[], query: LeaderboardQuery): LeaderboardEntry[] {
  return entries.filter(
    (entry) =>
      (query.gameMode == null || entry.gameMode === query.gameMode) &&
      (query.difficulty == null || entry.difficulty === query.difficulty),
  );
}

/** Filter, rank, then page. Ranks are positions within the filtered board. */
export function queryLeaderboard(
  entries: readonly LeaderboardEntry[],
  query: LeaderboardQuery,
  defaultLimit: number,
): LeaderboardEntry[] {
  const offset = query.offset ?? 0;
  const limit = query.limit ?? defaultLimit;
  return rankEntries(filterEntries(entries, query), query.sortBy).slice(offset, offset + limit);
}
