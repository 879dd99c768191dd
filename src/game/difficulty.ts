import type { Difficulty } from "../types.js";

type DifficultyDefinition = {
  displayName: string;
  speedPercent: number; // tick interval scale; below 100 is faster
  scorePercent: number;
  initialSnakeLength: number;
  upgradeThreshold: number | null;
  next: Difficulty | null;
};

export const DIFFICULTIES: Record<Difficulty, DifficultyDefinition> = {
  easy: { displayName: "Easy", speedPercent: 150, scorePercent: 80, initialSnakeLength: 2, upgradeThreshold: 100, next: "normal" },
  normal: { displayName: "Normal", speedPercent: 100, scorePercent: 100, initialSnakeLength: 3, upgradeThreshold: 300, next: "hard" },
  hard: { displayName: "Hard", speedPercent: 70, scorePercent: 150, initialSnakeLength: 4, upgradeThreshold: 600, next: "expert" },
  expert: { displayName: "Expert", speedPercent: 50, scorePercent: 200, initialSnakeLength: 5, upgradeThreshold: null, next: null },
};

const MIN_SPEED_MS = 50;

export function calculateSpeed(difficulty: Difficulty, baseSpeed: number): number {
  return Math.max(MIN_SPEED_MS, Math.floor((baseSpeed * DIFFICULTIES[difficulty].speedPercent) / 100));
}

export function calculateScore(difficulty: Difficulty, basePoints: number): number {
  return Math.max(1, Math.floor((basePoints * DIFFICULTIES[difficulty].scorePercent) / 100));
}

export function initialSnakeLength(difficulty: Difficulty): number {
  return DIFFICULTIES[difficulty].initialSnakeLength;
}

export function canUpgrade(difficulty: Difficulty, score: number): boolean {
  const threshold = DIFFICULTIES[difficulty].upgradeThreshold;
  return threshold !== null && score >= threshold;
}

export function nextDifficulty(difficulty: Difficulty): Difficulty | null {
  return DIFFICULTIES[difficulty].next;
}
