import { SCORING } from "../config.js";
import type { GameOverReason, GameOverState, GameState, PausedState, PlayingState } from "../types.js";

export function createPlayingState(speed: number): PlayingState {
  return { status: "playing", score: 0, level: 1, speed };
}

export function levelForScore(score: number): number {
  return Math.floor(score / SCORING.pointsPerLevel) + 1;
}

/** Level 1 runs at `baseSpeed`; each level is a step faster, never slower than the base nor below the floor. */
export function speedForLevel(level: number, baseSpeed: number = SCORING.levelBaseSpeedMs): number {
  const floor = Math.min(SCORING.minLevelSpeedMs, baseSpeed);
  return Math.max(floor, baseSpeed - (level - 1) * SCORING.levelSpeedStepMs);
}

/** Adds points and re-derives level and speed from the new total. */
export function addScore(state: PlayingState, points: number, baseSpeed: number = SCORING.levelBaseSpeedMs): PlayingState {
  const score = state.score + points;
  const level = levelForScore(score);
  return { ...state, score, level, speed: speedForLevel(level, baseSpeed) };
}

export function pauseState(state: PlayingState): PausedState {
  return { status: "paused", previous: state };
}

export function resumeState(state: PausedState): PlayingState {
  return state.previous;
}

export function gameOverState(state: PlayingState, reason: GameOverReason): GameOverState {
  return { status: "gameOver", finalScore: state.score, finalLevel: state.level, reason };
}

export function currentScore(state: GameState): number {
  switch (state.status) {
    case "playing":
      return state.score;
    case "paused":
      return state.previous.score;
    case "gameOver":
      return state.finalScore;
  }
}

export function currentLevel(state: GameState): number {
  switch (state.status) {
    case "playing":
      return state.level;
    case "paused":
      return state.previous.level;
    case "gameOver":
      return state.finalLevel;
  }
}

export function isActive(state: GameState): boolean {
  return state.status !== "gameOver";
}
