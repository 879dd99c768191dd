import { describe, it, expect } from "vitest";
import { calculateScore, calculateSpeed, canUpgrade, initialSnakeLength, nextDifficulty } from "./difficulty.js";
import {
  addScore,
  createPlayingState,
  currentLevel,
  currentScore,
  gameOverState,
  isActive,
  levelForScore,
  pauseState,
  resumeState,
  speedForLevel,
} from "./state.js";

describe("game state", () => {
  it("derives the level from the score", () => {
    expect(levelForScore(0)).toBe(1);
    expect(levelForScore(99)).toBe(1);
    expect(levelForScore(100)).toBe(2);
    expect(levelForScore(450)).toBe(5);
  });

  it("speeds up by level down to a floor", () => {
    expect(speedForLevel(1)).toBe(500);
    expect(speedForLevel(2)).toBe(450);
    expect(speedForLevel(9)).toBe(100);
    expect(speedForLevel(30)).toBe(100);
  });

  it("counts levels down from a configured base speed", () => {
    expect(speedForLevel(1, 200)).toBe(200);
    expect(speedForLevel(2, 200)).toBe(150);
    expect(speedForLevel(5, 200)).toBe(100);
    expect(speedForLevel(3, 80)).toBe(80);
    expect(addScore(createPlayingState(200), 150, 200)).toEqual({ status: "playing", score: 150, level: 2, speed: 150 });
  });

  it("re-levels when points are added", () => {
    const state = addScore(createPlayingState(500), 250);
    expect(state).toEqual({ status: "playing", score: 250, level: 3, speed: 400 });
  });

  it("keeps score and level readable across pause and game over", () => {
    const playing = { status: "playing", score: 120, level: 2, speed: 450 } as const;
    const paused = pauseState(playing);

    expect(currentScore(paused)).toBe(120);
    expect(currentLevel(paused)).toBe(2);
    expect(resumeState(paused)).toBe(playing);

    const over = gameOverState(playing, "selfCollision");
    expect(over).toEqual({ status: "gameOver", finalScore: 120, finalLevel: 2, reason: "selfCollision" });
    expect(isActive(over)).toBe(false);
    expect(isActive(paused)).toBe(true);
  });
});

describe("difficulty", () => {
  it("scales tick intervals with a floor of 50ms", () => {
    expect(calculateSpeed("easy", 500)).toBe(750);
    expect(calculateSpeed("hard", 500)).toBe(350);
    expect(calculateSpeed("expert", 80)).toBe(50);
  });

  it("scales points and always awards at least one", () => {
    expect(calculateScore("easy", 1)).toBe(1);
    expect(calculateScore("hard", 5)).toBe(7);
    expect(calculateScore("expert", 3)).toBe(6);
  });

  it("describes the progression", () => {
    expect(initialSnakeLength("normal")).toBe(3);
    expect(canUpgrade("easy", 99)).toBe(false);
    expect(canUpgrade("easy", 100)).toBe(true);
    expect(canUpgrade("expert", 10_000)).toBe(false);
    expect(nextDifficulty("hard")).toBe("expert");
    expect(nextDifficulty("expert")).toBeNull();
  });
});
