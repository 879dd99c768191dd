import { describe, it, expect } from "vitest";
import { DEFAULT_GAME_CONFIG } from "../config.js";
import { averageFps, frameCount, getActionsInRange, getKeyMoments, getStateAtTime, totalDuration } from "./reconstruct.js";
import type { ReplayAction, ReplayData, ReplayEvent, ReplayGameState } from "./types.js";

const initialState: ReplayGameState = {
  snakeHead: { x: 5, y: 5 },
  snakeBody: [{ x: 5, y: 5 }, { x: 4, y: 5 }, { x: 3, y: 5 }],
  direction: "right",
  foodPosition: { x: 7, y: 5 },
  foodType: "regular",
  score: 0,
  snakeLength: 3,
  level: 1,
  isGameOver: false,
  activeEffects: [],
};

const actions: ReplayAction[] = [
  { timestamp: 500, type: "move", head: { x: 6, y: 5 }, body: [{ x: 6, y: 5 }, { x: 5, y: 5 }, { x: 4, y: 5 }], direction: "right" },
  { timestamp: 1000, type: "move", head: { x: 7, y: 5 }, body: [{ x: 7, y: 5 }, { x: 6, y: 5 }, { x: 5, y: 5 }, { x: 4, y: 5 }], direction: "right" },
  { timestamp: 1000, type: "eatFood", score: 1, snakeLength: 4, foodType: "regular" },
  { timestamp: 1000, type: "spawnFood", position: { x: 2, y: 8 }, foodType: "bonus" },
  { timestamp: 1400, type: "directionChange", from: "right", to: "down" },
  { timestamp: 1500, type: "move", head: { x: 7, y: 6 }, body: [{ x: 7, y: 6 }, { x: 7, y: 5 }, { x: 6, y: 5 }, { x: 5, y: 5 }], direction: "down" },
  { timestamp: 2000, type: "gameOver", finalScore: 1, reason: "wallCollision" },
];

const events: ReplayEvent[] = [
  { timestamp: 0, type: "gameStart", gameMode: "classic", difficulty: "normal" },
  { timestamp: 2000, type: "gameOver", finalScore: 1, reason: "wallCollision" },
  { timestamp: 1000, type: "foodEaten", score: 1, foodType: "regular" },
  { timestamp: 2000, type: "collision", reason: "wallCollision" },
];

const replay: ReplayData = {
  gameId: "g1",
  gameConfig: DEFAULT_GAME_CONFIG,
  initialState,
  actions,
  events,
  metadata: {
    playerName: "p",
    finalScore: 1,
    finalSnakeLength: 4,
    playTime: 2000,
    createdAt: 0,
    gameMode: "classic",
    difficulty: "normal",
    isPersonalBest: false,
    tags: [],
    description: "",
  },
  version: "1.0",
};

describe("replay timing", () => {
  it("measures the log by its last action", () => {
    expect(totalDuration(replay)).toBe(2000);
    expect(frameCount(replay)).toBe(7);
    expect(averageFps(replay)).toBe(3.5);
    expect(totalDuration({ ...replay, actions: [] })).toBe(0);
    expect(averageFps({ ...replay, actions: [] })).toBe(0);
  });
});

describe("getStateAtTime", () => {
  it("returns the initial state before the first action", () => {
    expect(getStateAtTime(replay, -1)).toBe(initialState);
    expect(getStateAtTime(replay, 499)).toEqual(initialState);
  });

  it("folds every action up to and including the given time", () => {
    expect(getStateAtTime(replay, 1000)).toEqual({
      ...initialState,
      snakeHead: { x: 7, y: 5 },
      snakeBody: [{ x: 7, y: 5 }, { x: 6, y: 5 }, { x: 5, y: 5 }, { x: 4, y: 5 }],
      score: 1,
      snakeLength: 4,
      foodPosition: { x: 2, y: 8 },
      foodType: "bonus",
    });
  });

  it("ends in the terminal state", () => {
    const final = getStateAtTime(replay, 5000);
    expect(final.isGameOver).toBe(true);
    expect(final.direction).toBe("down");
    expect(final.snakeHead).toEqual({ x: 7, y: 6 });
  });

  it("gives the same answer however it is reached", () => {
    expect(getStateAtTime(replay, 1500)).toEqual(getStateAtTime(replay, 1500));
    const atEnd = getStateAtTime(replay, 2000);
    getStateAtTime(replay, 700);
    expect(getStateAtTime(replay, 2000)).toEqual(atEnd);
  });
});

describe("effect playback", () => {
  const effectReplay: ReplayData = {
    ...replay,
    actions: [
      { timestamp: 1000, type: "effectActivate", effect: { kind: "speedUp", duration: 3000, startTime: 51_000 } },
      { timestamp: 1200, type: "effectActivate", effect: { kind: "shrink", duration: 0, startTime: 51_200 } },
      { timestamp: 1500, type: "effectActivate", effect: { kind: "ghost", duration: 5000, startTime: 51_500 } },
      { timestamp: 3500, type: "effectActivate", effect: { kind: "speedUp", duration: 3000, startTime: 53_500 } },
      { timestamp: 8000, type: "gameOver", finalScore: 4, reason: "selfCollision" },
    ],
  };
  const effectsAt = (t: number) => getStateAtTime(effectReplay, t).activeEffects;

  it("tracks timed effects by their activation time", () => {
    expect(effectsAt(999)).toEqual([]);
    expect(effectsAt(1000)).toEqual(["speedUp"]);
    expect(effectsAt(1200)).toEqual(["speedUp"]);
    expect(effectsAt(2000)).toEqual(["speedUp", "ghost"]);
  });

  it("moves a re-activated effect to the end and extends it", () => {
    expect(effectsAt(3600)).toEqual(["ghost", "speedUp"]);
    expect(effectsAt(4000)).toEqual(["ghost", "speedUp"]);
    expect(effectsAt(6000)).toEqual(["ghost", "speedUp"]);
  });

  it("drops effects once they run out", () => {
    expect(effectsAt(6499)).toEqual(["ghost", "speedUp"]);
    expect(effectsAt(6500)).toEqual([]);
  });
});

describe("log queries", () => {
  it("selects actions in an inclusive range", () => {
    expect(getActionsInRange(replay, 1000, 1400).map((a) => a.type)).toEqual([
      "move",
      "eatFood",
      "spawnFood",
      "directionChange",
    ]);
  });

  it("lists key moments in time order", () => {
    expect(getKeyMoments(replay)).toEqual([
      { timestamp: 1000, type: "foodEaten", description: "Ate regular food", score: 1 },
      { timestamp: 2000, type: "gameOver", description: "Game over: wallCollision", score: 1 },
    ]);
  });
});
