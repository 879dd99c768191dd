import { describe, it, expect } from "vitest";
import { Packr } from "msgpackr";
import { DEFAULT_GAME_CONFIG } from "../config.js";
import { ReplayError } from "../errors.js";
import { decodeReplay, encodeReplay } from "./codec.js";
import type { ReplayData } from "./types.js";

const replay: ReplayData = {
  gameId: "abc123",
  gameConfig: { ...DEFAULT_GAME_CONFIG, gameMode: "timeChallenge", timeLimitSeconds: 60 },
  initialState: {
    snakeHead: { x: 5, y: 5 },
    snakeBody: [{ x: 5, y: 5 }, { x: 4, y: 5 }],
    direction: "right",
    foodPosition: null,
    foodType: null,
    score: 0,
    snakeLength: 2,
    level: 1,
    isGameOver: false,
    activeEffects: ["ghost"],
  },
  actions: [
    { timestamp: 10, type: "effectActivate", effect: { kind: "shrink", duration: 0, startTime: 10 } },
    { timestamp: 20, type: "spawnFood", position: { x: 1, y: 2 }, foodType: "bonus" },
    { timestamp: 30, type: "gameOver", finalScore: 0, reason: "timeUp" },
  ],
  events: [{ timestamp: 30, type: "gameOver", finalScore: 0, reason: "timeUp" }],
  metadata: {
    playerName: "ana",
    finalScore: 0,
    finalSnakeLength: 2,
    playTime: 30,
    createdAt: 1700000000000,
    gameMode: "timeChallenge",
    difficulty: "normal",
    isPersonalBest: false,
    tags: ["short"],
    description: "",
  },
  version: "1.0",
};

describe("replay codec", () => {
  it("decodes what it encodes", () => {
    expect(decodeReplay(encodeReplay(replay))).toEqual(replay);
  });

  it("rejects payloads that are not replays", () => {
    const foreign = new Packr({ useRecords: false }).pack({ hello: "world" });
    expect(() => decodeReplay(foreign)).toThrow(ReplayError);
    expect(() => decodeReplay(foreign)).toThrow(/^malformed replay at gameId/);
  });

  it("rejects unknown action kinds", () => {
    const bad = { ...replay, actions: [{ timestamp: 1, type: "teleport" }] };
    const bytes = new Packr({ useRecords: false }).pack(bad);
    expect(() => decodeReplay(bytes)).toThrow(/^malformed replay at actions\.0\.type/);
  });

  it("rejects truncated bytes", () => {
    const bytes = encodeReplay(replay);
    expect(() => decodeReplay(bytes.subarray(0, bytes.length - 40))).toThrow(ReplayError);
  });
});
