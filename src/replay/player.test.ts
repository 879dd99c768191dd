import { describe, it, expect } from "vitest";
import { DEFAULT_GAME_CONFIG } from "../config.js";
import { formatPlaybackTime, ReplayPlayer } from "./player.js";
import type { ReplayData } from "./types.js";

const replay: ReplayData = {
  gameId: "g1",
  gameConfig: DEFAULT_GAME_CONFIG,
  initialState: {
    snakeHead: { x: 1, y: 1 },
    snakeBody: [{ x: 1, y: 1 }],
    direction: "right",
    foodPosition: { x: 3, y: 1 },
    foodType: "regular",
    score: 0,
    snakeLength: 1,
    level: 1,
    isGameOver: false,
    activeEffects: [],
  },
  actions: [
    { timestamp: 1000, type: "move", head: { x: 2, y: 1 }, body: [{ x: 2, y: 1 }], direction: "right" },
    { timestamp: 3000, type: "eatFood", score: 1, snakeLength: 2, foodType: "regular" },
    { timestamp: 10000, type: "gameOver", finalScore: 1, reason: "selfCollision" },
  ],
  events: [
    { timestamp: 0, type: "gameStart", gameMode: "classic", difficulty: "normal" },
    { timestamp: 3000, type: "foodEaten", score: 1, foodType: "regular" },
    { timestamp: 6000, type: "levelUp", level: 2, score: 100 },
    { timestamp: 10000, type: "gameOver", finalScore: 1, reason: "selfCollision" },
  ],
  metadata: {
    playerName: "p",
    finalScore: 1,
    finalSnakeLength: 2,
    playTime: 10000,
    createdAt: 0,
    gameMode: "classic",
    difficulty: "normal",
    isPersonalBest: false,
    tags: [],
    description: "",
  },
  version: "1.0",
};

describe("ReplayPlayer", () => {
  it("only advances while playing, scaled by the playback speed", () => {
    const player = new ReplayPlayer(replay);
    player.updateTime(500);
    expect(player.getPlaybackState().currentTime).toBe(0);

    player.play();
    player.setPlaybackSpeed(2);
    player.updateTime(750);
    expect(player.getPlaybackState()).toEqual({
      currentTime: 1500,
      totalDuration: 10000,
      isPlaying: true,
      playbackSpeed: 2,
      progress: 0.15,
    });
    expect(player.getCurrentGameState().snakeHead).toEqual({ x: 2, y: 1 });
  });

  it("stops at the end of the log", () => {
    const player = new ReplayPlayer(replay);
    player.play();
    player.updateTime(60_000);
    expect(player.getPlaybackState()).toMatchObject({ currentTime: 10000, isPlaying: false, progress: 1 });
    expect(player.getCurrentGameState().isGameOver).toBe(true);
  });

  it("clamps seeks and playback speed", () => {
    const player = new ReplayPlayer(replay);
    player.seekTo(-20);
    expect(player.getPlaybackState().currentTime).toBe(0);
    player.seekTo(99_999);
    expect(player.getPlaybackState().currentTime).toBe(10000);

    player.setPlaybackSpeed(10);
    expect(player.getPlaybackState().playbackSpeed).toBe(5);
    player.setPlaybackSpeed(0);
    expect(player.getPlaybackState().playbackSpeed).toBe(0.1);
  });

  it("stop rewinds to the start", () => {
    const player = new ReplayPlayer(replay);
    player.seekTo(4000);
    player.play();
    player.stop();
    expect(player.getPlaybackState()).toMatchObject({ currentTime: 0, isPlaying: false });
  });

  it("jumps between key moments", () => {
    const player = new ReplayPlayer(replay);
    player.skipToNextKeyMoment();
    expect(player.getPlaybackState().currentTime).toBe(3000);
    player.skipToNextKeyMoment();
    expect(player.getPlaybackState().currentTime).toBe(6000);
    player.skipToPreviousKeyMoment();
    expect(player.getPlaybackState().currentTime).toBe(3000);
    player.skipToPreviousKeyMoment();
    expect(player.getPlaybackState().currentTime).toBe(3000);
    expect(player.getPreviousKeyMoment()).toBeNull();
  });
});

describe("formatPlaybackTime", () => {
  it("uses m:ss past a minute and seconds below", () => {
    expect(formatPlaybackTime(65_000)).toBe("1:05");
    expect(formatPlaybackTime(5_900)).toBe("5s");
    expect(formatPlaybackTime(0)).toBe("0s");
  });
});
