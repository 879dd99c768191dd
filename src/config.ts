import type { GameConfig } from "./types.js";

export const DEFAULT_GAME_CONFIG: GameConfig = {
  gridWidth: 20,
  gridHeight: 20,
  gameMode: "classic",
  difficulty: "normal",
  baseSpeedMs: 500,
  enableEffects: true,
  maxObstacles: 5,
  timeLimitSeconds: 120,
};

export const GRID = {
  minSize: 6,
  maxSize: 100,
  minBaseSpeedMs: 51,
  maxBaseSpeedMs: 10_000,
};

export const SCORING = {
  pointsPerLevel: 100,
  levelBaseSpeedMs: 500,
  levelSpeedStepMs: 50,
  minLevelSpeedMs: 100,
  winScore: 100, // a game at or above this counts as won in statistics
};

export const EFFECTS = {
  speedUpNumerator: 7, // speed * 7 / 10
  speedUpDenominator: 10,
  speedDownNumerator: 3, // speed * 3 / 2
  speedDownDenominator: 2,
  minSpeedMs: 50,
  maxSpeedMs: 1000,
  speedUpDurationMs: 3000,
  speedDownDurationMs: 3000,
  ghostDurationMs: 5000,
};

export const LOOP = {
  idlePollMs: 100, // while paused or over, the loop polls instead of ticking
  errorBackoffMs: 250,
};

export const REPLAY = {
  version: "1.0",
  supportedVersions: ["1.0"],
  minPlaybackSpeed: 0.1,
  maxPlaybackSpeed: 5,
  estimatedActionBytes: 100,
  estimatedEventBytes: 80,
  estimatedMetadataBytes: 500,
};

export const PERSISTENCE = {
  maxRecords: 1000,
  maxLeaderboardEntries: 500,
  defaultRecordLimit: 100,
  defaultLeaderboardLimit: 50,
};

export const NETWORK = {
  maxMessageSizeBytes: 16 * 1024,
  heartbeatIntervalMs: 5000,
  inputRateLimitPerSec: 40,
};
