import type {
  Difficulty,
  Direction,
  EffectKind,
  FoodEffect,
  FoodType,
  GameConfig,
  GameMode,
  GameOverReason,
  Position,
} from "../types.js";

/** The reduced view of a game that a replay can rebuild at any point in time. */
export type ReplayGameState = Readonly<{
  snakeHead: Position;
  snakeBody: readonly Position[];
  direction: Direction;
  foodPosition: Position | null;
  foodType: FoodType | null;
  score: number;
  snakeLength: number;
  level: number;
  isGameOver: boolean;
  activeEffects: readonly EffectKind[];
}>;

export type ReplayAction =
  | Readonly<{ timestamp: number; type: "move"; head: Position; body: readonly Position[]; direction: Direction }>
  | Readonly<{ timestamp: number; type: "eatFood"; score: number; snakeLength: number; foodType: FoodType }>
  | Readonly<{ timestamp: number; type: "spawnFood"; position: Position; foodType: FoodType }>
  | Readonly<{ timestamp: number; type: "directionChange"; from: Direction; to: Direction }>
  | Readonly<{ timestamp: number; type: "effectActivate"; effect: FoodEffect }>
  | Readonly<{ timestamp: number; type: "levelUp"; level: number; score: number }>
  | Readonly<{ timestamp: number; type: "gameOver"; finalScore: number; reason: GameOverReason }>
  | Readonly<{ timestamp: number; type: "pause" }>
  | Readonly<{ timestamp: number; type: "resume" }>;

export type ReplayEvent =
  | Readonly<{ timestamp: number; type: "gameStart"; gameMode: GameMode; difficulty: Difficulty }>
  | Readonly<{ timestamp: number; type: "foodEaten"; score: number; foodType: FoodType }>
  | Readonly<{ timestamp: number; type: "levelUp"; level: number; score: number }>
  | Readonly<{ timestamp: number; type: "effectActivated"; effect: EffectKind; score: number }>
  | Readonly<{ timestamp: number; type: "collision"; reason: GameOverReason }>
  | Readonly<{ timestamp: number; type: "gameOver"; finalScore: number; reason: GameOverReason }>;

export type ReplayMetadata = Readonly<{
  playerName: string;
  finalScore: number;
  finalSnakeLength: number;
  playTime: number;
  createdAt: number;
  gameMode: GameMode;
  difficulty: Difficulty;
  isPersonalBest: boolean;
  tags: readonly string[];
  description: string;
}>;

export type ReplayData = Readonly<{
  gameId: string;
  gameConfig: GameConfig;
  initialState: ReplayGameState;
  actions: readonly ReplayAction[];
  events: readonly ReplayEvent[];
  metadata: ReplayMetadata;
  version: string;
}>;

export type KeyMomentType = "gameStart" | "foodEaten" | "levelUp" | "effectUsed" | "milestone" | "gameOver";

export type KeyMoment = Readonly<{
  timestamp: number;
  type: KeyMomentType;
  description: string;
  score: number;
}>;

export type ReplayValidationResult = Readonly<{
  isValid: boolean;
  errors: readonly string[];
  warnings: readonly string[];
}>;

export type ReplaySummary = Readonly<{
  gameId: string;
  playerName: string;
  finalScore: number;
  playTime: number;
  moveCount: number;
  foodEatenCount: number;
  directionChanges: number;
  keyMomentsCount: number;
  averageFps: number;
  dataSize: number;
  createdAt: number;
}>;

export type ReplayPlaybackState = Readonly<{
  currentTime: number;
  totalDuration: number;
  isPlaying: boolean;
  playbackSpeed: number;
  progress: number;
}>;
