export type Position = Readonly<{ x: number; y: number }>;

export type Direction = "up" | "down" | "left" | "right";

export type GameMode = "classic" | "borderless" | "obstacles" | "timeChallenge";

export type Difficulty = "easy" | "normal" | "hard" | "expert";

export type GameConfig = Readonly<{
  gridWidth: number;
  gridHeight: number;
  gameMode: GameMode;
  difficulty: Difficulty;
  baseSpeedMs: number; // tick interval of a fresh game, before difficulty scaling
  enableEffects: boolean;
  maxObstacles: number;
  timeLimitSeconds: number;
}>;

export type Snake = Readonly<{
  body: readonly Position[]; // [0] is head
  direction: Direction;
}>;

export type FoodType = "regular" | "bonus" | "speedUp" | "speedDown" | "ghost" | "shrink";

/** A timed (or instant) modifier. `startTime` stays 0 until the food is eaten. */
export type FoodEffect =
  | Readonly<{ kind: "speedUp"; duration: number; startTime: number }>
  | Readonly<{ kind: "speedDown"; duration: number; startTime: number }>
  | Readonly<{ kind: "ghost"; duration: number; startTime: number }>
  | Readonly<{ kind: "shrink"; duration: 0; startTime: number }>;

export type EffectKind = FoodEffect["kind"];

export type EffectResult = Readonly<{
  speed: number;
  canPassThroughWalls: boolean;
  canPassThroughSelf: boolean;
}>;

export type Food = Readonly<{
  position: Position;
  type: FoodType;
  effect: FoodEffect | null;
  createdTime: number;
}>;

export type GameOverReason = "wallCollision" | "selfCollision" | "obstacleCollision" | "timeUp";

export type PlayingState = Readonly<{
  status: "playing";
  score: number;
  level: number;
  speed: number; // level speed in ms, before effects and difficulty
}>;

export type PausedState = Readonly<{
  status: "paused";
  previous: PlayingState;
}>;

export type GameOverState = Readonly<{
  status: "gameOver";
  finalScore: number;
  finalLevel: number;
  reason: GameOverReason;
}>;

export type GameState = PlayingState | PausedState | GameOverState;

export type GameStats = Readonly<{
  foodEaten: number;
  effectsUsed: number;
  maxSnakeLength: number;
}>;

export type GameSnapshot = Readonly<{
  tick: number;
  snake: Snake;
  food: Food;
  state: GameState;
  obstacles: readonly Position[];
  activeEffects: readonly FoodEffect[];
  effects: EffectResult; // composed effects of the last tick; speed drives the loop delay
  gameStartTime: number;
  stats: GameStats;
}>;

/** What a single tick changed, in order. The replay recorder consumes these. */
export type TickEvent =
  | { type: "move"; head: Position; body: readonly Position[]; direction: Direction }
  | { type: "directionChange"; from: Direction; to: Direction }
  | { type: "eatFood"; foodType: FoodType; score: number; snakeLength: number }
  | { type: "effectActivate"; effect: FoodEffect; score: number }
  | { type: "spawnFood"; position: Position; foodType: FoodType }
  | { type: "levelUp"; level: number; score: number }
  | { type: "gameOver"; reason: GameOverReason; finalScore: number; finalLevel: number };

export type TickOutcome = Readonly<{
  snapshot: GameSnapshot;
  events: readonly TickEvent[];
}>;

export type PublicSnapshot = {
  tick: number;
  grid: { width: number; height: number };
  mode: GameMode;
  direction: Direction;
  snake: Array<[number, number]>;
  food: { x: number; y: number; type: FoodType };
  obstacles: Array<[number, number]>;
  state: GameState;
  effects: Array<{ kind: EffectKind; remainingMs: number }>;
  remainingSeconds: number | null;
};

export type ServerToClientMessage =
  | { type: "welcome"; id: string; config: GameConfig }
  | { type: "state"; snapshot: PublicSnapshot }
  | { type: "gameOver"; gameId: string; finalScore: number; reason: GameOverReason; isPersonalBest: boolean }
  | { type: "error"; message: string };
