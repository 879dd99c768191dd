import { DEFAULT_GAME_CONFIG } from "../config.js";
import { opposite } from "../math.js";
import { defaultRng, type Rng } from "../random.js";
import type {
  Direction,
  EffectResult,
  FoodEffect,
  GameConfig,
  GameOverReason,
  GameOverState,
  GameSnapshot,
  PlayingState,
  Position,
  Snake,
  TickEvent,
  TickOutcome,
} from "../types.js";
import { parseGameConfig } from "../validation.js";
import { calculateScore, calculateSpeed, initialSnakeLength } from "./difficulty.js";
import { addEffect, applyAllEffects } from "./effects.js";
import { foodPoints, generateFood } from "./food.js";
import { checkObstacleCollision, createStrategy, type GameModeStrategy, wrapSnakeHead } from "./modes.js";
import { checkSelfCollision, createInitialSnake, hasEatenFood, occupiedPositions, snakeHead, trimTail } from "./snake.js";
import { addScore, createPlayingState, gameOverState, pauseState, resumeState } from "./state.js";

export type EngineDeps = {
  rng?: Rng;
  clock?: () => number;
};

function gameOverEvent(state: GameOverState): TickEvent {
  return { type: "gameOver", reason: state.reason, finalScore: state.finalScore, finalLevel: state.finalLevel };
}

/**
 * Pure tick function over immutable snapshots. The engine holds only the
 * validated config, the mode strategy and its injected clock and RNG; all game
 * state lives in the snapshot the caller threads through `tick`.
 */
export class SimulationEngine {
  readonly config: GameConfig;
  readonly strategy: GameModeStrategy;
  private readonly rng: Rng;
  private readonly clock: () => number;

  /** @throws GameConfigError when the merged configuration is malformed */
  constructor(config: Partial<GameConfig> = {}, deps: EngineDeps = {}) {
    this.config = parseGameConfig({ ...DEFAULT_GAME_CONFIG, ...config });
    this.rng = deps.rng ?? defaultRng;
    this.clock = deps.clock ?? Date.now;
    this.strategy = createStrategy(this.config.gameMode, this.rng);
  }

  now(): number {
    return this.clock();
  }

  initialize(now = this.clock()): GameSnapshot {
    const { gridWidth: width, gridHeight: height, difficulty } = this.config;
    const length = initialSnakeLength(difficulty);
    // keep the trailing body on the grid even when the grid is barely wider than the snake
    const start = { x: Math.max(Math.floor(width / 2), Math.min(length - 1, width - 1)), y: Math.floor(height / 2) };
    const snake = createInitialSnake(start, "right", length);
    const obstacles = this.strategy.generateObstacles(width, height, snake.body, this.config.maxObstacles);
    const food = generateFood({
      width,
      height,
      occupied: [...occupiedPositions(snake), ...obstacles],
      enableEffects: this.config.enableEffects,
      currentScore: 0,
      now,
      rng: this.rng,
    });
    const state = createPlayingState(this.config.baseSpeedMs);

    return {
      tick: 0,
      snake,
      food,
      state,
      obstacles,
      activeEffects: [],
      effects: { speed: state.speed, canPassThroughWalls: false, canPassThroughSelf: false },
      gameStartTime: now,
      stats: { foodEaten: 0, effectsUsed: 0, maxSnakeLength: snake.body.length },
    };
  }

  tick(snapshot: GameSnapshot, pendingDirection: Direction | null = null, now = this.clock()): GameSnapshot {
    return this.step(snapshot, pendingDirection, now).snapshot;
  }

  /** Same transition as `tick`, plus the ordered list of what changed. */
  step(snapshot: GameSnapshot, pendingDirection: Direction | null = null, now = this.clock()): TickOutcome {
    const { state } = snapshot;
    if (state.status !== "playing") return { snapshot, events: [] };

    if (this.isTimeUp(snapshot, now)) {
      const over = gameOverState(state, "timeUp");
      return { snapshot: { ...snapshot, tick: snapshot.tick + 1, state: over }, events: [gameOverEvent(over)] };
    }

    const { effects: activeEffects, result } = applyAllEffects(snapshot.activeEffects, state.speed, now);
    const { snake, food } = snapshot;
    const willEat = hasEatenFood(this.advanceSnake(snake, pendingDirection, false, result), food.position);
    const moved = this.advanceSnake(snake, pendingDirection, willEat, result);

    const events: TickEvent[] = [];
    if (moved.direction !== snake.direction) {
      events.push({ type: "directionChange", from: snake.direction, to: moved.direction });
    }
    events.push({ type: "move", head: snakeHead(moved), body: moved.body, direction: moved.direction });

    const reason = this.detectCollision(moved, snapshot.obstacles, result);
    if (reason) {
      const over = gameOverState(state, reason);
      events.push(gameOverEvent(over));
      return {
        snapshot: { ...snapshot, tick: snapshot.tick + 1, snake: moved, state: over, activeEffects, effects: result },
        events,
      };
    }

    if (!willEat) {
      return {
        snapshot: {
          ...snapshot,
          tick: snapshot.tick + 1,
          snake: moved,
          activeEffects,
          effects: result,
          stats: { ...snapshot.stats, maxSnakeLength: Math.max(snapshot.stats.maxSnakeLength, moved.body.length) },
        },
        events,
      };
    }

    return this.consumeFood(snapshot, state, moved, activeEffects, result, events, now);
  }

  pause(snapshot: GameSnapshot): GameSnapshot {
    if (snapshot.state.status !== "playing") return snapshot;
    return { ...snapshot, state: pauseState(snapshot.state) };
  }

  resume(snapshot: GameSnapshot): GameSnapshot {
    if (snapshot.state.status !== "paused") return snapshot;
    return { ...snapshot, state: resumeState(snapshot.state) };
  }

  resetGame(now = this.clock()): GameSnapshot {
    return this.initialize(now);
  }

  /** Advisory check for input handlers; `tick` rejects reversals again on its own. */
  isValidDirectionChange(current: Direction, next: Direction): boolean {
    return next !== opposite(current);
  }

  /** Milliseconds the driver waits after this snapshot before the next tick. */
  tickDelayMs(snapshot: GameSnapshot): number {
    return calculateSpeed(this.config.difficulty, snapshot.effects.speed);
  }

  remainingTimeSeconds(snapshot: GameSnapshot, now = this.clock()): number | null {
    if (!this.strategy.supportsTimeLimit()) return null;
    const elapsedSeconds = Math.floor((now - snapshot.gameStartTime) / 1000);
    return Math.max(0, this.config.timeLimitSeconds - elapsedSeconds);
  }

  private isTimeUp(snapshot: GameSnapshot, now: number): boolean {
    return this.strategy.supportsTimeLimit() && now - snapshot.gameStartTime >= this.config.timeLimitSeconds * 1000;
  }

  private advanceSnake(snake: Snake, direction: Direction | null, grow: boolean, effects: EffectResult): Snake {
    const { gridWidth: width, gridHeight: height } = this.config;
    const moved = this.strategy.handleMovement(snake, direction, width, height, grow);
    // ghosting through a wall comes out the other side
    return effects.canPassThroughWalls ? wrapSnakeHead(moved, width, height) : moved;
  }

  private detectCollision(snake: Snake, obstacles: readonly Position[], effects: EffectResult): GameOverReason | null {
    const { gridWidth: width, gridHeight: height } = this.config;
    if (!effects.canPassThroughWalls && this.strategy.checkBoundaryCollision(snake, width, height)) {
      return "wallCollision";
    }
    if (!effects.canPassThroughSelf && checkSelfCollision(snake)) return "selfCollision";
    if (!effects.canPassThroughWalls && checkObstacleCollision(snake, obstacles)) return "obstacleCollision";
    return null;
  }

  private consumeFood(
    snapshot: GameSnapshot,
    state: PlayingState,
    moved: Snake,
    activeEffects: FoodEffect[],
    result: EffectResult,
    events: TickEvent[],
    now: number,
  ): TickOutcome {
    const { food, obstacles, stats } = snapshot;
    const { gridWidth: width, gridHeight: height, enableEffects, difficulty } = this.config;

    // grow then shrink by one: length stays where it was
    const snake = food.type === "shrink" && snapshot.snake.body.length > 2 ? trimTail(moved, 1) : moved;
    const scored = addScore(state, calculateScore(difficulty, foodPoints(food.type)), this.config.baseSpeedMs);
    events.push({ type: "eatFood", foodType: food.type, score: scored.score, snakeLength: snake.body.length });

    let effects = activeEffects;
    let effectsUsed = stats.effectsUsed;
    if (food.effect && enableEffects) {
      effects = addEffect(effects, food.effect, now);
      effectsUsed += 1;
      events.push({ type: "effectActivate", effect: effects[effects.length - 1], score: scored.score });
    }

    if (scored.level > state.level) {
      events.push({ type: "levelUp", level: scored.level, score: scored.score });
    }

    const nextFood = generateFood({
      width,
      height,
      occupied: [...occupiedPositions(snake), ...obstacles],
      enableEffects,
      currentScore: scored.score,
      now,
      rng: this.rng,
    });
    events.push({ type: "spawnFood", position: nextFood.position, foodType: nextFood.type });

    return {
      snapshot: {
        ...snapshot,
        tick: snapshot.tick + 1,
        snake,
        food: nextFood,
        state: scored,
        activeEffects: effects,
        effects: result,
        stats: {
          foodEaten: stats.foodEaten + 1,
          effectsUsed,
          maxSnakeLength: Math.max(stats.maxSnakeLength, snake.body.length),
        },
      },
      events,
    };
  }
}
