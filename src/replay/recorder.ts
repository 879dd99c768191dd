import { REPLAY } from "../config.js";
import { ReplayError } from "../errors.js";
import type {
  Direction,
  FoodEffect,
  FoodType,
  GameConfig,
  GameOverReason,
  GameSnapshot,
  Position,
  TickEvent,
} from "../types.js";
import { currentLevel, currentScore } from "../game/state.js";
import type { ReplayAction, ReplayData, ReplayEvent, ReplayGameState, ReplayMetadata } from "./types.js";

export function toReplayState(snapshot: GameSnapshot): ReplayGameState {
  const { snake, food, state } = snapshot;
  return {
    snakeHead: snake.body[0],
    snakeBody: [...snake.body],
    direction: snake.direction,
    foodPosition: food.position,
    foodType: food.type,
    score: currentScore(state),
    snakeLength: snake.body.length,
    level: currentLevel(state),
    isGameOver: state.status === "gameOver",
    activeEffects: snapshot.activeEffects.map((effect) => effect.kind),
  };
}

export type FinishOptions = {
  playerName: string;
  finalScore: number;
  finalSnakeLength: number;
  isPersonalBest?: boolean;
  tags?: readonly string[];
  description?: string;
};

/**
 * Append-only log of one game. Timestamps are milliseconds since
 * `startRecording` and never go backwards; `finishRecording` seals the log.
 */
export class ReplayRecorder {
  private actions: ReplayAction[] = [];
  private events: ReplayEvent[] = [];
  private initialState: ReplayGameState | null = null;
  private startTime = 0;
  private lastTimestamp = 0;
  private sealed: ReplayData | null = null;

  constructor(
    private readonly gameConfig: GameConfig,
    readonly gameId: string,
    private readonly clock: () => number = Date.now,
  ) {}

  get isRecording(): boolean {
    return this.initialState !== null && this.sealed === null;
  }

  get isSealed(): boolean {
    return this.sealed !== null;
  }

  startRecording(initialState: ReplayGameState): void {
    if (this.sealed) throw new ReplayError(`replay ${this.gameId} is sealed`);
    this.startTime = this.clock();
    this.lastTimestamp = 0;
    this.initialState = initialState;
    this.actions = [];
    this.events = [];
    this.pushEvent({
      timestamp: 0,
      type: "gameStart",
      gameMode: this.gameConfig.gameMode,
      difficulty: this.gameConfig.difficulty,
    });
  }

  recordMove(head: Position, body: readonly Position[], direction: Direction): void {
    this.pushAction({ timestamp: this.elapsed(), type: "move", head, body: [...body], direction });
  }

  recordDirectionChange(from: Direction, to: Direction): void {
    this.pushAction({ timestamp: this.elapsed(), type: "directionChange", from, to });
  }

  recordEatFood(score: number, snakeLength: number, foodType: FoodType): void {
    const timestamp = this.elapsed();
    this.pushAction({ timestamp, type: "eatFood", score, snakeLength, foodType });
    this.pushEvent({ timestamp, type: "foodEaten", score, foodType });
  }

  recordSpawnFood(position: Position, foodType: FoodType): void {
    this.pushAction({ timestamp: this.elapsed(), type: "spawnFood", position, foodType });
  }

  recordEffectActivate(effect: FoodEffect, score: number): void {
    const timestamp = this.elapsed();
    this.pushAction({ timestamp, type: "effectActivate", effect });
    this.pushEvent({ timestamp, type: "effectActivated", effect: effect.kind, score });
  }

  recordLevelUp(level: number, score: number): void {
    const timestamp = this.elapsed();
    this.pushAction({ timestamp, type: "levelUp", level, score });
    this.pushEvent({ timestamp, type: "levelUp", level, score });
  }

  recordGameOver(finalScore: number, reason: GameOverReason): void {
    const timestamp = this.elapsed();
    if (reason !== "timeUp") this.pushEvent({ timestamp, type: "collision", reason });
    this.pushAction({ timestamp, type: "gameOver", finalScore, reason });
    this.pushEvent({ timestamp, type: "gameOver", finalScore, reason });
  }

  recordPause(): void {
    this.pushAction({ timestamp: this.elapsed(), type: "pause" });
  }

  recordResume(): void {
    this.pushAction({ timestamp: this.elapsed(), type: "resume" });
  }

  /** Appends everything one engine tick reported, in the order it happened. */
  recordTick(events: readonly TickEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case "move":
          this.recordMove(event.head, event.body, event.direction);
          break;
        case "directionChange":
          this.recordDirectionChange(event.from, event.to);
          break;
        case "eatFood":
          this.recordEatFood(event.score, event.snakeLength, event.foodType);
          break;
        case "effectActivate":
          this.recordEffectActivate(event.effect, event.score);
          break;
        case "spawnFood":
          this.recordSpawnFood(event.position, event.foodType);
          break;
        case "levelUp":
          this.recordLevelUp(event.level, event.score);
          break;
        case "gameOver":
          this.recordGameOver(event.finalScore, event.reason);
          break;
      }
    }
  }

  /** Seals the log. Calling it again returns the same sealed replay. */
  finishRecording(options: FinishOptions): ReplayData {
    if (this.sealed) return this.sealed;
    const initialState = this.initialState;
    if (!initialState) throw new ReplayError(`replay ${this.gameId} was never started`);

    const now = this.clock();
    const metadata: ReplayMetadata = Object.freeze({
      playerName: options.playerName,
      finalScore: options.finalScore,
      finalSnakeLength: options.finalSnakeLength,
      playTime: Math.max(0, now - this.startTime),
      createdAt: now,
      gameMode: this.gameConfig.gameMode,
      difficulty: this.gameConfig.difficulty,
      isPersonalBest: options.isPersonalBest ?? false,
      tags: Object.freeze([...(options.tags ?? [])]),
      description: options.description ?? "",
    });

    this.sealed = Object.freeze({
      gameId: this.gameId,
      gameConfig: this.gameConfig,
      initialState,
      actions: Object.freeze([...this.actions]),
      events: Object.freeze([...this.events]),
      metadata,
      version: REPLAY.version,
    });
    return this.sealed;
  }

  private elapsed(): number {
    const timestamp = Math.max(this.lastTimestamp, this.clock() - this.startTime);
    this.lastTimestamp = timestamp;
    return timestamp;
  }

  private ensureWritable(): void {
    if (this.sealed) throw new ReplayError(`replay ${this.gameId} is sealed`);
    if (!this.initialState) throw new ReplayError(`replay ${this.gameId} was never started`);
  }

  private pushAction(action: ReplayAction): void {
    this.ensureWritable();
    this.actions.push(action);
  }

  private pushEvent(event: ReplayEvent): void {
    this.ensureWritable();
    this.events.push(event);
  }
}
