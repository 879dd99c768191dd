import { LOOP } from "./config.js";
import { createGameRecord, DEFAULT_PLAYER_NAME, type GameRecord } from "./data/records.js";
import type { GameDataRepository } from "./data/repository.js";
import { remainingTime } from "./game/effects.js";
import { SimulationEngine } from "./game/engine.js";
import { createId } from "./ids.js";
import { startGameLoop, type StopLoop } from "./loop.js";
import type { Rng } from "./random.js";
import { ReplayRecorder, toReplayState } from "./replay/recorder.js";
import type { ReplayData } from "./replay/types.js";
import type { Direction, GameConfig, GameOverState, GameSnapshot, PublicSnapshot } from "./types.js";

export type SessionEvent =
  | { type: "state"; snapshot: GameSnapshot }
  | { type: "gameOver"; record: GameRecord; replay: ReplayData; isPersonalBest: boolean };

export type SessionListener = (event: SessionEvent) => void;

export type GameSessionOptions = {
  config?: Partial<GameConfig>;
  playerName?: string;
  repository?: GameDataRepository | null;
  rng?: Rng;
  clock?: () => number;
};

/**
 * Drives one game: owns the snapshot, the pending-direction slot and the tick
 * loop. Only the loop writes the snapshot; only `changeDirection` writes the
 * pending direction.
 */
export class GameSession {
  readonly id = createId();
  private engine: SimulationEngine;
  private snapshot: GameSnapshot;
  private recorder: ReplayRecorder;
  private pendingDirection: Direction | null = null;
  private generation = 0;
  private stopLoop: StopLoop | null = null;
  private listeners = new Set<SessionListener>();
  private pendingSave: Promise<void> = Promise.resolve();
  private readonly repository: GameDataRepository | null;
  private readonly rng: Rng | undefined;
  private readonly clock: () => number;
  playerName: string;

  /** @throws GameConfigError when `options.config` is malformed */
  constructor(options: GameSessionOptions = {}) {
    this.repository = options.repository ?? null;
    this.rng = options.rng;
    this.clock = options.clock ?? Date.now;
    this.playerName = options.playerName ?? DEFAULT_PLAYER_NAME;
    this.engine = new SimulationEngine(options.config, { rng: this.rng, clock: this.clock });
    this.snapshot = this.engine.initialize();
    this.recorder = this.beginRecording();
  }

  get config(): GameConfig {
    return this.engine.config;
  }

  get current(): GameSnapshot {
    return this.snapshot;
  }

  get isRunning(): boolean {
    return this.stopLoop !== null;
  }

  start(): void {
    if (this.stopLoop) return;
    const generation = ++this.generation;
    this.stopLoop = startGameLoop(() => this.onTick(generation), {
      initialDelayMs: this.engine.tickDelayMs(this.snapshot),
      now: this.clock,
    });
    console.log(`[SESSION] ${this.id} started (${this.config.gameMode}/${this.config.difficulty})`);
  }

  stop(): void {
    if (!this.stopLoop) return;
    this.stopLoop();
    this.stopLoop = null;
    this.generation++;
    console.log(`[SESSION] ${this.id} stopped`);
  }

  /** Buffers a direction for the next tick. Reversals of the current heading are refused. */
  changeDirection(direction: Direction): boolean {
    if (this.snapshot.state.status !== "playing") return false;
    if (!this.engine.isValidDirectionChange(this.snapshot.snake.direction, direction)) return false;
    this.pendingDirection = direction;
    return true;
  }

  pause(): void {
    if (this.snapshot.state.status !== "playing") return;
    this.snapshot = this.engine.pause(this.snapshot);
    this.recorder.recordPause();
    this.emit({ type: "state", snapshot: this.snapshot });
  }

  resume(): void {
    if (this.snapshot.state.status !== "paused") return;
    this.snapshot = this.engine.resume(this.snapshot);
    this.recorder.recordResume();
    this.emit({ type: "state", snapshot: this.snapshot });
  }

  /** Pause, resume, or after game over start a new game. */
  togglePause(): void {
    switch (this.snapshot.state.status) {
      case "playing":
        this.pause();
        break;
      case "paused":
        this.resume();
        break;
      case "gameOver":
        this.reset();
        break;
    }
  }

  /** Discards the current game. A running loop is replaced; a tick already scheduled for the old game is dropped. */
  reset(): void {
    const wasRunning = this.isRunning;
    if (wasRunning) this.stop();
    this.snapshot = this.engine.resetGame();
    this.pendingDirection = null;
    this.recorder = this.beginRecording();
    this.emit({ type: "state", snapshot: this.snapshot });
    if (wasRunning) this.start();
  }

  /**
   * Rebuilds the engine on the merged configuration and starts a new game.
   * @throws GameConfigError before anything changes when the result is malformed
   */
  updateConfig(partial: Partial<GameConfig>): GameConfig {
    this.engine = new SimulationEngine({ ...this.engine.config, ...partial }, { rng: this.rng, clock: this.clock });
    this.reset();
    return this.engine.config;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every finished game has been handed to the repository. */
  flush(): Promise<void> {
    return this.pendingSave;
  }

  toPublicSnapshot(snapshot: GameSnapshot = this.snapshot): PublicSnapshot {
    const now = this.clock();
    return {
      tick: snapshot.tick,
      grid: { width: this.config.gridWidth, height: this.config.gridHeight },
      mode: this.config.gameMode,
      direction: snapshot.snake.direction,
      snake: snapshot.snake.body.map((p): [number, number] => [p.x, p.y]),
      food: { x: snapshot.food.position.x, y: snapshot.food.position.y, type: snapshot.food.type },
      obstacles: snapshot.obstacles.map((p): [number, number] => [p.x, p.y]),
      state: snapshot.state,
      effects: snapshot.activeEffects.map((effect) => ({ kind: effect.kind, remainingMs: remainingTime(effect, now) })),
      remainingSeconds: this.engine.remainingTimeSeconds(snapshot, now),
    };
  }

  private onTick(generation: number): number {
    if (generation !== this.generation) return LOOP.idlePollMs;
    if (this.snapshot.state.status !== "playing") return LOOP.idlePollMs;

    const direction = this.pendingDirection;
    this.pendingDirection = null;
    const { snapshot, events } = this.engine.step(this.snapshot, direction);
    this.snapshot = snapshot;
    this.recorder.recordTick(events);
    this.emit({ type: "state", snapshot });

    if (snapshot.state.status === "gameOver") {
      this.finishGame(snapshot, snapshot.state);
      return LOOP.idlePollMs;
    }
    return this.engine.tickDelayMs(snapshot);
  }

  private beginRecording(): ReplayRecorder {
    const recorder = new ReplayRecorder(this.engine.config, createId(), this.clock);
    recorder.startRecording(toReplayState(this.snapshot));
    return recorder;
  }

  private finishGame(snapshot: GameSnapshot, state: GameOverState): void {
    const replay = this.recorder.finishRecording({
      playerName: this.playerName,
      finalScore: state.finalScore,
      finalSnakeLength: snapshot.snake.body.length,
    });
    const record = createGameRecord(
      {
        id: replay.gameId,
        gameMode: this.config.gameMode,
        difficulty: this.config.difficulty,
        finalScore: state.finalScore,
        maxSnakeLength: snapshot.stats.maxSnakeLength,
        playTime: replay.metadata.playTime,
        foodEaten: snapshot.stats.foodEaten,
        effectsUsed: snapshot.stats.effectsUsed,
        gameOverReason: state.reason,
        playerName: this.playerName,
      },
      this.clock(),
    );
    console.log(`[SESSION] ${this.id} game over: ${state.reason}, score ${state.finalScore}`);
    this.pendingSave = this.pendingSave.then(() => this.persist(record, replay));
  }

  private async persist(record: GameRecord, sealed: ReplayData): Promise<void> {
    let replay = sealed;
    let isPersonalBest = false;
    if (this.repository) {
      try {
        const statistics = await this.repository.getPlayerStatistics();
        isPersonalBest = record.finalScore > statistics.highestScore;
        replay = { ...sealed, metadata: { ...sealed.metadata, isPersonalBest } };
        await this.repository.saveReplayData(record.id, replay);
        await this.repository.saveGameRecord(record);
      } catch (err) {
        console.error(`[SESSION] Failed to save game ${record.id}:`, err);
      }
    }
    this.emit({ type: "gameOver", record, replay, isPersonalBest });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[SESSION] Listener error:`, err);
      }
    }
  }
}
