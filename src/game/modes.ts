import { cellKey, samePosition, wrapPosition } from "../math.js";
import { defaultRng, randomInt, type Rng } from "../random.js";
import type { Difficulty, Direction, GameMode, Position, Snake } from "../types.js";
import { checkWallCollision, moveSnake, snakeHead } from "./snake.js";

/** Rules that vary by game mode. Obstacle hits are judged by the engine. */
export interface GameModeStrategy {
  readonly mode: GameMode;
  handleMovement(snake: Snake, direction: Direction | null, width: number, height: number, grow: boolean): Snake;
  checkBoundaryCollision(snake: Snake, width: number, height: number): boolean;
  generateObstacles(width: number, height: number, occupied: readonly Position[], maxObstacles: number): Position[];
  supportsTimeLimit(): boolean;
}

export const GAME_MODES: Record<
  GameMode,
  { displayName: string; recommendedSize: { width: number; height: number }; defaultDifficulty: Difficulty }
> = {
  classic: { displayName: "Classic", recommendedSize: { width: 20, height: 20 }, defaultDifficulty: "normal" },
  borderless: { displayName: "Borderless", recommendedSize: { width: 18, height: 18 }, defaultDifficulty: "easy" },
  obstacles: { displayName: "Obstacles", recommendedSize: { width: 22, height: 22 }, defaultDifficulty: "hard" },
  timeChallenge: { displayName: "Time challenge", recommendedSize: { width: 20, height: 20 }, defaultDifficulty: "normal" },
};

export function wrapSnakeHead(snake: Snake, width: number, height: number): Snake {
  const head = snakeHead(snake);
  const wrapped = wrapPosition(head, width, height);
  if (samePosition(head, wrapped)) return snake;
  return { ...snake, body: [wrapped, ...snake.body.slice(1)] };
}

export function checkObstacleCollision(snake: Snake, obstacles: readonly Position[]): boolean {
  const head = snakeHead(snake);
  return obstacles.some((obstacle) => samePosition(obstacle, head));
}

export class ClassicModeStrategy implements GameModeStrategy {
  readonly mode: GameMode = "classic";

  handleMovement(snake: Snake, direction: Direction | null, _width: number, _height: number, grow: boolean): Snake {
    return moveSnake(snake, direction, grow);
  }

  checkBoundaryCollision(snake: Snake, width: number, height: number): boolean {
    return checkWallCollision(snake, width, height);
  }

  generateObstacles(_width: number, _height: number, _occupied: readonly Position[], _maxObstacles: number): Position[] {
    return [];
  }

  supportsTimeLimit(): boolean {
    return false;
  }
}

export class BorderlessModeStrategy implements GameModeStrategy {
  readonly mode: GameMode = "borderless";

  handleMovement(snake: Snake, direction: Direction | null, width: number, height: number, grow: boolean): Snake {
    return wrapSnakeHead(moveSnake(snake, direction, grow), width, height);
  }

  checkBoundaryCollision(): boolean {
    return false;
  }

  generateObstacles(): Position[] {
    return [];
  }

  supportsTimeLimit(): boolean {
    return false;
  }
}

export class ObstaclesModeStrategy extends ClassicModeStrategy {
  override readonly mode: GameMode = "obstacles";

  constructor(private readonly rng: Rng = defaultRng) {
    super();
  }

  /** Samples without replacement from the free cells, at most `maxObstacles` of them. */
  override generateObstacles(width: number, height: number, occupied: readonly Position[], maxObstacles: number): Position[] {
    const taken = new Set(occupied.map(cellKey));
    const available: Position[] = [];
    for (let x = 0; x < width; x++) {
      for (let y = 0; y < height; y++) {
        const pos = { x, y };
        if (!taken.has(cellKey(pos))) available.push(pos);
      }
    }

    const count = Math.min(maxObstacles, available.length);
    const obstacles: Position[] = [];
    for (let i = 0; i < count; i++) {
      const [picked] = available.splice(randomInt(this.rng, available.length), 1);
      obstacles.push(picked);
    }
    return obstacles;
  }
}

export class TimeChallengeStrategy extends ClassicModeStrategy {
  override readonly mode: GameMode = "timeChallenge";

  override supportsTimeLimit(): boolean {
    return true;
  }
}

export function createStrategy(mode: GameMode, rng: Rng = defaultRng): GameModeStrategy {
  switch (mode) {
    case "classic":
      return new ClassicModeStrategy();
    case "borderless":
      return new BorderlessModeStrategy();
    case "obstacles":
      return new ObstaclesModeStrategy(rng);
    case "timeChallenge":
      return new TimeChallengeStrategy();
  }
}
