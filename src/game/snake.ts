import { isInBounds, movePosition, opposite, samePosition } from "../math.js";
import type { Direction, Position, Snake } from "../types.js";

export function snakeHead(snake: Snake): Position {
  return snake.body[0];
}

/**
 * Builds a straight snake with its head at `start`, the body trailing away
 * from `direction`.
 */
export function createInitialSnake(start: Position, direction: Direction = "right", length = 3): Snake {
  const trail = opposite(direction);
  const body: Position[] = [start];
  let current = start;
  for (let i = 1; i < Math.max(1, length); i++) {
    current = movePosition(current, trail);
    body.push(current);
  }
  return { body, direction };
}

/** Direction the snake will actually take: a reversal is ignored once it has a neck. */
export function resolveDirection(snake: Snake, requested?: Direction | null): Direction {
  if (!requested) return snake.direction;
  if (snake.body.length > 1 && requested === opposite(snake.direction)) return snake.direction;
  return requested;
}

export function moveSnake(snake: Snake, newDirection?: Direction | null, grow = false): Snake {
  const direction = resolveDirection(snake, newDirection);
  const head = movePosition(snakeHead(snake), direction);
  const rest = grow ? snake.body : snake.body.slice(0, -1);
  return { body: [head, ...rest], direction };
}

export function checkSelfCollision(snake: Snake): boolean {
  const head = snakeHead(snake);
  for (let i = 1; i < snake.body.length; i++) {
    if (samePosition(snake.body[i], head)) return true;
  }
  return false;
}

export function checkWallCollision(snake: Snake, width: number, height: number): boolean {
  return !isInBounds(snakeHead(snake), width, height);
}

export function hasEatenFood(snake: Snake, food: Position): boolean {
  return samePosition(snakeHead(snake), food);
}

export function occupiedPositions(snake: Snake): Position[] {
  return [...snake.body];
}

/** Drops the last `count` segments, never below a single head. */
export function trimTail(snake: Snake, count: number): Snake {
  const keep = Math.max(1, snake.body.length - count);
  return { ...snake, body: snake.body.slice(0, keep) };
}
