import type { Direction, Position } from "./types.js";

const DIRECTION_VECTORS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

const OPPOSITE: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

export function opposite(direction: Direction): Direction {
  return OPPOSITE[direction];
}

export function isHorizontal(direction: Direction): boolean {
  return direction === "left" || direction === "right";
}

export function isVertical(direction: Direction): boolean {
  return direction === "up" || direction === "down";
}

export function isPerpendicular(a: Direction, b: Direction): boolean {
  return isHorizontal(a) !== isHorizontal(b);
}

export function movePosition(from: Position, direction: Direction): Position {
  const delta = DIRECTION_VECTORS[direction];
  return { x: from.x + delta.x, y: from.y + delta.y };
}

export function isInBounds(pos: Position, width: number, height: number): boolean {
  return pos.x >= 0 && pos.x < width && pos.y >= 0 && pos.y < height;
}

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function cellKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}

/** Wraps each axis independently onto [0, size). */
export function wrapPosition(pos: Position, width: number, height: number): Position {
  const x = ((pos.x % width) + width) % width;
  const y = ((pos.y % height) + height) % height;
  return { x, y };
}
