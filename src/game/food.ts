import { EFFECTS } from "../config.js";
import { cellKey } from "../math.js";
import { randomInt, type Rng } from "../random.js";
import type { Food, FoodEffect, FoodType, Position } from "../types.js";

type FoodDefinition = {
  displayName: string;
  points: number;
  color: string;
  weight: number; // relative spawn weight, normalized over the candidate set
  symbol: string;
  createEffect: () => FoodEffect | null;
};

export const FOOD_TYPES: Record<FoodType, FoodDefinition> = {
  regular: { displayName: "Regular", points: 1, color: "red", weight: 0.7, symbol: "●", createEffect: () => null },
  bonus: { displayName: "Bonus", points: 5, color: "gold", weight: 0.2, symbol: "★", createEffect: () => null },
  speedUp: {
    displayName: "Speed up",
    points: 2,
    color: "blue",
    weight: 0.15,
    symbol: "▲",
    createEffect: () => ({ kind: "speedUp", duration: EFFECTS.speedUpDurationMs, startTime: 0 }),
  },
  speedDown: {
    displayName: "Speed down",
    points: 2,
    color: "purple",
    weight: 0.15,
    symbol: "▼",
    createEffect: () => ({ kind: "speedDown", duration: EFFECTS.speedDownDurationMs, startTime: 0 }),
  },
  ghost: {
    displayName: "Ghost",
    points: 3,
    color: "gray",
    weight: 0.08,
    symbol: "◐",
    createEffect: () => ({ kind: "ghost", duration: EFFECTS.ghostDurationMs, startTime: 0 }),
  },
  shrink: {
    displayName: "Shrink",
    points: 1,
    color: "orangered",
    weight: 0.1,
    symbol: "◦",
    createEffect: () => ({ kind: "shrink", duration: 0, startTime: 0 }),
  },
};

export const ALL_FOOD_TYPES: readonly FoodType[] = ["regular", "bonus", "speedUp", "speedDown", "ghost", "shrink"];

export function foodPoints(type: FoodType): number {
  return FOOD_TYPES[type].points;
}

export function displaySymbol(type: FoodType): string {
  return FOOD_TYPES[type].symbol;
}

export function createEffect(type: FoodType): FoodEffect | null {
  return FOOD_TYPES[type].createEffect();
}

export function hasEffect(type: FoodType): boolean {
  return createEffect(type) !== null;
}

export function basicTypes(): FoodType[] {
  return ALL_FOOD_TYPES.filter((type) => !hasEffect(type));
}

/** Effect foods unlock as the score grows. */
export function typesForScore(score: number): FoodType[] {
  if (score < 50) return ["regular", "bonus"];
  if (score < 150) return ["regular", "bonus", "speedUp", "speedDown"];
  if (score < 300) return ["regular", "bonus", "speedUp", "speedDown", "shrink"];
  return [...ALL_FOOD_TYPES];
}

export function selectWeightedType(candidates: readonly FoodType[], rng: Rng): FoodType {
  if (candidates.length === 0) return "regular";
  if (candidates.length === 1) return candidates[0];

  const total = candidates.reduce((acc, type) => acc + FOOD_TYPES[type].weight, 0);
  const draw = rng() * total;
  let cumulative = 0;
  for (const type of candidates) {
    cumulative += FOOD_TYPES[type].weight;
    if (cumulative >= draw) return type;
  }
  return candidates[0];
}

/**
 * Uniform pick among free cells by rejection sampling, then a raster scan,
 * then (0,0) when the grid is completely full.
 */
export function randomFreePosition(width: number, height: number, occupied: Iterable<Position>, rng: Rng): Position {
  const taken = new Set<string>();
  for (const pos of occupied) taken.add(cellKey(pos));

  const attempts = width * height;
  for (let i = 0; i < attempts; i++) {
    const candidate = { x: randomInt(rng, width), y: randomInt(rng, height) };
    if (!taken.has(cellKey(candidate))) return candidate;
  }

  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      const candidate = { x, y };
      if (!taken.has(cellKey(candidate))) return candidate;
    }
  }
  return { x: 0, y: 0 };
}

export type FoodSpawnOptions = {
  width: number;
  height: number;
  occupied: Iterable<Position>;
  enableEffects: boolean;
  currentScore: number;
  now: number;
  rng: Rng;
};

export function generateFood({ width, height, occupied, enableEffects, currentScore, now, rng }: FoodSpawnOptions): Food {
  const position = randomFreePosition(width, height, occupied, rng);
  const candidates = enableEffects ? typesForScore(currentScore) : basicTypes();
  const type = selectWeightedType(candidates, rng);
  return {
    position,
    type,
    effect: enableEffects ? createEffect(type) : null,
    createdTime: now,
  };
}

export function createFoodAt(position: Position, type: FoodType, now: number, enableEffects = true): Food {
  return {
    position,
    type,
    effect: enableEffects ? createEffect(type) : null,
    createdTime: now,
  };
}
