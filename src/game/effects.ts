import { EFFECTS } from "../config.js";
import type { EffectKind, EffectResult, FoodEffect } from "../types.js";

export function isEffectExpired(effect: FoodEffect, now: number): boolean {
  if (effect.kind === "shrink") return true; // one-shot
  return now - effect.startTime >= effect.duration;
}

export function remainingTime(effect: FoodEffect, now: number): number {
  return Math.max(0, effect.duration - (now - effect.startTime));
}

export function applyEffect(effect: FoodEffect, current: EffectResult): EffectResult {
  switch (effect.kind) {
    case "speedUp": {
      const speed = Math.floor((current.speed * EFFECTS.speedUpNumerator) / EFFECTS.speedUpDenominator);
      return { ...current, speed: Math.max(EFFECTS.minSpeedMs, speed) };
    }
    case "speedDown": {
      const speed = Math.floor((current.speed * EFFECTS.speedDownNumerator) / EFFECTS.speedDownDenominator);
      return { ...current, speed: Math.min(EFFECTS.maxSpeedMs, speed) };
    }
    case "ghost":
      return { speed: current.speed, canPassThroughWalls: true, canPassThroughSelf: true };
    case "shrink":
      return current;
  }
}

/** Activates `effect` at `now`, replacing any active effect of the same kind. */
export function addEffect(effects: readonly FoodEffect[], effect: FoodEffect, now: number): FoodEffect[] {
  const activated: FoodEffect = { ...effect, startTime: now };
  return [...effects.filter((active) => active.kind !== effect.kind), activated];
}

export function evictExpired(effects: readonly FoodEffect[], now: number): FoodEffect[] {
  return effects.filter((effect) => !isEffectExpired(effect, now));
}

/**
 * Evicts expired effects, then folds the rest in insertion order. Each effect
 * reads the speed the previous one produced, so multipliers compound and a
 * later effect's flags win.
 */
export function applyAllEffects(
  effects: readonly FoodEffect[],
  baseSpeed: number,
  now: number,
): { effects: FoodEffect[]; result: EffectResult } {
  const remaining = evictExpired(effects, now);
  const start: EffectResult = { speed: baseSpeed, canPassThroughWalls: false, canPassThroughSelf: false };
  const result = remaining.reduce<EffectResult>((acc, effect) => applyEffect(effect, acc), start);
  return { effects: remaining, result };
}

export function hasActiveEffect(effects: readonly FoodEffect[], kind: EffectKind): boolean {
  return effects.some((effect) => effect.kind === kind);
}
