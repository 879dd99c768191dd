import { FOOD_TYPES } from "../game/food.js";
import type { EffectKind } from "../types.js";
import type { KeyMoment, ReplayAction, ReplayData, ReplayGameState } from "./types.js";

export function totalDuration(replay: ReplayData): number {
  const last = replay.actions[replay.actions.length - 1];
  return last ? last.timestamp : 0;
}

export function frameCount(replay: ReplayData): number {
  return replay.actions.length;
}

export function averageFps(replay: ReplayData): number {
  const duration = totalDuration(replay);
  return duration > 0 ? (frameCount(replay) * 1000) / duration : 0;
}

/** One step of the replay fold. Actions that carry no reconstructable state pass through. */
export function applyAction(state: ReplayGameState, action: ReplayAction): ReplayGameState {
  switch (action.type) {
    case "move":
      return { ...state, snakeHead: action.head, snakeBody: action.body, direction: action.direction };
    case "eatFood":
      return { ...state, score: action.score, snakeLength: action.snakeLength, foodPosition: null };
    case "spawnFood":
      return { ...state, foodPosition: action.position, foodType: action.foodType };
    case "levelUp":
      return { ...state, level: action.level };
    case "gameOver":
      return { ...state, isGameOver: true };
    case "effectActivate": {
      const { kind } = action.effect;
      // shrink is instant; the others replace an active effect of the same kind
      if (kind === "shrink") return state;
      return { ...state, activeEffects: [...state.activeEffects.filter((active) => active !== kind), kind] };
    }
    case "directionChange":
    case "pause":
    case "resume":
      return state;
  }
}

/**
 * Folds every action with `timestamp <= time` onto the initial state, left
 * to right, then drops effects that had run out by `time`. The same prefix
 * always yields the same state.
 */
export function getStateAtTime(replay: ReplayData, time: number): ReplayGameState {
  if (time < 0) return replay.initialState;
  let state = replay.initialState;
  const expiresAt = new Map<EffectKind, number>();
  for (const action of replay.actions) {
    if (action.timestamp > time) continue;
    state = applyAction(state, action);
    if (action.type === "effectActivate") expiresAt.set(action.effect.kind, action.timestamp + action.effect.duration);
  }
  const activeEffects = state.activeEffects.filter((kind) => {
    const until = expiresAt.get(kind);
    return until === undefined || time < until;
  });
  return activeEffects.length === state.activeEffects.length ? state : { ...state, activeEffects };
}

export function getActionsInRange(replay: ReplayData, startTime: number, endTime: number): ReplayAction[] {
  return replay.actions.filter((action) => action.timestamp >= startTime && action.timestamp <= endTime);
}

export function getKeyMoments(replay: ReplayData): KeyMoment[] {
  const moments: KeyMoment[] = [];
  for (const event of replay.events) {
    switch (event.type) {
      case "foodEaten":
        moments.push({
          timestamp: event.timestamp,
          type: "foodEaten",
          description: `Ate ${FOOD_TYPES[event.foodType].displayName.toLowerCase()} food`,
          score: event.score,
        });
        break;
      case "gameOver":
        moments.push({
          timestamp: event.timestamp,
          type: "gameOver",
          description: `Game over: ${event.reason}`,
          score: event.finalScore,
        });
        break;
      case "levelUp":
        moments.push({
          timestamp: event.timestamp,
          type: "levelUp",
          description: `Reached level ${event.level}`,
          score: event.score,
        });
        break;
      case "effectActivated":
        moments.push({
          timestamp: event.timestamp,
          type: "effectUsed",
          description: `Used ${event.effect} effect`,
          score: event.score,
        });
        break;
      default:
        break;
    }
  }
  return moments.sort((a, b) => a.timestamp - b.timestamp);
}
