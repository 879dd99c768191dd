import { createId } from "../ids.js";
import { REPLAY } from "../config.js";
import type { Direction } from "../types.js";
import { averageFps, getKeyMoments, totalDuration } from "./reconstruct.js";
import type { ReplayAction, ReplayData, ReplayEvent, ReplaySummary, ReplayValidationResult } from "./types.js";

export function isVersionSupported(version: string): boolean {
  return REPLAY.supportedVersions.includes(version);
}

/** Rough serialized size in bytes, for listings. */
export function estimateDataSize(replay: ReplayData): number {
  return (
    replay.actions.length * REPLAY.estimatedActionBytes +
    replay.events.length * REPLAY.estimatedEventBytes +
    REPLAY.estimatedMetadataBytes
  );
}

/**
 * Structural integrity check. `errors` make a replay unplayable; `warnings`
 * are left to the caller.
 */
export function validateReplayData(replay: ReplayData): ReplayValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (replay.gameId.trim() === "") errors.push("game id is empty");
  if (replay.actions.length === 0) errors.push("replay has no actions");

  let previous = 0;
  replay.actions.forEach((action, index) => {
    if (action.timestamp < 0) {
      errors.push(`action ${index} has a negative timestamp (${action.timestamp})`);
    } else if (action.timestamp < previous) {
      errors.push(`action ${index} goes back in time (${action.timestamp} < ${previous})`);
    }
    previous = Math.max(previous, action.timestamp);
  });

  if (replay.initialState.snakeBody.length === 0) errors.push("initial snake body is empty");

  if (!replay.actions.some((action) => action.type === "move")) warnings.push("replay has no move actions");
  if (!isVersionSupported(replay.version)) warnings.push(`unsupported replay version "${replay.version}"`);

  return { isValid: errors.length === 0, errors, warnings };
}

/**
 * Drops move actions that repeat the direction of the move before them.
 * Any non-move action ends the run, so the move right after an eat or a
 * spawn is always kept.
 */
export function compressReplayData(replay: ReplayData): ReplayData {
  const actions: ReplayAction[] = [];
  let lastDirection: Direction | null = null;

  for (const action of replay.actions) {
    if (action.type !== "move") {
      actions.push(action);
      lastDirection = null;
      continue;
    }
    if (action.direction !== lastDirection) {
      actions.push(action);
      lastDirection = action.direction;
    }
  }

  return { ...replay, actions };
}

export function generateReplaySummary(replay: ReplayData): ReplaySummary {
  const count = (type: ReplayAction["type"]) => replay.actions.filter((action) => action.type === type).length;
  return {
    gameId: replay.gameId,
    playerName: replay.metadata.playerName,
    finalScore: replay.metadata.finalScore,
    playTime: replay.metadata.playTime,
    moveCount: count("move"),
    foodEatenCount: count("eatFood"),
    directionChanges: count("directionChange"),
    keyMomentsCount: getKeyMoments(replay).length,
    averageFps: averageFps(replay),
    dataSize: estimateDataSize(replay),
    createdAt: replay.metadata.createdAt,
  };
}

/**
 * Concatenates replays back to back: each one is shifted by the summed
 * duration of those before it. Config, initial state and metadata come
 * from the first; play time becomes the merged duration.
 */
export function mergeReplays(replays: readonly ReplayData[], gameId = `merged_${createId()}`): ReplayData | null {
  const [first] = replays;
  if (!first) return null;
  if (replays.length === 1) return first;

  const actions: ReplayAction[] = [];
  const events: ReplayEvent[] = [];
  let offset = 0;
  for (const replay of replays) {
    for (const action of replay.actions) actions.push({ ...action, timestamp: action.timestamp + offset });
    for (const event of replay.events) events.push({ ...event, timestamp: event.timestamp + offset });
    offset += totalDuration(replay);
  }

  return {
    ...first,
    gameId,
    actions,
    events,
    metadata: {
      ...first.metadata,
      playTime: offset,
      description: `Merged replay (${replays.length} games)`,
    },
  };
}
