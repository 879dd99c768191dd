import { REPLAY } from "../config.js";
import { clamp } from "../math.js";
import { getKeyMoments, getStateAtTime, totalDuration } from "./reconstruct.js";
import type { KeyMoment, ReplayData, ReplayGameState, ReplayPlaybackState } from "./types.js";

export function formatPlaybackTime(timeMs: number): string {
  const seconds = Math.floor(timeMs / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return minutes > 0 ? `${minutes}:${String(remainingSeconds).padStart(2, "0")}` : `${remainingSeconds}s`;
}

/** Playback cursor over a sealed replay. Time only moves through `updateTime` and `seekTo`. */
export class ReplayPlayer {
  private currentTime = 0;
  private playing = false;
  private playbackSpeed = 1;
  private readonly duration: number;
  private readonly keyMoments: readonly KeyMoment[];

  constructor(private readonly replay: ReplayData) {
    this.duration = totalDuration(replay);
    this.keyMoments = getKeyMoments(replay);
  }

  play(): void {
    this.playing = true;
  }

  pause(): void {
    this.playing = false;
  }

  stop(): void {
    this.playing = false;
    this.currentTime = 0;
  }

  seekTo(timestamp: number): void {
    this.currentTime = clamp(timestamp, 0, this.duration);
  }

  setPlaybackSpeed(speed: number): void {
    this.playbackSpeed = clamp(speed, REPLAY.minPlaybackSpeed, REPLAY.maxPlaybackSpeed);
  }

  updateTime(deltaMs: number): void {
    if (!this.playing) return;
    this.currentTime += Math.floor(deltaMs * this.playbackSpeed);
    if (this.currentTime >= this.duration) {
      this.currentTime = this.duration;
      this.playing = false;
    }
  }

  getPlaybackState(): ReplayPlaybackState {
    return {
      currentTime: this.currentTime,
      totalDuration: this.duration,
      isPlaying: this.playing,
      playbackSpeed: this.playbackSpeed,
      progress: this.duration > 0 ? this.currentTime / this.duration : 0,
    };
  }

  getCurrentGameState(): ReplayGameState {
    return getStateAtTime(this.replay, this.currentTime);
  }

  getNextKeyMoment(): KeyMoment | null {
    return this.keyMoments.find((moment) => moment.timestamp > this.currentTime) ?? null;
  }

  getPreviousKeyMoment(): KeyMoment | null {
    for (let i = this.keyMoments.length - 1; i >= 0; i--) {
      if (this.keyMoments[i].timestamp < this.currentTime) return this.keyMoments[i];
    }
    return null;
  }

  skipToNextKeyMoment(): void {
    const moment = this.getNextKeyMoment();
    if (moment) this.seekTo(moment.timestamp);
  }

  skipToPreviousKeyMoment(): void {
    const moment = this.getPreviousKeyMoment();
    if (moment) this.seekTo(moment.timestamp);
  }
}
