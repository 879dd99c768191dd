import { Packr } from "msgpackr";
import type { z } from "zod";
import { DEFAULT_GAME_CONFIG, PERSISTENCE } from "../config.js";
import { DataRepositoryError } from "../errors.js";
import { decodeReplay, encodeReplay } from "../replay/codec.js";
import type { ReplayData } from "../replay/types.js";
import type { Difficulty, GameConfig, GameMode } from "../types.js";
import { GameConfigSchema } from "../validation.js";
import { entryFromRecord, type LeaderboardEntry, type LeaderboardQuery, queryLeaderboard, rankEntries } from "./leaderboard.js";
import type { GameRecord } from "./records.js";
import { GameRecordListSchema, LeaderboardListSchema, PlayerStatisticsSchema } from "./schemas.js";
import { applyRecord, emptyStatistics, type PlayerStatistics } from "./statistics.js";

/** Byte-valued key/value store the repository persists through. */
export interface KeyValueStorage {
  get(key: string): Promise<Uint8Array | null>;
  set(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
  keys(prefix: string): Promise<string[]>;
}

export class MemoryStorage implements KeyValueStorage {
  private values = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.values.keys()].filter((key) => key.startsWith(prefix));
  }
}

export interface GameDataRepository {
  saveGameRecord(record: GameRecord): Promise<void>;
  getGameRecords(limit?: number): Promise<GameRecord[]>;
  getGameRecordById(id: string): Promise<GameRecord | null>;
  deleteGameRecord(id: string): Promise<void>;
  clearGameRecords(): Promise<void>;

  getPlayerStatistics(): Promise<PlayerStatistics>;
  updatePlayerStatistics(statistics: PlayerStatistics): Promise<void>;
  resetPlayerStatistics(): Promise<void>;

  saveLeaderboardEntry(entry: LeaderboardEntry): Promise<void>;
  getLeaderboard(query?: LeaderboardQuery): Promise<LeaderboardEntry[]>;
  getPlayerRank(playerName: string, gameMode?: GameMode | null, difficulty?: Difficulty | null): Promise<number | null>;
  clearLeaderboard(): Promise<void>;

  saveGameConfig(config: GameConfig): Promise<void>;
  getGameConfig(): Promise<GameConfig>;

  saveReplayData(gameId: string, replay: ReplayData): Promise<void>;
  getReplayData(gameId: string): Promise<ReplayData | null>;
  deleteReplayData(gameId: string): Promise<void>;
  getAllReplayIds(): Promise<string[]>;
}

const KEYS = {
  records: "game_records",
  statistics: "player_statistics",
  leaderboard: "leaderboard_entries",
  config: "game_config",
  replayPrefix: "replay_",
};

const packr = new Packr({ useRecords: false });

/**
 * Repository over any `KeyValueStorage`, values msgpack-encoded. Reads that
 * find nothing usable fall back to defaults; failed writes throw
 * `DataRepositoryError`. Read-modify-write operations run one at a time.
 */
export class InMemoryGameDataRepository implements GameDataRepository {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly storage: KeyValueStorage = new MemoryStorage()) {}

  /** Saves (or replaces) a record, then upserts its leaderboard entry and folds it into the statistics. */
  saveGameRecord(record: GameRecord): Promise<void> {
    return this.exclusive(async () => {
      const records = await this.readRecords();
      const isNew = !records.some((existing) => existing.id === record.id);
      const next = [record, ...records.filter((existing) => existing.id !== record.id)].slice(0, PERSISTENCE.maxRecords);
      await this.write(KEYS.records, next, "save game record");

      const entries = await this.readLeaderboard();
      const previousBest = entries
        .filter((entry) => entry.playerName === record.playerName && entry.id !== record.id)
        .reduce((best, entry) => Math.max(best, entry.score), 0);
      await this.upsertEntry(entries, entryFromRecord(record, record.finalScore > previousBest));

      if (isNew) {
        const statistics = await this.readStatistics();
        await this.write(KEYS.statistics, applyRecord(statistics, record), "update player statistics");
      }
    });
  }

  async getGameRecords(limit: number = PERSISTENCE.defaultRecordLimit): Promise<GameRecord[]> {
    return (await this.readRecords()).slice(0, limit);
  }

  async getGameRecordById(id: string): Promise<GameRecord | null> {
    return (await this.readRecords()).find((record) => record.id === id) ?? null;
  }

  /** Also drops the replay stored under the same id. */
  deleteGameRecord(id: string): Promise<void> {
    return this.exclusive(async () => {
      const records = await this.readRecords();
      await this.write(KEYS.records, records.filter((record) => record.id !== id), "delete game record");
      await this.remove(KEYS.replayPrefix + id, "delete replay data");
    });
  }

  clearGameRecords(): Promise<void> {
    return this.exclusive(async () => {
      await this.remove(KEYS.records, "clear game records");
      for (const id of await this.getAllReplayIds()) {
        await this.remove(KEYS.replayPrefix + id, "delete replay data");
      }
    });
  }

  getPlayerStatistics(): Promise<PlayerStatistics> {
    return this.readStatistics();
  }

  updatePlayerStatistics(statistics: PlayerStatistics): Promise<void> {
    return this.exclusive(() => this.write(KEYS.statistics, statistics, "update player statistics"));
  }

  resetPlayerStatistics(): Promise<void> {
    return this.exclusive(() => this.remove(KEYS.statistics, "reset player statistics"));
  }

  saveLeaderboardEntry(entry: LeaderboardEntry): Promise<void> {
    return this.exclusive(async () => this.upsertEntry(await this.readLeaderboard(), entry));
  }

  async getLeaderboard(query: LeaderboardQuery = {}): Promise<LeaderboardEntry[]> {
    return queryLeaderboard(await this.readLeaderboard(), query, PERSISTENCE.defaultLeaderboardLimit);
  }

  /** Best rank the player holds by score on the filtered board. */
  async getPlayerRank(
    playerName: string,
    gameMode: GameMode | null = null,
    difficulty: Difficulty | null = null,
  ): Promise<number | null> {
    const board = await this.getLeaderboard({ gameMode, difficulty, limit: PERSISTENCE.maxLeaderboardEntries });
    return board.find((entry) => entry.playerName === playerName)?.rank ?? null;
  }

  clearLeaderboard(): Promise<void> {
    return this.exclusive(() => this.remove(KEYS.leaderboard, "clear leaderboard"));
  }

  saveGameConfig(config: GameConfig): Promise<void> {
    return this.exclusive(() => this.write(KEYS.config, config, "save game config"));
  }

  getGameConfig(): Promise<GameConfig> {
    return this.read(KEYS.config, GameConfigSchema, DEFAULT_GAME_CONFIG);
  }

  saveReplayData(gameId: string, replay: ReplayData): Promise<void> {
    return this.exclusive(async () => {
      try {
        await this.storage.set(KEYS.replayPrefix + gameId, encodeReplay(replay));
      } catch (err) {
        throw new DataRepositoryError(`Failed to save replay data for ${gameId}`, { cause: err });
      }
    });
  }

  async getReplayData(gameId: string): Promise<ReplayData | null> {
    const bytes = await this.storage.get(KEYS.replayPrefix + gameId);
    if (!bytes) return null;
    try {
      return decodeReplay(bytes);
    } catch (err) {
      console.warn(`[REPO] Unreadable replay ${gameId}:`, err);
      return null;
    }
  }

  deleteReplayData(gameId: string): Promise<void> {
    return this.exclusive(() => this.remove(KEYS.replayPrefix + gameId, "delete replay data"));
  }

  async getAllReplayIds(): Promise<string[]> {
    const keys = await this.storage.keys(KEYS.replayPrefix);
    return keys.map((key) => key.slice(KEYS.replayPrefix.length));
  }

  private async upsertEntry(entries: readonly LeaderboardEntry[], entry: LeaderboardEntry): Promise<void> {
    const ranked = rankEntries([...entries.filter((existing) => existing.id !== entry.id), entry], "score");
    await this.write(KEYS.leaderboard, ranked.slice(0, PERSISTENCE.maxLeaderboardEntries), "save leaderboard entry");
  }

  private readRecords(): Promise<GameRecord[]> {
    return this.read(KEYS.records, GameRecordListSchema, []);
  }

  private readLeaderboard(): Promise<LeaderboardEntry[]> {
    return this.read(KEYS.leaderboard, LeaderboardListSchema, []);
  }

  private readStatistics(): Promise<PlayerStatistics> {
    return this.read(KEYS.statistics, PlayerStatisticsSchema, emptyStatistics());
  }

  private async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): Promise<T> {
    const bytes = await this.storage.get(key);
    if (!bytes) return fallback;
    let decoded: unknown;
    try {
      decoded = packr.unpack(bytes);
    } catch (err) {
      console.warn(`[REPO] Unreadable value under ${key}, using default:`, err);
      return fallback;
    }
    const result = schema.safeParse(decoded);
    if (!result.success) {
      console.warn(`[REPO] Malformed value under ${key}, using default:`, result.error.issues[0]?.message);
      return fallback;
    }
    return result.data;
  }

  private async write(key: string, value: unknown, action: string): Promise<void> {
    try {
      await this.storage.set(key, packr.pack(value));
    } catch (err) {
      throw new DataRepositoryError(`Failed to ${action}`, { cause: err });
    }
  }

  private async remove(key: string, action: string): Promise<void> {
    try {
      await this.storage.delete(key);
    } catch (err) {
      throw new DataRepositoryError(`Failed to ${action}`, { cause: err });
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // the caller sees the failure through `run`; the queue just moves on
    this.tail = run.catch(() => undefined);
    return run;
  }
}
