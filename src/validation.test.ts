import { describe, it, expect } from "vitest";
import { DEFAULT_GAME_CONFIG } from "./config.js";
import { GameConfigError } from "./errors.js";
import { parseClientMessage, parseGameConfig } from "./validation.js";

describe("parseClientMessage", () => {
  it("accepts each client message kind", () => {
    expect(parseClientMessage('{"type":"hello","name":"  ana "}')).toEqual({ type: "hello", name: "ana" });
    expect(parseClientMessage('{"type":"direction","direction":"left"}')).toEqual({
      type: "direction",
      direction: "left",
    });
    expect(parseClientMessage('{"type":"pause"}')).toEqual({ type: "pause" });
    expect(parseClientMessage('{"type":"config","config":{"difficulty":"hard"}}')).toEqual({
      type: "config",
      config: { difficulty: "hard" },
    });
  });

  it("drops malformed frames", () => {
    expect(parseClientMessage("not json")).toBeNull();
    expect(parseClientMessage('{"type":"direction","direction":"sideways"}')).toBeNull();
    expect(parseClientMessage('{"type":"hello","name":""}')).toBeNull();
    expect(parseClientMessage('{"type":"config","config":{"gridWidth":3}}')).toBeNull();
    expect(parseClientMessage("[]")).toBeNull();
  });
});

describe("parseGameConfig", () => {
  it("returns a valid config unchanged", () => {
    expect(parseGameConfig(DEFAULT_GAME_CONFIG)).toEqual(DEFAULT_GAME_CONFIG);
  });

  it("bounds grid size and base speed from above", () => {
    expect(() => parseGameConfig({ ...DEFAULT_GAME_CONFIG, gridWidth: 1_000_000, gridHeight: 1_000_000 })).toThrow(
      GameConfigError,
    );
    expect(() => parseGameConfig({ ...DEFAULT_GAME_CONFIG, baseSpeedMs: 3e9 })).toThrow(GameConfigError);
    expect(parseGameConfig({ ...DEFAULT_GAME_CONFIG, gridWidth: 100, gridHeight: 100, baseSpeedMs: 10_000 })).toMatchObject({
      gridWidth: 100,
      baseSpeedMs: 10_000,
    });
    expect(parseClientMessage('{"type":"config","config":{"gridHeight":101}}')).toBeNull();
  });

  it("lists every problem", () => {
    try {
      parseGameConfig({ ...DEFAULT_GAME_CONFIG, gridWidth: 4, baseSpeedMs: 50 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GameConfigError);
      if (err instanceof GameConfigError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0]).toMatch(/^gridWidth: /);
        expect(err.issues[1]).toMatch(/^baseSpeedMs: /);
      }
    }
  });
});
