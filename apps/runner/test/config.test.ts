import { describe, expect, it } from "vitest";

import { parseCommand, readRunnerConfig } from "../src/config.js";

describe("parseCommand", () => {
  it("defaults to serve", () => {
    expect(parseCommand(["node", "cli.ts"])).toEqual({ command: "serve", generations: 0 });
  });

  it("reads the generation count for step", () => {
    expect(parseCommand(["node", "cli.ts", "step", "5"])).toEqual({ command: "step", generations: 5 });
    expect(parseCommand(["node", "cli.ts", "step"])).toEqual({ command: "step", generations: 1 });
  });

  it("rejects a malformed generation count", () => {
    expect(() => parseCommand(["node", "cli.ts", "step", "abc"])).toThrow(
      'generations must be an integer in [0, 1000], got "abc"'
    );
  });

  it("rejects unknown commands with the usage line", () => {
    expect(() => parseCommand(["node", "cli.ts", "go"])).toThrow(
      'Unknown command "go". Lifegrid commands: serve | step [generations] | help'
    );
  });
});

describe("readRunnerConfig", () => {
  it("falls back to defaults", () => {
    expect(readRunnerConfig({})).toEqual({
      port: 4317,
      tickIntervalMs: 100,
      width: 64,
      height: 64,
      pattern: "default",
      debug: false
    });
  });

  it("reads every variable", () => {
    const config = readRunnerConfig({
      LIFEGRID_PORT: "8080",
      LIFEGRID_TICK_MS: "250",
      LIFEGRID_WIDTH: "32",
      LIFEGRID_HEIGHT: "24",
      LIFEGRID_PATTERN: "pulsar",
      LIFEGRID_SEED: "42",
      LIFEGRID_DEBUG: "true"
    });

    expect(config).toEqual({
      port: 8080,
      tickIntervalMs: 250,
      width: 32,
      height: 24,
      pattern: "pulsar",
      seed: 42,
      debug: true
    });
  });

  it("treats blank values as unset", () => {
    const config = readRunnerConfig({ LIFEGRID_WIDTH: " ", LIFEGRID_SEED: "" });

    expect(config.width).toBe(64);
    expect(config.seed).toBeUndefined();
  });

  it("names the variable that failed to parse", () => {
    expect(() => readRunnerConfig({ LIFEGRID_TICK_MS: "0" })).toThrow(
      'LIFEGRID_TICK_MS must be an integer in [1, 60000], got "0"'
    );
    expect(() => readRunnerConfig({ LIFEGRID_WIDTH: "12.5" })).toThrow(
      'LIFEGRID_WIDTH must be an integer in [1, 4096], got "12.5"'
    );
    expect(() => readRunnerConfig({ LIFEGRID_PATTERN: "spiral" })).toThrow(
      'LIFEGRID_PATTERN must be one of default|blank|random|glider|pulsar, got "spiral"'
    );
  });
});
