import { MAX_GRID_DIMENSION, MAX_TICK_STEPS } from "@lifegrid/protocol";

export type RunnerCommand = "serve" | "step" | "help";
export type StartPattern = "default" | "blank" | "random" | "glider" | "pulsar";

export interface RunnerOptions {
  command: RunnerCommand;
  generations: number;
}

export interface RunnerConfig {
  port: number;
  tickIntervalMs: number;
  width: number;
  height: number;
  pattern: StartPattern;
  seed?: number;
  debug: boolean;
}

export const USAGE = "Lifegrid commands: serve | step [generations] | help";

const DEFAULT_PORT = 4317;
const DEFAULT_TICK_MS = 100;
const DEFAULT_SIZE = 64;
const START_PATTERNS: StartPattern[] = ["default", "blank", "random", "glider", "pulsar"];

type Env = Record<string, string | undefined>;

function parseInteger(raw: string, label: string, min: number, max: number): number {
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw.trim()) || value < min || value > max) {
    throw new Error(`${label} must be an integer in [${min}, ${max}], got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return parseInteger(raw, name, min, max);
}

function isStartPattern(value: string): value is StartPattern {
  return START_PATTERNS.some((pattern) => pattern === value);
}

export function parseCommand(argv: string[]): RunnerOptions {
  const [, , rawCommand, ...rest] = argv;
  const command = rawCommand ?? "serve";

  if (command === "step") {
    const rawGenerations = rest[0];
    const generations =
      rawGenerations === undefined ? 1 : parseInteger(rawGenerations, "generations", 0, MAX_TICK_STEPS);
    return { command, generations };
  }

  if (command === "serve" || command === "help") {
    return { command, generations: 0 };
  }

  throw new Error(`Unknown command "${command}". ${USAGE}`);
}

export function readRunnerConfig(env: Env = process.env): RunnerConfig {
  const pattern = env.LIFEGRID_PATTERN?.trim() || "default";
  if (!isStartPattern(pattern)) {
    throw new Error(`LIFEGRID_PATTERN must be one of ${START_PATTERNS.join("|")}, got "${pattern}"`);
  }

  const rawSeed = env.LIFEGRID_SEED;
  const seed =
    rawSeed === undefined || rawSeed.trim() === ""
      ? undefined
      : parseInteger(rawSeed, "LIFEGRID_SEED", 0, 0xffffffff);

  return {
    port: readInteger(env, "LIFEGRID_PORT", DEFAULT_PORT, 0, 65535),
    tickIntervalMs: readInteger(env, "LIFEGRID_TICK_MS", DEFAULT_TICK_MS, 1, 60000),
    width: readInteger(env, "LIFEGRID_WIDTH", DEFAULT_SIZE, 1, MAX_GRID_DIMENSION),
    height: readInteger(env, "LIFEGRID_HEIGHT", DEFAULT_SIZE, 1, MAX_GRID_DIMENSION),
    pattern,
    ...(seed !== undefined ? { seed } : {}),
    debug: env.LIFEGRID_DEBUG === "true"
  };
}
