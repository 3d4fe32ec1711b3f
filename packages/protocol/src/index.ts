import { Buffer } from "node:buffer";

export const PROTOCOL_VERSION = 1 as const;
export const MAX_TICK_STEPS = 1000;
export const MAX_GRID_DIMENSION = 4096;

export type UniverseCommandType =
  | "tick"
  | "toggle"
  | "glider"
  | "pulsar"
  | "random"
  | "clear"
  | "resize"
  | "set_cells"
  | "play"
  | "pause";

export type CellPair = [row: number, col: number];

export type UniverseCommandV1 =
  | { v: 1; type: "tick"; steps?: number }
  | { v: 1; type: "toggle"; row: number; col: number }
  | { v: 1; type: "glider"; row: number; col: number }
  | { v: 1; type: "pulsar"; row: number; col: number }
  | { v: 1; type: "random" }
  | { v: 1; type: "clear" }
  | { v: 1; type: "resize"; width?: number; height?: number }
  | { v: 1; type: "set_cells"; cells: CellPair[] }
  | { v: 1; type: "play" }
  | { v: 1; type: "pause" };

export interface CommandValidationResult {
  ok: boolean;
  errors: string[];
  value?: UniverseCommandV1;
}

export type RunStatus = "paused" | "running";

export interface UniverseFrameV1 {
  v: 1;
  generation: number;
  width: number;
  height: number;
  population: number;
  // base64 of the cell words, each written as 4 little-endian bytes
  cells: string;
}

export type StreamMessage =
  | { type: "frame"; frame: UniverseFrameV1; status: RunStatus }
  | { type: "status"; status: RunStatus; detail?: string }
  | { type: "error"; errors: string[] };

const COMMAND_TYPES: UniverseCommandType[] = [
  "tick",
  "toggle",
  "glider",
  "pulsar",
  "random",
  "clear",
  "resize",
  "set_cells",
  "play",
  "pause"
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCommandType(value: unknown): value is UniverseCommandType {
  return typeof value === "string" && COMMAND_TYPES.some((type) => type === value);
}

function isCoordinate(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isDimension(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= MAX_GRID_DIMENSION;
}

function readCoordinates(input: Record<string, unknown>, errors: string[]): { row: number; col: number } | undefined {
  const { row, col } = input;
  if (!isCoordinate(row)) {
    errors.push("row must be a non-negative integer");
  }
  if (!isCoordinate(col)) {
    errors.push("col must be a non-negative integer");
  }
  return isCoordinate(row) && isCoordinate(col) ? { row, col } : undefined;
}

function readCells(value: unknown, errors: string[]): CellPair[] | undefined {
  if (!Array.isArray(value)) {
    errors.push("cells must be an array of [row, col] pairs");
    return undefined;
  }

  const cells: CellPair[] = [];
  value.forEach((pair: unknown, index) => {
    if (!Array.isArray(pair) || pair.length !== 2 || !isCoordinate(pair[0]) || !isCoordinate(pair[1])) {
      errors.push(`cells[${index}] must be a pair of non-negative integers`);
      return;
    }
    cells.push([pair[0], pair[1]]);
  });
  return cells;
}

function buildCommand(
  type: UniverseCommandType,
  input: Record<string, unknown>,
  errors: string[]
): UniverseCommandV1 | undefined {
  switch (type) {
    case "tick": {
      const steps = input.steps;
      if (steps === undefined) {
        return { v: PROTOCOL_VERSION, type };
      }
      if (typeof steps !== "number" || !Number.isInteger(steps) || steps < 1 || steps > MAX_TICK_STEPS) {
        errors.push(`steps must be an integer in [1, ${MAX_TICK_STEPS}] when provided`);
        return undefined;
      }
      return { v: PROTOCOL_VERSION, type, steps };
    }
    case "toggle":
    case "glider":
    case "pulsar": {
      const coords = readCoordinates(input, errors);
      return coords ? { v: PROTOCOL_VERSION, type, ...coords } : undefined;
    }
    case "resize": {
      const { width, height } = input;
      if (width === undefined && height === undefined) {
        errors.push("resize needs width or height");
        return undefined;
      }
      if (width !== undefined && !isDimension(width)) {
        errors.push(`width must be an integer in [1, ${MAX_GRID_DIMENSION}]`);
      }
      if (height !== undefined && !isDimension(height)) {
        errors.push(`height must be an integer in [1, ${MAX_GRID_DIMENSION}]`);
      }
      if (errors.length > 0) {
        return undefined;
      }
      return {
        v: PROTOCOL_VERSION,
        type,
        ...(isDimension(width) ? { width } : {}),
        ...(isDimension(height) ? { height } : {})
      };
    }
    case "set_cells": {
      const cells = readCells(input.cells, errors);
      return cells && errors.length === 0 ? { v: PROTOCOL_VERSION, type, cells } : undefined;
    }
    case "random":
    case "clear":
    case "play":
    case "pause":
      return { v: PROTOCOL_VERSION, type };
  }
}

export function validateUniverseCommand(input: unknown): CommandValidationResult {
  if (!isRecord(input)) {
    return { ok: false, errors: ["command must be an object"] };
  }

  const errors: string[] = [];
  if (input.v !== PROTOCOL_VERSION) {
    errors.push("v must be 1");
  }

  const type = input.type;
  if (!isCommandType(type)) {
    errors.push(`type must be one of ${COMMAND_TYPES.join("|")}`);
    return { ok: false, errors };
  }

  const value = buildCommand(type, input, errors);
  if (errors.length > 0 || !value) {
    return { ok: false, errors };
  }

  return { ok: true, errors: [], value };
}

export function assertUniverseCommand(input: unknown): UniverseCommandV1 {
  const result = validateUniverseCommand(input);
  if (!result.ok || !result.value) {
    const message = result.errors.join("; ") || "Unknown validation error";
    throw new Error(`Invalid UniverseCommandV1: ${message}`);
  }
  return result.value;
}

export function encodeCellWords(words: Uint32Array): string {
  const bytes = Buffer.alloc(words.length * 4);
  words.forEach((word, index) => {
    bytes.writeUInt32LE(word, index * 4);
  });
  return bytes.toString("base64");
}

export function decodeCellWords(encoded: string): Uint32Array {
  const bytes = Buffer.from(encoded, "base64");
  if (bytes.length % 4 !== 0) {
    throw new Error(`Cell payload length ${bytes.length} is not a multiple of 4`);
  }
  const words = new Uint32Array(bytes.length / 4);
  for (let i = 0; i < words.length; i += 1) {
    words[i] = bytes.readUInt32LE(i * 4);
  }
  return words;
}

export function isCellSet(words: Uint32Array, index: number): boolean {
  return (words[index >>> 5] & (1 << (index & 31))) !== 0;
}
