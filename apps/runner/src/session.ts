import type { RunStatus, StreamMessage, UniverseCommandV1, UniverseFrameV1 } from "@lifegrid/protocol";
import { MAX_GRID_DIMENSION, PROTOCOL_VERSION, encodeCellWords } from "@lifegrid/protocol";
import { Universe, createSeededRandom } from "@lifegrid/universe";

import type { RunnerConfig, StartPattern } from "./config.js";

export type SessionListener = (message: StreamMessage) => void;

export interface SessionOptions {
  tickIntervalMs: number;
  // cap on steps * width * height for a single tick command
  maxCellUpdates?: number;
}

export const DEFAULT_MAX_CELL_UPDATES = MAX_GRID_DIMENSION * MAX_GRID_DIMENSION;

export function toFrame(universe: Universe, generation: number): UniverseFrameV1 {
  return {
    v: PROTOCOL_VERSION,
    generation,
    width: universe.width(),
    height: universe.height(),
    population: universe.population(),
    cells: encodeCellWords(universe.cells())
  };
}

/** Stamps the startup pattern. Glider and pulsar are centred. */
export function seedUniverse(universe: Universe, pattern: StartPattern): void {
  const row = Math.floor(universe.height() / 2);
  const col = Math.floor(universe.width() / 2);

  switch (pattern) {
    case "default":
      return;
    case "blank":
      universe.clear();
      return;
    case "random":
      universe.random();
      return;
    case "glider":
      universe.clear();
      universe.insertGlider(row, col);
      return;
    case "pulsar":
      universe.clear();
      universe.insertPulsar(row, col);
      return;
  }
}

export class LifegridSession {
  private generation = 0;
  private status: RunStatus = "paused";
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly listeners = new Set<SessionListener>();

  constructor(
    private readonly universe: Universe,
    private readonly options: SessionOptions
  ) {}

  static fromConfig(config: RunnerConfig): LifegridSession {
    const universe = new Universe({
      width: config.width,
      height: config.height,
      random: config.seed !== undefined ? createSeededRandom(config.seed) : Math.random,
      log: config.debug ? (message) => console.debug(message) : undefined
    });
    seedUniverse(universe, config.pattern);
    return new LifegridSession(universe, { tickIntervalMs: config.tickIntervalMs });
  }

  getUniverse(): Universe {
    return this.universe;
  }

  getGeneration(): number {
    return this.generation;
  }

  getStatus(): RunStatus {
    return this.status;
  }

  getFrame(): UniverseFrameV1 {
    return toFrame(this.universe, this.generation);
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  step(steps = 1): void {
    for (let i = 0; i < steps; i += 1) {
      this.universe.tick();
    }
    this.generation += steps;
    this.publishFrame();
  }

  /** Applies one validated command. Range faults from the universe propagate unchanged. */
  apply(command: UniverseCommandV1): void {
    switch (command.type) {
      case "tick": {
        const steps = command.steps ?? 1;
        this.assertTickBudget(steps);
        this.step(steps);
        return;
      }
      case "toggle":
        this.universe.toggleCell(command.row, command.col);
        break;
      case "glider":
        this.universe.insertGlider(command.row, command.col);
        break;
      case "pulsar":
        this.universe.insertPulsar(command.row, command.col);
        break;
      case "set_cells":
        this.universe.setCells(command.cells);
        break;
      case "random":
        this.universe.random();
        this.generation = 0;
        break;
      case "clear":
        this.universe.clear();
        this.generation = 0;
        break;
      case "resize":
        if (command.width !== undefined) {
          this.universe.setWidth(command.width);
        }
        if (command.height !== undefined) {
          this.universe.setHeight(command.height);
        }
        this.generation = 0;
        break;
      case "play":
        this.play();
        return;
      case "pause":
        this.pause();
        return;
    }
    this.publishFrame();
  }

  play(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.step();
    }, this.options.tickIntervalMs);
    this.status = "running";
    this.publish({ type: "status", status: this.status });
  }

  pause(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.status = "paused";
    this.publish({ type: "status", status: this.status });
  }

  close(): void {
    this.pause();
    this.listeners.clear();
  }

  private assertTickBudget(steps: number): void {
    const budget = this.options.maxCellUpdates ?? DEFAULT_MAX_CELL_UPDATES;
    const width = this.universe.width();
    const height = this.universe.height();
    if (steps * width * height > budget) {
      throw new RangeError(
        `tick of ${steps} generations over ${width}x${height} cells exceeds the budget of ${budget} cell updates`
      );
    }
  }

  private publishFrame(): void {
    this.publish({ type: "frame", frame: this.getFrame(), status: this.status });
  }

  private publish(message: StreamMessage): void {
    for (const listener of this.listeners) {
      listener(message);
    }
  }
}
