export const DEFAULT_WIDTH = 64;
export const DEFAULT_HEIGHT = 64;
export const MAX_DIMENSION = 0xffffffff;

const WORD_BITS = 32;

export const Cell = {
  Dead: 0,
  Alive: 1
} as const;

export type Cell = (typeof Cell)[keyof typeof Cell];

export type CellCoord = readonly [row: number, col: number];

/** Uniform source of floats in [0, 1). */
export type RandomSource = () => number;

export type LogSink = (message: string) => void;

export interface UniverseOptions {
  width?: number;
  height?: number;
  random?: RandomSource;
  log?: LogSink;
}

export interface ReadonlyBitSet {
  readonly length: number;
  get(index: number): boolean;
  countOnes(): number;
}

class BitSetView implements ReadonlyBitSet {
  constructor(private readonly bits: FixedBitSet) {}

  get length(): number {
    return this.bits.length;
  }

  get(index: number): boolean {
    return this.bits.get(index);
  }

  countOnes(): number {
    return this.bits.countOnes();
  }
}

/**
 * Fixed-length bit vector over 32-bit words. Bit `i` sits in word `i >>> 5`
 * at position `i & 31`.
 */
export class FixedBitSet implements ReadonlyBitSet {
  readonly length: number;
  private readonly words: Uint32Array;

  constructor(length: number, words?: Uint32Array) {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`FixedBitSet length must be a non-negative integer, got ${length}`);
    }
    const wordCount = Math.ceil(length / WORD_BITS);
    if (words && words.length !== wordCount) {
      throw new RangeError(`FixedBitSet of length ${length} needs ${wordCount} words, got ${words.length}`);
    }
    this.length = length;
    this.words = words ?? new Uint32Array(wordCount);
  }

  static withCapacity(length: number): FixedBitSet {
    return new FixedBitSet(length);
  }

  get(index: number): boolean {
    this.assertIndex(index);
    return (this.words[index >>> 5] & (1 << (index & 31))) !== 0;
  }

  set(index: number, value: boolean): void {
    this.assertIndex(index);
    const word = index >>> 5;
    const mask = 1 << (index & 31);
    this.words[word] = value ? this.words[word] | mask : this.words[word] & ~mask;
  }

  toggle(index: number): void {
    this.assertIndex(index);
    this.words[index >>> 5] ^= 1 << (index & 31);
  }

  clearAll(): void {
    this.words.fill(0);
  }

  clone(): FixedBitSet {
    return new FixedBitSet(this.length, this.words.slice());
  }

  countOnes(): number {
    let count = 0;
    for (let i = 0; i < this.words.length; i += 1) {
      let v = this.words[i];
      v = v - ((v >>> 1) & 0x55555555);
      v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
      count += (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
    }
    return count;
  }

  asSlice(): Uint32Array {
    return this.words;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Bit index ${index} out of range for length ${this.length}`);
    }
  }
}

export const GLIDER_OFFSETS: readonly CellCoord[] = [
  [0, -1],
  [-1, 1],
  [0, 1],
  [1, 0],
  [1, 1]
];

export const PULSAR_BASE_OFFSETS: readonly CellCoord[] = [
  [-6, -2],
  [-6, -3],
  [-6, -4],
  [-4, -6],
  [-3, -6],
  [-2, -6],
  [-4, -1],
  [-3, -1],
  [-2, -1],
  [-1, -2],
  [-1, -3],
  [-1, -4]
];

const GLIDER_MARGIN = 2;
const PULSAR_MARGIN = 7;

/** All 48 pulsar offsets: each base offset mirrored across both axes. */
export function pulsarOffsets(): CellCoord[] {
  const offsets: CellCoord[] = [];
  for (const rowSign of [-1, 1]) {
    for (const colSign of [-1, 1]) {
      for (const [dr, dc] of PULSAR_BASE_OFFSETS) {
        offsets.push([dr * rowSign, dc * colSign]);
      }
    }
  }
  return offsets;
}

/**
 * Deterministic mulberry32 generator.
 * Returns a function that yields values in [0, 1) on each call.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_DIMENSION) {
    throw new RangeError(`${name} must be an integer in [1, ${MAX_DIMENSION}], got ${value}`);
  }
}

function seedPattern(size: number): FixedBitSet {
  const cells = FixedBitSet.withCapacity(size);
  for (let i = 0; i < size; i += 1) {
    cells.set(i, i % 2 === 0 || i % 7 === 0);
  }
  return cells;
}

function nextState(alive: boolean, liveNeighbors: number): boolean {
  if (alive && liveNeighbors < 2) {
    return false;
  }
  if (alive && (liveNeighbors === 2 || liveNeighbors === 3)) {
    return true;
  }
  if (alive && liveNeighbors > 3) {
    return false;
  }
  if (!alive && liveNeighbors === 3) {
    return true;
  }
  return alive;
}

/**
 * Toroidal Game of Life grid. Every cell is one bit in a {@link FixedBitSet},
 * row-major. Coordinates outside the grid are faults and throw `RangeError`
 * before any state changes; only neighbor counting wraps.
 */
export class Universe {
  private gridWidth: number;
  private gridHeight: number;
  private grid: FixedBitSet;
  private readonly draw: RandomSource;
  private readonly log: LogSink | undefined;

  constructor(options: UniverseOptions = {}) {
    const width = options.width ?? DEFAULT_WIDTH;
    const height = options.height ?? DEFAULT_HEIGHT;
    assertDimension("width", width);
    assertDimension("height", height);

    this.gridWidth = width;
    this.gridHeight = height;
    this.grid = seedPattern(width * height);
    this.draw = options.random ?? Math.random;
    this.log = options.log;
  }

  width(): number {
    return this.gridWidth;
  }

  height(): number {
    return this.gridHeight;
  }

  /** Changes the column count and resets every cell to Dead. */
  setWidth(width: number): void {
    assertDimension("width", width);
    this.grid = FixedBitSet.withCapacity(width * this.gridHeight);
    this.gridWidth = width;
  }

  /** Changes the row count and resets every cell to Dead. */
  setHeight(height: number): void {
    assertDimension("height", height);
    this.grid = FixedBitSet.withCapacity(this.gridWidth * height);
    this.gridHeight = height;
  }

  clear(): void {
    this.grid = FixedBitSet.withCapacity(this.gridWidth * this.gridHeight);
  }

  random(): void {
    const size = this.gridWidth * this.gridHeight;
    const cells = FixedBitSet.withCapacity(size);
    for (let i = 0; i < size; i += 1) {
      cells.set(i, this.draw() < 0.5);
    }
    this.grid = cells;
  }

  getIndex(row: number, col: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.gridHeight) {
      throw new RangeError(`row ${row} out of range for height ${this.gridHeight}`);
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.gridWidth) {
      throw new RangeError(`column ${col} out of range for width ${this.gridWidth}`);
    }
    return row * this.gridWidth + col;
  }

  liveNeighborCount(row: number, col: number): number {
    this.getIndex(row, col);
    return this.countNeighbors(row, col, [this.gridHeight - 1, 0, 1], [this.gridWidth - 1, 0, 1]);
  }

  /** Advances one generation. Reads only the frozen current state. */
  tick(): void {
    const next = this.grid.clone();
    const rowDeltas = [this.gridHeight - 1, 0, 1];
    const colDeltas = [this.gridWidth - 1, 0, 1];

    for (let row = 0; row < this.gridHeight; row += 1) {
      for (let col = 0; col < this.gridWidth; col += 1) {
        const index = row * this.gridWidth + col;
        next.set(index, nextState(this.grid.get(index), this.countNeighbors(row, col, rowDeltas, colDeltas)));
      }
    }

    this.grid = next;
  }

  private countNeighbors(row: number, col: number, rowDeltas: number[], colDeltas: number[]): number {
    let count = 0;
    for (const deltaRow of rowDeltas) {
      for (const deltaCol of colDeltas) {
        if (deltaRow === 0 && deltaCol === 0) {
          continue;
        }
        const neighborRow = (row + deltaRow) % this.gridHeight;
        const neighborCol = (col + deltaCol) % this.gridWidth;
        if (this.grid.get(neighborRow * this.gridWidth + neighborCol)) {
          count += 1;
        }
      }
    }
    return count;
  }

  isAlive(row: number, col: number): boolean {
    return this.grid.get(this.getIndex(row, col));
  }

  cellAt(row: number, col: number): Cell {
    return this.isAlive(row, col) ? Cell.Alive : Cell.Dead;
  }

  population(): number {
    return this.grid.countOnes();
  }

  isDead(): boolean {
    return this.grid.asSlice().every((word) => word === 0);
  }

  toggleCell(row: number, col: number): void {
    const index = this.getIndex(row, col);
    this.log?.(`toggling state of (${row}, ${col})`);
    this.grid.toggle(index);
  }

  /** Kills every cell in the half-open rectangle `[start, end)`. No wraparound. */
  clearCells(start: CellCoord, end: CellCoord): void {
    const [startRow, startCol] = start;
    const [endRow, endCol] = end;
    if (startRow >= endRow || startCol >= endCol) {
      return;
    }
    this.getIndex(startRow, startCol);
    this.getIndex(endRow - 1, endCol - 1);

    for (let row = startRow; row < endRow; row += 1) {
      for (let col = startCol; col < endCol; col += 1) {
        this.grid.set(row * this.gridWidth + col, false);
      }
    }
  }

  insertGlider(row: number, col: number): void {
    this.stamp(row, col, GLIDER_MARGIN, GLIDER_OFFSETS);
  }

  insertPulsar(row: number, col: number): void {
    this.stamp(row, col, PULSAR_MARGIN, pulsarOffsets());
  }

  /** Read-only view of the current generation. Raw words come from {@link cells}. */
  getCells(): ReadonlyBitSet {
    return new BitSetView(this.grid);
  }

  /** Marks every listed cell Alive. Cells not listed keep their state. */
  setCells(cells: Iterable<CellCoord>): void {
    const indices: number[] = [];
    for (const [row, col] of cells) {
      indices.push(this.getIndex(row, col));
    }
    for (const index of indices) {
      this.grid.set(index, true);
    }
  }

  /**
   * The words backing the grid, without copying. The view stays valid until
   * the next mutating call; `tick`, `random`, `clear` and the resizes swap in
   * a new buffer.
   */
  cells(): Uint32Array {
    return this.grid.asSlice();
  }

  private stamp(row: number, col: number, margin: number, offsets: readonly CellCoord[]): void {
    const fits =
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= margin &&
      col >= margin &&
      row + margin <= this.gridHeight &&
      col + margin <= this.gridWidth;
    if (!fits) {
      throw new RangeError(
        `pattern at (${row}, ${col}) needs a margin of ${margin} inside a ${this.gridHeight}x${this.gridWidth} grid`
      );
    }

    this.clearCells([row - margin, col - margin], [row + margin, col + margin]);
    for (const [dr, dc] of offsets) {
      this.grid.set(this.getIndex(row + dr, col + dc), true);
    }
  }
}
