import type { Random, Vec2 } from '../types.ts';
import { clamp, lerp } from '../math.ts';
import { randomRange } from '../rng.ts';
import { debugWarn } from '../log.ts';

/**
 * Thrown when a caller breaks the grid's contract (bad dimensions, a cell
 * index outside the grid).
 */
export class FlowGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlowGridError';
  }
}

export interface FlowGridOptions {
  width: number;
  height: number;
  cellsX: number;
  cellsY: number;
  /** Smoothing factor applied on commit */
  smoothing: number;
  /** Bound of the random vector each cell starts with; 0 starts at rest */
  seedMagnitude?: number;
  rng?: Random;
}

/**
 * FlowGrid is a fixed-resolution field of averaged velocities.
 *
 * Updates happen in two phases so that every reader of a frame sees the same
 * field:
 * 1. Contributors call `accumulate` for the cell they are in. Only the
 *    pending sums and counts are written.
 * 2. `commit` folds each cell's pending average into its stored flow with an
 *    exponential moving average, then clears every accumulator.
 *
 * Cells nobody contributed to keep their stale flow.
 */
export class FlowGrid {
  // --- Domain ---
  readonly width: number;
  readonly height: number;
  readonly cellsX: number;
  readonly cellsY: number;
  readonly totalCells: number;
  readonly cellWidth: number;
  readonly cellHeight: number;
  smoothing: number;

  // --- Per-cell state ---
  flowX: Float64Array;          // Committed flow (persists across frames)
  flowY: Float64Array;
  pendingX: Float64Array;       // This frame's velocity sum
  pendingY: Float64Array;
  pendingCounts: Uint32Array;   // This frame's contributor count

  /** Number of lookups whose position had to be pulled back inside the grid */
  boundaryClamps = 0;

  constructor(options: FlowGridOptions) {
    const { width, height, cellsX, cellsY, smoothing, seedMagnitude = 0, rng = Math.random } = options;
    if (!(width > 0) || !(height > 0)) {
      throw new FlowGridError(`Domain must have a positive size, got ${width}x${height}.`);
    }
    if (!Number.isInteger(cellsX) || !Number.isInteger(cellsY) || cellsX < 1 || cellsY < 1) {
      throw new FlowGridError(`Cell counts must be positive integers, got ${cellsX}x${cellsY}.`);
    }

    this.width = width;
    this.height = height;
    this.cellsX = cellsX;
    this.cellsY = cellsY;
    this.totalCells = cellsX * cellsY;
    this.cellWidth = width / cellsX;
    this.cellHeight = height / cellsY;
    this.smoothing = smoothing;

    this.flowX = new Float64Array(this.totalCells);
    this.flowY = new Float64Array(this.totalCells);
    this.pendingX = new Float64Array(this.totalCells);
    this.pendingY = new Float64Array(this.totalCells);
    this.pendingCounts = new Uint32Array(this.totalCells);

    if (seedMagnitude > 0) {
      for (let i = 0; i < this.totalCells; i++) {
        this.flowX[i] = randomRange(rng, -seedMagnitude, seedMagnitude);
        this.flowY[i] = randomRange(rng, -seedMagnitude, seedMagnitude);
      }
    }
  }

  /**
   * Maps a domain position to its cell index (row-major, `cy * cellsX + cx`).
   *
   * A coordinate at or past the far edge (float rounding, or a position that
   * was never wrapped) is clamped to the last row/column and traced.
   */
  cellIndexAt(x: number, y: number): number {
    const rawX = Math.floor(x / this.cellWidth);
    const rawY = Math.floor(y / this.cellHeight);
    const cx = clamp(rawX, 0, this.cellsX - 1);
    const cy = clamp(rawY, 0, this.cellsY - 1);
    if (cx !== rawX || cy !== rawY) {
      this.boundaryClamps++;
      debugWarn(`FlowGrid: (${x}, ${y}) -> cell (${rawX}, ${rawY}) clamped to (${cx}, ${cy})`);
    }
    return cy * this.cellsX + cx;
  }

  /**
   * Adds one contributor's velocity to a cell's pending sum.
   */
  accumulate(cellIndex: number, vx: number, vy: number): void {
    this.checkIndex(cellIndex);
    this.pendingX[cellIndex] += vx;
    this.pendingY[cellIndex] += vy;
    this.pendingCounts[cellIndex]++;
  }

  /**
   * Folds every cell's pending average into its flow and clears all
   * accumulators.
   */
  commit(): void {
    const alpha = this.smoothing;
    for (let i = 0; i < this.totalCells; i++) {
      const count = this.pendingCounts[i];
      if (count > 0) {
        this.flowX[i] = lerp(this.flowX[i], this.pendingX[i] / count, alpha);
        this.flowY[i] = lerp(this.flowY[i], this.pendingY[i] / count, alpha);
      }
    }
    this.pendingX.fill(0);
    this.pendingY.fill(0);
    this.pendingCounts.fill(0);
  }

  /** Committed flow of a cell. */
  sample(cellIndex: number): Vec2 {
    this.checkIndex(cellIndex);
    return { x: this.flowX[cellIndex], y: this.flowY[cellIndex] };
  }

  pendingSum(cellIndex: number): Vec2 {
    this.checkIndex(cellIndex);
    return { x: this.pendingX[cellIndex], y: this.pendingY[cellIndex] };
  }

  pendingCount(cellIndex: number): number {
    this.checkIndex(cellIndex);
    return this.pendingCounts[cellIndex];
  }

  /** Contributors accumulated across all cells since the last commit. */
  totalPending(): number {
    let total = 0;
    for (let i = 0; i < this.totalCells; i++) total += this.pendingCounts[i];
    return total;
  }

  /** Overwrites a cell's committed flow. */
  setFlow(cellIndex: number, vx: number, vy: number): void {
    this.checkIndex(cellIndex);
    this.flowX[cellIndex] = vx;
    this.flowY[cellIndex] = vy;
  }

  /** Centre of a cell in domain pixels. */
  cellCenter(cellIndex: number): Vec2 {
    this.checkIndex(cellIndex);
    const cx = cellIndex % this.cellsX;
    const cy = Math.floor(cellIndex / this.cellsX);
    return {
      x: (cx + 0.5) * this.cellWidth,
      y: (cy + 0.5) * this.cellHeight,
    };
  }

  private checkIndex(cellIndex: number): void {
    if (!Number.isInteger(cellIndex) || cellIndex < 0 || cellIndex >= this.totalCells) {
      throw new FlowGridError(`Cell index ${cellIndex} is outside 0..${this.totalCells - 1}.`);
    }
  }
}
