import type { Random, Vec2 } from '../types.ts';
import { lerp, wrap } from '../math.ts';
import { randomRange } from '../rng.ts';
import type { FlowGrid } from './flow_grid.ts';

const INITIAL_CAPACITY = 64;

export interface ParticleSetOptions {
  width: number;
  height: number;
  /** Blend rate toward the sampled cell flow in `relax` */
  relaxRate: number;
  /** Cosmetic size given to every particle */
  size?: number;
}

/**
 * Passive point agents that feed the flow grid and drift with it.
 *
 * Memory layout uses interleaved 2D vectors: [x0, y0, x1, y1, ...].
 * Storage doubles when a spawn runs out of room; particles are never removed
 * one by one, only all at once by `despawnAll`.
 */
export class ParticleSet {
  readonly width: number;
  readonly height: number;
  relaxRate: number;
  readonly size: number;

  positions: Float64Array;
  velocities: Float64Array;
  count = 0;

  constructor(options: ParticleSetOptions) {
    this.width = options.width;
    this.height = options.height;
    this.relaxRate = options.relaxRate;
    this.size = options.size ?? 1;
    this.positions = new Float64Array(INITIAL_CAPACITY * 2);
    this.velocities = new Float64Array(INITIAL_CAPACITY * 2);
  }

  get capacity(): number {
    return this.positions.length / 2;
  }

  /**
   * Appends one particle. The position is wrapped into the domain.
   * @returns index of the new particle
   */
  spawn(x: number, y: number, vx: number, vy: number): number {
    if (this.count === this.capacity) this.grow();
    const i = this.count++;
    this.positions[2 * i] = wrap(x, this.width);
    this.positions[2 * i + 1] = wrap(y, this.height);
    this.velocities[2 * i] = vx;
    this.velocities[2 * i + 1] = vy;
    return i;
  }

  /** Appends `n` particles at random positions with velocity components in [-speed, speed). */
  spawnRandom(n: number, speed: number, rng: Random): void {
    for (let k = 0; k < n; k++) {
      this.spawn(
        randomRange(rng, 0, this.width),
        randomRange(rng, 0, this.height),
        randomRange(rng, -speed, speed),
        randomRange(rng, -speed, speed)
      );
    }
  }

  despawnAll(): void {
    this.count = 0;
  }

  /**
   * Moves every particle by its velocity (one unit tick) and wraps each axis
   * back into the domain.
   */
  advance(): void {
    const { positions, velocities, width, height } = this;
    for (let i = 0; i < this.count; i++) {
      positions[2 * i] = wrap(positions[2 * i] + velocities[2 * i], width);
      positions[2 * i + 1] = wrap(positions[2 * i + 1] + velocities[2 * i + 1], height);
    }
  }

  /** Adds each particle's velocity to the pending sum of the cell it is in. */
  feed(grid: FlowGrid): void {
    const { positions, velocities } = this;
    for (let i = 0; i < this.count; i++) {
      const cell = grid.cellIndexAt(positions[2 * i], positions[2 * i + 1]);
      grid.accumulate(cell, velocities[2 * i], velocities[2 * i + 1]);
    }
  }

  /** Pulls each particle's velocity toward the committed flow of its cell. */
  relax(grid: FlowGrid): void {
    const { positions, velocities, relaxRate } = this;
    for (let i = 0; i < this.count; i++) {
      const flow = grid.sample(grid.cellIndexAt(positions[2 * i], positions[2 * i + 1]));
      velocities[2 * i] = lerp(velocities[2 * i], flow.x, relaxRate);
      velocities[2 * i + 1] = lerp(velocities[2 * i + 1], flow.y, relaxRate);
    }
  }

  /**
   * Blends velocities toward `target` at `rate`. With a radius, only particles
   * within that distance of `center` are affected.
   * @returns number of particles pulled
   */
  applyExternalPull(center: Vec2, target: Vec2, rate: number, radius?: number): number {
    const { positions, velocities } = this;
    const radiusSq = radius === undefined ? Infinity : radius * radius;
    let pulled = 0;
    for (let i = 0; i < this.count; i++) {
      const dx = positions[2 * i] - center.x;
      const dy = positions[2 * i + 1] - center.y;
      if (dx * dx + dy * dy > radiusSq) continue;
      velocities[2 * i] = lerp(velocities[2 * i], target.x, rate);
      velocities[2 * i + 1] = lerp(velocities[2 * i + 1], target.y, rate);
      pulled++;
    }
    return pulled;
  }

  positionOf(i: number): Vec2 {
    return { x: this.positions[2 * i], y: this.positions[2 * i + 1] };
  }

  velocityOf(i: number): Vec2 {
    return { x: this.velocities[2 * i], y: this.velocities[2 * i + 1] };
  }

  private grow(): void {
    const positions = new Float64Array(this.positions.length * 2);
    const velocities = new Float64Array(this.velocities.length * 2);
    positions.set(this.positions);
    velocities.set(this.velocities);
    this.positions = positions;
    this.velocities = velocities;
  }
}
