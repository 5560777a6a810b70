import type { Vec2 } from '../types.ts';
import { length, lerp, wrap } from '../math.ts';
import type { FlowGrid } from './flow_grid.ts';

export interface AgentOptions {
  width: number;
  height: number;
  position: Vec2;
  velocity: Vec2;
  health: number;
  thrustBase: number;
  thrustRate: number;
}

/** What the renderer needs to draw the boat. */
export interface AgentPose {
  x: number;
  y: number;
  facing: number;
}

/**
 * The player's boat. Moves on the same torus as the particles.
 */
export class Agent {
  readonly width: number;
  readonly height: number;
  thrustBase: number;
  thrustRate: number;

  x: number;
  y: number;
  vx: number;
  vy: number;
  facing = 0;
  health: number;
  score = 0;

  constructor(options: AgentOptions) {
    this.width = options.width;
    this.height = options.height;
    this.thrustBase = options.thrustBase;
    this.thrustRate = options.thrustRate;
    this.x = wrap(options.position.x, this.width);
    this.y = wrap(options.position.y, this.height);
    this.vx = options.velocity.x;
    this.vy = options.velocity.y;
    this.health = options.health;
  }

  get speed(): number {
    return length(this.vx, this.vy);
  }

  turn(deltaAngle: number): void {
    this.facing += deltaAngle;
  }

  /**
   * Pushes along `facing`. The push grows with the current speed, so it feels
   * responsive from rest and saturates once the boat is moving.
   */
  thrust(): void {
    const magnitude = this.thrustBase + this.speed;
    const tx = Math.cos(this.facing) * magnitude;
    const ty = Math.sin(this.facing) * magnitude;
    this.vx = lerp(this.vx, tx, this.thrustRate);
    this.vy = lerp(this.vy, ty, this.thrustRate);
  }

  advance(): void {
    this.x = wrap(this.x + this.vx, this.width);
    this.y = wrap(this.y + this.vy, this.height);
  }

  placeAt(x: number, y: number): void {
    this.x = wrap(x, this.width);
    this.y = wrap(y, this.height);
  }

  setVelocity(vx: number, vy: number): void {
    this.vx = vx;
    this.vy = vy;
  }

  // field coupling: same contract as a particle
  feed(grid: FlowGrid): void {
    grid.accumulate(grid.cellIndexAt(this.x, this.y), this.vx, this.vy);
  }

  relax(grid: FlowGrid, rate: number): void {
    const flow = grid.sample(grid.cellIndexAt(this.x, this.y));
    this.vx = lerp(this.vx, flow.x, rate);
    this.vy = lerp(this.vy, flow.y, rate);
  }

  renderPose(): AgentPose {
    return { x: this.x, y: this.y, facing: this.facing };
  }
}

/**
 * Closed hull outline for a pose: a pointed bow ahead along `facing` and a
 * square stern, in domain pixels.
 */
export function hullOutline(pose: AgentPose, hullLength: number): Vec2[] {
  const half = hullLength / 2;
  const beam = hullLength / 3;
  const local: [number, number][] = [
    [half, 0],
    [0, beam],
    [-half, beam],
    [-half, -beam],
    [0, -beam],
  ];
  const cos = Math.cos(pose.facing);
  const sin = Math.sin(pose.facing);
  return local.map(([lx, ly]) => ({
    x: pose.x + lx * cos - ly * sin,
    y: pose.y + lx * sin + ly * cos,
  }));
}
