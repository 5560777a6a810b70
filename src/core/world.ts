import type { DisplayMode, FlowConfig, Random, Vec2 } from '../types.ts';
import { FlowGrid } from './flow_grid.ts';
import { ParticleSet } from './particles.ts';
import { Agent } from './agent.ts';

/**
 * Everything one session mutates, owned in a single place and passed by
 * reference through the frame pipeline. A reset replaces the whole object.
 */
export interface World {
  grid: FlowGrid;
  particles: ParticleSet;
  agent: Agent;

  /** Smoothed pointer used by drags */
  dragger: Vec2;

  displayMode: DisplayMode;

  /** Ticks run in this world */
  frame: number;
}

export function createWorld(config: FlowConfig, rng: Random): World {
  const grid = new FlowGrid({
    width: config.width,
    height: config.height,
    cellsX: config.cellsX,
    cellsY: config.cellsY,
    smoothing: config.gridSmoothing,
    seedMagnitude: config.flowSeedMagnitude,
    rng,
  });

  const particles = new ParticleSet({
    width: config.width,
    height: config.height,
    relaxRate: config.particleRelax,
    size: config.particleSize,
  });
  particles.spawnRandom(config.particleCount, config.particleSpeed, rng);

  const agent = new Agent({
    width: config.width,
    height: config.height,
    position: config.agentStart,
    velocity: config.agentStartVelocity,
    health: config.agentHealth,
    thrustBase: config.thrustBase,
    thrustRate: config.thrustRate,
  });

  return {
    grid,
    particles,
    agent,
    dragger: { x: 0, y: 0 },
    displayMode: 'default',
    frame: 0,
  };
}

/**
 * Copies the runtime-tunable rates from the config onto the world's
 * components, so GUI edits take effect on the next tick.
 */
export function applyTunables(world: World, config: FlowConfig): void {
  world.grid.smoothing = config.gridSmoothing;
  world.particles.relaxRate = config.particleRelax;
  world.agent.thrustBase = config.thrustBase;
  world.agent.thrustRate = config.thrustRate;
}
