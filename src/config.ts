/**
 * Configuration factory for the flow simulation.
 *
 * The defaults give a 640x360 domain split into 20x12 flow cells, a small
 * starting swarm that grows while the player drags, and a boat that can be
 * sailed for a few minutes before the hull gives out.
 */

import type { FlowConfig } from './types.ts';

export function createConfig(): FlowConfig {
  return {
    // === Domain ===
    width: 640,
    height: 360,
    cellsX: 20,
    cellsY: 12,

    // === Flow Grid ===
    flowSeedMagnitude: 1, // cells start with a random vector in [-1, 1]²
    gridSmoothing: 0.1, // 10% of the way toward this frame's local average

    // === Particles ===
    particleCount: 8,
    particleSpeed: 1,
    particleSize: 1,
    particleRelax: 0.03, // much slower than the grid: drift, don't snap

    // === Boat ===
    agentStart: { x: 320, y: 180 },
    agentStartVelocity: { x: 0.5, y: 0 },
    agentHealth: 1,
    turnRate: 0.05,
    thrustBase: 0.1,
    thrustRate: 0.1,
    agentCoupling: 'independent',

    // === Pointer Interaction ===
    trackRate: 0.3,
    dragGain: 0.2,
    dragTarget: 'agent',
    pullRate: 0.02,
    pullRadius: 0,
    spawnOnDrag: true,
    spawnBurst: 12,
    spawnBurstSpeed: 1, // scatters a burst fired without a drag
    spawnSpread: 0,

    // === Session ===
    hullStress: 0.0005,
    victoryDistance: 5000,
    timeLimitFrames: 0,
    restartInto: 'running',
    seed: null,

    // === Visualization ===
    particleLineScale: 8,
    cellVectorScale: 20,
    hullLength: 10,
  };
}
