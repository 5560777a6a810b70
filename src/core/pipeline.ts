/**
 * Per-frame system ordering.
 *
 * One running frame is a fixed sequence of systems over the shared World:
 *
 *   interaction → advance particles → feed grid → advance boat
 *     → commit grid → relax → terminal check
 *
 * The grid is the only state several systems touch, and it is only correct
 * if every advance happens before any accumulation, every accumulation
 * before the commit, and the commit before anyone reads the field.
 *
 * A system may return a TerminalOutcome. The remaining systems of that frame
 * are skipped and the outcome is handed back to the caller.
 */

import type { FlowConfig, Host, InputFrame, Random } from '../types.ts';
import { length } from '../math.ts';
import { applyInteraction } from './interaction.ts';
import type { TerminalOutcome } from './outcome.ts';
import type { World } from './world.ts';

export interface FrameContext {
  world: World;
  input: InputFrame;
  config: FlowConfig;
  rng: Random;
  host: Host;
}

export type FrameSystem = (ctx: FrameContext) => TerminalOutcome | undefined;

export type FrameResult =
  | { status: 'continue' }
  | { status: 'over'; outcome: TerminalOutcome };

export function advanceParticles({ world }: FrameContext): undefined {
  world.particles.advance();
  return undefined;
}

export function feedGrid({ world }: FrameContext): undefined {
  world.particles.feed(world.grid);
  return undefined;
}

export function advanceAgent({ world, config }: FrameContext): undefined {
  world.agent.advance();
  if (config.agentCoupling === 'field') world.agent.feed(world.grid);
  return undefined;
}

export function commitGrid({ world }: FrameContext): undefined {
  world.grid.commit();
  return undefined;
}

export function relaxToField({ world, config }: FrameContext): undefined {
  world.particles.relax(world.grid);
  if (config.agentCoupling === 'field') {
    world.agent.relax(world.grid, config.particleRelax);
  }
  return undefined;
}

/**
 * Scores distance sailed, wears the hull by how hard the boat fights the
 * local current, and reports the first terminal condition that holds.
 */
export function checkTerminal({ world, config }: FrameContext): TerminalOutcome | undefined {
  const { agent, grid, particles } = world;

  agent.score += agent.speed;
  if (config.hullStress > 0) {
    const flow = grid.sample(grid.cellIndexAt(agent.x, agent.y));
    agent.health -= config.hullStress * length(agent.vx - flow.x, agent.vy - flow.y);
  }

  world.frame++;

  if (agent.health <= 0) return { kind: 'lose', score: agent.score };
  if (particles.count === 0) return { kind: 'lose', score: agent.score };
  if (config.victoryDistance > 0 && agent.score >= config.victoryDistance) {
    return { kind: 'victory', score: agent.score };
  }
  if (config.timeLimitFrames > 0 && world.frame >= config.timeLimitFrames) {
    return { kind: 'score', score: agent.score };
  }
  return undefined;
}

export const FRAME_SYSTEMS: readonly FrameSystem[] = [
  applyInteraction,
  advanceParticles,
  feedGrid,
  advanceAgent,
  commitGrid,
  relaxToField,
  checkTerminal,
];

export function runSystems(systems: readonly FrameSystem[], ctx: FrameContext): FrameResult {
  for (const system of systems) {
    const outcome = system(ctx);
    if (outcome) return { status: 'over', outcome };
  }
  return { status: 'continue' };
}

export function runFrame(ctx: FrameContext): FrameResult {
  return runSystems(FRAME_SYSTEMS, ctx);
}
