import type { FlowConfig, Random, Vec2 } from '../types.ts';
import { lerp } from '../math.ts';
import type { FrameContext } from './pipeline.ts';
import type { TerminalOutcome } from './outcome.ts';
import type { World } from './world.ts';

/**
 * Velocity given to particles spawned at the pointer: opposite the drag
 * offset, rotated by a random angle inside the spray cone.
 */
export function sprayVelocity(
  pointer: Vec2,
  tracked: Vec2,
  gain: number,
  spread: number,
  rng: Random
): Vec2 {
  const vx = gain * (tracked.x - pointer.x);
  const vy = gain * (tracked.y - pointer.y);
  if (spread <= 0) return { x: vx, y: vy };

  const angle = (rng() - 0.5) * spread;
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return { x: vx * cos - vy * sin, y: vx * sin + vy * cos };
}

function spawnAtPointer(
  world: World,
  pointer: Vec2,
  config: FlowConfig,
  rng: Random,
  scatter = 0
): void {
  const v = sprayVelocity(pointer, world.dragger, config.dragGain, config.spawnSpread, rng);
  if (scatter > 0) {
    const angle = rng() * Math.PI * 2;
    v.x += Math.cos(angle) * scatter;
    v.y += Math.sin(angle) * scatter;
  }
  world.particles.spawn(pointer.x, pointer.y, v.x, v.y);
}

/**
 * Smoothly tracks the pointer while the drag button is held and applies the
 * resulting push to the boat (steering) or the swarm (spray). Released, the
 * tracked point snaps back onto the pointer.
 */
function applyDrag(ctx: FrameContext): void {
  const { world, input, config, rng } = ctx;
  const { pointer } = input;
  const dragger = world.dragger;

  if (!input.dragDown) {
    dragger.x = pointer.x;
    dragger.y = pointer.y;
    return;
  }

  dragger.x = lerp(dragger.x, pointer.x, config.trackRate);
  dragger.y = lerp(dragger.y, pointer.y, config.trackRate);
  const push = {
    x: config.dragGain * (pointer.x - dragger.x),
    y: config.dragGain * (pointer.y - dragger.y),
  };

  if (config.dragTarget === 'agent') {
    world.agent.placeAt(dragger.x, dragger.y);
    world.agent.setVelocity(push.x, push.y);
    if (push.x !== 0 || push.y !== 0) world.agent.facing = Math.atan2(push.y, push.x);
  } else {
    const radius = config.pullRadius > 0 ? config.pullRadius : undefined;
    world.particles.applyExternalPull(pointer, push, config.pullRate, radius);
  }

  if (config.spawnOnDrag) spawnAtPointer(world, pointer, config, rng);
}

/**
 * First system of every running frame: translates the input snapshot into
 * forces, spawns and flag flips.
 */
export function applyInteraction(ctx: FrameContext): TerminalOutcome | undefined {
  const { world, input, config, rng, host } = ctx;
  const agent = world.agent;

  if (input.quitPressed) host.quit();

  if (input.togglePressed) {
    world.displayMode = world.displayMode === 'debug' ? 'default' : 'debug';
  }

  if (input.restartPressed) return { kind: 'restart', score: agent.score };

  if (input.turnLeft) agent.turn(-config.turnRate);
  if (input.turnRight) agent.turn(config.turnRate);
  if (input.thrust) agent.thrust();

  applyDrag(ctx);

  if (input.spawnPressed) {
    for (let i = 0; i < config.spawnBurst; i++) {
      spawnAtPointer(world, input.pointer, config, rng, config.spawnBurstSpeed);
    }
  }

  return undefined;
}
