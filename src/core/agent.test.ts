import { describe, expect, it } from 'vitest';
import { Agent, hullOutline, type AgentOptions } from './agent.ts';
import { FlowGrid } from './flow_grid.ts';

function makeAgent(overrides: Partial<AgentOptions> = {}): Agent {
  return new Agent({
    width: 640,
    height: 360,
    position: { x: 320, y: 180 },
    velocity: { x: 0, y: 0 },
    health: 1,
    thrustBase: 0.1,
    thrustRate: 0.1,
    ...overrides,
  });
}

describe('Agent', () => {
  it('turns by adding to its heading', () => {
    const agent = makeAgent();
    agent.turn(0.5);
    agent.turn(0.5);
    expect(agent.facing).toBe(1);
    agent.turn(-1.5);
    expect(agent.facing).toBe(-0.5);
  });

  it('thrusts from rest with the base magnitude', () => {
    const agent = makeAgent();
    agent.thrust();
    expect(agent.vx).toBeCloseTo(0.01, 12);
    expect(agent.vy).toBeCloseTo(0, 12);

    agent.thrust();
    // magnitude 0.1 + 0.01
    expect(agent.vx).toBeCloseTo(0.01 + (0.11 - 0.01) * 0.1, 12);
  });

  it('thrust magnitude grows with speed and follows the heading', () => {
    const agent = makeAgent({ velocity: { x: 1, y: 0 } });
    agent.turn(Math.PI / 2);
    agent.thrust();
    expect(agent.vx).toBeCloseTo(0.9, 12);
    expect(agent.vy).toBeCloseTo(0.11, 12);
  });

  it('wraps around the torus when advancing', () => {
    const agent = makeAgent({ position: { x: 630, y: 5 }, velocity: { x: 20, y: -10 } });
    agent.advance();
    expect(agent.renderPose()).toEqual({ x: 10, y: 355, facing: 0 });

    agent.setVelocity(1e6, -3e7);
    agent.advance();
    expect(agent.x).toBeGreaterThanOrEqual(0);
    expect(agent.x).toBeLessThan(640);
    expect(agent.y).toBeGreaterThanOrEqual(0);
    expect(agent.y).toBeLessThan(360);
  });

  it('wraps positions it is placed at', () => {
    const agent = makeAgent();
    agent.placeAt(-20, 370);
    expect(agent.x).toBe(620);
    expect(agent.y).toBe(10);
  });

  it('exposes its pose without changing state', () => {
    const agent = makeAgent({ velocity: { x: 2, y: 1 } });
    agent.turn(0.25);
    const first = agent.renderPose();
    const second = agent.renderPose();
    expect(second).toEqual(first);
    expect(first).toEqual({ x: 320, y: 180, facing: 0.25 });
    expect(agent.vx).toBe(2);
  });

  it('feeds and follows the grid when coupled', () => {
    const grid = new FlowGrid({ width: 640, height: 360, cellsX: 20, cellsY: 12, smoothing: 0.1 });
    const agent = makeAgent({ velocity: { x: 2, y: 0 } });
    const cell = grid.cellIndexAt(320, 180);

    agent.feed(grid);
    expect(grid.pendingSum(cell)).toEqual({ x: 2, y: 0 });
    expect(grid.pendingCount(cell)).toBe(1);

    grid.commit();
    agent.relax(grid, 0.5);
    // flow is 0.2 after commit
    expect(agent.vx).toBeCloseTo(1.1, 12);
  });
});

describe('hullOutline', () => {
  it('points the bow along the heading', () => {
    const ahead = hullOutline({ x: 100, y: 50, facing: 0 }, 12);
    expect(ahead).toHaveLength(5);
    expect(ahead[0]).toEqual({ x: 106, y: 50 });

    const down = hullOutline({ x: 100, y: 50, facing: Math.PI / 2 }, 12);
    expect(down[0].x).toBeCloseTo(100, 12);
    expect(down[0].y).toBeCloseTo(56, 12);
  });
});
