import { describe, expect, it } from 'vitest';
import { inputFrame, recordingHost, testConfig } from '../test_support.ts';
import type { FlowConfig } from '../types.ts';
import { createSession } from './session.ts';

const click = (x = 0, y = 0) => inputFrame({ primaryPressed: true, dragDown: true, pointer: { x, y } });
const idle = inputFrame();

function startSession(overrides: Partial<FlowConfig> = {}) {
  const host = recordingHost();
  const session = createSession({ config: testConfig({ hullStress: 0, ...overrides }), host });
  return { session, host };
}

describe('createSession', () => {
  it('waits frozen until the first click', () => {
    const { session } = startSession();
    const before = session.world.particles.positionOf(0);

    session.frame(idle);
    session.frame(idle);

    expect(session.phase).toBe('notStarted');
    expect(session.world.frame).toBe(0);
    expect(session.world.particles.positionOf(0)).toEqual(before);
  });

  it('starts with the drag point on the pointer', () => {
    const { session } = startSession();
    session.frame(click(40, 50));

    expect(session.phase).toBe('running');
    expect(session.world.dragger).toEqual({ x: 40, y: 50 });
    expect(session.world.frame).toBe(0);

    session.frame(idle);
    expect(session.world.frame).toBe(1);
  });

  it('ends with the score when time runs out and stays frozen', () => {
    const { session } = startSession({ timeLimitFrames: 2 });
    session.frame(click());
    session.frame(idle);
    session.frame(idle);

    expect(session.phase).toBe('over');
    expect(session.outcome).toEqual({ kind: 'score', score: 1 });

    session.frame(idle);
    expect(session.world.frame).toBe(2);
    expect(session.phase).toBe('over');
  });

  it('loses when the hull gives out', () => {
    const { session } = startSession();
    session.frame(click());
    session.world.agent.health = 0;
    session.frame(idle);

    expect(session.phase).toBe('over');
    expect(session.outcome?.kind).toBe('lose');
  });

  it('begins again in a fresh world after the game is over', () => {
    const { session } = startSession({ timeLimitFrames: 1 });
    session.frame(click());
    session.frame(inputFrame({ spawnPressed: true }));
    expect(session.phase).toBe('over');
    const old = session.world;
    expect(old.particles.count).toBe(20);

    session.frame(click(5, 6));

    expect(session.phase).toBe('running');
    expect(session.outcome).toBeNull();
    expect(session.world).not.toBe(old);
    expect(session.world.frame).toBe(0);
    expect(session.world.particles.count).toBe(8);
    expect(session.world.grid.totalPending()).toBe(0);
    expect(session.world.agent.score).toBe(0);
    expect(session.world.dragger).toEqual({ x: 5, y: 6 });
  });

  it('can return to the start screen instead', () => {
    const { session } = startSession({ timeLimitFrames: 1, restartInto: 'notStarted' });
    session.frame(click());
    session.frame(idle);
    session.frame(click());

    expect(session.phase).toBe('notStarted');
    expect(session.world.frame).toBe(0);
  });

  it('restarts mid-run from the restart key', () => {
    const { session } = startSession();
    session.frame(click());
    session.frame(idle);
    const old = session.world;

    session.frame(inputFrame({ restartPressed: true }));

    expect(session.phase).toBe('running');
    expect(session.world).not.toBe(old);
    expect(session.world.frame).toBe(0);
  });

  it('drops spawned particles on reset', () => {
    const { session } = startSession();
    session.frame(click());
    session.frame(inputFrame({ spawnPressed: true }));
    expect(session.world.particles.count).toBe(20);

    session.reset();

    expect(session.phase).toBe('notStarted');
    expect(session.world.particles.count).toBe(8);
  });

  it('quits from any phase', () => {
    const { session, host } = startSession({ timeLimitFrames: 1 });
    session.frame(inputFrame({ quitPressed: true }));
    expect(host.quits).toBe(1);
    expect(session.phase).toBe('notStarted');

    session.frame(click());
    session.frame(inputFrame({ quitPressed: true }));
    expect(host.quits).toBe(2);
    expect(session.phase).toBe('over');

    session.frame(inputFrame({ quitPressed: true }));
    expect(host.quits).toBe(3);
  });

  it('replays the same run from the same seed', () => {
    const a = startSession({ seed: 42 }).session;
    const b = startSession({ seed: 42 }).session;
    for (const session of [a, b]) {
      session.frame(click(100, 100));
      for (let i = 0; i < 10; i++) session.frame(inputFrame({ pointer: { x: 100 + i * 5, y: 100 }, dragDown: true }));
    }

    expect(b.world.particles.count).toBe(a.world.particles.count);
    for (let i = 0; i < a.world.particles.count; i++) {
      expect(b.world.particles.positionOf(i)).toEqual(a.world.particles.positionOf(i));
    }
    expect(b.world.agent.renderPose()).toEqual(a.world.agent.renderPose());
  });
});
