/**
 * Session controller: the start / running / over state machine.
 *
 * Transitions:
 * - notStarted: frozen; a primary press starts the run.
 * - running: one pipeline pass per frame. A terminal outcome moves to `over`;
 *   a `restart` outcome resets straight into `config.restartInto`.
 * - over: frozen, holding the outcome; a primary press resets the world and
 *   enters `config.restartInto`.
 *
 * Resetting builds a complete new World and swaps the reference between
 * frames, so no system ever sees an old boat next to a fresh grid.
 */

import type { FlowConfig, Host, InputFrame, Random, RestartPhase, SessionPhase } from '../types.ts';
import { rngFromSeed } from '../rng.ts';
import { debugLog } from '../log.ts';
import { runFrame } from './pipeline.ts';
import type { TerminalOutcome } from './outcome.ts';
import { applyTunables, createWorld, type World } from './world.ts';

export interface SessionOptions {
  config: FlowConfig;
  host: Host;
  /** Overrides the generator picked from `config.seed` */
  rng?: Random;
}

export interface Session {
  readonly config: FlowConfig;

  /** Current phase */
  readonly phase: SessionPhase;

  /** Outcome held while `over`, null otherwise */
  readonly outcome: TerminalOutcome | null;

  /** Live world; replaced wholesale on reset */
  readonly world: World;

  /** Advance one frame with this frame's input */
  frame: (input: InputFrame) => void;

  /** Discard the world and build a fresh one in the given phase */
  reset: (phase?: RestartPhase, input?: InputFrame) => void;
}

export function createSession(options: SessionOptions): Session {
  const { config, host } = options;
  const rng = options.rng ?? rngFromSeed(config.seed);

  let world = createWorld(config, rng);
  let phase: SessionPhase = 'notStarted';
  let outcome: TerminalOutcome | null = null;

  function enter(next: SessionPhase, input?: InputFrame): void {
    if (next === 'running' && input) {
      // start the drag tracker on the pointer, not at the origin
      world.dragger = { x: input.pointer.x, y: input.pointer.y };
    }
    debugLog(`session: ${phase} -> ${next}`);
    phase = next;
  }

  function reset(next: RestartPhase = 'notStarted', input?: InputFrame): void {
    world = createWorld(config, rng);
    outcome = null;
    enter(next, input);
  }

  function frame(input: InputFrame): void {
    switch (phase) {
      case 'notStarted':
        if (input.quitPressed) host.quit();
        if (input.primaryPressed) enter('running', input);
        return;

      case 'running': {
        applyTunables(world, config);
        const result = runFrame({ world, input, config, rng, host });
        if (result.status === 'continue') return;

        debugLog(`session: outcome ${result.outcome.kind}`, result.outcome.score);
        if (result.outcome.kind === 'restart') {
          reset(config.restartInto, input);
          return;
        }
        outcome = result.outcome;
        enter('over');
        return;
      }

      case 'over':
        if (input.quitPressed) host.quit();
        if (input.primaryPressed) reset(config.restartInto, input);
        return;
    }
  }

  return {
    config,
    get phase() {
      return phase;
    },
    get outcome() {
      return outcome;
    },
    get world() {
      return world;
    },
    frame,
    reset,
  };
}
