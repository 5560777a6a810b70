/**
 * Application entry point and main loop.
 *
 * Wires the browser collaborators around the session:
 * - a fixed-size canvas scaled by CSS,
 * - mouse/keyboard input latched per frame,
 * - lil-gui controls and a stats-gl FPS panel,
 * - one session tick and one draw per animation frame.
 */

import '../style.css';
import { createConfig } from '../config.ts';
import { createSession } from '../core/session.ts';
import { logError } from '../log.ts';
import { setupGui } from './gui.ts';
import { installInputHandlers } from './input.ts';
import { startAnimationLoop, type AnimationLoop } from './loop.ts';
import { createRenderer } from './renderer.ts';

const app = document.querySelector<HTMLDivElement>('#app');
if (!app) throw new Error('Missing #app container');

app.innerHTML = `
  <canvas id="sim-canvas" aria-label="Flow field simulation"></canvas>
`;

const canvas = app.querySelector<HTMLCanvasElement>('#sim-canvas');
if (!canvas) throw new Error('Failed to create canvas');

const config = createConfig();
canvas.width = config.width;
canvas.height = config.height;

const ctx = canvas.getContext('2d');
if (!ctx) throw new Error('Canvas 2D context is not available');

let loop: AnimationLoop | null = null;

const session = createSession({
  config,
  host: {
    quit: () => {
      loop?.stop();
      window.close();
    },
  },
});

const input = installInputHandlers(canvas, config.width, config.height);
const renderer = createRenderer(ctx, config);
const { stats } = setupGui(config, { onReset: () => session.reset() });

loop = startAnimationLoop({
  frame: () => {
    stats.begin();
    session.frame(input.poll());
    renderer.draw(session);
    stats.end();
    stats.update();
  },
  onError: (error) => {
    logError('frame failed', error);
    loop?.stop();
  },
});
