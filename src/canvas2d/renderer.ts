/**
 * Canvas 2D renderer.
 *
 * Draws straight from the world's read accessors:
 * - each particle as a short velocity line, coloured by speed,
 * - in debug mode, the cell lattice and every cell's flow vector,
 * - the boat hull from its pose,
 * - a HUD line, and a centred prompt over the waiting and outcome screens.
 *
 * The simulation never draws; this module never mutates the simulation.
 */

import type { FlowConfig, SessionPhase } from '../types.ts';
import { length, wrap } from '../math.ts';
import { hullOutline } from '../core/agent.ts';
import { describeOutcome, type TerminalOutcome } from '../core/outcome.ts';
import type { World } from '../core/world.ts';

/** The subset of CanvasRenderingContext2D the renderer uses. */
export interface Canvas2DLike {
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  font: string;
  textBaseline: CanvasTextBaseline;
  fillRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  stroke(): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  fill(): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
}

/** What the renderer reads from a session. */
export interface SessionView {
  readonly phase: SessionPhase;
  readonly outcome: TerminalOutcome | null;
  readonly world: World;
}

export interface Renderer {
  draw: (view: SessionView) => void;
}

export const START_PROMPT = 'Click to start';
export const RESTART_PROMPT = 'Click to sail again';

const BACKGROUND = '#000000';
const FOREGROUND = '#ffffff';
const PROMPT_FONT_PX = 40;
const DETAIL_FONT_PX = 16;
const HUD_FONT_PX = 11;

/**
 * Particle line colour: hue slides from violet at rest through blue and green
 * as speed grows.
 */
export function speedColor(speed: number): string {
  const hue = Math.round(wrap(1.8 - speed / 6, 1) * 360);
  return `hsl(${hue}, 100%, 50%)`;
}

/**
 * Writes `text` centred on (cx, cy).
 */
export function drawCenteredText(
  ctx: Canvas2DLike,
  text: string,
  cx: number,
  cy: number,
  fontPx: number
): void {
  ctx.font = `${fontPx}px sans-serif`;
  ctx.textBaseline = 'middle';
  ctx.fillStyle = FOREGROUND;
  const { width } = ctx.measureText(text);
  ctx.fillText(text, cx - width / 2, cy);
}

export function createRenderer(ctx: Canvas2DLike, config: FlowConfig): Renderer {
  const { width, height } = config;

  function line(x0: number, y0: number, x1: number, y1: number, color: string, lineWidth: number): void {
    ctx.strokeStyle = color;
    ctx.lineWidth = lineWidth;
    ctx.beginPath();
    ctx.moveTo(x0, y0);
    ctx.lineTo(x1, y1);
    ctx.stroke();
  }

  function drawParticles(world: World): void {
    const { positions, velocities, count } = world.particles;
    const scale = config.particleLineScale;
    for (let i = 0; i < count; i++) {
      const x = positions[2 * i];
      const y = positions[2 * i + 1];
      const vx = velocities[2 * i];
      const vy = velocities[2 * i + 1];
      line(x, y, x + vx * scale, y + vy * scale, speedColor(length(vx, vy)), 0.5);
    }
  }

  function drawGridDebug(world: World): void {
    const grid = world.grid;
    for (let cx = 1; cx < grid.cellsX; cx++) {
      const x = cx * grid.cellWidth;
      line(x, 0, x, height, FOREGROUND, 0.5);
    }
    for (let cy = 1; cy < grid.cellsY; cy++) {
      const y = cy * grid.cellHeight;
      line(0, y, width, y, FOREGROUND, 0.5);
    }

    const scale = config.cellVectorScale;
    for (let i = 0; i < grid.totalCells; i++) {
      const c = grid.cellCenter(i);
      ctx.fillStyle = FOREGROUND;
      ctx.beginPath();
      ctx.arc(c.x, c.y, 0.8, 0, Math.PI * 2);
      ctx.fill();
      line(c.x, c.y, c.x + grid.flowX[i] * scale, c.y + grid.flowY[i] * scale, FOREGROUND, 0.5);
    }
  }

  function drawAgent(world: World): void {
    const outline = hullOutline(world.agent.renderPose(), config.hullLength);
    ctx.strokeStyle = FOREGROUND;
    ctx.lineWidth = 1.5;
    ctx.beginPath();
    outline.forEach((p, i) => (i === 0 ? ctx.moveTo(p.x, p.y) : ctx.lineTo(p.x, p.y)));
    ctx.closePath();
    ctx.stroke();
  }

  function drawHud(world: World): void {
    const agent = world.agent;
    const hull = Math.max(0, Math.round(agent.health * 100));
    ctx.font = `${HUD_FONT_PX}px monospace`;
    ctx.textBaseline = 'top';
    ctx.fillStyle = FOREGROUND;
    ctx.fillText(`hull ${hull}%  sailed ${Math.floor(agent.score)}  particles ${world.particles.count}`, 6, 6);
  }

  function draw(view: SessionView): void {
    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, width, height);

    if (view.phase === 'notStarted') {
      drawCenteredText(ctx, START_PROMPT, width / 2, height / 2, PROMPT_FONT_PX);
      return;
    }

    const world = view.world;
    drawParticles(world);
    if (world.displayMode === 'debug') drawGridDebug(world);
    drawAgent(world);
    drawHud(world);

    if (view.phase === 'over' && view.outcome) {
      ctx.fillStyle = 'rgba(0, 0, 0, 0.6)';
      ctx.fillRect(0, 0, width, height);
      drawCenteredText(ctx, describeOutcome(view.outcome), width / 2, height / 2 - 24, PROMPT_FONT_PX);
      drawCenteredText(ctx, RESTART_PROMPT, width / 2, height / 2 + 24, DETAIL_FONT_PX);
    }
  }

  return { draw };
}
