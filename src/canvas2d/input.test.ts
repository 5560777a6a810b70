import { describe, expect, it } from 'vitest';
import { clientToDomain, InputRecorder } from './input.ts';

describe('InputRecorder', () => {
  it('latches a click for one poll and holds the drag until release', () => {
    const recorder = new InputRecorder();
    recorder.movePointer(12, 34);
    recorder.buttonDown(0);

    const first = recorder.poll();
    expect(first.pointer).toEqual({ x: 12, y: 34 });
    expect(first.primaryPressed).toBe(true);
    expect(first.dragDown).toBe(true);

    const second = recorder.poll();
    expect(second.primaryPressed).toBe(false);
    expect(second.dragDown).toBe(true);

    recorder.buttonUp(0);
    expect(recorder.poll().dragDown).toBe(false);
  });

  it('maps the right button to a spawn press', () => {
    const recorder = new InputRecorder();
    recorder.buttonDown(2);
    const frame = recorder.poll();
    expect(frame.spawnPressed).toBe(true);
    expect(frame.dragDown).toBe(false);
    expect(recorder.poll().spawnPressed).toBe(false);
  });

  it('ignores key repeats for presses', () => {
    const recorder = new InputRecorder();
    recorder.keyDown(' ');
    expect(recorder.poll().togglePressed).toBe(true);

    recorder.keyDown(' ', true);
    expect(recorder.poll().togglePressed).toBe(false);
  });

  it('reports quit and restart keys', () => {
    const recorder = new InputRecorder();
    recorder.keyDown('Escape');
    recorder.keyDown('R');
    const frame = recorder.poll();
    expect(frame.quitPressed).toBe(true);
    expect(frame.restartPressed).toBe(true);
  });

  it('holds steering keys until they are released', () => {
    const recorder = new InputRecorder();
    recorder.keyDown('ArrowLeft');
    recorder.keyDown('w');

    expect(recorder.poll()).toMatchObject({ turnLeft: true, turnRight: false, thrust: true });
    expect(recorder.poll()).toMatchObject({ turnLeft: true, thrust: true });

    recorder.keyUp('ArrowLeft');
    expect(recorder.poll()).toMatchObject({ turnLeft: false, thrust: true });

    recorder.releaseAll();
    expect(recorder.poll().thrust).toBe(false);
  });

  it('hands out a copy of the pointer', () => {
    const recorder = new InputRecorder();
    recorder.movePointer(1, 2);
    const frame = recorder.poll();
    recorder.movePointer(3, 4);
    expect(frame.pointer).toEqual({ x: 1, y: 2 });
  });
});

describe('clientToDomain', () => {
  it('undoes the CSS scaling of the canvas', () => {
    const bounds = { left: 10, top: 20, width: 1280, height: 720 };
    expect(clientToDomain(bounds, 640, 360, 650, 380)).toEqual({ x: 320, y: 180 });
  });

  it('falls back to unscaled offsets for an empty box', () => {
    const bounds = { left: 10, top: 20, width: 0, height: 0 };
    expect(clientToDomain(bounds, 640, 360, 15, 27)).toEqual({ x: 5, y: 7 });
  });
});
