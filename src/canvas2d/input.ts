import type { InputFrame, InputSource, Vec2 } from '../types.ts';

/** Key bindings, matched against `KeyboardEvent.key`. */
export const KEYS = {
  toggle: [' '],
  quit: ['Escape'],
  restart: ['r', 'R'],
  turnLeft: ['ArrowLeft', 'a', 'A'],
  turnRight: ['ArrowRight', 'd', 'D'],
  thrust: ['ArrowUp', 'w', 'W'],
} as const;

type Binding = keyof typeof KEYS;

/**
 * Maps a client position onto domain pixels, undoing any CSS scaling of the
 * canvas element.
 */
export function clientToDomain(
  bounds: { left: number; top: number; width: number; height: number },
  domainWidth: number,
  domainHeight: number,
  clientX: number,
  clientY: number
): Vec2 {
  const sx = bounds.width > 0 ? domainWidth / bounds.width : 1;
  const sy = bounds.height > 0 ? domainHeight / bounds.height : 1;
  return {
    x: (clientX - bounds.left) * sx,
    y: (clientY - bounds.top) * sy,
  };
}

/**
 * Input recorder fed by DOM events. Held state is tracked continuously;
 * presses are latched until the next `poll`.
 */
export class InputRecorder implements InputSource {
  private pointer: Vec2 = { x: 0, y: 0 };
  private primaryDown = false;
  private primaryPressed = false;
  private secondaryPressed = false;
  private readonly keysDown = new Set<string>();
  private readonly keysPressed = new Set<string>();

  movePointer(x: number, y: number): void {
    this.pointer = { x, y };
  }

  buttonDown(button: number): void {
    if (button === 0) {
      this.primaryDown = true;
      this.primaryPressed = true;
    }
    if (button === 2) this.secondaryPressed = true;
  }

  buttonUp(button: number): void {
    if (button === 0) this.primaryDown = false;
  }

  releaseAll(): void {
    this.primaryDown = false;
    this.keysDown.clear();
  }

  keyDown(key: string, repeat = false): void {
    this.keysDown.add(key);
    if (!repeat) this.keysPressed.add(key);
  }

  keyUp(key: string): void {
    this.keysDown.delete(key);
  }

  poll(): InputFrame {
    const frame: InputFrame = {
      pointer: { x: this.pointer.x, y: this.pointer.y },
      dragDown: this.primaryDown,
      primaryPressed: this.primaryPressed,
      spawnPressed: this.secondaryPressed,
      togglePressed: this.matches(this.keysPressed, 'toggle'),
      quitPressed: this.matches(this.keysPressed, 'quit'),
      restartPressed: this.matches(this.keysPressed, 'restart'),
      turnLeft: this.matches(this.keysDown, 'turnLeft'),
      turnRight: this.matches(this.keysDown, 'turnRight'),
      thrust: this.matches(this.keysDown, 'thrust'),
    };
    this.primaryPressed = false;
    this.secondaryPressed = false;
    this.keysPressed.clear();
    return frame;
  }

  private matches(keys: Set<string>, binding: Binding): boolean {
    const bound: readonly string[] = KEYS[binding];
    return bound.some((key) => keys.has(key));
  }
}

/**
 * Sets up mouse and keyboard handlers that feed an InputRecorder.
 *
 * - Left button: drag (held) and begin (press)
 * - Right button: spawn burst (context menu disabled)
 * - Space: display mode, Escape: quit, R: restart
 * - Arrows / WASD: turn and thrust
 */
export function installInputHandlers(
  canvas: HTMLCanvasElement,
  domainWidth: number,
  domainHeight: number
): InputRecorder {
  const recorder = new InputRecorder();

  const updatePointer = (event: MouseEvent): void => {
    const p = clientToDomain(
      canvas.getBoundingClientRect(),
      domainWidth,
      domainHeight,
      event.clientX,
      event.clientY
    );
    recorder.movePointer(p.x, p.y);
  };

  canvas.addEventListener('mousemove', updatePointer);
  canvas.addEventListener('mousedown', (event) => {
    updatePointer(event);
    recorder.buttonDown(event.button);
  });
  window.addEventListener('mouseup', (event) => recorder.buttonUp(event.button));
  window.addEventListener('blur', () => recorder.releaseAll());
  canvas.addEventListener('contextmenu', (event) => event.preventDefault());

  document.addEventListener('keydown', (event) => {
    if (event.key === ' ') event.preventDefault();
    recorder.keyDown(event.key, event.repeat);
  });
  document.addEventListener('keyup', (event) => recorder.keyUp(event.key));

  return recorder;
}
