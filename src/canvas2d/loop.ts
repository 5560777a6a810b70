interface AnimationLoopOptions {
  frame: () => void | Promise<void>;
  onError?: (error: unknown) => void;
  immediateStart?: boolean;
}

export interface AnimationLoop {
  stop: () => void;
}

/**
 * Calls `frame` once per animation frame until stopped. Each frame is one
 * simulation tick; no delta time is passed.
 */
export function startAnimationLoop(options: AnimationLoopOptions): AnimationLoop {
  const { frame, onError, immediateStart = false } = options;
  let running = true;
  let handle = 0;

  function tick() {
    if (!running) return;
    Promise.resolve()
      .then(frame)
      .catch((error: unknown) => onError?.(error))
      .finally(() => {
        if (running) handle = requestAnimationFrame(tick);
      });
  }

  if (immediateStart) {
    tick();
  } else {
    handle = requestAnimationFrame(tick);
  }

  return {
    stop: () => {
      running = false;
      cancelAnimationFrame(handle);
    },
  };
}
