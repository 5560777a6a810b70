/**
 * Scalar helpers shared by the grid, the particles and the boat.
 */

/**
 * Blends `start` toward `target` by `fraction`.
 */
export function lerp(start: number, target: number, fraction: number): number {
  return start + (target - start) * fraction;
}

/**
 * Clamps a number between a minimum and maximum value.
 */
export function clamp(x: number, min: number, max: number): number {
  if (x < min) return min;
  else if (x > max) return max;
  else return x;
}

/**
 * Folds `value` into [0, extent) by repeated addition or subtraction of the
 * extent, so overshoots of several extents in one tick still land inside.
 */
export function wrap(value: number, extent: number): number {
  // remainder first, or a huge value would never lose a unit of precision
  let v = value < -extent || value >= 2 * extent ? value % extent : value;
  while (v < 0) v += extent;
  while (v >= extent) v -= extent;
  return v;
}

export function length(x: number, y: number): number {
  return Math.sqrt(x * x + y * y);
}
