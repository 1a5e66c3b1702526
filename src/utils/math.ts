/**
 * Scalar helpers with WGSL builtin semantics, used by the CPU reference of the shader stages.
 */

export const clamp = (v: number, lo: number, hi: number): number => Math.min(hi, Math.max(lo, v));

export const clamp01 = (v: number): number => clamp(v, 0, 1);

/**
 * WGSL `smoothstep(low, high, x)`: Hermite interpolation of `clamp((x - low) / (high - low), 0, 1)`.
 */
export function smoothstep(low: number, high: number, x: number): number {
  const t = clamp01((x - low) / (high - low));
  return t * t * (3 - 2 * t);
}

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

/**
 * Floored modulo (result carries the sign of `m`), matching `x - m * floor(x / m)`.
 */
export const floorMod = (x: number, m: number): number => x - m * Math.floor(x / m);

/**
 * Grows `v` to the next power of two (minimum 1).
 */
export const nextPow2 = (v: number): number => {
  if (!Number.isFinite(v) || v <= 0) return 1;
  const n = Math.ceil(v);
  return 2 ** Math.ceil(Math.log2(n));
};
