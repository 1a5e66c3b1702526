export interface TickConfig {
  readonly minTicks: number;
  readonly maxTicks: number;
}

export const defaultTickConfig = {
  minTicks: 4,
  maxTicks: 10,
} as const satisfies TickConfig;

/**
 * "Nice" tick values (steps of 1, 2 or 5 × 10ⁿ) covering `[rangeMin, rangeMax]`.
 *
 * Aims for roughly the midpoint of `minTicks..maxTicks`. The first tick is the largest step
 * multiple at or below the range start, so it may sit slightly outside the range. A zero-width
 * range yields the single value `rangeMin`, and bounds too far apart for a finite step yield `[]`;
 * the bounds may be given in either order.
 */
export function computeTicks(rangeMin: number, rangeMax: number, config: TickConfig = defaultTickConfig): number[] {
  if (!Number.isFinite(rangeMin) || !Number.isFinite(rangeMax)) return [];
  if (Math.abs(rangeMax - rangeMin) < Number.EPSILON) return [rangeMin];

  const lo = Math.min(rangeMin, rangeMax);
  const hi = Math.max(rangeMin, rangeMax);

  const target = Math.max(Math.floor((config.minTicks + config.maxTicks) / 2), 2);
  const roughStep = (hi - lo) / target;
  const magnitude = 10 ** Math.floor(Math.log10(roughStep));
  const normalized = roughStep / magnitude;

  const niceFactor = normalized <= 1 ? 1 : normalized <= 2 ? 2 : normalized <= 5 ? 5 : 10;
  const step = niceFactor * magnitude;
  // Bounds whose span overflows a double have no representable step.
  if (!Number.isFinite(step) || step <= 0) return [];
  const start = Math.floor(lo / step) * step;

  const ticks: number[] = [];
  let i = 0;
  let v = start;
  while (v <= hi + step * 0.001) {
    ticks.push(v);
    i++;
    v = start + i * step;
  }
  return ticks;
}
