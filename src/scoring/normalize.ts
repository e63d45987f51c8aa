/**
 * Score normalization utilities
 * All pillar scores live on a 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  const low = Math.min(outputMin, outputMax);
  const high = Math.max(outputMin, outputMax);
  return clamp(outputMin + normalized * (outputMax - outputMin), low, high);
}

export function roundScore(score: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}
