export function clamp(n: number, min: number, max: number): number {
  if (max < min) throw new Error("clamp max must be >= min");
  return Math.min(max, Math.max(min, n));
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
