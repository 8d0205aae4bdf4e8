/** Clamp a requested limit to [1, max], falling back to the default when absent. */
export function clampLimit(requested: number | undefined, fallback: number, max: number): number {
  if (requested === undefined || !Number.isFinite(requested)) return fallback;
  return Math.min(Math.max(Math.floor(requested), 1), max);
}
