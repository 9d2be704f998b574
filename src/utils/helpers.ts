/** General helpers. */
export function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.slice(0, max) + '...';
}

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
