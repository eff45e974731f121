export function stringArg(value: unknown): string | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

// Non-numeric input falls back to the default; callers decide what 0 means.
export function intArg(value: unknown, fallback: number): number {
  const raw = stringArg(value);
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
