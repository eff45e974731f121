const DAY_MS = 24 * 60 * 60 * 1000;

export function isMessageTooOld(date: Date | null, maxAgeDays: number | undefined, now: Date = new Date()): boolean {
  if (!maxAgeDays || maxAgeDays <= 0) return false;
  if (!date) return false;
  return date.getTime() < now.getTime() - maxAgeDays * DAY_MS;
}
