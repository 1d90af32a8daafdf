const DAY_KEY_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export function isValidDayKey(day: string): boolean {
  if (typeof day !== "string") return false;
  if (!DAY_KEY_REGEX.test(day)) return false;
  const d = new Date(day + "T00:00:00Z");
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === day;
}

export function addDays(day: string, days: number): string {
  const d = new Date(day + "T00:00:00Z");
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

function zonedParts(d: Date, timezone: string): Map<string, string> {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(d);
  return new Map(parts.map((p) => [p.type, p.value]));
}

/** Calendar day of an instant in the user's timezone. Falls back to UTC for an unknown zone. */
export function toDayKey(ts: string | Date, timezone: string = "UTC"): string {
  const d = typeof ts === "string" ? new Date(ts) : ts;
  if (isNaN(d.getTime())) {
    throw new RangeError(`invalid timestamp "${String(ts)}"`);
  }
  try {
    const parts = zonedParts(d, timezone);
    const y = parts.get("year");
    const m = parts.get("month");
    const day = parts.get("day");
    if (y && m && day) return `${y}-${m}-${day}`;
  } catch (err) {
    console.warn(`[day-key] unknown timezone "${timezone}", using UTC:`, err);
  }
  return d.toISOString().slice(0, 10);
}

export function localHour(at: Date, timezone: string = "UTC"): number {
  try {
    const hour = zonedParts(at, timezone).get("hour");
    if (hour != null) return Number(hour);
  } catch (err) {
    console.warn(`[day-key] unknown timezone "${timezone}", using UTC:`, err);
  }
  return at.getUTCHours();
}
