import path from "node:path";
import { format } from "date-fns";
import { TZDate } from "@date-fns/tz";

export const DEFAULT_TIME_ZONE = "Asia/Kolkata";

/**
 * `YYYYMMDDHHmmss` of `now` in `timeZone`.
 */
export function formatCompactTimestamp(now: Date, timeZone: string): string {
  return format(new TZDate(now, timeZone), "yyyyMMddHHmmss");
}

/**
 * `{base name}_{YYYYMMDDHHmmss}`. Two calls within the same second for the
 * same base name return the same id; see {@link StoryIdAllocator}.
 */
export function generateStoryId(
  fileName: string,
  now: Date = new Date(),
  timeZone: string = DEFAULT_TIME_ZONE,
): string {
  const baseName = path.parse(path.basename(fileName)).name;
  return `${baseName}_${formatCompactTimestamp(now, timeZone)}`;
}

/**
 * ISO-8601 in `timeZone` with millisecond precision and a `±HH:MM` offset,
 * e.g. `2026-10-18T15:30:00.123+05:30`.
 */
export function getCurrentTimestamp(
  timeZone: string = DEFAULT_TIME_ZONE,
  now: Date = new Date(),
): string {
  return format(new TZDate(now, timeZone), "yyyy-MM-dd'T'HH:mm:ss.SSSxxx");
}

/**
 * Hands out story ids for one run. A second file with the same base name in
 * the same second gets `_2`, the third `_3`, and so on.
 */
export class StoryIdAllocator {
  private readonly issued = new Set<string>();
  private readonly timeZone: string;

  constructor(timeZone: string = DEFAULT_TIME_ZONE) {
    this.timeZone = timeZone;
  }

  next(fileName: string, now: Date = new Date()): string {
    const base = generateStoryId(fileName, now, this.timeZone);
    let candidate = base;
    for (let n = 2; this.issued.has(candidate); n++) {
      candidate = `${base}_${String(n)}`;
    }
    this.issued.add(candidate);
    return candidate;
  }
}
