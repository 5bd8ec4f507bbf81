import { DateTime } from "luxon";

import { InvalidLocalTimeError, MalformedReadingError, readingRef } from "@/lib/cost/errors";
import type { LocalWallTime, Reading, ResolvedInstant } from "@/lib/cost/types";
import { classifyWallTime, indexTimezoneRules, type TimezoneRules } from "./transitions";

const MINUTE_MS = 60_000;
const NAIVE_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse a naive local timestamp (`YYYY-MM-DDTHH:mm[:ss]`, `T` or space). Anything with an
 * explicit offset or zone designator is rejected: converting offsets is the caller's job.
 */
export function parseNaiveLocal(s: string): LocalWallTime | null {
  const m = String(s ?? "").trim().match(NAIVE_RE);
  if (!m) return null;
  const [, Y, M, D, h, mm, ss] = m;
  const dt = DateTime.fromObject(
    {
      year: Number(Y),
      month: Number(M),
      day: Number(D),
      hour: Number(h),
      minute: Number(mm),
      second: Number(ss ?? "0"),
      millisecond: 0,
    },
    { zone: "utc" },
  );
  return dt.isValid ? dt : null;
}

export function formatWall(dt: LocalWallTime): string {
  return dt.toFormat("yyyy-MM-dd'T'HH:mm:ss");
}

export type LocalTimeResolver = {
  readonly zone: string;
  /** Throws InvalidLocalTimeError for a wall time inside a spring-forward gap. */
  resolve(reading: Reading): ResolvedInstant;
  /**
   * Counts a reading that never got resolved (its amounts were malformed) toward the
   * occurrence numbering, so the copy after it keeps its position in the file.
   */
  reserveOccurrence(ref: { timestamp: string; meterId: string | null }): void;
};

/**
 * One resolver per run. Readings inside a fall-back window are numbered per meter in
 * file order: the first reading for a given meter and wall time is the first occurrence,
 * the next one the second. Readings without a meter id share one sequence.
 * A third reading for the same meter and wall time cannot be placed and is malformed.
 */
export function createLocalTimeResolver(rules: TimezoneRules): LocalTimeResolver {
  const indexed = indexTimezoneRules(rules);
  const seen = new Map<string, number>();
  const occurrenceKey = (meterId: string | null, timestamp: string) => `${meterId ?? ""}|${timestamp}`;

  return {
    zone: rules.zone,
    resolve(reading: Reading): ResolvedInstant {
      const wallMs = reading.localTime.toMillis();
      const c = classifyWallTime(wallMs, indexed);

      if (c.kind === "skipped") {
        throw new InvalidLocalTimeError(readingRef(reading), rules.zone, c.transition.at);
      }

      if (c.kind === "normal") {
        return {
          reading,
          instant: new Date(wallMs - c.offsetMinutes * MINUTE_MS),
          offsetMinutes: c.offsetMinutes,
          isAmbiguous: false,
          isSkipped: false,
          disambiguation: "n/a",
        };
      }

      const key = occurrenceKey(reading.meterId, reading.timestamp);
      const index = seen.get(key) ?? 0;
      if (index >= 2) {
        throw new MalformedReadingError(readingRef(reading), "wall time repeats more than twice in a fall-back hour");
      }
      seen.set(key, index + 1);

      const offsetMinutes = index === 0 ? c.firstOffsetMinutes : c.secondOffsetMinutes;
      return {
        reading,
        instant: new Date(wallMs - offsetMinutes * MINUTE_MS),
        offsetMinutes,
        isAmbiguous: true,
        isSkipped: false,
        disambiguation: index === 0 ? "first_occurrence" : "second_occurrence",
      };
    },
    reserveOccurrence(ref): void {
      const local = parseNaiveLocal(ref.timestamp);
      if (!local) return;
      if (classifyWallTime(local.toMillis(), indexed).kind !== "ambiguous") return;
      const key = occurrenceKey(ref.meterId, formatWall(local));
      seen.set(key, (seen.get(key) ?? 0) + 1);
    },
  };
}
