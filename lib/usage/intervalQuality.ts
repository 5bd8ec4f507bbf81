import { DateTime } from "luxon";

import { formatWall, parseNaiveLocal } from "@/lib/time/localTime";
import {
  classifyWallTime,
  expectedIntervalsForDate,
  indexTimezoneRules,
  type TimezoneRules,
} from "@/lib/time/transitions";

export type IntervalQualityCode = "duplicate_interval" | "missing_interval";

export type IntervalQualityIssue = {
  code: IntervalQualityCode;
  message: string;
  meterId: string | null;
  date: string; // YYYY-MM-DD (local day)
  timestamp: string | null;
};

export type DailyCompleteness = {
  meterId: string | null;
  date: string; // YYYY-MM-DD (local day)
  expectedSlots: number; // 92/96/100 for quarter-hours
  foundCount: number; // distinct slots present
  completeness: number; // foundCount / expectedSlots (0-1)
  hasMissing: boolean;
};

export type IntervalQualityReport = { daily: DailyCompleteness[]; issues: IntervalQualityIssue[] };

type MeterSeries = { meterId: string | null; counts: Map<string, number>; firstDate: string; lastDate: string };

/**
 * DST-aware data-quality check over parsed readings, per meter and local day.
 * A wall time may occur twice only inside a fall-back hour; any other repeat is a duplicate.
 * Every day from the meter's first to its last day is compared against the number of
 * intervals the day holds under the transition table. Nothing is filled in.
 */
export function checkIntervalQuality(
  readings: ReadonlyArray<{ timestamp: string; meterId?: string | null }>,
  rules: TimezoneRules,
  intervalMinutes = 15,
): IntervalQualityReport {
  const indexed = indexTimezoneRules(rules);
  const series = new Map<string, MeterSeries>();

  for (const r of readings) {
    const local = parseNaiveLocal(r.timestamp);
    if (!local) continue;
    const timestamp = formatWall(local);
    const date = timestamp.slice(0, 10);
    const meterId = r.meterId?.trim() || null;
    const key = meterId ?? "";

    const s = series.get(key) ?? { meterId, counts: new Map<string, number>(), firstDate: date, lastDate: date };
    s.counts.set(timestamp, (s.counts.get(timestamp) ?? 0) + 1);
    if (date < s.firstDate) s.firstDate = date;
    if (date > s.lastDate) s.lastDate = date;
    series.set(key, s);
  }

  const daily: DailyCompleteness[] = [];
  const issues: IntervalQualityIssue[] = [];

  for (const s of series.values()) {
    const found = new Map<string, number>();
    for (const [timestamp, n] of s.counts) {
      const local = parseNaiveLocal(timestamp);
      const allowed = local && classifyWallTime(local.toMillis(), indexed).kind === "ambiguous" ? 2 : 1;
      const date = timestamp.slice(0, 10);
      found.set(date, (found.get(date) ?? 0) + Math.min(n, allowed));
      if (n > allowed) {
        issues.push({
          code: "duplicate_interval",
          message: `Duplicate interval ${timestamp} (${n} readings)${s.meterId ? ` for meter ${s.meterId}` : ""}.`,
          meterId: s.meterId,
          date,
          timestamp,
        });
      }
    }

    const lastMs = DateTime.fromISO(s.lastDate, { zone: "utc" }).toMillis();
    let day = DateTime.fromISO(s.firstDate, { zone: "utc" });
    for (; day.toMillis() <= lastMs; day = day.plus({ days: 1 })) {
      const date = day.toFormat("yyyy-MM-dd");
      const expectedSlots = expectedIntervalsForDate(date, rules, intervalMinutes);
      const foundCount = found.get(date) ?? 0;
      const hasMissing = foundCount < expectedSlots;
      daily.push({
        meterId: s.meterId,
        date,
        expectedSlots,
        foundCount,
        completeness: expectedSlots > 0 ? foundCount / expectedSlots : 0,
        hasMissing,
      });
      if (hasMissing) {
        issues.push({
          code: "missing_interval",
          message: `${date}: ${foundCount} of ${expectedSlots} intervals present${s.meterId ? ` for meter ${s.meterId}` : ""}.`,
          meterId: s.meterId,
          date,
          timestamp: null,
        });
      }
    }
  }

  return { daily, issues };
}
