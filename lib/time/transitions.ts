import { DateTime } from "luxon";

export type TransitionDirection = "forward" | "backward";

export type TimezoneTransition = Readonly<{
  /** UTC instant, ISO 8601 */
  at: string;
  direction: TransitionDirection;
  offsetBeforeMinutes: number;
  offsetAfterMinutes: number;
}>;

/**
 * Explicit DST calendar for one zone. `baseOffsetMinutes` applies before the first
 * transition (or everywhere, for a zone without transitions).
 */
export type TimezoneRules = Readonly<{
  zone: string;
  baseOffsetMinutes: number;
  transitions: readonly TimezoneTransition[];
}>;

export class TimezoneRulesError extends Error {
  readonly zone: string;
  constructor(zone: string, message: string) {
    super(`${zone}: ${message}`);
    this.name = "TimezoneRulesError";
    this.zone = zone;
  }
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export type IndexedTransition = TimezoneTransition & Readonly<{ atMs: number }>;

/** A validated table with transition instants parsed once. */
export type IndexedTimezoneRules = Readonly<{
  zone: string;
  baseOffsetMinutes: number;
  transitions: readonly IndexedTransition[];
}>;

export type ClassifiedWallTime =
  | { kind: "normal"; offsetMinutes: number }
  | { kind: "skipped"; transition: TimezoneTransition }
  | { kind: "ambiguous"; transition: TimezoneTransition; firstOffsetMinutes: number; secondOffsetMinutes: number };

/** Validates the table once; classification below relies on its ordering. */
export function validateTimezoneRules(rules: TimezoneRules): void {
  const zone = rules.zone || "(unnamed zone)";
  if (!Number.isInteger(rules.baseOffsetMinutes)) {
    throw new TimezoneRulesError(zone, "baseOffsetMinutes must be an integer");
  }

  let prevMs = -Infinity;
  let prevOffset = rules.baseOffsetMinutes;
  rules.transitions.forEach((t, i) => {
    const atMs = Date.parse(t.at);
    if (!Number.isFinite(atMs)) throw new TimezoneRulesError(zone, `transition ${i} has an invalid instant "${t.at}"`);
    if (atMs <= prevMs) throw new TimezoneRulesError(zone, `transition ${i} is not after the previous one`);
    if (t.offsetBeforeMinutes !== prevOffset) {
      throw new TimezoneRulesError(
        zone,
        `transition ${i} starts at offset ${t.offsetBeforeMinutes}, expected ${prevOffset}`,
      );
    }
    const expected: TransitionDirection | null =
      t.offsetAfterMinutes > t.offsetBeforeMinutes
        ? "forward"
        : t.offsetAfterMinutes < t.offsetBeforeMinutes
          ? "backward"
          : null;
    if (expected !== t.direction) {
      throw new TimezoneRulesError(zone, `transition ${i} direction does not match its offset change`);
    }
    prevMs = atMs;
    prevOffset = t.offsetAfterMinutes;
  });
}

export function indexTimezoneRules(rules: TimezoneRules): IndexedTimezoneRules {
  validateTimezoneRules(rules);
  return {
    zone: rules.zone,
    baseOffsetMinutes: rules.baseOffsetMinutes,
    transitions: rules.transitions.map((t) => ({ ...t, atMs: Date.parse(t.at) })),
  };
}

/**
 * Classifies a wall-clock time (given as local-as-UTC milliseconds) against the table.
 * Around a forward transition the wall times in [before, after) never occur; around a
 * backward transition the wall times in [after, before) occur twice.
 */
export function classifyWallTime(wallMs: number, rules: IndexedTimezoneRules): ClassifiedWallTime {
  let offsetMinutes = rules.baseOffsetMinutes;

  for (const t of rules.transitions) {
    const wallBefore = t.atMs + t.offsetBeforeMinutes * MINUTE_MS;
    const wallAfter = t.atMs + t.offsetAfterMinutes * MINUTE_MS;

    if (t.direction === "forward" && wallMs >= wallBefore && wallMs < wallAfter) {
      return { kind: "skipped", transition: t };
    }
    if (t.direction === "backward" && wallMs >= wallAfter && wallMs < wallBefore) {
      return {
        kind: "ambiguous",
        transition: t,
        firstOffsetMinutes: t.offsetBeforeMinutes,
        secondOffsetMinutes: t.offsetAfterMinutes,
      };
    }
    if (wallMs >= Math.max(wallBefore, wallAfter)) offsetMinutes = t.offsetAfterMinutes;
    else break;
  }

  return { kind: "normal", offsetMinutes };
}

function offsetAt(zone: string, ms: number): number {
  return DateTime.fromMillis(ms, { zone }).offset;
}

/**
 * Derive an explicit transition table from the IANA database (through luxon) for
 * whole calendar years. Offsets are sampled hourly and each change is narrowed to the minute.
 */
export function buildTimezoneRules(zone: string, fromYear: number, toYear: number = fromYear): TimezoneRules {
  const zoneCheck = DateTime.now().setZone(zone);
  if (!zoneCheck.isValid) throw new TimezoneRulesError(zone, "unknown IANA zone");
  if (!Number.isInteger(fromYear) || !Number.isInteger(toYear) || toYear < fromYear) {
    throw new TimezoneRulesError(zone, `invalid year range ${fromYear}-${toYear}`);
  }

  const startMs = DateTime.fromObject({ year: fromYear, month: 1, day: 1 }, { zone }).toMillis();
  const endMs = DateTime.fromObject({ year: toYear + 1, month: 1, day: 1 }, { zone }).toMillis();

  const baseOffsetMinutes = offsetAt(zone, startMs);
  const transitions: TimezoneTransition[] = [];
  let current = baseOffsetMinutes;

  for (let ms = startMs; ms < endMs; ms += HOUR_MS) {
    const next = offsetAt(zone, ms + HOUR_MS);
    if (next === current) continue;

    // First minute in (ms, ms + 1h] that carries the new offset.
    let lo = ms;
    let hi = ms + HOUR_MS;
    while (hi - lo > MINUTE_MS) {
      const mid = lo + Math.floor((hi - lo) / (2 * MINUTE_MS)) * MINUTE_MS;
      if (offsetAt(zone, mid) === current) lo = mid;
      else hi = mid;
    }

    transitions.push({
      at: new Date(hi).toISOString(),
      direction: next > current ? "forward" : "backward",
      offsetBeforeMinutes: current,
      offsetAfterMinutes: next,
    });
    current = next;
  }

  return { zone, baseOffsetMinutes, transitions };
}

/**
 * Number of intervals the local day `dateISO` holds under the table:
 * 96 / 92 / 100 quarter-hours for a normal / spring-forward / fall-back day.
 */
export function expectedIntervalsForDate(dateISO: string, rules: TimezoneRules, intervalMinutes = 15): number {
  const day = DateTime.fromISO(dateISO, { zone: "utc" });
  if (!day.isValid) throw new TimezoneRulesError(rules.zone, `invalid date "${dateISO}"`);

  const indexed = indexTimezoneRules(rules);
  const startWall = day.startOf("day").toMillis();
  const endWall = day.startOf("day").plus({ days: 1 }).toMillis();
  const start = instantForWall(startWall, indexed);
  const end = instantForWall(endWall, indexed);
  return Math.round((end - start) / (intervalMinutes * MINUTE_MS));
}

function instantForWall(wallMs: number, rules: IndexedTimezoneRules): number {
  const c = classifyWallTime(wallMs, rules);
  if (c.kind === "normal") return wallMs - c.offsetMinutes * MINUTE_MS;
  if (c.kind === "ambiguous") return wallMs - c.firstOffsetMinutes * MINUTE_MS;
  // Midnight skipped: the day starts when the gap ends.
  return Date.parse(c.transition.at);
}
