import type { Reading, TariffType, TimeClass } from "./types";

export type CostEngineErrorCode = "INVALID_LOCAL_TIME" | "NO_TARIFF_MATCH" | "MALFORMED_READING";

/** Identity of the offending reading, enough to build a user-facing message. */
export type ReadingRef = {
  position: number;
  sourceRow: number | null;
  timestamp: string;
  meterId: string | null;
};

export function readingRef(reading: Reading): ReadingRef {
  return {
    position: reading.position,
    sourceRow: reading.sourceRow,
    timestamp: reading.timestamp,
    meterId: reading.meterId,
  };
}

function describeRef(ref: ReadingRef): string {
  const where = ref.sourceRow != null ? `row ${ref.sourceRow}` : `position ${ref.position}`;
  return ref.meterId ? `${where}, meter ${ref.meterId}` : where;
}

export class CostEngineError extends Error {
  readonly code: CostEngineErrorCode;
  readonly reading: ReadingRef;
  constructor(code: CostEngineErrorCode, reading: ReadingRef, message: string) {
    super(message);
    this.name = "CostEngineError";
    this.code = code;
    this.reading = reading;
  }
}

export class InvalidLocalTimeError extends CostEngineError {
  readonly zone: string;
  /** UTC instant of the forward transition that skips this wall time */
  readonly transitionAt: string;
  constructor(reading: ReadingRef, zone: string, transitionAt: string) {
    super(
      "INVALID_LOCAL_TIME",
      reading,
      `Local time ${reading.timestamp} does not exist in ${zone} (clocks moved forward at ${transitionAt}); ${describeRef(reading)}`,
    );
    this.name = "InvalidLocalTimeError";
    this.zone = zone;
    this.transitionAt = transitionAt;
  }
}

export type TariffQuery = { tariffType: TariffType; date: string; timeClass: TimeClass };

export class NoTariffMatchError extends CostEngineError {
  readonly tariffType: TariffType;
  readonly date: string;
  readonly timeClass: TimeClass;
  constructor(reading: ReadingRef, query: TariffQuery) {
    super(
      "NO_TARIFF_MATCH",
      reading,
      `No ${query.tariffType} tariff rule covers ${query.date} (${query.timeClass}); ${describeRef(reading)}`,
    );
    this.name = "NoTariffMatchError";
    this.tariffType = query.tariffType;
    this.date = query.date;
    this.timeClass = query.timeClass;
  }
}

export class MalformedReadingError extends CostEngineError {
  readonly reason: string;
  constructor(reading: ReadingRef, reason: string) {
    super("MALFORMED_READING", reading, `Malformed reading (${reason}); ${describeRef(reading)}`);
    this.name = "MalformedReadingError";
    this.reason = reason;
  }
}
