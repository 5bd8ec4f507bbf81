import type Decimal from "decimal.js";

import { createLocalTimeResolver } from "@/lib/time/localTime";
import type { TimezoneRules } from "@/lib/time/transitions";
import type { TariffSchedule } from "@/lib/tariffs/schedule";
import { DEFAULT_PEAK_WINDOW, formatPeakWindow, type PeakWindow } from "@/lib/tariffs/touWindow";
import { aggregateCostLines } from "./aggregate";
import { computeCostLine } from "./engine";
import { CostEngineError } from "./errors";
import { createReading } from "./reading";
import { buildCostReport } from "./report";
import type {
  AmbiguousLocalTimeNotice,
  CostLine,
  CostReport,
  Reading,
  ReadingInput,
  SkippedReading,
  Strictness,
} from "./types";

export type ComputeOptions = {
  peakWindow?: PeakWindow;
  referencePriceEurPerKwh?: Decimal.Value | null;
  logger?: Pick<Console, "warn">;
};

export type ComputeResult =
  | { status: "OK"; report: CostReport; lines: CostLine[] }
  | { status: "ERROR"; error: CostEngineError };

function toSkipped(err: CostEngineError): SkippedReading {
  return {
    position: err.reading.position,
    sourceRow: err.reading.sourceRow,
    timestamp: err.reading.timestamp,
    meterId: err.reading.meterId,
    code: err.code,
    message: err.message,
  };
}

function ambiguityNotices(lines: readonly CostLine[]): AmbiguousLocalTimeNotice[] {
  const notices: AmbiguousLocalTimeNotice[] = [];
  for (const { reading, disambiguation } of lines) {
    if (disambiguation === "n/a") continue;
    notices.push({
      code: "AMBIGUOUS_LOCAL_TIME",
      position: reading.position,
      timestamp: reading.timestamp,
      meterId: reading.meterId,
      disambiguation,
    });
  }
  return notices;
}

/**
 * Single entry point: readings -> cost lines -> aggregates -> report.
 *
 * Readings are processed in input order (the duplicated-hour rule depends on it). Under
 * `fail_fast` the first InvalidLocalTime / NoTariffMatch / MalformedReading ends the run
 * with an ERROR result naming the reading; under `best_effort` the reading is left out of
 * every aggregate and listed in `metadata.skipped`. Non-engine errors propagate.
 * `metadata.ambiguous` lists only priced duplicated-hour readings.
 */
export function compute(
  readings: readonly ReadingInput[],
  schedule: TariffSchedule,
  timezoneRules: TimezoneRules,
  strictness: Strictness = "fail_fast",
  options: ComputeOptions = {},
): ComputeResult {
  const resolver = createLocalTimeResolver(timezoneRules);
  const peakWindow = options.peakWindow ?? DEFAULT_PEAK_WINDOW;
  const lines: CostLine[] = [];
  const skipped: SkippedReading[] = [];

  for (let position = 0; position < readings.length; position++) {
    let reading: Reading | null = null;
    try {
      reading = createReading(readings[position], position);
      lines.push(computeCostLine(resolver.resolve(reading), schedule, peakWindow));
    } catch (err) {
      if (!(err instanceof CostEngineError)) throw err;
      if (strictness === "fail_fast") return { status: "ERROR", error: err };
      // A rejected copy of a fall-back wall time still takes its place in the numbering.
      if (reading == null) resolver.reserveOccurrence(err.reading);
      skipped.push(toSkipped(err));
    }
  }

  if (skipped.length > 0) {
    (options.logger ?? console).warn(
      `[cost-engine] ${skipped.length} of ${readings.length} readings skipped (best_effort); first: ${skipped[0]?.message}`,
    );
  }

  const report = buildCostReport(aggregateCostLines(lines), {
    zone: timezoneRules.zone,
    strictness,
    readingCount: readings.length,
    lines,
    skipped,
    ambiguous: ambiguityNotices(lines),
    peakWindow: formatPeakWindow(peakWindow),
    referencePriceEurPerKwh: options.referencePriceEurPerKwh,
  });

  return { status: "OK", report, lines };
}
