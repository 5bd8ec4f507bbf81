import type { BacktestConfig } from "@/lib/config/backtest";
import { compute } from "@/lib/cost/compute";
import type { CostEngineError } from "@/lib/cost/errors";
import { presentReport, type PresentedReport } from "@/lib/cost/report";
import type { CostLine, CostReport, ReadingInput } from "@/lib/cost/types";
import { TariffSchedule } from "@/lib/tariffs/schedule";
import type { TariffRuleInput } from "@/lib/tariffs/schedule";
import { buildTimezoneRules } from "@/lib/time/transitions";
import { parseFluviusCsv, type ParsingError } from "@/lib/usage/fluviusCsv";
import { checkIntervalQuality, type IntervalQualityReport } from "@/lib/usage/intervalQuality";

export type PresentedLine = {
  position: number;
  timestamp: string;
  meterId: string | null;
  disambiguation: CostLine["disambiguation"];
  timeClass: CostLine["timeClass"];
  netCostEur: string;
};

export type BacktestOutcome =
  | {
      status: "OK";
      report: CostReport;
      presented: PresentedReport;
      quality: IntervalQualityReport;
      lines: PresentedLine[] | null;
    }
  | { status: "PARSE_ERROR"; errors: ParsingError[] }
  | { status: "ERROR"; error: CostEngineError };

function yearSpan(readings: readonly ReadingInput[]): { from: number; to: number } | null {
  let from = Infinity;
  let to = -Infinity;
  for (const r of readings) {
    const y = Number(String(r.timestamp).slice(0, 4));
    if (!Number.isInteger(y)) continue;
    from = Math.min(from, y);
    to = Math.max(to, y);
  }
  return Number.isFinite(from) ? { from, to } : null;
}

/** Configured years widened to every year the readings touch. */
function calendarYears(
  configured: { from: number; to: number } | null,
  data: { from: number; to: number } | null,
): { from: number; to: number } {
  if (configured && data) {
    return { from: Math.min(configured.from, data.from), to: Math.max(configured.to, data.to) };
  }
  const thisYear = new Date().getUTCFullYear();
  return configured ?? data ?? { from: thisYear, to: thisYear };
}

/**
 * Parse a Fluvius export, price it against the supplied rules, and present the report.
 * The transition calendar covers the configured years and every year present in the data.
 */
export function runBacktest(args: {
  readingsCsv: string;
  tariffRules: TariffRuleInput[];
  config: BacktestConfig;
}): BacktestOutcome {
  const { config } = args;
  const parsed = parseFluviusCsv(args.readingsCsv);
  if (parsed.errors.length > 0) return { status: "PARSE_ERROR", errors: parsed.errors };

  const schedule = TariffSchedule.from(args.tariffRules);
  const years = calendarYears(config.years, yearSpan(parsed.readings));
  const rules = buildTimezoneRules(config.zone, years.from, years.to);

  const result = compute(parsed.readings, schedule, rules, config.strictness, {
    peakWindow: config.peakWindow,
    referencePriceEurPerKwh: config.referencePriceEurPerKwh,
  });
  if (result.status === "ERROR") return result;

  const lines = config.includeLines
    ? result.lines.map((l) => ({
        position: l.reading.position,
        timestamp: l.reading.timestamp,
        meterId: l.reading.meterId,
        disambiguation: l.disambiguation,
        timeClass: l.timeClass,
        netCostEur: l.netCost.toString(),
      }))
    : null;

  return {
    status: "OK",
    report: result.report,
    presented: presentReport(result.report, { decimals: config.decimals }),
    quality: checkIntervalQuality(parsed.readings, rules),
    lines,
  };
}
