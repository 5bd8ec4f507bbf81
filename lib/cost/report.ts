import type Decimal from "decimal.js";

import { roundHalfUp, toDecimal, ZERO } from "./decimal";
import type {
  AggregateReport,
  AmbiguousLocalTimeNotice,
  CostLine,
  CostReport,
  ReferenceComparison,
  SkippedReading,
  Strictness,
} from "./types";

export type ReportContext = {
  zone: string;
  strictness: Strictness;
  readingCount: number;
  lines: readonly CostLine[];
  skipped: readonly SkippedReading[];
  ambiguous: readonly AmbiguousLocalTimeNotice[];
  /** `HHMM-HHMM` */
  peakWindow: string;
  referencePriceEurPerKwh?: Decimal.Value | null;
};

function dateRangeOf(lines: readonly CostLine[]): { from: string; to: string } | null {
  let from: string | null = null;
  let to: string | null = null;
  for (const { reading } of lines) {
    if (from == null || reading.timestamp < from) from = reading.timestamp;
    if (to == null || reading.timestamp > to) to = reading.timestamp;
  }
  return from != null && to != null ? { from, to } : null;
}

/** Compares against a flat reference price applied to all afname kWh. */
export function compareToReference(
  aggregate: AggregateReport,
  priceEurPerKwh: Decimal,
): ReferenceComparison {
  const referenceCost = aggregate.totalAfnameKwh.times(priceEurPerKwh);
  const difference = aggregate.totalCost.minus(referenceCost);
  const differencePct = referenceCost.isZero() ? ZERO : difference.dividedBy(referenceCost).times(100);

  const monthly: Record<string, Decimal> = {};
  for (const [month, usage] of Object.entries(aggregate.monthlyUsage)) {
    monthly[month] = usage.afnameKwh.times(priceEurPerKwh);
  }

  return { priceEurPerKwh, referenceCost, difference, differencePct, monthly };
}

/** Pure assembly of aggregates plus run metadata. */
export function buildCostReport(aggregate: AggregateReport, ctx: ReportContext): CostReport {
  const monthsCovered = Object.keys(aggregate.monthly).length;
  const referencePrice = toDecimal(ctx.referencePriceEurPerKwh);

  return {
    aggregate,
    metadata: {
      zone: ctx.zone,
      strictness: ctx.strictness,
      peakWindow: ctx.peakWindow,
      readingCount: ctx.readingCount,
      pricedCount: ctx.lines.length,
      skippedCount: ctx.skipped.length,
      ambiguousCount: ctx.ambiguous.length,
      skipped: [...ctx.skipped],
      ambiguous: [...ctx.ambiguous],
      dateRange: dateRangeOf(ctx.lines),
      monthsCovered,
    },
    averageMonthlyCost: aggregate.totalCost.dividedBy(Math.max(1, monthsCovered)),
    reference: referencePrice ? compareToReference(aggregate, referencePrice) : null,
  };
}

// ─── Presentation ─────────────────────────────────────────────────────────────

export type PresentOptions = { decimals?: number; kwhDecimals?: number };

export type PresentedReport = {
  summary: {
    totalCostEur: number;
    totalCostAfnameEur: number;
    totalCostInjectieEur: number;
    totalAfnameKwh: number;
    totalInjectieKwh: number;
    averageMonthlyCostEur: number;
    peakSharePct: number;
    peakCostEur: number;
    offPeakCostEur: number;
    referenceCostEur: number | null;
    differenceEur: number | null;
    differencePct: number | null;
  };
  monthly: Array<{
    period: string;
    costEur: number;
    afnameKwh: number;
    injectieKwh: number;
    referenceCostEur: number | null;
  }>;
  daily: Array<{ date: string; costEur: number }>;
  yearly: Array<{ year: string; costEur: number }>;
  metadata: CostReport["metadata"];
};

function sortedEntries<T>(rec: Record<string, T>): Array<[string, T]> {
  return Object.entries(rec).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * JSON-safe view of a report. The only place anything is rounded (half-up):
 * money to `decimals` (2), kWh to `kwhDecimals` (3), percentages to 1.
 */
export function presentReport(report: CostReport, opts: PresentOptions = {}): PresentedReport {
  const dp = opts.decimals ?? 2;
  const kdp = opts.kwhDecimals ?? 3;
  const { aggregate: a, reference } = report;
  const money = (v: Decimal) => roundHalfUp(v, dp);
  const kwh = (v: Decimal) => roundHalfUp(v, kdp);

  return {
    summary: {
      totalCostEur: money(a.totalCost),
      totalCostAfnameEur: money(a.totalCostAfname),
      totalCostInjectieEur: money(a.totalCostInjectie),
      totalAfnameKwh: kwh(a.totalAfnameKwh),
      totalInjectieKwh: kwh(a.totalInjectieKwh),
      averageMonthlyCostEur: money(report.averageMonthlyCost),
      peakSharePct: roundHalfUp(a.peakShare.times(100), 1),
      peakCostEur: money(a.peakVsOffPeak.peak),
      offPeakCostEur: money(a.peakVsOffPeak.off_peak),
      referenceCostEur: reference ? money(reference.referenceCost) : null,
      differenceEur: reference ? money(reference.difference) : null,
      differencePct: reference ? roundHalfUp(reference.differencePct, 1) : null,
    },
    monthly: sortedEntries(a.monthly).map(([period, cost]) => {
      const usage = a.monthlyUsage[period];
      const ref = reference?.monthly[period];
      return {
        period,
        costEur: money(cost),
        afnameKwh: usage ? kwh(usage.afnameKwh) : 0,
        injectieKwh: usage ? kwh(usage.injectieKwh) : 0,
        referenceCostEur: ref ? money(ref) : null,
      };
    }),
    daily: sortedEntries(a.daily).map(([date, cost]) => ({ date, costEur: money(cost) })),
    yearly: sortedEntries(a.yearly).map(([year, cost]) => ({ year, costEur: money(cost) })),
    metadata: report.metadata,
  };
}
