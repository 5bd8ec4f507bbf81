import type Decimal from "decimal.js";

import { ZERO } from "./decimal";
import type { AggregateReport, CostLine } from "./types";

function addTo(bucket: Record<string, Decimal>, key: string, v: Decimal): void {
  bucket[key] = (bucket[key] ?? ZERO).plus(v);
}

export function emptyAggregate(): AggregateReport {
  return {
    totalCost: ZERO,
    totalCostAfname: ZERO,
    totalCostInjectie: ZERO,
    totalAfnameKwh: ZERO,
    totalInjectieKwh: ZERO,
    monthly: {},
    monthlyUsage: {},
    daily: {},
    yearly: {},
    peakVsOffPeak: { peak: ZERO, off_peak: ZERO },
    afnameKwhByTimeClass: { peak: ZERO, off_peak: ZERO },
    peakShare: ZERO,
  };
}

/**
 * Single pass in input order. Decimal sums are exact for these magnitudes, but the order
 * is fixed anyway so two runs over the same lines produce identical values.
 */
export function aggregateCostLines(lines: readonly CostLine[]): AggregateReport {
  const agg = emptyAggregate();

  for (const line of lines) {
    const { reading } = line;
    agg.totalCost = agg.totalCost.plus(line.netCost);
    agg.totalCostAfname = agg.totalCostAfname.plus(line.costAfname);
    agg.totalCostInjectie = agg.totalCostInjectie.plus(line.costInjectie);
    agg.totalAfnameKwh = agg.totalAfnameKwh.plus(reading.afnameKwh);
    agg.totalInjectieKwh = agg.totalInjectieKwh.plus(reading.injectieKwh);

    addTo(agg.monthly, line.monthBucket, line.netCost);
    addTo(agg.daily, line.localDate, line.netCost);
    addTo(agg.yearly, line.monthBucket.slice(0, 4), line.netCost);
    agg.peakVsOffPeak[line.timeClass] = agg.peakVsOffPeak[line.timeClass].plus(line.netCost);
    agg.afnameKwhByTimeClass[line.timeClass] = agg.afnameKwhByTimeClass[line.timeClass].plus(reading.afnameKwh);

    const usage = agg.monthlyUsage[line.monthBucket] ?? { afnameKwh: ZERO, injectieKwh: ZERO };
    agg.monthlyUsage[line.monthBucket] = {
      afnameKwh: usage.afnameKwh.plus(reading.afnameKwh),
      injectieKwh: usage.injectieKwh.plus(reading.injectieKwh),
    };
  }

  agg.peakShare = agg.totalAfnameKwh.isZero() ? ZERO : agg.afnameKwhByTimeClass.peak.dividedBy(agg.totalAfnameKwh);
  return agg;
}
