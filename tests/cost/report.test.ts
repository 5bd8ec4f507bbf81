import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";

import { aggregateCostLines, emptyAggregate } from "@/lib/cost/aggregate";
import { compute } from "@/lib/cost/compute";
import { compareToReference, presentReport } from "@/lib/cost/report";
import { TariffSchedule } from "@/lib/tariffs/schedule";
import { BRUSSELS_2024 } from "../helpers/fixtures";

const schedule = TariffSchedule.from([
  { tariffType: "afname", validityStart: "2024-01-01", priceEurPerKwh: "0.31234", timeClass: "peak" },
  { tariffType: "afname", validityStart: "2024-01-01", priceEurPerKwh: "0.20", timeClass: "off_peak" },
  { tariffType: "injectie", validityStart: "2024-01-01", priceEurPerKwh: "0.04" },
]);

// peak 1.5 kWh, off-peak 2 kWh with 0.5 injected, peak 0.25 kWh with 1 injected
const readings = [
  { timestamp: "2024-01-15T08:00", afnameKwh: "1.5" },
  { timestamp: "2024-01-15T23:00", afnameKwh: "2", injectieKwh: "0.5" },
  { timestamp: "2024-02-01T12:00", afnameKwh: "0.25", injectieKwh: "1" },
];

function run(reference?: string) {
  const result = compute(readings, schedule, BRUSSELS_2024, "fail_fast", { referencePriceEurPerKwh: reference });
  if (result.status !== "OK") throw result.error;
  return result.report;
}

describe("aggregates", () => {
  it("keeps unrounded totals", () => {
    const { aggregate } = run();
    expect(aggregate.totalCost.toString()).toBe("0.886595");
    expect(aggregate.totalCostAfname.toString()).toBe("0.946595");
    expect(aggregate.totalCostInjectie.toString()).toBe("0.06");
    expect(aggregate.monthly["2024-01"]?.toString()).toBe("0.84851");
    expect(aggregate.monthly["2024-02"]?.toString()).toBe("0.038085");
    expect(aggregate.peakVsOffPeak.peak.toString()).toBe("0.506595");
    expect(aggregate.peakVsOffPeak.off_peak.toString()).toBe("0.38");
    expect(aggregate.yearly["2024"]?.toString()).toBe("0.886595");
  });

  it("an empty line set equals the empty aggregate", () => {
    expect(aggregateCostLines([])).toEqual(emptyAggregate());
  });
});

describe("presentReport", () => {
  it("rounds half-up only at presentation", () => {
    const presented = presentReport(run("0.30"));
    expect(presented.summary).toEqual({
      totalCostEur: 0.89,
      totalCostAfnameEur: 0.95,
      totalCostInjectieEur: 0.06,
      totalAfnameKwh: 3.75,
      totalInjectieKwh: 1.5,
      averageMonthlyCostEur: 0.44,
      peakSharePct: 46.7,
      peakCostEur: 0.51,
      offPeakCostEur: 0.38,
      referenceCostEur: 1.13,
      differenceEur: -0.24,
      differencePct: -21.2,
    });
    expect(presented.monthly).toEqual([
      { period: "2024-01", costEur: 0.85, afnameKwh: 3.5, injectieKwh: 0.5, referenceCostEur: 1.05 },
      { period: "2024-02", costEur: 0.04, afnameKwh: 0.25, injectieKwh: 1, referenceCostEur: 0.08 },
    ]);
    expect(presented.daily).toEqual([
      { date: "2024-01-15", costEur: 0.85 },
      { date: "2024-02-01", costEur: 0.04 },
    ]);
    expect(presented.yearly).toEqual([{ year: "2024", costEur: 0.89 }]);
    expect(presented.metadata.dateRange).toEqual({ from: "2024-01-15T08:00:00", to: "2024-02-01T12:00:00" });
    expect(presented.metadata.monthsCovered).toBe(2);
  });

  it("leaves reference fields null without a reference price", () => {
    const presented = presentReport(run(), { decimals: 4 });
    expect(presented.summary.totalCostEur).toBe(0.8866);
    expect(presented.summary.referenceCostEur).toBeNull();
    expect(presented.summary.differencePct).toBeNull();
    expect(presented.monthly[0]?.referenceCostEur).toBeNull();
  });
});

describe("compareToReference", () => {
  it("reports 0% when there is no consumption to compare", () => {
    const cmp = compareToReference(emptyAggregate(), new Decimal("0.30"));
    expect(cmp.referenceCost.isZero()).toBe(true);
    expect(cmp.differencePct.isZero()).toBe(true);
    expect(cmp.monthly).toEqual({});
  });
});
