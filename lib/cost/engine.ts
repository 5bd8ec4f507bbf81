import { unitPrice, type TariffSchedule } from "@/lib/tariffs/schedule";
import { classifyTimeClass, DEFAULT_PEAK_WINDOW, type PeakWindow } from "@/lib/tariffs/touWindow";
import { NoTariffMatchError, readingRef } from "./errors";
import type { CostLine, ResolvedInstant, TariffType, TimeClass } from "./types";

function priceFor(resolved: ResolvedInstant, schedule: TariffSchedule, tariffType: TariffType, date: string, timeClass: TimeClass) {
  const rule = schedule.find(tariffType, date, timeClass);
  if (!rule) throw new NoTariffMatchError(readingRef(resolved.reading), { tariffType, date, timeClass });
  return unitPrice(rule);
}

/**
 * Core: one cost line per resolved reading. Both flows are priced on the reading's local
 * date and clock-time class; injection is a credit, so net = afname cost - injectie cost.
 * Nothing is rounded here.
 */
export function computeCostLine(
  resolved: ResolvedInstant,
  schedule: TariffSchedule,
  peakWindow: PeakWindow = DEFAULT_PEAK_WINDOW,
): CostLine {
  const { reading } = resolved;
  const localDate = reading.timestamp.slice(0, 10);
  const monthBucket = reading.timestamp.slice(0, 7);
  const timeClass = classifyTimeClass(reading.localTime, peakWindow);

  const priceAfname = priceFor(resolved, schedule, "afname", localDate, timeClass);
  const priceInjectie = priceFor(resolved, schedule, "injectie", localDate, timeClass);

  const costAfname = reading.afnameKwh.times(priceAfname);
  const costInjectie = reading.injectieKwh.times(priceInjectie);

  return Object.freeze({
    reading,
    instant: resolved.instant,
    disambiguation: resolved.disambiguation,
    timeClass,
    localDate,
    monthBucket,
    priceAfname,
    priceInjectie,
    costAfname,
    costInjectie,
    netCost: costAfname.minus(costInjectie),
  });
}
