import { TariffSchedule, type TariffRuleInput } from "@/lib/tariffs/schedule";
import type { TimezoneRules } from "@/lib/time/transitions";

/** Europe/Brussels for 2024: CET -> CEST on 31 March, back on 27 October. */
export const BRUSSELS_2024: TimezoneRules = {
  zone: "Europe/Brussels",
  baseOffsetMinutes: 60,
  transitions: [
    { at: "2024-03-31T01:00:00.000Z", direction: "forward", offsetBeforeMinutes: 60, offsetAfterMinutes: 120 },
    { at: "2024-10-27T01:00:00.000Z", direction: "backward", offsetBeforeMinutes: 120, offsetAfterMinutes: 60 },
  ],
};

export function flatSchedule(afname: string, injectie = "0", validityStart = "2024-01-01"): TariffSchedule {
  const rules: TariffRuleInput[] = [
    { tariffType: "afname", validityStart, priceEurPerKwh: afname },
    { tariffType: "injectie", validityStart, priceEurPerKwh: injectie },
  ];
  return TariffSchedule.from(rules);
}
