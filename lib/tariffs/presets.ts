import type Decimal from "decimal.js";

import type { TariffRuleInput } from "./schedule";

export type PeakOffPeakPreset = {
  validFrom: string;
  validTo?: string | null;
  peakEurPerKwh?: Decimal.Value;
  offPeakEurPerKwh?: Decimal.Value;
  surchargeEurPerKwh?: Decimal.Value;
  /** Injection credit per kWh; 0 keeps the flow explicitly priced at nothing */
  injectieEurPerKwh?: Decimal.Value;
};

/**
 * Two-rate afname schedule with a flat surcharge, plus one `any` injectie rule so both
 * flows are always covered. Defaults: 0.28 peak, 0.18 off-peak, 0.02 surcharge, 0 injectie.
 */
export function buildPeakOffPeakSchedule(preset: PeakOffPeakPreset): TariffRuleInput[] {
  const common = { validityStart: preset.validFrom, validityEnd: preset.validTo ?? null };
  const surcharge = preset.surchargeEurPerKwh ?? "0.02";
  return [
    {
      ...common,
      tariffType: "afname",
      timeClass: "peak",
      priceEurPerKwh: preset.peakEurPerKwh ?? "0.28",
      surchargeEurPerKwh: surcharge,
      label: "Piek",
    },
    {
      ...common,
      tariffType: "afname",
      timeClass: "off_peak",
      priceEurPerKwh: preset.offPeakEurPerKwh ?? "0.18",
      surchargeEurPerKwh: surcharge,
      label: "Dal",
    },
    {
      ...common,
      tariffType: "injectie",
      timeClass: "any",
      priceEurPerKwh: preset.injectieEurPerKwh ?? "0",
      label: "Injectie",
    },
  ];
}
