import type Decimal from "decimal.js";
import { DateTime } from "luxon";

import { toDecimal, ZERO } from "@/lib/cost/decimal";
import type { TariffTimeClass, TariffType, TimeClass } from "@/lib/cost/types";

export type TariffRule = Readonly<{
  tariffType: TariffType;
  /** YYYY-MM-DD, inclusive */
  validityStart: string;
  /** YYYY-MM-DD, inclusive; null = open-ended */
  validityEnd: string | null;
  priceEurPerKwh: Decimal;
  surchargeEurPerKwh: Decimal;
  timeClass: TariffTimeClass;
  label: string | null;
}>;

export type TariffRuleInput = {
  tariffType: TariffType;
  validityStart: string;
  validityEnd?: string | null;
  priceEurPerKwh: Decimal.Value;
  surchargeEurPerKwh?: Decimal.Value | null;
  timeClass?: TariffTimeClass;
  label?: string | null;
};

export class TariffScheduleError extends Error {
  readonly ruleIndex: number;
  constructor(ruleIndex: number, message: string) {
    super(`Tariff rule ${ruleIndex}: ${message}`);
    this.name = "TariffScheduleError";
    this.ruleIndex = ruleIndex;
  }
}

const TARIFF_TYPES: readonly TariffType[] = ["afname", "injectie"];
const TIME_CLASSES: readonly TariffTimeClass[] = ["peak", "off_peak", "any"];
const DAY_MS = 86_400_000;

function dateMs(s: string): number | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return null;
  const dt = DateTime.fromISO(s, { zone: "utc" });
  return dt.isValid ? dt.toMillis() : null;
}

/** Unit price actually charged: base price plus surcharge. */
export function unitPrice(rule: TariffRule): Decimal {
  return rule.priceEurPerKwh.plus(rule.surchargeEurPerKwh);
}

type IndexedRule = { rule: TariffRule; index: number; widthDays: number };

/**
 * Immutable, ordered set of tariff rules. Lookups filter by flow, validity window and
 * time class; among several matches the narrowest validity window wins, then a specific
 * time class beats `any`, then the rule listed first.
 */
export class TariffSchedule {
  private readonly indexed: readonly IndexedRule[];
  private readonly cache = new Map<string, TariffRule | null>();

  private constructor(indexed: IndexedRule[]) {
    this.indexed = indexed;
  }

  static from(inputs: readonly TariffRuleInput[]): TariffSchedule {
    const indexed = inputs.map((input, index) => {
      const rule = buildRule(input, index);
      const start = dateMs(rule.validityStart) ?? 0;
      const end = rule.validityEnd != null ? dateMs(rule.validityEnd) : null;
      const widthDays = end == null ? Infinity : Math.round((end - start) / DAY_MS) + 1;
      return { rule, index, widthDays };
    });
    return new TariffSchedule(indexed);
  }

  get rules(): readonly TariffRule[] {
    return this.indexed.map((r) => r.rule);
  }

  /** Active rule for the query, or null when nothing covers it. */
  find(tariffType: TariffType, date: string, timeClass: TimeClass): TariffRule | null {
    const key = `${tariffType}|${date}|${timeClass}`;
    const hit = this.cache.get(key);
    if (hit !== undefined) return hit;

    const candidates = this.indexed.filter(({ rule }) => {
      if (rule.tariffType !== tariffType) return false;
      if (date < rule.validityStart) return false;
      if (rule.validityEnd != null && date > rule.validityEnd) return false;
      return rule.timeClass === timeClass || rule.timeClass === "any";
    });

    candidates.sort(
      (a, b) =>
        a.widthDays - b.widthDays ||
        specificity(b.rule.timeClass) - specificity(a.rule.timeClass) ||
        a.index - b.index,
    );

    const found = candidates[0]?.rule ?? null;
    this.cache.set(key, found);
    return found;
  }
}

function specificity(tc: TariffTimeClass): number {
  return tc === "any" ? 0 : 1;
}

function buildRule(input: TariffRuleInput, index: number): TariffRule {
  if (!TARIFF_TYPES.includes(input?.tariffType)) {
    throw new TariffScheduleError(index, `unknown tariffType "${String(input?.tariffType)}"`);
  }
  const timeClass = input.timeClass ?? "any";
  if (!TIME_CLASSES.includes(timeClass)) {
    throw new TariffScheduleError(index, `unknown timeClass "${String(timeClass)}"`);
  }

  const validityStart = String(input.validityStart ?? "").trim();
  const startMs = dateMs(validityStart);
  if (startMs == null) throw new TariffScheduleError(index, `validityStart "${validityStart}" is not a YYYY-MM-DD date`);

  let validityEnd: string | null = null;
  if (input.validityEnd != null && String(input.validityEnd).trim() !== "") {
    validityEnd = String(input.validityEnd).trim();
    const endMs = dateMs(validityEnd);
    if (endMs == null) throw new TariffScheduleError(index, `validityEnd "${validityEnd}" is not a YYYY-MM-DD date`);
    if (endMs < startMs) throw new TariffScheduleError(index, "validityEnd is before validityStart");
  }

  const priceEurPerKwh = toDecimal(input.priceEurPerKwh);
  if (!priceEurPerKwh) throw new TariffScheduleError(index, "priceEurPerKwh is not a decimal");
  const surchargeEurPerKwh = input.surchargeEurPerKwh == null ? ZERO : toDecimal(input.surchargeEurPerKwh);
  if (!surchargeEurPerKwh) throw new TariffScheduleError(index, "surchargeEurPerKwh is not a decimal");

  return Object.freeze({
    tariffType: input.tariffType,
    validityStart,
    validityEnd,
    priceEurPerKwh,
    surchargeEurPerKwh,
    timeClass,
    label: typeof input.label === "string" && input.label.trim() ? input.label.trim() : null,
  });
}
