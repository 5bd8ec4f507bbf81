import type Decimal from "decimal.js";
import type { DateTime } from "luxon";

export type TariffType = "afname" | "injectie";

/** Clock-time classification of a reading. Rules may also use `any`. */
export type TimeClass = "peak" | "off_peak";
export type TariffTimeClass = TimeClass | "any";

export type Strictness = "fail_fast" | "best_effort";

export type Disambiguation = "first_occurrence" | "second_occurrence" | "n/a";

/** Local wall-clock time carried in the UTC zone, so its fields are the local clock fields. */
export type LocalWallTime = DateTime<true>;

/** Caller-facing reading shape; amounts may be numbers or decimal strings ("0,125" accepted). */
export type ReadingInput = {
  /** Naive local timestamp, `YYYY-MM-DDTHH:mm[:ss]` (space separator allowed) */
  timestamp: string;
  afnameKwh: Decimal.Value;
  injectieKwh?: Decimal.Value | null;
  meterId?: string | null;
  /** Line in the source file, when the parser knows it */
  sourceRow?: number | null;
};

export type Reading = Readonly<{
  /** Normalized `YYYY-MM-DDTHH:mm:ss` */
  timestamp: string;
  localTime: LocalWallTime;
  afnameKwh: Decimal;
  injectieKwh: Decimal;
  meterId: string | null;
  /** 0-based index in the input sequence */
  position: number;
  sourceRow: number | null;
}>;

export type ResolvedInstant = Readonly<{
  reading: Reading;
  /** True UTC instant of the interval start */
  instant: Date;
  offsetMinutes: number;
  isAmbiguous: boolean;
  // Skipped wall times fail resolution, so a returned value always has this false.
  isSkipped: boolean;
  disambiguation: Disambiguation;
}>;

export type CostLine = Readonly<{
  reading: Reading;
  instant: Date;
  disambiguation: Disambiguation;
  timeClass: TimeClass;
  /** YYYY-MM-DD, local */
  localDate: string;
  /** YYYY-MM, local */
  monthBucket: string;
  priceAfname: Decimal;
  priceInjectie: Decimal;
  costAfname: Decimal;
  costInjectie: Decimal;
  /** costAfname - costInjectie */
  netCost: Decimal;
}>;

export type MonthlyUsage = { afnameKwh: Decimal; injectieKwh: Decimal };

export type AggregateReport = {
  totalCost: Decimal;
  totalCostAfname: Decimal;
  totalCostInjectie: Decimal;
  totalAfnameKwh: Decimal;
  totalInjectieKwh: Decimal;
  /** YYYY-MM -> net cost, in order of first appearance */
  monthly: Record<string, Decimal>;
  monthlyUsage: Record<string, MonthlyUsage>;
  /** YYYY-MM-DD -> net cost */
  daily: Record<string, Decimal>;
  /** YYYY -> net cost */
  yearly: Record<string, Decimal>;
  /** Both keys are always present */
  peakVsOffPeak: Record<TimeClass, Decimal>;
  afnameKwhByTimeClass: Record<TimeClass, Decimal>;
  /** Peak afname kWh / total afname kWh; 0 without afname */
  peakShare: Decimal;
};

export type SkippedReading = {
  position: number;
  sourceRow: number | null;
  timestamp: string;
  meterId: string | null;
  code: string;
  message: string;
};

export type AmbiguousLocalTimeNotice = {
  code: "AMBIGUOUS_LOCAL_TIME";
  position: number;
  timestamp: string;
  meterId: string | null;
  disambiguation: Exclude<Disambiguation, "n/a">;
};

export type RunMetadata = {
  zone: string;
  strictness: Strictness;
  /** Peak window the run classified with, `HHMM-HHMM` */
  peakWindow: string;
  readingCount: number;
  pricedCount: number;
  skippedCount: number;
  ambiguousCount: number;
  skipped: SkippedReading[];
  ambiguous: AmbiguousLocalTimeNotice[];
  /** Earliest and latest priced local timestamps; null when nothing was priced */
  dateRange: { from: string; to: string } | null;
  monthsCovered: number;
};

export type ReferenceComparison = {
  priceEurPerKwh: Decimal;
  referenceCost: Decimal;
  difference: Decimal;
  /** 0 when the reference cost is 0 */
  differencePct: Decimal;
  monthly: Record<string, Decimal>;
};

export type CostReport = {
  aggregate: AggregateReport;
  metadata: RunMetadata;
  averageMonthlyCost: Decimal;
  reference: ReferenceComparison | null;
};
