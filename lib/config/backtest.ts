import { z } from "zod";

import { DEFAULT_PEAK_WINDOW, parsePeakWindow, type PeakWindow } from "@/lib/tariffs/touWindow";
import type { Strictness } from "@/lib/cost/types";

export type BacktestConfig = {
  zone: string;
  strictness: Strictness;
  referencePriceEurPerKwh: string | null;
  peakWindow: PeakWindow;
  decimals: number;
  years: { from: number; to: number } | null;
  includeLines: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** "1", "true", "yes", "on" (any case) are true; unset uses the default. */
export function flagBoolSync(value: string | undefined, defaultVal = false): boolean {
  if (value == null) return defaultVal;
  const v = value.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  BACKTEST_TIMEZONE: z.preprocess(blankToUndefined, z.string().trim().default("Europe/Brussels")),
  BACKTEST_STRICTNESS: z.preprocess(blankToUndefined, z.enum(["fail_fast", "best_effort"]).default("fail_fast")),
  BACKTEST_REFERENCE_PRICE_EUR_PER_KWH: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^\d+([.,]\d+)?$/, "expected a decimal price")
      .optional(),
  ),
  BACKTEST_PEAK_WINDOW: z.preprocess(blankToUndefined, z.string().trim().optional()),
  BACKTEST_DECIMALS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(6).default(2)),
  BACKTEST_YEARS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^\d{4}(-\d{4})?$/, "expected YYYY or YYYY-YYYY")
      .optional(),
  ),
  BACKTEST_INCLUDE_LINES: z.string().optional(),
});

function parseYears(v: string | undefined): { from: number; to: number } | null {
  if (!v) return null;
  const [from, to] = v.split("-").map(Number);
  if (from == null) return null;
  const end = to ?? from;
  if (end < from) throw new ConfigError(`BACKTEST_YEARS: ${v} ends before it starts`);
  return { from, to: end };
}

/** Reads the BACKTEST_* variables; scripts load `.env` through dotenv before calling this. */
export function loadBacktestConfig(env: NodeJS.ProcessEnv = process.env): BacktestConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }
  const e = parsed.data;

  let peakWindow = DEFAULT_PEAK_WINDOW;
  if (e.BACKTEST_PEAK_WINDOW) {
    const w = parsePeakWindow(e.BACKTEST_PEAK_WINDOW);
    if (!w) throw new ConfigError(`BACKTEST_PEAK_WINDOW: "${e.BACKTEST_PEAK_WINDOW}" is not HHMM-HHMM`);
    peakWindow = w;
  }

  return {
    zone: e.BACKTEST_TIMEZONE,
    strictness: e.BACKTEST_STRICTNESS,
    referencePriceEurPerKwh: e.BACKTEST_REFERENCE_PRICE_EUR_PER_KWH?.replace(",", ".") ?? null,
    peakWindow,
    decimals: e.BACKTEST_DECIMALS,
    years: parseYears(e.BACKTEST_YEARS),
    includeLines: flagBoolSync(e.BACKTEST_INCLUDE_LINES, false),
  };
}
