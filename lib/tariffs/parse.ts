import { z } from "zod";

import { detectDelimiter, findHeader, splitCsvRows, stripBom } from "@/lib/usage/csv";
import type { TariffRuleInput } from "./schedule";

const IsoDateSchema = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const DecimalLikeSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^[-+]?\d+([.,]\d+)?$/, "expected a decimal number"),
]);

export const TariffRuleRowSchema = z.object({
  tariff_type: z.enum(["afname", "injectie"]),
  validity_start: IsoDateSchema,
  validity_end: IsoDateSchema.nullable().optional(),
  price_eur_per_kwh: DecimalLikeSchema,
  surcharge_eur_per_kwh: DecimalLikeSchema.optional(),
  time_class: z.enum(["peak", "off_peak", "any"]).default("any"),
  label: z.string().optional(),
});

export type TariffRuleRow = z.infer<typeof TariffRuleRowSchema>;

/** Either a bare array of rules or `{ "rules": [...] }`. */
export const TariffFileSchema = z.preprocess(
  (v) => (v !== null && typeof v === "object" && !Array.isArray(v) && "rules" in v ? v.rules : v),
  z.array(TariffRuleRowSchema),
);

export class TariffInputError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid tariff input: ${issues.join("; ")}`);
    this.name = "TariffInputError";
    this.issues = issues;
  }
}

export function rowToRuleInput(row: TariffRuleRow): TariffRuleInput {
  return {
    tariffType: row.tariff_type,
    validityStart: row.validity_start,
    validityEnd: row.validity_end ?? null,
    priceEurPerKwh: row.price_eur_per_kwh,
    surchargeEurPerKwh: row.surcharge_eur_per_kwh ?? null,
    timeClass: row.time_class,
    label: row.label ?? null,
  };
}

/** Validate an already-decoded JSON value into rule inputs for `TariffSchedule.from`. */
export function parseTariffRules(input: unknown): TariffRuleInput[] {
  const parsed = TariffFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new TariffInputError(
      parsed.error.issues.map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`),
    );
  }
  return parsed.data.map(rowToRuleInput);
}

export function parseTariffJson(text: string): TariffRuleInput[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    throw new TariffInputError([`(root): not valid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }
  return parseTariffRules(decoded);
}

const TARIFF_CSV_COLUMNS = {
  tariff_type: ["tariff_type", "type"],
  validity_start: ["validity_start", "valid_from"],
  validity_end: ["validity_end", "valid_to"],
  price_eur_per_kwh: ["price_eur_per_kwh", "base_price_eur_per_kwh", "price"],
  surcharge_eur_per_kwh: ["surcharge_eur_per_kwh", "surcharge"],
  time_class: ["time_class"],
  label: ["label"],
} satisfies Record<keyof TariffRuleRow, string[]>;

const REQUIRED_CSV_COLUMNS = ["tariff_type", "validity_start", "price_eur_per_kwh"] as const;

/**
 * Tariff rules from CSV, one rule per line, with the JSON field names as headers
 * (`;` or `,` separated). Blank cells are treated as absent. Issues name the file row.
 */
export function parseTariffCsv(text: string): TariffRuleInput[] {
  const csv = stripBom(text);
  const delimiter = detectDelimiter(csv.split(/\r?\n/, 1)[0] ?? "");
  const [header = [], ...body] = splitCsvRows(csv, delimiter);

  const columns = Object.entries(TARIFF_CSV_COLUMNS).map(([key, names]) => ({ key, idx: findHeader(header, names) }));
  const missing = REQUIRED_CSV_COLUMNS.filter((key) => columns.some((c) => c.key === key && c.idx === -1));
  if (missing.length > 0) throw new TariffInputError([`(header): missing column(s) ${missing.join(", ")}`]);

  const rows: Array<Record<string, string>> = [];
  const rowNumbers: number[] = [];
  body.forEach((cells, i) => {
    if (cells.every((cell) => !cell.trim())) return;
    const row: Record<string, string> = {};
    for (const { key, idx } of columns) {
      const value = idx === -1 ? "" : (cells[idx] ?? "").trim();
      if (value !== "") row[key] = value;
    }
    rows.push(row);
    rowNumbers.push(i + 2);
  });

  const parsed = TariffFileSchema.safeParse(rows);
  if (!parsed.success) {
    throw new TariffInputError(
      parsed.error.issues.map((issue) => {
        const [index, ...field] = issue.path;
        const row = typeof index === "number" ? `row ${rowNumbers[index] ?? index + 2}` : "(root)";
        return `${[row, ...field].join(".")}: ${issue.message}`;
      }),
    );
  }
  return parsed.data.map(rowToRuleInput);
}
