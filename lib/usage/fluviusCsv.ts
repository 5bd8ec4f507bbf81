import Decimal from "decimal.js";
import { DateTime } from "luxon";

import { toDecimal } from "@/lib/cost/decimal";
import type { ReadingInput } from "@/lib/cost/types";
import { detectDelimiter, findHeader, splitCsvRows, stripBom } from "./csv";

export type ParsingErrorCode =
  | "missing_header"
  | "missing_columns"
  | "missing_timestamp"
  | "invalid_timestamp"
  | "invalid_value"
  | "invalid_interval"
  | "empty_data";

export type ParsingError = { code: ParsingErrorCode; message: string; row: number | null };

export type FluviusParseResult = { readings: ReadingInput[]; errors: ParsingError[]; delimiter: string };

const INTERVAL_MINUTES = 15;

const TIMESTAMP_HEADERS = ["timestamp", "tijdstip"];
const DATE_HEADERS = ["van (datum)", "datum"];
const TIME_HEADERS = ["van (tijdstip)", "tijd", "uur"];
const REGISTER_HEADERS = ["register"];
const VOLUME_HEADERS = ["volume", "waarde", "value", "kwh", "verbruik"];
const AFNAME_HEADERS = ["afname_kwh", "afname"];
const INJECTIE_HEADERS = ["injectie_kwh", "injectie"];
const METER_HEADERS = ["ean", "meter_id", "meter"];

const DATE_TIME_FORMATS = [
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd HH:mm:ss",
  "dd-MM-yyyy HH:mm",
  "dd-MM-yyyy HH:mm:ss",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy HH:mm:ss",
];

/** Normalized naive `YYYY-MM-DDTHH:mm:ss`, or null. Values with an offset are refused. */
export function parseLocalTimestamp(raw: string): DateTime<true> | null {
  const s = raw.trim();
  if (!s) return null;
  if (/[T ]\d{2}:\d{2}.*([Zz]|[+-]\d{2}(:?\d{2})?)$/.test(s)) return null;

  const iso = DateTime.fromISO(s.replace(" ", "T"), { zone: "utc" });
  if (iso.isValid) return iso;

  for (const fmt of DATE_TIME_FORMATS) {
    const dt = DateTime.fromFormat(s, fmt, { zone: "utc" });
    if (dt.isValid) return dt;
  }
  return null;
}

type Flow = "afname" | "injectie";

function flowOfRegister(register: string): Flow | null {
  const r = register.toLowerCase();
  if (r.includes("afname")) return "afname";
  if (r.includes("injectie")) return "injectie";
  return null;
}

type Slot = { timestamp: string; meterId: string | null; afname: Decimal; injectie: Decimal; sourceRow: number };

/**
 * Parse a Fluvius quarter-hour export (or a simple `timestamp;afname_kwh;injectie_kwh` file)
 * into readings in file order. Register rows for the same meter and wall time are merged
 * into one bidirectional reading; the n-th row of a register for a wall time goes to the
 * n-th reading, so a repeated fall-back hour stays two readings. Rows are not deduplicated
 * and gaps are not filled.
 */
export function parseFluviusCsv(text: string): FluviusParseResult {
  const errors: ParsingError[] = [];
  const csv = stripBom(text);
  const firstLine = csv.split(/\r?\n/, 1)[0] ?? "";
  const delimiter = detectDelimiter(firstLine);

  const rows = splitCsvRows(csv, delimiter);
  const header = rows[0]?.map((h) => h.trim()) ?? [];
  if (header.length === 0 || header.every((h) => !h)) {
    errors.push({ code: "missing_header", message: "CSV file has no header line.", row: null });
    return { readings: [], errors, delimiter };
  }

  const idx = {
    timestamp: findHeader(header, TIMESTAMP_HEADERS),
    date: findHeader(header, DATE_HEADERS),
    time: findHeader(header, TIME_HEADERS),
    register: findHeader(header, REGISTER_HEADERS),
    volume: findHeader(header, VOLUME_HEADERS),
    afname: findHeader(header, AFNAME_HEADERS),
    injectie: findHeader(header, INJECTIE_HEADERS),
    meter: findHeader(header, METER_HEADERS),
  };

  const hasTime = idx.timestamp !== -1 || (idx.date !== -1 && idx.time !== -1);
  const hasValue = idx.volume !== -1 || idx.afname !== -1;
  if (!hasTime || !hasValue) {
    errors.push({
      code: "missing_columns",
      message: "Expected columns timestamp/value or date/time/value.",
      row: null,
    });
    return { readings: [], errors, delimiter };
  }

  const slots = new Map<string, Slot>();
  const occurrences = new Map<string, number>();

  rows.slice(1).forEach((row, i) => {
    const rowNumber = i + 2;
    if (row.every((cell) => !cell.trim())) return;
    const cell = (col: number) => (col === -1 ? "" : (row[col] ?? "").trim());

    const register = cell(idx.register);
    const registerFlow = idx.register !== -1 ? flowOfRegister(register) : null;
    if (idx.register !== -1 && !registerFlow) return;

    const values: Array<[Flow, string]> = [];
    if (registerFlow && idx.volume !== -1) {
      values.push([registerFlow, cell(idx.volume)]);
    } else {
      if (idx.afname !== -1) values.push(["afname", cell(idx.afname)]);
      else if (idx.volume !== -1) values.push(["afname", cell(idx.volume)]);
      if (idx.injectie !== -1) values.push(["injectie", cell(idx.injectie)]);
    }
    // Blank volumes are intervals the grid operator has not measured; they are not readings.
    const present = values.filter(([, raw]) => raw !== "");
    if (present.length === 0) return;

    const rawTs =
      idx.date !== -1 && idx.time !== -1 ? `${cell(idx.date)} ${cell(idx.time)}`.trim() : cell(idx.timestamp);
    if (!rawTs) {
      errors.push({ code: "missing_timestamp", message: "Date or time is missing.", row: rowNumber });
      return;
    }
    const local = parseLocalTimestamp(rawTs);
    if (!local) {
      errors.push({ code: "invalid_timestamp", message: `Invalid timestamp: ${rawTs}.`, row: rowNumber });
      return;
    }
    if (local.minute % INTERVAL_MINUTES !== 0 || local.second !== 0) {
      errors.push({
        code: "invalid_interval",
        message: `Timestamp is not on a ${INTERVAL_MINUTES}-minute boundary: ${rawTs}.`,
        row: rowNumber,
      });
      return;
    }

    const parsed: Array<[Flow, Decimal]> = [];
    for (const [flow, raw] of present) {
      const value = toDecimal(raw);
      if (!value || value.isNegative()) {
        errors.push({ code: "invalid_value", message: `Invalid value: ${raw}.`, row: rowNumber });
        return;
      }
      parsed.push([flow, value]);
    }

    const timestamp = local.toFormat("yyyy-MM-dd'T'HH:mm:ss");
    const meterId = cell(idx.meter) || null;
    const wallKey = `${meterId ?? ""}|${timestamp}`;
    const occurrenceKey = `${wallKey}|${register.toLowerCase()}`;
    const n = occurrences.get(occurrenceKey) ?? 0;
    occurrences.set(occurrenceKey, n + 1);

    const slotKey = `${wallKey}#${n}`;
    const slot = slots.get(slotKey) ?? {
      timestamp,
      meterId,
      afname: new Decimal(0),
      injectie: new Decimal(0),
      sourceRow: rowNumber,
    };
    for (const [flow, value] of parsed) {
      if (flow === "afname") slot.afname = slot.afname.plus(value);
      else slot.injectie = slot.injectie.plus(value);
    }
    slots.set(slotKey, slot);
  });

  const readings: ReadingInput[] = Array.from(slots.values(), (s) => ({
    timestamp: s.timestamp,
    afnameKwh: s.afname,
    injectieKwh: s.injectie,
    meterId: s.meterId,
    sourceRow: s.sourceRow,
  }));

  if (readings.length === 0 && errors.length === 0) {
    errors.push({ code: "empty_data", message: "No interval values found.", row: null });
  }
  if (errors.length > 0) {
    console.warn(`[fluvius-csv] ${errors.length} row problem(s); first: ${errors[0]?.message}`);
  }

  return { readings, errors, delimiter };
}
