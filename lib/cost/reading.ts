import { formatWall, parseNaiveLocal } from "@/lib/time/localTime";
import { toDecimal } from "./decimal";
import { MalformedReadingError } from "./errors";
import type { Reading, ReadingInput } from "./types";

function meterIdOrNull(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const s = v.trim();
  return s ? s : null;
}

function rowOrNull(v: unknown): number | null {
  return typeof v === "number" && Number.isInteger(v) ? v : null;
}

/**
 * Build an immutable Reading. Rows should arrive clean from the parser; anything that
 * does not is a precondition violation and raises MalformedReadingError.
 */
export function createReading(input: ReadingInput, position: number): Reading {
  const meterId = meterIdOrNull(input?.meterId);
  const sourceRow = rowOrNull(input?.sourceRow);
  const rawTimestamp = typeof input?.timestamp === "string" ? input.timestamp.trim() : "";
  const ref = { position, sourceRow, timestamp: rawTimestamp, meterId };

  const localTime = parseNaiveLocal(rawTimestamp);
  if (!localTime) throw new MalformedReadingError(ref, `timestamp "${rawTimestamp}" is not a naive local date-time`);

  const afnameKwh = toDecimal(input.afnameKwh);
  if (!afnameKwh) throw new MalformedReadingError(ref, "afnameKwh is not a decimal");
  if (afnameKwh.isNegative()) throw new MalformedReadingError(ref, "afnameKwh is negative");

  const injectieKwh = input.injectieKwh == null ? toDecimal(0) : toDecimal(input.injectieKwh);
  if (!injectieKwh) throw new MalformedReadingError(ref, "injectieKwh is not a decimal");
  if (injectieKwh.isNegative()) throw new MalformedReadingError(ref, "injectieKwh is negative");

  return Object.freeze({
    timestamp: formatWall(localTime),
    localTime,
    afnameKwh,
    injectieKwh,
    meterId,
    position,
    sourceRow,
  });
}
