import type { LocalWallTime, TimeClass } from "@/lib/cost/types";

/** Half-open peak window in minutes after local midnight: [startMinute, endMinute). */
export type PeakWindow = Readonly<{ startMinute: number; endMinute: number }>;

export const DEFAULT_PEAK_WINDOW: PeakWindow = { startMinute: 7 * 60, endMinute: 22 * 60 };

function parseHHMMishToMinutes(v: unknown): number | null {
  const s = String(v ?? "").trim();
  if (!s) return null;

  const m = s.match(/^(\d{1,2}):?(\d{2})$/);
  if (!m) return null;
  const [, hhRaw, mmRaw] = m;
  const hh = Number(hhRaw);
  const mm = Number(mmRaw);
  if (!Number.isInteger(hh) || !Number.isInteger(mm)) return null;
  if (hh === 24 && mm === 0) return 1440;
  if (hh < 0 || hh > 23) return null;
  if (mm < 0 || mm > 59) return null;
  return hh * 60 + mm;
}

function minutesToHHMM(minutes: number): string {
  return `${String(Math.floor(minutes / 60)).padStart(2, "0")}${String(minutes % 60).padStart(2, "0")}`;
}

/**
 * "0700-2200" or "07:00-22:00". Overnight and zero-length windows are rejected:
 * everything outside the window is off-peak, so an overnight peak is written as its complement.
 */
export function parsePeakWindow(v: string): PeakWindow | null {
  const parts = String(v ?? "").split("-");
  if (parts.length !== 2) return null;
  const [startRaw, endRaw] = parts;
  const startMinute = parseHHMMishToMinutes(startRaw);
  const endMinute = parseHHMMishToMinutes(endRaw);
  if (startMinute == null || endMinute == null) return null;
  if (endMinute <= startMinute) return null;
  return { startMinute, endMinute };
}

export function formatPeakWindow(w: PeakWindow): string {
  return `${minutesToHHMM(w.startMinute)}-${minutesToHHMM(w.endMinute)}`;
}

/** Derived from the local clock only: peak iff clock time is in [start, end). */
export function classifyTimeClass(local: LocalWallTime, window: PeakWindow = DEFAULT_PEAK_WINDOW): TimeClass {
  const seconds = local.hour * 3600 + local.minute * 60 + local.second;
  return seconds >= window.startMinute * 60 && seconds < window.endMinute * 60 ? "peak" : "off_peak";
}
