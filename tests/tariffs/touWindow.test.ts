import { describe, expect, test } from "vitest";

import { parseNaiveLocal } from "@/lib/time/localTime";
import { classifyTimeClass, formatPeakWindow, parsePeakWindow } from "@/lib/tariffs/touWindow";

function classify(ts: string, window?: { startMinute: number; endMinute: number }) {
  const local = parseNaiveLocal(ts);
  if (!local) throw new Error(`bad fixture ${ts}`);
  return classifyTimeClass(local, window);
}

describe("classifyTimeClass", () => {
  test("default window is 07:00-22:00, start inclusive, end exclusive", () => {
    expect(classify("2024-05-01T06:59:59")).toBe("off_peak");
    expect(classify("2024-05-01T07:00:00")).toBe("peak");
    expect(classify("2024-05-01T21:59:59")).toBe("peak");
    expect(classify("2024-05-01T22:00:00")).toBe("off_peak");
    expect(classify("2024-05-01T00:00:00")).toBe("off_peak");
  });

  test("weekends follow the clock too", () => {
    expect(classify("2024-05-04T12:00")).toBe("peak");
  });

  test("custom window", () => {
    const window = { startMinute: 8 * 60, endMinute: 20 * 60 };
    expect(classify("2024-05-01T07:45", window)).toBe("off_peak");
    expect(classify("2024-05-01T19:45", window)).toBe("peak");
    expect(classify("2024-05-01T20:00", window)).toBe("off_peak");
  });
});

describe("parsePeakWindow", () => {
  test("HHMM and HH:MM forms", () => {
    expect(parsePeakWindow("0700-2200")).toEqual({ startMinute: 420, endMinute: 1320 });
    expect(parsePeakWindow("07:00-22:00")).toEqual({ startMinute: 420, endMinute: 1320 });
    expect(parsePeakWindow("0000-2400")).toEqual({ startMinute: 0, endMinute: 1440 });
  });

  test("rejects overnight, empty and malformed windows", () => {
    expect(parsePeakWindow("2200-0700")).toBeNull();
    expect(parsePeakWindow("0700-0700")).toBeNull();
    expect(parsePeakWindow("2500-2600")).toBeNull();
    expect(parsePeakWindow("7-22")).toBeNull();
    expect(parsePeakWindow("")).toBeNull();
  });

  test("formats back to HHMM-HHMM", () => {
    expect(formatPeakWindow({ startMinute: 420, endMinute: 1320 })).toBe("0700-2200");
    expect(formatPeakWindow({ startMinute: 30, endMinute: 1440 })).toBe("0030-2400");
  });
});
