import { describe, expect, test } from "vitest";

import { parseFluviusCsv, parseLocalTimestamp } from "@/lib/usage/fluviusCsv";

const HEADER = "Van (datum);Van (tijdstip);Tot (datum);Tot (tijdstip);EAN;Register;Volume;Eenheid";
const EAN = "541400000000000001";

function fluvius(...rows: string[]): string {
  return [HEADER, ...rows].join("\r\n") + "\r\n";
}

function summarize(text: string) {
  return parseFluviusCsv(text).readings.map((r) => ({
    timestamp: r.timestamp,
    afname: String(r.afnameKwh),
    injectie: String(r.injectieKwh),
    meterId: r.meterId,
    sourceRow: r.sourceRow,
  }));
}

describe("parseLocalTimestamp", () => {
  test("accepts ISO and Belgian day-first formats", () => {
    expect(parseLocalTimestamp("2024-06-30 12:00")?.toFormat("yyyy-MM-dd HH:mm")).toBe("2024-06-30 12:00");
    expect(parseLocalTimestamp("30-06-2024 12:15:00")?.toFormat("yyyy-MM-dd HH:mm")).toBe("2024-06-30 12:15");
    expect(parseLocalTimestamp("30/06/2024 12:30")?.toFormat("yyyy-MM-dd HH:mm")).toBe("2024-06-30 12:30");
  });

  test("rejects values that carry an offset", () => {
    expect(parseLocalTimestamp("2024-06-30T12:00:00+02:00")).toBeNull();
    expect(parseLocalTimestamp("2024-06-30T12:00:00Z")).toBeNull();
    expect(parseLocalTimestamp("2024-05-01T12:00+01")).toBeNull();
    expect(parseLocalTimestamp("2024-05-01 12:00:00-0100")).toBeNull();
    expect(parseLocalTimestamp("2024-05-01T12:00z")).toBeNull();
    expect(parseLocalTimestamp("")).toBeNull();
  });
});

describe("parseFluviusCsv", () => {
  test("merges register rows into bidirectional readings and keeps the repeated hour", () => {
    const csv = fluvius(
      `27-10-2024;02:30:00;27-10-2024;02:45:00;${EAN};Afname Nacht;0,125;kWh`,
      `27-10-2024;02:30:00;27-10-2024;02:45:00;${EAN};Injectie Nacht;0,010;kWh`,
      `27-10-2024;02:30:00;27-10-2024;02:45:00;${EAN};Afname Nacht;0,200;kWh`,
      `27-10-2024;02:30:00;27-10-2024;02:45:00;${EAN};Injectie Nacht;0,000;kWh`,
      `27-10-2024;02:45:00;27-10-2024;03:00:00;${EAN};Afname Nacht;;kWh`,
    );
    const result = parseFluviusCsv(csv);
    expect(result.delimiter).toBe(";");
    expect(result.errors).toEqual([]);
    expect(summarize(csv)).toEqual([
      { timestamp: "2024-10-27T02:30:00", afname: "0.125", injectie: "0.01", meterId: EAN, sourceRow: 2 },
      { timestamp: "2024-10-27T02:30:00", afname: "0.2", injectie: "0", meterId: EAN, sourceRow: 4 },
    ]);
  });

  test("day and night registers for the same quarter add up", () => {
    const csv = fluvius(
      `01-05-2024;12:00:00;01-05-2024;12:15:00;${EAN};Afname Dag;0,100;kWh`,
      `01-05-2024;12:00:00;01-05-2024;12:15:00;${EAN};Afname Nacht;0,050;kWh`,
      `01-05-2024;12:00:00;01-05-2024;12:15:00;${EAN};Reactief;3,000;kVArh`,
    );
    expect(summarize(csv)).toEqual([
      { timestamp: "2024-05-01T12:00:00", afname: "0.15", injectie: "0", meterId: EAN, sourceRow: 2 },
    ]);
  });

  test("simple comma-separated layout with a BOM", () => {
    const csv = "\uFEFFtimestamp,afname_kwh,injectie_kwh,meter_id\n2024-06-30 12:00,1.5,0.25,M1\n2024-06-30 12:15,0.5,,M1\n";
    const result = parseFluviusCsv(csv);
    expect(result.delimiter).toBe(",");
    expect(summarize(csv)).toEqual([
      { timestamp: "2024-06-30T12:00:00", afname: "1.5", injectie: "0.25", meterId: "M1", sourceRow: 2 },
      { timestamp: "2024-06-30T12:15:00", afname: "0.5", injectie: "0", meterId: "M1", sourceRow: 3 },
    ]);
  });

  test("collects row problems with their row numbers", () => {
    const csv = [
      "timestamp;afname_kwh",
      "2024-06-30 12:00;abc",
      "not a date;1",
      "2024-06-30 12:07;1",
      "2024-06-30 12:30;-0,5",
      ";1",
      "2024-06-30 12:45;1",
    ].join("\n");
    const result = parseFluviusCsv(csv);
    expect(result.errors.map((e) => [e.row, e.code])).toEqual([
      [2, "invalid_value"],
      [3, "invalid_timestamp"],
      [4, "invalid_interval"],
      [5, "invalid_value"],
      [6, "missing_timestamp"],
    ]);
    expect(result.readings).toHaveLength(1);
  });

  test("an hour-only offset is an invalid timestamp, not a shifted reading", () => {
    const result = parseFluviusCsv("timestamp;afname_kwh\n2024-05-01T12:00+01;1\n");
    expect(result.readings).toEqual([]);
    expect(result.errors.map((e) => [e.row, e.code])).toEqual([[2, "invalid_timestamp"]]);
  });

  test("header problems", () => {
    expect(parseFluviusCsv("").errors.map((e) => e.code)).toEqual(["missing_header"]);
    expect(parseFluviusCsv("foo;bar\n1;2\n").errors.map((e) => e.code)).toEqual(["missing_columns"]);
    expect(parseFluviusCsv("timestamp;afname_kwh\n").errors.map((e) => e.code)).toEqual(["empty_data"]);
  });
});
