import { describe, expect, test } from "vitest";

import { parseTariffCsv, parseTariffJson, parseTariffRules, TariffInputError } from "@/lib/tariffs/parse";
import { TariffSchedule, unitPrice } from "@/lib/tariffs/schedule";

describe("parseTariffRules", () => {
  test("maps snake_case rows and defaults time_class to any", () => {
    expect(
      parseTariffRules([
        { tariff_type: "afname", validity_start: "2024-01-01", validity_end: "2024-12-31", price_eur_per_kwh: "0,31" },
      ]),
    ).toEqual([
      {
        tariffType: "afname",
        validityStart: "2024-01-01",
        validityEnd: "2024-12-31",
        priceEurPerKwh: "0,31",
        surchargeEurPerKwh: null,
        timeClass: "any",
        label: null,
      },
    ]);
  });

  test("accepts the { rules } wrapper", () => {
    const rules = parseTariffRules({
      rules: [
        { tariff_type: "injectie", validity_start: "2024-01-01", price_eur_per_kwh: 0.04, time_class: "peak", label: "Inj" },
      ],
    });
    expect(rules).toHaveLength(1);
    expect(rules[0]?.timeClass).toBe("peak");
    expect(rules[0]?.validityEnd).toBeNull();
    expect(rules[0]?.label).toBe("Inj");
  });

  test("reports each problem with its path", () => {
    try {
      parseTariffRules([{ tariff_type: "afname", validity_start: "2024/01/01" }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TariffInputError);
      if (err instanceof TariffInputError) {
        expect(err.issues).toEqual(["0.validity_start: expected YYYY-MM-DD", "0.price_eur_per_kwh: Required"]);
      }
    }
  });
});

describe("parseTariffJson", () => {
  test("decodes JSON text", () => {
    const rules = parseTariffJson('[{"tariff_type":"afname","validity_start":"2024-01-01","price_eur_per_kwh":"0.3"}]');
    expect(rules[0]?.priceEurPerKwh).toBe("0.3");
  });

  test("invalid JSON is a TariffInputError", () => {
    expect(() => parseTariffJson("{not json")).toThrow(/^Invalid tariff input: \(root\): not valid JSON/);
  });
});

describe("parseTariffCsv", () => {
  test("reads ;-separated rules, blank cells as absent", () => {
    const csv = [
      "tariff_type;validity_start;validity_end;price_eur_per_kwh;surcharge_eur_per_kwh;time_class;label",
      "afname;2024-01-01;;0,28;0,02;peak;Piek",
      "injectie;2024-01-01;;0;;;",
      "",
    ].join("\n");
    expect(parseTariffCsv(csv)).toEqual([
      {
        tariffType: "afname",
        validityStart: "2024-01-01",
        validityEnd: null,
        priceEurPerKwh: "0,28",
        surchargeEurPerKwh: "0,02",
        timeClass: "peak",
        label: "Piek",
      },
      {
        tariffType: "injectie",
        validityStart: "2024-01-01",
        validityEnd: null,
        priceEurPerKwh: "0",
        surchargeEurPerKwh: null,
        timeClass: "any",
        label: null,
      },
    ]);
  });

  test("accepts comma separation and alternative header names", () => {
    const rules = parseTariffCsv("type,valid_from,base_price_eur_per_kwh\r\nafname,2024-07-01,0.35\r\n");
    const rule = TariffSchedule.from(rules).find("afname", "2024-07-01", "peak");
    expect(rule && unitPrice(rule).toString()).toBe("0.35");
  });

  test("missing required columns", () => {
    expect(() => parseTariffCsv("tariff_type;validity_start\nafname;2024-01-01\n")).toThrow(
      "Invalid tariff input: (header): missing column(s) price_eur_per_kwh",
    );
  });

  test("issues name the file row", () => {
    const csv = "tariff_type;validity_start;price_eur_per_kwh\nafname;2024-01-01;0.3\n\nstroom;2024-01-01;0.3\n";
    try {
      parseTariffCsv(csv);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TariffInputError);
      if (err instanceof TariffInputError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]?.startsWith("row 4.tariff_type: ")).toBe(true);
      }
    }
  });
});

