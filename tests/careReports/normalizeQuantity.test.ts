import { describe, it, expect } from "vitest";
import {
  isVolumeUnit,
  normalizeQuantity,
  toDurationMinutes,
} from "@/lib/careReports/normalizeQuantity";

describe("normalizeQuantity", () => {
  it.each([
    ["5 oz", 5, "ounce"],
    ["5oz", 5, "ounce"],
    ["4.5 ounces", 4.5, "ounce"],
    ["120ml", 120, "milliliter"],
    ["120 mL formula", 120, "milliliter"],
    ["15 mins", 15, "minute"],
    ["20 minutes", 20, "minute"],
    ["1/2 cup", 0.5, "unknown"],
    ["1 1/2 oz", 1.5, "ounce"],
    ["1.5 hrs", 90, "minute"],
    ["2 hours", 120, "minute"],
    ["about 3", 3, "unknown"],
    [".5 oz", 0.5, "ounce"],
  ] as const)("parses %j", (text, amount, unit) => {
    expect(normalizeQuantity(text)).toEqual({ amount, unit });
  });

  it("returns unknown zero when there is no number", () => {
    expect(normalizeQuantity("a few sips")).toEqual({ amount: 0, unit: "unknown" });
    expect(normalizeQuantity("")).toEqual({ amount: 0, unit: "unknown" });
    expect(normalizeQuantity(null)).toEqual({ amount: 0, unit: "unknown" });
    expect(normalizeQuantity(undefined)).toEqual({ amount: 0, unit: "unknown" });
  });

  it("keeps the numerator when the denominator is zero", () => {
    expect(normalizeQuantity("3/0 oz")).toEqual({ amount: 3, unit: "ounce" });
  });

  it("matches unit keywords as whole words only", () => {
    // "hmm" must not be read as "h"
    expect(normalizeQuantity("10 hmm")).toEqual({ amount: 10, unit: "unknown" });
  });

  it("uses the first unit keyword after the number", () => {
    expect(normalizeQuantity("4 oz over 20 min")).toEqual({ amount: 4, unit: "ounce" });
  });

  it("is deterministic", () => {
    expect(normalizeQuantity("6 oz")).toEqual(normalizeQuantity("6 oz"));
  });
});

describe("isVolumeUnit", () => {
  it("is true only for ounce and milliliter", () => {
    expect(isVolumeUnit("ounce")).toBe(true);
    expect(isVolumeUnit("milliliter")).toBe(true);
    expect(isVolumeUnit("minute")).toBe(false);
    expect(isVolumeUnit("unknown")).toBe(false);
  });
});

describe("toDurationMinutes", () => {
  it("reads minutes and bare numbers as minutes", () => {
    expect(toDurationMinutes({ amount: 15, unit: "minute" })).toBe(15);
    expect(toDurationMinutes({ amount: 12, unit: "unknown" })).toBe(12);
  });

  it("converts hours and ignores volumes", () => {
    expect(toDurationMinutes({ amount: 2, unit: "hour" })).toBe(120);
    expect(toDurationMinutes({ amount: 4, unit: "ounce" })).toBe(0);
  });
});
