/**
 * Field normalizer for free-text quantities ("5 oz", "1/2 cup", "15 mins").
 *
 * Deterministic and total: any input yields a NormalizedQuantity. A missing
 * number is `{ amount: 0, unit: "unknown" }`, which is a valid result and not
 * a failure.
 */

import type { NormalizedQuantity, QuantityUnit } from "./types";

// Leftmost match wins; at a given position the alternatives are tried in order:
// mixed number ("1 1/2"), simple fraction ("1/2"), decimal or integer.
const NUMERIC_TOKEN =
  /(\d+)\s+(\d+)\s*\/\s*(\d+)|(\d+)\s*\/\s*(\d+)|(\d+(?:\.\d+)?|\.\d+)/;

const UNIT_KEYWORDS: Record<string, QuantityUnit> = {
  oz: "ounce",
  ozs: "ounce",
  ounce: "ounce",
  ounces: "ounce",
  ml: "milliliter",
  mls: "milliliter",
  milliliter: "milliliter",
  milliliters: "milliliter",
  millilitre: "milliliter",
  millilitres: "milliliter",
  min: "minute",
  mins: "minute",
  minute: "minute",
  minutes: "minute",
  h: "hour",
  hr: "hour",
  hrs: "hour",
  hour: "hour",
  hours: "hour",
};

const NO_QUANTITY: NormalizedQuantity = { amount: 0, unit: "unknown" };

/**
 * Divide, treating a zero denominator as "no fraction" and keeping the numerator.
 */
function fraction(numerator: string, denominator: string): number {
  const n = Number(numerator);
  const d = Number(denominator);
  return d === 0 ? n : n / d;
}

function parseNumericToken(match: RegExpExecArray): number {
  const [, mixedWhole, mixedNum, mixedDen, num, den, plain] = match;
  if (mixedWhole !== undefined && mixedNum !== undefined && mixedDen !== undefined) {
    return Number(mixedWhole) + fraction(mixedNum, mixedDen);
  }
  if (num !== undefined && den !== undefined) {
    return fraction(num, den);
  }
  return plain !== undefined ? Number(plain) : 0;
}

function inferUnit(remainder: string): QuantityUnit {
  const words = remainder.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const unit = UNIT_KEYWORDS[word];
    if (unit) return unit;
  }
  return "unknown";
}

/**
 * Parse a quantity fragment. Hours are reported as minutes (×60).
 *
 * @example
 * normalizeQuantity("5 oz")     // { amount: 5, unit: "ounce" }
 * normalizeQuantity("1/2 cup")  // { amount: 0.5, unit: "unknown" }
 * normalizeQuantity("1.5 hrs")  // { amount: 90, unit: "minute" }
 */
export function normalizeQuantity(text: string | null | undefined): NormalizedQuantity {
  if (typeof text !== "string" || text.length === 0) return { ...NO_QUANTITY };

  const match = NUMERIC_TOKEN.exec(text);
  if (!match) return { ...NO_QUANTITY };

  const amount = parseNumericToken(match);
  if (!Number.isFinite(amount)) return { ...NO_QUANTITY };

  const remainder = text.slice(match.index + match[0].length);
  const unit = inferUnit(remainder);

  if (unit === "hour") {
    return { amount: amount * 60, unit: "minute" };
  }
  return { amount, unit };
}

export function isVolumeUnit(unit: QuantityUnit): unit is "ounce" | "milliliter" {
  return unit === "ounce" || unit === "milliliter";
}

/**
 * Duration in minutes for a normalized quantity. A bare number is read as
 * minutes; volumes carry no duration.
 */
export function toDurationMinutes(quantity: NormalizedQuantity): number {
  switch (quantity.unit) {
    case "minute":
    case "unknown":
      return quantity.amount;
    case "hour":
      return quantity.amount * 60;
    case "ounce":
    case "milliliter":
      return 0;
  }
}
