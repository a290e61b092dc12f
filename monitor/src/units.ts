import Decimal from "decimal.js";
import { NotNumeric, UnrecognizedUnit } from "./errors";

// ─── Unit table ─────────────────────────────────────────────────────
// Every multiplier converts into the base unit: bytes for sizes,
// seconds for durations. Sizes are bytes, never bits.

const NO_UNIT = "no type";

export const UNIT_MULTIPLIERS: Readonly<Record<string, number>> = {
  [NO_UNIT]: 1,

  b: 1,

  k: 2 ** 10,
  ki: 2 ** 10,
  kib: 2 ** 10,
  kb: 10 ** 3,

  mi: 2 ** 20,
  mib: 2 ** 20,
  mb: 10 ** 6,

  g: 2 ** 30,
  gi: 2 ** 30,
  gib: 2 ** 30,
  gb: 10 ** 9,

  t: 2 ** 40,
  ti: 2 ** 40,
  tib: 2 ** 40,
  tb: 10 ** 12,

  // "m" is minutes; megabytes must be written mb or mib
  "second(s)": 1,
  second: 1,
  s: 1,

  "min(s)": 60,
  m: 60,

  "hour(s)": 60 * 60,
  h: 60 * 60,

  d: 60 * 60 * 24,

  w: 60 * 60 * 24 * 7,
};

const COMPOUND_TOKEN = /^(?:-?\d+(?:\.\d+)?[a-zA-Z]+)+$/;
const VALUE_UNIT_PAIR = /(-?\d+(?:\.\d+)?)([a-zA-Z]+)/g;
const LEADING_UNIT = /^(\D+)/;

function multiplierOf(unit: string, value: string, data: string): Decimal {
  const multiplier = UNIT_MULTIPLIERS[unit.toLowerCase()];
  if (multiplier === undefined) {
    throw new UnrecognizedUnit(`no known unit "${unit}" for value "${value}" in "${data}"`);
  }
  return new Decimal(multiplier);
}

function numeric(value: string): Decimal {
  if (/^-?\d+$/.test(value) || /^-?\d+\.\d+$/.test(value)) {
    return new Decimal(value);
  }
  throw new NotNumeric(`value is not numeric: "${value}"`);
}

/**
 * Parses a human formatted size or duration ("10GB", "10 GB", "1h30m")
 * into the base unit. Tokens split by `delimiter` are summed; the result is
 * rounded half to even.
 *
 * `givenUnit` applies to every token and disables unit detection.
 */
export function parseUnit(
  data: string | number | null | undefined,
  givenUnit?: string,
  delimiter = " ",
): number | null {
  if (data === null || data === undefined || data === "") return null;
  if (typeof data === "number") return data;
  if (data === "null") return null;

  const parts = data.split(delimiter).map((part) => part.replace(/^ +| +$/g, ""));
  let total = new Decimal(0);

  let i = 0;
  while (i < parts.length) {
    const token = parts[i];
    i++;

    if (givenUnit) {
      total = total.plus(numeric(token).times(multiplierOf(givenUnit, token, data)));
      continue;
    }

    if (COMPOUND_TOKEN.test(token)) {
      for (const [, value, unit] of token.matchAll(VALUE_UNIT_PAIR)) {
        total = total.plus(numeric(value).times(multiplierOf(unit, value, data)));
      }
      continue;
    }

    let unit = NO_UNIT;
    if (i < parts.length) {
      const next = LEADING_UNIT.exec(parts[i]);
      if (next) {
        unit = next[1];
        i++;
      }
    }
    total = total.plus(numeric(token).times(multiplierOf(unit, token, data)));
  }

  return total.toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).toNumber();
}
