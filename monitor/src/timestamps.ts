import { InvalidDuration, UnsupportedTimestampType } from "./errors";
import { parseUnit } from "./units";

/** Client-side capture time, used when a row carries no timestamp of its own */
export const CAPTURE_TIME_KEY = "sppmonCaptureTimestampS";

/** Column names treated as timestamps by the classifier */
export const TIME_KEY_NAMES: readonly string[] = ["time", CAPTURE_TIME_KEY, "logTime"];

// Epoch values at or above this are treated as ms/µs/ns and scaled down.
// A second-precision timestamp past the year 5138 would be misread too.
const SECONDS_CEILING = 99_999_999_999;

export function nowSeconds(): number {
  return Math.round(Date.now() / 1000);
}

export function captureTimestamp(): [string, number] {
  return [CAPTURE_TIME_KEY, nowSeconds()];
}

/** Converts an epoch timestamp of any precision into integer epoch seconds */
export function toEpochSeconds(value: unknown): number {
  let stamp: number;
  if (typeof value === "string") {
    const trimmed = value.replace(/^ +| +$/g, "");
    if (/^-?\d+$/.test(trimmed)) {
      stamp = parseInt(trimmed, 10);
    } else if (/^-?\d+\.\d+$/.test(trimmed)) {
      stamp = parseFloat(trimmed);
    } else {
      throw new UnsupportedTimestampType(`unsupported timestamp value "${value}"`);
    }
  } else if (typeof value === "number" && Number.isFinite(value)) {
    stamp = value;
  } else {
    throw new UnsupportedTimestampType(`unsupported timestamp type ${typeof value}`);
  }

  while (stamp >= SECONDS_CEILING) {
    stamp /= 1000;
  }
  return Math.trunc(stamp);
}

// ─── Duration literals ──────────────────────────────────────────────

const DURATION_LITERAL = /^(\d+[smhdw])+$/;

export function isDurationLiteral(value: string): boolean {
  return DURATION_LITERAL.test(value);
}

/**
 * Re-renders a duration literal as `{h}h{m}m{s}s`, the form the server
 * reports policies in. `INF` (any case) is the infinite duration `0s`.
 */
export function canonicalDuration(value: string): string {
  if (!DURATION_LITERAL.test(value)) {
    if (value.toLowerCase() === "inf") return "0s";
    throw new InvalidDuration(`"${value}" is not a duration literal`);
  }

  let seconds = 0;
  for (const [, amount, unit] of value.matchAll(/(\d+)([a-z])/g)) {
    seconds += parseUnit(amount, unit) ?? 0;
  }

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h${minutes}m${seconds % 60}s`;
}
