import type { DateUnit } from "../types/spec.js";

/**
 * Pattern-based date handling for the `formatDate` / `offsetDate` actions.
 *
 * Tokens: yyyy MM dd HH mm ss SSS. Any other character is literal, and text
 * inside single quotes is always literal (`''` is a quote). Values are UTC
 * wall-clock date-times; no zone conversion happens.
 */

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

type Field = keyof DateParts;

type PatternPart =
  | { kind: "literal"; text: string }
  | { kind: "field"; field: Field; width: number };

const TOKENS: ReadonlyArray<readonly [string, Field]> = [
  ["yyyy", "year"],
  ["SSS", "millisecond"],
  ["MM", "month"],
  ["dd", "day"],
  ["HH", "hour"],
  ["mm", "minute"],
  ["ss", "second"],
];

/** ISO-8601 shapes recognised by `offsetDate` when no pattern is given. */
export const ISO_PATTERNS: ReadonlyArray<string> = [
  "yyyy-MM-dd'T'HH:mm:ss.SSS'Z'",
  "yyyy-MM-dd'T'HH:mm:ss'Z'",
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd",
];

const compiled = new Map<string, ReadonlyArray<PatternPart>>();

export function compilePattern(pattern: string): ReadonlyArray<PatternPart> {
  const hit = compiled.get(pattern);
  if (hit) return hit;

  const parts: PatternPart[] = [];
  const literal = (text: string) => {
    const last = parts[parts.length - 1];
    if (last?.kind === "literal") last.text += text;
    else parts.push({ kind: "literal", text });
  };

  let i = 0;
  while (i < pattern.length) {
    if (pattern[i] === "'") {
      if (pattern[i + 1] === "'") {
        literal("'");
        i += 2;
        continue;
      }
      const close = pattern.indexOf("'", i + 1);
      const end = close === -1 ? pattern.length : close;
      literal(pattern.slice(i + 1, end));
      i = end + 1;
      continue;
    }
    const token = TOKENS.find(([t]) => pattern.startsWith(t, i));
    if (token) {
      parts.push({ kind: "field", field: token[1], width: token[0].length });
      i += token[0].length;
      continue;
    }
    literal(pattern.charAt(i));
    i++;
  }

  compiled.set(pattern, parts);
  return parts;
}

/** Returns null when `text` does not match `pattern` or names an invalid date. */
export function parseDate(text: string, pattern: string): DateParts | null {
  const out: DateParts = {
    year: 1970,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  };

  let pos = 0;
  for (const part of compilePattern(pattern)) {
    if (part.kind === "literal") {
      if (!text.startsWith(part.text, pos)) return null;
      pos += part.text.length;
      continue;
    }
    const digits = text.slice(pos, pos + part.width);
    if (!/^\d+$/.test(digits) || digits.length !== part.width) return null;
    out[part.field] = Number(digits);
    pos += part.width;
  }
  if (pos !== text.length) return null;

  return isValid(out) ? out : null;
}

/** Returns null when the year cannot be written with four digits. */
export function formatDate(parts: DateParts, pattern: string): string | null {
  if (!Number.isInteger(parts.year) || parts.year < 0 || parts.year > 9999) {
    return null;
  }
  let out = "";
  for (const part of compilePattern(pattern)) {
    out +=
      part.kind === "literal"
        ? part.text
        : String(parts[part.field]).padStart(part.width, "0");
  }
  return out;
}

/** Try `pattern`, or each ISO shape in turn; returns the pattern that matched. */
export function recognizeDate(
  text: string,
  pattern?: string,
): { parts: DateParts; pattern: string } | null {
  for (const p of pattern ? [pattern] : ISO_PATTERNS) {
    const parts = parseDate(text, p);
    if (parts) return { parts, pattern: p };
  }
  return null;
}

const UNIT_MS: Partial<Record<DateUnit, number>> = {
  milliseconds: 1,
  seconds: 1_000,
  minutes: 60_000,
  hours: 3_600_000,
  days: 86_400_000,
  weeks: 604_800_000,
};

/**
 * Shift by a signed amount. Calendar units (months, years) keep the time of
 * day and clamp the day to the last day of the target month. Returns null
 * when the result lies outside the range of a `Date`.
 */
export function shiftDate(
  parts: DateParts,
  amount: number,
  unit: DateUnit,
): DateParts | null {
  if (unit === "months" || unit === "years") {
    const months = unit === "years" ? amount * 12 : amount;
    const total = parts.year * 12 + (parts.month - 1) + months;
    const year = Math.floor(total / 12);
    const month = total - year * 12 + 1;
    const day = Math.min(parts.day, daysInMonth(year, month));
    return Number.isNaN(day) ? null : { ...parts, year, month, day };
  }
  const step = UNIT_MS[unit] ?? 0;
  return fromEpoch(toEpoch(parts) + amount * step);
}

// --------------------
// Helpers
// --------------------

function toEpoch(p: DateParts): number {
  const d = new Date(0);
  d.setUTCFullYear(p.year, p.month - 1, p.day);
  d.setUTCHours(p.hour, p.minute, p.second, p.millisecond);
  return d.getTime();
}

function fromEpoch(ms: number): DateParts | null {
  const d = new Date(ms);
  if (Number.isNaN(d.getTime())) return null;
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
    millisecond: d.getUTCMilliseconds(),
  };
}

function daysInMonth(year: number, month: number): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month, 0);
  return d.getUTCDate();
}

function isValid(p: DateParts): boolean {
  return (
    p.month >= 1 &&
    p.month <= 12 &&
    p.day >= 1 &&
    p.day <= daysInMonth(p.year, p.month) &&
    p.hour <= 23 &&
    p.minute <= 59 &&
    p.second <= 59
  );
}
