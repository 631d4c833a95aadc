import type { JsonValue } from "../types/document.js";
import type { ArithmeticOp, CastTarget } from "../types/spec.js";

export const stringOps = {
  trim: (v: string) => v.trim(),
  uppercase: (v: string) => v.toUpperCase(),
  lowercase: (v: string) => v.toLowerCase(),
} as const;

/** JSON number literal, optionally surrounded by whitespace. */
const NUMBER_TEXT = /^\s*-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?\s*$/;

/**
 * Lossless conversion to a primitive. Returns undefined when no conversion
 * is defined (including when the value already has the target type).
 */
export function castValue(v: JsonValue, to: CastTarget): JsonValue | undefined {
  switch (to) {
    case "string":
      if (typeof v === "number" || typeof v === "boolean") return String(v);
      return undefined;
    case "number":
      return typeof v === "string" ? parseNumber(v) : undefined;
    case "integer": {
      if (typeof v !== "string") return undefined;
      const n = parseNumber(v);
      return n !== undefined && Number.isSafeInteger(n) ? n : undefined;
    }
    case "boolean":
      if (v === "true") return true;
      if (v === "false") return false;
      return undefined;
  }
}

/** Integral values beyond 2^53 would be rounded, so they are refused. */
function parseNumber(s: string): number | undefined {
  if (!NUMBER_TEXT.test(s)) return undefined;
  const n = Number(s);
  if (!Number.isFinite(n)) return undefined;
  return Number.isInteger(n) && !Number.isSafeInteger(n) ? undefined : n;
}

/** Undefined for division by zero or a non-finite result. */
export function arithmetic(
  op: ArithmeticOp,
  v: number,
  by: number,
): number | undefined {
  if (op === "div" && by === 0) return undefined;
  const r =
    op === "add"
      ? v + by
      : op === "sub"
        ? v - by
        : op === "mul"
          ? v * by
          : v / by;
  return Number.isFinite(r) ? r : undefined;
}

/**
 * Round half away from zero (2.5 -> 3, -2.5 -> -3) at `digits` decimals.
 * Shifting goes through the decimal exponent so that 1.005 rounds to 1.01.
 */
export function roundHalfAwayFromZero(
  v: number,
  digits: number,
): number | undefined {
  const sign = v < 0 ? -1 : 1;
  const r = sign * shift(Math.round(shift(Math.abs(v), digits)), -digits);
  if (!Number.isFinite(r)) return undefined;
  return r === 0 ? 0 : r;
}

function shift(n: number, exp: number): number {
  const [mantissa, e = "0"] = String(n).split("e");
  return Number(`${mantissa}e${Number(e) + exp}`);
}

/**
 * Value lookup table: the trimmed string is looked up in `nullValues`
 * (becomes null) and then in `mappings`. Undefined when neither matches.
 */
export function mapValue(
  v: string,
  mappings: Readonly<Record<string, JsonValue>>,
  nullValues: ReadonlyArray<string> = [],
): JsonValue | undefined {
  const key = v.trim();
  if (nullValues.includes(key)) return null;
  if (!Object.prototype.hasOwnProperty.call(mappings, key)) return undefined;
  return mappings[key];
}
