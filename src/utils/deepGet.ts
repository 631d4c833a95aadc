import type { JsonValue } from "../types/document.js";
import type { MemberKey } from "../resolvers/PathParser.js";

/**
 * Read one member/element. Numeric keys (or numeric strings, as in
 * `devices.0`) address array elements; negative indexes count from the end.
 * Returns undefined if not found.
 */
export function childOf(
  node: JsonValue | undefined,
  key: MemberKey,
): JsonValue | undefined {
  if (node == null || typeof node !== "object") return undefined;

  if (Array.isArray(node)) {
    const idx = toIndex(node.length, key);
    return idx === undefined ? undefined : node[idx];
  }

  if (typeof key !== "string") return undefined;
  return Object.prototype.hasOwnProperty.call(node, key) ? node[key] : undefined;
}

/** Get value by relative key path. Returns undefined if not found. */
export function deepGet(
  node: JsonValue | undefined,
  path: ReadonlyArray<MemberKey>,
): JsonValue | undefined {
  let cur = node;
  for (const key of path) {
    cur = childOf(cur, key);
    if (cur === undefined) return undefined;
  }
  return cur;
}

/** Resolve a key against an array of `length`; undefined if out of range. */
export function toIndex(length: number, key: MemberKey): number | undefined {
  let n: number;
  if (typeof key === "number") {
    n = key;
  } else {
    n = Number(key);
    if (!/^\d+$/.test(key)) return undefined;
  }
  if (!Number.isInteger(n)) return undefined;
  const idx = n < 0 ? length + n : n;
  return idx >= 0 && idx < length ? idx : undefined;
}
