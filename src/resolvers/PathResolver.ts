import type {
  JsonContainer,
  JsonObject,
  JsonValue,
  Slot,
} from "../types/document.js";
import { compareOrdered } from "../core/ConditionEvaluator.js";
import { childOf, deepGet, toIndex } from "../utils/deepGet.js";
import { isContainer, jsonEquals, jsonTypeOf } from "../utils/json.js";
import {
  parsePath,
  type FilterExpr,
  type MemberKey,
  type ParseOptions,
  type PathSegment,
  type Selector,
} from "./PathParser.js";

export const ROOT_KEY = "$";

/** Holder for the document root so that `$` itself is an addressable slot. */
export type RootHolder = { [ROOT_KEY]: JsonValue };

export class NodeSlot implements Slot {
  constructor(
    readonly container: JsonContainer,
    readonly key: string | number,
  ) {}

  get(): JsonValue | undefined {
    const c = this.container;
    if (Array.isArray(c)) {
      return typeof this.key === "number" ? c[this.key] : undefined;
    }
    return typeof this.key === "string" ? ownMember(c, this.key) : undefined;
  }

  set(value: JsonValue): void {
    const c = this.container;
    if (Array.isArray(c)) {
      if (typeof this.key === "number") c[this.key] = value;
      return;
    }
    if (typeof this.key === "string") c[this.key] = value;
  }
}

export function rootHolder(document: JsonValue): RootHolder {
  return { [ROOT_KEY]: document };
}

/**
 * Resolve a path expression against a document, returning the matched slots
 * in canonical order.
 *
 * - Segments are applied left to right to the current slot list.
 * - Recursive descent visits candidate nodes in pre-order (object members
 *   in insertion order, array elements by ascending index). At each visited
 *   node the selector's matches among its children are emitted first, then
 *   the walk descends. So `$..*` on `{a:{b:1},c:2}` yields a, c, b, and
 *   `$..code` on `{a:{code:2},code:1}` yields 1 before 2.
 * - A slot reached twice (same container and key) is reported once.
 *
 * A path that matches nothing yields `[]`; missing containers are never
 * created. A `$` slot returned here belongs to a private holder: use
 * `resolveIn` with a long-lived `rootHolder` to replace the root itself.
 */
export function resolve(
  document: JsonValue,
  path: string | ReadonlyArray<PathSegment>,
  opts?: ParseOptions,
): Slot[] {
  const segments = typeof path === "string" ? parsePath(path, opts) : path;
  return resolveIn(rootHolder(document), segments);
}

export function resolveIn(
  holder: RootHolder,
  segments: ReadonlyArray<PathSegment>,
): Slot[] {
  let current: Slot[] = [new NodeSlot(holder, ROOT_KEY)];
  for (const segment of segments) {
    const next: Slot[] = [];
    for (const slot of current) {
      const node = slot.get();
      if (segment.descendant) {
        visitPreOrder(node, (n) => select(n, segment.selector, next));
      } else {
        select(node, segment.selector, next);
      }
    }
    current = dedupe(next);
    if (current.length === 0) break;
  }
  return current;
}

// --------------------
// Selection
// --------------------

function select(
  node: JsonValue | undefined,
  selector: Selector,
  out: Slot[],
): void {
  if (!isContainer(node)) return;

  switch (selector.kind) {
    case "member":
      pushKey(node, selector.name, out);
      return;
    case "index":
      if (Array.isArray(node)) pushKey(node, selector.index, out);
      return;
    case "union":
      for (const k of selector.keys) pushKey(node, k, out);
      return;
    case "wildcard":
      for (const k of keysOf(node)) out.push(new NodeSlot(node, k));
      return;
    case "filter":
      for (const k of keysOf(node)) {
        if (matchesFilter(childOf(node, k), selector.filter)) {
          out.push(new NodeSlot(node, k));
        }
      }
      return;
  }
}

function pushKey(node: JsonContainer, key: MemberKey, out: Slot[]): void {
  if (Array.isArray(node)) {
    const idx = toIndex(node.length, key);
    if (idx !== undefined) out.push(new NodeSlot(node, idx));
    return;
  }
  const name = String(key);
  if (ownMember(node, name) !== undefined) out.push(new NodeSlot(node, name));
}

function keysOf(node: JsonContainer): MemberKey[] {
  return Array.isArray(node) ? node.map((_, i) => i) : Object.keys(node);
}

function visitPreOrder(
  node: JsonValue | undefined,
  visit: (n: JsonValue) => void,
): void {
  if (node === undefined) return;
  visit(node);
  if (!isContainer(node)) return;
  for (const k of keysOf(node)) visitPreOrder(childOf(node, k), visit);
}

function matchesFilter(
  candidate: JsonValue | undefined,
  filter: FilterExpr,
): boolean {
  const v = deepGet(candidate, filter.path);
  if (v === undefined) return false;
  if (filter.kind === "exists") return true;
  if (jsonTypeOf(v) !== jsonTypeOf(filter.literal)) return false;

  switch (filter.op) {
    case "==":
      return jsonEquals(v, filter.literal);
    case "!=":
      return !jsonEquals(v, filter.literal);
    default:
      return compareOrdered(v, filter.op, filter.literal);
  }
}

function dedupe(slots: Slot[]): Slot[] {
  const seen = new Map<JsonContainer, Set<string | number>>();
  return slots.filter((s) => {
    let keys = seen.get(s.container);
    if (!keys) {
      keys = new Set();
      seen.set(s.container, keys);
    }
    if (keys.has(s.key)) return false;
    keys.add(s.key);
    return true;
  });
}

function ownMember(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(obj, key) ? obj[key] : undefined;
}
