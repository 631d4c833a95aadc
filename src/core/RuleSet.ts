import type { Rule } from "../types/internal.js";

/**
 * Immutable, ordered list of compiled rules. Rules and their parsed paths,
 * conditions and actions are frozen on construction.
 */
export class RuleSet implements Iterable<Rule> {
  private static readonly EMPTY = new RuleSet([]);

  readonly rules: ReadonlyArray<Rule>;

  private constructor(rules: ReadonlyArray<Rule>) {
    this.rules = Object.freeze(rules.map((r) => deepFreeze({ ...r })));
    Object.freeze(this);
  }

  static of(rules: ReadonlyArray<Rule>): RuleSet {
    return rules.length === 0 ? RuleSet.EMPTY : new RuleSet(rules);
  }

  static empty(): RuleSet {
    return RuleSet.EMPTY;
  }

  get size(): number {
    return this.rules.length;
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.rules[Symbol.iterator]();
  }
}

/**
 * The active snapshot: a single reference replaced only by whole-reference
 * swap. Readers call `current()` once and keep the reference for the whole
 * transformation; a later `publish` never affects them.
 */
export class RuleSetStore {
  private active: RuleSet;
  private seq = 0;

  constructor(initial: RuleSet = RuleSet.empty()) {
    this.active = initial;
  }

  current(): RuleSet {
    return this.active;
  }

  get version(): number {
    return this.seq;
  }

  /** Swap in `next`; returns the new version number. */
  publish(next: RuleSet): number {
    this.active = next;
    this.seq += 1;
    return this.seq;
  }
}

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object") return value;
  if (value instanceof RegExp || Object.isFrozen(value)) return value;
  for (const v of Object.values(value)) deepFreeze(v);
  return Object.freeze(value);
}
