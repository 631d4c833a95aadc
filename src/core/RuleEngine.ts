import type { JsonValue } from "../types/document.js";
import type { Rule } from "../types/internal.js";
import type { RuleSet } from "./RuleSet.js";
import {
  ROOT_KEY,
  resolveIn,
  rootHolder,
  type RootHolder,
} from "../resolvers/PathResolver.js";
import { evaluateCondition } from "./ConditionEvaluator.js";
import { applyAction } from "../actions/ActionExecutor.js";

/**
 * Apply every rule of `ruleSet`, in order, to `document`.
 *
 * The document is mutated in place and the (possibly replaced) root is
 * returned; callers treat the return value as the authoritative result.
 * Each rule resolves its path against the state left by earlier rules, so
 * for overlapping targets the last rule applied wins. Nothing here throws
 * for a non-matching path or an incompatible value: those are no-ops.
 *
 * Synchronous and free of I/O. The caller passes the snapshot it captured;
 * publishing a new one meanwhile does not affect this call.
 */
export function applyRules(document: JsonValue, ruleSet: RuleSet): JsonValue {
  const holder = rootHolder(document);
  for (const rule of ruleSet) applyRule(holder, rule);
  return holder[ROOT_KEY];
}

/** Number of slots the rule wrote to. */
export function applyRule(holder: RootHolder, rule: Rule): number {
  let written = 0;
  for (const slot of resolveIn(holder, rule.path)) {
    if (rule.condition && !evaluateCondition(rule.condition, slot.get())) {
      continue;
    }
    if (applyAction(rule.action, slot)) written++;
  }
  return written;
}
