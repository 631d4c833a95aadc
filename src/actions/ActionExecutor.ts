import type { JsonValue, Slot } from "../types/document.js";
import type { Action, SingleAction } from "../types/spec.js";
import {
  arithmetic,
  castValue,
  mapValue,
  roundHalfAwayFromZero,
  stringOps,
} from "./builtins.js";
import { formatDate, parseDate, recognizeDate, shiftDate } from "./dates.js";
import { convertUnit } from "./units.js";

/** Either the value to write, or the no-op signal. */
export type ActionOutcome =
  | { applied: true; value: JsonValue }
  | { applied: false };

export const NO_OP: ActionOutcome = Object.freeze({ applied: false });

/**
 * Compute the result of an action (single or sequence) for a slot value.
 * Never throws for a type mismatch, parse failure or division by zero: the
 * outcome is `NO_OP` instead.
 */
export function executeAction(
  action: Action,
  value: JsonValue | undefined,
): ActionOutcome {
  if (action.op !== "sequence") return executeStep(action, value);

  // Each step sees the previous output; a no-op step passes its input on.
  let cur = value;
  let changed = false;
  for (const step of action.steps) {
    const r = executeStep(step, cur);
    if (!r.applied) continue;
    cur = r.value;
    changed = true;
  }
  return changed && cur !== undefined ? applied(cur) : NO_OP;
}

/** Execute against a slot and write the result back. Returns true if written. */
export function applyAction(action: Action, slot: Slot): boolean {
  const r = executeAction(action, slot.get());
  if (r.applied) slot.set(r.value);
  return r.applied;
}

function executeStep(
  step: SingleAction,
  value: JsonValue | undefined,
): ActionOutcome {
  switch (step.op) {
    case "replace":
      return applied(structuredClone(step.value));

    case "default":
    case "coalesce":
      return value == null ? applied(structuredClone(step.value)) : NO_OP;

    case "cast":
      return value === undefined ? NO_OP : maybe(castValue(value, step.to));

    case "trim":
    case "uppercase":
    case "lowercase":
      return typeof value === "string"
        ? applied(stringOps[step.op](value))
        : NO_OP;

    case "add":
    case "sub":
    case "mul":
    case "div":
      return typeof value === "number"
        ? maybe(arithmetic(step.op, value, step.by))
        : NO_OP;

    case "round":
      return typeof value === "number"
        ? maybe(roundHalfAwayFromZero(value, step.digits ?? 0))
        : NO_OP;

    case "formatDate": {
      if (typeof value !== "string") return NO_OP;
      const parts = parseDate(value, step.from);
      return parts ? maybe(formatDate(parts, step.to)) : NO_OP;
    }

    case "offsetDate": {
      if (typeof value !== "string") return NO_OP;
      const hit = recognizeDate(value, step.pattern);
      if (!hit) return NO_OP;
      const shifted = shiftDate(hit.parts, step.amount, step.unit);
      return shifted ? maybe(formatDate(shifted, hit.pattern)) : NO_OP;
    }

    case "convertUnit":
      return typeof value === "number"
        ? maybe(convertUnit(value, step.from, step.to))
        : NO_OP;

    case "mapValue": {
      if (typeof value !== "string") return NO_OP;
      const mapped = mapValue(value, step.mappings, step.nullValues);
      return mapped === undefined ? NO_OP : applied(structuredClone(mapped));
    }

    default:
      return NO_OP;
  }
}

function applied(value: JsonValue): ActionOutcome {
  return { applied: true, value };
}

function maybe(value: JsonValue | null | undefined): ActionOutcome {
  return value === undefined || value === null ? NO_OP : applied(value);
}
