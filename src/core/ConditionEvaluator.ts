// src/core/ConditionEvaluator.ts

import type { JsonPrimitive, JsonValue } from "../types/document.js";
import type { Condition, OrderingOp } from "../types/spec.js";
import { isJsonObject, jsonEquals, jsonTypeOf } from "../utils/json.js";

/**
 * Evaluate a compiled condition against the current value of a slot.
 *
 * Strict typing: no coercion between string and numeric forms ever happens.
 * Any type mismatch (including a value-less slot) evaluates to false, so the
 * node is skipped rather than failing the rule. This holds for the negative
 * operators too: `!=` and `nin` are false for a value of another type.
 */
export function evaluateCondition(
  condition: Condition,
  actual: JsonValue | undefined,
): boolean {
  // Combinators
  switch (condition.op) {
    case "all":
      return condition.conditions.every((c) => evaluateCondition(c, actual));
    case "any":
      return condition.conditions.some((c) => evaluateCondition(c, actual));
    case "not":
      return !evaluateCondition(condition.condition, actual);
  }

  if (actual === undefined) return false;

  switch (condition.op) {
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=": {
      if (jsonTypeOf(actual) !== condition.operandType) return false;
      const { op, value } = condition;
      if (op === "==") return jsonEquals(actual, value);
      if (op === "!=") return !jsonEquals(actual, value);
      return compareOrdered(actual, op, value);
    }

    case "in":
      return isPrimitive(actual) && condition.value.includes(actual);
    case "nin": {
      if (!isPrimitive(actual)) return false;
      // the value must share a type with at least one listed operand
      const t = jsonTypeOf(actual);
      return (
        condition.value.some((v) => jsonTypeOf(v) === t) &&
        !condition.value.includes(actual)
      );
    }

    case "regex":
      if (typeof actual !== "string") return false;
      // flags are restricted to non-stateful ones at compile time
      return condition.pattern.test(actual);

    case "contains":
      if (typeof actual === "string") {
        return (
          typeof condition.value === "string" &&
          actual.includes(condition.value)
        );
      }
      if (Array.isArray(actual)) {
        const needle = condition.value;
        return actual.some((x) => jsonEquals(x, needle));
      }
      return false;

    case "startsWith":
      return typeof actual === "string" && actual.startsWith(condition.value);
    case "endsWith":
      return typeof actual === "string" && actual.endsWith(condition.value);

    case "isNull":
      return (actual === null) === condition.value;
    case "isEmpty":
      return isEmpty(actual) === condition.value;

    case "type":
      return jsonTypeOf(actual) === condition.value;

    default:
      return false;
  }
}

/**
 * Ordering comparison shared with path filters. Both sides must be numbers,
 * or both strings (compared by UTF-16 code units).
 */
export function compareOrdered(
  actual: JsonValue,
  op: OrderingOp,
  expected: JsonValue,
): boolean {
  if (typeof actual === "number" && typeof expected === "number") {
    return ordered(actual, op, expected);
  }
  if (typeof actual === "string" && typeof expected === "string") {
    return ordered(actual, op, expected);
  }
  return false;
}

function ordered<T extends number | string>(
  a: T,
  op: OrderingOp,
  b: T,
): boolean {
  switch (op) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
  }
}

// ----------------------
// Helpers
// ----------------------

function isPrimitive(v: JsonValue): v is JsonPrimitive {
  return v === null || typeof v !== "object";
}

function isEmpty(v: JsonValue): boolean {
  if (typeof v === "string") return v.length === 0;
  if (Array.isArray(v)) return v.length === 0;
  if (isJsonObject(v)) return Object.keys(v).length === 0;
  return false;
}
