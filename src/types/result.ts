import type { RuleSet } from "../core/RuleSet.js";
import type { JsonValue } from "./document.js";

export type LoadResult =
  | { ok: true; ruleSet: RuleSet; version: number }
  | { ok: false; error: LoadError };

export interface LoadError {
  code:
    | "READ_ERROR"
    | "PARSE_ERROR"
    | "SCHEMA_ERROR"
    | "UNKNOWN_OPERATOR"
    | "DUPLICATE_RULE_ID"
    | "INVALID_PATH"
    | "INVALID_REGEX";
  message: string;
  /** location inside the rule source, e.g. `rules[2].action.steps[0]` */
  field?: string;
  details?: unknown;
}

export type TransformResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: TransformError };

export interface TransformError {
  code: "PAYLOAD_PARSE_ERROR" | "INVALID_DOCUMENT";
  message: string;
  details?: unknown;
}
