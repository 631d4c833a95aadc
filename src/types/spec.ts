import type { JsonPrimitive, JsonTypeName, JsonValue } from "./document.js";

export type SourceFormat = "json" | "yaml" | "auto";

/** Rule file as authored: a bare list of records or a versioned envelope. */
export type RuleSourceV1 =
  | ReadonlyArray<RuleRecordV1>
  | {
      version?: "1" | 1;
      name?: string;
      rules: ReadonlyArray<RuleRecordV1>;
    };

export interface RuleRecordV1 {
  id: string;
  /** path expression */
  when: string;
  condition?: ConditionSpec;
  action: ActionSpec;
}

// --------------------
// Conditions
// --------------------

export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type OrderingOp = "<" | "<=" | ">" | ">=";

/** Word spellings accepted in rule files for the comparison ops. */
export type ComparisonAlias = "eq" | "ne" | "lt" | "lte" | "gt" | "gte";

export type ConditionSpec =
  | { op: ComparisonOp | ComparisonAlias; value: JsonValue }
  | { op: "in" | "nin"; value: JsonPrimitive[] }
  | { op: "regex"; value: string; flags?: string }
  | { op: "contains"; value: JsonPrimitive }
  | { op: "startsWith" | "endsWith"; value: string }
  | { op: "isNull" | "isEmpty"; value?: boolean }
  | { op: "type"; value: JsonTypeName }
  | { op: "all" | "any"; conditions: ConditionSpec[] }
  | { op: "not"; condition: ConditionSpec };

/** Compiled condition as evaluated at run time. */
export type Condition =
  | { op: ComparisonOp; value: JsonValue; operandType: JsonTypeName }
  | { op: "in" | "nin"; value: ReadonlyArray<JsonPrimitive> }
  | { op: "regex"; pattern: RegExp }
  | { op: "contains"; value: JsonPrimitive }
  | { op: "startsWith" | "endsWith"; value: string }
  | { op: "isNull" | "isEmpty"; value: boolean }
  | { op: "type"; value: JsonTypeName }
  | { op: "all" | "any"; conditions: ReadonlyArray<Condition> }
  | { op: "not"; condition: Condition };

// --------------------
// Actions
// --------------------

export type CastTarget = "string" | "number" | "integer" | "boolean";

export type DateUnit =
  | "milliseconds"
  | "seconds"
  | "minutes"
  | "hours"
  | "days"
  | "weeks"
  | "months"
  | "years";

export type ArithmeticOp = "add" | "sub" | "mul" | "div";

export type SingleAction =
  | { op: "replace"; value: JsonValue }
  | { op: "default" | "coalesce"; value: JsonValue }
  | { op: "cast"; to: CastTarget }
  | { op: "trim" | "uppercase" | "lowercase" }
  | { op: ArithmeticOp; by: number }
  | { op: "round"; digits?: number }
  | { op: "formatDate"; from: string; to: string }
  | { op: "offsetDate"; amount: number; unit: DateUnit; pattern?: string }
  | { op: "convertUnit"; from: string; to: string }
  | {
      op: "mapValue";
      mappings: Record<string, JsonValue>;
      nullValues?: string[];
    };

export interface SequenceAction {
  op: "sequence";
  steps: ReadonlyArray<SingleAction>;
}

export type Action = SingleAction | SequenceAction;

export type ActionSpec = Action;

export type SingleActionOp = SingleAction["op"];
