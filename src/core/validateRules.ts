import { z } from "zod";
import type { JsonValue } from "../types/document.js";
import type { Rule } from "../types/internal.js";
import type { LoadError } from "../types/result.js";
import type { PathSegment } from "../resolvers/PathParser.js";
import type {
  ActionSpec,
  ComparisonAlias,
  ComparisonOp,
  Condition,
  ConditionSpec,
} from "../types/spec.js";
import { parsePath, PathSyntaxError } from "../resolvers/PathParser.js";
import { jsonTypeOf } from "../utils/json.js";
import { err, messageOf } from "./Errors.js";

// --------------------
// Schemas
// --------------------

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const primitiveSchema = z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  z.null(),
]);

const conditionSchema: z.ZodType<ConditionSpec, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z.discriminatedUnion("op", [
      z
        .object({
          op: z.enum(["==", "!=", "eq", "ne"]),
          value: jsonValueSchema,
        })
        .strict(),
      z
        .object({
          op: z.enum(["<", "<=", ">", ">=", "lt", "lte", "gt", "gte"]),
          value: z.union([z.number().finite(), z.string()]),
        })
        .strict(),
      z
        .object({ op: z.enum(["in", "nin"]), value: z.array(primitiveSchema) })
        .strict(),
      z
        .object({
          op: z.literal("regex"),
          value: z.string(),
          flags: z
            .string()
            .regex(/^[imsu]*$/, "flags may only contain i, m, s, u")
            .optional(),
        })
        .strict(),
      z.object({ op: z.literal("contains"), value: primitiveSchema }).strict(),
      z
        .object({ op: z.enum(["startsWith", "endsWith"]), value: z.string() })
        .strict(),
      z
        .object({
          op: z.enum(["isNull", "isEmpty"]),
          value: z.boolean().optional(),
        })
        .strict(),
      z
        .object({
          op: z.literal("type"),
          value: z.enum([
            "string",
            "number",
            "boolean",
            "null",
            "array",
            "object",
          ]),
        })
        .strict(),
      z
        .object({
          op: z.enum(["all", "any"]),
          conditions: z.array(conditionSchema).min(1),
        })
        .strict(),
      z.object({ op: z.literal("not"), condition: conditionSchema }).strict(),
    ]),
  );

const singleActionShapes = [
  z.object({ op: z.literal("replace"), value: jsonValueSchema }).strict(),
  z
    .object({ op: z.enum(["default", "coalesce"]), value: jsonValueSchema })
    .strict(),
  z
    .object({
      op: z.literal("cast"),
      to: z.enum(["string", "number", "integer", "boolean"]),
    })
    .strict(),
  z.object({ op: z.enum(["trim", "uppercase", "lowercase"]) }).strict(),
  z
    .object({
      op: z.enum(["add", "sub", "mul", "div"]),
      by: z.number().finite(),
    })
    .strict(),
  z
    .object({
      op: z.literal("round"),
      digits: z.number().int().min(0).max(15).optional(),
    })
    .strict(),
  z
    .object({
      op: z.literal("formatDate"),
      from: z.string().min(1),
      to: z.string().min(1),
    })
    .strict(),
  z
    .object({
      op: z.literal("offsetDate"),
      amount: z.number().int(),
      unit: z.enum([
        "milliseconds",
        "seconds",
        "minutes",
        "hours",
        "days",
        "weeks",
        "months",
        "years",
      ]),
      pattern: z.string().min(1).optional(),
    })
    .strict(),
  z
    .object({
      op: z.literal("convertUnit"),
      from: z.string().min(1),
      to: z.string().min(1),
    })
    .strict(),
  z
    .object({
      op: z.literal("mapValue"),
      mappings: z.record(jsonValueSchema),
      nullValues: z.array(z.string()).optional(),
    })
    .strict(),
] as const;

const singleActionSchema = z.discriminatedUnion("op", [...singleActionShapes]);

const actionSchema: z.ZodType<ActionSpec, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("op", [
    ...singleActionShapes,
    z
      .object({ op: z.literal("sequence"), steps: z.array(singleActionSchema) })
      .strict(),
  ]);

const RULE_KEYS = ["id", "when", "condition", "action"] as const;

const ruleRecordSchema = z
  .object({
    id: z.string().min(1),
    when: z.string().min(1),
    condition: conditionSchema.optional(),
    action: actionSchema,
  })
  .strict();

const envelopeSchema = z
  .object({
    version: z.union([z.literal("1"), z.literal(1)]).optional(),
    name: z.string().optional(),
    rules: z.array(z.unknown()),
  })
  .strict();

// --------------------
// Hints
// --------------------

const OPERATOR_HINTS: Record<string, string> = {
  upper: "uppercase",
  lower: "lowercase",
  toUpperCase: "uppercase",
  toLowerCase: "lowercase",
  "===": "==",
  "!==": "!=",
  equals: "==",
  plus: "add",
  subtract: "sub",
  multiply: "mul",
  divide: "div",
  format: "formatDate",
  convert: "convertUnit",
  map: "mapValue",
  matches: "regex",
};

const KEY_HINTS: Record<string, string> = {
  conditions: "condition",
  path: "when",
  actions: "action",
  mapping: "mappings",
  step: "steps",
};

// --------------------
// Public API
// --------------------

export interface CompileOptions {
  /** default: true (expressions without `$` are rooted at the document) */
  allowBarePaths?: boolean;
}

export type CompileResult =
  | { ok: true; rules: Rule[]; name?: string }
  | { ok: false; error: LoadError };

/**
 * Validate a parsed rule source and compile it. All-or-nothing: the first
 * problem found rejects the whole source.
 */
export function compileRules(
  source: unknown,
  opts: CompileOptions = {},
): CompileResult {
  let records: ReadonlyArray<unknown>;
  let name: string | undefined;
  let base: string;

  if (Array.isArray(source)) {
    records = source;
    base = "";
  } else {
    const env = envelopeSchema.safeParse(source);
    if (!env.success) {
      return { ok: false, error: fromZod(env.error, source, "") };
    }
    records = env.data.rules;
    name = env.data.name;
    base = "rules";
  }

  const rules: Rule[] = [];
  const ids = new Set<string>();

  for (const [i, raw] of records.entries()) {
    const at = `${base}[${i}]`;
    const parsed = ruleRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, error: fromZod(parsed.error, raw, at) };
    }
    const rec = parsed.data;

    if (ids.has(rec.id)) {
      return {
        ok: false,
        error: err(
          "DUPLICATE_RULE_ID",
          `Duplicate rule id '${rec.id}' at ${at}`,
          { id: rec.id },
          `${at}.id`,
        ),
      };
    }
    ids.add(rec.id);

    let path: PathSegment[];
    try {
      path = parsePath(rec.when, {
        allowBarePaths: opts.allowBarePaths ?? true,
      });
    } catch (e) {
      if (!(e instanceof PathSyntaxError)) throw e;
      return {
        ok: false,
        error: err(
          "INVALID_PATH",
          e.message,
          { position: e.position },
          `${at}.when`,
        ),
      };
    }

    let condition: Condition | undefined;
    if (rec.condition) {
      const c = compileCondition(rec.condition, `${at}.condition`);
      if (!c.ok) return c;
      condition = c.condition;
    }

    rules.push({
      id: rec.id,
      when: rec.when,
      path,
      condition,
      action: rec.action,
    });
  }

  return { ok: true, rules, name };
}

export function compileCondition(
  spec: ConditionSpec,
  field = "condition",
): { ok: true; condition: Condition } | { ok: false; error: LoadError } {
  switch (spec.op) {
    case "all":
    case "any": {
      const conditions: Condition[] = [];
      for (const [i, sub] of spec.conditions.entries()) {
        const c = compileCondition(sub, `${field}.conditions[${i}]`);
        if (!c.ok) return c;
        conditions.push(c.condition);
      }
      return { ok: true, condition: { op: spec.op, conditions } };
    }
    case "not": {
      const c = compileCondition(spec.condition, `${field}.condition`);
      if (!c.ok) return c;
      return { ok: true, condition: { op: "not", condition: c.condition } };
    }
    case "regex":
      try {
        return {
          ok: true,
          condition: {
            op: "regex",
            pattern: new RegExp(spec.value, spec.flags),
          },
        };
      } catch (e) {
        return {
          ok: false,
          error: err(
            "INVALID_REGEX",
            `Invalid regex: ${messageOf(e)}`,
            { pattern: spec.value, flags: spec.flags },
            `${field}.value`,
          ),
        };
      }
    case "isNull":
    case "isEmpty":
      return {
        ok: true,
        condition: { op: spec.op, value: spec.value ?? true },
      };
    case "in":
    case "nin":
    case "contains":
    case "startsWith":
    case "endsWith":
    case "type":
      return { ok: true, condition: spec };
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
    case "eq":
    case "ne":
    case "lt":
    case "lte":
    case "gt":
    case "gte":
      return {
        ok: true,
        condition: {
          op: canonicalComparison(spec.op),
          value: spec.value,
          operandType: jsonTypeOf(spec.value),
        },
      };
  }
}

function canonicalComparison(
  op: ComparisonOp | ComparisonAlias,
): ComparisonOp {
  switch (op) {
    case "eq":
      return "==";
    case "ne":
      return "!=";
    case "lt":
      return "<";
    case "lte":
      return "<=";
    case "gt":
      return ">";
    case "gte":
      return ">=";
    default:
      return op;
  }
}

// --------------------
// Error mapping
// --------------------

function fromZod(error: z.ZodError, raw: unknown, base: string): LoadError {
  const issue = error.issues[0];
  if (!issue) {
    return err("SCHEMA_ERROR", "Invalid rule source", undefined, base);
  }

  const field = joinPath(base, issue.path);

  if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
    const op = valueAt(raw, issue.path);
    if (op === "sequence" && issue.path.includes("steps")) {
      return err(
        "SCHEMA_ERROR",
        `Invalid rule at ${field}: a sequence cannot contain another sequence`,
        undefined,
        field,
      );
    }
    if (typeof op === "string") {
      const hint = OPERATOR_HINTS[op];
      return err(
        "UNKNOWN_OPERATOR",
        `Unknown operator '${op}' at ${field}` +
          (hint ? `. Did you mean "${hint}"?` : ""),
        { op, allowed: issue.options },
        field,
      );
    }
    return err(
      "SCHEMA_ERROR",
      `Invalid rule at ${field}: 'op' is required and must be a string`,
      { allowed: issue.options },
      field,
    );
  }

  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const hints = issue.keys
      .map((k) => KEY_HINTS[k])
      .filter((h): h is string => h !== undefined)
      .map((h) => `Did you mean "${h}"?`);
    const allowed =
      issue.path.length === 0 && base !== ""
        ? `. Allowed keys: ${RULE_KEYS.map((k) => `"${k}"`).join(", ")}`
        : "";
    const unknown = issue.keys.map((k) => `"${k}"`).join(", ");
    return err(
      "SCHEMA_ERROR",
      `Invalid rule at ${field || "(root)"}: unknown key(s): ${unknown}` +
        allowed +
        (hints.length ? `. ${hints.join(" ")}` : ""),
      { keys: issue.keys },
      field,
    );
  }

  return err(
    "SCHEMA_ERROR",
    `Invalid rule at ${field || "(root)"}: ${issue.message}`,
    { issues: error.issues },
    field,
  );
}

function joinPath(base: string, path: ReadonlyArray<string | number>): string {
  let out = base;
  for (const p of path) {
    out += typeof p === "number" ? `[${p}]` : out ? `.${p}` : p;
  }
  return out;
}

function valueAt(raw: unknown, path: ReadonlyArray<string | number>): unknown {
  let cur = raw;
  for (const p of path) {
    if (cur == null || typeof cur !== "object") return undefined;
    cur = Reflect.get(cur, p);
  }
  return cur;
}
