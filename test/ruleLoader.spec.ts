import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { pino } from "pino";
import { RuleLoader } from "../src/core/RuleLoader.js";
import { RuleSetStore } from "../src/core/RuleSet.js";
import { applyRules } from "../src/core/RuleEngine.js";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function setup() {
  const store = new RuleSetStore();
  const lines: string[] = [];
  const logger = pino({ level: "info" }, { write: (s: string) => lines.push(s) });
  const loader = new RuleLoader({ store, logger });
  return { store, loader, lines };
}

const upper = { id: "up", when: "$.a", action: { op: "uppercase" } };

describe("RuleLoader.load", () => {
  it("publishes a parsed rule list", () => {
    const { store, loader } = setup();
    const r = loader.load([upper]);
    expect(r.ok).toBe(true);
    if (r.ok) {
      expect(r.version).toBe(1);
      expect(r.ruleSet.size).toBe(1);
      expect(store.current()).toBe(r.ruleSet);
    }
  });

  it("parses JSON text", () => {
    const { loader } = setup();
    const r = loader.load(JSON.stringify({ version: 1, rules: [upper] }));
    expect(r.ok).toBe(true);
  });

  it("parses YAML text", () => {
    const { store, loader } = setup();
    const r = loader.load(
      [
        "rules:",
        "  - id: up",
        "    when: a",
        "    action: { op: uppercase }",
      ].join("\n"),
    );
    expect(r.ok).toBe(true);
    expect(applyRules({ a: "x" }, store.current())).toEqual({ a: "X" });
  });

  it("logs each publish", () => {
    const { loader, lines } = setup();
    loader.load([upper], { origin: "inline-test" });
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      msg: "published rule set",
      origin: "inline-test",
      version: 1,
      rules: 1,
    });
  });

  it("accepts an empty rule list", () => {
    const { store, loader } = setup();
    const r = loader.load("[]");
    expect(r.ok).toBe(true);
    expect(store.current().size).toBe(0);
  });
});

describe("RuleLoader.load - rejections", () => {
  it("keeps the previous snapshot when a source is rejected", () => {
    const { store, loader, lines } = setup();
    loader.load([upper]);
    const before = store.current();

    const r = loader.load([{ id: "x", when: "$.a", action: { op: "nope" } }]);

    expect(r.ok).toBe(false);
    expect(store.current()).toBe(before);
    expect(store.version).toBe(1);
    expect(JSON.parse(lines[1] ?? "{}")).toMatchObject({
      level: 40,
      code: "UNKNOWN_OPERATOR",
      activeVersion: 1,
    });
  });

  it("PARSE_ERROR for malformed text", () => {
    const { loader } = setup();
    const r = loader.load("[ not json");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe("PARSE_ERROR");
  });

  it("UNKNOWN_OPERATOR with a suggestion", () => {
    const { loader } = setup();
    const r = loader.load([{ id: "x", when: "$.a", action: { op: "upper" } }]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("UNKNOWN_OPERATOR");
      expect(r.error.field).toBe("[0].action.op");
      expect(r.error.message).toBe(
        `Unknown operator 'upper' at [0].action.op. Did you mean "uppercase"?`,
      );
    }
  });

  it("UNKNOWN_OPERATOR for conditions", () => {
    const { loader } = setup();
    const r = loader.load({
      rules: [
        {
          id: "x",
          when: "$.a",
          condition: { op: "like", value: "a" },
          action: { op: "trim" },
        },
      ],
    });
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("UNKNOWN_OPERATOR");
      expect(r.error.field).toBe("rules[0].condition.op");
    }
  });

  it("DUPLICATE_RULE_ID", () => {
    const { loader } = setup();
    const r = loader.load([upper, upper]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("DUPLICATE_RULE_ID");
      expect(r.error.field).toBe("[1].id");
      expect(r.error.message).toBe("Duplicate rule id 'up' at [1]");
    }
  });

  it("INVALID_PATH", () => {
    const { loader } = setup();
    const r = loader.load([{ ...upper, when: "$.a[" }]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("INVALID_PATH");
      expect(r.error.field).toBe("[0].when");
    }
  });

  it("INVALID_PATH for bare paths when they are disabled", () => {
    const loader = new RuleLoader({
      store: new RuleSetStore(),
      allowBarePaths: false,
    });
    const r = loader.load([{ ...upper, when: "a" }]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe("INVALID_PATH");
  });

  it("INVALID_REGEX", () => {
    const { loader } = setup();
    const r = loader.load([
      { ...upper, condition: { op: "regex", value: "(" } },
    ]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("INVALID_REGEX");
      expect(r.error.field).toBe("[0].condition.value");
    }
  });

  it("SCHEMA_ERROR for unknown keys, with hints", () => {
    const { loader } = setup();
    const r = loader.load([{ ...upper, path: "$.b" }]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("SCHEMA_ERROR");
      expect(r.error.message).toBe(
        'Invalid rule at [0]: unknown key(s): "path". ' +
          'Allowed keys: "id", "when", "condition", "action". ' +
          'Did you mean "when"?',
      );
    }
  });

  it("SCHEMA_ERROR for nested sequences", () => {
    const { loader } = setup();
    const r = loader.load([
      {
        id: "x",
        when: "$.a",
        action: { op: "sequence", steps: [{ op: "sequence", steps: [] }] },
      },
    ]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("SCHEMA_ERROR");
      expect(r.error.field).toBe("[0].action.steps[0].op");
    }
  });

  it("SCHEMA_ERROR for bad parameters and missing fields", () => {
    const { loader } = setup();
    const bad = loader.load([
      { id: "x", when: "$.a", action: { op: "round", digits: -1 } },
    ]);
    expect(bad.ok).toBe(false);
    if (!bad.ok) {
      expect(bad.error.code).toBe("SCHEMA_ERROR");
      expect(bad.error.field).toBe("[0].action.digits");
    }

    const missing = loader.load({ version: "1" });
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe("SCHEMA_ERROR");
      expect(missing.error.message).toBe("Invalid rule at rules: Required");
    }
  });
});

describe("RuleLoader.loadFile", () => {
  it("loads YAML files", async () => {
    const { store, loader } = setup();
    const r = await loader.loadFile(fixture("rules.yaml"));
    expect(r.ok).toBe(true);
    expect(
      applyRules(
        {
          customer: { name: "  ann lee ", gender: "U" },
          items: [{ price: 1999 }, { price: "n/a" }],
        },
        store.current(),
      ),
    ).toEqual({
      customer: { name: "ANN LEE", gender: null },
      items: [{ price: 19.99 }, { price: "n/a" }],
    });
  });

  it("loads JSON files", async () => {
    const { store, loader } = setup();
    const r = await loader.loadFile(fixture("rules.json"));
    expect(r.ok).toBe(true);
    expect(
      applyRules({ status: null, due: "2023-12-31" }, store.current()),
    ).toEqual({ status: "new", due: "2024-01-31" });
  });

  it("READ_ERROR for a missing file", async () => {
    const { store, loader } = setup();
    const r = await loader.loadFile(fixture("missing.yaml"));
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe("READ_ERROR");
    expect(store.version).toBe(0);
  });

  it("reports validation errors from files", async () => {
    const { loader } = setup();
    const r = await loader.loadFile(fixture("broken.yaml"));
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("UNKNOWN_OPERATOR");
      expect(r.error.message).toBe(
        `Unknown operator 'divide' at rules[0].action.op. Did you mean "div"?`,
      );
    }
  });
});
