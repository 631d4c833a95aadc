import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import {
  createMutator,
  createMutatorFromEnv,
  Mutator,
  type TransformResult,
} from "../src/index.js";

const rules = [
  { id: "code", when: "$..code", action: { op: "uppercase" } },
  {
    id: "qty",
    when: "$.order.qty",
    action: { op: "cast", to: "integer" },
  },
];

const valueOf = (r: TransformResult) => (r.ok ? r.value : r.error.code);

describe("Mutator", () => {
  it("transforms plain objects", () => {
    const m = createMutator({ rules });
    expect(valueOf(m.transform({ code: "ab", order: { qty: "3" } }))).toEqual({
      code: "AB",
      order: { qty: 3 },
    });
  });

  it("transforms JSON text", () => {
    const m = createMutator({ rules });
    expect(valueOf(m.transform('{"order":{"code":"x","qty":"7"}}'))).toEqual({
      order: { code: "X", qty: 7 },
    });
  });

  it("transforms XML text, keeping values as strings", () => {
    const m = createMutator({ rules });
    const xml =
      '<order id="9"><code>zz</code><qty>4</qty><line>1</line><line>2</line></order>';
    expect(valueOf(m.transform(xml, { payloadType: "xml" }))).toEqual({
      order: {
        "@id": "9",
        code: "ZZ",
        qty: 4,
        line: ["1", "2"],
      },
    });
  });

  it("reads XML text only when asked to", () => {
    const m = createMutator({ rules });
    expect(valueOf(m.transform("<code>q</code>"))).toBe("PAYLOAD_PARSE_ERROR");
    expect(
      valueOf(m.transform("<code>q</code>", { payloadType: "auto" })),
    ).toEqual({ code: "Q" });
    expect(
      valueOf(m.transform('{"code":"q"}', { payloadType: "auto" })),
    ).toEqual({ code: "Q" });
  });

  it("reports unparseable payloads", () => {
    const m = createMutator({ rules });
    expect(valueOf(m.transform("{oops"))).toBe("PAYLOAD_PARSE_ERROR");
    expect(valueOf(m.transform({ a: 1 }, { payloadType: "xml" }))).toBe(
      "PAYLOAD_PARSE_ERROR",
    );
  });

  it("reports documents that are not JSON trees", () => {
    const m = createMutator({ rules });
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const r = m.transform(cyclic);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("INVALID_DOCUMENT");
      expect(r.error.message).toBe("Cyclic reference at $.self");
    }
    expect(valueOf(m.transform({ n: Number.NaN }))).toBe("INVALID_DOCUMENT");
    expect(valueOf(m.transform({ d: new Date(0) }))).toBe("INVALID_DOCUMENT");
    expect(valueOf(m.transform({ u: undefined }))).toBe("INVALID_DOCUMENT");
  });

  it("throws when the initial rules are rejected", () => {
    expect(
      () => new Mutator({ rules: [{ id: "x", when: "$", action: {} }] }),
    ).toThrow(/^\[SCHEMA_ERROR\]/);
  });

  it("starts with an empty rule set", () => {
    const m = createMutator();
    expect(m.version).toBe(0);
    expect(m.snapshot().size).toBe(0);
    expect(valueOf(m.transform({ a: [1] }))).toEqual({ a: [1] });
  });

  it("uses the newly loaded rules for later documents", () => {
    const m = createMutator({ rules });
    const r = m.load([
      { id: "v", when: "$.v", action: { op: "replace", value: 2 } },
    ]);
    expect(r.ok).toBe(true);
    expect(m.version).toBe(2);
    expect(valueOf(m.transform({ v: 1, code: "a" }))).toEqual({
      v: 2,
      code: "a",
    });
  });

  it("keeps the active rules when a load fails", () => {
    const m = createMutator({ rules });
    const r = m.load("rules: [");
    expect(r.ok).toBe(false);
    expect(m.version).toBe(1);
    expect(valueOf(m.transform({ code: "a" }))).toEqual({ code: "A" });
  });

  it("transforms a batch", () => {
    const m = createMutator({ rules });
    const out = m.transformMany(
      [{ code: "a" }, "not json", "<code>b</code>"],
      { payloadType: "auto" },
    );
    expect(out.map(valueOf)).toEqual([
      { code: "A" },
      "PAYLOAD_PARSE_ERROR",
      { code: "B" },
    ]);
  });
});

describe("createMutatorFromEnv", () => {
  it("loads the configured rule file", async () => {
    const m = await createMutatorFromEnv({
      JSON_MUTATOR_LOG_LEVEL: "silent",
      JSON_MUTATOR_RULES_PATH: fileURLToPath(
        new URL("./fixtures/rules.json", import.meta.url),
      ),
    });
    expect(m.version).toBe(1);
    expect(valueOf(m.transform({ status: "open" }))).toEqual({
      status: "open",
    });
  });

  it("rejects when the rule file does not load", async () => {
    await expect(
      createMutatorFromEnv({
        JSON_MUTATOR_LOG_LEVEL: "silent",
        JSON_MUTATOR_RULES_PATH: "/nonexistent/rules.yaml",
      }),
    ).rejects.toThrow(/^\[READ_ERROR\]/);
  });
});
