import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      rulesPath: undefined,
      allowBarePaths: true,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        JSON_MUTATOR_LOG_LEVEL: "debug",
        JSON_MUTATOR_RULES_PATH: "/etc/rules.yaml",
        JSON_MUTATOR_ALLOW_BARE_PATHS: "0",
      }),
    ).toEqual({
      logLevel: "debug",
      rulesPath: "/etc/rules.yaml",
      allowBarePaths: false,
    });
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ JSON_MUTATOR_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid configuration: JSON_MUTATOR_LOG_LEVEL: /,
    );
    expect(() =>
      loadConfig({ JSON_MUTATOR_ALLOW_BARE_PATHS: "maybe" }),
    ).toThrow(/JSON_MUTATOR_ALLOW_BARE_PATHS/);
  });
});
