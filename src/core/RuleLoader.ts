import { readFile } from "node:fs/promises";
import path from "node:path";
import { load as yamlLoad } from "js-yaml";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { SourceFormat } from "../types/spec.js";
import type { LoadError, LoadResult } from "../types/result.js";
import { err, messageOf } from "./Errors.js";
import { RuleSet, type RuleSetStore } from "./RuleSet.js";
import { compileRules } from "./validateRules.js";

export interface RuleLoaderOptions {
  store: RuleSetStore;
  logger?: Logger;
  /** default: true (bare path => rooted at `$`) */
  allowBarePaths?: boolean;
}

export interface LoadOptions {
  /** default: "auto" (JSON when the text starts with `[` or `{`, else YAML) */
  format?: SourceFormat;
  /** shown in logs and errors */
  origin?: string;
}

/**
 * Parses, validates and publishes rule sources. Validation is all-or-nothing
 * per source. On failure the previously active snapshot keeps serving and
 * the error is returned to the caller.
 */
export class RuleLoader {
  private store: RuleSetStore;
  private logger: Logger;
  private allowBarePaths: boolean;

  constructor(opts: RuleLoaderOptions) {
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger();
    this.allowBarePaths = opts.allowBarePaths ?? true;
  }

  /**
   * Load from rule text, or from an already parsed value (array of rule
   * records or `{ version, rules }` envelope).
   */
  load(source: unknown, opts: LoadOptions = {}): LoadResult {
    const origin = opts.origin ?? "(inline)";

    let raw: unknown = source;
    if (typeof source === "string") {
      try {
        raw = parseText(source, opts.format ?? "auto");
      } catch (e) {
        return this.reject(
          err("PARSE_ERROR", `Could not parse rule source: ${messageOf(e)}`, {
            cause: e,
          }),
          origin,
        );
      }
    }

    const compiled = compileRules(raw, { allowBarePaths: this.allowBarePaths });
    if (!compiled.ok) return this.reject(compiled.error, origin);

    const ruleSet = RuleSet.of(compiled.rules);
    const version = this.store.publish(ruleSet);
    this.logger.info(
      { origin, version, rules: ruleSet.size, name: compiled.name },
      "published rule set",
    );
    return { ok: true, ruleSet, version };
  }

  /** Read a `.json`, `.yaml` or `.yml` file and load it. */
  async loadFile(file: string): Promise<LoadResult> {
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (e) {
      return this.reject(
        err("READ_ERROR", `Could not read rule file: ${messageOf(e)}`, {
          file,
        }),
        file,
      );
    }
    return this.load(text, { format: formatOf(file), origin: file });
  }

  private reject(error: LoadError, origin: string): LoadResult {
    this.logger.warn(
      {
        origin,
        code: error.code,
        field: error.field,
        activeVersion: this.store.version,
      },
      `rule source rejected: ${error.message}`,
    );
    return { ok: false, error };
  }
}

function parseText(text: string, format: SourceFormat): unknown {
  const kind =
    format === "auto" ? (/^\s*[[{]/.test(text) ? "json" : "yaml") : format;
  return kind === "json" ? JSON.parse(text) : yamlLoad(text);
}

function formatOf(file: string): SourceFormat {
  switch (path.extname(file).toLowerCase()) {
    case ".json":
      return "json";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      return "auto";
  }
}
