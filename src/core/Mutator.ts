import type { JsonValue } from "../types/document.js";
import type { LoadResult, TransformResult } from "../types/result.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { normalizePayload, type PayloadType } from "../parsing/normalize.js";
import { DocumentError, messageOf, transformErr } from "./Errors.js";
import { applyRules } from "./RuleEngine.js";
import { RuleLoader, type LoadOptions } from "./RuleLoader.js";
import { RuleSetStore, type RuleSet } from "./RuleSet.js";

export interface MutatorOptions {
  /** initial rule source (text or parsed); rejected sources throw */
  rules?: unknown;
  /** default: true (bare path => rooted at `$`) */
  allowBarePaths?: boolean;
  logger?: Logger;
  /** debug-level summary per transformed document */
  debug?: boolean;
}

export interface TransformOptions {
  /**
   * default: "json" (a JSON value or JSON text). XML text is converted only
   * when asked for with "xml", or detected under "auto".
   */
  payloadType?: PayloadType;
}

/**
 * Holds the active rule set snapshot and applies it to documents.
 *
 * `transform` captures the snapshot once at its start, so a concurrent
 * `load` never changes the rules a document is being transformed with.
 */
export class Mutator {
  private store: RuleSetStore;
  private loader: RuleLoader;
  private logger: Logger;
  private debug: boolean;

  constructor(opts: MutatorOptions = {}) {
    this.logger = opts.logger ?? silentLogger();
    this.debug = opts.debug ?? false;
    this.store = new RuleSetStore();
    this.loader = new RuleLoader({
      store: this.store,
      logger: this.logger,
      allowBarePaths: opts.allowBarePaths,
    });

    if (opts.rules !== undefined) {
      const r = this.loader.load(opts.rules);
      if (!r.ok) throw new Error(`[${r.error.code}] ${r.error.message}`);
    }
  }

  load(source: unknown, opts?: LoadOptions): LoadResult {
    return this.loader.load(source, opts);
  }

  loadFile(file: string): Promise<LoadResult> {
    return this.loader.loadFile(file);
  }

  /** The currently published rule set. */
  snapshot(): RuleSet {
    return this.store.current();
  }

  get version(): number {
    return this.store.version;
  }

  transform(input: unknown, opts: TransformOptions = {}): TransformResult {
    return this.transformWith(this.store.current(), input, opts);
  }

  /** Transform a batch against one snapshot captured for the whole batch. */
  transformMany(
    inputs: ReadonlyArray<unknown>,
    opts: TransformOptions = {},
  ): TransformResult[] {
    const ruleSet = this.store.current();
    return inputs.map((input) => this.transformWith(ruleSet, input, opts));
  }

  private transformWith(
    ruleSet: RuleSet,
    input: unknown,
    opts: TransformOptions,
  ): TransformResult {
    let document: JsonValue;
    try {
      const kind = opts.payloadType ?? "json";
      document = normalizePayload(input, kind).document;
    } catch (e) {
      if (e instanceof DocumentError) {
        return {
          ok: false,
          error: transformErr("INVALID_DOCUMENT", e.message, { path: e.path }),
        };
      }
      return {
        ok: false,
        error: transformErr("PAYLOAD_PARSE_ERROR", messageOf(e)),
      };
    }

    const value = applyRules(document, ruleSet);
    if (this.debug) {
      this.logger.debug({ rules: ruleSet.size }, "document transformed");
    }
    return { ok: true, value };
  }
}
