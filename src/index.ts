export type {
  JsonValue,
  JsonObject,
  JsonPrimitive,
  JsonTypeName,
  Slot,
} from "./types/document.js";
export type {
  Action,
  ActionSpec,
  Condition,
  ConditionSpec,
  RuleRecordV1,
  RuleSourceV1,
  SingleAction,
  SequenceAction,
  SourceFormat,
} from "./types/spec.js";
export type { Rule } from "./types/internal.js";
export type {
  LoadError,
  LoadResult,
  TransformError,
  TransformResult,
} from "./types/result.js";

export { parsePath, PathSyntaxError } from "./resolvers/PathParser.js";
export type { PathSegment } from "./resolvers/PathParser.js";
export { resolve, resolveIn, rootHolder } from "./resolvers/PathResolver.js";
export { evaluateCondition } from "./core/ConditionEvaluator.js";
export {
  applyAction,
  executeAction,
  NO_OP,
  type ActionOutcome,
} from "./actions/ActionExecutor.js";
export { RuleSet, RuleSetStore } from "./core/RuleSet.js";
export { applyRules } from "./core/RuleEngine.js";
export { compileCondition, compileRules } from "./core/validateRules.js";
export { RuleLoader } from "./core/RuleLoader.js";
export { DocumentError } from "./core/Errors.js";
export { toDocument } from "./parsing/normalize.js";
export { loadConfig, type EngineConfig } from "./config.js";
export { createLogger, type Logger } from "./logging/logger.js";

import { Mutator, type MutatorOptions } from "./core/Mutator.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logging/logger.js";

export { Mutator, type MutatorOptions };

export function createMutator(opts: MutatorOptions = {}) {
  return new Mutator(opts);
}

/**
 * Build a mutator from environment settings, loading the configured rule
 * file if there is one. Rejects when that file does not load.
 */
export async function createMutatorFromEnv(
  env: Record<string, string | undefined> = process.env,
): Promise<Mutator> {
  const config = loadConfig(env);
  const mutator = new Mutator({
    allowBarePaths: config.allowBarePaths,
    logger: createLogger({ level: config.logLevel }),
  });
  if (config.rulesPath) {
    const r = await mutator.loadFile(config.rulesPath);
    if (!r.ok) throw new Error(`[${r.error.code}] ${r.error.message}`);
  }
  return mutator;
}
