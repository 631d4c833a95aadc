import type { PathSegment } from "../resolvers/PathParser.js";
import type { Action, Condition } from "./spec.js";

/** A validated, compiled rule as held by a RuleSet. */
export interface Rule {
  readonly id: string;
  /** the path expression as authored */
  readonly when: string;
  readonly path: ReadonlyArray<PathSegment>;
  readonly condition?: Condition;
  readonly action: Action;
}

export type InputKind = "json" | "xml";
