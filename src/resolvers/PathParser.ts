import type { JsonPrimitive } from "../types/document.js";
import type { ComparisonOp } from "../types/spec.js";

// --------------------
// Types
// --------------------

export type MemberKey = string | number;

/** Relative path used inside filters: `@`, `@.a.b`, `@['a'][0]` */
export type RelativePath = ReadonlyArray<MemberKey>;

export type FilterExpr =
  | { kind: "exists"; path: RelativePath }
  | {
      kind: "compare";
      path: RelativePath;
      op: ComparisonOp;
      literal: JsonPrimitive;
    };

export type Selector =
  | { kind: "member"; name: string }
  | { kind: "index"; index: number }
  | { kind: "union"; keys: ReadonlyArray<MemberKey> }
  | { kind: "wildcard" }
  | { kind: "filter"; filter: FilterExpr };

export interface PathSegment {
  /** true for `..` (apply the selector to the node and every descendant) */
  descendant: boolean;
  selector: Selector;
}

export interface ParseOptions {
  /** If true, expressions without a leading `$` are read from the root */
  allowBarePaths: boolean;
}

export class PathSyntaxError extends Error {
  constructor(
    message: string,
    readonly expression: string,
    readonly position: number,
  ) {
    super(`${message} at position ${position} in '${expression}'`);
    this.name = "PathSyntaxError";
  }
}

const NAME_RE = /^[\p{L}\p{N}_$-]+/u;
const INT_RE = /^-?\d+/;
const NUMBER_RE = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;
const COMPARISON_OPS: ReadonlyArray<ComparisonOp> = [
  "==",
  "!=",
  "<=",
  ">=",
  "<",
  ">",
];

// --------------------
// Public API
// --------------------

/**
 * Parse a path expression into segments.
 *
 * Supports `$`, `.name`, `['name']`, `[0]`, `[-1]`, `['a','b']`, `.*`,
 * `[*]`, `..sel` and `[?(@.field op literal)]`. Bare expressions such as
 * `customer.devices.0.id` are rooted at `$` when allowed.
 */
export function parsePath(
  expression: string,
  opts: ParseOptions = { allowBarePaths: true },
): PathSegment[] {
  const src = (expression ?? "").trim();
  if (!src) throw new PathSyntaxError("Empty path expression", src, 0);

  let body: string;
  if (src.startsWith("$")) {
    body = src.slice(1);
  } else {
    if (!opts.allowBarePaths) {
      throw new PathSyntaxError("Path must start with '$'", src, 0);
    }
    body = src.startsWith("[") || src.startsWith(".") ? src : `.${src}`;
  }

  return new Scanner(src, body, src.length - body.length).segments();
}

// --------------------
// Scanner
// --------------------

class Scanner {
  private pos = 0;

  constructor(
    private readonly expression: string,
    private readonly body: string,
    private readonly offset: number,
  ) {}

  segments(): PathSegment[] {
    const out: PathSegment[] = [];
    while (!this.done()) {
      if (this.eat("..")) {
        out.push({ descendant: true, selector: this.afterDot(true) });
      } else if (this.eat(".")) {
        out.push({ descendant: false, selector: this.afterDot(false) });
      } else if (this.peek() === "[") {
        out.push({ descendant: false, selector: this.bracket() });
      } else {
        this.fail(`Unexpected '${this.peek()}'`);
      }
    }
    return out;
  }

  private afterDot(descendant: boolean): Selector {
    if (this.eat("*")) return { kind: "wildcard" };
    if (descendant && this.peek() === "[") return this.bracket();

    const m = NAME_RE.exec(this.rest());
    if (!m) return this.fail("Expected member name");
    this.pos += m[0].length;
    return { kind: "member", name: m[0] };
  }

  private bracket(): Selector {
    this.expect("[");
    this.skipSpaces();

    let selector: Selector;
    if (this.eat("*")) {
      selector = { kind: "wildcard" };
    } else if (this.eat("?")) {
      this.skipSpaces();
      this.expect("(");
      selector = { kind: "filter", filter: this.filter() };
      this.skipSpaces();
      this.expect(")");
    } else {
      const keys: MemberKey[] = [this.key()];
      this.skipSpaces();
      while (this.eat(",")) {
        this.skipSpaces();
        keys.push(this.key());
        this.skipSpaces();
      }
      selector = toSelector(keys);
    }

    this.skipSpaces();
    this.expect("]");
    return selector;
  }

  private key(): MemberKey {
    const c = this.peek();
    if (c === "'" || c === '"') return this.quoted();

    const m = INT_RE.exec(this.rest());
    if (!m) return this.fail("Expected quoted name or integer index");
    this.pos += m[0].length;
    return Number(m[0]);
  }

  private filter(): FilterExpr {
    this.skipSpaces();
    this.expect("@");
    const path = this.relativePath();
    this.skipSpaces();

    const op = COMPARISON_OPS.find((o) => this.rest().startsWith(o));
    if (!op) return { kind: "exists", path };
    this.pos += op.length;
    this.skipSpaces();
    return { kind: "compare", path, op, literal: this.literal() };
  }

  private relativePath(): MemberKey[] {
    const out: MemberKey[] = [];
    for (;;) {
      if (this.eat(".")) {
        const m = NAME_RE.exec(this.rest());
        if (!m) return this.fail("Expected member name");
        this.pos += m[0].length;
        out.push(m[0]);
      } else if (this.peek() === "[") {
        this.expect("[");
        this.skipSpaces();
        out.push(this.key());
        this.skipSpaces();
        this.expect("]");
      } else {
        return out;
      }
    }
  }

  private literal(): JsonPrimitive {
    const c = this.peek();
    if (c === "'" || c === '"') return this.quoted();

    for (const [word, value] of [
      ["true", true],
      ["false", false],
      ["null", null],
    ] as const) {
      if (this.eat(word)) return value;
    }

    const m = NUMBER_RE.exec(this.rest());
    if (!m) return this.fail("Expected literal");
    this.pos += m[0].length;
    return Number(m[0]);
  }

  private quoted(): string {
    const quote = this.peek();
    this.pos++;
    let out = "";
    while (!this.done()) {
      const c = this.body.charAt(this.pos++);
      if (c === quote) return out;
      if (c === "\\") {
        if (this.done()) break;
        out += this.body.charAt(this.pos++);
        continue;
      }
      out += c;
    }
    return this.fail("Unterminated string");
  }

  // --------------------
  // Helpers
  // --------------------

  private done(): boolean {
    return this.pos >= this.body.length;
  }

  private peek(): string {
    return this.body.charAt(this.pos);
  }

  private rest(): string {
    return this.body.slice(this.pos);
  }

  private eat(token: string): boolean {
    if (!this.rest().startsWith(token)) return false;
    this.pos += token.length;
    return true;
  }

  private expect(token: string): void {
    if (!this.eat(token)) this.fail(`Expected '${token}'`);
  }

  private skipSpaces(): void {
    while (this.peek() === " ") this.pos++;
  }

  private fail(message: string): never {
    throw new PathSyntaxError(
      message,
      this.expression,
      this.offset + this.pos,
    );
  }
}

function toSelector(keys: MemberKey[]): Selector {
  if (keys.length > 1) return { kind: "union", keys };
  const [k] = keys;
  if (typeof k === "number") return { kind: "index", index: k };
  return { kind: "member", name: k ?? "" };
}
