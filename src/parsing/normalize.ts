import type { JsonValue } from "../types/document.js";
import type { InputKind } from "../types/internal.js";
import { DocumentError } from "../core/Errors.js";
import { parseXmlToObject } from "./xml.js";

export type PayloadType = InputKind | "auto";

/**
 * Turn an input into a document. Strings are parsed as JSON or converted
 * from XML; other values must already be JSON trees.
 */
export function normalizePayload(
  payload: unknown,
  typeHint: PayloadType = "json",
): { kind: InputKind; document: JsonValue } {
  const kind = typeHint === "auto" ? detectInputType(payload) : typeHint;

  if (kind === "json") {
    const value: unknown =
      typeof payload === "string" ? JSON.parse(payload) : payload;
    return { kind, document: toDocument(value) };
  }

  if (typeof payload !== "string") {
    throw new Error("XML payload must be a string");
  }
  return { kind, document: toDocument(parseXmlToObject(payload)) };
}

/** Text whose first non-blank character (after a BOM) is `<` is XML. */
export function detectInputType(input: unknown): InputKind {
  if (typeof input !== "string") return "json";
  return /^\uFEFF?\s*</.test(input) ? "xml" : "json";
}

/**
 * Check that `value` is a finite, acyclic JSON tree made of plain objects,
 * arrays and primitives, and return it typed as such. Throws DocumentError.
 */
export function toDocument(value: unknown): JsonValue {
  assertJsonValue(value, "$", new Set());
  return value;
}

function assertJsonValue(
  value: unknown,
  at: string,
  ancestors: Set<object>,
): asserts value is JsonValue {
  if (value === null) return;
  switch (typeof value) {
    case "string":
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) {
        throw new DocumentError("Non-finite number", at);
      }
      return;
    case "object":
      break;
    default:
      throw new DocumentError(`Unsupported value of type ${typeof value}`, at);
  }

  if (ancestors.has(value)) throw new DocumentError("Cyclic reference", at);
  ancestors.add(value);

  if (Array.isArray(value)) {
    for (const [i, v] of value.entries()) {
      assertJsonValue(v, `${at}[${i}]`, ancestors);
    }
  } else {
    const proto = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new DocumentError("Not a plain object", at);
    }
    for (const [k, v] of Object.entries(value)) {
      assertJsonValue(v, `${at}.${k}`, ancestors);
    }
  }

  ancestors.delete(value);
}
