import type {
  JsonContainer,
  JsonObject,
  JsonTypeName,
  JsonValue,
} from "../types/document.js";

export function jsonTypeOf(v: JsonValue): JsonTypeName {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  switch (typeof v) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

export function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

export function isContainer(v: JsonValue | undefined): v is JsonContainer {
  return v != null && typeof v === "object";
}

/** Structural equality without coercion; member order is not significant. */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((x, i) => {
      const y = b[i];
      return y !== undefined && jsonEquals(x, y);
    });
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const ka = Object.keys(a);
    if (ka.length !== Object.keys(b).length) return false;
    return ka.every((k) => {
      const x = a[k];
      const y = b[k];
      return (
        x !== undefined &&
        y !== undefined &&
        Object.prototype.hasOwnProperty.call(b, k) &&
        jsonEquals(x, y)
      );
    });
  }
  return false;
}
