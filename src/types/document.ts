export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonContainer = JsonValue[] | JsonObject;

export type JsonTypeName =
  | "string"
  | "number"
  | "boolean"
  | "null"
  | "array"
  | "object";

/**
 * Addressable location inside a document: the owning container plus the
 * member key or element index. Writing through a slot never changes its
 * address, so the same slot can be read and written by every step of a
 * sequence.
 */
export interface Slot {
  readonly container: JsonContainer;
  readonly key: string | number;
  get(): JsonValue | undefined;
  set(value: JsonValue): void;
}
