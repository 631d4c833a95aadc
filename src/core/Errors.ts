import type { LoadError, TransformError } from "../types/result.js";

export function err(
  code: LoadError["code"],
  message: string,
  details?: unknown,
  field?: string,
): LoadError {
  return { code, message, details, field };
}

export function transformErr(
  code: TransformError["code"],
  message: string,
  details?: unknown,
): TransformError {
  return { code, message, details };
}

/** Thrown when an input is not a finite, acyclic JSON tree. */
export class DocumentError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = "DocumentError";
  }
}

export function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
