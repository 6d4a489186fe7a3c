import type { SandboxError } from "./errors.js";

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: SandboxError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: SandboxError): Result<T> {
  return { ok: false, error };
}

/** Returns the success value, or throws the carried error. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
