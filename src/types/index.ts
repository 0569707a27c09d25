export * from "./records.js";

/**
 * Outcome of one adapter call.
 *
 * `empty` means upstream answered with nothing to store; `malformed` means
 * the payload could not be read. Neither is an exception.
 */
export type AdapterResult<T> =
  | { kind: "found"; value: T }
  | { kind: "empty" }
  | { kind: "malformed"; reason: string };

export function found<T>(value: T): AdapterResult<T> {
  return { kind: "found", value };
}

export function empty<T>(): AdapterResult<T> {
  return { kind: "empty" };
}

export function malformed<T>(reason: string): AdapterResult<T> {
  return { kind: "malformed", reason };
}
