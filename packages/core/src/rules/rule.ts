/**
 * A single validation predicate plus the message shown when it fails.
 *
 * `check` must be a pure function of its input: no side effects, no reads of
 * hidden mutable state. Dependent rules receive their context through an
 * explicit reader (see createDependentRule).
 */
export interface Rule<T> {
  readonly message: string;
  check(value: T): boolean;
}

/** Reads a context value at evaluation time, e.g. another field's current value */
export type ContextReader<C> = () => C;

export function createRule<T>(message: string, check: (value: T) => boolean): Rule<T> {
  return Object.freeze({ message, check });
}

/**
 * Build a rule whose check also depends on an external value.
 * `readContext` is called on every evaluation; nothing is cached between passes.
 */
export function createDependentRule<T, C>(
  message: string,
  readContext: ContextReader<C>,
  check: (value: T, context: C) => boolean
): Rule<T> {
  return Object.freeze({
    message,
    check: (value: T) => check(value, readContext()),
  });
}
