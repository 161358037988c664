/**
 * Shared test helpers.
 */

/** Run `fn` and return what it threw. Fails the test if nothing was thrown. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

/** Unwrap a value a test has set up to exist. */
export function must<T>(value: T | undefined): T {
  if (value === undefined) {
    throw new Error("Expected a value");
  }
  return value;
}
