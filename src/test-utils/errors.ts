/**
 * Error assertions for tests
 */

/**
 * Run fn and return what it throws
 *
 * @throws Error if fn returns normally
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
