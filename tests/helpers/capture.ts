/**
 * Run fn and return what it throws (fails the test when nothing is thrown)
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
