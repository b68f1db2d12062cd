import { gradientError } from '../src/GradCheck';

/**
 * Conditional console.log that only outputs when VERBOSE=true environment variable is set.
 * This keeps test output clean by default while allowing detailed logging when needed.
 *
 * Run with verbose output:
 *   npm run test:verbose
 */
export function testLog(...args: unknown[]): void {
  if (process.env.VERBOSE === 'true') {
    console.log(...args);
  }
}

/**
 * Asserts that actual matches expected within a relative tolerance
 * (absolute below magnitude 1).
 */
export function expectGradClose(actual: number, expected: number, tolerance = 1e-6): void {
  const error = gradientError(actual, expected);
  if (!(error <= tolerance)) {
    testLog(`gradient mismatch: actual=${actual}, expected=${expected}, error=${error}`);
  }
  expect(error).toBeLessThanOrEqual(tolerance);
}
