/**
 * Numerical gradient checking.
 * Validates backward-pass gradients against central finite differences.
 */

import { DomainError } from './Errors';
import { Value } from './Value';

export interface GradCheckOptions {
  /** Finite-difference step. */
  epsilon?: number;
  /** Largest accepted error per input. */
  tolerance?: number;
  /** Labels for the generated leaves, by input index. */
  labels?: readonly string[];
}

export interface GradCheckEntry {
  index: number;
  label?: string;
  analytical: number;
  numerical: number;
  error: number;
  passed: boolean;
  /**
   * Set when a finite-difference point falls outside the function's domain.
   * Such an entry has NaN numerical and error values and does not count
   * towards the overall result.
   */
  notComputable?: string;
}

export interface GradCheckResult {
  passed: boolean;
  value: number;
  entries: GradCheckEntry[];
  maxError: number;
}

/**
 * Central finite difference of fn with respect to each input.
 */
export function numericalGradient(
  fn: (inputs: number[]) => number,
  point: readonly number[],
  epsilon = 1e-6
): number[] {
  return point.map((_, i) => partialDerivative(fn, point, i, epsilon));
}

/**
 * Central finite difference of fn with respect to input i.
 */
export function partialDerivative(
  fn: (inputs: number[]) => number,
  point: readonly number[],
  i: number,
  epsilon = 1e-6
): number {
  const plus = [...point];
  const minus = [...point];
  plus[i] += epsilon;
  minus[i] -= epsilon;
  return (fn(plus) - fn(minus)) / (2 * epsilon);
}

/**
 * Error measure used by the checker: relative for large magnitudes,
 * absolute near zero.
 */
export function gradientError(analytical: number, numerical: number): number {
  const scale = Math.max(1, Math.abs(analytical), Math.abs(numerical));
  return Math.abs(analytical - numerical) / scale;
}

/**
 * Builds one leaf per entry of point, runs fn on them, backpropagates from the
 * result and compares every leaf gradient with a central finite difference.
 */
export function checkGradients(
  fn: (inputs: Value[]) => Value,
  point: readonly number[],
  options: GradCheckOptions = {}
): GradCheckResult {
  const epsilon = options.epsilon ?? 1e-6;
  const tolerance = options.tolerance ?? 1e-6;

  const leaves = point.map((x, i) => new Value(x, options.labels?.[i]));
  const out = fn(leaves);
  out.backward();

  const evalAt = (xs: number[]): number => fn(xs.map((x, i) => new Value(x, options.labels?.[i]))).value;

  const entries = leaves.map((leaf, index): GradCheckEntry => {
    const entry: GradCheckEntry = {
      index,
      analytical: leaf.grad,
      numerical: NaN,
      error: NaN,
      passed: false,
    };
    if (leaf.label !== undefined) entry.label = leaf.label;

    try {
      entry.numerical = partialDerivative(evalAt, point, index, epsilon);
    } catch (err) {
      if (!(err instanceof DomainError)) throw err;
      entry.notComputable = err.message;
      return entry;
    }
    entry.error = gradientError(entry.analytical, entry.numerical);
    entry.passed = entry.error <= tolerance;
    return entry;
  });

  const computed = entries.filter(e => e.notComputable === undefined);
  return {
    passed: computed.every(e => e.passed),
    value: out.value,
    entries,
    maxError: computed.reduce((m, e) => Math.max(m, e.error), 0),
  };
}

/**
 * Format gradient check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, name = 'f'): string {
  const computed = result.entries.filter(e => e.notComputable === undefined);
  const skipped = result.entries.filter(e => e.notComputable !== undefined);
  const paramOf = (e: GradCheckEntry): string => e.label ?? `#${e.index}`;

  const lines: string[] = [];
  if (result.passed) {
    lines.push(`✓ ${name}: ${computed.length} gradients verified (max error: ${result.maxError.toExponential(2)})`);
  } else {
    const failed = computed.filter(e => !e.passed);
    lines.push(`✗ ${name}: ${failed.length}/${computed.length} gradients FAILED`);
    for (const e of failed) {
      lines.push(`  ${paramOf(e)}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
    }
  }
  for (const e of skipped) {
    lines.push(`  ${paramOf(e)}: not computable (${e.notComputable})`);
  }
  return lines.join('\n');
}
