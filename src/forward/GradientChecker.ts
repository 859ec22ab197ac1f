/**
 * Numerical gradient checking
 * Validates forward-mode gradients against central finite differences
 */

import { gradient, GradientTarget } from './Gradient.js';
import { ValueOps } from './NumericOps.js';
import { RuleRegistry, defaultRegistry } from './Rules.js';
import { TransformedFunction } from './Transformer.js';

/**
 * Gradient checking result
 */
export interface GradCheckResult {
  passed: boolean;
  errors: GradCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface GradCheckError {
  parameter: string;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Format gradient check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, funcName: string): string {
  if (result.passed) {
    return `✓ ${funcName}: ${result.totalChecks} gradients verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${funcName}: ${result.errors.length}/${result.totalChecks} gradients FAILED`
  ];
  for (const e of result.errors) {
    lines.push(`  ${e.parameter}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
  }
  return lines.join('\n');
}

/**
 * Gradient checker
 */
export class GradientChecker {
  constructor(
    private epsilon: number = 1e-5,
    private tolerance: number = 1e-4,
    private registry: RuleRegistry = defaultRegistry
  ) {}

  check(target: GradientTarget, point: readonly number[]): GradCheckResult {
    const analyticalGradient = gradient(target, point, { registry: this.registry });
    const names = target instanceof TransformedFunction
      ? target.params
      : point.map((_, i) => `x${i}`);

    const errors: GradCheckError[] = [];
    let maxError = 0;
    let sumError = 0;

    analyticalGradient.forEach((analytical, i) => {
      const numerical = this.numericalPartial(target, point, i);
      const error = Math.abs(analytical - numerical);
      const relativeError = Math.abs(error / (numerical + 1e-10));

      maxError = Math.max(maxError, error);
      sumError += error;

      if (error > this.tolerance && relativeError > this.tolerance) {
        errors.push({ parameter: names[i], analytical, numerical, error, relativeError });
      }
    });

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError: point.length > 0 ? sumError / point.length : 0,
      totalChecks: point.length
    };
  }

  /**
   * Central difference: (f(x+h) - f(x-h)) / (2h)
   */
  private numericalPartial(target: GradientTarget, point: readonly number[], index: number): number {
    const plus = [...point];
    const minus = [...point];
    plus[index] += this.epsilon;
    minus[index] -= this.epsilon;
    return (this.evaluate(target, plus) - this.evaluate(target, minus)) / (2 * this.epsilon);
  }

  private evaluate(target: GradientTarget, point: readonly number[]): number {
    if (target instanceof TransformedFunction) {
      return target.call(point, point.map(() => 0)).value;
    }
    return target(new ValueOps(this.registry), ...point);
  }
}
