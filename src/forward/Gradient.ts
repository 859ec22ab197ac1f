/**
 * Gradient driver
 *
 * Forward mode computes one directional derivative per pass, so a full gradient
 * over n inputs takes n passes, each seeding a single input with tangent 1.
 */

import { Dual } from './Dual.js';
import { IncompatibleFunctionSignature } from './Errors.js';
import { EvaluateOptions, evaluateWithTangent } from './Evaluator.js';
import { GenericFunction } from './NumericOps.js';
import { TransformedFunction } from './Transformer.js';

export type GradientTarget = GenericFunction | TransformedFunction;

export interface ValueAndGradient {
  value: number;
  gradient: number[];
}

export function oneHot(length: number, index: number): number[] {
  return Array.from({ length }, (_, i) => (i === index ? 1 : 0));
}

/**
 * Evaluate along an arbitrary tangent direction
 */
export function directionalDerivative(
  target: GradientTarget,
  point: readonly number[],
  direction: readonly number[],
  options: EvaluateOptions = {}
): Dual {
  if (direction.length !== point.length) {
    throw new IncompatibleFunctionSignature(
      `direction has ${direction.length} component(s), point has ${point.length}`
    );
  }
  if (target instanceof TransformedFunction) {
    return target.call(point, direction);
  }
  return evaluateWithTangent(target, Dual.seeded(point, direction), options);
}

export function gradient(
  target: GradientTarget,
  point: readonly number[],
  options: EvaluateOptions = {}
): number[] {
  return point.map((_, i) =>
    directionalDerivative(target, point, oneHot(point.length, i), options).tangent
  );
}

export function valueAndGradient(
  target: GradientTarget,
  point: readonly number[],
  options: EvaluateOptions = {}
): ValueAndGradient {
  if (point.length === 0) {
    return { value: directionalDerivative(target, point, [], options).value, gradient: [] };
  }

  let value = 0;
  const grad = point.map((_, i) => {
    const result = directionalDerivative(target, point, oneHot(point.length, i), options);
    value = result.value;
    return result.tangent;
  });
  return { value, gradient: grad };
}
