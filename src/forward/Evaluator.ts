/**
 * Operator-dispatch evaluator
 * Runs a generic function on Dual inputs; each elementary operation is dispatched
 * to the rule registry as it executes.
 */

import { Dual, checkFinite } from './Dual.js';
import { IncompatibleFunctionSignature } from './Errors.js';
import { DualOps, GenericFunction } from './NumericOps.js';
import { RuleRegistry, defaultRegistry } from './Rules.js';

export interface EvaluateOptions {
  registry?: RuleRegistry;
}

export function evaluateWithTangent(
  fn: GenericFunction,
  inputs: readonly Dual[],
  options: EvaluateOptions = {}
): Dual {
  if (typeof fn !== 'function') {
    throw new IncompatibleFunctionSignature('target is not a function');
  }

  // fn.length counts `ops` plus fixed parameters; 0 or 1 means rest parameters
  if (fn.length > 1 && fn.length !== inputs.length + 1) {
    throw new IncompatibleFunctionSignature(
      `function declares ${fn.length - 1} operand parameter(s) but ${inputs.length} input(s) were given`
    );
  }

  inputs.forEach((input, i) => {
    if (!(input instanceof Dual)) {
      throw new IncompatibleFunctionSignature(`input ${i} is not a Dual`);
    }
    checkFinite(`input ${i}`, input.value, input.tangent);
  });

  const ops = new DualOps(options.registry ?? defaultRegistry);
  const result: unknown = fn(ops, ...inputs);

  if (!(result instanceof Dual)) {
    throw new IncompatibleFunctionSignature(
      `function returned ${typeof result} instead of a Dual; it must compute through NumericOps`
    );
  }
  return result;
}
