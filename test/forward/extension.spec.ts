import { describe, it, expect } from 'vitest';
import { Dual } from '../../src/forward/Dual.js';
import {
  DuplicateRule,
  RegistryFrozen,
  UnsupportedExpression,
  UnsupportedOperation
} from '../../src/forward/Errors.js';
import { evaluateWithTangent } from '../../src/forward/Evaluator.js';
import { gradient } from '../../src/forward/Gradient.js';
import { IR } from '../../src/forward/IR.js';
import { GenericFunction } from '../../src/forward/NumericOps.js';
import { createRegistry, defaultRegistry, registerRule } from '../../src/forward/Rules.js';
import { transform } from '../../src/forward/Transformer.js';

// Registered before anything in this file evaluates through the default registry
const cubeRule = registerRule(
  'cube',
  1,
  (_, [t], [v]) => new Dual(v * v * v, 3 * v * v * t),
  'x^3'
);

const cube: GenericFunction = (ops, x) => ops.apply('cube', [x]);

function cubeIR() {
  return IR.fn('c', ['x'], [IR.assign('y', 'cube', ['x']), IR.ret('y')]);
}

describe('registerRule', () => {
  it('should add the rule to the default registry', () => {
    expect(cubeRule.op).toBe('cube');
    expect(cubeRule.arity).toBe(1);
    expect(cubeRule.description).toBe('x^3');
    expect(defaultRegistry.has('cube')).toBe(true);
  });

  it('should reject a second rule for a built-in operation', () => {
    expect(() => registerRule('add', 2, (_, [a, b]) => new Dual(0, a + b))).toThrow(DuplicateRule);
  });

  it('should differentiate through the new rule on both paths', () => {
    expect(evaluateWithTangent(cube, [Dual.variable(2)])).toEqual(new Dual(8, 12));
    expect(transform(cubeIR()).call([2], [1])).toEqual(new Dual(8, 12));
    expect(gradient(cube, [-1])).toEqual([3]);
  });

  it('should compose with elementary rules', () => {
    const f: GenericFunction = (ops, x) => ops.sin(ops.apply('cube', [x]));
    const [d] = gradient(f, [1]);
    expect(d).toBeCloseTo(3 * Math.cos(1), 12);
  });

  it('should stay local to the registry it was added to', () => {
    const registry = createRegistry();
    expect(() => evaluateWithTangent(cube, [Dual.variable(2)], { registry })).toThrow(UnsupportedOperation);
    expect(() => transform(cubeIR(), { registry })).toThrow(UnsupportedExpression);
  });

  it('should refuse registration once evaluation has started', () => {
    gradient(cube, [1]);
    expect(defaultRegistry.isFrozen).toBe(true);
    expect(() => registerRule('square', 1, (_, [t], [v]) => new Dual(v * v, 2 * v * t))).toThrow(RegistryFrozen);
    expect(defaultRegistry.has('square')).toBe(false);
  });
});
