import { describe, it, expect } from 'vitest';
import { Dual } from '../../src/forward/Dual.js';
import { GradientChecker, formatGradCheckResult } from '../../src/forward/GradientChecker.js';
import { IR } from '../../src/forward/IR.js';
import { GenericFunction } from '../../src/forward/NumericOps.js';
import { createRegistry } from '../../src/forward/Rules.js';
import { transform } from '../../src/forward/Transformer.js';
import { fxy, fxyIR } from '../helpers.js';

describe('GradientChecker', () => {
  it('should validate evaluator gradients', () => {
    const result = new GradientChecker().check(fxy, [1, 2]);
    expect(result.passed).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.totalChecks).toBe(2);
    expect(result.maxError).toBeLessThan(1e-6);
  });

  it('should validate transformed gradients', () => {
    const result = new GradientChecker().check(transform(fxyIR()), [-0.3, 1.7]);
    expect(result.passed).toBe(true);
  });

  it('should validate composite expressions', () => {
    const f: GenericFunction = (ops, x, y) =>
      ops.div(ops.exp(ops.mul(x, y)), ops.add(ops.pow(x, 2), 1));
    const result = new GradientChecker().check(f, [0.5, -1.5]);
    expect(result.passed).toBe(true);
  });

  it('should catch a wrong derivative rule', () => {
    const registry = createRegistry();
    // d(x^2) is 2x dx; this rule omits the factor 2
    registry.register('bad_square', 1, (_, [t], [v]) => new Dual(v * v, v * t));
    const fn = transform(IR.fn('sq', ['x'], [IR.assign('y', 'bad_square', ['x']), IR.ret('y')]), { registry });

    const result = new GradientChecker(1e-5, 1e-4, registry).check(fn, [3]);
    expect(result.passed).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].parameter).toBe('x');
    expect(result.errors[0].analytical).toBe(3);
    expect(result.errors[0].numerical).toBeCloseTo(6, 6);

    expect(formatGradCheckResult(result, 'sq')).toBe([
      '✗ sq: 1/1 gradients FAILED',
      '  x: analytical=3.000000, numerical=6.000000, error=3.00e+0'
    ].join('\n'));
  });

  it('should name generic parameters by position', () => {
    const registry = createRegistry();
    registry.register('bad_square', 1, (_, [t], [v]) => new Dual(v * v, v * t));
    const f: GenericFunction = (ops, a, b) => ops.add(a, ops.apply('bad_square', [b]));

    const result = new GradientChecker(1e-5, 1e-4, registry).check(f, [1, 2]);
    expect(result.errors.map(e => e.parameter)).toEqual(['x1']);
  });

  it('should format a passing result', () => {
    const result = new GradientChecker().check(transform(fxyIR()), [1, 2]);
    expect(formatGradCheckResult(result, 'f')).toMatch(/^✓ f: 2 gradients verified \(max error: .+\)$/);
  });
});
