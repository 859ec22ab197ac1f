import { describe, it, expect } from 'vitest';
import { Dual } from '../../src/forward/Dual.js';
import { evaluateWithTangent } from '../../src/forward/Evaluator.js';
import { GradientChecker } from '../../src/forward/GradientChecker.js';
import { GenericFunction } from '../../src/forward/NumericOps.js';
import { createRegistry } from '../../src/forward/Rules.js';
import { registerLogDensityRules, sigmoid, softplus } from '../../examples/log-density-rules.js';

function rulesRegistry() {
  const registry = createRegistry();
  registerLogDensityRules(registry);
  return registry;
}

const softplusOf: GenericFunction = (ops, u) => ops.apply('softplus', [u]);
const logSigmoidOf: GenericFunction = (ops, u) => ops.apply('log_sigmoid', [u]);

describe('log-density rules', () => {
  it('should match the direct formulas near the origin', () => {
    expect(softplus(2)).toBeCloseTo(Math.log1p(Math.exp(2)), 12);
    expect(softplus(-2)).toBeCloseTo(Math.log1p(Math.exp(-2)), 12);
    expect(sigmoid(0.5)).toBeCloseTo(1 / (1 + Math.exp(-0.5)), 12);
    expect(sigmoid(-0.5)).toBeCloseTo(1 / (1 + Math.exp(0.5)), 12);
  });

  it('should stay finite where e^u overflows', () => {
    const registry = rulesRegistry();

    expect(evaluateWithTangent(softplusOf, [Dual.variable(800)], { registry })).toEqual(new Dual(800, 1));

    const low = evaluateWithTangent(softplusOf, [Dual.variable(-800)], { registry });
    expect(low.value).toBe(0);
    expect(low.tangent).toBe(0);

    const logSig = evaluateWithTangent(logSigmoidOf, [Dual.variable(-800)], { registry });
    expect(logSig.value).toBe(-800);
    expect(logSig.tangent).toBe(1);
  });

  it('should agree with finite differences', () => {
    const registry = rulesRegistry();
    const f: GenericFunction = (ops, x, u) =>
      ops.add(ops.div(x, ops.apply('softplus', [u])), ops.apply('log_sigmoid', [u]));
    const result = new GradientChecker(1e-5, 1e-4, registry).check(f, [1.5, -0.3]);
    expect(result.passed).toBe(true);
  });
});
