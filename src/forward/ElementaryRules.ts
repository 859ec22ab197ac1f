/**
 * Elementary differentiation rules
 * add, pow and sin plus the usual arithmetic and transcendental functions
 */

import { Dual } from './Dual.js';
import { UnsupportedOperation } from './Errors.js';
import type { RuleRegistry } from './Rules.js';

export function registerElementaryRules(registry: RuleRegistry): void {
  registry.register('add', 2, (_, [ta, tb], [va, vb]) => new Dual(va + vb, ta + tb), 'a + b');

  registry.register('sub', 2, (_, [ta, tb], [va, vb]) => new Dual(va - vb, ta - tb), 'a - b');

  // Product rule
  registry.register(
    'mul', 2,
    (_, [ta, tb], [va, vb]) => new Dual(va * vb, ta * vb + va * tb),
    'a * b'
  );

  // Quotient rule
  registry.register(
    'div', 2,
    (_, [ta, tb], [va, vb]) => new Dual(va / vb, (ta * vb - va * tb) / (vb * vb)),
    'a / b'
  );

  registry.register('neg', 1, (_, [t], [v]) => new Dual(-v, -t), '-a');

  // Integer power: d(a^k) = k * a^(k-1) * da
  registry.register('pow', 2, (_, [ta, tk], [va, k]) => {
    if (!Number.isInteger(k) || tk !== 0) {
      throw new UnsupportedOperation('pow', 'exponent must be an integer constant');
    }
    if (k === 0) {
      return new Dual(1, 0);
    }
    return new Dual(Math.pow(va, k), k * Math.pow(va, k - 1) * ta);
  }, 'a ^ k, k an integer constant');

  registry.register('sin', 1, (_, [t], [v]) => new Dual(Math.sin(v), Math.cos(v) * t), 'sin(a)');

  registry.register('cos', 1, (_, [t], [v]) => new Dual(Math.cos(v), -Math.sin(v) * t), 'cos(a)');

  registry.register('tan', 1, (_, [t], [v]) => {
    const c = Math.cos(v);
    return new Dual(Math.tan(v), t / (c * c));
  }, 'tan(a)');

  registry.register('exp', 1, (_, [t], [v]) => {
    const e = Math.exp(v);
    return new Dual(e, e * t);
  }, 'exp(a)');

  registry.register('log', 1, (_, [t], [v]) => new Dual(Math.log(v), t / v), 'natural log');

  registry.register('sqrt', 1, (_, [t], [v]) => {
    const s = Math.sqrt(v);
    return new Dual(s, t / (2 * s));
  }, 'sqrt(a)');

  // Parameterized: callee state theta scales its operand
  registry.register(
    'scale', 1,
    (theta, [t], [v]) => new Dual(theta.value * v, theta.tangent * v + theta.value * t),
    'theta * a with callee state theta'
  );
}
