/**
 * Example: log-density of a positive-constrained parameter
 *
 * The model samples an unconstrained u and maps it through softplus to a
 * positive scale sigma. The log-density includes the log-Jacobian of that map.
 */

import {
  GenericFunction,
  GradientChecker,
  defaultRegistry,
  formatGradCheckResult,
  valueAndGradient
} from '../src/index.js';
import { registerLogDensityRules } from './log-density-rules.js';

registerLogDensityRules(defaultRegistry);

/**
 * Normal log-density of x with mean mu and scale softplus(u), up to a constant
 */
const logDensity: GenericFunction = (ops, x, mu, u) => {
  const sigma = ops.apply('softplus', [u]);
  const z = ops.div(ops.sub(x, mu), sigma);
  const kernel = ops.mul(-0.5, ops.pow(z, 2));
  const logJacobian = ops.apply('log_sigmoid', [u]);
  return ops.add(ops.sub(kernel, ops.log(sigma)), logJacobian);
};

console.log('=== Log-density gradient with custom rules ===\n');

const point = [1.5, 0.2, -0.3];
const { value, gradient } = valueAndGradient(logDensity, point);

console.log(`log p(x=${point[0]}, mu=${point[1]}, u=${point[2]}) = ${value.toFixed(6)}`);
['x', 'mu', 'u'].forEach((name, i) => {
  console.log(`  d/d${name} = ${gradient[i].toFixed(6)}`);
});

// Far outside the range where e^u is representable
const extreme = valueAndGradient(logDensity, [1.5, 0.2, 800]);
console.log(`\nat u=800: log p = ${extreme.value.toFixed(3)}, d/du = ${extreme.gradient[2].toExponential(3)}`);

console.log();
const result = new GradientChecker().check(logDensity, point);
console.log(formatGradCheckResult(result, 'logDensity'));
