/**
 * softplus and log-sigmoid rules for a positive-constrained scale parameter
 */

import { Dual, RuleRegistry } from '../src/index.js';

export function sigmoid(u: number): number {
  return u >= 0 ? 1 / (1 + Math.exp(-u)) : Math.exp(u) / (1 + Math.exp(u));
}

// log(1 + e^u) without forming e^u for large u
export function softplus(u: number): number {
  return Math.max(u, 0) + Math.log1p(Math.exp(-Math.abs(u)));
}

export function registerLogDensityRules(registry: RuleRegistry): void {
  // d/du softplus(u) = sigmoid(u)
  registry.register(
    'softplus', 1,
    (_, [t], [u]) => new Dual(softplus(u), sigmoid(u) * t),
    'log(1 + e^u)'
  );

  // log-Jacobian of softplus: log sigmoid(u) = -softplus(-u)
  registry.register(
    'log_sigmoid', 1,
    (_, [t], [u]) => new Dual(-softplus(-u), sigmoid(-u) * t),
    'log(1 / (1 + e^-u))'
  );
}
