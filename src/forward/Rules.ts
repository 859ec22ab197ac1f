/**
 * Rule registry for forward-mode differentiation
 *
 * Maps an operation identifier to the rule that computes its value and tangent.
 * The evaluator and the transformer both resolve rules here, so the two
 * strategies always apply the same derivative formula.
 */

import { Dual, checkFinite } from './Dual.js';
import { DuplicateRule, InvalidRule, RegistryFrozen, UnsupportedOperation } from './Errors.js';
import { registerElementaryRules } from './ElementaryRules.js';

/**
 * Computes an operation's output from its operands.
 * `callee` is the (state, state tangent) of a parameterized operation;
 * stateless operations receive STATELESS and ignore it.
 */
export type RuleCompute = (
  callee: Dual,
  tangents: readonly number[],
  values: readonly number[]
) => Dual;

export interface Rule {
  op: string;
  arity: number;
  compute: RuleCompute;
  description?: string;
}

const OP_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class RuleRegistry {
  private rules: Map<string, Rule> = new Map();
  private frozen = false;

  /**
   * Register a rule. Existing rules are never overwritten.
   */
  register(op: string, arity: number, compute: RuleCompute, description?: string): Rule {
    if (this.frozen) {
      throw new RegistryFrozen(op);
    }
    if (!OP_PATTERN.test(op)) {
      throw new InvalidRule(op, 'operation identifier must be a plain identifier');
    }
    if (!Number.isInteger(arity) || arity < 0) {
      throw new InvalidRule(op, `arity must be a non-negative integer, got ${arity}`);
    }
    if (this.rules.has(op)) {
      throw new DuplicateRule(op);
    }

    const rule: Rule = { op, arity, compute, description };
    this.rules.set(op, rule);
    return rule;
  }

  lookup(op: string): Rule {
    const rule = this.rules.get(op);
    if (!rule) {
      throw new UnsupportedOperation(op, 'no rule registered');
    }
    return rule;
  }

  /**
   * Lookup on behalf of an evaluation or transform; closes registration.
   */
  resolve(op: string): Rule {
    this.freeze();
    return this.lookup(op);
  }

  has(op: string): boolean {
    return this.rules.has(op);
  }

  ops(): string[] {
    return [...this.rules.keys()];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

/**
 * Apply a rule to Dual operands, rejecting wrong operand counts and non-finite results
 */
export function applyRule(rule: Rule, callee: Dual, args: readonly Dual[]): Dual {
  if (args.length !== rule.arity) {
    throw new UnsupportedOperation(rule.op, `expects ${rule.arity} operand(s), got ${args.length}`);
  }
  const result = rule.compute(
    callee,
    args.map(a => a.tangent),
    args.map(a => a.value)
  );
  checkFinite(rule.op, result.value, result.tangent);
  return result;
}

export interface RegistryOptions {
  elementary?: boolean;
}

export function createRegistry(options: RegistryOptions = {}): RuleRegistry {
  const registry = new RuleRegistry();
  if (options.elementary !== false) {
    registerElementaryRules(registry);
  }
  return registry;
}

// Process-wide registry with the elementary rules
export const defaultRegistry = createRegistry();

/**
 * Extend the default registry. Must happen before the first evaluation or transform.
 */
export function registerRule(
  op: string,
  arity: number,
  compute: RuleCompute,
  description?: string
): Rule {
  return defaultRegistry.register(op, arity, compute, description);
}
