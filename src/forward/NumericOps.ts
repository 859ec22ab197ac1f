/**
 * Numeric capability that generic functions are written against
 *
 * A function typed as GenericFunction never touches host arithmetic; every
 * elementary operation goes through `ops`, which dispatches it to the rule
 * registry. The same function runs on Duals (DualOps) or plain numbers (ValueOps).
 */

import { Dual, STATELESS } from './Dual.js';
import { IncompatibleFunctionSignature } from './Errors.js';
import { RuleRegistry, applyRule } from './Rules.js';

/**
 * Plain numbers are accepted wherever an operand is and lifted to constants
 */
export type Operand<T> = T | number;

export interface NumericOps<T> {
  constant(value: number): T;
  apply(op: string, args: readonly Operand<T>[], callee?: Operand<T>): T;

  add(a: Operand<T>, b: Operand<T>): T;
  sub(a: Operand<T>, b: Operand<T>): T;
  mul(a: Operand<T>, b: Operand<T>): T;
  div(a: Operand<T>, b: Operand<T>): T;
  neg(a: Operand<T>): T;
  pow(a: Operand<T>, k: Operand<T>): T;
  sin(a: Operand<T>): T;
  cos(a: Operand<T>): T;
  tan(a: Operand<T>): T;
  exp(a: Operand<T>): T;
  log(a: Operand<T>): T;
  sqrt(a: Operand<T>): T;
}

/**
 * A function polymorphic over the numeric representation
 */
export type GenericFunction = <T>(ops: NumericOps<T>, ...args: T[]) => T;

abstract class DispatchingOps<T> implements NumericOps<T> {
  constructor(protected readonly registry: RuleRegistry) {}

  abstract constant(value: number): T;
  abstract apply(op: string, args: readonly Operand<T>[], callee?: Operand<T>): T;

  add(a: Operand<T>, b: Operand<T>): T {
    return this.apply('add', [a, b]);
  }

  sub(a: Operand<T>, b: Operand<T>): T {
    return this.apply('sub', [a, b]);
  }

  mul(a: Operand<T>, b: Operand<T>): T {
    return this.apply('mul', [a, b]);
  }

  div(a: Operand<T>, b: Operand<T>): T {
    return this.apply('div', [a, b]);
  }

  neg(a: Operand<T>): T {
    return this.apply('neg', [a]);
  }

  pow(a: Operand<T>, k: Operand<T>): T {
    return this.apply('pow', [a, k]);
  }

  sin(a: Operand<T>): T {
    return this.apply('sin', [a]);
  }

  cos(a: Operand<T>): T {
    return this.apply('cos', [a]);
  }

  tan(a: Operand<T>): T {
    return this.apply('tan', [a]);
  }

  exp(a: Operand<T>): T {
    return this.apply('exp', [a]);
  }

  log(a: Operand<T>): T {
    return this.apply('log', [a]);
  }

  sqrt(a: Operand<T>): T {
    return this.apply('sqrt', [a]);
  }
}

/**
 * Propagates tangents: each operation is resolved in the registry at run time
 */
export class DualOps extends DispatchingOps<Dual> {
  constant(value: number): Dual {
    return Dual.constant(value);
  }

  apply(op: string, args: readonly Operand<Dual>[], callee?: Operand<Dual>): Dual {
    const rule = this.registry.resolve(op);
    return applyRule(
      rule,
      callee === undefined ? STATELESS : this.lift(callee),
      args.map(arg => this.lift(arg))
    );
  }

  private lift(x: Operand<Dual>): Dual {
    if (typeof x === 'number') {
      return Dual.constant(x);
    }
    if (x instanceof Dual) {
      return x;
    }
    throw new IncompatibleFunctionSignature(`operand ${String(x)} is neither a Dual nor a number`);
  }
}

/**
 * Plain evaluation through the same rules, tangents held at zero
 */
export class ValueOps extends DispatchingOps<number> {
  constant(value: number): number {
    return value;
  }

  apply(op: string, args: readonly number[], callee?: number): number {
    const rule = this.registry.resolve(op);
    const result = applyRule(
      rule,
      callee === undefined ? STATELESS : Dual.constant(callee),
      args.map(arg => Dual.constant(arg))
    );
    return result.value;
  }
}
