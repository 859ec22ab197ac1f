/**
 * Dual numbers for forward-mode differentiation
 * A value paired with its derivative along the seeded input direction
 */

import { IncompatibleFunctionSignature, NumericalInstability } from './Errors.js';

export class Dual {
  constructor(
    readonly value: number,
    readonly tangent: number
  ) {
    Object.freeze(this);
  }

  /**
   * Constant: zero tangent
   */
  static constant(value: number): Dual {
    return new Dual(value, 0);
  }

  /**
   * The input being differentiated: unit tangent
   */
  static variable(value: number): Dual {
    return new Dual(value, 1);
  }

  static seeded(values: readonly number[], seeds: readonly number[]): Dual[] {
    return values.map((value, i) => new Dual(value, seeds[i] ?? 0));
  }

  isFinite(): boolean {
    return Number.isFinite(this.value) && Number.isFinite(this.tangent);
  }

  equals(other: Dual): boolean {
    return this.value === other.value && this.tangent === other.tangent;
  }

  toString(): string {
    return `Dual(${this.value}, ${this.tangent})`;
  }

  // Host arithmetic on a Dual means the function is not written against NumericOps
  [Symbol.toPrimitive](hint: string): string {
    if (hint === 'string') {
      return this.toString();
    }
    throw new IncompatibleFunctionSignature(
      'a Dual operand was used with host arithmetic; write the function against NumericOps'
    );
  }
}

/**
 * Callee of a stateless elementary function
 */
export const STATELESS = new Dual(0, 0);

/**
 * Reject non-finite values so they never flow into later operations
 */
export function checkFinite(op: string, value: number, tangent: number): void {
  if (!Number.isFinite(value) || !Number.isFinite(tangent)) {
    throw new NumericalInstability(op, value, tangent);
  }
}

export function isDual(x: unknown): x is Dual {
  return x instanceof Dual;
}
