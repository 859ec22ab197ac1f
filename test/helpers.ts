/**
 * Shared fixtures for the forward-mode specs
 */

import { compile } from '../src/dsl/Lowering.js';
import { FunctionIR, IR } from '../src/forward/IR.js';
import { GenericFunction } from '../src/forward/NumericOps.js';
import { TransformOptions, TransformedFunction, transform } from '../src/forward/Transformer.js';

/**
 * f(x, y) = x^2 + sin(x + y), written against the numeric capability
 */
export const fxy: GenericFunction = (ops, x, y) => ops.add(ops.pow(x, 2), ops.sin(ops.add(x, y)));

/**
 * The same function as statement IR
 */
export function fxyIR(): FunctionIR {
  return IR.fn('f', ['x', 'y'], [
    IR.assign('a', 'pow', ['x', 2]),
    IR.assign('b', 'add', ['x', 'y']),
    IR.assign('c', 'sin', ['b']),
    IR.assign('d', 'add', ['a', 'c']),
    IR.ret('d')
  ]);
}

export const FXY_SOURCE = `
  function f(x, y) {
    return x^2 + sin(x + y)
  }
`;

// f(1, 2) and its partials
export const FXY_VALUE = 1 + Math.sin(3);
export const FXY_GRADIENT = [2 + Math.cos(3), Math.cos(3)];

/**
 * Compile DSL source and transform its first function
 */
export function transformSource(source: string, options: TransformOptions = {}): TransformedFunction {
  const [ir] = compile(source);
  return transform(ir, options);
}

/**
 * Central difference estimate of f'(x)
 */
export function centralDifference(f: (x: number) => number, x: number, h: number = 1e-5): number {
  return (f(x + h) - f(x - h)) / (2 * h);
}
