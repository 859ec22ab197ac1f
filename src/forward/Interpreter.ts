/**
 * Runs statement IR as a generic function, so the same function can go through
 * the evaluator (on Duals) or plain evaluation (on numbers).
 */

import { IncompatibleFunctionSignature, UnsupportedExpression } from './Errors.js';
import { FunctionIR, Operand, formatStatement, validateFunction } from './IR.js';
import { GenericFunction, NumericOps } from './NumericOps.js';

export function interpret(ir: FunctionIR): GenericFunction {
  validateFunction(ir);

  return <T>(ops: NumericOps<T>, ...args: T[]): T => {
    if (args.length !== ir.params.length) {
      throw new IncompatibleFunctionSignature(
        `${ir.name} takes ${ir.params.length} argument(s), got ${args.length}`
      );
    }

    const env = new Map<string, T>();
    ir.params.forEach((param, i) => env.set(param, args[i]));

    const read = (operand: Operand): T => {
      if (operand.kind === 'const') {
        return ops.constant(operand.value);
      }
      const value = env.get(operand.name);
      if (value === undefined) {
        throw new UnsupportedExpression(operand.name, 'variable is not bound');
      }
      return value;
    };

    for (const stmt of ir.body) {
      switch (stmt.kind) {
        case 'assign':
          env.set(
            stmt.lhs,
            ops.apply(stmt.op, stmt.args.map(read), stmt.callee ? read(stmt.callee) : undefined)
          );
          break;
        case 'return':
          return read({ kind: 'var', name: stmt.variable });
        case 'conditional':
          throw new UnsupportedExpression(formatStatement(stmt), 'branching is not supported');
      }
    }

    throw new UnsupportedExpression(`function ${ir.name}`, 'function must end with a return statement');
  };
}
