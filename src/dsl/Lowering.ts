/**
 * Lowering from the DSL AST to statement IR
 *
 * Nested expressions are flattened into single-operation assignments. The
 * outermost operation of `name = expr` binds `name` directly; inner operations
 * bind fresh temporaries `$1`, `$2`, ... which no DSL identifier can spell.
 */

import { Expression, FunctionDef, Program, Statement as ASTStatement } from './AST.js';
import { parse } from './Parser.js';
import { UnsupportedExpression } from '../forward/Errors.js';
import { FunctionIR, IR, Operand, Statement } from '../forward/IR.js';

const BINARY_OPS = {
  '+': 'add',
  '-': 'sub',
  '*': 'mul',
  '/': 'div',
  '^': 'pow',
  '**': 'pow'
} as const;

class FunctionLowering {
  private temp = 0;
  // Names bound without an operation (x = y, k = 2) resolve to their operand
  private aliases = new Map<string, Operand>();
  private bound = new Set<string>();

  constructor(private def: FunctionDef) {
    def.parameters.forEach(p => this.bound.add(p));
  }

  lower(): FunctionIR {
    const body: Statement[] = [];
    this.lowerBlock(this.def.body, body);

    const result = this.lowerExpression(this.def.returnExpr, body);
    if (result.kind === 'const') {
      throw new UnsupportedExpression(
        `return ${result.value}`,
        'return value must depend on a variable'
      );
    }
    body.push(IR.ret(result.name));

    return IR.fn(this.def.name, [...this.def.parameters], body);
  }

  private lowerBlock(statements: ASTStatement[], out: Statement[]): void {
    for (const stmt of statements) {
      if (stmt.kind === 'if') {
        const condition = this.lowerExpression(stmt.condition, out);
        const then: Statement[] = [];
        const otherwise: Statement[] = [];
        this.lowerBlock(stmt.then, then);
        this.lowerBlock(stmt.otherwise, otherwise);
        out.push(IR.conditional(condition, then, otherwise));
        continue;
      }

      if (this.bound.has(stmt.variable)) {
        throw new UnsupportedExpression(`${stmt.variable} = ...`, `'${stmt.variable}' is already bound`);
      }
      const value = this.lowerExpression(stmt.expression, out, stmt.variable);
      if (value.kind === 'const' || value.name !== stmt.variable) {
        this.aliases.set(stmt.variable, value);
      }
      this.bound.add(stmt.variable);
    }
  }

  /**
   * Emit the statements computing `expr` into `out` and return its operand.
   * `target` names the variable the outermost operation should bind.
   */
  private lowerExpression(expr: Expression, out: Statement[], target?: string): Operand {
    switch (expr.kind) {
      case 'number':
        return IR.c(expr.value);

      case 'variable':
        return this.aliases.get(expr.name) ?? IR.v(expr.name);

      case 'unary': {
        if (expr.operator === '+') {
          return this.lowerExpression(expr.operand, out, target);
        }
        if (expr.operand.kind === 'number') {
          return IR.c(-expr.operand.value);
        }
        const operand = this.lowerExpression(expr.operand, out);
        return this.emit(out, 'neg', [operand], undefined, target);
      }

      case 'binary': {
        const left = this.lowerExpression(expr.left, out);
        const right = this.lowerExpression(expr.right, out);
        return this.emit(out, BINARY_OPS[expr.operator], [left, right], undefined, target);
      }

      case 'call': {
        const callee = expr.state ? this.lowerExpression(expr.state, out) : undefined;
        const args = expr.args.map(arg => this.lowerExpression(arg, out));
        return this.emit(out, expr.name, args, callee, target);
      }
    }
  }

  private emit(out: Statement[], op: string, args: Operand[], callee: Operand | undefined, target?: string): Operand {
    const lhs = target ?? this.fresh();
    out.push(IR.assign(lhs, op, args, callee));
    return IR.v(lhs);
  }

  private fresh(): string {
    this.temp++;
    return `$${this.temp}`;
  }
}

export function lowerFunction(def: FunctionDef): FunctionIR {
  return new FunctionLowering(def).lower();
}

export function lowerProgram(program: Program): FunctionIR[] {
  return program.functions.map(lowerFunction);
}

/**
 * Parse DSL source and lower every function it defines
 */
export function compile(source: string): FunctionIR[] {
  return lowerProgram(parse(source));
}
