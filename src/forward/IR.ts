/**
 * Statement IR consumed by the transformer
 * Straight-line, single-assignment: `lhs = op(args)` statements and one terminal return.
 */

import { UnsupportedExpression } from './Errors.js';

export interface VarRef {
  kind: 'var';
  name: string;
}

export interface Constant {
  kind: 'const';
  value: number;
}

export type Operand = VarRef | Constant;

export interface AssignStatement {
  kind: 'assign';
  lhs: string;
  op: string;
  args: Operand[];
  callee?: Operand; // state of a parameterized operation
}

export interface ReturnStatement {
  kind: 'return';
  variable: string;
}

/**
 * Branching is representable so that it can be rejected with a precise error
 */
export interface ConditionalStatement {
  kind: 'conditional';
  condition: Operand;
  then: Statement[];
  otherwise: Statement[];
}

export type Statement = AssignStatement | ReturnStatement | ConditionalStatement;

export interface FunctionIR {
  name: string;
  params: string[];
  body: Statement[];
}

/**
 * IR builders
 */
export const IR = {
  v(name: string): VarRef {
    return { kind: 'var', name };
  },

  c(value: number): Constant {
    return { kind: 'const', value };
  },

  /**
   * Strings become variable references, numbers constants
   */
  operand(x: string | number | Operand): Operand {
    if (typeof x === 'string') return IR.v(x);
    if (typeof x === 'number') return IR.c(x);
    return x;
  },

  assign(
    lhs: string,
    op: string,
    args: (string | number | Operand)[],
    callee?: string | number | Operand
  ): AssignStatement {
    const stmt: AssignStatement = { kind: 'assign', lhs, op, args: args.map(IR.operand) };
    if (callee !== undefined) {
      stmt.callee = IR.operand(callee);
    }
    return stmt;
  },

  ret(variable: string): ReturnStatement {
    return { kind: 'return', variable };
  },

  conditional(condition: string | number | Operand, then: Statement[], otherwise: Statement[] = []): ConditionalStatement {
    return { kind: 'conditional', condition: IR.operand(condition), then, otherwise };
  },

  fn(name: string, params: string[], body: Statement[]): FunctionIR {
    return { name, params, body };
  }
};

export function formatOperand(operand: Operand): string {
  return operand.kind === 'var' ? operand.name : String(operand.value);
}

export function formatStatement(stmt: Statement): string {
  switch (stmt.kind) {
    case 'assign': {
      const callee = stmt.callee ? `[${formatOperand(stmt.callee)}]` : '';
      return `${stmt.lhs} = ${stmt.op}${callee}(${stmt.args.map(formatOperand).join(', ')})`;
    }
    case 'return':
      return `return ${stmt.variable}`;
    case 'conditional':
      return `if (${formatOperand(stmt.condition)}) { ... }`;
  }
}

export function formatFunction(ir: FunctionIR): string {
  const lines = [`function ${ir.name}(${ir.params.join(', ')}) {`];
  for (const stmt of ir.body) {
    lines.push(`  ${formatStatement(stmt)}`);
  }
  lines.push('}');
  return lines.join('\n');
}

// User names, or the `$n` temporaries introduced by lowering. Other `$` names
// belong to emitted code ($check, $stateless, $rule_<op>).
const NAME_PATTERN = /^(?:[A-Za-z_][A-Za-z0-9_]*|\$[0-9]+)$/;
const FUNCTION_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RESERVED_WORDS = new Set([
  'arguments', 'await', 'break', 'case', 'catch', 'class', 'const', 'continue',
  'debugger', 'default', 'delete', 'do', 'else', 'enum', 'eval', 'export',
  'extends', 'false', 'finally', 'for', 'function', 'if', 'implements', 'import',
  'in', 'instanceof', 'interface', 'let', 'new', 'null', 'package', 'private',
  'protected', 'public', 'return', 'static', 'super', 'switch', 'this', 'throw',
  'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield'
]);

/**
 * Words that cannot name a binding in emitted strict-mode source
 */
export function isReservedWord(name: string): boolean {
  return RESERVED_WORDS.has(name);
}

/**
 * Check the straight-line, single-assignment shape.
 * Rule coverage is checked separately, against a registry.
 */
export function validateFunction(ir: FunctionIR): void {
  const bound = new Set<string>();

  const bind = (name: string, where: string) => {
    if (!NAME_PATTERN.test(name)) {
      throw new UnsupportedExpression(where, `'${name}' is not a valid variable name`);
    }
    if (isReservedWord(name)) {
      throw new UnsupportedExpression(where, `'${name}' is a reserved word`);
    }
    if (bound.has(name)) {
      throw new UnsupportedExpression(where, `'${name}' is already bound`);
    }
    bound.add(name);
  };

  const use = (operand: Operand, where: string) => {
    if (operand.kind === 'var' && !bound.has(operand.name)) {
      throw new UnsupportedExpression(where, `'${operand.name}' is used before it is bound`);
    }
  };

  if (!FUNCTION_NAME_PATTERN.test(ir.name)) {
    throw new UnsupportedExpression(`function ${ir.name}`, `'${ir.name}' is not a valid function name`);
  }

  for (const param of ir.params) {
    bind(param, `function ${ir.name}(${ir.params.join(', ')})`);
  }

  if (ir.body.length === 0) {
    throw new UnsupportedExpression(`function ${ir.name}`, 'function body is empty');
  }

  ir.body.forEach((stmt, index) => {
    const where = formatStatement(stmt);
    const isLast = index === ir.body.length - 1;

    switch (stmt.kind) {
      case 'assign':
        stmt.args.forEach(arg => use(arg, where));
        if (stmt.callee) use(stmt.callee, where);
        bind(stmt.lhs, where);
        if (isLast) {
          throw new UnsupportedExpression(where, 'function must end with a return statement');
        }
        break;
      case 'return':
        if (!isLast) {
          throw new UnsupportedExpression(where, 'return must be the sole terminal statement');
        }
        use(IR.v(stmt.variable), where);
        break;
      case 'conditional':
        throw new UnsupportedExpression(where, 'branching is not supported');
    }
  });
}
