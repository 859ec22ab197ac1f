/**
 * Source emission for transformed functions
 *
 * Emits a factory that receives the resolved rule `compute` functions (in the
 * order of TransformedFunction.rules()) and a finiteness check, and returns
 * `<name>_tangent(x, dx, ...)`. The emitted body contains no rule lookup.
 */

import { Operand, formatOperand } from './IR.js';
import { TangentAssign, TransformedFunction } from './Transformer.js';

/**
 * Code generation options
 */
export interface CodeGenOptions {
  format?: 'typescript' | 'javascript';
  includeComments?: boolean;
  // Shared TypeScript type aliases; emit them once per output file
  includePrelude?: boolean;
}

const TS_PRELUDE = [
  'type Dual = { value: number; tangent: number };',
  'type Compute = (callee: Dual, tangents: readonly number[], values: readonly number[]) => Dual;',
  'type Check = (op: string, value: number, tangent: number) => void;',
  ''
];

export function factoryName(fn: TransformedFunction): string {
  return `make_${fn.name}_tangent`;
}

export function emitSource(fn: TransformedFunction, options: CodeGenOptions = {}): string {
  const format = options.format ?? 'typescript';
  const includeComments = options.includeComments ?? true;
  const includePrelude = options.includePrelude ?? true;
  const ts = format === 'typescript';

  const lines: string[] = [];

  if (includeComments) {
    lines.push('/**');
    lines.push(` * Tangent of ${fn.name}(${fn.params.join(', ')})`);
    lines.push(` * Rules: ${fn.rules().map(r => r.op).join(', ') || '(none)'}`);
    lines.push(' */');
  }

  if (ts && includePrelude) {
    lines.push(...TS_PRELUDE);
  }

  const ruleParams = fn.rules().map(r => (ts ? `$rule_${r.op}: Compute` : `$rule_${r.op}`));
  const checkParam = ts ? '$check: Check' : '$check';
  lines.push(`${ts ? 'export ' : ''}function ${factoryName(fn)}(${[...ruleParams, checkParam].join(', ')}) {`);
  lines.push('  const $stateless = { value: 0, tangent: 0 };');

  const params = fn.params
    .map((p, i) => {
      const tp = fn.tangentParams[i];
      return ts ? `${p}: number, ${tp}: number` : `${p}, ${tp}`;
    })
    .join(', ');
  const returnType = ts ? ': Dual' : '';
  lines.push(`  return function ${fn.name}_tangent(${params})${returnType} {`);

  fn.params.forEach((p, i) => {
    lines.push(`    $check(${JSON.stringify(`input ${p}`)}, ${p}, ${fn.tangentParams[i]});`);
  });

  for (const stmt of fn.statements) {
    if (stmt.kind === 'tangent-return') {
      lines.push(`    return { value: ${stmt.value}, tangent: ${stmt.tangent} };`);
    } else {
      if (includeComments) {
        lines.push(`    // ${stmt.lhs} = ${stmt.rule.op}(${stmt.args.map(formatOperand).join(', ')})`);
      }
      lines.push(...emitAssign(stmt));
    }
  }

  lines.push('  };');
  lines.push('}');

  return lines.join('\n');
}

function emitAssign(stmt: TangentAssign): string[] {
  const callee = stmt.callee
    ? `{ value: ${emitOperand(stmt.callee.value)}, tangent: ${emitOperand(stmt.callee.tangent)} }`
    : '$stateless';
  const tangents = stmt.tangentArgs.map(emitOperand).join(', ');
  const values = stmt.args.map(emitOperand).join(', ');

  return [
    `    const { value: ${stmt.lhs}, tangent: ${stmt.tangent} } = $rule_${stmt.rule.op}(${callee}, [${tangents}], [${values}]);`,
    `    $check('${stmt.rule.op}', ${stmt.lhs}, ${stmt.tangent});`
  ];
}

function emitOperand(operand: Operand): string {
  return operand.kind === 'var' ? operand.name : String(operand.value);
}
