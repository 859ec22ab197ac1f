/**
 * Source-transformation path
 *
 * Rewrites a straight-line statement list into a function that threads a
 * tangent beside every value. Rules are resolved once, here; the produced
 * function only runs the resolved `compute` functions over numbered slots.
 */

import { Dual, STATELESS, checkFinite } from './Dual.js';
import { IncompatibleFunctionSignature, UnsupportedExpression } from './Errors.js';
import {
  FunctionIR,
  Operand,
  AssignStatement,
  formatOperand,
  formatStatement,
  isReservedWord,
  validateFunction
} from './IR.js';
import { Rule, RuleRegistry, defaultRegistry } from './Rules.js';

export interface TransformOptions {
  registry?: RuleRegistry;
}

/**
 * `lhs, tangent = op(args | tangentArgs)`
 */
export interface TangentAssign {
  kind: 'tangent-assign';
  lhs: string;
  tangent: string;
  rule: Rule;
  args: Operand[];
  tangentArgs: Operand[];
  callee?: { value: Operand; tangent: Operand };
}

export interface TangentReturn {
  kind: 'tangent-return';
  value: string;
  tangent: string;
}

export type TangentStatement = TangentAssign | TangentReturn;

type SlotRef = { slot: number } | { constant: number };

interface Step {
  compute: Rule['compute'];
  op: string;
  target: number;
  args: SlotRef[];
  callee?: SlotRef;
}

export class TransformedFunction {
  private readonly steps: Step[];
  private readonly resultSlot: number;
  private readonly slotCount: number;

  constructor(
    readonly name: string,
    readonly params: readonly string[],
    readonly tangentParams: readonly string[],
    readonly statements: readonly TangentStatement[]
  ) {
    const slots = new Map<string, number>();
    params.forEach(param => slots.set(param, slots.size));

    const slotOf = (name: string): number => {
      const slot = slots.get(name);
      if (slot === undefined) {
        throw new UnsupportedExpression(name, 'variable is not bound');
      }
      return slot;
    };
    const ref = (operand: Operand): SlotRef =>
      operand.kind === 'const' ? { constant: operand.value } : { slot: slotOf(operand.name) };

    const steps: Step[] = [];
    let resultSlot = -1;
    for (const stmt of statements) {
      if (stmt.kind === 'tangent-return') {
        resultSlot = slotOf(stmt.value);
        continue;
      }
      const step: Step = {
        compute: stmt.rule.compute,
        op: stmt.rule.op,
        target: slots.size,
        args: stmt.args.map(ref)
      };
      if (stmt.callee) {
        step.callee = ref(stmt.callee.value);
      }
      steps.push(step);
      slots.set(stmt.lhs, step.target);
    }
    if (resultSlot < 0) {
      throw new UnsupportedExpression(`function ${name}`, 'no return statement to read the result from');
    }

    this.steps = steps;
    this.resultSlot = resultSlot;
    this.slotCount = slots.size;
  }

  /**
   * Evaluate with plain values and explicit tangent seeds
   */
  call(values: readonly number[], seeds: readonly number[]): Dual {
    if (values.length !== this.params.length || seeds.length !== this.params.length) {
      throw new IncompatibleFunctionSignature(
        `${this.name} takes ${this.params.length} value(s) and seed(s), got ${values.length} and ${seeds.length}`
      );
    }

    const primal = new Array<number>(this.slotCount);
    const tangent = new Array<number>(this.slotCount);
    this.params.forEach((param, i) => {
      checkFinite(`input ${param}`, values[i], seeds[i]);
      primal[i] = values[i];
      tangent[i] = seeds[i];
    });

    const valueOf = (ref: SlotRef) => ('slot' in ref ? primal[ref.slot] : ref.constant);
    const tangentOf = (ref: SlotRef) => ('slot' in ref ? tangent[ref.slot] : 0);

    for (const step of this.steps) {
      const callee = step.callee
        ? new Dual(valueOf(step.callee), tangentOf(step.callee))
        : STATELESS;
      const out = step.compute(callee, step.args.map(tangentOf), step.args.map(valueOf));
      checkFinite(step.op, out.value, out.tangent);
      primal[step.target] = out.value;
      tangent[step.target] = out.tangent;
    }

    return new Dual(primal[this.resultSlot], tangent[this.resultSlot]);
  }

  /**
   * Rules in order of first use
   */
  rules(): Rule[] {
    const seen = new Map<string, Rule>();
    for (const stmt of this.statements) {
      if (stmt.kind === 'tangent-assign' && !seen.has(stmt.rule.op)) {
        seen.set(stmt.rule.op, stmt.rule);
      }
    }
    return [...seen.values()];
  }

  toString(): string {
    const params = this.params.map((p, i) => `${p}, ${this.tangentParams[i]}`).join(', ');
    const lines = [`function ${this.name}_tangent(${params}) {`];
    for (const stmt of this.statements) {
      lines.push(`  ${formatTangentStatement(stmt)}`);
    }
    lines.push('}');
    return lines.join('\n');
  }
}

export function formatTangentStatement(stmt: TangentStatement): string {
  if (stmt.kind === 'tangent-return') {
    return `return (${stmt.value}, ${stmt.tangent})`;
  }
  const callee = stmt.callee
    ? `[${formatOperand(stmt.callee.value)}, ${formatOperand(stmt.callee.tangent)}]`
    : '';
  const values = stmt.args.map(formatOperand).join(', ');
  const tangents = stmt.tangentArgs.map(formatOperand).join(', ');
  return `(${stmt.lhs}, ${stmt.tangent}) = ${stmt.rule.op}${callee}(${values} | ${tangents})`;
}

/**
 * Shortest prefix of the form d, d_, d__, ... that maps no name onto another
 * or onto a reserved word (`o` would give `do`)
 */
export function tangentPrefix(names: Iterable<string>): string {
  const taken = new Set(names);
  let prefix = 'd';
  while ([...taken].some(name => taken.has(prefix + name) || isReservedWord(prefix + name))) {
    prefix += '_';
  }
  return prefix;
}

function copyOperand(operand: Operand): Operand {
  return { ...operand };
}

function boundNames(ir: FunctionIR): string[] {
  const names = [...ir.params];
  for (const stmt of ir.body) {
    if (stmt.kind === 'assign') names.push(stmt.lhs);
  }
  return names;
}

export function transform(ir: FunctionIR, options: TransformOptions = {}): TransformedFunction {
  const registry = options.registry ?? defaultRegistry;

  validateFunction(ir);

  const prefix = tangentPrefix(boundNames(ir));
  const tangentOf = (operand: Operand): Operand =>
    operand.kind === 'var' ? { kind: 'var', name: prefix + operand.name } : { kind: 'const', value: 0 };

  const resolve = (stmt: AssignStatement): Rule => {
    registry.freeze();
    if (!registry.has(stmt.op)) {
      throw new UnsupportedExpression(formatStatement(stmt), `no rule registered for '${stmt.op}'`);
    }
    const rule = registry.lookup(stmt.op);
    if (rule.arity !== stmt.args.length) {
      throw new UnsupportedExpression(
        formatStatement(stmt),
        `'${stmt.op}' expects ${rule.arity} operand(s), got ${stmt.args.length}`
      );
    }
    return rule;
  };

  const statements: TangentStatement[] = [];
  for (const stmt of ir.body) {
    switch (stmt.kind) {
      case 'assign': {
        const rewritten: TangentAssign = {
          kind: 'tangent-assign',
          lhs: stmt.lhs,
          tangent: prefix + stmt.lhs,
          rule: resolve(stmt),
          args: stmt.args.map(copyOperand),
          tangentArgs: stmt.args.map(tangentOf)
        };
        if (stmt.callee) {
          rewritten.callee = { value: copyOperand(stmt.callee), tangent: tangentOf(stmt.callee) };
        }
        statements.push(rewritten);
        break;
      }
      case 'return':
        statements.push({ kind: 'tangent-return', value: stmt.variable, tangent: prefix + stmt.variable });
        break;
      case 'conditional':
        throw new UnsupportedExpression(formatStatement(stmt), 'branching is not supported');
    }
  }

  return new TransformedFunction(
    ir.name,
    [...ir.params],
    ir.params.map(p => prefix + p),
    statements
  );
}
