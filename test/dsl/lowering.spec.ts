import { describe, it, expect } from 'vitest';
import { compile } from '../../src/dsl/Lowering.js';
import { UnsupportedExpression } from '../../src/forward/Errors.js';
import { gradient, valueAndGradient } from '../../src/forward/Gradient.js';
import { IR, formatFunction } from '../../src/forward/IR.js';
import { interpret } from '../../src/forward/Interpreter.js';
import { transform } from '../../src/forward/Transformer.js';
import { FXY_GRADIENT, FXY_SOURCE, FXY_VALUE, transformSource } from '../helpers.js';

function lowerOne(source: string) {
  const [ir] = compile(source);
  return ir;
}

describe('lowering', () => {
  it('should flatten nested expressions into temporaries', () => {
    expect(lowerOne(FXY_SOURCE)).toEqual(IR.fn('f', ['x', 'y'], [
      IR.assign('$1', 'pow', ['x', 2]),
      IR.assign('$2', 'add', ['x', 'y']),
      IR.assign('$3', 'sin', ['$2']),
      IR.assign('$4', 'add', ['$1', '$3']),
      IR.ret('$4')
    ]));
  });

  it('should bind the outermost operation to the assigned name', () => {
    const ir = lowerOne(`
      function g(x, y) {
        s = x * (y - 1)
        return exp(s)
      }
    `);
    expect(formatFunction(ir)).toBe([
      'function g(x, y) {',
      '  $1 = sub(y, 1)',
      '  s = mul(x, $1)',
      '  $2 = exp(s)',
      '  return $2',
      '}'
    ].join('\n'));
  });

  it('should resolve plain copies to their operand', () => {
    const ir = lowerOne(`
      function h(x) {
        a = x
        k = 3
        return a * k
      }
    `);
    expect(ir.body).toEqual([IR.assign('$1', 'mul', ['x', 3]), IR.ret('$1')]);
  });

  it('should return a parameter directly', () => {
    expect(lowerOne('function id(x) { return +x }').body).toEqual([IR.ret('x')]);
    expect(lowerOne('function id(x) { a = x\n return a }').body).toEqual([IR.ret('x')]);
  });

  it('should lower negation', () => {
    const ir = lowerOne(`
      function n(x) {
        a = -x
        return x^-1 + a * -2
      }
    `);
    expect(ir.body).toEqual([
      IR.assign('a', 'neg', ['x']),
      IR.assign('$1', 'pow', ['x', -1]),
      IR.assign('$2', 'mul', ['a', -2]),
      IR.assign('$3', 'add', ['$1', '$2']),
      IR.ret('$3')
    ]);
  });

  it('should apply powers before negation', () => {
    expect(lowerOne('function n(x) { return -x^2 }').body).toEqual([
      IR.assign('$1', 'pow', ['x', 2]),
      IR.assign('$2', 'neg', ['$1']),
      IR.ret('$2')
    ]);
    expect(valueAndGradient(transformSource('function n(x) { return -x^2 }'), [3]))
      .toEqual({ value: -9, gradient: [-6] });
  });

  it('should not fold a sign into a powered literal', () => {
    const fn = transformSource('function n(x) { return x - 2^2 + -2^2 }');
    expect(valueAndGradient(fn, [0])).toEqual({ value: -8, gradient: [1] });
  });

  it('should map ** to pow', () => {
    expect(lowerOne('function p(x) { return x ** 3 }').body[0]).toEqual(IR.assign('$1', 'pow', ['x', 3]));
  });

  it('should carry callee state', () => {
    const ir = lowerOne('function s(x, w) { return scale[w](x) }');
    expect(ir.body[0]).toEqual(IR.assign('$1', 'scale', ['x'], 'w'));
  });

  it('should reject rebinding', () => {
    const source = `
      function r(x) {
        a = sin(x)
        a = cos(x)
        return a
      }
    `;
    expect(() => compile(source)).toThrow(UnsupportedExpression);
    expect(() => compile(source)).toThrow("Cannot transform 'a = ...': 'a' is already bound");
    expect(() => compile('function r(x) { x = sin(x)\n return x }')).toThrow("'x' is already bound");
  });

  it('should reject constant results', () => {
    expect(() => compile('function k(x) { return 3 }'))
      .toThrow("Cannot transform 'return 3': return value must depend on a variable");
  });

  it('should lower branches so that the transformer rejects them', () => {
    const ir = lowerOne(`
      function b(x) {
        if (x) {
          a = sin(x)
        }
        return x
      }
    `);
    expect(ir.body).toEqual([
      IR.conditional('x', [IR.assign('a', 'sin', ['x'])], []),
      IR.ret('x')
    ]);
    expect(() => transform(ir)).toThrow("Cannot transform 'if (x) { ... }': branching is not supported");
  });

  it('should surface unknown operations at transform time', () => {
    expect(() => transformSource('function e(x) { return erf(x) }'))
      .toThrow("Cannot transform '$1 = erf(x)': no rule registered for 'erf'");
  });
});

describe('compiled functions', () => {
  it('should differentiate DSL source end to end', () => {
    const fn = transformSource(FXY_SOURCE);
    const { value, gradient: grad } = valueAndGradient(fn, [1, 2]);
    expect(value).toBeCloseTo(FXY_VALUE, 12);
    expect(grad[0]).toBeCloseTo(FXY_GRADIENT[0], 12);
    expect(grad[1]).toBeCloseTo(FXY_GRADIENT[1], 12);
  });

  it('should agree with interpretation of the same IR', () => {
    const ir = lowerOne(`
      function q(x, y) {
        r = sqrt(x^2 + y^2)
        return log(r) / (1 + x)
      }
    `);
    const viaTransform = gradient(transform(ir), [3, 4]);
    const viaInterpreter = gradient(interpret(ir), [3, 4]);
    expect(viaTransform[0]).toBeCloseTo(viaInterpreter[0], 12);
    expect(viaTransform[1]).toBeCloseTo(viaInterpreter[1], 12);
    // d/dy log(r)/(1+x) = y / (r^2 (1+x)) = 4 / 100
    expect(viaTransform[1]).toBeCloseTo(0.04, 12);
  });

  it('should use callee state in derivatives', () => {
    const fn = transformSource('function s(x, w) { return scale[w](x) }');
    // d(w x) = w dx + x dw
    expect(gradient(fn, [2, 5])).toEqual([5, 2]);
  });
});
