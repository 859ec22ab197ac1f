/**
 * Example: compile DualScript source into a standalone tangent function
 */

import {
  checkFinite,
  compile,
  emitSource,
  factoryName,
  formatFunction,
  transform
} from '../src/index.js';

const source = `
  function spring(x, y, k) {
    r = sqrt(x^2 + y^2)
    stretch = r - 1
    return scale[k](stretch^2) / 2
  }
`;

const [ir] = compile(source);
const fn = transform(ir);

console.log('=== Statement IR ===\n');
console.log(formatFunction(ir));

console.log('\n=== Tangent program ===\n');
console.log(fn.toString());

console.log('\n=== Generated JavaScript ===\n');
const code = emitSource(fn, { format: 'javascript' });
console.log(code);

// Wire the generated factory to the rules the transformer resolved
type TangentFn = (...args: number[]) => { value: number; tangent: number };
const factory: (...deps: unknown[]) => TangentFn = new Function(`${code}\nreturn ${factoryName(fn)};`)();
const springTangent = factory(...fn.rules().map(rule => rule.compute), checkFinite);

// d/dx at (x, y, k) = (2, 0, 3)
console.log('\n=== Evaluation ===\n');
console.log('generated:  ', springTangent(2, 1, 0, 0, 3, 0));
console.log('transformer:', fn.call([2, 0, 3], [1, 0, 0]).toString());
