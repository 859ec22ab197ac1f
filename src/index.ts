/**
 * DualScript - Forward-mode automatic differentiation
 *
 * Two strategies over one rule registry: an evaluator that dispatches every
 * operation of a generic function at run time, and a transformer that rewrites
 * straight-line statement IR into a tangent-propagating function once.
 */

// Dual values
export { Dual, STATELESS, checkFinite, isDual } from './forward/Dual.js';

// Rule registry and extension API
export {
  RuleRegistry,
  createRegistry,
  defaultRegistry,
  registerRule,
  applyRule,
  type Rule,
  type RuleCompute,
  type RegistryOptions
} from './forward/Rules.js';

// Evaluator
export {
  DualOps,
  ValueOps,
  type NumericOps,
  type GenericFunction,
  type Operand as NumericOperand
} from './forward/NumericOps.js';
export { evaluateWithTangent, type EvaluateOptions } from './forward/Evaluator.js';

// Transformer
export {
  IR,
  formatFunction,
  formatStatement,
  validateFunction,
  type FunctionIR,
  type Statement,
  type AssignStatement,
  type ReturnStatement,
  type ConditionalStatement,
  type Operand
} from './forward/IR.js';
export { interpret } from './forward/Interpreter.js';
export {
  transform,
  TransformedFunction,
  type TransformOptions,
  type TangentStatement
} from './forward/Transformer.js';
export { emitSource, factoryName, type CodeGenOptions } from './forward/CodeGen.js';

// Gradient driver
export {
  gradient,
  valueAndGradient,
  directionalDerivative,
  type GradientTarget,
  type ValueAndGradient
} from './forward/Gradient.js';
export {
  GradientChecker,
  formatGradCheckResult,
  type GradCheckResult,
  type GradCheckError
} from './forward/GradientChecker.js';

// Errors
export {
  AutodiffError,
  DuplicateRule,
  InvalidRule,
  RegistryFrozen,
  UnsupportedOperation,
  UnsupportedExpression,
  IncompatibleFunctionSignature,
  NumericalInstability
} from './forward/Errors.js';

// DSL
export { parse } from './dsl/Parser.js';
export { compile, lowerFunction, lowerProgram } from './dsl/Lowering.js';
export { ParseError, formatParseError } from './dsl/Errors.js';
export type { Program, FunctionDef, Expression } from './dsl/AST.js';
