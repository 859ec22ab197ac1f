/**
 * Error kinds raised by the forward-mode engine.
 * None of them are recovered internally; callers decide whether to retry or abort.
 */

export class AutodiffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AutodiffError';
  }
}

export class DuplicateRule extends AutodiffError {
  constructor(public op: string) {
    super(`Rule for '${op}' is already registered`);
    this.name = 'DuplicateRule';
  }
}

export class InvalidRule extends AutodiffError {
  constructor(public op: string, public reason: string) {
    super(`Invalid rule '${op}': ${reason}`);
    this.name = 'InvalidRule';
  }
}

export class RegistryFrozen extends AutodiffError {
  constructor(public op: string) {
    super(`Cannot register '${op}': registry is frozen once evaluation has started`);
    this.name = 'RegistryFrozen';
  }
}

export class UnsupportedOperation extends AutodiffError {
  constructor(public op: string, public reason?: string) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Unsupported operation '${op}'${reasonInfo}`);
    this.name = 'UnsupportedOperation';
  }
}

export class UnsupportedExpression extends AutodiffError {
  constructor(public statement: string, public reason: string) {
    super(`Cannot transform '${statement}': ${reason}`);
    this.name = 'UnsupportedExpression';
  }
}

export class IncompatibleFunctionSignature extends AutodiffError {
  constructor(public reason: string) {
    super(`Incompatible function signature: ${reason}`);
    this.name = 'IncompatibleFunctionSignature';
  }
}

export class NumericalInstability extends AutodiffError {
  constructor(
    public op: string,
    public value: number,
    public tangent: number
  ) {
    super(`Non-finite result from '${op}' (value=${value}, tangent=${tangent})`);
    this.name = 'NumericalInstability';
  }
}
