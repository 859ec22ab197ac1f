/**
 * AST nodes for the DualScript DSL
 */

export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * Base AST node
 */
export interface ASTNode {
  loc?: SourceLocation;
}

/**
 * Program (top-level)
 */
export interface Program extends ASTNode {
  kind: 'program';
  functions: FunctionDef[];
}

/**
 * Function definition
 */
export interface FunctionDef extends ASTNode {
  kind: 'function';
  name: string;
  parameters: string[];
  body: Statement[];
  returnExpr: Expression;
}

export type Statement = Assignment | IfStatement;

/**
 * Assignment statement
 */
export interface Assignment extends ASTNode {
  kind: 'assignment';
  variable: string;
  expression: Expression;
}

/**
 * Parsed so that lowering can hand it to the transformer, which rejects it
 */
export interface IfStatement extends ASTNode {
  kind: 'if';
  condition: Expression;
  then: Statement[];
  otherwise: Statement[];
}

export type Expression =
  | NumberLiteral
  | Variable
  | BinaryOp
  | UnaryOp
  | FunctionCall;

export interface NumberLiteral extends ASTNode {
  kind: 'number';
  value: number;
}

export interface Variable extends ASTNode {
  kind: 'variable';
  name: string;
}

export interface BinaryOp extends ASTNode {
  kind: 'binary';
  operator: '+' | '-' | '*' | '/' | '^' | '**';
  left: Expression;
  right: Expression;
}

export interface UnaryOp extends ASTNode {
  kind: 'unary';
  operator: '-' | '+';
  operand: Expression;
}

/**
 * Function call; `state` is set for parameterized calls such as scale[w](x)
 */
export interface FunctionCall extends ASTNode {
  kind: 'call';
  name: string;
  args: Expression[];
  state?: Expression;
}
