/**
 * Parser for the DualScript DSL
 * Parses straight-line function definitions
 */

import {
  Program,
  FunctionDef,
  Statement,
  Assignment,
  IfStatement,
  Expression,
  FunctionCall
} from './AST.js';
import { Token, TokenType, Lexer } from './Lexer.js';
import { ParseError } from './Errors.js';

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(input: string) {
    const lexer = new Lexer(input);
    this.tokens = lexer.tokenize();
  }

  /**
   * Parse the entire program
   */
  parse(): Program {
    const functions: FunctionDef[] = [];

    while (!this.isAtEnd()) {
      functions.push(this.functionDef());
    }

    if (functions.length === 0) {
      const token = this.peek();
      throw new ParseError('Expected at least one function definition', token.line, token.column);
    }

    return {
      kind: 'program',
      functions
    };
  }

  /**
   * function name(a, b) { ... }
   */
  private functionDef(): FunctionDef {
    const keyword = this.consume(TokenType.FUNCTION, "Expected 'function'");

    const name = this.consume(TokenType.IDENTIFIER, 'Expected function name').value;

    this.consume(TokenType.LPAREN, "Expected '(' after function name");
    const parameters = this.parameterList();
    this.consume(TokenType.RPAREN, "Expected ')' after parameters");
    this.consume(TokenType.LBRACE, "Expected '{' before function body");

    const { body, returnExpr } = this.functionBody();

    this.consume(TokenType.RBRACE, "Expected '}' after function body");

    return {
      kind: 'function',
      name,
      parameters,
      body,
      returnExpr,
      loc: { line: keyword.line, column: keyword.column }
    };
  }

  private parameterList(): string[] {
    const params: string[] = [];

    if (this.check(TokenType.RPAREN)) {
      return params;
    }

    do {
      params.push(this.consume(TokenType.IDENTIFIER, 'Expected parameter name').value);
    } while (this.match(TokenType.COMMA));

    return params;
  }

  /**
   * Statements followed by a single return
   */
  private functionBody(): { body: Statement[]; returnExpr: Expression } {
    const body = this.block(TokenType.RETURN);

    this.consume(TokenType.RETURN, "Expected 'return' statement");
    const returnExpr = this.expression();

    return { body, returnExpr };
  }

  private block(terminator: TokenType): Statement[] {
    const statements: Statement[] = [];
    while (!this.check(terminator) && !this.check(TokenType.RBRACE) && !this.isAtEnd()) {
      statements.push(this.statement());
    }
    return statements;
  }

  private statement(): Statement {
    if (this.check(TokenType.IF)) {
      return this.ifStatement();
    }
    return this.assignment();
  }

  /**
   * if (cond) { ... } else { ... }
   */
  private ifStatement(): IfStatement {
    const keyword = this.consume(TokenType.IF, "Expected 'if'");
    this.consume(TokenType.LPAREN, "Expected '(' after 'if'");
    const condition = this.expression();
    this.consume(TokenType.RPAREN, "Expected ')' after condition");

    this.consume(TokenType.LBRACE, "Expected '{' before if body");
    const then = this.block(TokenType.RBRACE);
    this.consume(TokenType.RBRACE, "Expected '}' after if body");

    let otherwise: Statement[] = [];
    if (this.match(TokenType.ELSE)) {
      this.consume(TokenType.LBRACE, "Expected '{' after 'else'");
      otherwise = this.block(TokenType.RBRACE);
      this.consume(TokenType.RBRACE, "Expected '}' after else body");
    }

    return {
      kind: 'if',
      condition,
      then,
      otherwise,
      loc: { line: keyword.line, column: keyword.column }
    };
  }

  /**
   * variable = expression
   */
  private assignment(): Assignment {
    const varToken = this.consume(TokenType.IDENTIFIER, 'Expected variable name');
    this.consume(TokenType.EQUALS, "Expected '=' in assignment");
    const expression = this.expression();

    return {
      kind: 'assignment',
      variable: varToken.value,
      expression,
      loc: { line: varToken.line, column: varToken.column }
    };
  }

  private expression(): Expression {
    return this.additive();
  }

  /**
   * + and -
   */
  private additive(): Expression {
    let expr = this.multiplicative();

    while (this.match(TokenType.PLUS, TokenType.MINUS)) {
      const opToken = this.previous();
      const operator = opToken.type === TokenType.PLUS ? '+' : '-';
      const right = this.multiplicative();
      expr = {
        kind: 'binary',
        operator,
        left: expr,
        right,
        loc: { line: opToken.line, column: opToken.column }
      };
    }

    return expr;
  }

  /**
   * * and /
   */
  private multiplicative(): Expression {
    let expr = this.unary();

    while (this.match(TokenType.MULTIPLY, TokenType.DIVIDE)) {
      const opToken = this.previous();
      const operator = opToken.type === TokenType.MULTIPLY ? '*' : '/';
      const right = this.unary();
      expr = {
        kind: 'binary',
        operator,
        left: expr,
        right,
        loc: { line: opToken.line, column: opToken.column }
      };
    }

    return expr;
  }

  /**
   * Unary - and +, looser than powers: -x^2 is -(x^2)
   */
  private unary(): Expression {
    if (this.match(TokenType.MINUS, TokenType.PLUS)) {
      const opToken = this.previous();
      const operand = this.unary();
      return {
        kind: 'unary',
        operator: opToken.type === TokenType.MINUS ? '-' : '+',
        operand,
        loc: { line: opToken.line, column: opToken.column }
      };
    }

    return this.power();
  }

  /**
   * ^ and ** (right-associative); the exponent may carry a sign: x^-1
   */
  private power(): Expression {
    const expr = this.call();

    if (this.match(TokenType.POWER, TokenType.POWER_ALT)) {
      const opToken = this.previous();
      const operator = opToken.type === TokenType.POWER ? '^' : '**';
      const right = this.unary();
      return {
        kind: 'binary',
        operator,
        left: expr,
        right,
        loc: { line: opToken.line, column: opToken.column }
      };
    }

    return expr;
  }

  /**
   * name(args) or name[state](args)
   */
  private call(): Expression {
    const expr = this.primary();

    if (expr.kind !== 'variable' || !(this.check(TokenType.LPAREN) || this.check(TokenType.LBRACKET))) {
      return expr;
    }

    let state: Expression | undefined;
    if (this.match(TokenType.LBRACKET)) {
      state = this.expression();
      this.consume(TokenType.RBRACKET, "Expected ']' after callee state");
    }

    this.consume(TokenType.LPAREN, "Expected '(' after function name");
    const args = this.argumentList();
    this.consume(TokenType.RPAREN, "Expected ')' after arguments");

    const node: FunctionCall = {
      kind: 'call',
      name: expr.name,
      args,
      loc: expr.loc
    };
    if (state) {
      node.state = state;
    }
    return node;
  }

  private argumentList(): Expression[] {
    const args: Expression[] = [];

    if (this.check(TokenType.RPAREN)) {
      return args;
    }

    do {
      args.push(this.expression());
    } while (this.match(TokenType.COMMA));

    return args;
  }

  private primary(): Expression {
    if (this.match(TokenType.NUMBER)) {
      const token = this.previous();
      return {
        kind: 'number',
        value: parseFloat(token.value),
        loc: { line: token.line, column: token.column }
      };
    }

    if (this.match(TokenType.IDENTIFIER)) {
      const token = this.previous();
      return {
        kind: 'variable',
        name: token.value,
        loc: { line: token.line, column: token.column }
      };
    }

    if (this.match(TokenType.LPAREN)) {
      const expr = this.expression();
      this.consume(TokenType.RPAREN, "Expected ')' after expression");
      return expr;
    }

    throw this.error(this.peek(), 'Expected expression');
  }

  // Helper methods

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  private error(token: Token, message: string): ParseError {
    return new ParseError(message, token.line, token.column, token.value);
  }
}

/**
 * Convenience function to parse input
 */
export function parse(input: string): Program {
  const parser = new Parser(input);
  return parser.parse();
}
