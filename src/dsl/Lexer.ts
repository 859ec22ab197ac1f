/**
 * Lexer for the DualScript DSL
 *
 * Line breaks and `//` comments separate tokens and are otherwise dropped;
 * statements end where the next one begins.
 */

import { ParseError } from './Errors.js';
import { isReservedWord } from '../forward/IR.js';

export enum TokenType {
  // Literals
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Keywords
  FUNCTION = 'FUNCTION',
  RETURN = 'RETURN',
  IF = 'IF',
  ELSE = 'ELSE',

  // Operators
  PLUS = 'PLUS',           // +
  MINUS = 'MINUS',         // -
  MULTIPLY = 'MULTIPLY',   // *
  DIVIDE = 'DIVIDE',       // /
  POWER = 'POWER',         // ^
  POWER_ALT = 'POWER_ALT', // **

  // Delimiters
  LPAREN = 'LPAREN',       // (
  RPAREN = 'RPAREN',       // )
  LBRACE = 'LBRACE',       // {
  RBRACE = 'RBRACE',       // }
  LBRACKET = 'LBRACKET',   // [
  RBRACKET = 'RBRACKET',   // ]
  COMMA = 'COMMA',         // ,
  EQUALS = 'EQUALS',       // =

  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['function', TokenType.FUNCTION],
  ['return', TokenType.RETURN],
  ['if', TokenType.IF],
  ['else', TokenType.ELSE]
]);

// `*` is absent: it may start `**`
const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['/', TokenType.DIVIDE],
  ['^', TokenType.POWER],
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  ['[', TokenType.LBRACKET],
  [']', TokenType.RBRACKET],
  [',', TokenType.COMMA],
  ['=', TokenType.EQUALS]
]);

const DIGIT = /[0-9]/;
const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;

export class Lexer {
  private position = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly input: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.type === TokenType.EOF) {
        return tokens;
      }
    }
  }

  nextToken(): Token {
    this.skipTrivia();

    const line = this.line;
    const column = this.column;

    if (this.isAtEnd()) {
      return { type: TokenType.EOF, value: '', line, column };
    }

    const char = this.peek();

    if (DIGIT.test(char)) {
      return this.number(line, column);
    }
    if (IDENT_START.test(char)) {
      return this.word(line, column);
    }

    if (char === '*') {
      this.advance();
      if (this.peek() === '*') {
        this.advance();
        return { type: TokenType.POWER_ALT, value: '**', line, column };
      }
      return { type: TokenType.MULTIPLY, value: '*', line, column };
    }

    const single = SINGLE_CHAR_TOKENS.get(char);
    if (single) {
      this.advance();
      return { type: single, value: char, line, column };
    }

    throw new ParseError(`Unexpected character '${char}'`, line, column, char);
  }

  /**
   * 12, 1.5, 2e-3
   */
  private number(line: number, column: number): Token {
    let value = this.digits();

    if (this.peek() === '.' && DIGIT.test(this.peekNext())) {
      value += this.advance() + this.digits();
    }

    if (this.peek() === 'e' || this.peek() === 'E') {
      value += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        value += this.advance();
      }
      const exponent = this.digits();
      if (exponent === '') {
        throw new ParseError(`Malformed number '${value}': exponent has no digits`, line, column, value);
      }
      value += exponent;
    }

    return { type: TokenType.NUMBER, value, line, column };
  }

  private digits(): string {
    let out = '';
    while (DIGIT.test(this.peek())) {
      out += this.advance();
    }
    return out;
  }

  private word(line: number, column: number): Token {
    let value = '';
    while (IDENT_PART.test(this.peek())) {
      value += this.advance();
    }

    const keyword = KEYWORDS.get(value);
    if (keyword) {
      return { type: keyword, value, line, column };
    }
    if (isReservedWord(value)) {
      throw new ParseError(`'${value}' is a reserved word and cannot be used as a name`, line, column, value);
    }
    return { type: TokenType.IDENTIFIER, value, line, column };
  }

  private skipTrivia(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
        this.advance();
      } else if (char === '/' && this.peekNext() === '/') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private peek(): string {
    return this.isAtEnd() ? '\0' : this.input[this.position];
  }

  private peekNext(): string {
    return this.position + 1 < this.input.length ? this.input[this.position + 1] : '\0';
  }

  private advance(): string {
    const char = this.input[this.position++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
