/**
 * Lexer for arithmetic expressions
 * Tokenizes identifiers, numbers, + - * / ^ (and ** as ^) and parentheses
 */

import { ParseError } from './Errors.js';

export enum TokenType {
  // Literals
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Operators
  PLUS = 'PLUS',           // +
  MINUS = 'MINUS',         // -
  MULTIPLY = 'MULTIPLY',   // *
  DIVIDE = 'DIVIDE',       // /
  POWER = 'POWER',         // ^ or **

  // Delimiters
  LPAREN = 'LPAREN',       // (
  RPAREN = 'RPAREN',       // )

  // Special
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

export class Lexer {
  private input: string;
  private position: number = 0;

  constructor(input: string) {
    this.input = input;
  }

  /**
   * Get all tokens, ending with EOF
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token = this.nextToken();

    while (token.type !== TokenType.EOF) {
      tokens.push(token);
      token = this.nextToken();
    }

    tokens.push(token);
    return tokens;
  }

  nextToken(): Token {
    this.skipWhitespace();

    const position = this.position;

    if (this.isAtEnd()) {
      return { type: TokenType.EOF, value: '', position };
    }

    const char = this.peek();

    if (this.isDigit(char) || (char === '.' && this.isDigit(this.peekNext()))) {
      return this.number();
    }

    if (this.isAlpha(char)) {
      return this.identifier();
    }

    switch (char) {
      case '+':
        this.advance();
        return { type: TokenType.PLUS, value: '+', position };
      case '-':
        this.advance();
        return { type: TokenType.MINUS, value: '-', position };
      case '/':
        this.advance();
        return { type: TokenType.DIVIDE, value: '/', position };
      case '^':
        this.advance();
        return { type: TokenType.POWER, value: '^', position };
      case '(':
        this.advance();
        return { type: TokenType.LPAREN, value: '(', position };
      case ')':
        this.advance();
        return { type: TokenType.RPAREN, value: ')', position };
      case '*':
        this.advance();
        if (this.peek() === '*') {
          this.advance();
          return { type: TokenType.POWER, value: '**', position };
        }
        return { type: TokenType.MULTIPLY, value: '*', position };
    }

    throw new ParseError(`Unexpected character '${char}'`, position, char);
  }

  private number(): Token {
    const position = this.position;
    let value = '';

    while (this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance(); // consume '.'

      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    // Scientific notation only when digits follow, so `2e` stays `2` then `e`
    if (this.peek() === 'e' || this.peek() === 'E') {
      const sign = this.peekNext();
      const hasSign = sign === '+' || sign === '-';
      const firstDigit = hasSign ? this.peekAt(2) : sign;
      if (this.isDigit(firstDigit)) {
        value += this.advance();
        if (hasSign) {
          value += this.advance();
        }
        while (this.isDigit(this.peek())) {
          value += this.advance();
        }
      }
    }

    return { type: TokenType.NUMBER, value, position };
  }

  private identifier(): Token {
    const position = this.position;
    let value = '';

    while (this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    return { type: TokenType.IDENTIFIER, value, position };
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\r' || char === '\t' || char === '\n') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private peek(): string {
    return this.peekAt(0);
  }

  private peekNext(): string {
    return this.peekAt(1);
  }

  private peekAt(offset: number): string {
    const index = this.position + offset;
    if (index >= this.input.length) return '\0';
    return this.input[index];
  }

  private advance(): string {
    return this.input[this.position++];
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }
}

/**
 * Convenience function to tokenize input
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}
