/**
 * Parser for arithmetic expressions
 * Recursive descent, conventional precedence, ^ right-associative
 */

import {
  Expression,
  BinaryOperator,
  makeBinaryOp,
  makeNegation,
  makeNumber,
  makeVariable
} from './AST.js';
import { Token, TokenType, Lexer } from './Lexer.js';
import { ParseError } from './Errors.js';

/**
 * Deepest nesting of parentheses, signs and exponents the parser accepts
 */
export const MAX_NESTING_DEPTH = 500;

export class Parser {
  private tokens: Token[];
  private current: number = 0;
  private depth: number = 0;

  constructor(input: string) {
    const lexer = new Lexer(input);
    this.tokens = lexer.tokenize();
  }

  /**
   * Parse a complete expression; anything left over is an error
   */
  parse(): Expression {
    if (this.isAtEnd()) {
      throw this.error(this.peek(), 'Empty expression');
    }

    const expr = this.expression();

    if (!this.isAtEnd()) {
      const token = this.peek();
      if (token.type === TokenType.RPAREN) {
        throw this.error(token, "Unmatched ')'");
      }
      throw this.error(token, `Unexpected '${token.value}' after complete expression`);
    }

    return expr;
  }

  private expression(): Expression {
    return this.additive();
  }

  /**
   * Parse additive expression (+ and -)
   */
  private additive(): Expression {
    let expr = this.multiplicative();

    while (this.match(TokenType.PLUS, TokenType.MINUS)) {
      const operator: BinaryOperator = this.previous().type === TokenType.PLUS ? '+' : '-';
      const right = this.multiplicative();
      expr = makeBinaryOp(operator, expr, right);
    }

    return expr;
  }

  /**
   * Parse multiplicative expression (* and /)
   */
  private multiplicative(): Expression {
    let expr = this.unary();

    while (this.match(TokenType.MULTIPLY, TokenType.DIVIDE)) {
      const operator: BinaryOperator = this.previous().type === TokenType.MULTIPLY ? '*' : '/';
      const right = this.unary();
      expr = makeBinaryOp(operator, expr, right);
    }

    return expr;
  }

  /**
   * Parse unary expression (- and +); binds looser than ^ so -x^2 is -(x^2)
   */
  private unary(): Expression {
    if (this.match(TokenType.MINUS)) {
      return makeNegation(this.nested(this.previous(), () => this.unary()));
    }

    if (this.match(TokenType.PLUS)) {
      return this.nested(this.previous(), () => this.unary());
    }

    return this.power();
  }

  /**
   * Parse power expression (^ and **)
   */
  private power(): Expression {
    const base = this.primary();

    // Right-associative; the exponent may carry its own sign
    if (this.match(TokenType.POWER)) {
      return makeBinaryOp('^', base, this.nested(this.previous(), () => this.unary()));
    }

    return base;
  }

  private primary(): Expression {
    if (this.match(TokenType.NUMBER)) {
      const token = this.previous();
      const value = Number(token.value);
      if (!Number.isFinite(value)) {
        throw this.error(token, `Invalid number '${token.value}'`);
      }
      return makeNumber(value);
    }

    if (this.match(TokenType.IDENTIFIER)) {
      return makeVariable(this.previous().value);
    }

    if (this.match(TokenType.LPAREN)) {
      const open = this.previous();
      if (this.check(TokenType.RPAREN)) {
        throw this.error(this.peek(), 'Expected expression inside parentheses');
      }
      const expr = this.nested(open, () => this.expression());
      if (!this.check(TokenType.RPAREN)) {
        const token = this.peek();
        const reason = token.type === TokenType.EOF
          ? `Expected ')' to close '(' at column ${open.position + 1}`
          : `Expected ')' but found '${token.value}'`;
        throw this.error(token, reason);
      }
      this.advance();
      return expr;
    }

    const token = this.peek();
    if (token.type === TokenType.EOF) {
      throw this.error(token, `Missing operand after '${this.previous().value}'`);
    }
    throw this.error(token, `Expected operand but found '${token.value}'`);
  }

  // Helper methods

  private nested(token: Token, parseInner: () => Expression): Expression {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error(token, `Expression nests deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    this.depth++;
    try {
      return parseInner();
    } finally {
      this.depth--;
    }
  }

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

  private error(token: Token, message: string): ParseError {
    return new ParseError(message, token.position, token.value || undefined);
  }
}

/**
 * Convenience function to parse input
 */
export function parse(input: string): Expression {
  const parser = new Parser(input);
  return parser.parse();
}
