/**
 * Parser for the infix expression language used by the CLI.
 * Builds a small AST that Evaluate.ts turns into a Value graph.
 * @internal
 */

import { ParseError } from '../Errors';
import { isOpKind, isUnaryOp } from '../Operations';
import type { UnaryOpKind } from '../Operations';
import type { Expr, Program, Statement } from './AST';

enum TokenType {
  NUMBER,
  IDENTIFIER,
  PLUS,
  MINUS,
  MULTIPLY,
  DIVIDE,
  POWER,
  LPAREN,
  RPAREN,
  EQUALS,
  SEPARATOR,
  EOF
}

interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

/**
 * Lexer: converts text into tokens
 */
class Lexer {
  private pos = 0;

  constructor(private readonly text: string) {}

  private peek(offset = 0): string {
    const pos = this.pos + offset;
    return pos < this.text.length ? this.text[pos] : '\0';
  }

  private advance(): string {
    const ch = this.peek();
    this.pos++;
    return ch;
  }

  private skipWhitespace(): void {
    while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\r') {
      this.advance();
    }
  }

  private readNumber(): Token {
    const start = this.pos;
    let text = '';

    while (/[0-9.]/.test(this.peek())) {
      text += this.advance();
    }

    // Exponent: 1e-3, 2.5E+4
    if (/[eE]/.test(this.peek()) && /[0-9+-]/.test(this.peek(1))) {
      text += this.advance();
      if (this.peek() === '+' || this.peek() === '-') text += this.advance();
      while (/[0-9]/.test(this.peek())) {
        text += this.advance();
      }
    }

    if (Number.isNaN(Number(text))) {
      throw new ParseError(`Malformed number '${text}'`, start);
    }
    return { type: TokenType.NUMBER, text, pos: start };
  }

  private readIdentifier(): Token {
    const start = this.pos;
    let text = '';

    while (/[a-zA-Z0-9_]/.test(this.peek())) {
      text += this.advance();
    }

    return { type: TokenType.IDENTIFIER, text, pos: start };
  }

  nextToken(): Token {
    this.skipWhitespace();

    const ch = this.peek();
    const pos = this.pos;

    if (pos >= this.text.length) {
      return { type: TokenType.EOF, text: '', pos };
    }

    if (/[0-9.]/.test(ch)) {
      return this.readNumber();
    }

    if (/[a-zA-Z_]/.test(ch)) {
      return this.readIdentifier();
    }

    this.advance();
    switch (ch) {
      case '+': return { type: TokenType.PLUS, text: ch, pos };
      case '-': return { type: TokenType.MINUS, text: ch, pos };
      case '*':
        if (this.peek() === '*') {
          this.advance();
          return { type: TokenType.POWER, text: '**', pos };
        }
        return { type: TokenType.MULTIPLY, text: ch, pos };
      case '/': return { type: TokenType.DIVIDE, text: ch, pos };
      case '(': return { type: TokenType.LPAREN, text: ch, pos };
      case ')': return { type: TokenType.RPAREN, text: ch, pos };
      case '=': return { type: TokenType.EQUALS, text: ch, pos };
      case ';':
      case '\n':
        return { type: TokenType.SEPARATOR, text: ch, pos };
      default:
        throw new ParseError(`Unexpected character '${ch}'`, pos);
    }
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token: Token;

    do {
      token = this.nextToken();
      tokens.push(token);
    } while (token.type !== TokenType.EOF);

    return tokens;
  }
}

/**
 * Parser: converts tokens into AST
 * Grammar (precedence from lowest to highest):
 *   program    → statement ((';' | NEWLINE) statement)*
 *   statement  → IDENTIFIER '=' expression | expression
 *   expression → term (('+' | '-') term)*
 *   term       → unary (('*' | '/') unary)*
 *   unary      → ('-' | '+') unary | power
 *   power      → primary ('**' unary)?
 *   primary    → NUMBER | IDENTIFIER | IDENTIFIER '(' expression ')' | '(' expression ')'
 */
export class Parser {
  private readonly tokens: Token[];
  private current = 0;

  constructor(text: string) {
    this.tokens = new Lexer(text).tokenize();
  }

  private peek(offset = 0): Token {
    const idx = this.current + offset;
    return idx < this.tokens.length ? this.tokens[idx] : this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  private expect(type: TokenType, message: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw new ParseError(message, token.pos);
    }
    return this.advance();
  }

  private skipSeparators(): void {
    while (this.peek().type === TokenType.SEPARATOR) {
      this.advance();
    }
  }

  /**
   * Parse a complete program
   */
  parseProgram(): Program {
    const statements: Statement[] = [];

    this.skipSeparators();
    while (this.peek().type !== TokenType.EOF) {
      statements.push(this.parseStatement());

      const next = this.peek();
      if (next.type !== TokenType.SEPARATOR && next.type !== TokenType.EOF) {
        throw new ParseError(`Unexpected '${next.text}'`, next.pos);
      }
      this.skipSeparators();
    }

    if (statements.length === 0) {
      throw new ParseError('Empty expression', 0);
    }
    return { statements };
  }

  private parseStatement(): Statement {
    if (this.peek().type === TokenType.IDENTIFIER && this.peek(1).type === TokenType.EQUALS) {
      const target = this.advance().text;
      this.advance(); // '='
      return { target, expression: this.parseExpression() };
    }
    return { expression: this.parseExpression() };
  }

  private parseExpression(): Expr {
    let left = this.parseTerm();

    while (this.peek().type === TokenType.PLUS || this.peek().type === TokenType.MINUS) {
      const op = this.advance().type === TokenType.PLUS ? 'add' : 'sub';
      const right = this.parseTerm();
      left = { type: 'Binary', op, left, right };
    }

    return left;
  }

  private parseTerm(): Expr {
    let left = this.parseUnary();

    while (this.peek().type === TokenType.MULTIPLY || this.peek().type === TokenType.DIVIDE) {
      const op = this.advance().type === TokenType.MULTIPLY ? 'mul' : 'div';
      const right = this.parseUnary();
      left = { type: 'Binary', op, left, right };
    }

    return left;
  }

  private parseUnary(): Expr {
    const token = this.peek();
    if (token.type === TokenType.MINUS) {
      this.advance();
      return { type: 'Unary', op: 'neg', operand: this.parseUnary() };
    }
    if (token.type === TokenType.PLUS) {
      this.advance();
      return this.parseUnary();
    }
    return this.parsePower();
  }

  /**
   * Right-associative, and binds tighter than unary minus on its left:
   * -x**2 = -(x**2), 2**-1 = 0.5, 2**3**2 = 512.
   */
  private parsePower(): Expr {
    const base = this.parsePrimary();
    if (this.peek().type === TokenType.POWER) {
      this.advance();
      return { type: 'Binary', op: 'pow', left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): Expr {
    const token = this.peek();

    if (token.type === TokenType.NUMBER) {
      this.advance();
      return { type: 'Number', value: Number(token.text) };
    }

    if (token.type === TokenType.LPAREN) {
      this.advance();
      const expr = this.parseExpression();
      this.expect(TokenType.RPAREN, 'Expected closing parenthesis');
      return expr;
    }

    if (token.type === TokenType.IDENTIFIER) {
      this.advance();
      if (this.peek().type === TokenType.LPAREN) {
        const fn = functionKind(token.text);
        if (fn === undefined) {
          throw new ParseError(`Unknown function '${token.text}'`, token.pos);
        }
        this.advance(); // '('
        const operand = this.parseExpression();
        this.expect(TokenType.RPAREN, `Expected closing parenthesis in call to ${fn}`);
        return { type: 'Unary', op: fn, operand };
      }
      return { type: 'Variable', name: token.text, pos: token.pos };
    }

    const shown = token.type === TokenType.EOF ? 'end of input' : `'${token.text}'`;
    throw new ParseError(`Unexpected ${shown}`, token.pos);
  }
}

/**
 * Functions callable by name: every unary operation except negation,
 * which is written as a prefix minus.
 */
function functionKind(name: string): UnaryOpKind | undefined {
  if (name !== 'neg' && isOpKind(name) && isUnaryOp(name)) {
    return name;
  }
  return undefined;
}

/**
 * Parse expression source into a Program
 */
export function parse(text: string): Program {
  return new Parser(text).parseProgram();
}
