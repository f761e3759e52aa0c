// Parser for sinter language

import { Token, TokenType } from './lexer';
import { Declaration, ParseError, Program, SourceLocation } from '../types';
import { parseClassDeclaration, parseFunctionDeclaration, parseInterfaceDeclaration } from './parser-declarations';

const DECLARATION_START = [TokenType.CLASS, TokenType.INTERFACE, TokenType.FUNCTION];

export class Parser {
  public tokens: Token[];
  public current: number = 0;
  public filename: string;
  public errors: ParseError[] = [];

  constructor(tokens: Token[], filename: string = 'input') {
    this.tokens = tokens;
    this.filename = filename;
  }

  parse(): Program {
    const declarations: Declaration[] = [];
    const start = this.peek();
    this.errors = [];

    while (!this.isAtEnd()) {
      try {
        declarations.push(this.parseDeclaration());
      } catch (error) {
        if (error instanceof ParseError) {
          this.errors.push(error);
          this.synchronize();
        } else {
          throw error;
        }
      }
    }

    return {
      kind: 'program',
      declarations,
      filename: this.filename,
      location: this.locationFrom(start)
    };
  }

  private parseDeclaration(): Declaration {
    if (this.match(TokenType.CLASS)) {
      return parseClassDeclaration(this);
    }
    if (this.match(TokenType.INTERFACE)) {
      return parseInterfaceDeclaration(this);
    }
    if (this.match(TokenType.FUNCTION)) {
      return parseFunctionDeclaration(this);
    }
    throw new ParseError(`Expected class, interface or function declaration. Got '${this.peek().value}'`, this.getLocation());
  }

  public match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  public check(type: TokenType): boolean {
    if (this.isAtEnd()) return type === TokenType.EOF;
    return this.peek().type === type;
  }

  public checkNext(type: TokenType): boolean {
    return this.peek(1).type === type;
  }

  public advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) this.current++;
    return token;
  }

  public isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  public peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.current + offset, this.tokens.length - 1)];
  }

  public previous(): Token {
    return this.tokens[Math.max(this.current - 1, 0)];
  }

  public consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw new ParseError(`${message}. Got '${this.peek().value || this.peek().type}'`, this.getLocation());
  }

  // Skip to the next top-level declaration after an error
  public synchronize(): void {
    if (!this.isAtEnd()) this.advance();
    let depth = 0;
    while (!this.isAtEnd()) {
      const type = this.peek().type;
      if (depth === 0 && DECLARATION_START.includes(type) && this.previous().type !== TokenType.ANNOTATION) {
        return;
      }
      if (type === TokenType.LEFT_BRACE) depth++;
      if (type === TokenType.RIGHT_BRACE) depth = Math.max(0, depth - 1);
      this.advance();
    }
  }

  public getLocation(): SourceLocation {
    return { ...this.peek().location, filename: this.filename };
  }

  // Span from a starting token through the last consumed token
  public locationFrom(start: Token): SourceLocation {
    return {
      start: start.location.start,
      end: this.previous().location.end,
      filename: this.filename
    };
  }
}
