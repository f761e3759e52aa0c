// Lexer for sinter language

import { ParseError, Position, SourceLocation } from '../types';

export enum TokenType {
  // Literals
  INT_LITERAL = 'INT_LITERAL',
  FLOAT_LITERAL = 'FLOAT_LITERAL',
  DOUBLE_LITERAL = 'DOUBLE_LITERAL',
  STRING = 'STRING',
  DSTRING = 'DSTRING',
  BOOLEAN = 'BOOLEAN',
  NULL = 'NULL',

  IDENTIFIER = 'IDENTIFIER',
  ANNOTATION = 'ANNOTATION', // @name

  // Keywords
  CLASS = 'class',
  INTERFACE = 'interface',
  EXTENDS = 'extends',
  IMPLEMENTS = 'implements',
  FUNCTION = 'function',
  METHOD = 'method',
  VAR = 'var',
  CONST = 'const',
  PUBLIC = 'public',
  PRIVATE = 'private',
  PROTECTED = 'protected',
  IF = 'if',
  ELSE = 'else',
  WHILE = 'while',
  FOR = 'for',
  BREAK = 'break',
  CONTINUE = 'continue',
  RETURN = 'return',

  // Types
  INT = 'int',
  FLOAT = 'float',
  DOUBLE = 'double',
  BOOLEAN_TYPE = 'boolean',
  STR = 'str',
  VOID = 'void',

  // Operators
  PLUS = '+',
  MINUS = '-',
  MULTIPLY = '*',
  DIVIDE = '/',
  MODULO = '%',
  ASSIGN = '=',
  PLUS_ASSIGN = '+=',
  MINUS_ASSIGN = '-=',
  MULTIPLY_ASSIGN = '*=',
  DIVIDE_ASSIGN = '/=',
  MODULO_ASSIGN = '%=',
  INCREMENT = '++',
  DECREMENT = '--',
  AMPERSAND = '&',

  // Comparison
  EQUAL = '==',
  NOT_EQUAL = '!=',
  LESS_THAN = '<',
  LESS_EQUAL = '<=',
  GREATER_THAN = '>',
  GREATER_EQUAL = '>=',

  // Logical
  AND = '&&',
  OR = '||',
  NOT = '!',

  // Punctuation
  SEMICOLON = ';',
  COMMA = ',',
  DOT = '.',
  COLON = ':',
  ARROW = '->',

  // Brackets
  LEFT_PAREN = '(',
  RIGHT_PAREN = ')',
  LEFT_BRACE = '{',
  RIGHT_BRACE = '}',

  EOF = 'EOF'
}

export interface Token {
  type: TokenType;
  value: string;
  location: SourceLocation;
}

// Use a Map for keywords to avoid prototype collisions (e.g. toString)
const KEYWORDS: Map<string, TokenType> = new Map([
  ['class', TokenType.CLASS],
  ['interface', TokenType.INTERFACE],
  ['extends', TokenType.EXTENDS],
  ['implements', TokenType.IMPLEMENTS],
  ['function', TokenType.FUNCTION],
  ['method', TokenType.METHOD],
  ['var', TokenType.VAR],
  ['const', TokenType.CONST],
  ['public', TokenType.PUBLIC],
  ['private', TokenType.PRIVATE],
  ['protected', TokenType.PROTECTED],
  ['if', TokenType.IF],
  ['else', TokenType.ELSE],
  ['while', TokenType.WHILE],
  ['for', TokenType.FOR],
  ['break', TokenType.BREAK],
  ['continue', TokenType.CONTINUE],
  ['return', TokenType.RETURN],
  ['true', TokenType.BOOLEAN],
  ['false', TokenType.BOOLEAN],
  ['null', TokenType.NULL],
  ['int', TokenType.INT],
  ['float', TokenType.FLOAT],
  ['double', TokenType.DOUBLE],
  ['boolean', TokenType.BOOLEAN_TYPE],
  ['str', TokenType.STR],
  ['void', TokenType.VOID]
]);

const TWO_CHAR_TOKENS: Map<string, TokenType> = new Map([
  ['++', TokenType.INCREMENT],
  ['--', TokenType.DECREMENT],
  ['+=', TokenType.PLUS_ASSIGN],
  ['-=', TokenType.MINUS_ASSIGN],
  ['*=', TokenType.MULTIPLY_ASSIGN],
  ['/=', TokenType.DIVIDE_ASSIGN],
  ['%=', TokenType.MODULO_ASSIGN],
  ['==', TokenType.EQUAL],
  ['!=', TokenType.NOT_EQUAL],
  ['<=', TokenType.LESS_EQUAL],
  ['>=', TokenType.GREATER_EQUAL],
  ['&&', TokenType.AND],
  ['||', TokenType.OR],
  ['->', TokenType.ARROW]
]);

const SINGLE_CHAR_TOKENS: Map<string, TokenType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['*', TokenType.MULTIPLY],
  ['/', TokenType.DIVIDE],
  ['%', TokenType.MODULO],
  ['=', TokenType.ASSIGN],
  ['<', TokenType.LESS_THAN],
  ['>', TokenType.GREATER_THAN],
  ['!', TokenType.NOT],
  ['&', TokenType.AMPERSAND],
  [';', TokenType.SEMICOLON],
  [',', TokenType.COMMA],
  ['.', TokenType.DOT],
  [':', TokenType.COLON],
  ['(', TokenType.LEFT_PAREN],
  [')', TokenType.RIGHT_PAREN],
  ['{', TokenType.LEFT_BRACE],
  ['}', TokenType.RIGHT_BRACE]
]);

export class LexError extends ParseError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location);
    this.name = 'LexError';
  }
}

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private filename?: string;

  constructor(input: string, filename?: string) {
    this.input = input;
    this.filename = filename;
  }

  private current(): string {
    return this.input[this.position] || '';
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || '';
  }

  private advance(): string {
    const char = this.current();
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private createPosition(): Position {
    return { line: this.line, column: this.column };
  }

  private createLocation(start: Position): SourceLocation {
    return {
      start,
      end: this.createPosition(),
      filename: this.filename
    };
  }

  private skipLineComment(): void {
    while (this.current() !== '\n' && this.current() !== '') {
      this.advance();
    }
  }

  private skipBlockComment(start: Position): void {
    // Skip /*
    this.advance();
    this.advance();

    while (this.current() !== '' && !(this.current() === '*' && this.peek() === '/')) {
      this.advance();
    }

    if (this.current() === '') {
      throw new LexError('Unterminated block comment', this.createLocation(start));
    }
    this.advance(); // *
    this.advance(); // /
  }

  // Escapes are decoded; D-string braces are kept verbatim for the parser
  private readString(start: Position): string {
    let value = '';
    this.advance(); // Skip opening quote

    while (this.current() !== '"' && this.current() !== '') {
      if (this.current() === '\n') {
        throw new LexError('Unterminated string literal', this.createLocation(start));
      }
      if (this.current() === '\\') {
        this.advance();
        const escaped = this.current();
        switch (escaped) {
          case 'n': value += '\n'; break;
          case 't': value += '\t'; break;
          case 'r': value += '\r'; break;
          case '\\': value += '\\'; break;
          case '"': value += '"'; break;
          case '0': value += '\0'; break;
          default:
            throw new LexError(`Unknown escape sequence '\\${escaped}'`, this.createLocation(start));
        }
      } else {
        value += this.current();
      }
      this.advance();
    }

    if (this.current() !== '"') {
      throw new LexError('Unterminated string literal', this.createLocation(start));
    }
    this.advance(); // Skip closing quote
    return value;
  }

  private readNumber(): { type: TokenType; value: string } {
    let value = '';
    let isDecimal = false;

    while (/\d/.test(this.current())) {
      value += this.advance();
    }
    if (this.current() === '.' && /\d/.test(this.peek())) {
      isDecimal = true;
      value += this.advance();
      while (/\d/.test(this.current())) {
        value += this.advance();
      }
    }

    // Float suffix 'f' or 'F'
    if (this.current() === 'f' || this.current() === 'F') {
      this.advance();
      return { type: TokenType.FLOAT_LITERAL, value };
    }

    return { type: isDecimal ? TokenType.DOUBLE_LITERAL : TokenType.INT_LITERAL, value };
  }

  private readIdentifier(): string {
    let value = '';
    while (/[a-zA-Z0-9_]/.test(this.current())) {
      value += this.advance();
    }
    return value;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.position < this.input.length) {
      const start = this.createPosition();

      if (/\s/.test(this.current())) {
        this.advance();
        continue;
      }

      // Comments
      if (this.current() === '/' && this.peek() === '/') {
        this.skipLineComment();
        continue;
      }

      if (this.current() === '/' && this.peek() === '*') {
        this.skipBlockComment(start);
        continue;
      }

      // D"..." dynamic strings
      if (this.current() === 'D' && this.peek() === '"') {
        this.advance(); // D
        const value = this.readString(start);
        tokens.push({ type: TokenType.DSTRING, value, location: this.createLocation(start) });
        continue;
      }

      if (this.current() === '"') {
        const value = this.readString(start);
        tokens.push({ type: TokenType.STRING, value, location: this.createLocation(start) });
        continue;
      }

      // Numbers
      if (/\d/.test(this.current())) {
        const { type, value } = this.readNumber();
        tokens.push({ type, value, location: this.createLocation(start) });
        continue;
      }

      // Annotations
      if (this.current() === '@') {
        this.advance();
        const name = this.readIdentifier();
        if (name.length === 0) {
          throw new LexError("Expected annotation name after '@'", this.createLocation(start));
        }
        tokens.push({ type: TokenType.ANNOTATION, value: name, location: this.createLocation(start) });
        continue;
      }

      // Identifiers and keywords
      if (/[a-zA-Z_]/.test(this.current())) {
        const value = this.readIdentifier();
        const tokenType = KEYWORDS.get(value) ?? TokenType.IDENTIFIER;
        tokens.push({ type: tokenType, value, location: this.createLocation(start) });
        continue;
      }

      const twoChar = this.current() + this.peek();
      const twoCharType = TWO_CHAR_TOKENS.get(twoChar);
      if (twoCharType) {
        this.advance();
        this.advance();
        tokens.push({ type: twoCharType, value: twoChar, location: this.createLocation(start) });
        continue;
      }

      const char = this.advance();
      const tokenType = SINGLE_CHAR_TOKENS.get(char);
      if (!tokenType) {
        throw new LexError(`Unexpected character '${char}'`, this.createLocation(start));
      }
      tokens.push({ type: tokenType, value: char, location: this.createLocation(start) });
    }

    tokens.push({
      type: TokenType.EOF,
      value: '',
      location: this.createLocation(this.createPosition())
    });

    return tokens;
  }
}
