import { describe, it, expect } from 'vitest';
import { Lexer, LexError, TokenType } from '../src/parser/lexer';

function types(source: string): TokenType[] {
  return new Lexer(source).tokenize().map(t => t.type);
}

describe('Lexer', () => {
  it('tokenizes a variable declaration', () => {
    const tokens = new Lexer('var x: int = 42;').tokenize();
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.VAR, TokenType.IDENTIFIER, TokenType.COLON, TokenType.INT,
      TokenType.ASSIGN, TokenType.INT_LITERAL, TokenType.SEMICOLON, TokenType.EOF
    ]);
    expect(tokens[1].value).toBe('x');
    expect(tokens[5].value).toBe('42');
  });

  it('distinguishes int, double and float literals', () => {
    const tokens = new Lexer('7 2.5 1.5f').tokenize();
    expect(tokens.slice(0, 3).map(t => [t.type, t.value])).toEqual([
      [TokenType.INT_LITERAL, '7'],
      [TokenType.DOUBLE_LITERAL, '2.5'],
      [TokenType.FLOAT_LITERAL, '1.5']
    ]);
  });

  it('reads D-strings with their placeholders intact', () => {
    const [token] = new Lexer('D"count={count}"').tokenize();
    expect(token.type).toBe(TokenType.DSTRING);
    expect(token.value).toBe('count={count}');
  });

  it('decodes escapes in string literals', () => {
    const [token] = new Lexer('"a\\n\\"b\\""').tokenize();
    expect(token.value).toBe('a\n"b"');
  });

  it('reads annotations and the arrow operator', () => {
    expect(types('@attribute method f() -> int')).toEqual([
      TokenType.ANNOTATION, TokenType.METHOD, TokenType.IDENTIFIER, TokenType.LEFT_PAREN,
      TokenType.RIGHT_PAREN, TokenType.ARROW, TokenType.INT, TokenType.EOF
    ]);
  });

  it('prefers two-character operators', () => {
    expect(types('a += 1; b++; c <= d && e != f')).toEqual([
      TokenType.IDENTIFIER, TokenType.PLUS_ASSIGN, TokenType.INT_LITERAL, TokenType.SEMICOLON,
      TokenType.IDENTIFIER, TokenType.INCREMENT, TokenType.SEMICOLON,
      TokenType.IDENTIFIER, TokenType.LESS_EQUAL, TokenType.IDENTIFIER, TokenType.AND,
      TokenType.IDENTIFIER, TokenType.NOT_EQUAL, TokenType.IDENTIFIER, TokenType.EOF
    ]);
  });

  it('skips line and block comments', () => {
    expect(types('// note\nx /* inner */ y')).toEqual([TokenType.IDENTIFIER, TokenType.IDENTIFIER, TokenType.EOF]);
  });

  it('records line and column positions', () => {
    const tokens = new Lexer('var a\n  return', 'pos.sn').tokenize();
    expect(tokens[0].location.start).toEqual({ line: 1, column: 1 });
    expect(tokens[1].location.start).toEqual({ line: 1, column: 5 });
    expect(tokens[2].location.start).toEqual({ line: 2, column: 3 });
    expect(tokens[2].location.filename).toBe('pos.sn');
  });

  it('reports unterminated strings', () => {
    expect(() => new Lexer('"abc').tokenize()).toThrow(new LexError('Unterminated string literal'));
  });

  it('reports unknown escapes', () => {
    expect(() => new Lexer('"\\q"').tokenize()).toThrow("Unknown escape sequence '\\q'");
  });

  it('reports unexpected characters', () => {
    expect(() => new Lexer('x # y').tokenize()).toThrow("Unexpected character '#'");
  });

  it('reports unterminated block comments', () => {
    expect(() => new Lexer('/* open').tokenize()).toThrow('Unterminated block comment');
  });
});
