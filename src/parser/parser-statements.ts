import {
  AssignmentOperator, AssignmentStatement, BlockStatement, Expression, ExpressionStatement, ForInitializer,
  ForStatement, ForUpdate, IfStatement, IncrementStatement, ParseError, ReturnStatement, Statement,
  VariableDeclaration, WhileStatement
} from '../types';
import { Token, TokenType } from './lexer';
import { Parser } from './parser';
import { createIdentifier, parseExpression } from './parser-expression';
import { parseType } from './parser-types';

const ASSIGNMENT_OPERATORS: Map<TokenType, AssignmentOperator> = new Map([
  [TokenType.ASSIGN, '='],
  [TokenType.PLUS_ASSIGN, '+='],
  [TokenType.MINUS_ASSIGN, '-='],
  [TokenType.MULTIPLY_ASSIGN, '*='],
  [TokenType.DIVIDE_ASSIGN, '/='],
  [TokenType.MODULO_ASSIGN, '%=']
]);

export function parseStatement(parser: Parser): Statement {
  const start = parser.peek();

  if (parser.match(TokenType.LEFT_BRACE)) {
    return parseBlockBody(parser, start);
  }
  if (parser.match(TokenType.VAR, TokenType.CONST)) {
    const declaration = parseVariableDeclaration(parser, start);
    parser.consume(TokenType.SEMICOLON, "Expected ';' after variable declaration");
    declaration.location = parser.locationFrom(start);
    return declaration;
  }
  if (parser.match(TokenType.IF)) {
    return parseIfStatement(parser, start);
  }
  if (parser.match(TokenType.WHILE)) {
    return parseWhileStatement(parser, start);
  }
  if (parser.match(TokenType.FOR)) {
    return parseForStatement(parser, start);
  }
  if (parser.match(TokenType.RETURN)) {
    return parseReturnStatement(parser, start);
  }
  if (parser.match(TokenType.BREAK)) {
    parser.consume(TokenType.SEMICOLON, "Expected ';' after 'break'");
    return { kind: 'break', location: parser.locationFrom(start) };
  }
  if (parser.match(TokenType.CONTINUE)) {
    parser.consume(TokenType.SEMICOLON, "Expected ';' after 'continue'");
    return { kind: 'continue', location: parser.locationFrom(start) };
  }

  const statement = parseSimpleStatement(parser);
  parser.consume(TokenType.SEMICOLON, "Expected ';' after statement");
  statement.location = parser.locationFrom(start);
  return statement;
}

export function parseBlockStatement(parser: Parser): BlockStatement {
  const start = parser.consume(TokenType.LEFT_BRACE, "Expected '{'");
  return parseBlockBody(parser, start);
}

function parseBlockBody(parser: Parser, start: Token): BlockStatement {
  const body: Statement[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    body.push(parseStatement(parser));
  }
  parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after block");
  return { kind: 'block', body, location: parser.locationFrom(start) };
}

// `var`/`const` already consumed; no trailing semicolon
export function parseVariableDeclaration(parser: Parser, start: Token): VariableDeclaration {
  const isConst = start.type === TokenType.CONST;
  const nameToken = parser.consume(TokenType.IDENTIFIER, 'Expected variable name');
  const declaration: VariableDeclaration = {
    kind: 'variable',
    name: createIdentifier(parser, nameToken),
    isConst,
    location: parser.locationFrom(start)
  };

  if (parser.match(TokenType.COLON)) {
    declaration.typeAnnotation = parseType(parser);
  }
  if (parser.match(TokenType.ASSIGN)) {
    declaration.initializer = parseExpression(parser);
  }
  if (!declaration.typeAnnotation && !declaration.initializer) {
    throw new ParseError(`Variable '${nameToken.value}' needs a type annotation or an initializer`, declaration.location);
  }
  if (isConst && !declaration.initializer) {
    throw new ParseError(`Constant '${nameToken.value}' must be initialized`, declaration.location);
  }

  declaration.location = parser.locationFrom(start);
  return declaration;
}

// Assignment, increment or expression statement without the trailing semicolon
function parseSimpleStatement(parser: Parser): AssignmentStatement | IncrementStatement | ExpressionStatement {
  const start = parser.peek();
  const target = parseExpression(parser);

  const operator = ASSIGNMENT_OPERATORS.get(parser.peek().type);
  if (operator) {
    parser.advance();
    const value = parseExpression(parser);
    ensureAssignable(target);
    return { kind: 'assignment', target, operator, value, location: parser.locationFrom(start) };
  }

  if (parser.match(TokenType.INCREMENT, TokenType.DECREMENT)) {
    ensureAssignable(target);
    const op = parser.previous().type === TokenType.INCREMENT ? '++' : '--';
    return { kind: 'increment', target, operator: op, location: parser.locationFrom(start) };
  }

  return { kind: 'expression', expression: target, location: parser.locationFrom(start) };
}

function ensureAssignable(target: Expression): void {
  const isLValue = target.kind === 'identifier'
    || target.kind === 'member'
    || (target.kind === 'unary' && target.operator === '*');
  if (!isLValue) {
    throw new ParseError('Invalid assignment target', target.location);
  }
}

function parseIfStatement(parser: Parser, start: Token): IfStatement {
  parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'if'");
  const condition = parseExpression(parser);
  parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after if condition");
  const thenBranch = parseBlockStatement(parser);

  const statement: IfStatement = { kind: 'if', condition, thenBranch, location: parser.locationFrom(start) };
  if (parser.match(TokenType.ELSE)) {
    const elseToken = parser.peek();
    statement.elseBranch = parser.match(TokenType.IF)
      ? parseIfStatement(parser, elseToken)
      : parseBlockStatement(parser);
  }
  statement.location = parser.locationFrom(start);
  return statement;
}

function parseWhileStatement(parser: Parser, start: Token): WhileStatement {
  parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'while'");
  const condition = parseExpression(parser);
  parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after while condition");
  const body = parseBlockStatement(parser);
  return { kind: 'while', condition, body, location: parser.locationFrom(start) };
}

function parseForStatement(parser: Parser, start: Token): ForStatement {
  parser.consume(TokenType.LEFT_PAREN, "Expected '(' after 'for'");

  let init: ForInitializer | undefined;
  if (!parser.check(TokenType.SEMICOLON)) {
    const initStart = parser.peek();
    init = parser.match(TokenType.VAR, TokenType.CONST)
      ? parseVariableDeclaration(parser, initStart)
      : parseSimpleStatement(parser);
  }
  parser.consume(TokenType.SEMICOLON, "Expected ';' after for initializer");

  const condition = parser.check(TokenType.SEMICOLON) ? undefined : parseExpression(parser);
  parser.consume(TokenType.SEMICOLON, "Expected ';' after for condition");

  let update: ForUpdate | undefined;
  if (!parser.check(TokenType.RIGHT_PAREN)) {
    update = parseSimpleStatement(parser);
  }
  parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after for clauses");

  const body = parseBlockStatement(parser);
  return { kind: 'for', init, condition, update, body, location: parser.locationFrom(start) };
}

function parseReturnStatement(parser: Parser, start: Token): ReturnStatement {
  const statement: ReturnStatement = { kind: 'return', location: parser.locationFrom(start) };
  if (!parser.check(TokenType.SEMICOLON)) {
    statement.value = parseExpression(parser);
  }
  parser.consume(TokenType.SEMICOLON, "Expected ';' after return");
  statement.location = parser.locationFrom(start);
  return statement;
}
