import {
  Annotation, AnnotationArgument, ClassDeclaration, FieldDeclaration, FunctionDeclaration, Identifier,
  InterfaceDeclaration, InterfaceMethodSignature, MethodDeclaration, Parameter, ParseError, TypeNode, Visibility
} from '../types';
import { Token, TokenType } from './lexer';
import { Parser } from './parser';
import { createIdentifier, createLiteral, parseExpression } from './parser-expression';
import { parseBlockStatement } from './parser-statements';
import { parseType } from './parser-types';

// `function` already consumed
export function parseFunctionDeclaration(parser: Parser): FunctionDeclaration {
  const start = parser.previous();
  const name = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected function name'));
  const parameters = parseParameterList(parser);
  const returnType = parseReturnType(parser);
  const body = parseBlockStatement(parser);
  return { kind: 'function', name, parameters, returnType, body, location: parser.locationFrom(start) };
}

// `interface` already consumed
export function parseInterfaceDeclaration(parser: Parser): InterfaceDeclaration {
  const start = parser.previous();
  const name = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected interface name'));
  const superInterfaces = parser.match(TokenType.EXTENDS) ? parseIdentifierList(parser, 'interface') : [];

  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after interface header");
  const methods: InterfaceMethodSignature[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    const methodStart = parser.consume(TokenType.METHOD, "Expected 'method' in interface body");
    const methodName = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected method name'));
    const parameters = parseParameterList(parser);
    const returnType = parseReturnType(parser);
    parser.consume(TokenType.SEMICOLON, "Expected ';' after interface method signature");
    methods.push({
      kind: 'interfaceMethod',
      name: methodName,
      parameters,
      returnType,
      location: parser.locationFrom(methodStart)
    });
  }
  parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after interface body");

  return { kind: 'interface', name, superInterfaces, methods, location: parser.locationFrom(start) };
}

// `class` already consumed
export function parseClassDeclaration(parser: Parser): ClassDeclaration {
  const start = parser.previous();
  const name = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected class name'));
  const declaration: ClassDeclaration = {
    kind: 'class',
    name,
    interfaces: [],
    fields: [],
    methods: [],
    location: parser.locationFrom(start)
  };

  if (parser.match(TokenType.EXTENDS)) {
    declaration.superClass = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected base class name'));
  }
  if (parser.match(TokenType.IMPLEMENTS)) {
    declaration.interfaces = parseIdentifierList(parser, 'interface');
  }

  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after class header");

  let visibility: Visibility = 'public';
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    if (parser.check(TokenType.PUBLIC) || parser.check(TokenType.PRIVATE) || parser.check(TokenType.PROTECTED)) {
      const label = parser.advance();
      parser.consume(TokenType.COLON, `Expected ':' after '${label.value}'`);
      visibility = visibilityFor(label);
      continue;
    }

    const annotations: Annotation[] = [];
    while (parser.check(TokenType.ANNOTATION)) {
      annotations.push(parseAnnotation(parser));
    }

    const memberStart = parser.peek();
    if (parser.match(TokenType.VAR, TokenType.CONST)) {
      declaration.fields.push(parseFieldDeclaration(parser, memberStart, visibility, annotations));
    } else if (parser.match(TokenType.METHOD, TokenType.FUNCTION)) {
      if (annotations.length > 0) {
        throw new ParseError('Annotations are only allowed on fields', annotations[0].location);
      }
      declaration.methods.push(parseMethodDeclaration(parser, memberStart, visibility));
    } else {
      throw new ParseError(`Expected field or method declaration. Got '${memberStart.value}'`, parser.getLocation());
    }
  }

  parser.consume(TokenType.RIGHT_BRACE, "Expected '}' after class body");
  declaration.location = parser.locationFrom(start);
  return declaration;
}

function visibilityFor(token: Token): Visibility {
  switch (token.type) {
    case TokenType.PRIVATE: return 'private';
    case TokenType.PROTECTED: return 'protected';
    default: return 'public';
  }
}

function parseFieldDeclaration(parser: Parser, start: Token, visibility: Visibility, annotations: Annotation[]): FieldDeclaration {
  const name = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected field name'));
  parser.consume(TokenType.COLON, `Expected ':' and a type for field '${name.name}'`);
  const typeAnnotation = parseType(parser);
  const field: FieldDeclaration = {
    kind: 'field',
    name,
    typeAnnotation,
    visibility,
    isConst: start.type === TokenType.CONST,
    annotations,
    location: parser.locationFrom(start)
  };
  if (parser.match(TokenType.ASSIGN)) {
    field.initializer = parseExpression(parser);
  }
  // Field terminators are optional
  parser.match(TokenType.SEMICOLON);
  field.location = parser.locationFrom(start);
  return field;
}

function parseMethodDeclaration(parser: Parser, start: Token, visibility: Visibility): MethodDeclaration {
  const name = createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, 'Expected method name'));
  const parameters = parseParameterList(parser);
  const returnType = parseReturnType(parser);
  const body = parseBlockStatement(parser);
  return {
    kind: 'method',
    name,
    parameters,
    returnType,
    body,
    visibility,
    isStatic: start.type === TokenType.FUNCTION,
    location: parser.locationFrom(start)
  };
}

function parseAnnotation(parser: Parser): Annotation {
  const start = parser.advance();
  const annotation: Annotation = {
    kind: 'annotation',
    name: start.value,
    hasArguments: false,
    arguments: [],
    location: parser.locationFrom(start)
  };

  if (parser.match(TokenType.LEFT_PAREN)) {
    annotation.hasArguments = true;
    if (!parser.check(TokenType.RIGHT_PAREN)) {
      do {
        annotation.arguments.push(parseAnnotationArgument(parser));
      } while (parser.match(TokenType.COMMA));
    }
    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after annotation arguments");
  }

  annotation.location = parser.locationFrom(start);
  return annotation;
}

function parseAnnotationArgument(parser: Parser): AnnotationArgument {
  const keyToken = parser.consume(TokenType.IDENTIFIER, 'Expected annotation key');
  parser.consume(TokenType.ASSIGN, `Expected '=' after annotation key '${keyToken.value}'`);
  const valueToken = parser.advance();
  const location = { ...valueToken.location, filename: parser.filename };

  let value: AnnotationArgument['value'];
  switch (valueToken.type) {
    case TokenType.BOOLEAN:
      value = createLiteral('boolean', valueToken.value === 'true', location);
      break;
    case TokenType.INT_LITERAL:
      value = createLiteral('int', Number(valueToken.value), location);
      break;
    case TokenType.DOUBLE_LITERAL:
      value = createLiteral('double', Number(valueToken.value), location);
      break;
    case TokenType.STRING:
      value = createLiteral('str', valueToken.value, location);
      break;
    case TokenType.IDENTIFIER:
      value = createIdentifier(parser, valueToken);
      break;
    default:
      throw new ParseError(`Invalid annotation value '${valueToken.value}'`, location);
  }

  return { kind: 'annotationArgument', key: keyToken.value, value, location: parser.locationFrom(keyToken) };
}

function parseParameterList(parser: Parser): Parameter[] {
  parser.consume(TokenType.LEFT_PAREN, "Expected '(' before parameters");
  const parameters: Parameter[] = [];
  if (!parser.check(TokenType.RIGHT_PAREN)) {
    do {
      const nameToken = parser.consume(TokenType.IDENTIFIER, 'Expected parameter name');
      parser.consume(TokenType.COLON, `Expected ':' after parameter '${nameToken.value}'`);
      const typeAnnotation = parseType(parser);
      parameters.push({
        kind: 'parameter',
        name: createIdentifier(parser, nameToken),
        typeAnnotation,
        location: parser.locationFrom(nameToken)
      });
    } while (parser.match(TokenType.COMMA));
  }
  parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after parameters");
  return parameters;
}

// Omitted return types mean void
function parseReturnType(parser: Parser): TypeNode {
  if (parser.match(TokenType.ARROW)) {
    return parseType(parser);
  }
  return { kind: 'primitiveType', name: 'void', location: parser.getLocation() };
}

function parseIdentifierList(parser: Parser, what: string): Identifier[] {
  const names: Identifier[] = [];
  do {
    names.push(createIdentifier(parser, parser.consume(TokenType.IDENTIFIER, `Expected ${what} name`)));
  } while (parser.match(TokenType.COMMA));
  return names;
}
