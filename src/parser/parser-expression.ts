import {
    BinaryExpression, BinaryOperator, CallExpression, DStringLiteral, DStringPart, Expression, Identifier,
    Literal, LiteralType, MemberExpression, ParseError, SourceLocation, UnaryExpression, UnaryOperator
} from "../types";
import { Token, TokenType } from "./lexer";
import { Parser } from "./parser";

const INT_MAX = 2147483647;
const DSTRING_REFERENCE = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

export function parseExpression(parser: Parser): Expression {
    return parseLogicalOr(parser);
}

function parseLogicalOr(parser: Parser): Expression {
    return parseBinaryExpression(parser, () => parseLogicalAnd(parser), [TokenType.OR]);
}

function parseLogicalAnd(parser: Parser): Expression {
    return parseBinaryExpression(parser, () => parseEquality(parser), [TokenType.AND]);
}

function parseEquality(parser: Parser): Expression {
    return parseBinaryExpression(parser, () => parseComparison(parser), [TokenType.EQUAL, TokenType.NOT_EQUAL]);
}

function parseComparison(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseAddition(parser),
        [TokenType.LESS_THAN, TokenType.LESS_EQUAL, TokenType.GREATER_THAN, TokenType.GREATER_EQUAL]
    );
}

function parseAddition(parser: Parser): Expression {
    return parseBinaryExpression(parser, () => parseMultiplication(parser), [TokenType.PLUS, TokenType.MINUS]);
}

function parseMultiplication(parser: Parser): Expression {
    return parseBinaryExpression(parser,
        () => parseUnary(parser),
        [TokenType.MULTIPLY, TokenType.DIVIDE, TokenType.MODULO]
    );
}

function parseBinaryExpression(
    parser: Parser,
    parseNext: () => Expression,
    operators: TokenType[]
): Expression {
    let expr = parseNext();

    while (parser.match(...operators)) {
        const operatorToken = parser.previous();
        const right = parseNext();
        expr = createBinaryExpression(toBinaryOperator(operatorToken), expr, right, {
            start: expr.location.start,
            end: right.location.end,
            filename: parser.filename
        });
    }

    return expr;
}

function toBinaryOperator(token: Token): BinaryOperator {
    switch (token.type) {
        case TokenType.PLUS: return '+';
        case TokenType.MINUS: return '-';
        case TokenType.MULTIPLY: return '*';
        case TokenType.DIVIDE: return '/';
        case TokenType.MODULO: return '%';
        case TokenType.EQUAL: return '==';
        case TokenType.NOT_EQUAL: return '!=';
        case TokenType.LESS_THAN: return '<';
        case TokenType.LESS_EQUAL: return '<=';
        case TokenType.GREATER_THAN: return '>';
        case TokenType.GREATER_EQUAL: return '>=';
        case TokenType.AND: return '&&';
        case TokenType.OR: return '||';
        default:
            throw new ParseError(`Unexpected operator '${token.value}'`, token.location);
    }
}

function parseUnary(parser: Parser): Expression {
    const start = parser.peek();
    if (parser.match(TokenType.MINUS, TokenType.NOT, TokenType.MULTIPLY, TokenType.AMPERSAND)) {
        const operator = unaryOperatorFor(start.type);

        // Collapse unary minus with a numeric literal into a single negative literal
        if (operator === '-' && isNumberToken(parser.peek().type)) {
            const numberToken = parser.advance();
            return createNumberLiteral(parser, numberToken, true, parser.locationFrom(start));
        }

        const operand = parseUnary(parser);
        return createUnaryExpression(operator, operand, parser.locationFrom(start));
    }

    return parsePostfix(parser);
}

function unaryOperatorFor(type: TokenType): UnaryOperator {
    switch (type) {
        case TokenType.MINUS: return '-';
        case TokenType.NOT: return '!';
        case TokenType.MULTIPLY: return '*';
        default: return '&';
    }
}

function isNumberToken(type: TokenType): boolean {
    return type === TokenType.INT_LITERAL || type === TokenType.FLOAT_LITERAL || type === TokenType.DOUBLE_LITERAL;
}

function parsePostfix(parser: Parser): Expression {
    const start = parser.peek();
    let expr = parsePrimary(parser);

    while (true) {
        if (parser.match(TokenType.DOT)) {
            const name = parser.consume(TokenType.IDENTIFIER, "Expected member name after '.'");
            const property = createIdentifier(parser, name);
            expr = {
                kind: 'member',
                object: expr,
                property,
                location: parser.locationFrom(start)
            } satisfies MemberExpression;
        } else if (parser.check(TokenType.LEFT_PAREN)) {
            if (expr.kind !== 'identifier' && expr.kind !== 'member') {
                throw new ParseError("Expression is not callable", parser.getLocation());
            }
            parser.advance();
            const args = parseArguments(parser);
            expr = {
                kind: 'call',
                callee: expr,
                arguments: args,
                location: parser.locationFrom(start)
            } satisfies CallExpression;
        } else {
            return expr;
        }
    }
}

function parseArguments(parser: Parser): Expression[] {
    const args: Expression[] = [];
    if (!parser.check(TokenType.RIGHT_PAREN)) {
        do {
            args.push(parseExpression(parser));
        } while (parser.match(TokenType.COMMA));
    }
    parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after arguments");
    return args;
}

function parsePrimary(parser: Parser): Expression {
    const token = parser.peek();

    if (isNumberToken(token.type)) {
        parser.advance();
        return createNumberLiteral(parser, token, false, parser.locationFrom(token));
    }

    switch (token.type) {
        case TokenType.STRING:
            parser.advance();
            return createLiteral('str', token.value, parser.locationFrom(token));
        case TokenType.DSTRING:
            parser.advance();
            return parseDString(parser, token);
        case TokenType.BOOLEAN:
            parser.advance();
            return createLiteral('boolean', token.value === 'true', parser.locationFrom(token));
        case TokenType.NULL:
            parser.advance();
            return createLiteral('null', null, parser.locationFrom(token));
        case TokenType.IDENTIFIER:
            parser.advance();
            return createIdentifier(parser, token);
        case TokenType.LEFT_PAREN: {
            parser.advance();
            const expr = parseExpression(parser);
            parser.consume(TokenType.RIGHT_PAREN, "Expected ')' after expression");
            return expr;
        }
        default:
            throw new ParseError(`Expected expression. Got '${token.value || token.type}'`, parser.getLocation());
    }
}

function parseDString(parser: Parser, token: Token): DStringLiteral {
    const parts: DStringPart[] = [];
    const raw = token.value;
    let lastIndex = 0;

    for (const match of raw.matchAll(DSTRING_REFERENCE)) {
        const index = match.index ?? 0;
        if (index > lastIndex) {
            parts.push({ kind: 'text', value: raw.slice(lastIndex, index) });
        }
        // Offset past the D" prefix; placeholders sit on the literal's line
        const column = token.location.start.column + 2 + index + 1;
        parts.push({
            kind: 'reference',
            identifier: {
                kind: 'identifier',
                name: match[1],
                location: {
                    start: { line: token.location.start.line, column },
                    end: { line: token.location.start.line, column: column + match[1].length },
                    filename: parser.filename
                }
            }
        });
        lastIndex = index + match[0].length;
    }
    if (lastIndex < raw.length) {
        parts.push({ kind: 'text', value: raw.slice(lastIndex) });
    }

    return { kind: 'dstring', parts, raw, location: parser.locationFrom(token) };
}

function createNumberLiteral(parser: Parser, token: Token, negate: boolean, location: SourceLocation): Literal {
    if (token.type === TokenType.INT_LITERAL) {
        const magnitude = Number(token.value);
        if (magnitude > INT_MAX + (negate ? 1 : 0)) {
            throw new ParseError(`Integer literal ${negate ? '-' : ''}${token.value} does not fit in 32 bits`, location);
        }
        return createLiteral('int', negate ? -magnitude : magnitude, location);
    }
    const value = negate ? -Number(token.value) : Number(token.value);
    if (token.type === TokenType.FLOAT_LITERAL) {
        return createLiteral('float', Math.fround(value), location);
    }
    return createLiteral('double', value, location);
}

export function createLiteral(literalType: LiteralType, value: Literal['value'], location: SourceLocation): Literal {
    return { kind: 'literal', literalType, value, location };
}

export function createIdentifier(parser: Parser, token: Token): Identifier {
    return {
        kind: 'identifier',
        name: token.value,
        location: { ...token.location, filename: parser.filename }
    };
}

function createBinaryExpression(operator: BinaryOperator, left: Expression, right: Expression, location: SourceLocation): BinaryExpression {
    return { kind: 'binary', operator, left, right, location };
}

function createUnaryExpression(operator: UnaryOperator, operand: Expression, location: SourceLocation): UnaryExpression {
    return { kind: 'unary', operator, operand, location };
}
