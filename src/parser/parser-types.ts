import { ParseError, PrimitiveName, TypeNode } from "../types";
import { TokenType } from "./lexer";
import { Parser } from "./parser";

const PRIMITIVE_TOKENS: Map<TokenType, PrimitiveName> = new Map([
    [TokenType.INT, 'int'],
    [TokenType.FLOAT, 'float'],
    [TokenType.DOUBLE, 'double'],
    [TokenType.BOOLEAN_TYPE, 'boolean'],
    [TokenType.STR, 'str'],
    [TokenType.VOID, 'void']
]);

export function isTypeStart(parser: Parser): boolean {
    return PRIMITIVE_TOKENS.has(parser.peek().type) || parser.check(TokenType.IDENTIFIER);
}

export function parseType(parser: Parser): TypeNode {
    const start = parser.peek();
    let type: TypeNode;

    const primitive = PRIMITIVE_TOKENS.get(start.type);
    if (primitive) {
        parser.advance();
        type = { kind: 'primitiveType', name: primitive, location: parser.locationFrom(start) };
    } else if (parser.match(TokenType.IDENTIFIER)) {
        type = { kind: 'namedType', name: start.value, location: parser.locationFrom(start) };
    } else {
        throw new ParseError("Expected type", parser.getLocation());
    }

    // Pointer suffixes: T*, T**
    while (parser.match(TokenType.MULTIPLY)) {
        type = { kind: 'pointerType', target: type, location: parser.locationFrom(start) };
    }

    return type;
}
