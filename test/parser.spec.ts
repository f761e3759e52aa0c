import { describe, it, expect } from 'vitest';
import { Lexer } from '../src/parser/lexer';
import { Parser } from '../src/parser/parser';
import { ClassDeclaration, Expression, FunctionDeclaration, Statement } from '../src/types';
import { parseSource } from './helpers/compile';

function parseWithErrors(source: string): { parser: Parser; declarations: number } {
  const parser = new Parser(new Lexer(source).tokenize(), 'bad.sn');
  const program = parser.parse();
  return { parser, declarations: program.declarations.length };
}

function firstFunction(source: string): FunctionDeclaration {
  const declaration = parseSource(source).declarations[0];
  if (declaration.kind !== 'function') throw new Error('expected a function');
  return declaration;
}

function firstClass(source: string): ClassDeclaration {
  const declaration = parseSource(source).declarations[0];
  if (declaration.kind !== 'class') throw new Error('expected a class');
  return declaration;
}

function returnedExpression(statement: Statement): Expression {
  if (statement.kind !== 'return' || !statement.value) throw new Error('expected a return with a value');
  return statement.value;
}

describe('Parser', () => {
  it('parses a function with parameters and a return type', () => {
    const fn = firstFunction('function add(a: int, b: int) -> int { return a + b; }');
    expect(fn.name.name).toBe('add');
    expect(fn.parameters.map(p => p.name.name)).toEqual(['a', 'b']);
    expect(fn.returnType).toMatchObject({ kind: 'primitiveType', name: 'int' });
    expect(fn.body.body).toHaveLength(1);
  });

  it('treats an omitted return type as void', () => {
    const fn = firstFunction('function run() { }');
    expect(fn.returnType).toMatchObject({ kind: 'primitiveType', name: 'void' });
  });

  it('gives multiplication precedence over addition', () => {
    const fn = firstFunction('function f() -> int { return 1 + 2 * 3; }');
    expect(returnedExpression(fn.body.body[0])).toMatchObject({
      kind: 'binary',
      operator: '+',
      left: { kind: 'literal', value: 1 },
      right: { kind: 'binary', operator: '*', left: { value: 2 }, right: { value: 3 } }
    });
  });

  it('folds a minus sign into numeric literals', () => {
    const fn = firstFunction('function f() -> int { return -5; }');
    expect(returnedExpression(fn.body.body[0])).toMatchObject({ kind: 'literal', literalType: 'int', value: -5 });
  });

  it('parses pointer types and member calls', () => {
    const fn = firstFunction('function f() { var p: Node* = Node.new(); p.clean(); }');
    const [declaration, call] = fn.body.body;
    expect(declaration).toMatchObject({
      kind: 'variable',
      typeAnnotation: { kind: 'pointerType', target: { kind: 'namedType', name: 'Node' } },
      initializer: { kind: 'call', callee: { kind: 'member', property: { name: 'new' } } }
    });
    expect(call).toMatchObject({ kind: 'expression', expression: { kind: 'call' } });
  });

  it('splits D-strings into text and references', () => {
    const fn = firstFunction('function f() { var n: int = 1; var s = D"n={n}!"; }');
    expect(fn.body.body[1]).toMatchObject({
      kind: 'variable',
      initializer: {
        kind: 'dstring',
        raw: 'n={n}!',
        parts: [
          { kind: 'text', value: 'n=' },
          { kind: 'reference', identifier: { name: 'n' } },
          { kind: 'text', value: '!' }
        ]
      }
    });
  });

  it('parses control flow statements', () => {
    const fn = firstFunction(`
function f() {
  for (var i: int = 0; i < 3; i++) { continue; }
  while (true) { break; }
  if (false) { } else if (true) { } else { }
}`);
    expect(fn.body.body.map(s => s.kind)).toEqual(['for', 'while', 'if']);
    expect(fn.body.body[2]).toMatchObject({ elseBranch: { kind: 'if', elseBranch: { kind: 'block' } } });
  });

  it('parses class members with visibility sections and annotations', () => {
    const cls = firstClass(`
class Circle extends Shape implements Named, Printable {
  private:
    var radius: double = 1.0
  public:
    @attribute(read_only=true, serializable=false)
    const label: str = "c";
    method area() -> double { return radius; }
    function unit() -> double { return 1.0; }
}`);
    expect(cls.superClass?.name).toBe('Shape');
    expect(cls.interfaces.map(i => i.name)).toEqual(['Named', 'Printable']);
    expect(cls.fields.map(f => [f.name.name, f.visibility, f.isConst])).toEqual([
      ['radius', 'private', false],
      ['label', 'public', true]
    ]);
    expect(cls.fields[1].annotations[0]).toMatchObject({
      name: 'attribute',
      hasArguments: true,
      arguments: [
        { key: 'read_only', value: { value: true } },
        { key: 'serializable', value: { value: false } }
      ]
    });
    expect(cls.methods.map(m => [m.name.name, m.isStatic])).toEqual([['area', false], ['unit', true]]);
  });

  it('parses interfaces that extend other interfaces', () => {
    const declaration = parseSource('interface Shape extends Named, Sized { method area() -> double; }').declarations[0];
    expect(declaration).toMatchObject({
      kind: 'interface',
      superInterfaces: [{ name: 'Named' }, { name: 'Sized' }],
      methods: [{ name: { name: 'area' } }]
    });
  });

  it('recovers at the next declaration after an error', () => {
    const { parser, declarations } = parseWithErrors(`
function broken( { }
function fine() { }
`);
    expect(parser.errors).toHaveLength(1);
    expect(parser.errors[0].message).toBe("Expected parameter name. Got '{'");
    expect(declarations).toBe(1);
  });

  it('rejects annotations on methods', () => {
    const { parser } = parseWithErrors('class C { @attribute method m() { } }');
    expect(parser.errors[0].message).toBe('Annotations are only allowed on fields');
  });

  it('rejects integer literals wider than 32 bits', () => {
    const { parser } = parseWithErrors('function f() -> int { return 2147483648; }');
    expect(parser.errors[0].message).toBe('Integer literal 2147483648 does not fit in 32 bits');
  });

  it('requires a type or an initializer on local variables', () => {
    const { parser } = parseWithErrors('function f() { var x; }');
    expect(parser.errors[0].message).toBe("Variable 'x' needs a type annotation or an initializer");
  });
});
