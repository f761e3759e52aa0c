import { describe, it, expect } from 'vitest';
import { resolveProgram } from '../src/validation/scope-resolver';
import { Expression, Statement } from '../src/types';
import { analyze, codes, errors, messages, parseSource } from './helpers/compile';

function resolveErrors(source: string): string[] {
  return messages(errors(resolveProgram(parseSource(source)).diagnostics));
}

function returned(statement: Statement): Expression {
  if (statement.kind !== 'return' || !statement.value) throw new Error('expected a return with a value');
  return statement.value;
}

describe('ScopeResolver', () => {
  it('reports a duplicate local declaration', () => {
    const result = analyze('function f() { var x: int = 1; var x: int = 2; }');
    expect(result.failedStage).toBe('resolve');
    expect(codes(result.diagnostics)).toEqual(['DuplicateDeclarationError']);
    expect(result.diagnostics[0].message).toBe("'x' is already declared in this scope");
    expect(result.diagnostics[0].location.start).toEqual({ line: 1, column: 36 });
  });

  it('reports a parameter declared twice', () => {
    expect(resolveErrors('function f(a: int, a: int) { }')).toEqual(["'a' is already declared in this scope"]);
  });

  it('reports undefined identifiers', () => {
    expect(resolveErrors('function f() -> int { return y; }')).toEqual(["Undefined identifier 'y'"]);
  });

  it('does not let an initializer see the variable it declares', () => {
    expect(resolveErrors('function f() { var x: int = x; }')).toEqual(["Undefined identifier 'x'"]);
  });

  it('ends a for header variable with the loop', () => {
    expect(resolveErrors('function f() -> int { for (var i: int = 0; i < 1; i++) { } return i; }'))
      .toEqual(["Undefined identifier 'i'"]);
  });

  it('allows shadowing in an inner block', () => {
    expect(resolveErrors('function f() { var x: int = 1; { var x: str = "inner"; } }')).toEqual([]);
  });

  it('resolves forward references between top-level declarations', () => {
    expect(resolveErrors(`
function first() -> int { return second(); }
function second() -> int { var n: Later* = null; return 2; }
class Later { }
`)).toEqual([]);
  });

  it('reports unknown types and functions', () => {
    expect(resolveErrors('function f(p: Missing*) { nothing(); }')).toEqual([
      "Unknown type 'Missing'",
      "Undefined function 'nothing'"
    ]);
  });

  it('names the whole inheritance cycle', () => {
    const result = analyze('class A extends B { }\nclass B extends A { }');
    expect(codes(result.diagnostics)).toEqual(['CyclicInheritanceError']);
    expect(result.diagnostics[0].message).toBe('Cyclic inheritance: A -> B -> A');
    expect(result.diagnostics[0].location.start.line).toBe(2);
  });

  it('reports a class extending itself', () => {
    expect(resolveErrors('class Loop extends Loop { }')).toEqual(['Cyclic inheritance: Loop -> Loop']);
  });

  it('reports an interface inheritance cycle', () => {
    expect(resolveErrors('interface P extends Q { }\ninterface Q extends P { }')).toEqual(['Cyclic inheritance: P -> Q -> P']);
  });

  it('rejects extending an interface and implementing a class', () => {
    expect(resolveErrors(`
interface I { }
class Base { }
class C extends I { }
class D implements Base { }
`)).toEqual([
      "Class 'C' cannot extend interface 'I'; use 'implements'",
      "Class 'D' cannot implement class 'Base'; use 'extends'"
    ]);
  });

  it('rejects methods named after built-in members', () => {
    expect(resolveErrors('class C { method new() { } }'))
      .toEqual(["Method 'new' conflicts with the built-in member of the same name"]);
  });

  it('rejects a field redeclared in a subclass', () => {
    expect(resolveErrors('class A { var n: int = 0 }\nclass B extends A { var n: int = 1 }'))
      .toEqual(["Field 'n' redeclares a field inherited from 'A'"]);
  });

  it('hides private fields of base classes', () => {
    expect(resolveErrors(`
class A {
  private:
    var secret: int = 0
}
class B extends A {
  method peek() -> int { return secret; }
}`)).toEqual(["Field 'secret' of class 'A' is private"]);
  });

  it('binds a local before a field of the same name', () => {
    const program = parseSource(`
class Counter {
  var n: int = 1
  method field() -> int { return n; }
  method local() -> int { var n: int = 5; return n; }
}`);
    const resolution = resolveProgram(program);
    expect(resolution.diagnostics).toEqual([]);
    const cls = program.declarations[0];
    if (cls.kind !== 'class') throw new Error('expected a class');
    const [fieldUse, localUse] = cls.methods.map(m => returned(m.body.body[m.body.body.length - 1]));
    if (fieldUse.kind !== 'identifier' || localUse.kind !== 'identifier') throw new Error('expected identifiers');
    expect(resolution.bindings.get(fieldUse)?.kind).toBe('field');
    expect(resolution.bindings.get(localUse)?.kind).toBe('variable');
  });

  it('binds unqualified calls inside a class to its methods first', () => {
    const program = parseSource(`
function helper() -> int { return 1; }
class C {
  method helper() -> int { return 2; }
  method use() -> int { return helper(); }
}`);
    const resolution = resolveProgram(program);
    const cls = program.declarations[1];
    if (cls.kind !== 'class') throw new Error('expected a class');
    const call = returned(cls.methods[1].body.body[0]);
    if (call.kind !== 'call' || call.callee.kind !== 'identifier') throw new Error('expected a direct call');
    expect(resolution.bindings.get(call.callee)).toMatchObject({ kind: 'method', name: 'helper' });
  });

  it('synthesizes accessors for plain fields but not derived ones', () => {
    const resolution = resolveProgram(parseSource(`
class Box {
  var width: int = 1
  const label: str = "box"
  @attribute(derived=true)
  var area: int
  method area() -> int { return width * width; }
}`));
    const box = resolution.classes.get('Box');
    expect([...(box?.methods.keys() ?? [])].sort()).toEqual(['area', 'getLabel', 'getWidth', 'setWidth']);
  });

  it('orders classes so that bases come first', () => {
    const resolution = resolveProgram(parseSource('class C extends B { }\nclass B extends A { }\nclass A { }'));
    expect(resolution.classOrder.map(c => c.name)).toEqual(['A', 'B', 'C']);
  });
});
