import { describe, it, expect } from 'vitest';
import { analyze, codes, errors, messages } from './helpers/compile';

function typeErrors(source: string): string[] {
  return messages(errors(analyze(source).diagnostics));
}

describe('TypeChecker', () => {
  describe('expressions', () => {
    it('does not widen int to double in arithmetic', () => {
      const result = analyze('function f() -> double { var a: int = 1; var b: double = 2.0; return a + b; }');
      expect(result.failedStage).toBe('typecheck');
      expect(codes(result.diagnostics)).toEqual(['TypeMismatchError']);
      expect(result.diagnostics[0].message).toBe("Operator '+' cannot be applied to 'int' and 'double'");
    });

    it('concatenates strings with +', () => {
      expect(typeErrors('function f() -> str { var a: str = "x"; return a + "y"; }')).toEqual([]);
    });

    it('checks initializers against the declared type', () => {
      expect(typeErrors('function f() { var s: str = 5; }'))
        .toEqual(["Type mismatch in initializer of 's': expected 'str', got 'int'"]);
    });

    it('needs an annotation to declare a variable from null', () => {
      expect(typeErrors('function f() { var p = null; }'))
        .toEqual(["Cannot infer the type of 'p' from 'null'; add a type annotation"]);
    });

    it('requires boolean conditions', () => {
      expect(typeErrors('function f() { var n: int = 1; if (n) { } while (n) { } }')).toEqual([
        "Condition of 'if' must be boolean, got 'int'",
        "Condition of 'while' must be boolean, got 'int'"
      ]);
    });

    it('only prints scalar values', () => {
      expect(typeErrors('class C { }\nfunction f() { var c: C* = null; println("c=", c); }'))
        .toEqual(["Argument 2 of 'println' has type 'C*'; only int, float, double, boolean and str can be printed"]);
    });

    it('only renders scalar values into D-strings', () => {
      expect(typeErrors('class P { }\nfunction f() { var p: P* = null; var s = D"{p}"; }'))
        .toEqual(["D-string placeholder '{p}' has type 'P*'; only int, float, double, boolean and str can be rendered"]);
    });

    it('types D-string bindings as str and records them', () => {
      const result = analyze('function f() { var n: int = 1; var s = D"n={n}"; var t: str = s; }');
      expect(result.diagnostics).toEqual([]);
      expect(result.types?.dstringBindings.size).toBe(1);
    });
  });

  describe('declarations', () => {
    it('reports a function that can fall off its end', () => {
      const result = analyze('function f(b: boolean) -> int { if (b) { return 1; } }');
      expect(codes(result.diagnostics)).toEqual(['MissingReturnError']);
      expect(result.diagnostics[0].message).toBe("'f' must return a value of type 'int' on every path");
    });

    it('accepts returns on both branches', () => {
      expect(typeErrors('function f(b: boolean) -> int { if (b) { return 1; } else { return 2; } }')).toEqual([]);
    });

    it('rejects pointers to primitives', () => {
      expect(typeErrors('function f(p: int*) { }'))
        .toEqual(["Pointer type 'int*' is not allowed; only classes and interfaces may be pointed to"]);
    });

    it('rejects interfaces used by value', () => {
      expect(typeErrors('interface I { }\nfunction f(i: I) { }'))
        .toEqual(["Interface 'I' can only be used behind a pointer ('I*')"]);
    });

    it('rejects a class that embeds itself by value', () => {
      expect(typeErrors('class Node { var next: Node }'))
        .toEqual(["Field 'next' embeds class 'Node' by value, which would make 'Node' infinitely large"]);
    });

    it('checks the entry point signature', () => {
      expect(typeErrors('function main(n: int) -> int { return n; }'))
        .toEqual(["Entry point 'main' must be declared as 'main() -> int' or 'main() -> void'"]);
    });

    it('rejects break outside of a loop', () => {
      const result = analyze('function f() { break; }');
      expect(codes(result.diagnostics)).toEqual(['SyntaxError']);
      expect(result.diagnostics[0].message).toBe("'break' outside of a loop");
    });
  });

  describe('calls', () => {
    it('does not widen arguments', () => {
      expect(typeErrors('function takes(d: double) -> double { return d; }\nfunction f() -> double { return takes(1); }'))
        .toEqual(['No match for call takes(int); expected takes(double) -> double']);
    });

    it('picks the overload whose parameters match', () => {
      const result = analyze(`
function show(v: int) -> str { return "int"; }
function show(v: str) -> str { return v; }
function f() -> str { return show(1) + show("s"); }
`);
      expect(result.diagnostics).toEqual([]);
    });

    it('reports calls that several overloads accept equally', () => {
      const result = analyze(`
interface I { }
interface J { }
class C implements I, J { }
function h(p: I*) -> int { return 1; }
function h(p: J*) -> int { return 2; }
function f(c: C*) -> int { return h(c); }
`);
      expect(codes(result.diagnostics)).toEqual(['AmbiguousCallError']);
      expect(result.diagnostics[0].message).toBe('Call h(C*) is ambiguous; candidates: h(I*) -> int, h(J*) -> int');
    });

    it('requires static functions to be called through the class', () => {
      expect(typeErrors(`
class M {
  method inst() -> int { return 1; }
  function make() -> int { return 2; }
}
function f(m: M*) -> int { return M.inst() + m.make(); }
`)).toEqual([
        "Method 'inst' of class 'M' is not static",
        "Static function 'make' must be called as 'M.make()'"
      ]);
    });

    it('checks the argument of from_json', () => {
      expect(typeErrors('class C { }\nfunction f() { var c: C* = C.from_json(1); c.clean(); }'))
        .toEqual(["Type mismatch in argument 1 of 'C.from_json': expected 'str', got 'int'"]);
    });
  });

  describe('classes and interfaces', () => {
    it('allows upcasts and rejects downcasts', () => {
      expect(typeErrors(`
class Base { }
class Derived extends Base { }
function f(b: Base*) {
  var up: Base* = Derived.new();
  var down: Derived* = b;
  up.clean();
}`)).toEqual(["Type mismatch in initializer of 'down': expected 'Derived*', got 'Base*'"]);
    });

    it('reports missing interface methods', () => {
      const result = analyze('interface Shape { method area() -> double; }\nclass Square implements Shape { }');
      expect(codes(result.diagnostics)).toEqual(['InterfaceConformanceError']);
      expect(result.diagnostics[0].message)
        .toBe("Class 'Square' does not implement 'area() -> double' required by interface 'Shape'");
    });

    it('reports interface methods with the wrong signature', () => {
      expect(typeErrors(`
interface Shape { method area() -> double; }
class Square implements Shape { method area() -> int { return 1; } }
`)).toEqual(["Class 'Square' method 'area() -> int' does not match 'area() -> double' required by interface 'Shape'"]);
    });

    it('enforces field visibility outside the class', () => {
      const result = analyze(`
class Vault {
  private:
    var secret: int = 1
}
function f(v: Vault*) -> int { return v.secret; }
`);
      expect(codes(result.diagnostics)).toEqual(['VisibilityError']);
      expect(result.diagnostics[0].message).toBe("Field 'secret' of class 'Vault' is private");
    });

    it('enforces read_only and derived fields on assignment', () => {
      expect(typeErrors(`
class Tally {
  @attribute(read_only=true)
  var count: int = 0
  @attribute(derived=true)
  var total: int
  method total() -> int { return count * 2; }
}
function f(t: Tally*) {
  t.count = 1;
  t.total = 4;
}`)).toEqual([
        "Field 'count' of class 'Tally' is read-only",
        "Cannot assign to derived field 'total'"
      ]);
    });

    it('requires matching signatures when a subclass redefines a method', () => {
      expect(typeErrors(`
class Base { method size() -> int { return 1; } }
class Sub extends Base { method size() -> double { return 2.0; } }
`)).toEqual(["Method 'size() -> double' of class 'Sub' does not match 'size() -> int' inherited from 'Base'"]);
    });
  });
});
