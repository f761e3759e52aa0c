import { describe, it, expect } from 'vitest';
import { compileOk } from './helpers/compile';

function irLines(source: string): string[] {
  return compileOk(source).ir.split('\n');
}

describe('IRGenerator', () => {
  it('lays out class fields with natural alignment', () => {
    expect(irLines('class Point {\n  var x: int = 0\n  var y: double = 0.0\n}'))
      .toContain('%Point = record { 0: x i32 @0, 1: y f64 @8 } ; size 16, align 8');
  });

  it('places subclass fields after the base class fields', () => {
    const lines = irLines('class Base { var id: int = 0 }\nclass Named extends Base { var tag: boolean = false }');
    expect(lines).toContain('%Base = record { 0: ctable ptr @0, 1: id i32 @8 } ; size 16, align 8');
    expect(lines).toContain('%Named = record extends %Base { 0: ctable ptr @0, 1: id i32 @8, 2: tag i1 @12 } ; size 16, align 8');
  });

  it('builds a class table for each class of a hierarchy', () => {
    const lines = irLines('class Base { var id: int = 0 }\nclass Named extends Base { var tag: boolean = false }');
    expect(lines).toContain('@Base.ctable = table [@Base.__drop, @Base.__release] supers []');
    expect(lines).toContain('@Named.ctable = table [@Named.__drop, @Named.__release] supers []');
  });

  it('gives a class without relatives no class table', () => {
    const lines = irLines('class Point { var x: int = 0 }');
    expect(lines).toContain('%Point = record { 0: x i32 @0 } ; size 4, align 4');
    expect(lines.some(line => line.startsWith('@Point.ctable'))).toBe(false);
  });

  it('leaves derived fields without storage', () => {
    expect(irLines(`
class Rect {
  var w: int = 2
  @attribute(derived=true)
  var area: int
  method area() -> int { return w * w; }
}`)).toContain('%Rect = record { 0: w i32 @0 } ; size 4, align 4');
  });

  it('builds an interface table with drop and release ahead of the methods', () => {
    const lines = irLines(`
interface Shape { method area() -> double; }
class Square implements Shape {
  var side: double = 1.0
  method area() -> double { return side * side; }
}`);
    expect(lines).toContain('%Square = record { 0: side f64 @0, 1: itable.Shape ptr @8 } ; size 16, align 8');
    expect(lines).toContain('@Square.itable.Shape = table [@Square.__drop, @Square.__release, @Square.area] supers []');
  });

  it('links tables of derived interfaces to their parents', () => {
    const lines = irLines(`
interface Named { method name() -> str; }
interface Labelled extends Named { method label() -> str; }
class Tag implements Labelled {
  method name() -> str { return "n"; }
  method label() -> str { return "l"; }
}`);
    expect(lines).toContain('@Tag.itable.Labelled = table [@Tag.__drop, @Tag.__release, @Tag.name, @Tag.label] supers [@Tag.itable.Named]');
    expect(lines).toContain('@Tag.itable.Named = table [@Tag.__drop, @Tag.__release, @Tag.name] supers []');
  });

  it('generates accessors and lifecycle routines for every class', () => {
    const { module } = compileOk('class Counter {\n  var n: int = 0\n  const step: int = 1\n}');
    expect(module.functions.map(f => f.name).sort()).toEqual([
      'Counter.__drop',
      'Counter.__finalize',
      'Counter.__init',
      'Counter.__release',
      'Counter.getN',
      'Counter.getStep',
      'Counter.setN'
    ]);
  });

  it('mangles overloaded function names by parameter type', () => {
    const { module } = compileOk(`
function show(v: int) -> str { return "int"; }
function show(v: str) -> str { return v; }
function main() -> int { show(1); show("s"); return 0; }
`);
    expect(module.functions.map(f => f.name)).toEqual(['show$int', 'show$str', 'main']);
    expect(module.entryPoint).toBe('main');
  });

  it('declares only the runtime functions the module calls', () => {
    const { module } = compileOk('function main() { println("hi"); }');
    expect(module.externs.map(e => e.name)).toEqual(['rt.println']);
  });

  it('emits a record and read and render routines per D-string site', () => {
    const { module, ir } = compileOk('function main() -> int { var n: int = 0; var s = D"n={n}"; println(s); return 0; }');
    const lines = ir.split('\n');
    expect(lines).toContain(
      '%dstring.0 = record { 0: template str @0, 1: cache str @8, 2: rendered i1 @16, 3: location.0 ptr @24, 4: snapshot.0 i32 @32 } ; size 40, align 8');
    expect(lines).toContain('define str @dstring.0.read(ptr %self) {');
    expect(lines).toContain('define void @dstring.0.render(ptr %self) {');
    expect(module.externs.map(e => e.name)).toEqual(['rt.println', 'rt.fmt_i32']);
  });

  it('generates serialization routines only for the formats a program uses', () => {
    const { module } = compileOk(`
class Point {
  var x: int = 0
}
function main() {
  var p: Point* = Point.new();
  println(p.as_json());
  p.clean();
}`);
    const names = module.functions.map(f => f.name);
    expect(names).toContain('Point.as_json');
    expect(names).not.toContain('Point.as_xml');
  });

  it('writes a source map that names the input file', () => {
    const result = compileOk('function main() -> int { return 0; }', { sourceMap: true });
    const map: unknown = JSON.parse(result.sourceMap ?? '{}');
    expect(map).toMatchObject({
      version: 3,
      file: 'test.sn.ir',
      sources: ['test.sn'],
      sourcesContent: ['function main() -> int { return 0; }']
    });
  });
});
