import { describe, it, expect } from 'vitest';
import { RuntimeTrap } from '../src/runtime/values';
import { formatFloat, jsonNumberText, parseXmlDocument, serializeNumber } from '../src/runtime/runtime-support';
import { runSource } from './helpers/compile';

describe('IRInterpreter', () => {
  describe('arithmetic', () => {
    it('returns the entry point result as the exit code', () => {
      expect(runSource('function main() -> int { return 3 * 7; }').exitCode).toBe(21);
    });

    it('computes Fibonacci numbers with 32-bit wrapping', () => {
      const { output } = runSource(`
function fib(n: int) -> int {
  var a: int = 0;
  var b: int = 1;
  for (var i: int = 0; i < n; i++) {
    var t: int = a + b;
    a = b;
    b = t;
  }
  return a;
}
function main() -> int {
  println(fib(10));
  println(fib(40));
  println(fib(47));
  return 0;
}`);
      expect(output).toBe('55\n102334155\n-1323752223\n');
    });

    it('truncates integer division and formats doubles with six decimals', () => {
      const { output } = runSource('function main() { println(7 / 2, " ", -7 / 2, " ", 7.0 / 2.0, " ", 1.5f); }');
      expect(output).toBe('3 -3 3.500000 1.500000\n');
    });

    it('traps on integer division by zero', () => {
      const source = 'function divide(a: int, b: int) -> int { return a / b; }\nfunction main() -> int { return divide(1, 0); }';
      expect(() => runSource(source)).toThrow(new RuntimeTrap('Integer division by zero'));
    });

    it('traps on a null dereference', () => {
      const source = 'class Point { var x: int = 0 }\nfunction main() -> int { var p: Point* = null; return p.x; }';
      expect(() => runSource(source)).toThrow(/^Null pointer dereference/);
    });
  });

  describe('D-strings', () => {
    const source = `
function main() -> int {
  var count: int = 0;
  var msg = D"The count is: {count}";
  println(msg);
  count = 5;
  println(msg);
  println(msg);
  count = 42;
  println(msg);
  return 0;
}`;

    it('re-renders when a referenced variable changes', () => {
      expect(runSource(source).output)
        .toBe('The count is: 0\nThe count is: 5\nThe count is: 5\nThe count is: 42\n');
    });

    it('renders only when a snapshot is out of date', () => {
      expect(runSource(source).interpreter.stats.renders).toBe(3);
    });

    it('follows fields referenced from a method', () => {
      const { output } = runSource(`
class Gauge {
  var level: int = 1
  method show() {
    var text = D"level {level}";
    println(text);
    level = 2;
    println(text);
  }
}
function main() {
  var g: Gauge* = Gauge.new();
  g.show();
  g.clean();
}`);
      expect(output).toBe('level 1\nlevel 2\n');
    });

    it('treats a NaN snapshot as up to date', () => {
      const run = runSource(`
function main() {
  var z: double = 0.0;
  var x: double = z / z;
  var msg = D"x is {x}";
  println(msg);
  println(msg);
  println(msg);
}`);
      expect(run.output).toBe('x is nan\nx is nan\nx is nan\n');
      expect(run.interpreter.stats.renders).toBe(1);
    });

    it('re-renders when zero changes sign', () => {
      const run = runSource(`
function main() {
  var x: double = 0.0;
  var msg = D"{x}";
  println(msg);
  x = -0.0;
  println(msg);
}`);
      expect(run.output).toBe('0.000000\n0.000000\n');
      expect(run.interpreter.stats.renders).toBe(2);
    });
  });

  describe('objects', () => {
    it('dispatches through interface tables', () => {
      const run = runSource(`
interface Shape {
  method area() -> double;
  method name() -> str;
}
class Square implements Shape {
  var side: double = 2.0
  method area() -> double { return side * side; }
  method name() -> str { return "square"; }
}
class Circle implements Shape {
  var r: double = 1.0
  method area() -> double { return 3.0 * r * r; }
  method name() -> str { return "circle"; }
}
function report(s: Shape*) { println(s.name(), "=", s.area()); }
function main() -> int {
  var a: Shape* = Square.new();
  var b: Shape* = Circle.new();
  report(a);
  report(b);
  a.clean();
  b.clean();
  return 0;
}`);
      expect(run.output).toBe('square=4.000000\ncircle=3.000000\n');
      expect(run.interpreter.liveObjects).toBe(0);
    });

    it('calls static functions and synthesized accessors', () => {
      expect(runSource(`
class Counter {
  var n: int = 0
  method bump() { n = n + 1; }
  function start() -> int { return 10; }
}
function main() -> int {
  var c: Counter* = Counter.new();
  c.setN(Counter.start());
  c.bump();
  var v: int = c.getN();
  c.clean();
  return v;
}`).exitCode).toBe(11);
    });

    it('computes derived fields on every read', () => {
      const run = runSource(`
class Rect {
  var w: int = 3
  var h: int = 4
  @attribute(derived=true)
  var area: int
  method area() -> int { return w * h; }
}
function main() -> int {
  var r: Rect* = Rect.new();
  r.w = 5;
  var a: int = r.area;
  println(r.as_json());
  r.clean();
  return a;
}`);
      expect(run.exitCode).toBe(20);
      expect(run.output).toBe('{"w": 5, "h": 4, "area": 20}\n');
    });

    it('copies embedded class values', () => {
      expect(runSource(`
class Inner { var v: int = 1 }
class Outer { var inner: Inner }
function main() {
  var o: Outer* = Outer.new();
  o.inner.v = 5;
  var copy: Inner = o.inner;
  o.inner.v = 6;
  println(copy.v, ",", o.inner.v);
  o.clean();
}`).output).toBe('5,6\n');
    });

    it('frees pointer fields when the owner is cleaned', () => {
      const run = runSource(`
class Node {
  var value: int = 0
  var child: Node*
}
function main() {
  var root: Node* = Node.new();
  var leaf: Node* = Node.new();
  root.child = leaf;
  root.clean();
}`);
      expect(run.interpreter.stats.allocations).toBe(2);
      expect(run.interpreter.liveObjects).toBe(0);
    });

    it('hands an object off on release without freeing it', () => {
      const run = runSource(`
class Node { var value: int = 0 }
function main() {
  var n: Node* = Node.new();
  n.release();
}`);
      expect(run.interpreter.stats.frees).toBe(0);
      expect(run.interpreter.liveObjects).toBe(1);
    });

    it('finalizes the dynamic class when cleaned through a base pointer', () => {
      const run = runSource(`
class Leaf { var v: int = 0 }
class Shape { var id: int = 0 }
class Group extends Shape { var child: Leaf* }
function main() {
  var g: Group* = Group.new();
  var leaf: Leaf* = Leaf.new();
  g.child = leaf;
  var s: Shape* = g;
  s.clean();
}`);
      expect(run.interpreter.stats.frees).toBe(2);
      expect(run.interpreter.liveObjects).toBe(0);
    });

    it('frees inherited pointer fields released by a subclass hook exactly once', () => {
      const run = runSource(`
class Leaf { var v: int = 0 }
class Holder { var child: Leaf* }
class Box extends Holder {
  method clean() { child.clean(); }
}
function main() {
  var b: Box* = Box.new();
  var leaf: Leaf* = Leaf.new();
  b.child = leaf;
  b.clean();
}`);
      expect(run.interpreter.stats.frees).toBe(2);
      expect(run.interpreter.liveObjects).toBe(0);
    });

    it('frees private inherited pointer fields that a subclass hook cannot reach', () => {
      const run = runSource(`
class Leaf { var v: int = 0 }
class Holder {
  method adopt() {
    var leaf: Leaf* = Leaf.new();
    child = leaf;
  }
  private:
    var child: Leaf*
}
class Box extends Holder {
  method clean() { }
}
function main() {
  var b: Box* = Box.new();
  b.adopt();
  b.clean();
}`);
      expect(run.interpreter.stats.allocations).toBe(2);
      expect(run.interpreter.liveObjects).toBe(0);
    });
  });

  describe('serialization', () => {
    it('round-trips an object through JSON', () => {
      const run = runSource(`
class Point {
  var x: int = 0
  var label: str = ""
}
function main() -> int {
  var p: Point* = Point.new();
  p.x = 3;
  p.label = "a\\"b";
  var text: str = p.as_json();
  println(text);
  var q: Point* = Point.from_json(text);
  println(q.x, " ", q.label);
  p.clean();
  q.clean();
  return 0;
}`);
      expect(run.output).toBe('{"x": 3, "label": "a\\"b"}\n3 a"b\n');
      expect(run.interpreter.liveObjects).toBe(0);
    });

    it('writes doubles exactly and reads them back unchanged', () => {
      const run = runSource(`
class Sample { var x: double = 0.0 }
function main() -> int {
  var p: Sample* = Sample.new();
  p.x = 0.1234567;
  var text: str = p.as_json();
  println(text);
  var q: Sample* = Sample.from_json(text);
  var matches: int = 0;
  if (q.x == p.x) { matches = 1; }
  p.clean();
  q.clean();
  return matches;
}`);
      expect(run.output).toBe('{"x": 0.1234567}\n');
      expect(run.exitCode).toBe(1);
    });

    it('writes doubles exactly in XML', () => {
      const run = runSource(`
class Sample { var x: double = 0.0 }
function main() -> int {
  var p: Sample* = Sample.new();
  p.x = 1.0 / 3.0;
  var text: str = p.as_xml();
  println(text);
  var q: Sample* = Sample.from_xml(text);
  var matches: int = 0;
  if (q.x == p.x) { matches = 1; }
  p.clean();
  q.clean();
  return matches;
}`);
      expect(run.output).toBe('<Sample><x>0.3333333333333333</x></Sample>\n');
      expect(run.exitCode).toBe(1);
    });

    it('writes NaN as a quoted name and reads it back', () => {
      const run = runSource(`
class Sample { var x: double = 0.0 }
function main() {
  var z: double = 0.0;
  var p: Sample* = Sample.new();
  p.x = z / z;
  var text: str = p.as_json();
  println(text);
  var q: Sample* = Sample.from_json(text);
  println(q.x);
  p.clean();
  q.clean();
}`);
      expect(run.output).toBe('{"x": "NaN"}\nnan\n');
    });

    it('writes nested objects and null pointers in JSON', () => {
      expect(runSource(`
class Node {
  var value: int = 0
  var child: Node*
}
function main() {
  var root: Node* = Node.new();
  root.value = 1;
  var leaf: Node* = Node.new();
  leaf.value = 2;
  root.child = leaf;
  println(root.as_json());
  root.clean();
}`).output).toBe('{"value": 1, "child": {"value": 2, "child": null}}\n');
    });

    it('round-trips an object through XML', () => {
      const run = runSource(`
class Item {
  var name: str = ""
  var qty: int = 0
  var next: Item*
}
function main() {
  var item: Item* = Item.new();
  item.name = "nuts & bolts";
  item.qty = 4;
  var xml: str = item.as_xml();
  println(xml);
  var copy: Item* = Item.from_xml(xml);
  println(copy.name, "/", copy.qty, "/", copy.next == null);
  item.clean();
  copy.clean();
}`);
      expect(run.output).toBe(
        '<Item><name>nuts &amp; bolts</name><qty>4</qty><next null="true"/></Item>\nnuts & bolts/4/true\n');
    });

    it('leaves private fields out', () => {
      expect(runSource(`
class Account {
  var owner: str = "sam"
  private:
    var pin: int = 1234
}
function main() {
  var a: Account* = Account.new();
  println(a.as_json());
  a.clean();
}`).output).toBe('{"owner": "sam"}\n');
    });

    it('traps when a field is missing from the input', () => {
      const source = `
class Point {
  var x: int = 0
  var label: str = ""
}
function main() {
  var p: Point* = Point.from_json("{\\"x\\": 1}");
  p.clean();
}`;
      expect(() => runSource(source)).toThrow(new RuntimeTrap("Point.from_json: missing field 'label'"));
    });

    it('ignores keys inherited by the parsed document', () => {
      const source = `
class Widget { var constructor: int = 0 }
function main() {
  var w: Widget* = Widget.from_json("{}");
  w.clean();
}`;
      expect(() => runSource(source)).toThrow(new RuntimeTrap("Widget.from_json: missing field 'constructor'"));
    });
  });

  describe('runtime support', () => {
    it('formats special floating point values', () => {
      expect(formatFloat(Number.NaN)).toBe('nan');
      expect(formatFloat(-Infinity)).toBe('-inf');
      expect(formatFloat(0.1)).toBe('0.100000');
    });

    it('serializes numbers as text that reads back to the same value', () => {
      expect(serializeNumber(0.1)).toBe('0.1');
      expect(serializeNumber(-0)).toBe('-0');
      expect(serializeNumber(-Infinity)).toBe('-Infinity');
      expect(jsonNumberText(Number.NaN)).toBe('"NaN"');
      expect(jsonNumberText(1e21)).toBe('1e+21');
    });

    it('rejects XML whose root element names another class', () => {
      expect(() => parseXmlDocument('<Other></Other>', 'Item'))
        .toThrow('Expected root element <Item> but found <Other>');
    });

    it('reads attributes, entities and comments', () => {
      const handle = parseXmlDocument('<?xml version="1.0"?><!-- c --><Item><name>a &lt; b</name><next null="true"/></Item>', 'Item');
      expect(handle.document).toMatchObject({
        format: 'xml',
        value: {
          name: 'Item',
          children: [
            { name: 'name', text: 'a < b' },
            { name: 'next', attributes: new Map([['null', 'true']]) }
          ]
        }
      });
    });
  });
});
