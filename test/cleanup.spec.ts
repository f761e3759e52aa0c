import { describe, it, expect } from 'vitest';
import { analyze, codes, messages } from './helpers/compile';

const NODE = 'class Node {\n  var value: int = 0\n}\n';

function cleanupErrors(body: string): string[] {
  const result = analyze(NODE + body);
  return messages(result.diagnostics);
}

describe('CleanupValidator', () => {
  it('accepts a pointer cleaned before its scope ends', () => {
    const result = analyze(NODE + 'function main() -> int { var n: Node* = Node.new(); n.clean(); return 0; }');
    expect(result.failedStage).toBeUndefined();
    expect(result.diagnostics).toEqual([]);
  });

  it('reports a pointer that is never released', () => {
    const result = analyze(NODE + 'function main() -> int { var n: Node* = Node.new(); return 0; }');
    expect(result.failedStage).toBe('cleanup');
    expect(codes(result.diagnostics)).toEqual(['UnreleasedPointerError']);
    expect(result.diagnostics[0].message).toBe("Pointer 'n' allocated by Node.new() may not be released on every path");
    expect(result.diagnostics[0].location.start.line).toBe(4);
  });

  it('reports a pointer released on only one branch', () => {
    expect(cleanupErrors('function f(b: boolean) { var n: Node* = Node.new(); if (b) { n.clean(); } }'))
      .toEqual(["Pointer 'n' allocated by Node.new() may not be released on every path"]);
  });

  it('accepts a pointer released on both branches', () => {
    expect(cleanupErrors('function f(b: boolean) { var n: Node* = Node.new(); if (b) { n.clean(); } else { n.release(); } }'))
      .toEqual([]);
  });

  it('reports an allocation that is dropped on the spot', () => {
    expect(cleanupErrors('function f() { Node.new(); }'))
      .toEqual(['Object allocated by Node.new() is never bound or released']);
  });

  it('reports a leak when a loop reallocates into the same pointer', () => {
    expect(cleanupErrors(`
function f() {
  var n: Node* = Node.new();
  for (var i: int = 0; i < 3; i++) {
    n = Node.new();
  }
  n.clean();
}`)).toEqual([
      "Pointer 'n' allocated by Node.new() may not be released on every path",
      "Pointer 'n' allocated by Node.new() may not be released on every path"
    ]);
  });

  it('reports a use after release', () => {
    const result = analyze(NODE + 'function f() -> int { var n: Node* = Node.new(); n.clean(); return n.value; }');
    expect(codes(result.diagnostics)).toEqual(['UseAfterReleaseError']);
    expect(result.diagnostics[0].message).toBe("Pointer 'n' may be used after it was released");
  });

  it('reports a double release', () => {
    const result = analyze(NODE + 'function f() { var n: Node* = Node.new(); n.clean(); n.clean(); }');
    expect(codes(result.diagnostics)).toEqual(['DoubleReleaseError']);
    expect(result.diagnostics[0].message).toBe("Pointer 'n' may already have been released");
  });

  it('moves ownership on copy between pointers', () => {
    expect(cleanupErrors('function f() { var a: Node* = Node.new(); var b: Node* = a; b.clean(); }')).toEqual([]);
  });

  it('reports a release of a pointer whose object was copied away', () => {
    const result = analyze(NODE + 'function f() { var p: Node* = Node.new(); var q: Node* = p; p.clean(); q.clean(); }');
    expect(codes(result.diagnostics)).toEqual(['DoubleReleaseError']);
    expect(result.diagnostics[0].message).toBe("Pointer 'p' is released after its object was handed off");
  });

  it('reports a use of a pointer whose object was copied away', () => {
    const result = analyze(NODE + 'function f() -> int { var p: Node* = Node.new(); var q: Node* = p; var v: int = p.value; q.clean(); return v; }');
    expect(codes(result.diagnostics)).toEqual(['UseAfterReleaseError']);
    expect(result.diagnostics[0].message).toBe("Pointer 'p' may be used after its object was handed off");
  });

  it('lets a copied-from pointer take a new allocation', () => {
    expect(cleanupErrors(`
function f() {
  var p: Node* = Node.new();
  var q: Node* = p;
  p = Node.new();
  p.clean();
  q.clean();
}`)).toEqual([]);
  });

  it('reports a release of a pointer stored into a field', () => {
    expect(cleanupErrors(`
class Holder {
  var child: Node*
}
function f() {
  var h: Holder* = Holder.new();
  var c: Node* = Node.new();
  h.child = c;
  c.clean();
  h.clean();
}`)).toEqual(["Pointer 'c' is released after its object was handed off"]);
  });

  it('hands ownership to the object a pointer is stored in', () => {
    expect(cleanupErrors(`
class Holder {
  var child: Node*
}
function f() {
  var h: Holder* = Holder.new();
  var c: Node* = Node.new();
  h.child = c;
  h.clean();
}`)).toEqual([]);
  });

  it('requires a clean hook to release the pointer fields of its class', () => {
    const result = analyze(NODE + `
class Holder {
  var child: Node*
  method clean() { }
}`);
    expect(codes(result.diagnostics)).toEqual(['UnreleasedPointerError']);
    expect(result.diagnostics[0].message).toBe("Pointer field 'child' is not released on every path through 'Holder.clean'");
  });

  it('accepts a clean hook that releases its pointer fields', () => {
    expect(cleanupErrors(`
class Holder {
  var child: Node*
  method clean() { child.clean(); }
}`)).toEqual([]);
  });

  it('requires a subclass clean hook to release inherited pointer fields', () => {
    expect(cleanupErrors(`
class Holder {
  var child: Node*
}
class Box extends Holder {
  method clean() { }
}`)).toEqual(["Pointer field 'child' is not released on every path through 'Box.clean'"]);
  });

  it('accepts a subclass clean hook that releases an inherited pointer field', () => {
    expect(cleanupErrors(`
class Holder {
  var child: Node*
}
class Box extends Holder {
  method clean() { child.clean(); }
}`)).toEqual([]);
  });

  it('leaves private inherited pointer fields to the generated finalizer', () => {
    expect(cleanupErrors(`
class Holder {
  private:
    var child: Node*
}
class Box extends Holder {
  method clean() { }
}`)).toEqual([]);
  });
});
