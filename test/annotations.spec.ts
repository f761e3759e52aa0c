import { describe, it, expect } from 'vitest';
import { processAnnotations } from '../src/validation/annotation-processor';
import { resolveProgram } from '../src/validation/scope-resolver';
import { analyze, codes, errors, messages, parseSource, warnings } from './helpers/compile';

function annotationErrors(source: string): string[] {
  const result = analyze(source);
  expect(result.failedStage).toBe('annotations');
  return messages(errors(result.diagnostics));
}

describe('AnnotationProcessor', () => {
  describe('conflicts', () => {
    it('rejects read_only combined with write_only', () => {
      const result = analyze(`
class Sensor {
  @attribute(read_only=true, write_only=true)
  var reading: int = 0
}`);
      expect(codes(result.diagnostics)).toEqual(['ConflictingAnnotationError']);
      expect(result.diagnostics[0].message).toBe("Conflicting annotations on field 'reading': read_only with write_only");
      expect(result.diagnostics[0].location.start).toEqual({ line: 3, column: 3 });
    });

    it('lists every conflicting pair in one error', () => {
      const result = analyze(`
class Sensor {
  @attribute(read_only=true, write_only=true, derived=true)
  var level: int
  method level() -> int { return 1; }
}`);
      expect(messages(errors(result.diagnostics)))
        .toEqual(["Conflicting annotations on field 'level': read_only with write_only; derived with write_only"]);
      expect(messages(warnings(result.diagnostics)))
        .toEqual(["'read_only' on field 'level' is implied by 'derived'"]);
    });

    it('skips the derived checks of a conflicting field', () => {
      const result = analyze(`
class Sensor {
  @attribute(derived=true, write_only=true)
  var level: int
}`);
      expect(codes(result.diagnostics)).toEqual(['ConflictingAnnotationError']);
      expect(result.diagnostics[0].message).toBe("Conflicting annotations on field 'level': derived with write_only");
    });

    it('rejects write_only on a const field', () => {
      expect(annotationErrors('class Limits {\n  @attribute(write_only=true)\n  const max: int = 10\n}'))
        .toEqual(["Conflicting annotations on field 'max': const with write_only"]);
    });
  });

  describe('derived fields', () => {
    it('requires a computing method', () => {
      const result = analyze('class Rect {\n  @attribute(derived=true)\n  var area: int\n}');
      expect(codes(result.diagnostics)).toEqual(['MissingDerivedMethodError']);
      expect(result.diagnostics[0].message).toBe("Derived field 'area' requires a method 'area() -> int'");
      expect(result.diagnostics[0].location.start).toEqual({ line: 3, column: 7 });
    });

    it('requires the computing method to return the field type', () => {
      expect(annotationErrors(`
class Rect {
  @attribute(derived=true)
  var area: int
  method area() -> double { return 1.0; }
}`)).toEqual(["Method 'area() -> double' computing derived field 'area' must be 'area() -> int'"]);
    });

    it('rejects an initializer', () => {
      expect(annotationErrors(`
class Rect {
  @attribute(derived=true)
  var area: int = 3
  method area() -> int { return 3; }
}`)).toEqual(["Derived field 'area' cannot have an initializer"]);
    });
  });

  describe('attribute arguments', () => {
    it('reports unknown keys and non-boolean values', () => {
      expect(annotationErrors(`
class Item {
  @attribute(hidden=true)
  var a: int = 0
  @attribute(read_only=1)
  var b: int = 0
}`)).toEqual([
        "Unknown attribute key 'hidden' (expected one of read_only, write_only, derived, serializable)",
        "Attribute key 'read_only' expects true or false"
      ]);
    });

    it('reports unknown annotations', () => {
      expect(annotationErrors('class Item {\n  @json\n  var a: int = 0\n}'))
        .toEqual(["Unknown annotation '@json' on field 'a'"]);
    });

    it('warns about values that restate the default', () => {
      const result = analyze('class Item {\n  @attribute(serializable=true)\n  var name: str = "n"\n}');
      expect(result.failedStage).toBeUndefined();
      expect(codes(result.diagnostics)).toEqual(['RedundantAnnotation']);
      expect(result.diagnostics[0].message).toBe("'serializable=true' on field 'name' restates the default");
    });

    it('warns about repeated keys and keeps the last value', () => {
      const result = analyze('class Item {\n  @attribute(read_only=true, read_only=false)\n  var a: int = 0\n}');
      expect(errors(result.diagnostics)).toEqual([]);
      expect(messages(warnings(result.diagnostics))).toEqual([
        "'read_only=false' on field 'a' restates the default",
        "Attribute key 'read_only' is given more than once; the last value is used"
      ]);
    });

    it('requires explicitly serializable fields to be public', () => {
      expect(annotationErrors(`
class Account {
  private:
    @attribute(serializable=true)
    var pin: int = 0
}`)).toEqual(["Serializable field 'pin' must be public"]);
    });
  });

  describe('accessors', () => {
    it('rejects a setter on a read_only field', () => {
      const result = analyze(`
class Gauge {
  @attribute(read_only=true)
  var level: int = 0
  method setLevel(v: int) { level = v; }
}`);
      expect(codes(result.diagnostics)).toEqual(['AccessorConflictError']);
      expect(result.diagnostics[0].message).toBe("Field 'level' is read_only but class 'Gauge' defines 'setLevel'");
    });

    it('rejects a getter on a write_only field', () => {
      expect(annotationErrors(`
class Vault {
  @attribute(write_only=true)
  var code: int = 0
  method getCode() -> int { return code; }
}`)).toEqual(["Field 'code' is write_only but class 'Vault' defines 'getCode'"]);
    });

    it('checks the signature of user-written accessors', () => {
      expect(annotationErrors('class Box {\n  var w: int = 0\n  method getW() -> str { return "w"; }\n}'))
        .toEqual(["Accessor 'getW() -> str' for field 'w' must be declared as 'getW() -> int'"]);
    });

    it('plans accessors and serializable fields for each class', () => {
      const program = parseSource(`
class Base { var id: int = 0 }
class Item extends Base {
  var name: str = ""
  method getName() -> str { return name; }
  private:
    var cache: int = 0
}`);
      const resolution = resolveProgram(program);
      const result = processAnnotations(program, resolution);
      expect(result.diagnostics).toEqual([]);

      const item = resolution.classes.get('Item');
      if (!item) throw new Error('Item was not resolved');
      const annotations = result.classes.get(item);
      expect(annotations?.serializable.map(f => f.name)).toEqual(['id', 'name']);
      expect(annotations?.accessors.map(a => [a.field.name, a.kind, a.synthesized])).toEqual([
        ['name', 'getter', false],
        ['name', 'setter', true],
        ['cache', 'getter', true],
        ['cache', 'setter', true]
      ]);
    });
  });
});
