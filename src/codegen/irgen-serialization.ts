// Serialization routines: as_json/as_xml writers and from_json/from_xml readers.
// Writers walk the class's serializable fields in declaration order, base class
// fields first. Readers fill a fresh instance from a parsed document handle.

import { SinterType } from '../types';
import { isDerivedField } from '../validation/attribute-flags';
import { ClassInfo, FieldInfo } from '../validation/symbol-table';
import { CodegenError } from './codegen-error';
import { IRLowering } from './irgen';
import { FunctionBuilder, NULL_POINTER, constant } from './ir/ir-builder';
import { IRFunction, IRScalarType, IRValue } from './ir/ir-types';
import { scalarType } from './ir/layout';
import { classRoutine, methodSymbol } from './ir/symbols';
import { SerializedScalar, readerExtern, writerExtern } from './runtime-externs';

export type SerializationRoutine =
  | 'as_json' | 'as_xml' | '__xml_body'
  | 'from_json' | 'from_xml' | '__fill_json' | '__fill_xml';

type Format = 'json' | 'xml';

function serializedScalar(type: IRScalarType): SerializedScalar | undefined {
  switch (type) {
    case 'i32':
    case 'f32':
    case 'f64':
    case 'i1':
    case 'str':
      return type;
    default:
      return undefined;
  }
}

// Text accumulator that folds constant pieces together before emitting a concat
class TextBuilder {
  private value: IRValue | undefined;
  private literal = '';

  constructor(private readonly builder: FunctionBuilder) {}

  // Continues from a value built outside the accumulator
  restart(value: IRValue): void {
    this.value = value;
    this.literal = '';
  }

  text(piece: string): void {
    this.literal += piece;
  }

  append(piece: IRValue): void {
    this.flush();
    this.value = this.value ? this.builder.binary('concat', 'str', this.value, piece) : piece;
  }

  result(): IRValue {
    this.flush();
    return this.value ?? constant('str', '');
  }

  private flush(): void {
    if (this.literal.length === 0) return;
    const piece = constant('str', this.literal);
    this.literal = '';
    this.value = this.value ? this.builder.binary('concat', 'str', this.value, piece) : piece;
  }
}

export function generateSerializationRoutine(lowering: IRLowering, cls: ClassInfo, routine: SerializationRoutine): IRFunction {
  switch (routine) {
    case 'as_json': return generateWriter(lowering, cls, 'json');
    case 'as_xml': return generateXmlDocument(lowering, cls);
    case '__xml_body': return generateWriter(lowering, cls, 'xml');
    case 'from_json': return generateParse(lowering, cls, 'json');
    case 'from_xml': return generateParse(lowering, cls, 'xml');
    case '__fill_json': return generateFill(lowering, cls, 'json');
    case '__fill_xml': return generateFill(lowering, cls, 'xml');
  }
}

function serializableFields(lowering: IRLowering, cls: ClassInfo): FieldInfo[] {
  return lowering.annotationsOf(cls).serializable;
}

// Reads a field's current value; derived fields call their method
function fieldValue(lowering: IRLowering, builder: FunctionBuilder, self: IRValue, field: FieldInfo): IRValue {
  if (isDerivedField(field.declaration)) {
    const method = lowering.annotationsOf(field.owner).derived.get(field);
    if (!method) throw new CodegenError(`Derived field '${field.name}' has no method`, field.declaration.location);
    const result = builder.call(methodSymbol(method), [self], lowering.irType(field.type));
    if (!result) throw new CodegenError(`Method for derived field '${field.name}' returns no value`, field.declaration.location);
    return result;
  }
  return builder.getField(field.owner.name, self, lowering.fieldSlot(field), lowering.storedType(field.type));
}

function classOfPointer(lowering: IRLowering, type: SinterType): ClassInfo | undefined {
  return type.kind === 'pointer' && type.target.kind === 'class' ? lowering.classNamed(type.target.name) : undefined;
}

function formatScalarValue(lowering: IRLowering, builder: FunctionBuilder, value: IRValue, type: IRScalarType, format: Format): IRValue {
  const scalar = serializedScalar(type);
  if (!scalar) throw new CodegenError(`Values of IR type '${type}' cannot be serialized`);
  return lowering.callExternValue(builder, writerExtern(format, scalar), [value]);
}

/**
 * `as_json` produces `{"x": 1, "y": "two"}`; `__xml_body` produces the
 * `<x>1</x><y>two</y>` element list that `as_xml` wraps in the class element.
 * Null pointers are written as `null` and `<name null="true"/>`.
 */
function generateWriter(lowering: IRLowering, cls: ClassInfo, format: Format): IRFunction {
  const routine = format === 'json' ? 'as_json' : '__xml_body';
  const builder = new FunctionBuilder(classRoutine(cls, routine), [{ name: 'self', type: 'ptr' }], 'str', cls.declaration.location);
  const [self] = builder.parameters;
  const text = new TextBuilder(builder);
  if (format === 'json') text.text('{');

  serializableFields(lowering, cls).forEach((field, i) => {
    builder.location = field.declaration.location;
    if (format === 'json') {
      text.text(`${i > 0 ? ', ' : ''}${JSON.stringify(field.name)}: `);
    }
    const value = fieldValue(lowering, builder, self, field);
    const type = field.type;

    if (type.kind === 'class') {
      const nested = lowering.classNamed(type.name);
      if (format === 'json') {
        text.append(builder.callValue(lowering.requireRoutine(nested, 'as_json'), [value], 'str'));
      } else {
        text.text(`<${field.name}>`);
        text.append(builder.callValue(lowering.requireRoutine(nested, '__xml_body'), [value], 'str'));
        text.text(`</${field.name}>`);
      }
      return;
    }

    const target = classOfPointer(lowering, type);
    if (target) {
      // Branches need the running text in memory
      const out = builder.alloca('str', `${field.name}.text`);
      builder.store(out, text.result());
      const present = builder.label(`${field.name}.present`);
      const absent = builder.label(`${field.name}.null`);
      const done = builder.label(`${field.name}.done`);
      builder.condbr(builder.compare('eq', 'ptr', value, NULL_POINTER), absent, present);

      builder.startBlock(absent);
      const nullText = format === 'json' ? 'null' : `<${field.name} null="true"/>`;
      builder.store(out, builder.binary('concat', 'str', builder.load(out, 'str'), constant('str', nullText)));
      builder.br(done);

      builder.startBlock(present);
      const nested = format === 'json'
        ? builder.callValue(lowering.requireRoutine(target, 'as_json'), [value], 'str')
        : concatAll(builder, [
          constant('str', `<${field.name}>`),
          builder.callValue(lowering.requireRoutine(target, '__xml_body'), [value], 'str'),
          constant('str', `</${field.name}>`)
        ]);
      builder.store(out, builder.binary('concat', 'str', builder.load(out, 'str'), nested));
      builder.br(done);

      builder.startBlock(done);
      text.restart(builder.load(out, 'str'));
      return;
    }

    const formatted = formatScalarValue(lowering, builder, value, scalarType(type), format);
    if (format === 'json') {
      text.append(formatted);
    } else {
      text.text(`<${field.name}>`);
      text.append(formatted);
      text.text(`</${field.name}>`);
    }
  });

  builder.location = cls.declaration.location;
  if (format === 'json') text.text('}');
  builder.ret(text.result());
  return builder.finish();
}

function concatAll(builder: FunctionBuilder, pieces: IRValue[]): IRValue {
  return pieces.slice(1).reduce((acc, piece) => builder.binary('concat', 'str', acc, piece), pieces[0]);
}

function generateXmlDocument(lowering: IRLowering, cls: ClassInfo): IRFunction {
  const builder = new FunctionBuilder(classRoutine(cls, 'as_xml'), [{ name: 'self', type: 'ptr' }], 'str', cls.declaration.location);
  const [self] = builder.parameters;
  const body = builder.callValue(lowering.requireRoutine(cls, '__xml_body'), [self], 'str');
  builder.ret(concatAll(builder, [constant('str', `<${cls.name}>`), body, constant('str', `</${cls.name}>`)]));
  return builder.finish();
}

// Parses the text, builds a heap instance with defaults, then fills it
function generateParse(lowering: IRLowering, cls: ClassInfo, format: Format): IRFunction {
  const routine = format === 'json' ? 'from_json' : 'from_xml';
  const builder = new FunctionBuilder(classRoutine(cls, routine), [{ name: 'text', type: 'str' }], 'ptr', cls.declaration.location);
  const [text] = builder.parameters;
  const doc = format === 'json'
    ? lowering.callExternValue(builder, 'rt.json_parse', [text])
    : lowering.callExternValue(builder, 'rt.xml_parse', [text, constant('str', cls.name)]);
  const object = builder.alloc(cls.name);
  builder.call(classRoutine(cls, '__init'), [object], 'void');
  builder.call(lowering.requireRoutine(cls, format === 'json' ? '__fill_json' : '__fill_xml'), [object, doc], 'void');
  builder.ret(object);
  return builder.finish();
}

/**
 * Assigns every stored serializable field from the document. Keys the class
 * does not know are never looked at; a missing key traps.
 */
function generateFill(lowering: IRLowering, cls: ClassInfo, format: Format): IRFunction {
  const routine = format === 'json' ? '__fill_json' : '__fill_xml';
  const builder = new FunctionBuilder(classRoutine(cls, routine),
    [{ name: 'self', type: 'ptr' }, { name: 'doc', type: 'doc' }], 'void', cls.declaration.location);
  const [self, doc] = builder.parameters;
  const has = format === 'json' ? 'rt.json_has' : 'rt.xml_has';
  const isNull = format === 'json' ? 'rt.json_is_null' : 'rt.xml_is_null';
  const getObject = format === 'json' ? 'rt.json_get_object' : 'rt.xml_get_object';
  const fill = format === 'json' ? '__fill_json' : '__fill_xml';

  for (const field of serializableFields(lowering, cls)) {
    if (isDerivedField(field.declaration)) continue;
    builder.location = field.declaration.location;
    const key = constant('str', field.name);
    const layout = field.owner.name;
    const slot = lowering.fieldSlot(field);

    const present = builder.label(`${field.name}.present`);
    const missing = builder.label(`${field.name}.missing`);
    const next = builder.label(`${field.name}.next`);
    builder.condbr(lowering.callExternValue(builder, has, [doc, key]), present, missing);

    builder.startBlock(missing);
    const message = `${cls.name}.from_${format}: missing field '${field.name}'`;
    lowering.callExtern(builder, 'rt.trap', [constant('str', message)]);
    builder.br(next);

    builder.startBlock(present);
    const type = field.type;
    if (type.kind === 'class') {
      const nested = lowering.classNamed(type.name);
      const sub = lowering.callExternValue(builder, getObject, [doc, key]);
      const embedded = builder.getField(layout, self, slot, 'ptr');
      builder.call(lowering.requireRoutine(nested, fill), [embedded, sub], 'void');
      builder.br(next);
    } else {
      const target = classOfPointer(lowering, type);
      if (target) {
        const some = builder.label(`${field.name}.object`);
        builder.condbr(lowering.callExternValue(builder, isNull, [doc, key]), next, some);
        builder.startBlock(some);
        const sub = lowering.callExternValue(builder, getObject, [doc, key]);
        const object = builder.alloc(target.name);
        builder.call(classRoutine(target, '__init'), [object], 'void');
        builder.call(lowering.requireRoutine(target, fill), [object, sub], 'void');
        builder.setField(layout, self, slot, object);
        builder.br(next);
      } else {
        const scalar = serializedScalar(scalarType(type));
        if (!scalar) throw new CodegenError(`Field '${field.name}' cannot be deserialized`, field.declaration.location);
        builder.setField(layout, self, slot, lowering.callExternValue(builder, readerExtern(format, scalar), [doc, key]));
        builder.br(next);
      }
    }
    builder.startBlock(next);
  }

  builder.location = cls.declaration.location;
  builder.ret();
  return builder.finish();
}
