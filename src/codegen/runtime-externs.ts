// Runtime-support functions the generated IR calls; the backend links them

import { IRExtern, IRScalarType } from './ir/ir-types';

export const RUNTIME_EXTERNS = [
  { name: 'rt.print', parameterTypes: ['str'], returnType: 'void' },
  { name: 'rt.println', parameterTypes: ['str'], returnType: 'void' },
  { name: 'rt.trap', parameterTypes: ['str'], returnType: 'void' },
  { name: 'rt.fmt_i32', parameterTypes: ['i32'], returnType: 'str' },
  { name: 'rt.fmt_f32', parameterTypes: ['f32'], returnType: 'str' },
  { name: 'rt.fmt_f64', parameterTypes: ['f64'], returnType: 'str' },
  { name: 'rt.fmt_bool', parameterTypes: ['i1'], returnType: 'str' },
  { name: 'rt.json_quote', parameterTypes: ['str'], returnType: 'str' },
  { name: 'rt.json_write_f32', parameterTypes: ['f32'], returnType: 'str' },
  { name: 'rt.json_write_f64', parameterTypes: ['f64'], returnType: 'str' },
  { name: 'rt.json_parse', parameterTypes: ['str'], returnType: 'doc' },
  { name: 'rt.json_has', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.json_is_null', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.json_get_i32', parameterTypes: ['doc', 'str'], returnType: 'i32' },
  { name: 'rt.json_get_f32', parameterTypes: ['doc', 'str'], returnType: 'f32' },
  { name: 'rt.json_get_f64', parameterTypes: ['doc', 'str'], returnType: 'f64' },
  { name: 'rt.json_get_bool', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.json_get_str', parameterTypes: ['doc', 'str'], returnType: 'str' },
  { name: 'rt.json_get_object', parameterTypes: ['doc', 'str'], returnType: 'doc' },
  { name: 'rt.xml_escape', parameterTypes: ['str'], returnType: 'str' },
  { name: 'rt.xml_write_f32', parameterTypes: ['f32'], returnType: 'str' },
  { name: 'rt.xml_write_f64', parameterTypes: ['f64'], returnType: 'str' },
  { name: 'rt.xml_parse', parameterTypes: ['str', 'str'], returnType: 'doc' },
  { name: 'rt.xml_has', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.xml_is_null', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.xml_get_i32', parameterTypes: ['doc', 'str'], returnType: 'i32' },
  { name: 'rt.xml_get_f32', parameterTypes: ['doc', 'str'], returnType: 'f32' },
  { name: 'rt.xml_get_f64', parameterTypes: ['doc', 'str'], returnType: 'f64' },
  { name: 'rt.xml_get_bool', parameterTypes: ['doc', 'str'], returnType: 'i1' },
  { name: 'rt.xml_get_str', parameterTypes: ['doc', 'str'], returnType: 'str' },
  { name: 'rt.xml_get_object', parameterTypes: ['doc', 'str'], returnType: 'doc' }
] as const satisfies readonly IRExtern[];

export type RuntimeExternName = (typeof RUNTIME_EXTERNS)[number]['name'];

// Declarations for the externs a module uses, in table order
export function declaredExterns(used: ReadonlySet<RuntimeExternName>): IRExtern[] {
  return RUNTIME_EXTERNS
    .filter(extern => used.has(extern.name))
    .map(extern => ({ name: extern.name, parameterTypes: [...extern.parameterTypes], returnType: extern.returnType }));
}

export function formatExtern(type: IRScalarType): RuntimeExternName | undefined {
  switch (type) {
    case 'i32': return 'rt.fmt_i32';
    case 'f32': return 'rt.fmt_f32';
    case 'f64': return 'rt.fmt_f64';
    case 'i1': return 'rt.fmt_bool';
    default: return undefined;
  }
}

export type SerializedScalar = 'i32' | 'f32' | 'f64' | 'i1' | 'str';

const WRITERS: Record<'json' | 'xml', Record<SerializedScalar, RuntimeExternName>> = {
  json: {
    i32: 'rt.fmt_i32',
    f32: 'rt.json_write_f32',
    f64: 'rt.json_write_f64',
    i1: 'rt.fmt_bool',
    str: 'rt.json_quote'
  },
  xml: {
    i32: 'rt.fmt_i32',
    f32: 'rt.xml_write_f32',
    f64: 'rt.xml_write_f64',
    i1: 'rt.fmt_bool',
    str: 'rt.xml_escape'
  }
};

// Floating point fields are written exactly, unlike printed values
export function writerExtern(format: 'json' | 'xml', type: SerializedScalar): RuntimeExternName {
  return WRITERS[format][type];
}

const READERS: Record<'json' | 'xml', Record<SerializedScalar, RuntimeExternName>> = {
  json: {
    i32: 'rt.json_get_i32',
    f32: 'rt.json_get_f32',
    f64: 'rt.json_get_f64',
    i1: 'rt.json_get_bool',
    str: 'rt.json_get_str'
  },
  xml: {
    i32: 'rt.xml_get_i32',
    f32: 'rt.xml_get_f32',
    f64: 'rt.xml_get_f64',
    i1: 'rt.xml_get_bool',
    str: 'rt.xml_get_str'
  }
};

export function readerExtern(format: 'json' | 'xml', type: SerializedScalar): RuntimeExternName {
  return READERS[format][type];
}
