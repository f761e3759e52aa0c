// D-string lowering: a record per binding, plus read/render routines per site.
// Reads compare each referenced location against the snapshot taken at the
// last render, bit for bit; writes to referenced variables cost nothing extra.

import { DStringLiteral, DStringReference } from '../types';
import { CodegenError } from './codegen-error';
import { FunctionContext, IRLowering } from './irgen';
import { FunctionBuilder, constant } from './ir/ir-builder';
import { IRFunction, IRRegister, IRScalarType, IRValue } from './ir/ir-types';
import {
  DSTRING_CACHE_SLOT, DSTRING_FIRST_LOCATION_SLOT, DSTRING_RENDERED_SLOT, DSTRING_TEMPLATE_SLOT, dstringRecord, scalarType
} from './ir/layout';
import { dstringLayout, dstringRoutine } from './ir/symbols';
import { formatExtern } from './runtime-externs';
import { generateLValue } from './irgen-expressions';

export interface DStringSite {
  record: IRRegister;
  index: number;
}

function references(literal: DStringLiteral): DStringReference[] {
  return literal.parts.filter((part): part is DStringReference => part.kind === 'reference');
}

/**
 * Builds the record for one evaluation of a D-string literal and points its
 * location slots at the referenced variables and fields.
 */
export function createDString(lowering: IRLowering, context: FunctionContext, literal: DStringLiteral, hint: string): DStringSite {
  const { builder } = context;
  const refs = references(literal);
  const types = refs.map(ref => scalarType(lowering.expressionType(ref.identifier)));
  const index = siteIndex(lowering, literal, types);
  const layout = dstringLayout(index);

  const record = builder.record(layout, hint);
  builder.setField(layout, record, DSTRING_TEMPLATE_SLOT, constant('str', literal.raw));
  builder.setField(layout, record, DSTRING_CACHE_SLOT, constant('str', ''));
  builder.setField(layout, record, DSTRING_RENDERED_SLOT, constant('i1', false));

  refs.forEach((ref, i) => {
    const target = generateLValue(lowering, context, ref.identifier);
    let address: IRValue;
    if (target.kind === 'slot') {
      address = target.address;
    } else if (target.kind === 'field') {
      address = builder.fieldAddr(target.layout, target.object, target.slot);
    } else {
      throw new CodegenError(`D-string placeholder '${ref.identifier.name}' must name a scalar variable or field`, ref.identifier.location);
    }
    builder.setField(layout, record, DSTRING_FIRST_LOCATION_SLOT + i, address);
  });
  return { record, index };
}

export function readDString(lowering: IRLowering, context: FunctionContext, record: IRValue, index: number): IRValue {
  return context.builder.callValue(dstringRoutine(index, 'read'), [record], 'str');
}

// Registers a literal as a D-string site, generating its layout and routines once
function siteIndex(lowering: IRLowering, literal: DStringLiteral, types: IRScalarType[]): number {
  const existing = lowering.dstringSites.get(literal);
  if (existing !== undefined) return existing;

  const index = lowering.dstringSites.size;
  lowering.dstringSites.set(literal, index);
  lowering.dstringLayouts.push(dstringRecord(dstringLayout(index), types));
  lowering.addFunction(generateRead(index, types, literal));
  lowering.addFunction(generateRender(lowering, index, types, literal));
  return index;
}

function generateRead(index: number, types: IRScalarType[], literal: DStringLiteral): IRFunction {
  const layout = dstringLayout(index);
  const builder = new FunctionBuilder(dstringRoutine(index, 'read'), [{ name: 'self', type: 'ptr' }], 'str', literal.location);
  const [self] = builder.parameters;
  const fresh = builder.label('fresh');
  const stale = builder.label('stale');

  const rendered = builder.getField(layout, self, DSTRING_RENDERED_SLOT, 'i1');
  if (types.length === 0) {
    builder.condbr(rendered, fresh, stale);
  } else {
    let check = builder.label('check');
    builder.condbr(rendered, check, stale);
    types.forEach((type, i) => {
      builder.startBlock(check);
      const location = builder.getField(layout, self, DSTRING_FIRST_LOCATION_SLOT + i, 'ptr');
      const current = builder.load(location, type);
      const snapshot = builder.getField(layout, self, DSTRING_FIRST_LOCATION_SLOT + types.length + i, type);
      const same = builder.compare('same', type, current, snapshot);
      const onSame = i === types.length - 1 ? fresh : builder.label('check');
      builder.condbr(same, onSame, stale);
      check = onSame;
    });
  }

  builder.startBlock(fresh);
  builder.ret(builder.getField(layout, self, DSTRING_CACHE_SLOT, 'str'));

  builder.startBlock(stale);
  builder.call(dstringRoutine(index, 'render'), [self], 'void');
  builder.ret(builder.getField(layout, self, DSTRING_CACHE_SLOT, 'str'));
  return builder.finish();
}

function generateRender(lowering: IRLowering, index: number, types: IRScalarType[], literal: DStringLiteral): IRFunction {
  const layout = dstringLayout(index);
  const builder = new FunctionBuilder(dstringRoutine(index, 'render'), [{ name: 'self', type: 'ptr' }], 'void', literal.location);
  const [self] = builder.parameters;

  let text: IRValue = constant('str', '');
  let first = true;
  const append = (piece: IRValue): void => {
    text = first ? piece : builder.binary('concat', 'str', text, piece);
    first = false;
  };

  let ref = 0;
  for (const part of literal.parts) {
    if (part.kind === 'text') {
      if (part.value.length > 0) append(constant('str', part.value));
      continue;
    }
    const type = types[ref];
    const location = builder.getField(layout, self, DSTRING_FIRST_LOCATION_SLOT + ref, 'ptr');
    const value = builder.load(location, type);
    builder.setField(layout, self, DSTRING_FIRST_LOCATION_SLOT + types.length + ref, value);
    const formatter = formatExtern(type);
    append(formatter ? lowering.callExternValue(builder, formatter, [value]) : value);
    ref++;
  }

  builder.setField(layout, self, DSTRING_CACHE_SLOT, text);
  builder.setField(layout, self, DSTRING_RENDERED_SLOT, constant('i1', true));
  builder.ret();
  return builder.finish();
}
