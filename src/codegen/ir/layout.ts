// Record layouts and interface tables for classes

import { SinterType } from '../../types';
import { typesEqual } from '../../type-utils';
import { isDerivedField } from '../../validation/attribute-flags';
import {
  ClassInfo, InterfaceInfo, allImplementedInterfaces, allInterfaceMethods, findMethods, sameParameterTypes
} from '../../validation/symbol-table';
import { CodegenError } from '../codegen-error';
import { IRTable, IRLayoutSlot, IRRecordLayout, IRScalarType, IRSlotType } from './ir-types';
import { classRoutine, classTableSymbol, methodSymbol, tableSymbol } from './symbols';

const SCALAR_SIZES: Record<IRScalarType, { size: number; align: number }> = {
  i1: { size: 1, align: 1 },
  i32: { size: 4, align: 4 },
  f32: { size: 4, align: 4 },
  f64: { size: 8, align: 8 },
  str: { size: 8, align: 8 },
  ptr: { size: 8, align: 8 },
  iface: { size: 16, align: 8 },
  fn: { size: 8, align: 8 },
  doc: { size: 8, align: 8 }
};

export function scalarType(type: SinterType): IRScalarType {
  switch (type.kind) {
    case 'primitive':
      switch (type.name) {
        case 'int': return 'i32';
        case 'float': return 'f32';
        case 'double': return 'f64';
        case 'boolean': return 'i1';
        case 'str': return 'str';
        case 'void': break;
      }
      break;
    case 'pointer':
      return type.target.kind === 'interface' ? 'iface' : 'ptr';
    case 'null':
      return 'ptr';
    default:
      break;
  }
  throw new CodegenError(`No scalar IR type for '${type.kind}'`);
}

export function slotType(type: SinterType): IRSlotType {
  return type.kind === 'class' ? { record: type.name } : scalarType(type);
}

function hierarchyRoot(cls: ClassInfo): ClassInfo {
  let root = cls;
  while (root.superClass) root = root.superClass;
  return root;
}

/**
 * Lays out records for every class and builds one interface table per
 * (class, implemented interface) pair. Classes in a hierarchy with more than
 * one class also get a class table, reached through a slot ahead of the root
 * class's fields, so that drop and release follow the dynamic class.
 */
export class LayoutBuilder {
  readonly layouts = new Map<string, IRRecordLayout>();
  readonly tables = new Map<string, IRTable>();
  private pending = new Set<string>();

  constructor(private readonly classes: ReadonlyMap<string, ClassInfo>) {}

  build(order: readonly ClassInfo[]): void {
    for (const cls of order) this.layoutOf(cls);
    for (const cls of order) {
      if (this.hasClassTable(cls)) {
        const table = this.buildClassTable(cls);
        this.tables.set(table.name, table);
      }
      for (const iface of allImplementedInterfaces(cls)) {
        const table = this.buildTable(cls, iface);
        this.tables.set(table.name, table);
      }
    }
  }

  layoutOf(cls: ClassInfo): IRRecordLayout {
    const existing = this.layouts.get(cls.name);
    if (existing) return existing;
    if (this.pending.has(cls.name)) {
      throw new CodegenError(`Class '${cls.name}' embeds itself by value`);
    }
    this.pending.add(cls.name);

    const base = cls.superClass ? this.layoutOf(cls.superClass) : undefined;
    const slots: IRLayoutSlot[] = base ? [...base.slots] : [];
    const fieldSlots = new Map(base?.fieldSlots ?? []);
    const interfaceSlots = new Map(base?.interfaceSlots ?? []);
    let size = base?.size ?? 0;
    let align = base?.align ?? 1;
    let classTableSlot = base?.classTableSlot;

    const place = (name: string, type: IRSlotType): number => {
      const metrics = this.metrics(type);
      const offset = Math.ceil(size / metrics.align) * metrics.align;
      slots.push({ name, type, offset, size: metrics.size });
      size = offset + metrics.size;
      align = Math.max(align, metrics.align);
      return slots.length - 1;
    };

    if (!base && this.hasClassTable(cls)) classTableSlot = place('ctable', 'ptr');
    for (const field of cls.fields.values()) {
      if (isDerivedField(field.declaration)) continue;
      fieldSlots.set(field.name, place(field.name, slotType(field.type)));
    }
    for (const iface of allImplementedInterfaces(cls)) {
      if (interfaceSlots.has(iface.name)) continue;
      interfaceSlots.set(iface.name, place(`itable.${iface.name}`, 'ptr'));
    }

    const layout: IRRecordLayout = {
      name: cls.name,
      kind: 'class',
      base: cls.superClass?.name,
      slots,
      size: Math.ceil(size / align) * align,
      align,
      interfaceSlots,
      classTableSlot,
      fieldSlots
    };
    this.pending.delete(cls.name);
    this.layouts.set(cls.name, layout);
    return layout;
  }

  metrics(type: IRSlotType): { size: number; align: number } {
    if (typeof type === 'string') return SCALAR_SIZES[type];
    const cls = this.classes.get(type.record);
    const layout = cls ? this.layoutOf(cls) : this.layouts.get(type.record);
    if (!layout) throw new CodegenError(`Unknown record '${type.record}'`);
    return { size: layout.size, align: layout.align };
  }

  // True when the class extends, or is extended by, another class
  hasClassTable(cls: ClassInfo): boolean {
    const root = hierarchyRoot(cls);
    for (const other of this.classes.values()) {
      if (other !== root && hierarchyRoot(other) === root) return true;
    }
    return false;
  }

  private buildClassTable(cls: ClassInfo): IRTable {
    return {
      name: classTableSymbol(cls),
      className: cls.name,
      entries: [classRoutine(cls, '__drop'), classRoutine(cls, '__release')],
      supers: []
    };
  }

  private buildTable(cls: ClassInfo, iface: InterfaceInfo): IRTable {
    const entries = [classRoutine(cls, '__drop'), classRoutine(cls, '__release')];
    for (const required of allInterfaceMethods(iface)) {
      const method = findMethods(cls, required.name, typesEqual)
        .find(m => !m.isStatic && sameParameterTypes(m.parameterTypes, required.parameterTypes, typesEqual));
      if (!method) {
        throw new CodegenError(`Class '${cls.name}' has no method '${required.name}' for interface '${iface.name}'`);
      }
      entries.push(methodSymbol(method));
    }
    return {
      name: tableSymbol(cls, iface),
      className: cls.name,
      interfaceName: iface.name,
      entries,
      supers: iface.superInterfaces.map(parent => tableSymbol(cls, parent))
    };
  }
}

export const DSTRING_TEMPLATE_SLOT = 0;
export const DSTRING_CACHE_SLOT = 1;
export const DSTRING_RENDERED_SLOT = 2;
export const DSTRING_FIRST_LOCATION_SLOT = 3;

/**
 * Record behind one D-string site: template, cached text, rendered flag,
 * then a location pointer per reference followed by a snapshot per reference.
 */
export function dstringRecord(name: string, snapshotTypes: readonly IRScalarType[]): IRRecordLayout {
  const types: { name: string; type: IRScalarType }[] = [
    { name: 'template', type: 'str' },
    { name: 'cache', type: 'str' },
    { name: 'rendered', type: 'i1' },
    ...snapshotTypes.map((_, i) => ({ name: `location.${i}`, type: 'ptr' as const })),
    ...snapshotTypes.map((type, i) => ({ name: `snapshot.${i}`, type }))
  ];
  const slots: IRLayoutSlot[] = [];
  let size = 0;
  let align = 1;
  for (const slot of types) {
    const metrics = SCALAR_SIZES[slot.type];
    const offset = Math.ceil(size / metrics.align) * metrics.align;
    slots.push({ name: slot.name, type: slot.type, offset, size: metrics.size });
    size = offset + metrics.size;
    align = Math.max(align, metrics.align);
  }
  return {
    name,
    kind: 'dstring',
    slots,
    size: Math.ceil(size / align) * align,
    align,
    interfaceSlots: new Map(),
    fieldSlots: new Map()
  };
}
