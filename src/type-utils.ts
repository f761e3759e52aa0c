import { ClassType, InterfaceType, PointerType, PrimitiveName, PrimitiveType, SinterType } from './types';
import { ClassInfo, InterfaceInfo, allImplementedInterfaces, interfaceExtends, isSubclassOf } from './validation/symbol-table';

export const commonTypes = {
  int: { kind: 'primitive', name: 'int' },
  float: { kind: 'primitive', name: 'float' },
  double: { kind: 'primitive', name: 'double' },
  boolean: { kind: 'primitive', name: 'boolean' },
  str: { kind: 'primitive', name: 'str' },
  void: { kind: 'primitive', name: 'void' },
  null: { kind: 'null' },
  error: { kind: 'error' }
} as const satisfies Record<string, SinterType>;

export function createPrimitiveType(name: PrimitiveName): PrimitiveType {
  return commonTypes[name];
}

export function createPointerType(target: SinterType): PointerType {
  return { kind: 'pointer', target };
}

export function createClassType(name: string): ClassType {
  return { kind: 'class', name };
}

export function createInterfaceType(name: string): InterfaceType {
  return { kind: 'interface', name };
}

export function typeToString(type: SinterType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'class':
    case 'interface':
      return type.name;
    case 'pointer':
      return `${typeToString(type.target)}*`;
    case 'null':
      return 'null';
    case 'error':
      return '<error>';
  }
}

export function typesEqual(a: SinterType, b: SinterType): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'class':
    case 'interface':
      return b.kind === a.kind && a.name === b.name;
    case 'pointer':
      return b.kind === 'pointer' && typesEqual(a.target, b.target);
    case 'null':
    case 'error':
      return b.kind === a.kind;
  }
}

export function isPrimitive(type: SinterType, ...names: PrimitiveName[]): type is PrimitiveType {
  return type.kind === 'primitive' && (names.length === 0 || names.includes(type.name));
}

export function isNumeric(type: SinterType): type is PrimitiveType {
  return isPrimitive(type, 'int', 'float', 'double');
}

export function isVoid(type: SinterType): boolean {
  return isPrimitive(type, 'void');
}

export function isError(type: SinterType): boolean {
  return type.kind === 'error';
}

// Values that print, render into D-strings and serialize as scalars
export function isScalar(type: SinterType): type is PrimitiveType {
  return isPrimitive(type, 'int', 'float', 'double', 'boolean', 'str');
}

export function isPointerLike(type: SinterType): boolean {
  return type.kind === 'pointer' || type.kind === 'null';
}

export interface TypeHierarchy {
  classes: ReadonlyMap<string, ClassInfo>;
  interfaces: ReadonlyMap<string, InterfaceInfo>;
}

/**
 * Assignment compatibility: identical types, `null` into any pointer, and
 * nominal subtyping (class to base class, class to implemented interface,
 * interface to super-interface).
 */
export function isAssignable(source: SinterType, target: SinterType, hierarchy: TypeHierarchy): boolean {
  if (source.kind === 'error' || target.kind === 'error') return true;
  if (typesEqual(source, target)) return true;
  if (source.kind === 'null') return target.kind === 'pointer';
  if (source.kind === 'pointer' && target.kind === 'pointer') {
    return isNamedSubtype(source.target, target.target, hierarchy);
  }
  if (source.kind === 'class' && target.kind === 'class') {
    return isNamedSubtype(source, target, hierarchy);
  }
  return false;
}

export function isNamedSubtype(source: SinterType, target: SinterType, hierarchy: TypeHierarchy): boolean {
  if (source.kind === 'class') {
    const cls = hierarchy.classes.get(source.name);
    if (!cls) return false;
    if (target.kind === 'class') {
      const ancestor = hierarchy.classes.get(target.name);
      return ancestor !== undefined && isSubclassOf(cls, ancestor);
    }
    if (target.kind === 'interface') {
      return allImplementedInterfaces(cls).some(iface => iface.name === target.name);
    }
    return false;
  }
  if (source.kind === 'interface' && target.kind === 'interface') {
    const iface = hierarchy.interfaces.get(source.name);
    const ancestor = hierarchy.interfaces.get(target.name);
    return iface !== undefined && ancestor !== undefined && interfaceExtends(iface, ancestor);
  }
  return false;
}

export function signatureToString(name: string, parameterTypes: SinterType[], returnType: SinterType): string {
  return `${name}(${parameterTypes.map(typeToString).join(', ')}) -> ${typeToString(returnType)}`;
}

export function capitalize(name: string): string {
  return name.length === 0 ? name : name[0].toUpperCase() + name.slice(1);
}
