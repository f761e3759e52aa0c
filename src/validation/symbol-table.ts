// Scopes, symbols and declaration metadata shared by the analysis stages

import {
  ClassDeclaration, FieldDeclaration, FunctionDeclaration, InterfaceDeclaration, InterfaceMethodSignature,
  MethodDeclaration, Parameter, SinterType, VariableDeclaration, Visibility
} from '../types';

export interface FieldInfo {
  name: string;
  declaration: FieldDeclaration;
  owner: ClassInfo;
  type: SinterType;
  visibility: Visibility;
}

export type AccessorKind = 'getter' | 'setter';

export interface MethodInfo {
  name: string;
  owner: ClassInfo;
  // Absent for accessors synthesized from field annotations
  declaration?: MethodDeclaration;
  parameterTypes: SinterType[];
  returnType: SinterType;
  visibility: Visibility;
  isStatic: boolean;
  accessor?: { kind: AccessorKind; field: FieldInfo };
}

export class ClassInfo {
  superClass?: ClassInfo;
  interfaces: InterfaceInfo[] = [];
  readonly fields: Map<string, FieldInfo> = new Map();
  readonly methods: Map<string, MethodInfo[]> = new Map();
  readonly scope: ClassScope;

  constructor(public readonly declaration: ClassDeclaration, globalScope: Scope) {
    this.scope = new ClassScope(this, globalScope);
  }

  get name(): string {
    return this.declaration.name.name;
  }
}

export interface InterfaceMethodInfo {
  name: string;
  owner: InterfaceInfo;
  declaration: InterfaceMethodSignature;
  parameterTypes: SinterType[];
  returnType: SinterType;
}

export interface InterfaceInfo {
  name: string;
  declaration: InterfaceDeclaration;
  superInterfaces: InterfaceInfo[];
  methods: InterfaceMethodInfo[];
}

export interface FunctionInfo {
  name: string;
  declaration: FunctionDeclaration;
  parameterTypes: SinterType[];
  returnType: SinterType;
}

export type VariableBinding = VariableDeclaration | Parameter;

export type SymbolEntry =
  | { kind: 'class'; name: string; info: ClassInfo }
  | { kind: 'interface'; name: string; info: InterfaceInfo }
  | { kind: 'function'; name: string; overloads: FunctionInfo[] }
  | { kind: 'field'; name: string; field: FieldInfo }
  | { kind: 'method'; name: string; owner: ClassInfo }
  | { kind: 'builtin'; name: BuiltinFunction }
  | { kind: 'variable'; name: string; declaration: VariableBinding };

export type BuiltinFunction = 'print' | 'println';

export const BUILTIN_FUNCTIONS: readonly BuiltinFunction[] = ['print', 'println'];

// Member names the compiler provides on every class
export const BUILTIN_MEMBERS = ['new', 'from_json', 'from_xml', 'as_json', 'as_xml'] as const;

// Lifecycle hooks a class may define; `p.clean()` and `p.release()` invoke them
export const LIFECYCLE_HOOKS = ['clean', 'release'] as const;

export type ScopeKind = 'global' | 'class' | 'function' | 'block' | 'loop';

export class Scope {
  readonly symbols: Map<string, SymbolEntry> = new Map();

  constructor(public readonly kind: ScopeKind, public readonly parent?: Scope) {}

  declare(entry: SymbolEntry): boolean {
    if (this.symbols.has(entry.name)) return false;
    this.symbols.set(entry.name, entry);
    return true;
  }

  lookupLocal(name: string): SymbolEntry | undefined {
    return this.symbols.get(name);
  }

  lookup(name: string): SymbolEntry | undefined {
    return this.lookupLocal(name) ?? this.parent?.lookup(name);
  }

  // Nearest enclosing class scope, if any
  enclosingClass(): ClassInfo | undefined {
    return this.parent?.enclosingClass();
  }
}

/**
 * Class scope: own fields first, then non-private fields inherited through
 * the base chain, then the enclosing (global) scope. Methods are looked up
 * through {@link findMethods} since a derived field may share its name with
 * the method computing it.
 */
export class ClassScope extends Scope {
  constructor(public readonly owner: ClassInfo, parent: Scope) {
    super('class', parent);
  }

  lookupLocal(name: string): SymbolEntry | undefined {
    const own = this.symbols.get(name);
    if (own) return own;
    const inherited = findField(this.owner, name);
    if (inherited && inherited.owner !== this.owner && inherited.visibility !== 'private') {
      return { kind: 'field', name, field: inherited };
    }
    return undefined;
  }

  enclosingClass(): ClassInfo | undefined {
    return this.owner;
  }
}

export function findField(cls: ClassInfo, name: string): FieldInfo | undefined {
  for (let current: ClassInfo | undefined = cls; current; current = current.superClass) {
    const field = current.fields.get(name);
    if (field) return field;
  }
  return undefined;
}

export function sameParameterTypes(a: SinterType[], b: SinterType[], equals: (x: SinterType, y: SinterType) => boolean): boolean {
  return a.length === b.length && a.every((type, i) => equals(type, b[i]));
}

/**
 * Collects the overload set visible on a class for a method name: own
 * overloads first, then inherited ones not hidden by an override with the
 * same parameter types.
 */
export function findMethods(
  cls: ClassInfo,
  name: string,
  equals: (x: SinterType, y: SinterType) => boolean
): MethodInfo[] {
  const result: MethodInfo[] = [];
  for (let current: ClassInfo | undefined = cls; current; current = current.superClass) {
    for (const method of current.methods.get(name) ?? []) {
      if (!result.some(existing => sameParameterTypes(existing.parameterTypes, method.parameterTypes, equals))) {
        result.push(method);
      }
    }
  }
  return result;
}

// Methods of an interface including those of its super-interfaces, inherited first
export function allInterfaceMethods(iface: InterfaceInfo, seen: Set<InterfaceInfo> = new Set()): InterfaceMethodInfo[] {
  if (seen.has(iface)) return [];
  seen.add(iface);
  const result: InterfaceMethodInfo[] = [];
  for (const parent of iface.superInterfaces) {
    for (const method of allInterfaceMethods(parent, seen)) {
      if (!result.some(m => m.name === method.name && m.parameterTypes.length === method.parameterTypes.length)) {
        result.push(method);
      }
    }
  }
  result.push(...iface.methods);
  return result;
}

// Every interface a class conforms to, directly or through its base chain and super-interfaces
export function allImplementedInterfaces(cls: ClassInfo): InterfaceInfo[] {
  const result: InterfaceInfo[] = [];
  const visit = (iface: InterfaceInfo): void => {
    if (result.includes(iface)) return;
    result.push(iface);
    iface.superInterfaces.forEach(visit);
  };
  const chain: ClassInfo[] = [];
  for (let current: ClassInfo | undefined = cls; current && !chain.includes(current); current = current.superClass) {
    chain.push(current);
  }
  for (const current of chain.reverse()) {
    current.interfaces.forEach(visit);
  }
  return result;
}

export function isSubclassOf(cls: ClassInfo, ancestor: ClassInfo): boolean {
  const seen = new Set<ClassInfo>();
  for (let current: ClassInfo | undefined = cls; current && !seen.has(current); current = current.superClass) {
    if (current === ancestor) return true;
    seen.add(current);
  }
  return false;
}

/**
 * Pointer fields a lifecycle hook declared in `hookClass` must release: the
 * class's own, and the non-private ones it inherits. Generated finalizers drop
 * every other pointer field.
 */
export function hookOwnsField(hookClass: ClassInfo, field: FieldInfo): boolean {
  if (field.type.kind !== 'pointer') return false;
  if (field.owner === hookClass) return true;
  return field.visibility !== 'private' && isSubclassOf(hookClass, field.owner);
}

export function interfaceExtends(iface: InterfaceInfo, ancestor: InterfaceInfo, seen: Set<InterfaceInfo> = new Set()): boolean {
  if (iface === ancestor) return true;
  if (seen.has(iface)) return false;
  seen.add(iface);
  return iface.superInterfaces.some(parent => interfaceExtends(parent, ancestor, seen));
}
