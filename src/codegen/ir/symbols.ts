// Symbol names for generated IR functions and tables

import { SinterType } from '../../types';
import { typeToString } from '../../type-utils';
import { ClassInfo, FunctionInfo, InterfaceInfo, MethodInfo } from '../../validation/symbol-table';

function mangle(name: string, parameterTypes: SinterType[], overloaded: boolean): string {
  if (!overloaded) return name;
  const suffix = parameterTypes.map(t => typeToString(t).replace(/\*/g, '.ptr'));
  return [name, ...suffix].join('$');
}

export function functionSymbol(fn: FunctionInfo, overloads: readonly FunctionInfo[]): string {
  return mangle(fn.name, fn.parameterTypes, overloads.length > 1);
}

export function methodSymbol(method: MethodInfo): string {
  const overloads = method.owner.methods.get(method.name) ?? [];
  return `${method.owner.name}.${mangle(method.name, method.parameterTypes, overloads.length > 1)}`;
}

export type ClassRoutine =
  | '__init' | '__finalize' | '__drop' | '__release'
  | 'as_json' | 'as_xml' | 'from_json' | 'from_xml' | '__fill_json' | '__fill_xml' | '__xml_body';

export function classRoutine(cls: ClassInfo, routine: ClassRoutine): string {
  return `${cls.name}.${routine}`;
}

export function tableSymbol(cls: ClassInfo | string, iface: InterfaceInfo | string): string {
  const className = typeof cls === 'string' ? cls : cls.name;
  const interfaceName = typeof iface === 'string' ? iface : iface.name;
  return `${className}.itable.${interfaceName}`;
}

export function classTableSymbol(cls: ClassInfo | string): string {
  return `${typeof cls === 'string' ? cls : cls.name}.ctable`;
}

export function dstringLayout(index: number): string {
  return `dstring.${index}`;
}

export function dstringRoutine(index: number, routine: 'read' | 'render'): string {
  return `dstring.${index}.${routine}`;
}
