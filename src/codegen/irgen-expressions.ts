import {
  BinaryExpression, CallExpression, Expression, Identifier, MemberExpression, SinterType, UnaryExpression
} from '../types';
import { isPrimitive, typesEqual } from '../type-utils';
import {
  ClassInfo, FieldInfo, InterfaceInfo, allInterfaceMethods, sameParameterTypes
} from '../validation/symbol-table';
import { CodegenError } from './codegen-error';
import { FunctionContext, IRLowering, literalValue } from './irgen';
import { constant } from './ir/ir-builder';
import {
  IRBinaryOperator, IRCompareOperator, IRScalarType, IRValue, TABLE_DROP_INDEX, TABLE_METHOD_BASE, TABLE_RELEASE_INDEX
} from './ir/ir-types';
import { scalarType } from './ir/layout';
import { classRoutine, methodSymbol } from './ir/symbols';
import { formatExtern } from './runtime-externs';
import { createDString, readDString } from './irgen-dstring';

// Storage an expression denotes
export type LValue =
  | { kind: 'slot'; address: IRValue; type: SinterType }
  | { kind: 'field'; object: IRValue; layout: string; slot: number; type: SinterType }
  | { kind: 'record'; pointer: IRValue; cls: ClassInfo }
  | { kind: 'dstring'; record: IRValue; index: number };

const ARITHMETIC: Record<string, IRBinaryOperator> = { '+': 'add', '-': 'sub', '*': 'mul', '/': 'div', '%': 'rem' };
const COMPARISON: Record<string, IRCompareOperator> = { '==': 'eq', '!=': 'ne', '<': 'lt', '<=': 'le', '>': 'gt', '>=': 'ge' };

export function arithmeticOperator(operator: string): IRBinaryOperator {
  const op = ARITHMETIC[operator];
  if (!op) throw new CodegenError(`Unknown arithmetic operator '${operator}'`);
  return op;
}

export function generateExpression(lowering: IRLowering, context: FunctionContext, expression: Expression): IRValue {
  switch (expression.kind) {
    case 'literal':
      return literalValue(expression, lowering.expressionType(expression));
    case 'dstring': {
      const site = createDString(lowering, context, expression, 'dstr');
      return readDString(lowering, context, site.record, site.index);
    }
    case 'identifier':
    case 'member':
      return generateFieldOrVariable(lowering, context, expression);
    case 'unary':
      return generateUnary(lowering, context, expression);
    case 'binary':
      return generateBinary(lowering, context, expression);
    case 'call': {
      const value = generateCall(lowering, context, expression);
      if (!value) throw new CodegenError('A call returning void was used as a value', expression.location);
      return value;
    }
  }
}

function generateFieldOrVariable(lowering: IRLowering, context: FunctionContext, expression: Identifier | MemberExpression): IRValue {
  const target = lowering.analysis.types.memberTargets.get(expression);
  if (target?.kind === 'derived') {
    if (!target.method) throw new CodegenError(`Derived field '${target.field.name}' has no method`, expression.location);
    const receiver = expression.kind === 'member'
      ? generateExpression(lowering, context, expression.object)
      : lowering.selfOf(context);
    return callValue(lowering, context, methodSymbol(target.method), [receiver], target.field.type, expression);
  }
  return readLValue(lowering, context, generateLValue(lowering, context, expression));
}

export function generateLValue(lowering: IRLowering, context: FunctionContext, expression: Expression): LValue {
  switch (expression.kind) {
    case 'identifier': {
      const entry = lowering.analysis.resolution.bindings.get(expression);
      if (entry?.kind === 'variable') {
        const storage = context.locals.get(entry.declaration);
        if (!storage) throw new CodegenError(`Variable '${expression.name}' has no storage`, expression.location);
        switch (storage.kind) {
          case 'slot':
            return { kind: 'slot', address: storage.address, type: lowering.bindingType(entry.declaration) };
          case 'record':
            return { kind: 'record', pointer: storage.record, cls: storage.cls };
          case 'dstring':
            return { kind: 'dstring', record: storage.record, index: storage.index };
        }
      }
      const target = lowering.analysis.types.memberTargets.get(expression);
      if (target?.kind === 'field') return fieldLValue(lowering, context, lowering.selfOf(context), target.field);
      break;
    }
    case 'member': {
      const target = lowering.analysis.types.memberTargets.get(expression);
      if (target?.kind === 'field') {
        return fieldLValue(lowering, context, generateExpression(lowering, context, expression.object), target.field);
      }
      break;
    }
    case 'unary':
      if (expression.operator === '*') {
        const type = lowering.expressionType(expression);
        if (type.kind !== 'class') break;
        return { kind: 'record', pointer: generateExpression(lowering, context, expression.operand), cls: lowering.classNamed(type.name) };
      }
      break;
    default:
      break;
  }
  throw new CodegenError('Expression does not denote storage', expression.location);
}

function fieldLValue(lowering: IRLowering, context: FunctionContext, object: IRValue, field: FieldInfo): LValue {
  const slot = lowering.fieldSlot(field);
  if (field.type.kind === 'class') {
    const pointer = context.builder.getField(field.owner.name, object, slot, 'ptr');
    return { kind: 'record', pointer, cls: lowering.classNamed(field.type.name) };
  }
  return { kind: 'field', object, layout: field.owner.name, slot, type: field.type };
}

export function readLValue(lowering: IRLowering, context: FunctionContext, lvalue: LValue): IRValue {
  const { builder } = context;
  switch (lvalue.kind) {
    case 'slot':
      return builder.load(lvalue.address, scalarType(lvalue.type));
    case 'field':
      return builder.getField(lvalue.layout, lvalue.object, lvalue.slot, scalarType(lvalue.type));
    case 'record':
      return lvalue.pointer;
    case 'dstring':
      return readDString(lowering, context, lvalue.record, lvalue.index);
  }
}

export function writeLValue(lowering: IRLowering, context: FunctionContext, lvalue: LValue, value: IRValue, valueType: SinterType): void {
  const { builder } = context;
  switch (lvalue.kind) {
    case 'slot':
      builder.store(lvalue.address, coerce(lowering, context, value, valueType, lvalue.type));
      break;
    case 'field':
      builder.setField(lvalue.layout, lvalue.object, lvalue.slot, coerce(lowering, context, value, valueType, lvalue.type));
      break;
    case 'record':
      copyRecord(lowering, context, lvalue.pointer, value, lvalue.cls);
      break;
    case 'dstring':
      throw new CodegenError('D-string bindings cannot be assigned');
  }
}

/**
 * Copies a class value. A subclass value copied into base-class storage is
 * sliced: only the base prefix is kept and its tables are the base's own.
 */
export function copyRecord(
  lowering: IRLowering,
  context: FunctionContext,
  target: IRValue,
  source: IRValue,
  targetClass: ClassInfo
): void {
  const { builder } = context;
  builder.emit({ op: 'copy', layout: targetClass.name, target, source });
  // The source may be a subclass value even when both static types agree
  lowering.setTables(builder, targetClass, target);
}

// Path of direct super-interface indices leading from one interface to an ancestor
function interfacePath(from: InterfaceInfo, to: InterfaceInfo, seen: Set<InterfaceInfo> = new Set()): number[] | undefined {
  if (from === to) return [];
  if (seen.has(from)) return undefined;
  seen.add(from);
  for (let i = 0; i < from.superInterfaces.length; i++) {
    const rest = interfacePath(from.superInterfaces[i], to, seen);
    if (rest) return [i, ...rest];
  }
  return undefined;
}

/**
 * Converts a value to the representation of a wider type: class pointers
 * to interface values, interface values to super-interface values, `null`
 * to the null of the target representation.
 */
export function coerce(lowering: IRLowering, context: FunctionContext, value: IRValue, from: SinterType, to: SinterType): IRValue {
  if (to.kind !== 'pointer' || to.target.kind !== 'interface') return value;
  if (from.kind === 'null') return constant('iface', null);
  if (from.kind !== 'pointer') return value;

  const { builder } = context;
  const { interfaces } = lowering.analysis.resolution;
  if (from.target.kind === 'class') {
    const cls = lowering.classNamed(from.target.name);
    const dest = builder.temp('iface');
    builder.emit({ op: 'ifacefrom', dest, layout: cls.name, object: value, slot: lowering.interfaceSlot(cls, to.target.name) });
    return dest;
  }
  if (from.target.kind === 'interface' && from.target.name !== to.target.name) {
    const source = interfaces.get(from.target.name);
    const target = interfaces.get(to.target.name);
    const path = source && target ? interfacePath(source, target) : undefined;
    if (!path) throw new CodegenError(`'${from.target.name}' does not extend '${to.target.name}'`);
    let current = value;
    for (const index of path) {
      const dest = builder.temp('iface');
      builder.emit({ op: 'ifaceup', dest, value: current, index });
      current = dest;
    }
    return current;
  }
  return value;
}

function generateUnary(lowering: IRLowering, context: FunctionContext, expression: UnaryExpression): IRValue {
  const { builder } = context;
  switch (expression.operator) {
    case '-': {
      const operand = generateExpression(lowering, context, expression.operand);
      return builder.unary('neg', scalarType(lowering.expressionType(expression)), operand);
    }
    case '!':
      return builder.unary('not', 'i1', generateExpression(lowering, context, expression.operand));
    case '*':
    case '&':
      // Class values are handled through their record pointer either way
      return generateExpression(lowering, context, expression.operand);
  }
}

function generateBinary(lowering: IRLowering, context: FunctionContext, expression: BinaryExpression): IRValue {
  const { builder } = context;
  const { operator } = expression;

  if (operator === '&&' || operator === '||') {
    const result = builder.alloca('i1', operator === '&&' ? 'and' : 'or');
    const left = generateExpression(lowering, context, expression.left);
    builder.store(result, left);
    const rhs = builder.label('logic.rhs');
    const end = builder.label('logic.end');
    if (operator === '&&') {
      builder.condbr(left, rhs, end);
    } else {
      builder.condbr(left, end, rhs);
    }
    builder.startBlock(rhs);
    builder.store(result, generateExpression(lowering, context, expression.right));
    builder.br(end);
    builder.startBlock(end);
    return builder.load(result, 'i1');
  }

  const leftType = lowering.expressionType(expression.left);
  const rightType = lowering.expressionType(expression.right);
  let left = generateExpression(lowering, context, expression.left);
  let right = generateExpression(lowering, context, expression.right);

  const comparison = COMPARISON[operator];
  if (comparison) {
    if (leftType.kind === 'pointer' || leftType.kind === 'null' || rightType.kind === 'pointer') {
      // Compare interface values by object; widen the other side when one is an interface
      if (leftType.kind === 'pointer' && leftType.target.kind === 'interface') {
        right = coerce(lowering, context, right, rightType, leftType);
        return builder.compare(comparison, 'iface', left, right);
      }
      if (rightType.kind === 'pointer' && rightType.target.kind === 'interface') {
        left = coerce(lowering, context, left, leftType, rightType);
        return builder.compare(comparison, 'iface', left, right);
      }
      return builder.compare(comparison, 'ptr', left, right);
    }
    return builder.compare(comparison, scalarType(leftType), left, right);
  }

  if (operator === '+' && isPrimitive(leftType, 'str')) {
    return builder.binary('concat', 'str', left, right);
  }
  return builder.binary(arithmeticOperator(operator), scalarType(leftType), left, right);
}

function callValue(
  lowering: IRLowering,
  context: FunctionContext,
  callee: string,
  args: IRValue[],
  returnType: SinterType,
  expression: Expression
): IRValue {
  const result = context.builder.call(callee, args, lowering.irType(returnType));
  if (!result) throw new CodegenError(`'${callee}' returns no value`, expression.location);
  return result;
}

function generateArguments(
  lowering: IRLowering,
  context: FunctionContext,
  args: Expression[],
  parameterTypes: SinterType[]
): IRValue[] {
  return args.map((arg, i) =>
    coerce(lowering, context, generateExpression(lowering, context, arg), lowering.expressionType(arg), parameterTypes[i]));
}

// Text of a scalar value as print and D-strings show it
export function formatScalar(lowering: IRLowering, context: FunctionContext, value: IRValue, type: IRScalarType): IRValue {
  const formatter = formatExtern(type);
  return formatter ? lowering.callExternValue(context.builder, formatter, [value]) : value;
}

/**
 * Lowers a call. Returns the result value, or undefined for calls that
 * produce nothing.
 */
export function generateCall(lowering: IRLowering, context: FunctionContext, call: CallExpression): IRValue | undefined {
  const target = lowering.analysis.types.callTargets.get(call);
  if (!target) throw new CodegenError('Call reached code generation unresolved', call.location);
  const { builder } = context;

  switch (target.kind) {
    case 'function': {
      const fn = target.target;
      const args = generateArguments(lowering, context, call.arguments, fn.parameterTypes);
      return builder.call(lowering.functionName(fn), args, lowering.irType(fn.returnType));
    }
    case 'method': {
      const method = target.target;
      const receiver = target.receiver
        ? generateExpression(lowering, context, target.receiver)
        : lowering.selfOf(context);
      const args = generateArguments(lowering, context, call.arguments, method.parameterTypes);
      return builder.call(methodSymbol(method), [receiver, ...args], lowering.irType(method.returnType));
    }
    case 'static': {
      const method = target.target;
      const args = generateArguments(lowering, context, call.arguments, method.parameterTypes);
      return builder.call(methodSymbol(method), args, lowering.irType(method.returnType));
    }
    case 'interface': {
      const value = generateExpression(lowering, context, target.receiver);
      const methods = allInterfaceMethods(target.iface);
      const index = methods.findIndex(m =>
        m.name === target.method.name && sameParameterTypes(m.parameterTypes, target.method.parameterTypes, typesEqual));
      if (index < 0) throw new CodegenError(`Interface '${target.iface.name}' has no method '${target.method.name}'`, call.location);
      const args = generateArguments(lowering, context, call.arguments, target.method.parameterTypes);
      const object = builder.temp('ptr');
      builder.emit({ op: 'ifaceobj', dest: object, value });
      const table = builder.temp('ptr');
      builder.emit({ op: 'ifacetable', dest: table, value });
      const fn = builder.temp('fn');
      builder.emit({ op: 'tableget', dest: fn, table, index: TABLE_METHOD_BASE + index });
      return builder.callIndirect(fn, [object, ...args], lowering.irType(target.method.returnType));
    }
    case 'builtin': {
      let text: IRValue = constant('str', '');
      call.arguments.forEach((arg, i) => {
        const value = generateExpression(lowering, context, arg);
        const piece = formatScalar(lowering, context, value, scalarType(lowering.expressionType(arg)));
        text = i === 0 ? piece : builder.binary('concat', 'str', text, piece);
      });
      lowering.callExtern(builder, target.name === 'println' ? 'rt.println' : 'rt.print', [text]);
      return undefined;
    }
    case 'new': {
      const pointer = builder.alloc(target.cls.name);
      builder.call(classRoutine(target.cls, '__init'), [pointer], 'void');
      return pointer;
    }
    case 'deserialize': {
      const text = generateExpression(lowering, context, call.arguments[0]);
      const routine = lowering.requireRoutine(target.cls, target.format === 'json' ? 'from_json' : 'from_xml');
      return builder.call(routine, [text], 'ptr');
    }
    case 'serialize': {
      const receiver = generateExpression(lowering, context, target.receiver);
      const routine = lowering.requireRoutine(target.cls, target.format === 'json' ? 'as_json' : 'as_xml');
      return builder.call(routine, [receiver], 'str');
    }
    case 'clean':
    case 'release':
      return generateLifecycle(lowering, context, target.kind, target.receiver);
  }
}

function generateLifecycle(
  lowering: IRLowering,
  context: FunctionContext,
  kind: 'clean' | 'release',
  receiver: Expression
): IRValue | undefined {
  const { builder } = context;
  const type = lowering.expressionType(receiver);
  const value = generateExpression(lowering, context, receiver);
  if (type.kind !== 'pointer') throw new CodegenError(`'.${kind}()' on a non-pointer`, receiver.location);

  if (type.target.kind === 'class') {
    const cls = lowering.classNamed(type.target.name);
    lowering.ifNotNull(builder, value, 'ptr', kind, () => {
      lowering.callLifecycle(builder, cls, value, kind === 'clean' ? '__drop' : '__release');
    });
  } else {
    const object = builder.temp('ptr');
    builder.emit({ op: 'ifaceobj', dest: object, value });
    lowering.ifNotNull(builder, object, 'ptr', kind, () => {
      const table = builder.temp('ptr');
      builder.emit({ op: 'ifacetable', dest: table, value });
      const fn = builder.temp('fn');
      builder.emit({ op: 'tableget', dest: fn, table, index: kind === 'clean' ? TABLE_DROP_INDEX : TABLE_RELEASE_INDEX });
      builder.callIndirect(fn, [object], 'void');
    });
  }
  return kind === 'release' ? value : undefined;
}
