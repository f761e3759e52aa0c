import {
  BinaryExpression, CallExpression, DStringLiteral, Expression, Identifier, Literal, MemberExpression, SinterType,
  SourceLocation, UnaryExpression
} from '../types';
import {
  commonTypes, createClassType, createPointerType, isError, isNumeric, isPointerLike, isPrimitive, isScalar,
  typeToString, typesEqual
} from '../type-utils';
import { CheckContext, SerialFormat, TypeChecker } from './type-checker';
import {
  BUILTIN_MEMBERS, ClassInfo, FieldInfo, InterfaceInfo, MethodInfo, allInterfaceMethods, findField, findMethods
} from './symbol-table';

export function checkExpression(checker: TypeChecker, expression: Expression, context: CheckContext): SinterType {
  const type = inferExpression(checker, expression, context);
  checker.expressionTypes.set(expression, type);
  return type;
}

function inferExpression(checker: TypeChecker, expression: Expression, context: CheckContext): SinterType {
  switch (expression.kind) {
    case 'literal':
      return literalType(expression);
    case 'dstring':
      return checkDString(checker, expression, context);
    case 'identifier':
      return checkIdentifier(checker, expression, context);
    case 'unary':
      return checkUnary(checker, expression, context);
    case 'binary':
      return checkBinary(checker, expression, context);
    case 'member':
      return checkMember(checker, expression, context);
    case 'call':
      return checkCall(checker, expression, context);
  }
}

function literalType(literal: Literal): SinterType {
  switch (literal.literalType) {
    case 'int': return commonTypes.int;
    case 'float': return commonTypes.float;
    case 'double': return commonTypes.double;
    case 'boolean': return commonTypes.boolean;
    case 'str': return commonTypes.str;
    case 'null': return commonTypes.null;
  }
}

function checkDString(checker: TypeChecker, dstring: DStringLiteral, context: CheckContext): SinterType {
  for (const part of dstring.parts) {
    if (part.kind !== 'reference') continue;
    const ref = part.identifier;
    const entry = checker.resolution.bindings.get(ref);
    if (!entry) continue;

    if (entry.kind !== 'variable' && entry.kind !== 'field') {
      checker.diagnostics.addError('TypeMismatchError',
        `D-string placeholder '{${ref.name}}' must name a variable`, ref.location);
      continue;
    }
    if (entry.kind === 'variable' && entry.declaration.kind === 'variable' && checker.dstringBindings.has(entry.declaration)) {
      checker.diagnostics.addError('TypeMismatchError',
        `D-string placeholder '{${ref.name}}' cannot reference another D-string`, ref.location);
      continue;
    }
    const type = checkExpression(checker, ref, context);
    if (entry.kind === 'field' && checker.isDerived(entry.field)) {
      checker.diagnostics.addError('TypeMismatchError',
        `D-string placeholder '{${ref.name}}' cannot reference derived field '${ref.name}'`, ref.location);
      continue;
    }
    if (!isError(type) && !isScalar(type)) {
      checker.diagnostics.addError('TypeMismatchError',
        `D-string placeholder '{${ref.name}}' has type '${typeToString(type)}'; only int, float, double, boolean and str can be rendered`,
        ref.location);
    }
  }
  return commonTypes.str;
}

export type FieldAccess = 'read' | 'write';

// Assignment and increment targets: variables, fields and dereferenced pointers
export function checkAssignmentTarget(checker: TypeChecker, target: Expression, context: CheckContext): SinterType {
  let type: SinterType;
  switch (target.kind) {
    case 'identifier':
      type = checkIdentifier(checker, target, context, 'write');
      break;
    case 'member':
      type = checkMember(checker, target, context, 'write');
      break;
    case 'unary':
      if (target.operator === '*') {
        type = checkUnary(checker, target, context);
        break;
      }
      checker.diagnostics.addError('TypeMismatchError', 'Invalid assignment target', target.location);
      type = commonTypes.error;
      break;
    default:
      checker.diagnostics.addError('TypeMismatchError', 'Invalid assignment target', target.location);
      type = commonTypes.error;
  }
  checker.expressionTypes.set(target, type);
  return type;
}

function checkIdentifier(checker: TypeChecker, identifier: Identifier, context: CheckContext, access: FieldAccess = 'read'): SinterType {
  const entry = checker.resolution.bindings.get(identifier);
  if (!entry) return commonTypes.error;

  switch (entry.kind) {
    case 'variable':
      return checker.bindingTypes.get(entry.declaration) ?? commonTypes.error;
    case 'field':
      if (context.isStatic) {
        checker.diagnostics.addError('TypeMismatchError',
          `Instance field '${entry.name}' cannot be used in static function '${context.name}'`, identifier.location);
        return commonTypes.error;
      }
      return accessField(checker, entry.field, identifier, context, access);
    case 'class':
    case 'interface':
      checker.diagnostics.addError('TypeMismatchError', `'${entry.name}' is a type, not a value`, identifier.location);
      return commonTypes.error;
    case 'function':
    case 'method':
    case 'builtin':
      checker.diagnostics.addError('TypeMismatchError', `'${entry.name}' must be called`, identifier.location);
      return commonTypes.error;
  }
}

// Records a field access and applies the attribute rules for its direction
function accessField(
  checker: TypeChecker,
  field: FieldInfo,
  node: Identifier | MemberExpression,
  context: CheckContext,
  access: FieldAccess
): SinterType {
  const flags = checker.flagsOf(field);
  const outside = context.cls !== field.owner;

  if (access === 'write') {
    if (flags.derived) {
      checker.diagnostics.addError('TypeMismatchError', `Cannot assign to derived field '${field.name}'`, node.location);
    } else if (field.declaration.isConst) {
      checker.diagnostics.addError('TypeMismatchError', `Cannot assign to const field '${field.name}'`, node.location);
    } else if (flags.read_only && outside) {
      checker.diagnostics.addError('VisibilityError',
        `Field '${field.name}' of class '${field.owner.name}' is read-only`, node.location);
    }
    checker.memberTargets.set(node, { kind: 'field', field });
    return field.type;
  }

  if (flags.write_only && outside) {
    checker.diagnostics.addError('VisibilityError',
      `Field '${field.name}' of class '${field.owner.name}' is write-only`, node.location);
  }
  if (flags.derived) {
    checker.memberTargets.set(node, { kind: 'derived', field, method: checker.derivedMethod(field) });
  } else {
    checker.memberTargets.set(node, { kind: 'field', field });
  }
  return field.type;
}

function checkUnary(checker: TypeChecker, unary: UnaryExpression, context: CheckContext): SinterType {
  const operand = checkExpression(checker, unary.operand, context);
  if (isError(operand)) return operand;

  switch (unary.operator) {
    case '-':
      if (isNumeric(operand)) return operand;
      break;
    case '!':
      if (isPrimitive(operand, 'boolean')) return operand;
      break;
    case '*':
      if (operand.kind === 'pointer' && operand.target.kind === 'class') return operand.target;
      if (operand.kind === 'pointer' && operand.target.kind === 'interface') {
        checker.diagnostics.addError('TypeMismatchError',
          `Cannot dereference interface pointer '${typeToString(operand)}'`, unary.location);
        return commonTypes.error;
      }
      break;
    case '&':
      if (!isLvalue(checker, unary.operand)) {
        checker.diagnostics.addError('TypeMismatchError', "Operand of '&' must be an addressable variable or field", unary.location);
        return commonTypes.error;
      }
      if (operand.kind === 'class') return createPointerType(operand);
      break;
  }

  checker.diagnostics.addError('TypeMismatchError',
    `Operator '${unary.operator}' cannot be applied to '${typeToString(operand)}'`, unary.location);
  return commonTypes.error;
}

export function isLvalue(checker: TypeChecker, expression: Expression): boolean {
  switch (expression.kind) {
    case 'identifier': {
      const entry = checker.resolution.bindings.get(expression);
      return entry?.kind === 'variable' || checker.memberTargets.get(expression)?.kind === 'field';
    }
    case 'member':
      return checker.memberTargets.get(expression)?.kind === 'field';
    case 'unary':
      return expression.operator === '*';
    default:
      return false;
  }
}

function checkBinary(checker: TypeChecker, binary: BinaryExpression, context: CheckContext): SinterType {
  const left = checkExpression(checker, binary.left, context);
  const right = checkExpression(checker, binary.right, context);
  if (isError(left) || isError(right)) {
    return isComparison(binary.operator) || binary.operator === '&&' || binary.operator === '||'
      ? commonTypes.boolean
      : commonTypes.error;
  }

  const mismatch = (): SinterType => {
    checker.diagnostics.addError('TypeMismatchError',
      `Operator '${binary.operator}' cannot be applied to '${typeToString(left)}' and '${typeToString(right)}'`,
      binary.location);
    return isComparison(binary.operator) ? commonTypes.boolean : commonTypes.error;
  };

  switch (binary.operator) {
    case '+':
      if (isPrimitive(left, 'str') && isPrimitive(right, 'str')) return commonTypes.str;
      return isNumeric(left) && typesEqual(left, right) ? left : mismatch();
    case '-':
    case '*':
    case '/':
    case '%':
      return isNumeric(left) && typesEqual(left, right) ? left : mismatch();
    case '<':
    case '<=':
    case '>':
    case '>=':
      return (isNumeric(left) || isPrimitive(left, 'str')) && typesEqual(left, right) ? commonTypes.boolean : mismatch();
    case '==':
    case '!=':
      if (isScalar(left) && typesEqual(left, right)) return commonTypes.boolean;
      if (isPointerLike(left) && isPointerLike(right)
        && (checker.assignable(left, right) || checker.assignable(right, left))) {
        return commonTypes.boolean;
      }
      return mismatch();
    case '&&':
    case '||':
      return isPrimitive(left, 'boolean') && isPrimitive(right, 'boolean') ? commonTypes.boolean : mismatch();
  }
}

function isComparison(operator: BinaryExpression['operator']): boolean {
  return ['==', '!=', '<', '<=', '>', '>='].includes(operator);
}

// The class a receiver of this type gives access to, by value or through a pointer
function receiverClass(checker: TypeChecker, type: SinterType): ClassInfo | undefined {
  if (type.kind === 'class') return checker.resolution.classes.get(type.name);
  if (type.kind === 'pointer' && type.target.kind === 'class') return checker.resolution.classes.get(type.target.name);
  return undefined;
}

function receiverInterface(checker: TypeChecker, type: SinterType): InterfaceInfo | undefined {
  if (type.kind === 'pointer' && type.target.kind === 'interface') return checker.resolution.interfaces.get(type.target.name);
  return undefined;
}

// `C` written as the object of a member expression names the class itself
function staticReceiver(checker: TypeChecker, expression: Expression): ClassInfo | InterfaceInfo | undefined {
  if (expression.kind !== 'identifier') return undefined;
  const entry = checker.resolution.bindings.get(expression);
  if (entry?.kind === 'class' || entry?.kind === 'interface') return entry.info;
  return undefined;
}

function checkMember(checker: TypeChecker, member: MemberExpression, context: CheckContext, access: FieldAccess = 'read'): SinterType {
  const name = member.property.name;
  const owner = staticReceiver(checker, member.object);
  if (owner) {
    checker.diagnostics.addError('UndefinedMethodError',
      `'${owner.name}' has no static field '${name}'`, member.property.location);
    return commonTypes.error;
  }

  const objectType = checkExpression(checker, member.object, context);
  if (isError(objectType)) return objectType;

  const cls = receiverClass(checker, objectType);
  if (!cls) {
    checker.diagnostics.addError('UndefinedMethodError',
      `Type '${typeToString(objectType)}' has no field '${name}'`, member.property.location);
    return commonTypes.error;
  }

  const field = findField(cls, name);
  if (!field) {
    const isMethod = findMethods(cls, name, typesEqual).length > 0 || BUILTIN_MEMBERS.some(b => b === name);
    checker.diagnostics.addError('UndefinedMethodError', isMethod
      ? `Method '${name}' of class '${cls.name}' must be called`
      : `Class '${cls.name}' has no field '${name}'`, member.property.location);
    return commonTypes.error;
  }
  if (!checker.canAccess(field.owner, field.visibility, context)) {
    checker.diagnostics.addError('VisibilityError',
      `Field '${name}' of class '${field.owner.name}' is ${field.visibility}`, member.property.location);
  }
  return accessField(checker, field, member, context, access);
}

function checkCall(checker: TypeChecker, call: CallExpression, context: CheckContext): SinterType {
  const argumentTypes = call.arguments.map(arg => checkExpression(checker, arg, context));
  return call.callee.kind === 'identifier'
    ? checkDirectCall(checker, call, call.callee, argumentTypes, context)
    : checkMemberCall(checker, call, call.callee, argumentTypes, context);
}

function checkDirectCall(
  checker: TypeChecker,
  call: CallExpression,
  callee: Identifier,
  argumentTypes: SinterType[],
  context: CheckContext
): SinterType {
  const entry = checker.resolution.bindings.get(callee);
  if (!entry) return commonTypes.error;

  switch (entry.kind) {
    case 'builtin':
      call.arguments.forEach((arg, i) => {
        const type = argumentTypes[i];
        if (!isError(type) && !isScalar(type)) {
          checker.diagnostics.addError('TypeMismatchError',
            `Argument ${i + 1} of '${entry.name}' has type '${typeToString(type)}'; only int, float, double, boolean and str can be printed`,
            arg.location);
        }
      });
      checker.callTargets.set(call, { kind: 'builtin', name: entry.name });
      return commonTypes.void;
    case 'function': {
      const target = checker.resolveOverload(entry.name, entry.overloads, argumentTypes, call.location);
      if (!target) return commonTypes.error;
      checker.callTargets.set(call, { kind: 'function', target });
      return target.returnType;
    }
    case 'method': {
      const target = checker.resolveOverload(entry.name, findMethods(entry.owner, entry.name, typesEqual), argumentTypes, call.location);
      if (!target) return commonTypes.error;
      checkMethodAccess(checker, target, context, callee.location);
      if (target.isStatic) {
        checker.callTargets.set(call, { kind: 'static', target });
      } else {
        if (context.isStatic) {
          checker.diagnostics.addError('TypeMismatchError',
            `Instance method '${target.name}' cannot be called from static function '${context.name}'`, callee.location);
        }
        checker.callTargets.set(call, { kind: 'method', target });
      }
      return target.returnType;
    }
    default:
      checker.diagnostics.addError('TypeMismatchError', `'${entry.name}' is not callable`, callee.location);
      return commonTypes.error;
  }
}

function checkMethodAccess(checker: TypeChecker, method: MethodInfo, context: CheckContext, location: SourceLocation): void {
  if (!checker.canAccess(method.owner, method.visibility, context)) {
    checker.diagnostics.addError('VisibilityError',
      `Method '${method.name}' of class '${method.owner.name}' is ${method.visibility}`, location);
  }
}

function expectArity(checker: TypeChecker, call: CallExpression, expected: SinterType[], name: string): boolean {
  const argumentTypes = call.arguments.map(arg => checker.expressionTypes.get(arg) ?? commonTypes.error);
  if (argumentTypes.length !== expected.length) {
    checker.diagnostics.addError('TypeMismatchError',
      `'${name}' takes ${expected.length} argument(s), got ${argumentTypes.length}`, call.location);
    return false;
  }
  let ok = true;
  argumentTypes.forEach((type, i) => {
    if (!checker.assignable(type, expected[i])) {
      checker.requireAssignable(type, expected[i], call.arguments[i].location, `argument ${i + 1} of '${name}'`);
      ok = false;
    }
  });
  return ok;
}

function formatOf(name: string): SerialFormat {
  return name.endsWith('json') ? 'json' : 'xml';
}

function checkMemberCall(
  checker: TypeChecker,
  call: CallExpression,
  callee: MemberExpression,
  argumentTypes: SinterType[],
  context: CheckContext
): SinterType {
  const name = callee.property.name;
  const location = callee.property.location;

  const owner = staticReceiver(checker, callee.object);
  if (owner) {
    if (!(owner instanceof ClassInfo)) {
      checker.diagnostics.addError('UndefinedMethodError', `Interface '${owner.name}' has no static function '${name}'`, location);
      return commonTypes.error;
    }
    return checkStaticCall(checker, call, owner, name, argumentTypes, context);
  }

  const objectType = checkExpression(checker, callee.object, context);
  if (isError(objectType)) return objectType;

  if (name === 'clean' || name === 'release') {
    if (!isPointerTo(objectType)) {
      checker.diagnostics.addError('TypeMismatchError',
        `'.${name}()' requires a pointer, got '${typeToString(objectType)}'`, location);
      return commonTypes.error;
    }
    expectArity(checker, call, [], name);
    checker.callTargets.set(call, { kind: name, receiver: callee.object });
    return name === 'release' ? objectType : commonTypes.void;
  }

  if (name === 'as_json' || name === 'as_xml') {
    const cls = receiverClass(checker, objectType);
    if (!cls) {
      checker.diagnostics.addError('TypeMismatchError',
        `'.${name}()' requires a class value or pointer, got '${typeToString(objectType)}'`, location);
      return commonTypes.error;
    }
    expectArity(checker, call, [], name);
    checker.callTargets.set(call, { kind: 'serialize', format: formatOf(name), cls, receiver: callee.object });
    return commonTypes.str;
  }

  if (name === 'new' || name === 'from_json' || name === 'from_xml') {
    checker.diagnostics.addError('TypeMismatchError', `'${name}' must be called on a class name`, location);
    return commonTypes.error;
  }

  const iface = receiverInterface(checker, objectType);
  if (iface) {
    const candidates = allInterfaceMethods(iface).filter(m => m.name === name);
    if (candidates.length === 0) {
      checker.diagnostics.addError('UndefinedMethodError', `Interface '${iface.name}' has no method '${name}'`, location);
      return commonTypes.error;
    }
    const method = checker.resolveOverload(name, candidates, argumentTypes, call.location);
    if (!method) return commonTypes.error;
    checker.callTargets.set(call, { kind: 'interface', iface, method, receiver: callee.object });
    return method.returnType;
  }

  const cls = receiverClass(checker, objectType);
  if (!cls) {
    checker.diagnostics.addError('UndefinedMethodError',
      `Type '${typeToString(objectType)}' has no method '${name}'`, location);
    return commonTypes.error;
  }
  const candidates = findMethods(cls, name, typesEqual);
  if (candidates.length === 0) {
    checker.diagnostics.addError('UndefinedMethodError', `Class '${cls.name}' has no method '${name}'`, location);
    return commonTypes.error;
  }
  const method = checker.resolveOverload(name, candidates, argumentTypes, call.location);
  if (!method) return commonTypes.error;
  checkMethodAccess(checker, method, context, location);
  if (method.isStatic) {
    checker.diagnostics.addError('TypeMismatchError',
      `Static function '${name}' must be called as '${method.owner.name}.${name}()'`, location);
    return commonTypes.error;
  }
  checker.callTargets.set(call, { kind: 'method', target: method, receiver: callee.object });
  return method.returnType;
}

function isPointerTo(type: SinterType): boolean {
  return type.kind === 'pointer' && (type.target.kind === 'class' || type.target.kind === 'interface');
}

function checkStaticCall(
  checker: TypeChecker,
  call: CallExpression,
  cls: ClassInfo,
  name: string,
  argumentTypes: SinterType[],
  context: CheckContext
): SinterType {
  const location = call.callee.location;
  const pointer = createPointerType(createClassType(cls.name));

  switch (name) {
    case 'new':
      expectArity(checker, call, [], `${cls.name}.new`);
      checker.callTargets.set(call, { kind: 'new', cls });
      return pointer;
    case 'from_json':
    case 'from_xml':
      expectArity(checker, call, [commonTypes.str], `${cls.name}.${name}`);
      checker.callTargets.set(call, { kind: 'deserialize', format: formatOf(name), cls });
      return pointer;
    case 'as_json':
    case 'as_xml':
    case 'clean':
    case 'release':
      checker.diagnostics.addError('TypeMismatchError', `'${name}' must be called on an object, not on class '${cls.name}'`, location);
      return commonTypes.error;
  }

  const all = findMethods(cls, name, typesEqual);
  const candidates = all.filter(m => m.isStatic);
  if (candidates.length === 0) {
    checker.diagnostics.addError(all.length > 0 ? 'TypeMismatchError' : 'UndefinedMethodError',
      all.length > 0
        ? `Method '${name}' of class '${cls.name}' is not static`
        : `Class '${cls.name}' has no static function '${name}'`, location);
    return commonTypes.error;
  }
  const target = checker.resolveOverload(`${cls.name}.${name}`, candidates, argumentTypes, call.location);
  if (!target) return commonTypes.error;
  checkMethodAccess(checker, target, context, location);
  checker.callTargets.set(call, { kind: 'static', target });
  return target.returnType;
}
