import {
  AssignmentStatement, Expression, IncrementStatement, ReturnStatement, SinterType, Statement, VariableDeclaration
} from '../types';
import { commonTypes, isError, isNumeric, isPrimitive, isVoid, typeToString, typesEqual } from '../type-utils';
import { CheckContext, TypeChecker } from './type-checker';
import { checkAssignmentTarget, checkExpression } from './expression-checker';

export function checkStatement(checker: TypeChecker, statement: Statement, context: CheckContext): void {
  switch (statement.kind) {
    case 'block':
      statement.body.forEach(s => checkStatement(checker, s, context));
      break;
    case 'variable':
      checkVariableDeclaration(checker, statement, context);
      break;
    case 'assignment':
      checkAssignment(checker, statement, context);
      break;
    case 'increment':
      checkIncrement(checker, statement, context);
      break;
    case 'expression':
      checkExpression(checker, statement.expression, context);
      break;
    case 'if':
      checkCondition(checker, statement.condition, context, 'if');
      checkStatement(checker, statement.thenBranch, context);
      if (statement.elseBranch) checkStatement(checker, statement.elseBranch, context);
      break;
    case 'while':
      checkCondition(checker, statement.condition, context, 'while');
      checkStatement(checker, statement.body, { ...context, loopDepth: context.loopDepth + 1 });
      break;
    case 'for': {
      if (statement.init) checkStatement(checker, statement.init, context);
      if (statement.condition) checkCondition(checker, statement.condition, context, 'for');
      const inner = { ...context, loopDepth: context.loopDepth + 1 };
      if (statement.update) checkStatement(checker, statement.update, inner);
      checkStatement(checker, statement.body, inner);
      break;
    }
    case 'return':
      checkReturn(checker, statement, context);
      break;
    case 'break':
    case 'continue':
      if (context.loopDepth === 0) {
        checker.diagnostics.addError('SyntaxError', `'${statement.kind}' outside of a loop`, statement.location);
      }
      break;
  }
}

function checkCondition(checker: TypeChecker, condition: Expression, context: CheckContext, statement: string): void {
  const type = checkExpression(checker, condition, context);
  if (!isError(type) && !isPrimitive(type, 'boolean')) {
    checker.diagnostics.addError('TypeMismatchError',
      `Condition of '${statement}' must be boolean, got '${typeToString(type)}'`, condition.location);
  }
}

function checkVariableDeclaration(checker: TypeChecker, declaration: VariableDeclaration, context: CheckContext): void {
  const name = declaration.name.name;
  let type: SinterType | undefined = declaration.typeAnnotation
    ? checker.declaredType(declaration.typeAnnotation, false)
    : undefined;

  if (declaration.initializer) {
    const valueType = checkExpression(checker, declaration.initializer, context);
    if (type) {
      checker.requireAssignable(valueType, type, declaration.initializer.location, `initializer of '${name}'`);
    } else if (valueType.kind === 'null') {
      checker.diagnostics.addError('TypeMismatchError',
        `Cannot infer the type of '${name}' from 'null'; add a type annotation`, declaration.initializer.location);
      type = commonTypes.error;
    } else if (isVoid(valueType)) {
      checker.diagnostics.addError('TypeMismatchError',
        `Cannot initialise '${name}' from an expression of type 'void'`, declaration.initializer.location);
      type = commonTypes.error;
    } else {
      type = valueType;
    }
    if (declaration.initializer.kind === 'dstring') {
      checker.dstringBindings.add(declaration);
    }
  }

  checker.bindingTypes.set(declaration, type ?? commonTypes.error);
}

// Checks a write to a variable binding that is not a field
function checkBindingWrite(checker: TypeChecker, target: Expression): void {
  if (target.kind !== 'identifier') return;
  const entry = checker.resolution.bindings.get(target);
  if (entry?.kind !== 'variable' || entry.declaration.kind !== 'variable') return;
  const declaration = entry.declaration;
  if (checker.dstringBindings.has(declaration)) {
    checker.diagnostics.addError('TypeMismatchError',
      `Cannot assign to D-string binding '${target.name}'`, target.location);
  } else if (declaration.isConst) {
    checker.diagnostics.addError('TypeMismatchError', `Cannot assign to const '${target.name}'`, target.location);
  }
}

function checkAssignment(checker: TypeChecker, assignment: AssignmentStatement, context: CheckContext): void {
  const targetType = checkAssignmentTarget(checker, assignment.target, context);
  checkBindingWrite(checker, assignment.target);
  const valueType = checkExpression(checker, assignment.value, context);
  if (isError(targetType) || isError(valueType)) return;

  if (assignment.operator === '=') {
    checker.requireAssignable(valueType, targetType, assignment.value.location, 'assignment');
    return;
  }

  const concatenates = assignment.operator === '+=' && isPrimitive(targetType, 'str') && isPrimitive(valueType, 'str');
  if (!concatenates && !(isNumeric(targetType) && typesEqual(targetType, valueType))) {
    checker.diagnostics.addError('TypeMismatchError',
      `Operator '${assignment.operator}' cannot be applied to '${typeToString(targetType)}' and '${typeToString(valueType)}'`,
      assignment.location);
  }
}

function checkIncrement(checker: TypeChecker, increment: IncrementStatement, context: CheckContext): void {
  const type = checkAssignmentTarget(checker, increment.target, context);
  checkBindingWrite(checker, increment.target);
  if (!isError(type) && !isNumeric(type)) {
    checker.diagnostics.addError('TypeMismatchError',
      `Operator '${increment.operator}' requires a numeric operand, got '${typeToString(type)}'`, increment.location);
  }
}

function checkReturn(checker: TypeChecker, statement: ReturnStatement, context: CheckContext): void {
  const expected = context.returnType;
  if (!statement.value) {
    if (!isVoid(expected) && !isError(expected)) {
      checker.diagnostics.addError('TypeMismatchError',
        `'${context.name}' must return a value of type '${typeToString(expected)}'`, statement.location);
    }
    return;
  }

  const type = checkExpression(checker, statement.value, context);
  if (isVoid(expected)) {
    checker.diagnostics.addError('TypeMismatchError',
      `'${context.name}' returns void and cannot return a value`, statement.value.location);
    return;
  }
  checker.requireAssignable(type, expected, statement.value.location, `return from '${context.name}'`);
}
