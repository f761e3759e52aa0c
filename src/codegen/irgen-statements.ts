import {
  AssignmentStatement, BlockStatement, ForStatement, IfStatement, IncrementStatement, ReturnStatement, Statement,
  VariableDeclaration, WhileStatement
} from '../types';
import { isPrimitive } from '../type-utils';
import { CodegenError } from './codegen-error';
import { FunctionContext, IRLowering, LoopLabels, defaultValue } from './irgen';
import { constant } from './ir/ir-builder';
import { scalarType } from './ir/layout';
import { classRoutine } from './ir/symbols';
import {
  arithmeticOperator, coerce, copyRecord, generateCall, generateExpression, generateLValue, readLValue, writeLValue
} from './irgen-expressions';
import { createDString } from './irgen-dstring';

export function generateBlock(lowering: IRLowering, context: FunctionContext, block: BlockStatement): void {
  block.body.forEach(statement => generateStatement(lowering, context, statement));
}

export function generateStatement(lowering: IRLowering, context: FunctionContext, statement: Statement): void {
  const { builder } = context;
  builder.location = statement.location;

  switch (statement.kind) {
    case 'block':
      generateBlock(lowering, context, statement);
      break;
    case 'variable':
      generateVariable(lowering, context, statement);
      break;
    case 'assignment':
      generateAssignment(lowering, context, statement);
      break;
    case 'increment':
      generateIncrement(lowering, context, statement);
      break;
    case 'expression':
      if (statement.expression.kind === 'call') {
        generateCall(lowering, context, statement.expression);
      } else {
        generateExpression(lowering, context, statement.expression);
      }
      break;
    case 'if':
      generateIf(lowering, context, statement);
      break;
    case 'while':
      generateWhile(lowering, context, statement);
      break;
    case 'for':
      generateFor(lowering, context, statement);
      break;
    case 'return':
      generateReturn(lowering, context, statement);
      break;
    case 'break':
    case 'continue': {
      const loop = innermostLoop(context);
      builder.br(statement.kind === 'break' ? loop.breakLabel : loop.continueLabel);
      break;
    }
  }
}

function innermostLoop(context: FunctionContext): LoopLabels {
  const loop = context.loops[context.loops.length - 1];
  if (!loop) throw new CodegenError(`Loop control outside a loop in '${context.name}'`);
  return loop;
}

function generateVariable(lowering: IRLowering, context: FunctionContext, declaration: VariableDeclaration): void {
  const { builder } = context;
  const name = declaration.name.name;
  const type = lowering.bindingType(declaration);
  const initializer = declaration.initializer;

  if (initializer?.kind === 'dstring' && lowering.analysis.types.dstringBindings.has(declaration)) {
    const site = createDString(lowering, context, initializer, name);
    context.locals.set(declaration, { kind: 'dstring', record: site.record, index: site.index });
    return;
  }

  if (type.kind === 'class') {
    const cls = lowering.classNamed(type.name);
    const record = builder.record(cls.name, name);
    if (initializer) {
      copyRecord(lowering, context, record, generateExpression(lowering, context, initializer), cls);
    } else {
      builder.call(classRoutine(cls, '__init'), [record], 'void');
    }
    context.locals.set(declaration, { kind: 'record', record, cls });
    return;
  }

  const irType = scalarType(type);
  const address = builder.alloca(irType, `${name}.addr`);
  const value = initializer
    ? coerce(lowering, context, generateExpression(lowering, context, initializer), lowering.expressionType(initializer), type)
    : defaultValue(irType);
  builder.store(address, value);
  context.locals.set(declaration, { kind: 'slot', address, type: irType });
}

function generateAssignment(lowering: IRLowering, context: FunctionContext, statement: AssignmentStatement): void {
  const target = generateLValue(lowering, context, statement.target);
  const value = generateExpression(lowering, context, statement.value);
  const valueType = lowering.expressionType(statement.value);

  if (statement.operator === '=') {
    writeLValue(lowering, context, target, value, valueType);
    return;
  }
  if (target.kind !== 'slot' && target.kind !== 'field') {
    throw new CodegenError(`Operator '${statement.operator}' needs a scalar target`, statement.location);
  }

  const current = readLValue(lowering, context, target);
  const irType = scalarType(target.type);
  const operator = statement.operator.slice(0, -1);
  const result = operator === '+' && isPrimitive(target.type, 'str')
    ? context.builder.binary('concat', 'str', current, value)
    : context.builder.binary(arithmeticOperator(operator), irType, current, value);
  writeLValue(lowering, context, target, result, target.type);
}

function generateIncrement(lowering: IRLowering, context: FunctionContext, statement: IncrementStatement): void {
  const target = generateLValue(lowering, context, statement.target);
  if (target.kind !== 'slot' && target.kind !== 'field') {
    throw new CodegenError(`Operator '${statement.operator}' needs a numeric target`, statement.location);
  }
  const irType = scalarType(target.type);
  const current = readLValue(lowering, context, target);
  const result = context.builder.binary(statement.operator === '++' ? 'add' : 'sub', irType, current, constant(irType, 1));
  writeLValue(lowering, context, target, result, target.type);
}

function generateIf(lowering: IRLowering, context: FunctionContext, statement: IfStatement): void {
  const { builder } = context;
  const condition = generateExpression(lowering, context, statement.condition);
  const thenLabel = builder.label('if.then');
  const elseLabel = statement.elseBranch ? builder.label('if.else') : undefined;
  const end = builder.label('if.end');

  builder.condbr(condition, thenLabel, elseLabel ?? end);
  builder.startBlock(thenLabel);
  generateStatement(lowering, context, statement.thenBranch);
  builder.br(end);
  if (statement.elseBranch && elseLabel) {
    builder.startBlock(elseLabel);
    generateStatement(lowering, context, statement.elseBranch);
    builder.br(end);
  }
  builder.startBlock(end);
}

function generateWhile(lowering: IRLowering, context: FunctionContext, statement: WhileStatement): void {
  const { builder } = context;
  const cond = builder.label('while.cond');
  const body = builder.label('while.body');
  const end = builder.label('while.end');

  builder.br(cond);
  builder.startBlock(cond);
  builder.location = statement.condition.location;
  builder.condbr(generateExpression(lowering, context, statement.condition), body, end);
  builder.startBlock(body);
  context.loops.push({ breakLabel: end, continueLabel: cond });
  generateStatement(lowering, context, statement.body);
  context.loops.pop();
  builder.br(cond);
  builder.startBlock(end);
}

function generateFor(lowering: IRLowering, context: FunctionContext, statement: ForStatement): void {
  const { builder } = context;
  if (statement.init) generateStatement(lowering, context, statement.init);

  const cond = builder.label('for.cond');
  const body = builder.label('for.body');
  const update = builder.label('for.update');
  const end = builder.label('for.end');

  builder.br(cond);
  builder.startBlock(cond);
  if (statement.condition) {
    builder.location = statement.condition.location;
    builder.condbr(generateExpression(lowering, context, statement.condition), body, end);
  } else {
    builder.br(body);
  }
  builder.startBlock(body);
  context.loops.push({ breakLabel: end, continueLabel: update });
  generateStatement(lowering, context, statement.body);
  context.loops.pop();
  builder.br(update);
  builder.startBlock(update);
  if (statement.update) generateStatement(lowering, context, statement.update);
  builder.br(cond);
  builder.startBlock(end);
}

function generateReturn(lowering: IRLowering, context: FunctionContext, statement: ReturnStatement): void {
  const { builder } = context;
  if (!statement.value) {
    builder.ret();
    return;
  }
  const value = generateExpression(lowering, context, statement.value);
  builder.ret(coerce(lowering, context, value, lowering.expressionType(statement.value), context.returnType));
}
