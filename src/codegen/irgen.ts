// IR code generator for sinter

import {
  DStringLiteral, Expression, FunctionDeclaration, Literal, Program, SinterType, SourceLocation
} from '../types';
import { typesEqual } from '../type-utils';
import { LogLevel, logger } from '../logger';
import { GeneratorOptions, GeneratorResult, ICodeGenerator } from '../codegen-interface';
import { ValidatedProgram } from '../validation/validator';
import { ClassAnnotations } from '../validation/annotation-processor';
import { isDerivedField } from '../validation/attribute-flags';
import {
  ClassInfo, FieldInfo, FunctionInfo, MethodInfo, VariableBinding, findMethods, hookOwnsField
} from '../validation/symbol-table';
import { CodegenError } from './codegen-error';
import { FunctionBuilder, NULL_POINTER, constant, symbol } from './ir/ir-builder';
import {
  IRConstant, IRFunction, IRModule, IRRecordLayout, IRRegister, IRScalarType, IRType, IRValue, TABLE_DROP_INDEX,
  TABLE_RELEASE_INDEX
} from './ir/ir-types';
import { LayoutBuilder, scalarType } from './ir/layout';
import { printModule } from './ir/ir-printer';
import { classRoutine, classTableSymbol, functionSymbol, methodSymbol, tableSymbol } from './ir/symbols';
import { RUNTIME_EXTERNS, RuntimeExternName, declaredExterns } from './runtime-externs';
import { generateBlock } from './irgen-statements';
import { copyRecord } from './irgen-expressions';
import { SerializationRoutine, generateSerializationRoutine } from './irgen-serialization';

export interface IRGeneratorOptions extends GeneratorOptions {
  // Function run by the backend's startup code
  entryPoint?: string;
}

const defaultOptions: Required<IRGeneratorOptions> = {
  sourceMap: false,
  verbose: false,
  entryPoint: 'main'
};

export type LocalStorage =
  | { kind: 'slot'; address: IRRegister; type: IRScalarType }
  | { kind: 'record'; record: IRRegister; cls: ClassInfo }
  | { kind: 'dstring'; record: IRRegister; index: number };

export interface LoopLabels {
  breakLabel: string;
  continueLabel: string;
}

export interface FunctionContext {
  builder: FunctionBuilder;
  name: string;
  cls?: ClassInfo;
  // Receiver of an instance method
  self?: IRValue;
  returnType: SinterType;
  locals: Map<VariableBinding, LocalStorage>;
  loops: LoopLabels[];
}

export function defaultValue(type: IRScalarType): IRConstant {
  switch (type) {
    case 'i1': return constant('i1', false);
    case 'i32': return constant('i32', 0);
    case 'f32': return constant('f32', 0);
    case 'f64': return constant('f64', 0);
    case 'str': return constant('str', '');
    default: return constant(type, null);
  }
}

export function literalValue(literal: Literal, type: SinterType): IRConstant {
  if (literal.literalType === 'null') {
    return constant(type.kind === 'pointer' ? scalarType(type) : 'ptr', null);
  }
  const irType = scalarType(type);
  if (irType === 'f32' && typeof literal.value === 'number') {
    return constant(irType, Math.fround(literal.value));
  }
  return constant(irType, literal.value);
}

/**
 * Lowers one validated program. Holds the per-module state shared by the
 * statement, expression, D-string and serialization helpers.
 */
export class IRLowering {
  readonly layouts: LayoutBuilder;
  readonly dstringLayouts: IRRecordLayout[] = [];
  readonly dstringSites = new Map<DStringLiteral, number>();
  private functions: IRFunction[] = [];
  private externs = new Set<RuntimeExternName>();
  private requested = new Set<string>();
  private pending: { cls: ClassInfo; routine: SerializationRoutine }[] = [];

  constructor(
    readonly program: Program,
    readonly analysis: ValidatedProgram,
    readonly options: Required<IRGeneratorOptions>
  ) {
    this.layouts = new LayoutBuilder(analysis.resolution.classes);
  }

  lower(): IRModule {
    const { resolution } = this.analysis;
    this.layouts.build(resolution.classOrder);

    for (const declaration of this.program.declarations) {
      if (declaration.kind === 'function') this.lowerFunction(declaration);
    }
    for (const cls of resolution.classOrder) this.lowerClass(cls);

    while (this.pending.length > 0) {
      const next = this.pending.shift();
      if (next) this.addFunction(generateSerializationRoutine(this, next.cls, next.routine));
    }

    const entry = resolution.functions.get(this.options.entryPoint)?.[0];
    return {
      source: this.program.filename,
      layouts: [...this.layouts.layouts.values(), ...this.dstringLayouts],
      tables: [...this.layouts.tables.values()],
      externs: declaredExterns(this.externs),
      functions: this.functions,
      entryPoint: entry ? this.functionName(entry) : undefined
    };
  }

  addFunction(fn: IRFunction): void {
    logger.debug('IRGenerator', `@${fn.name}: ${fn.blocks.length} block(s)`);
    this.functions.push(fn);
  }

  // Queues a serialization routine for generation once per class
  requireRoutine(cls: ClassInfo, routine: SerializationRoutine): string {
    const key = `${cls.name}:${routine}`;
    if (!this.requested.has(key)) {
      this.requested.add(key);
      this.pending.push({ cls, routine });
    }
    return classRoutine(cls, routine);
  }

  callExtern(builder: FunctionBuilder, name: RuntimeExternName, args: IRValue[]): IRRegister | undefined {
    this.externs.add(name);
    const extern = RUNTIME_EXTERNS.find(e => e.name === name);
    return builder.call(name, args, extern?.returnType ?? 'void');
  }

  // Extern call whose result the caller needs
  callExternValue(builder: FunctionBuilder, name: RuntimeExternName, args: IRValue[]): IRRegister {
    const result = this.callExtern(builder, name, args);
    if (!result) throw new CodegenError(`Runtime function '${name}' returns no value`);
    return result;
  }

  expressionType(expression: Expression): SinterType {
    const type = this.analysis.types.expressionTypes.get(expression);
    if (!type) throw new CodegenError('Expression reached code generation without a type', expression.location);
    return type;
  }

  bindingType(binding: VariableBinding): SinterType {
    const type = this.analysis.types.bindingTypes.get(binding);
    if (!type) throw new CodegenError(`Binding '${binding.name.name}' reached code generation without a type`, binding.location);
    return type;
  }

  classNamed(name: string): ClassInfo {
    const cls = this.analysis.resolution.classes.get(name);
    if (!cls) throw new CodegenError(`Unknown class '${name}'`);
    return cls;
  }

  annotationsOf(cls: ClassInfo): ClassAnnotations {
    const annotations = this.analysis.annotations.classes.get(cls);
    if (!annotations) throw new CodegenError(`Class '${cls.name}' has no annotation summary`);
    return annotations;
  }

  layoutOf(cls: ClassInfo): IRRecordLayout {
    return this.layouts.layoutOf(cls);
  }

  fieldSlot(field: FieldInfo): number {
    const slot = this.layoutOf(field.owner).fieldSlots.get(field.name);
    if (slot === undefined) throw new CodegenError(`Field '${field.owner.name}.${field.name}' has no storage`);
    return slot;
  }

  interfaceSlot(cls: ClassInfo, iface: string): number {
    const slot = this.layoutOf(cls).interfaceSlots.get(iface);
    if (slot === undefined) throw new CodegenError(`Class '${cls.name}' has no table for interface '${iface}'`);
    return slot;
  }

  // IR type of a value of the given type; class values travel as record pointers
  irType(type: SinterType): IRType {
    if (type.kind === 'primitive' && type.name === 'void') return 'void';
    if (type.kind === 'class') return 'ptr';
    return scalarType(type);
  }

  functionName(fn: FunctionInfo): string {
    return functionSymbol(fn, this.analysis.resolution.functions.get(fn.name) ?? [fn]);
  }

  newContext(
    name: string,
    parameters: { binding?: VariableBinding; name: string; type: SinterType }[],
    returnType: SinterType,
    cls: ClassInfo | undefined,
    isStatic: boolean,
    location?: SourceLocation
  ): FunctionContext {
    const irParameters = parameters.map(p => ({ name: p.name, type: this.irType(p.type) }));
    if (cls && !isStatic) irParameters.unshift({ name: 'self', type: 'ptr' });
    const builder = new FunctionBuilder(name, irParameters, this.irType(returnType), location);
    const registers = [...builder.parameters];
    const self = cls && !isStatic ? registers.shift() : undefined;
    const context: FunctionContext = { builder, name, cls, self, returnType, locals: new Map(), loops: [] };

    builder.location = location;
    parameters.forEach((parameter, i) => {
      const register = registers[i];
      if (!parameter.binding) return;
      if (parameter.type.kind === 'class') {
        const paramClass = this.classNamed(parameter.type.name);
        const record = builder.record(paramClass.name, `${parameter.name}.rec`);
        copyRecord(this, context, record, register, paramClass);
        context.locals.set(parameter.binding, { kind: 'record', record, cls: paramClass });
      } else {
        const type = scalarType(parameter.type);
        const address = builder.alloca(type, `${parameter.name}.addr`);
        builder.store(address, register);
        context.locals.set(parameter.binding, { kind: 'slot', address, type });
      }
    });
    return context;
  }

  private lowerFunction(declaration: FunctionDeclaration): void {
    const info = this.analysis.resolution.functionInfos.get(declaration);
    if (!info) throw new CodegenError(`Function '${declaration.name.name}' was not resolved`, declaration.location);
    const context = this.newContext(
      this.functionName(info),
      declaration.parameters.map((p, i) => ({ binding: p, name: p.name.name, type: info.parameterTypes[i] })),
      info.returnType, undefined, true, declaration.location);
    generateBlock(this, context, declaration.body);
    this.addFunction(context.builder.finish());
  }

  private lowerClass(cls: ClassInfo): void {
    logger.debug('IRGenerator', `class ${cls.name}: ${this.layoutOf(cls).size} byte(s)`);
    for (const methods of cls.methods.values()) {
      for (const method of methods) {
        if (method.declaration) {
          this.lowerMethod(method);
        } else if (method.accessor) {
          this.lowerAccessor(method);
        }
      }
    }
    this.lowerInit(cls);
    this.lowerFinalize(cls);
    this.lowerDrop(cls);
    this.lowerRelease(cls);
  }

  private lowerMethod(method: MethodInfo): void {
    const declaration = method.declaration;
    if (!declaration) return;
    const context = this.newContext(
      methodSymbol(method),
      declaration.parameters.map((p, i) => ({ binding: p, name: p.name.name, type: method.parameterTypes[i] })),
      method.returnType, method.owner, method.isStatic, declaration.location);
    generateBlock(this, context, declaration.body);
    this.addFunction(context.builder.finish());
  }

  private lowerAccessor(method: MethodInfo): void {
    const accessor = method.accessor;
    if (!accessor) return;
    const { field } = accessor;
    const location = field.declaration.location;
    const slot = this.fieldSlot(field);
    const layout = field.owner.name;

    if (accessor.kind === 'getter') {
      const context = this.newContext(methodSymbol(method), [], field.type, method.owner, false, location);
      const { builder } = context;
      const self = this.selfOf(context);
      builder.ret(builder.getField(layout, self, slot, this.storedType(field.type)));
      this.addFunction(builder.finish());
      return;
    }

    const context = this.newContext(methodSymbol(method), [{ name: 'value', type: field.type }], method.returnType, method.owner, false, location);
    const { builder } = context;
    const self = this.selfOf(context);
    const value = builder.parameters[1];
    if (field.type.kind === 'class') {
      const fieldClass = this.classNamed(field.type.name);
      const target = builder.getField(layout, self, slot, 'ptr');
      copyRecord(this, context, target, value, fieldClass);
    } else {
      builder.setField(layout, self, slot, value);
    }
    builder.ret();
    this.addFunction(builder.finish());
  }

  // Stores literal initializers (defaults otherwise) and points every table slot at this class's tables
  private lowerInit(cls: ClassInfo): void {
    const context = this.newContext(classRoutine(cls, '__init'), [], voidType, cls, false, cls.declaration.location);
    const { builder } = context;
    const self = this.selfOf(context);
    if (cls.superClass) builder.call(classRoutine(cls.superClass, '__init'), [self], 'void');

    for (const field of cls.fields.values()) {
      if (isDerivedField(field.declaration)) continue;
      builder.location = field.declaration.location;
      const slot = this.fieldSlot(field);
      if (field.type.kind === 'class') {
        const embedded = builder.getField(cls.name, self, slot, 'ptr');
        builder.call(classRoutine(this.classNamed(field.type.name), '__init'), [embedded], 'void');
        continue;
      }
      const initializer = field.declaration.initializer;
      const value = initializer?.kind === 'literal'
        ? literalValue(initializer, field.type)
        : defaultValue(scalarType(field.type));
      builder.setField(cls.name, self, slot, value);
    }

    builder.location = cls.declaration.location;
    this.setTables(builder, cls, self);
    builder.ret();
    this.addFunction(builder.finish());
  }

  /**
   * Runs the user `clean` hook if there is one, then drops the pointer fields
   * the hook does not own (see `hookOwnsField`): all of them when there is no
   * hook. Embedded records are finalized in place.
   */
  private lowerFinalize(cls: ClassInfo): void {
    const context = this.newContext(classRoutine(cls, '__finalize'), [], voidType, cls, false, cls.declaration.location);
    const { builder } = context;
    const self = this.selfOf(context);

    const hook = this.lifecycleHook(cls, 'clean');
    if (hook) builder.call(methodSymbol(hook), [self], 'void');

    for (let current: ClassInfo | undefined = cls; current; current = current.superClass) {
      const owner: ClassInfo = current;
      for (const field of owner.fields.values()) {
        if (isDerivedField(field.declaration)) continue;
        if (hook && hookOwnsField(hook.owner, field)) continue;
        const slot = this.fieldSlot(field);
        const type = field.type;
        if (type.kind === 'class') {
          const embedded = builder.getField(owner.name, self, slot, 'ptr');
          builder.call(classRoutine(this.classNamed(type.name), '__finalize'), [embedded], 'void');
        } else if (type.kind === 'pointer' && type.target.kind === 'class') {
          const target = this.classNamed(type.target.name);
          const value = builder.getField(owner.name, self, slot, 'ptr');
          this.ifNotNull(builder, value, 'ptr', field.name, () => {
            this.callLifecycle(builder, target, value, '__drop');
            builder.setField(owner.name, self, slot, NULL_POINTER);
          });
        } else if (type.kind === 'pointer' && type.target.kind === 'interface') {
          const value = builder.getField(owner.name, self, slot, 'iface');
          const object = builder.temp('ptr');
          builder.emit({ op: 'ifaceobj', dest: object, value });
          this.ifNotNull(builder, object, 'ptr', field.name, () => {
            const table = builder.temp('ptr');
            builder.emit({ op: 'ifacetable', dest: table, value });
            const drop = builder.temp('fn');
            builder.emit({ op: 'tableget', dest: drop, table, index: TABLE_DROP_INDEX });
            builder.callIndirect(drop, [object], 'void');
          });
        }
      }
    }
    builder.ret();
    this.addFunction(builder.finish());
  }

  private lowerDrop(cls: ClassInfo): void {
    const context = this.newContext(classRoutine(cls, '__drop'), [], voidType, cls, false, cls.declaration.location);
    const { builder } = context;
    const self = this.selfOf(context);
    builder.call(classRoutine(cls, '__finalize'), [self], 'void');
    builder.emit({ op: 'free', pointer: self });
    builder.ret();
    this.addFunction(builder.finish());
  }

  private lowerRelease(cls: ClassInfo): void {
    const context = this.newContext(classRoutine(cls, '__release'), [], voidType, cls, false, cls.declaration.location);
    const { builder } = context;
    const hook = this.lifecycleHook(cls, 'release');
    if (hook) builder.call(methodSymbol(hook), [this.selfOf(context)], 'void');
    builder.ret();
    this.addFunction(builder.finish());
  }

  lifecycleHook(cls: ClassInfo, name: 'clean' | 'release'): MethodInfo | undefined {
    return findMethods(cls, name, typesEqual)
      .find(m => !m.isStatic && m.parameterTypes.length === 0 && m.declaration !== undefined);
  }

  // Points the class table slot and every interface table slot at this class's tables
  setTables(builder: FunctionBuilder, cls: ClassInfo, self: IRValue): void {
    const layout = this.layoutOf(cls);
    if (layout.classTableSlot !== undefined) {
      builder.setField(cls.name, self, layout.classTableSlot, symbol(classTableSymbol(cls), 'ptr'));
    }
    for (const [iface, slot] of layout.interfaceSlots) {
      builder.setField(cls.name, self, slot, symbol(tableSymbol(cls, iface), 'ptr'));
    }
  }

  // Drops or releases a class object, through its class table when subclasses may hide behind the pointer
  callLifecycle(builder: FunctionBuilder, cls: ClassInfo, object: IRValue, routine: '__drop' | '__release'): void {
    const slot = this.layoutOf(cls).classTableSlot;
    if (slot === undefined) {
      builder.call(classRoutine(cls, routine), [object], 'void');
      return;
    }
    const table = builder.getField(cls.name, object, slot, 'ptr');
    const fn = builder.temp('fn');
    builder.emit({ op: 'tableget', dest: fn, table, index: routine === '__drop' ? TABLE_DROP_INDEX : TABLE_RELEASE_INDEX });
    builder.callIndirect(fn, [object], 'void');
  }

  selfOf(context: FunctionContext): IRValue {
    if (!context.self) throw new CodegenError(`'${context.name}' has no receiver`);
    return context.self;
  }

  // Slot type as seen through getfield: embedded records come back as pointers
  storedType(type: SinterType): IRScalarType {
    return type.kind === 'class' ? 'ptr' : scalarType(type);
  }

  ifNotNull(builder: FunctionBuilder, value: IRValue, type: IRScalarType, hint: string, body: () => void): void {
    const isNull = builder.compare('eq', type, value, constant(type, null));
    const present = builder.label(`${hint}.present`);
    const done = builder.label(`${hint}.done`);
    builder.condbr(isNull, done, present);
    builder.startBlock(present);
    body();
    builder.br(done);
    builder.startBlock(done);
  }

}

const voidType: SinterType = { kind: 'primitive', name: 'void' };

export class IRGenerator implements ICodeGenerator {
  private options: Required<IRGeneratorOptions>;

  constructor(options: IRGeneratorOptions = {}) {
    this.options = { ...defaultOptions, ...options };
    if (this.options.verbose && !logger.isEnabled(LogLevel.DEBUG)) {
      logger.setLevel(LogLevel.DEBUG);
    }
  }

  lower(program: Program, analysis: ValidatedProgram): IRModule {
    logger.debug('IRGenerator', `Lowering ${program.filename}`);
    return new IRLowering(program, analysis, this.options).lower();
  }

  generate(program: Program, analysis: ValidatedProgram, filename?: string, sourceText?: string): GeneratorResult {
    const module = this.lower(program, analysis);
    const printed = printModule(module, {
      sourceMap: this.options.sourceMap,
      file: filename ?? `${program.filename}.ir`,
      sourceContent: sourceText
    });
    logger.debug('IRGenerator', `${module.functions.length} function(s), ${module.tables.length} table(s)`);
    return { module, source: printed.text, sourceMap: printed.sourceMap };
  }
}
