// Type checking: expression types, overload resolution, member access rules
// and interface conformance

import {
  BlockStatement, CallExpression, ClassDeclaration, Diagnostic, Expression, FunctionDeclaration, Identifier,
  InterfaceDeclaration, MemberExpression, Parameter, Program, SinterType, SourceLocation, TypeNode,
  VariableDeclaration, Visibility
} from '../types';
import {
  TypeHierarchy, commonTypes, isAssignable, isError, isVoid, signatureToString, typeToString, typesEqual
} from '../type-utils';
import { logger } from '../logger';
import { DiagnosticBag } from './diagnostics';
import { AttributeFlag, effectiveFlags } from './attribute-flags';
import { buildControlFlowGraph } from './control-flow';
import { ResolutionResult } from './scope-resolver';
import {
  BuiltinFunction, ClassInfo, FieldInfo, FunctionInfo, InterfaceInfo, InterfaceMethodInfo, LIFECYCLE_HOOKS,
  MethodInfo, VariableBinding, allImplementedInterfaces, allInterfaceMethods, findMethods, isSubclassOf,
  sameParameterTypes
} from './symbol-table';
import { checkStatement } from './statement-checker';
import { checkExpression } from './expression-checker';

export type SerialFormat = 'json' | 'xml';

export type CallTarget =
  | { kind: 'function'; target: FunctionInfo }
  // Without a receiver the call goes to the enclosing method's own object
  | { kind: 'method'; target: MethodInfo; receiver?: Expression }
  | { kind: 'static'; target: MethodInfo }
  | { kind: 'interface'; iface: InterfaceInfo; method: InterfaceMethodInfo; receiver: Expression }
  | { kind: 'builtin'; name: BuiltinFunction }
  | { kind: 'new'; cls: ClassInfo }
  | { kind: 'deserialize'; format: SerialFormat; cls: ClassInfo }
  | { kind: 'serialize'; format: SerialFormat; cls: ClassInfo; receiver: Expression }
  | { kind: 'clean'; receiver: Expression }
  | { kind: 'release'; receiver: Expression };

export type MemberTarget =
  | { kind: 'field'; field: FieldInfo }
  | { kind: 'derived'; field: FieldInfo; method?: MethodInfo };

export interface TypeCheckResult {
  expressionTypes: Map<Expression, SinterType>;
  bindingTypes: Map<VariableBinding, SinterType>;
  callTargets: Map<CallExpression, CallTarget>;
  // Field reads and writes, whether written `x` inside the class or `obj.x`
  memberTargets: Map<Identifier | MemberExpression, MemberTarget>;
  // Local bindings initialised from a D-string literal
  dstringBindings: Set<VariableDeclaration>;
  diagnostics: Diagnostic[];
}

export interface CheckContext {
  name: string;
  cls?: ClassInfo;
  isStatic: boolean;
  returnType: SinterType;
  loopDepth: number;
}

export interface Callable {
  parameterTypes: SinterType[];
  returnType: SinterType;
}

export class TypeChecker {
  readonly diagnostics = new DiagnosticBag('TypeChecker');
  readonly expressionTypes = new Map<Expression, SinterType>();
  readonly bindingTypes = new Map<VariableBinding, SinterType>();
  readonly callTargets = new Map<CallExpression, CallTarget>();
  readonly memberTargets = new Map<Identifier | MemberExpression, MemberTarget>();
  readonly dstringBindings = new Set<VariableDeclaration>();
  readonly hierarchy: TypeHierarchy;
  private flags = new Map<FieldInfo, Record<AttributeFlag, boolean>>();

  constructor(readonly resolution: ResolutionResult) {
    this.hierarchy = { classes: resolution.classes, interfaces: resolution.interfaces };
  }

  check(program: Program): TypeCheckResult {
    logger.debug('TypeChecker', `Checking ${program.filename}`);

    for (const declaration of program.declarations) {
      switch (declaration.kind) {
        case 'interface':
          this.checkInterface(declaration);
          break;
        case 'function':
          this.checkFunction(declaration);
          break;
        case 'class': {
          const cls = this.resolution.classes.get(declaration.name.name);
          if (cls && cls.declaration === declaration) this.checkClass(cls, declaration);
          break;
        }
      }
    }

    return {
      expressionTypes: this.expressionTypes,
      bindingTypes: this.bindingTypes,
      callTargets: this.callTargets,
      memberTargets: this.memberTargets,
      dstringBindings: this.dstringBindings,
      diagnostics: this.diagnostics.items
    };
  }

  // Resolved type of an annotation node, validated for use as a declared type
  declaredType(node: TypeNode, allowVoid: boolean): SinterType {
    const type = this.resolution.typeNodes.get(node) ?? commonTypes.error;
    const problem = this.typeProblem(type, allowVoid);
    if (problem) {
      this.diagnostics.addError('TypeMismatchError', problem, node.location);
      return commonTypes.error;
    }
    return type;
  }

  private typeProblem(type: SinterType, allowVoid: boolean): string | undefined {
    if (isVoid(type)) {
      return allowVoid ? undefined : "'void' is not a value type";
    }
    if (type.kind === 'interface') {
      return `Interface '${type.name}' can only be used behind a pointer ('${type.name}*')`;
    }
    if (type.kind === 'pointer' && type.target.kind !== 'class' && type.target.kind !== 'interface' && type.target.kind !== 'error') {
      return `Pointer type '${typeToString(type)}' is not allowed; only classes and interfaces may be pointed to`;
    }
    return undefined;
  }

  assignable(source: SinterType, target: SinterType): boolean {
    return isAssignable(source, target, this.hierarchy);
  }

  requireAssignable(source: SinterType, target: SinterType, location: SourceLocation, what: string): void {
    if (!this.assignable(source, target)) {
      this.diagnostics.addError('TypeMismatchError',
        `Type mismatch in ${what}: expected '${typeToString(target)}', got '${typeToString(source)}'`, location);
    }
  }

  flagsOf(field: FieldInfo): Record<AttributeFlag, boolean> {
    let flags = this.flags.get(field);
    if (!flags) {
      flags = effectiveFlags(field.declaration);
      this.flags.set(field, flags);
    }
    return flags;
  }

  isDerived(field: FieldInfo): boolean {
    return this.flagsOf(field).derived;
  }

  canAccess(owner: ClassInfo, visibility: Visibility, context: CheckContext): boolean {
    switch (visibility) {
      case 'public':
        return true;
      case 'private':
        return context.cls === owner;
      case 'protected':
        return context.cls !== undefined && isSubclassOf(context.cls, owner);
    }
  }

  // The zero-parameter instance method computing a derived field
  derivedMethod(field: FieldInfo): MethodInfo | undefined {
    return findMethods(field.owner, field.name, typesEqual)
      .find(method => method.parameterTypes.length === 0 && !method.isStatic && method.declaration !== undefined);
  }

  /**
   * Picks the overload a call binds to. A candidate accepts a call when the
   * arity matches and every argument is assignable to its parameter; among
   * several accepting candidates only an identical match wins.
   */
  resolveOverload<T extends Callable>(
    name: string,
    candidates: T[],
    argumentTypes: SinterType[],
    location: SourceLocation
  ): T | undefined {
    if (argumentTypes.some(isError)) return undefined;

    const accepting = candidates.filter(candidate =>
      candidate.parameterTypes.length === argumentTypes.length
      && candidate.parameterTypes.every((param, i) => this.assignable(argumentTypes[i], param)));
    if (accepting.length === 1) return accepting[0];

    const describe = (list: T[]): string =>
      list.map(c => signatureToString(name, c.parameterTypes, c.returnType)).join(', ');
    const args = argumentTypes.map(typeToString).join(', ');

    if (accepting.length === 0) {
      if (candidates.length === 1) {
        this.diagnostics.addError('TypeMismatchError',
          `No match for call ${name}(${args}); expected ${describe(candidates)}`, location);
      } else {
        this.diagnostics.addError('TypeMismatchError',
          `No overload of '${name}' matches (${args}); candidates: ${describe(candidates)}`, location);
      }
      return undefined;
    }

    const exact = accepting.filter(candidate => sameParameterTypes(candidate.parameterTypes, argumentTypes, typesEqual));
    if (exact.length === 1) return exact[0];

    this.diagnostics.addError('AmbiguousCallError',
      `Call ${name}(${args}) is ambiguous; candidates: ${describe(accepting)}`, location);
    return undefined;
  }

  private bindParameters(parameters: Parameter[]): void {
    for (const param of parameters) {
      this.bindingTypes.set(param, this.declaredType(param.typeAnnotation, false));
    }
  }

  private checkBody(body: BlockStatement, context: CheckContext): void {
    body.body.forEach(statement => checkStatement(this, statement, context));

    if (!isVoid(context.returnType) && !isError(context.returnType)) {
      if (buildControlFlowGraph(body).fallsThrough) {
        this.diagnostics.addError('MissingReturnError',
          `'${context.name}' must return a value of type '${typeToString(context.returnType)}' on every path`, body.location);
      }
    }
  }

  private checkFunction(declaration: FunctionDeclaration): void {
    const info = this.resolution.functionInfos.get(declaration);
    if (!info) return;
    this.bindParameters(declaration.parameters);
    const returnType = this.declaredType(declaration.returnType, true);

    if (info.name === 'main') {
      if (declaration.parameters.length > 0 || !(isVoid(returnType) || typesEqual(returnType, commonTypes.int))) {
        this.diagnostics.addError('TypeMismatchError',
          "Entry point 'main' must be declared as 'main() -> int' or 'main() -> void'", declaration.name.location);
      }
    }

    this.checkBody(declaration.body, { name: info.name, isStatic: true, returnType, loopDepth: 0 });
  }

  private checkInterface(declaration: InterfaceDeclaration): void {
    for (const method of declaration.methods) {
      method.parameters.forEach(param => this.declaredType(param.typeAnnotation, false));
      this.declaredType(method.returnType, true);
    }
  }

  private checkClass(cls: ClassInfo, declaration: ClassDeclaration): void {
    for (const field of cls.fields.values()) {
      this.checkField(cls, field);
    }

    for (const method of declaration.methods) {
      const info = this.resolution.methodInfos.get(method);
      if (!info) continue;
      this.bindParameters(method.parameters);
      const returnType = this.declaredType(method.returnType, true);

      if (LIFECYCLE_HOOKS.some(hook => hook === info.name)) {
        if (info.isStatic || info.parameterTypes.length > 0 || !isVoid(info.returnType)) {
          this.diagnostics.addError('TypeMismatchError',
            `Lifecycle method '${info.name}' must be declared as 'method ${info.name}() -> void'`, method.name.location);
        }
      }
      this.checkOverride(cls, info);

      this.checkBody(method.body, {
        name: `${cls.name}.${info.name}`,
        cls,
        isStatic: info.isStatic,
        returnType,
        loopDepth: 0
      });
    }

    this.checkConformance(cls, declaration);
  }

  private checkField(cls: ClassInfo, field: FieldInfo): void {
    const type = this.declaredType(field.declaration.typeAnnotation, false);
    if (type.kind === 'class' && this.embedsItself(cls, type.name, new Set())) {
      this.diagnostics.addError('TypeMismatchError',
        `Field '${field.name}' embeds class '${type.name}' by value, which would make '${cls.name}' infinitely large`,
        field.declaration.typeAnnotation.location);
    }

    const initializer = field.declaration.initializer;
    if (!initializer) return;
    if (initializer.kind !== 'literal') {
      this.diagnostics.addError('TypeMismatchError',
        `Initializer of field '${field.name}' must be a constant`, initializer.location);
      return;
    }
    const valueType = checkExpression(this, initializer, { name: cls.name, cls, isStatic: true, returnType: commonTypes.void, loopDepth: 0 });
    this.requireAssignable(valueType, type, initializer.location, `initializer of field '${field.name}'`);
  }

  // Whether a class-valued field of `name` would contain `cls` by value
  private embedsItself(cls: ClassInfo, name: string, seen: Set<string>): boolean {
    if (name === cls.name) return true;
    if (seen.has(name)) return false;
    seen.add(name);
    for (let current = this.resolution.classes.get(name); current; current = current.superClass) {
      if (current === cls) return true;
      for (const field of current.fields.values()) {
        if (field.type.kind === 'class' && this.embedsItself(cls, field.type.name, seen)) return true;
      }
    }
    return false;
  }

  // Class methods are bound statically; a redefinition in a subclass must keep the signature
  private checkOverride(cls: ClassInfo, method: MethodInfo): void {
    if (!cls.superClass || !method.declaration) return;
    const inherited = findMethods(cls.superClass, method.name, typesEqual)
      .find(base => sameParameterTypes(base.parameterTypes, method.parameterTypes, typesEqual));
    if (!inherited) return;
    if (!typesEqual(inherited.returnType, method.returnType) || inherited.isStatic !== method.isStatic) {
      this.diagnostics.addError('TypeMismatchError',
        `Method '${signatureToString(method.name, method.parameterTypes, method.returnType)}' of class '${cls.name}' ` +
        `does not match '${signatureToString(inherited.name, inherited.parameterTypes, inherited.returnType)}' ` +
        `inherited from '${inherited.owner.name}'`, method.declaration.name.location);
    }
  }

  private checkConformance(cls: ClassInfo, declaration: ClassDeclaration): void {
    const inheritedInterfaces = cls.superClass ? allImplementedInterfaces(cls.superClass) : [];

    for (const iface of allImplementedInterfaces(cls)) {
      if (inheritedInterfaces.includes(iface)) continue;
      const location = declaration.interfaces.find(ref => ref.name === iface.name)?.location ?? declaration.name.location;

      for (const required of allInterfaceMethods(iface)) {
        const wanted = signatureToString(required.name, required.parameterTypes, required.returnType);
        const candidates = findMethods(cls, required.name, typesEqual).filter(m => !m.isStatic);
        const match = candidates.find(m =>
          sameParameterTypes(m.parameterTypes, required.parameterTypes, typesEqual) && typesEqual(m.returnType, required.returnType));
        if (match) {
          if (match.visibility !== 'public') {
            this.diagnostics.addError('InterfaceConformanceError',
              `Class '${cls.name}' method '${wanted}' required by interface '${iface.name}' must be public`, location);
          }
          continue;
        }
        if (candidates.length === 0) {
          this.diagnostics.addError('InterfaceConformanceError',
            `Class '${cls.name}' does not implement '${wanted}' required by interface '${iface.name}'`, location);
        } else {
          const found = candidates[0];
          this.diagnostics.addError('InterfaceConformanceError',
            `Class '${cls.name}' method '${signatureToString(found.name, found.parameterTypes, found.returnType)}' ` +
            `does not match '${wanted}' required by interface '${iface.name}'`, location);
        }
      }
    }
  }
}

export function checkProgram(program: Program, resolution: ResolutionResult): TypeCheckResult {
  return new TypeChecker(resolution).check(program);
}
