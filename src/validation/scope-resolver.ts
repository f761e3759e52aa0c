// Scope and symbol resolution: builds the symbol table, binds identifier
// uses to declarations and links the class/interface inheritance graph

import {
  ClassDeclaration, Declaration, Diagnostic, Expression, FunctionDeclaration, Identifier, InterfaceDeclaration,
  MethodDeclaration, Parameter, Program, SinterType, Statement, TypeNode, BlockStatement
} from '../types';
import { createClassType, createInterfaceType, createPointerType, createPrimitiveType, commonTypes, typeToString, typesEqual } from '../type-utils';
import { logger } from '../logger';
import { DiagnosticBag } from './diagnostics';
import { effectiveFlags, isDerivedField, plannedAccessors } from './attribute-flags';
import {
  BUILTIN_FUNCTIONS, BUILTIN_MEMBERS, ClassInfo, ClassScope, FieldInfo, FunctionInfo, InterfaceInfo, MethodInfo,
  Scope, SymbolEntry, findField, findMethods, sameParameterTypes
} from './symbol-table';

export interface ResolutionResult {
  globalScope: Scope;
  classes: Map<string, ClassInfo>;
  interfaces: Map<string, InterfaceInfo>;
  functions: Map<string, FunctionInfo[]>;
  // Identifier uses (including D-string placeholders and call targets) to their symbols
  bindings: Map<Identifier, SymbolEntry>;
  typeNodes: Map<TypeNode, SinterType>;
  methodInfos: Map<MethodDeclaration, MethodInfo>;
  functionInfos: Map<FunctionDeclaration, FunctionInfo>;
  // Classes ordered so that every base precedes its subclasses
  classOrder: ClassInfo[];
  diagnostics: Diagnostic[];
}

export class ScopeResolver {
  private diagnostics = new DiagnosticBag('ScopeResolver');
  private globalScope = new Scope('global');
  private classes = new Map<string, ClassInfo>();
  private interfaces = new Map<string, InterfaceInfo>();
  private functions = new Map<string, FunctionInfo[]>();
  private bindings = new Map<Identifier, SymbolEntry>();
  private typeNodes = new Map<TypeNode, SinterType>();
  private methodInfos = new Map<MethodDeclaration, MethodInfo>();
  private functionInfos = new Map<FunctionDeclaration, FunctionInfo>();
  private classOrder: ClassInfo[] = [];

  resolve(program: Program): ResolutionResult {
    logger.debug('ScopeResolver', `Resolving ${program.filename}`);

    // Pass 1: top-level names, so any declaration may refer to a later one
    for (const declaration of program.declarations) {
      this.registerDeclaration(declaration);
    }
    this.linkInheritance(program);
    this.detectCycles(program);
    this.classOrder = this.orderClasses(program);
    for (const iface of this.interfaces.values()) {
      this.registerInterfaceMembers(iface);
    }
    for (const info of this.functionInfos.values()) {
      this.registerFunctionSignature(info);
    }
    for (const cls of this.classOrder) {
      this.registerClassMembers(cls);
    }

    // Pass 2: bodies
    for (const declaration of program.declarations) {
      if (declaration.kind === 'function') {
        this.resolveCallable(declaration.parameters, declaration.body, this.globalScope);
      } else if (declaration.kind === 'class') {
        const cls = this.classes.get(declaration.name.name);
        if (!cls || cls.declaration !== declaration) continue;
        for (const method of declaration.methods) {
          this.resolveCallable(method.parameters, method.body, cls.scope);
        }
      }
    }

    return {
      globalScope: this.globalScope,
      classes: this.classes,
      interfaces: this.interfaces,
      functions: this.functions,
      bindings: this.bindings,
      typeNodes: this.typeNodes,
      methodInfos: this.methodInfos,
      functionInfos: this.functionInfos,
      classOrder: this.classOrder,
      diagnostics: this.diagnostics.items
    };
  }

  private registerDeclaration(declaration: Declaration): void {
    const name = declaration.name.name;

    if (declaration.kind === 'function') {
      const existing = this.globalScope.lookupLocal(name);
      if (existing && existing.kind !== 'function') {
        this.duplicate(name, declaration.name);
        return;
      }
      const info: FunctionInfo = { name, declaration, parameterTypes: [], returnType: commonTypes.error };
      this.functionInfos.set(declaration, info);
      const overloads = this.functions.get(name) ?? [];
      overloads.push(info);
      this.functions.set(name, overloads);
      if (!existing) {
        this.globalScope.declare({ kind: 'function', name, overloads });
      }
      return;
    }

    if (this.globalScope.lookupLocal(name)) {
      this.duplicate(name, declaration.name);
      return;
    }

    if (declaration.kind === 'class') {
      const info = new ClassInfo(declaration, this.globalScope);
      this.classes.set(name, info);
      this.globalScope.declare({ kind: 'class', name, info });
    } else {
      const info: InterfaceInfo = { name, declaration, superInterfaces: [], methods: [] };
      this.interfaces.set(name, info);
      this.globalScope.declare({ kind: 'interface', name, info });
    }
  }

  private linkInheritance(program: Program): void {
    for (const declaration of program.declarations) {
      if (declaration.kind === 'class') {
        const cls = this.classes.get(declaration.name.name);
        if (!cls || cls.declaration !== declaration) continue;
        this.linkClass(cls, declaration);
      } else if (declaration.kind === 'interface') {
        const iface = this.interfaces.get(declaration.name.name);
        if (!iface || iface.declaration !== declaration) continue;
        this.linkInterface(iface, declaration);
      }
    }
  }

  private linkClass(cls: ClassInfo, declaration: ClassDeclaration): void {
    if (declaration.superClass) {
      const ref = declaration.superClass;
      const base = this.classes.get(ref.name);
      if (base) {
        cls.superClass = base;
      } else if (this.interfaces.has(ref.name)) {
        this.diagnostics.addError('InvalidInheritanceError',
          `Class '${cls.name}' cannot extend interface '${ref.name}'; use 'implements'`, ref.location);
      } else {
        this.unresolved(`Unknown base class '${ref.name}'`, ref);
      }
    }

    for (const ref of declaration.interfaces) {
      const iface = this.interfaces.get(ref.name);
      if (iface) {
        if (cls.interfaces.includes(iface)) {
          this.diagnostics.addError('DuplicateDeclarationError',
            `Interface '${ref.name}' is listed more than once for class '${cls.name}'`, ref.location);
        } else {
          cls.interfaces.push(iface);
        }
      } else if (this.classes.has(ref.name)) {
        this.diagnostics.addError('InvalidInheritanceError',
          `Class '${cls.name}' cannot implement class '${ref.name}'; use 'extends'`, ref.location);
      } else {
        this.unresolved(`Unknown interface '${ref.name}'`, ref);
      }
    }
  }

  private linkInterface(iface: InterfaceInfo, declaration: InterfaceDeclaration): void {
    for (const ref of declaration.superInterfaces) {
      const parent = this.interfaces.get(ref.name);
      if (parent) {
        iface.superInterfaces.push(parent);
      } else if (this.classes.has(ref.name)) {
        this.diagnostics.addError('InvalidInheritanceError',
          `Interface '${iface.name}' cannot extend class '${ref.name}'`, ref.location);
      } else {
        this.unresolved(`Unknown interface '${ref.name}'`, ref);
      }
    }
  }

  /**
   * Gray/black depth-first search over extends/implements edges. An edge into
   * a gray node closes a cycle; it is reported once with its path and removed
   * so later stages see an acyclic graph.
   */
  private detectCycles(program: Program): void {
    type Node = { kind: 'class'; info: ClassInfo } | { kind: 'interface'; info: InterfaceInfo };
    const color = new Map<ClassInfo | InterfaceInfo, 'gray' | 'black'>();
    const path: string[] = [];

    const edgesOf = (node: Node): Node[] => node.kind === 'class'
      ? [
        ...(node.info.superClass ? [{ kind: 'class' as const, info: node.info.superClass }] : []),
        ...node.info.interfaces.map(info => ({ kind: 'interface' as const, info }))
      ]
      : node.info.superInterfaces.map(info => ({ kind: 'interface' as const, info }));

    const removeEdge = (from: Node, to: Node): void => {
      if (from.kind === 'class' && to.kind === 'class') {
        from.info.superClass = undefined;
      } else if (from.kind === 'class' && to.kind === 'interface') {
        from.info.interfaces = from.info.interfaces.filter(i => i !== to.info);
      } else if (from.kind === 'interface' && to.kind === 'interface') {
        from.info.superInterfaces = from.info.superInterfaces.filter(i => i !== to.info);
      }
    };

    const visit = (node: Node): void => {
      color.set(node.info, 'gray');
      path.push(node.info.name);
      for (const next of edgesOf(node)) {
        const state = color.get(next.info);
        if (state === 'gray') {
          const cycle = [...path.slice(path.indexOf(next.info.name)), next.info.name];
          this.diagnostics.addError('CyclicInheritanceError',
            `Cyclic inheritance: ${cycle.join(' -> ')}`, node.info.declaration.name.location);
          removeEdge(node, next);
        } else if (state === undefined) {
          visit(next);
        }
      }
      path.pop();
      color.set(node.info, 'black');
    };

    for (const declaration of program.declarations) {
      if (declaration.kind === 'class') {
        const info = this.classes.get(declaration.name.name);
        if (info && !color.has(info)) visit({ kind: 'class', info });
      } else if (declaration.kind === 'interface') {
        const info = this.interfaces.get(declaration.name.name);
        if (info && !color.has(info)) visit({ kind: 'interface', info });
      }
    }
  }

  private orderClasses(program: Program): ClassInfo[] {
    const ordered: ClassInfo[] = [];
    const place = (cls: ClassInfo): void => {
      if (ordered.includes(cls)) return;
      if (cls.superClass) place(cls.superClass);
      ordered.push(cls);
    };
    for (const declaration of program.declarations) {
      if (declaration.kind !== 'class') continue;
      const cls = this.classes.get(declaration.name.name);
      if (cls && cls.declaration === declaration) place(cls);
    }
    return ordered;
  }

  private registerInterfaceMembers(iface: InterfaceInfo): void {
    for (const signature of iface.declaration.methods) {
      const parameterTypes = signature.parameters.map(p => this.resolveType(p.typeAnnotation));
      const returnType = this.resolveType(signature.returnType);
      this.checkParameterNames(signature.parameters);
      if (iface.methods.some(m => m.name === signature.name.name && sameParameterTypes(m.parameterTypes, parameterTypes, typesEqual))) {
        this.duplicate(signature.name.name, signature.name);
        continue;
      }
      iface.methods.push({ name: signature.name.name, owner: iface, declaration: signature, parameterTypes, returnType });
    }
  }

  private registerFunctionSignature(info: FunctionInfo): void {
    info.parameterTypes = info.declaration.parameters.map(p => this.resolveType(p.typeAnnotation));
    info.returnType = this.resolveType(info.declaration.returnType);
    this.checkParameterNames(info.declaration.parameters);
    const overloads = this.functions.get(info.name) ?? [];
    const earlier = overloads.slice(0, overloads.indexOf(info));
    if (earlier.some(other => sameParameterTypes(other.parameterTypes, info.parameterTypes, typesEqual))) {
      this.diagnostics.addError('DuplicateDeclarationError',
        `Function '${info.name}' is already declared with parameters (${info.parameterTypes.map(typeToString).join(', ')})`,
        info.declaration.name.location);
    }
  }

  private registerClassMembers(cls: ClassInfo): void {
    const declaration = cls.declaration;

    for (const field of declaration.fields) {
      const name = field.name.name;
      const type = this.resolveType(field.typeAnnotation);
      if (cls.fields.has(name)) {
        this.duplicate(name, field.name);
        continue;
      }
      const inherited = cls.superClass ? findField(cls.superClass, name) : undefined;
      if (inherited) {
        this.diagnostics.addError('DuplicateDeclarationError',
          `Field '${name}' redeclares a field inherited from '${inherited.owner.name}'`, field.name.location);
        continue;
      }
      const info: FieldInfo = { name, declaration: field, owner: cls, type, visibility: field.visibility };
      cls.fields.set(name, info);
      cls.scope.declare({ kind: 'field', name, field: info });
    }

    for (const method of declaration.methods) {
      const name = method.name.name;
      const parameterTypes = method.parameters.map(p => this.resolveType(p.typeAnnotation));
      const returnType = this.resolveType(method.returnType);
      this.checkParameterNames(method.parameters);

      if (BUILTIN_MEMBERS.some(builtin => builtin === name)) {
        this.diagnostics.addError('DuplicateDeclarationError',
          `Method '${name}' conflicts with the built-in member of the same name`, method.name.location);
        continue;
      }
      const field = cls.fields.get(name);
      if (field && !isDerivedField(field.declaration)) {
        this.diagnostics.addError('DuplicateDeclarationError',
          `Method '${name}' conflicts with field '${name}' of class '${cls.name}' (only derived fields may share a name with a method)`,
          method.name.location);
        continue;
      }
      const overloads = cls.methods.get(name) ?? [];
      if (overloads.some(m => sameParameterTypes(m.parameterTypes, parameterTypes, typesEqual))) {
        this.duplicate(name, method.name);
        continue;
      }
      const info: MethodInfo = {
        name, owner: cls, declaration: method, parameterTypes, returnType,
        visibility: method.visibility, isStatic: method.isStatic
      };
      overloads.push(info);
      cls.methods.set(name, overloads);
      this.methodInfos.set(method, info);
    }

    // Accessors owed for each field, unless the class writes its own
    for (const field of cls.fields.values()) {
      const plan = plannedAccessors(field.declaration, effectiveFlags(field.declaration));
      if (plan.getter && !cls.methods.has(plan.getter)) {
        cls.methods.set(plan.getter, [{
          name: plan.getter, owner: cls, parameterTypes: [], returnType: field.type,
          visibility: 'public', isStatic: false, accessor: { kind: 'getter', field }
        }]);
      }
      if (plan.setter && !cls.methods.has(plan.setter)) {
        cls.methods.set(plan.setter, [{
          name: plan.setter, owner: cls, parameterTypes: [field.type], returnType: createPrimitiveType('void'),
          visibility: 'public', isStatic: false, accessor: { kind: 'setter', field }
        }]);
      }
    }
  }

  private checkParameterNames(parameters: Parameter[]): void {
    const seen = new Set<string>();
    for (const param of parameters) {
      if (seen.has(param.name.name)) {
        this.duplicate(param.name.name, param.name);
      }
      seen.add(param.name.name);
    }
  }

  private resolveType(node: TypeNode): SinterType {
    const cached = this.typeNodes.get(node);
    if (cached) return cached;

    let type: SinterType;
    switch (node.kind) {
      case 'primitiveType':
        type = createPrimitiveType(node.name);
        break;
      case 'pointerType':
        type = createPointerType(this.resolveType(node.target));
        break;
      case 'namedType':
        if (this.classes.has(node.name)) {
          type = createClassType(node.name);
        } else if (this.interfaces.has(node.name)) {
          type = createInterfaceType(node.name);
        } else {
          this.diagnostics.addError('UnresolvedReferenceError', `Unknown type '${node.name}'`, node.location);
          type = commonTypes.error;
        }
        break;
    }
    this.typeNodes.set(node, type);
    return type;
  }

  // Parameters and the outermost body statements share one scope
  private resolveCallable(parameters: Parameter[], body: BlockStatement, enclosing: Scope): void {
    const scope = new Scope('function', enclosing);
    for (const param of parameters) {
      scope.declare({ kind: 'variable', name: param.name.name, declaration: param });
    }
    for (const statement of body.body) {
      this.resolveStatement(statement, scope);
    }
  }

  private resolveStatement(statement: Statement, scope: Scope): void {
    switch (statement.kind) {
      case 'block': {
        const inner = new Scope('block', scope);
        statement.body.forEach(s => this.resolveStatement(s, inner));
        break;
      }
      case 'variable':
        // The initializer sees the enclosing binding, not the one being declared
        if (statement.initializer) this.resolveExpression(statement.initializer, scope);
        if (statement.typeAnnotation) this.resolveType(statement.typeAnnotation);
        if (!scope.declare({ kind: 'variable', name: statement.name.name, declaration: statement })) {
          this.duplicate(statement.name.name, statement.name);
        }
        break;
      case 'assignment':
        this.resolveExpression(statement.target, scope);
        this.resolveExpression(statement.value, scope);
        break;
      case 'increment':
        this.resolveExpression(statement.target, scope);
        break;
      case 'expression':
        this.resolveExpression(statement.expression, scope);
        break;
      case 'if':
        this.resolveExpression(statement.condition, scope);
        this.resolveStatement(statement.thenBranch, scope);
        if (statement.elseBranch) this.resolveStatement(statement.elseBranch, scope);
        break;
      case 'while':
        this.resolveExpression(statement.condition, scope);
        this.resolveStatement(statement.body, scope);
        break;
      case 'for': {
        const header = new Scope('loop', scope);
        if (statement.init) this.resolveStatement(statement.init, header);
        if (statement.condition) this.resolveExpression(statement.condition, header);
        if (statement.update) this.resolveStatement(statement.update, header);
        this.resolveStatement(statement.body, header);
        break;
      }
      case 'return':
        if (statement.value) this.resolveExpression(statement.value, scope);
        break;
      case 'break':
      case 'continue':
        break;
    }
  }

  private resolveExpression(expression: Expression, scope: Scope): void {
    switch (expression.kind) {
      case 'literal':
        break;
      case 'dstring':
        for (const part of expression.parts) {
          if (part.kind === 'reference') this.bindValue(part.identifier, scope);
        }
        break;
      case 'identifier':
        this.bindValue(expression, scope);
        break;
      case 'unary':
        this.resolveExpression(expression.operand, scope);
        break;
      case 'binary':
        this.resolveExpression(expression.left, scope);
        this.resolveExpression(expression.right, scope);
        break;
      case 'member':
        // The property is resolved against the object's type by the type checker
        this.resolveExpression(expression.object, scope);
        break;
      case 'call':
        if (expression.callee.kind === 'identifier') {
          this.bindCallee(expression.callee, scope);
        } else {
          this.resolveExpression(expression.callee.object, scope);
        }
        expression.arguments.forEach(arg => this.resolveExpression(arg, scope));
        break;
    }
  }

  private bindValue(identifier: Identifier, scope: Scope): void {
    const entry = scope.lookup(identifier.name);
    if (entry) {
      this.bindings.set(identifier, entry);
      return;
    }
    const cls = scope.enclosingClass();
    const hidden = cls ? findField(cls, identifier.name) : undefined;
    if (hidden) {
      this.unresolved(`Field '${identifier.name}' of class '${hidden.owner.name}' is private`, identifier);
    } else {
      this.unresolved(`Undefined identifier '${identifier.name}'`, identifier);
    }
  }

  // Calls look through class methods and global functions; variables are not callable
  private bindCallee(identifier: Identifier, scope: Scope): void {
    const name = identifier.name;
    for (let current: Scope | undefined = scope; current; current = current.parent) {
      if (current instanceof ClassScope && findMethods(current.owner, name, typesEqual).length > 0) {
        this.bindings.set(identifier, { kind: 'method', name, owner: current.owner });
        return;
      }
      if (current.kind === 'global') {
        const entry = current.lookupLocal(name);
        if (entry && entry.kind === 'function') {
          this.bindings.set(identifier, entry);
          return;
        }
      }
    }
    const builtin = BUILTIN_FUNCTIONS.find(b => b === name);
    if (builtin) {
      this.bindings.set(identifier, { kind: 'builtin', name: builtin });
      return;
    }
    this.unresolved(`Undefined function '${name}'`, identifier);
  }

  private duplicate(name: string, identifier: Identifier): void {
    this.diagnostics.addError('DuplicateDeclarationError', `'${name}' is already declared in this scope`, identifier.location);
  }

  private unresolved(message: string, identifier: Identifier): void {
    this.diagnostics.addError('UnresolvedReferenceError', message, identifier.location);
  }
}

export function resolveProgram(program: Program): ResolutionResult {
  return new ScopeResolver().resolve(program);
}
