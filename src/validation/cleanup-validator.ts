// Pointer cleanup validation: a forward dataflow over each body's control-flow
// graph tracking which pointer bindings may own, or may have released, a heap object

import {
  BlockStatement, CallExpression, Diagnostic, Expression, Identifier, Parameter, Program, SourceLocation
} from '../types';
import { logger } from '../logger';
import { DiagnosticBag } from './diagnostics';
import { BasicBlock, CFGElement, SimpleStatement, buildControlFlowGraph } from './control-flow';
import { ResolutionResult } from './scope-resolver';
import { TypeCheckResult } from './type-checker';
import { ClassInfo, FieldInfo, LIFECYCLE_HOOKS, VariableBinding, hookOwnsField } from './symbol-table';

// `moved`: the object was handed to another binding or stored into an object
export type Ownership = 'unowned' | 'owned' | 'released' | 'moved';

type Tracked = VariableBinding | FieldInfo;

interface AllocationSite {
  kind: 'allocation' | 'field';
  label: string;
  location: SourceLocation;
}

interface BindingState {
  states: Set<Ownership>;
  // Allocations the binding may still own
  sites: Set<AllocationSite>;
}

type FlowState = Map<Tracked, BindingState>;

// What evaluating an expression yields, as far as ownership goes
type FlowValue =
  | { kind: 'allocation'; site: AllocationSite }
  | { kind: 'binding'; binding: Tracked }
  | { kind: 'other' };

const OTHER: FlowValue = { kind: 'other' };

function cloneState(state: FlowState): FlowState {
  const copy: FlowState = new Map();
  for (const [binding, entry] of state) {
    copy.set(binding, { states: new Set(entry.states), sites: new Set(entry.sites) });
  }
  return copy;
}

// Adds `from` into `into`; true when `into` grew
function joinInto(into: FlowState, from: FlowState): boolean {
  let changed = false;
  for (const [binding, entry] of from) {
    const existing = into.get(binding);
    if (!existing) {
      into.set(binding, { states: new Set(entry.states), sites: new Set(entry.sites) });
      changed = true;
      continue;
    }
    for (const s of entry.states) {
      if (!existing.states.has(s)) {
        existing.states.add(s);
        changed = true;
      }
    }
    for (const site of entry.sites) {
      if (!existing.sites.has(site)) {
        existing.sites.add(site);
        changed = true;
      }
    }
  }
  return changed;
}

function isField(binding: Tracked): binding is FieldInfo {
  return !('kind' in binding);
}

function bindingName(binding: Tracked): string {
  return isField(binding) ? binding.name : binding.name.name;
}

function unowned(): BindingState {
  return { states: new Set(['unowned']), sites: new Set() };
}

interface BodyInfo {
  name: string;
  location: SourceLocation;
  parameters: Parameter[];
  body: BlockStatement;
  cls?: ClassInfo;
  // Set for a class's own clean/release method
  hook?: string;
}

class BodyAnalysis {
  private reporting = false;
  // Leaked sites with the binding that held them; undefined for temporaries
  private leaked = new Map<AllocationSite, string | undefined>();
  private reported = new Set<string>();
  private sites = new Map<CallExpression, AllocationSite>();
  private fieldSites = new Map<FieldInfo, AllocationSite>();
  private ownFields: FieldInfo[] = [];

  constructor(
    private readonly info: BodyInfo,
    private readonly resolution: ResolutionResult,
    private readonly types: TypeCheckResult,
    private readonly diagnostics: DiagnosticBag
  ) {
    if (info.cls) {
      for (let current: ClassInfo | undefined = info.cls; current; current = current.superClass) {
        for (const field of current.fields.values()) {
          if (field.type.kind === 'pointer') this.ownFields.push(field);
        }
      }
    }
  }

  run(): void {
    const graph = buildControlFlowGraph(this.info.body);
    const entryState = this.initialState();
    const inStates = new Map<BasicBlock, FlowState>([[graph.entry, entryState]]);

    const worklist: BasicBlock[] = [graph.entry];
    while (worklist.length > 0) {
      const block = worklist.shift();
      if (!block) break;
      const state = inStates.get(block);
      if (!state) continue;
      const out = this.transferBlock(block, cloneState(state));
      for (const successor of block.successors) {
        let target = inStates.get(successor);
        if (!target) {
          target = new Map();
          inStates.set(successor, target);
          joinInto(target, out);
          worklist.push(successor);
        } else if (joinInto(target, out) && !worklist.includes(successor)) {
          worklist.push(successor);
        }
      }
    }

    // One reporting pass over the fixed point
    this.reporting = true;
    for (const block of graph.blocks) {
      const state = inStates.get(block);
      if (state) this.transferBlock(block, cloneState(state));
    }
    const exitState = inStates.get(graph.exit);
    if (exitState) {
      for (const [binding, entry] of exitState) {
        if (entry.states.has('owned')) this.leak(binding, entry);
      }
    }
    this.reportLeaks();
  }

  private initialState(): FlowState {
    const state: FlowState = new Map();
    for (const param of this.info.parameters) {
      if (this.isPointer(param)) state.set(param, unowned());
    }
    for (const field of this.ownFields) {
      if (this.info.hook && this.info.cls && hookOwnsField(this.info.cls, field)) {
        const site: AllocationSite = { kind: 'field', label: field.name, location: this.info.location };
        this.fieldSites.set(field, site);
        state.set(field, { states: new Set(['owned']), sites: new Set([site]) });
      } else {
        state.set(field, unowned());
      }
    }
    return state;
  }

  private isPointer(binding: VariableBinding): boolean {
    return this.types.bindingTypes.get(binding)?.kind === 'pointer';
  }

  private transferBlock(block: BasicBlock, state: FlowState): FlowState {
    for (const element of block.elements) {
      this.transfer(element, state);
    }
    return state;
  }

  private transfer(element: CFGElement, state: FlowState): void {
    switch (element.kind) {
      case 'statement':
        this.transferStatement(element.node, state);
        break;
      case 'condition':
        this.discard(this.evaluate(element.node, state));
        break;
      case 'return':
        if (element.node.value) {
          // A returned owner is not released; scope exits report it
          this.use(this.evaluate(element.node.value, state), element.node.value.location, state);
        }
        break;
      case 'scopeExit':
        for (const declaration of element.declarations) {
          const entry = state.get(declaration);
          if (entry?.states.has('owned')) this.leak(declaration, entry);
          state.delete(declaration);
        }
        break;
    }
  }

  private transferStatement(statement: SimpleStatement, state: FlowState): void {
    switch (statement.kind) {
      case 'variable': {
        if (!statement.initializer) {
          if (this.isPointer(statement)) state.set(statement, unowned());
          break;
        }
        const value = this.evaluate(statement.initializer, state);
        if (this.isPointer(statement)) {
          this.checkCopy(value, statement.initializer.location, state);
          this.bind(statement, value, state);
        } else {
          this.discard(value);
        }
        break;
      }
      case 'assignment': {
        const value = this.evaluate(statement.value, state);
        this.checkCopy(value, statement.value.location, state);
        const target = this.trackedTarget(statement.target);
        if (target && (!isField(target) || this.isHookField(target))) {
          const entry = state.get(target);
          if (entry?.states.has('owned')) this.leak(target, entry);
          this.bind(target, value, state);
        } else {
          this.evaluateTarget(statement.target, state);
          this.transferInto(value, state);
          if (target) state.set(target, unowned());
        }
        break;
      }
      case 'increment':
        this.evaluateTarget(statement.target, state);
        break;
      case 'expression':
        this.discard(this.evaluate(statement.expression, state));
        break;
    }
  }

  // Fields of the object whose clean/release method is being checked
  private isHookField(field: FieldInfo): boolean {
    return this.fieldSites.has(field);
  }

  private bind(binding: Tracked, value: FlowValue, state: FlowState): void {
    switch (value.kind) {
      case 'allocation':
        state.set(binding, { states: new Set(['owned']), sites: new Set([value.site]) });
        break;
      case 'binding': {
        if (value.binding === binding) break;
        const source = state.get(value.binding);
        state.set(binding, source
          ? { states: new Set(source.states), sites: new Set(source.sites) }
          : unowned());
        this.moveOut(value.binding, state);
        break;
      }
      case 'other':
        state.set(binding, unowned());
        break;
    }
  }

  // Storing into an object's field hands ownership to the object
  private transferInto(value: FlowValue, state: FlowState): void {
    if (value.kind === 'binding') this.moveOut(value.binding, state);
  }

  // A binding that may have owned its object no longer may
  private moveOut(binding: Tracked, state: FlowState): void {
    const entry = state.get(binding);
    if (!entry) return;
    const states = new Set(entry.states);
    if (states.delete('owned')) states.add('moved');
    state.set(binding, { states, sites: new Set() });
  }

  // An allocation whose value is dropped on the spot leaks
  private discard(value: FlowValue): void {
    if (this.reporting && value.kind === 'allocation' && !this.leaked.has(value.site)) {
      this.leaked.set(value.site, undefined);
    }
  }

  // Copying a pointer out of a binding reads it
  private checkCopy(value: FlowValue, location: SourceLocation, state: FlowState): void {
    if (value.kind === 'binding') this.use(value, location, state);
  }

  private trackedTarget(target: Expression): Tracked | undefined {
    if (target.kind !== 'identifier') return undefined;
    return this.trackedIdentifier(target);
  }

  private trackedIdentifier(identifier: Identifier): Tracked | undefined {
    const entry = this.resolution.bindings.get(identifier);
    if (entry?.kind === 'variable') {
      return this.isPointer(entry.declaration) ? entry.declaration : undefined;
    }
    if (entry?.kind === 'field' && entry.field.type.kind === 'pointer' && this.ownFields.includes(entry.field)) {
      return entry.field;
    }
    return undefined;
  }

  // Evaluates the parts of an assignment target that are read
  private evaluateTarget(target: Expression, state: FlowState): void {
    if (target.kind === 'identifier') return;
    if (target.kind === 'member') {
      this.use(this.evaluate(target.object, state), target.object.location, state);
    } else {
      this.discard(this.evaluate(target, state));
    }
  }

  private use(value: FlowValue, location: SourceLocation, state: FlowState): void {
    if (value.kind === 'binding') {
      const entry = state.get(value.binding);
      const name = bindingName(value.binding);
      if (entry?.states.has('released')) {
        this.report('UseAfterReleaseError', `Pointer '${name}' may be used after it was released`, location);
      } else if (entry?.states.has('moved')) {
        this.report('UseAfterReleaseError', `Pointer '${name}' may be used after its object was handed off`, location);
      }
    } else {
      this.discard(value);
    }
  }

  private evaluate(expression: Expression, state: FlowState): FlowValue {
    switch (expression.kind) {
      case 'literal':
      case 'dstring':
        return OTHER;
      case 'identifier': {
        const binding = this.trackedIdentifier(expression);
        return binding ? { kind: 'binding', binding } : OTHER;
      }
      case 'unary':
        this.use(this.evaluate(expression.operand, state), expression.operand.location, state);
        return OTHER;
      case 'binary':
        this.use(this.evaluate(expression.left, state), expression.left.location, state);
        this.use(this.evaluate(expression.right, state), expression.right.location, state);
        return OTHER;
      case 'member':
        this.use(this.evaluate(expression.object, state), expression.object.location, state);
        return OTHER;
      case 'call':
        return this.evaluateCall(expression, state);
    }
  }

  private evaluateCall(call: CallExpression, state: FlowState): FlowValue {
    const target = this.types.callTargets.get(call);

    if (target && (target.kind === 'clean' || target.kind === 'release')) {
      const receiver = this.evaluate(target.receiver, state);
      if (receiver.kind === 'binding') {
        const entry = state.get(receiver.binding);
        const name = bindingName(receiver.binding);
        if (entry?.states.has('released')) {
          this.report('DoubleReleaseError', `Pointer '${name}' may already have been released`, call.location);
        } else if (entry?.states.has('moved')) {
          this.report('DoubleReleaseError', `Pointer '${name}' is released after its object was handed off`, call.location);
        }
        state.set(receiver.binding, { states: new Set(['released']), sites: new Set() });
      } else {
        this.use(receiver, target.receiver.location, state);
      }
      // An allocation released on the spot is discharged
      return OTHER;
    }

    if (call.callee.kind === 'member') {
      this.use(this.evaluate(call.callee.object, state), call.callee.object.location, state);
    }
    for (const arg of call.arguments) {
      this.use(this.evaluate(arg, state), arg.location, state);
    }

    if (target && (target.kind === 'new' || target.kind === 'deserialize')) {
      return { kind: 'allocation', site: this.siteFor(call, target.cls) };
    }
    return OTHER;
  }

  private siteFor(call: CallExpression, cls: ClassInfo): AllocationSite {
    let site = this.sites.get(call);
    if (!site) {
      const method = call.callee.kind === 'member' ? call.callee.property.name : 'new';
      site = { kind: 'allocation', label: `${cls.name}.${method}()`, location: call.location };
      this.sites.set(call, site);
    }
    return site;
  }

  private leak(binding: Tracked, entry: BindingState): void {
    if (!this.reporting) return;
    for (const site of entry.sites) {
      if (this.leaked.get(site) === undefined) this.leaked.set(site, bindingName(binding));
    }
  }

  private reportLeaks(): void {
    for (const [site, name] of this.leaked) {
      if (site.kind === 'field') {
        this.diagnostics.addError('UnreleasedPointerError',
          `Pointer field '${site.label}' is not released on every path through '${this.info.name}'`, site.location);
      } else if (name === undefined) {
        this.diagnostics.addError('UnreleasedPointerError',
          `Object allocated by ${site.label} is never bound or released`, site.location);
      } else {
        this.diagnostics.addError('UnreleasedPointerError',
          `Pointer '${name}' allocated by ${site.label} may not be released on every path`, site.location);
      }
    }
  }

  private report(code: 'UseAfterReleaseError' | 'DoubleReleaseError', message: string, location: SourceLocation): void {
    if (!this.reporting) return;
    const key = `${code}:${location.start.line}:${location.start.column}`;
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.diagnostics.addError(code, message, location);
  }
}

export class CleanupValidator {
  private diagnostics = new DiagnosticBag('CleanupValidator');

  constructor(private readonly resolution: ResolutionResult, private readonly types: TypeCheckResult) {}

  validate(program: Program): Diagnostic[] {
    logger.debug('CleanupValidator', `Validating pointer cleanup in ${program.filename}`);

    for (const declaration of program.declarations) {
      if (declaration.kind === 'function') {
        this.analyze({
          name: declaration.name.name,
          location: declaration.name.location,
          parameters: declaration.parameters,
          body: declaration.body
        });
      } else if (declaration.kind === 'class') {
        const cls = this.resolution.classes.get(declaration.name.name);
        if (!cls || cls.declaration !== declaration) continue;
        for (const method of declaration.methods) {
          const name = method.name.name;
          const isHook = !method.isStatic && method.parameters.length === 0 && LIFECYCLE_HOOKS.some(hook => hook === name);
          this.analyze({
            name: `${cls.name}.${name}`,
            location: method.name.location,
            parameters: method.parameters,
            body: method.body,
            cls: method.isStatic ? undefined : cls,
            hook: isHook ? name : undefined
          });
        }
      }
    }
    return this.diagnostics.items;
  }

  private analyze(info: BodyInfo): void {
    new BodyAnalysis(info, this.resolution, this.types, this.diagnostics).run();
  }
}

export function validateCleanup(program: Program, resolution: ResolutionResult, types: TypeCheckResult): Diagnostic[] {
  return new CleanupValidator(resolution, types).validate(program);
}
