// Reference interpreter for sinter IR modules. Runs generated code in process
// with the same semantics a native backend gives it: 32-bit wrapping int
// arithmetic, traps on division by zero, null dereference and double free.

import {
  IRBlock, IRFunction, IRInstruction, IRTable, IRModule, IRRecordLayout, IRScalarType, IRValue
} from '../codegen/ir/ir-types';
import { logger } from '../logger';
import { OutputSink, RuntimeSupport } from './runtime-support';
import {
  FunctionRef, InterfaceValue, MemoryBlock, RuntimeTrap, RuntimeValue, SlotAddress, TableRef
} from './values';

export interface InterpreterOptions {
  write?: OutputSink;
  // Instructions executed before the run is abandoned
  maxSteps?: number;
  maxCallDepth?: number;
}

export interface InterpreterStats {
  steps: number;
  calls: number;
  allocations: number;
  frees: number;
  // Calls to D-string render routines
  renders: number;
}

const defaultOptions: Required<InterpreterOptions> = {
  write: text => process.stdout.write(text),
  maxSteps: 50_000_000,
  maxCallDepth: 10_000
};

type Frame = Map<string, RuntimeValue>;

function isRenderRoutine(name: string): boolean {
  return name.startsWith('dstring.') && name.endsWith('.render');
}

export class IRInterpreter {
  private options: Required<InterpreterOptions>;
  private functions = new Map<string, IRFunction>();
  private blocks = new Map<IRFunction, Map<string, IRBlock>>();
  private layouts = new Map<string, IRRecordLayout>();
  private tables = new Map<string, IRTable>();
  private runtime: RuntimeSupport;
  private depth = 0;
  private heap = new Set<MemoryBlock>();
  readonly stats: InterpreterStats = { steps: 0, calls: 0, allocations: 0, frees: 0, renders: 0 };

  constructor(private readonly module: IRModule, options: InterpreterOptions = {}) {
    this.options = { ...defaultOptions, ...options };
    this.runtime = new RuntimeSupport(this.options.write);
    for (const fn of module.functions) {
      this.functions.set(fn.name, fn);
      this.blocks.set(fn, new Map(fn.blocks.map(block => [block.label, block])));
    }
    for (const layout of module.layouts) this.layouts.set(layout.name, layout);
    for (const table of module.tables) this.tables.set(table.name, table);
  }

  // Heap objects allocated and not yet freed
  get liveObjects(): number {
    return this.heap.size;
  }

  /**
   * Runs the entry point and returns the process exit code: the value of an
   * int-returning entry point, 0 otherwise.
   */
  run(entry: string | undefined = this.module.entryPoint): number {
    if (!entry) throw new RuntimeTrap('Module has no entry point');
    logger.debug('IRInterpreter', `Running @${entry}`);
    const result = this.call(entry, []);
    logger.debug('IRInterpreter',
      `@${entry} finished: ${this.stats.steps} step(s), ${this.stats.calls} call(s), ${this.liveObjects} live object(s)`);
    return typeof result === 'number' ? result | 0 : 0;
  }

  call(name: string, args: RuntimeValue[]): RuntimeValue | undefined {
    if (name.startsWith('rt.')) return this.runtime.call(name, args);

    const fn = this.functions.get(name);
    if (!fn) throw new RuntimeTrap(`Call to undefined function '@${name}'`);
    if (fn.parameters.length !== args.length) {
      throw new RuntimeTrap(`@${name} expects ${fn.parameters.length} argument(s), got ${args.length}`);
    }
    if (this.depth >= this.options.maxCallDepth) {
      throw new RuntimeTrap(`Call depth limit of ${this.options.maxCallDepth} exceeded in @${name}`);
    }

    this.stats.calls++;
    if (isRenderRoutine(name)) this.stats.renders++;
    const frame: Frame = new Map();
    fn.parameters.forEach((parameter, i) => frame.set(parameter.name, args[i]));

    this.depth++;
    try {
      return this.execute(fn, frame);
    } finally {
      this.depth--;
    }
  }

  private execute(fn: IRFunction, frame: Frame): RuntimeValue | undefined {
    const blocks = this.blocks.get(fn);
    let block = fn.blocks[0];
    for (;;) {
      let next: string | undefined;
      for (const instruction of block.instructions) {
        this.stats.steps++;
        if (this.stats.steps > this.options.maxSteps) {
          throw new RuntimeTrap(`Step limit of ${this.options.maxSteps} exceeded in @${fn.name}`);
        }
        switch (instruction.op) {
          case 'br':
            next = instruction.target;
            break;
          case 'condbr':
            next = this.value(frame, instruction.condition) === true ? instruction.whenTrue : instruction.whenFalse;
            break;
          case 'ret':
            return instruction.value ? this.value(frame, instruction.value) : undefined;
          case 'trap':
            throw new RuntimeTrap(instruction.message, fn.name);
          default:
            this.step(frame, instruction);
            continue;
        }
        break;
      }
      if (next === undefined) throw new RuntimeTrap(`Block '${block.label}' of @${fn.name} falls through`);
      const target = blocks?.get(next);
      if (!target) throw new RuntimeTrap(`Branch to unknown label '${next}' in @${fn.name}`);
      block = target;
    }
  }

  private step(frame: Frame, instruction: IRInstruction): void {
    switch (instruction.op) {
      case 'alloca':
        frame.set(instruction.dest.name, new SlotAddress(new MemoryBlock(undefined, 1, false), 0));
        break;
      case 'record':
        frame.set(instruction.dest.name, this.newRecord(instruction.layout, false));
        break;
      case 'alloc': {
        const block = this.newRecord(instruction.layout, true);
        this.heap.add(block);
        this.stats.allocations++;
        frame.set(instruction.dest.name, block);
        break;
      }
      case 'free': {
        const block = this.object(frame, instruction.pointer, 'free');
        if (!block.heap || block.parent) throw new RuntimeTrap(`free of non-heap object ${block.describe()}`);
        block.markFreed();
        this.heap.delete(block);
        this.stats.frees++;
        break;
      }
      case 'load': {
        const address = this.value(frame, instruction.address);
        if (!(address instanceof SlotAddress)) throw new RuntimeTrap('load through a non-address value');
        this.checkLive(address.block, 'load');
        frame.set(instruction.dest.name, address.block.slots[address.slot]);
        break;
      }
      case 'store': {
        const address = this.value(frame, instruction.address);
        if (!(address instanceof SlotAddress)) throw new RuntimeTrap('store through a non-address value');
        this.checkLive(address.block, 'store');
        address.block.slots[address.slot] = this.value(frame, instruction.value);
        break;
      }
      case 'getfield':
        frame.set(instruction.dest.name, this.object(frame, instruction.object, 'field read').slots[instruction.slot]);
        break;
      case 'setfield':
        this.object(frame, instruction.object, 'field write').slots[instruction.slot] = this.value(frame, instruction.value);
        break;
      case 'fieldaddr':
        frame.set(instruction.dest.name, new SlotAddress(this.object(frame, instruction.object, 'field address'), instruction.slot));
        break;
      case 'copy':
        this.copy(instruction.layout, this.object(frame, instruction.target, 'copy'), this.object(frame, instruction.source, 'copy'));
        break;
      case 'binary':
        frame.set(instruction.dest.name, binary(instruction.operator, instruction.type,
          this.value(frame, instruction.left), this.value(frame, instruction.right)));
        break;
      case 'compare':
        frame.set(instruction.dest.name, compare(instruction.operator,
          this.value(frame, instruction.left), this.value(frame, instruction.right)));
        break;
      case 'unary': {
        const operand = this.value(frame, instruction.operand);
        frame.set(instruction.dest.name, instruction.operator === 'not' ? operand !== true : negate(instruction.type, operand));
        break;
      }
      case 'call': {
        const result = this.call(instruction.callee, instruction.args.map(arg => this.value(frame, arg)));
        if (instruction.dest) frame.set(instruction.dest.name, result ?? null);
        break;
      }
      case 'callind': {
        const callee = this.value(frame, instruction.callee);
        if (!(callee instanceof FunctionRef)) throw new RuntimeTrap('Indirect call through a non-function value');
        const result = this.call(callee.name, instruction.args.map(arg => this.value(frame, arg)));
        if (instruction.dest) frame.set(instruction.dest.name, result ?? null);
        break;
      }
      case 'ifacefrom': {
        const object = this.value(frame, instruction.object);
        if (object === null) {
          frame.set(instruction.dest.name, null);
          break;
        }
        const block = this.object(frame, instruction.object, 'interface conversion');
        const table = block.slots[instruction.slot];
        if (!(table instanceof TableRef)) throw new RuntimeTrap(`${block.describe()} has no interface table in slot ${instruction.slot}`);
        frame.set(instruction.dest.name, new InterfaceValue(block, table));
        break;
      }
      case 'ifaceup': {
        const value = this.value(frame, instruction.value);
        if (value === null) {
          frame.set(instruction.dest.name, null);
          break;
        }
        if (!(value instanceof InterfaceValue)) throw new RuntimeTrap('ifaceup of a non-interface value');
        const name = value.table.table.supers[instruction.index];
        frame.set(instruction.dest.name, new InterfaceValue(value.object, this.table(name)));
        break;
      }
      case 'ifaceobj':
      case 'ifacetable': {
        const value = this.value(frame, instruction.value);
        if (value === null) {
          frame.set(instruction.dest.name, null);
          break;
        }
        if (!(value instanceof InterfaceValue)) throw new RuntimeTrap(`${instruction.op} of a non-interface value`);
        frame.set(instruction.dest.name, instruction.op === 'ifaceobj' ? value.object : value.table);
        break;
      }
      case 'tableget': {
        const table = this.value(frame, instruction.table);
        if (!(table instanceof TableRef)) throw new RuntimeTrap('Method lookup on a null interface');
        const entry = table.table.entries[instruction.index];
        if (entry === undefined) throw new RuntimeTrap(`Table ${table.table.name} has no entry ${instruction.index}`);
        frame.set(instruction.dest.name, new FunctionRef(entry));
        break;
      }
      default:
        throw new RuntimeTrap(`Unexpected instruction '${instruction.op}'`);
    }
  }

  private value(frame: Frame, value: IRValue): RuntimeValue {
    switch (value.kind) {
      case 'const':
        return value.value;
      case 'symbol':
        return value.type === 'fn' ? new FunctionRef(value.name) : this.table(value.name);
      case 'reg': {
        const current = frame.get(value.name);
        if (current === undefined) throw new RuntimeTrap(`Read of undefined register %${value.name}`);
        return current;
      }
    }
  }

  private object(frame: Frame, value: IRValue, action: string): MemoryBlock {
    const object = this.value(frame, value);
    if (object === null) throw new RuntimeTrap(`Null pointer dereference in ${action}`);
    if (!(object instanceof MemoryBlock)) throw new RuntimeTrap(`${action} on a non-object value`);
    this.checkLive(object, action);
    return object;
  }

  private checkLive(block: MemoryBlock, action: string): void {
    if (block.freed) throw new RuntimeTrap(`${action} on freed object ${block.describe()}`);
  }

  private table(name: string): TableRef {
    const table = this.tables.get(name);
    if (!table) throw new RuntimeTrap(`Unknown interface table '@${name}'`);
    return new TableRef(table);
  }

  private layout(name: string): IRRecordLayout {
    const layout = this.layouts.get(name);
    if (!layout) throw new RuntimeTrap(`Unknown record layout '%${name}'`);
    return layout;
  }

  private newRecord(name: string, heap: boolean, parent?: MemoryBlock): MemoryBlock {
    const layout = this.layout(name);
    const block = new MemoryBlock(layout, layout.slots.length, heap, parent);
    layout.slots.forEach((slot, i) => {
      if (typeof slot.type !== 'string') {
        block.slots[i] = this.newRecord(slot.type.record, heap, parent ?? block);
      }
    });
    return block;
  }

  // Copies the slots `name` declares; a larger source is sliced
  private copy(name: string, target: MemoryBlock, source: MemoryBlock): void {
    if (target === source) return;
    this.layout(name).slots.forEach((slot, i) => {
      if (typeof slot.type === 'string') {
        target.slots[i] = source.slots[i];
        return;
      }
      const into = target.slots[i];
      const from = source.slots[i];
      if (!(into instanceof MemoryBlock) || !(from instanceof MemoryBlock)) {
        throw new RuntimeTrap(`Embedded record '${slot.name}' is missing`);
      }
      this.copy(slot.type.record, into, from);
    });
  }
}

function numeric(value: RuntimeValue): number {
  if (typeof value !== 'number') throw new RuntimeTrap('Arithmetic on a non-numeric value');
  return value;
}

function text(value: RuntimeValue): string {
  if (typeof value !== 'string') throw new RuntimeTrap('String operation on a non-string value');
  return value;
}

function round(type: IRScalarType, value: number): number {
  switch (type) {
    case 'i32': return value | 0;
    case 'f32': return Math.fround(value);
    default: return value;
  }
}

function binary(operator: string, type: IRScalarType, left: RuntimeValue, right: RuntimeValue): RuntimeValue {
  if (operator === 'concat') return text(left) + text(right);
  const a = numeric(left);
  const b = numeric(right);
  switch (operator) {
    case 'add': return round(type, a + b);
    case 'sub': return round(type, a - b);
    case 'mul': return type === 'i32' ? Math.imul(a, b) : round(type, a * b);
    case 'div':
      if (type === 'i32') {
        if (b === 0) throw new RuntimeTrap('Integer division by zero');
        return (a / b) | 0;
      }
      return round(type, a / b);
    case 'rem':
      if (type === 'i32') {
        if (b === 0) throw new RuntimeTrap('Integer remainder by zero');
        return (a % b) | 0;
      }
      return round(type, a % b);
    default:
      throw new RuntimeTrap(`Unknown binary operator '${operator}'`);
  }
}

function identity(value: RuntimeValue): unknown {
  if (value instanceof InterfaceValue) return value.object;
  if (value instanceof SlotAddress) return `${value.block.id}:${value.slot}`;
  if (value instanceof TableRef) return value.table;
  if (value instanceof FunctionRef) return value.name;
  return value;
}

function compare(operator: string, left: RuntimeValue, right: RuntimeValue): boolean {
  switch (operator) {
    case 'eq': return identity(left) === identity(right);
    case 'ne': return identity(left) !== identity(right);
    case 'same': return Object.is(identity(left), identity(right));
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(operator, left < right ? -1 : left > right ? 1 : 0);
  }
  const a = numeric(left);
  const b = numeric(right);
  switch (operator) {
    case 'lt': return a < b;
    case 'le': return a <= b;
    case 'gt': return a > b;
    case 'ge': return a >= b;
    default: throw new RuntimeTrap(`Unknown comparison '${operator}'`);
  }
}

function ordered(operator: string, order: number): boolean {
  switch (operator) {
    case 'lt': return order < 0;
    case 'le': return order <= 0;
    case 'gt': return order > 0;
    case 'ge': return order >= 0;
    default: throw new RuntimeTrap(`Unknown comparison '${operator}'`);
  }
}

function negate(type: IRScalarType, operand: RuntimeValue): number {
  return round(type, -numeric(operand));
}

export function runModule(module: IRModule, options?: InterpreterOptions): { exitCode: number; stats: InterpreterStats } {
  const interpreter = new IRInterpreter(module, options);
  const exitCode = interpreter.run();
  return { exitCode, stats: interpreter.stats };
}
