// Instruction emission for one IR function

import { SourceLocation } from '../../types';
import {
  IRBinaryOperator, IRBlock, IRCompareOperator, IRConstant, IRFunction, IRInstruction, IRRegister, IRScalarType,
  IRSymbol, IRType, IRUnaryOperator, IRValue, isTerminator
} from './ir-types';

export function constant(type: IRScalarType, value: number | boolean | string | null): IRConstant {
  return { kind: 'const', type, value };
}

export function symbol(name: string, type: 'fn' | 'ptr' = 'fn'): IRSymbol {
  return { kind: 'symbol', name, type };
}

export const NULL_POINTER = constant('ptr', null);

export class FunctionBuilder {
  readonly fn: IRFunction;
  // Attached to every instruction emitted until changed
  location?: SourceLocation;
  private current: IRBlock;
  private names = new Set<string>();
  private counters = new Map<string, number>();

  constructor(name: string, parameters: { name: string; type: IRType }[], returnType: IRType, location?: SourceLocation) {
    const registers = parameters.map(p => this.register(p.name, p.type));
    this.current = { label: 'entry', instructions: [] };
    this.names.add('entry');
    this.fn = { name, parameters: registers, returnType, blocks: [this.current], location };
  }

  get parameters(): IRRegister[] {
    return this.fn.parameters;
  }

  get terminated(): boolean {
    const last = this.current.instructions[this.current.instructions.length - 1];
    return last !== undefined && isTerminator(last);
  }

  // A register whose name is unique within the function
  register(hint: string, type: IRType): IRRegister {
    return { kind: 'reg', name: this.unique(hint), type };
  }

  temp(type: IRType): IRRegister {
    return this.register('t', type);
  }

  label(hint: string): string {
    return this.unique(hint);
  }

  startBlock(label: string): void {
    this.current = { label, instructions: [] };
    this.fn.blocks.push(this.current);
  }

  emit(instruction: IRInstruction): void {
    // Code after a return or branch lands in a block nothing jumps to
    if (this.terminated) this.startBlock(this.label('dead'));
    this.current.instructions.push(this.location ? { ...instruction, location: this.location } : instruction);
  }

  alloca(type: IRScalarType, hint: string): IRRegister {
    const dest = this.register(hint, 'ptr');
    this.emit({ op: 'alloca', dest, type });
    return dest;
  }

  record(layout: string, hint: string): IRRegister {
    const dest = this.register(hint, 'ptr');
    this.emit({ op: 'record', dest, layout });
    return dest;
  }

  alloc(layout: string): IRRegister {
    const dest = this.temp('ptr');
    this.emit({ op: 'alloc', dest, layout });
    return dest;
  }

  load(address: IRValue, type: IRScalarType): IRRegister {
    const dest = this.temp(type);
    this.emit({ op: 'load', dest, address });
    return dest;
  }

  store(address: IRValue, value: IRValue): void {
    this.emit({ op: 'store', address, value });
  }

  getField(layout: string, object: IRValue, slot: number, type: IRScalarType): IRRegister {
    const dest = this.temp(type);
    this.emit({ op: 'getfield', dest, layout, object, slot });
    return dest;
  }

  setField(layout: string, object: IRValue, slot: number, value: IRValue): void {
    this.emit({ op: 'setfield', layout, object, slot, value });
  }

  fieldAddr(layout: string, object: IRValue, slot: number): IRRegister {
    const dest = this.temp('ptr');
    this.emit({ op: 'fieldaddr', dest, layout, object, slot });
    return dest;
  }

  binary(operator: IRBinaryOperator, type: IRScalarType, left: IRValue, right: IRValue): IRRegister {
    const dest = this.temp(type);
    this.emit({ op: 'binary', dest, operator, type, left, right });
    return dest;
  }

  compare(operator: IRCompareOperator, type: IRScalarType, left: IRValue, right: IRValue): IRRegister {
    const dest = this.temp('i1');
    this.emit({ op: 'compare', dest, operator, type, left, right });
    return dest;
  }

  unary(operator: IRUnaryOperator, type: IRScalarType, operand: IRValue): IRRegister {
    const dest = this.temp(type);
    this.emit({ op: 'unary', dest, operator, type, operand });
    return dest;
  }

  call(callee: string, args: IRValue[], returnType: IRType): IRRegister | undefined {
    const dest = returnType === 'void' ? undefined : this.temp(returnType);
    this.emit({ op: 'call', dest, callee, args });
    return dest;
  }

  // Direct call to a function known to return a value
  callValue(callee: string, args: IRValue[], returnType: IRScalarType): IRRegister {
    const dest = this.temp(returnType);
    this.emit({ op: 'call', dest, callee, args });
    return dest;
  }

  callIndirect(callee: IRValue, args: IRValue[], returnType: IRType): IRRegister | undefined {
    const dest = returnType === 'void' ? undefined : this.temp(returnType);
    this.emit({ op: 'callind', dest, callee, args });
    return dest;
  }

  br(target: string): void {
    this.emit({ op: 'br', target });
  }

  condbr(condition: IRValue, whenTrue: string, whenFalse: string): void {
    this.emit({ op: 'condbr', condition, whenTrue, whenFalse });
  }

  ret(value?: IRValue): void {
    this.emit({ op: 'ret', value });
  }

  trap(message: string): void {
    this.emit({ op: 'trap', message });
  }

  /**
   * Closes the last block and drops blocks no branch can reach.
   */
  finish(): IRFunction {
    if (!this.terminated) {
      if (this.fn.returnType === 'void') {
        this.ret();
      } else {
        this.trap(`'${this.fn.name}' reached its end without returning`);
      }
    }

    const byLabel = new Map(this.fn.blocks.map(block => [block.label, block]));
    const reachable = new Set<string>();
    const pending = ['entry'];
    while (pending.length > 0) {
      const label = pending.pop();
      if (label === undefined || reachable.has(label)) continue;
      reachable.add(label);
      const last = byLabel.get(label)?.instructions.at(-1);
      if (last?.op === 'br') pending.push(last.target);
      if (last?.op === 'condbr') pending.push(last.whenTrue, last.whenFalse);
    }
    this.fn.blocks = this.fn.blocks.filter(block => reachable.has(block.label));
    return this.fn;
  }

  private unique(hint: string): string {
    if (!this.names.has(hint)) {
      this.names.add(hint);
      return hint;
    }
    let n = this.counters.get(hint) ?? 0;
    let name: string;
    do {
      n++;
      name = `${hint}.${n}`;
    } while (this.names.has(name));
    this.counters.set(hint, n);
    this.names.add(name);
    return name;
  }
}
