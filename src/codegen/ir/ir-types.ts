// IR module representation produced by the sinter code generator

import { SourceLocation } from '../../types';

// `doc` is an opaque handle to a parsed JSON object or XML element
export type IRScalarType = 'i1' | 'i32' | 'f32' | 'f64' | 'str' | 'ptr' | 'iface' | 'fn' | 'doc';
export type IRType = IRScalarType | 'void';

export interface IRRegister {
  kind: 'reg';
  name: string;
  type: IRType;
}

export interface IRConstant {
  kind: 'const';
  type: IRScalarType;
  value: number | boolean | string | null;
}

// A function or interface table, by name
export interface IRSymbol {
  kind: 'symbol';
  name: string;
  type: 'fn' | 'ptr';
}

export type IRValue = IRRegister | IRConstant | IRSymbol;

export type IRBinaryOperator = 'add' | 'sub' | 'mul' | 'div' | 'rem' | 'concat';
// `same` is bit identity: NaN is the same as NaN, 0 is not the same as -0
export type IRCompareOperator = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge' | 'same';
export type IRUnaryOperator = 'neg' | 'not';

interface InstructionBase {
  location?: SourceLocation;
}

export interface AllocaInstruction extends InstructionBase {
  op: 'alloca';
  dest: IRRegister;
  type: IRScalarType;
}

// A record in the current frame
export interface RecordInstruction extends InstructionBase {
  op: 'record';
  dest: IRRegister;
  layout: string;
}

export interface AllocInstruction extends InstructionBase {
  op: 'alloc';
  dest: IRRegister;
  layout: string;
}

export interface FreeInstruction extends InstructionBase {
  op: 'free';
  pointer: IRValue;
}

export interface LoadInstruction extends InstructionBase {
  op: 'load';
  dest: IRRegister;
  address: IRValue;
}

export interface StoreInstruction extends InstructionBase {
  op: 'store';
  address: IRValue;
  value: IRValue;
}

export interface GetFieldInstruction extends InstructionBase {
  op: 'getfield';
  dest: IRRegister;
  layout: string;
  object: IRValue;
  slot: number;
}

export interface SetFieldInstruction extends InstructionBase {
  op: 'setfield';
  layout: string;
  object: IRValue;
  slot: number;
  value: IRValue;
}

export interface FieldAddrInstruction extends InstructionBase {
  op: 'fieldaddr';
  dest: IRRegister;
  layout: string;
  object: IRValue;
  slot: number;
}

// Copies the slots of `layout` from one record to another, embedded records by value
export interface CopyInstruction extends InstructionBase {
  op: 'copy';
  layout: string;
  target: IRValue;
  source: IRValue;
}

export interface BinaryInstruction extends InstructionBase {
  op: 'binary';
  dest: IRRegister;
  operator: IRBinaryOperator;
  type: IRScalarType;
  left: IRValue;
  right: IRValue;
}

export interface CompareInstruction extends InstructionBase {
  op: 'compare';
  dest: IRRegister;
  operator: IRCompareOperator;
  type: IRScalarType;
  left: IRValue;
  right: IRValue;
}

export interface UnaryInstruction extends InstructionBase {
  op: 'unary';
  dest: IRRegister;
  operator: IRUnaryOperator;
  type: IRScalarType;
  operand: IRValue;
}

export interface CallInstruction extends InstructionBase {
  op: 'call';
  dest?: IRRegister;
  callee: string;
  args: IRValue[];
}

export interface IndirectCallInstruction extends InstructionBase {
  op: 'callind';
  dest?: IRRegister;
  callee: IRValue;
  args: IRValue[];
}

// Class pointer to interface value through the object's table slot; null stays null
export interface IfaceFromInstruction extends InstructionBase {
  op: 'ifacefrom';
  dest: IRRegister;
  layout: string;
  object: IRValue;
  slot: number;
}

// Interface value to one of its direct super-interfaces; null stays null
export interface IfaceUpInstruction extends InstructionBase {
  op: 'ifaceup';
  dest: IRRegister;
  value: IRValue;
  index: number;
}

export interface IfaceObjInstruction extends InstructionBase {
  op: 'ifaceobj';
  dest: IRRegister;
  value: IRValue;
}

export interface IfaceTableInstruction extends InstructionBase {
  op: 'ifacetable';
  dest: IRRegister;
  value: IRValue;
}

export interface TableGetInstruction extends InstructionBase {
  op: 'tableget';
  dest: IRRegister;
  table: IRValue;
  index: number;
}

export interface BranchInstruction extends InstructionBase {
  op: 'br';
  target: string;
}

export interface CondBranchInstruction extends InstructionBase {
  op: 'condbr';
  condition: IRValue;
  whenTrue: string;
  whenFalse: string;
}

export interface ReturnInstruction extends InstructionBase {
  op: 'ret';
  value?: IRValue;
}

export interface TrapInstruction extends InstructionBase {
  op: 'trap';
  message: string;
}

export type IRInstruction =
  | AllocaInstruction
  | RecordInstruction
  | AllocInstruction
  | FreeInstruction
  | LoadInstruction
  | StoreInstruction
  | GetFieldInstruction
  | SetFieldInstruction
  | FieldAddrInstruction
  | CopyInstruction
  | BinaryInstruction
  | CompareInstruction
  | UnaryInstruction
  | CallInstruction
  | IndirectCallInstruction
  | IfaceFromInstruction
  | IfaceUpInstruction
  | IfaceObjInstruction
  | IfaceTableInstruction
  | TableGetInstruction
  | BranchInstruction
  | CondBranchInstruction
  | ReturnInstruction
  | TrapInstruction;

export type IRTerminator = BranchInstruction | CondBranchInstruction | ReturnInstruction | TrapInstruction;

export function isTerminator(instruction: IRInstruction): instruction is IRTerminator {
  return instruction.op === 'br' || instruction.op === 'condbr' || instruction.op === 'ret' || instruction.op === 'trap';
}

export interface IRBlock {
  label: string;
  instructions: IRInstruction[];
}

export interface IRFunction {
  name: string;
  parameters: IRRegister[];
  returnType: IRType;
  blocks: IRBlock[];
  location?: SourceLocation;
}

// Slot types: a scalar, or a record embedded by value
export type IRSlotType = IRScalarType | { record: string };

export interface IRLayoutSlot {
  name: string;
  type: IRSlotType;
  offset: number;
  size: number;
}

export interface IRRecordLayout {
  name: string;
  kind: 'class' | 'dstring';
  base?: string;
  slots: IRLayoutSlot[];
  size: number;
  align: number;
  // Interface name to the slot holding that interface's table
  interfaceSlots: Map<string, number>;
  // Slot holding the class table of classes in an inheritance hierarchy
  classTableSlot?: number;
  // Field name to slot
  fieldSlots: Map<string, number>;
}

// An interface table, or the class table (drop and release only) of a class with relatives
export interface IRTable {
  name: string;
  className: string;
  interfaceName?: string;
  // Function symbols: drop, release, then any interface methods
  entries: string[];
  // Tables of the direct super-interfaces
  supers: string[];
}

export interface IRExtern {
  name: string;
  parameterTypes: readonly IRScalarType[];
  returnType: IRType;
}

export interface IRModule {
  source: string;
  layouts: IRRecordLayout[];
  tables: IRTable[];
  externs: IRExtern[];
  functions: IRFunction[];
  entryPoint?: string;
}

// Fixed table entries ahead of the interface method pointers
export const TABLE_DROP_INDEX = 0;
export const TABLE_RELEASE_INDEX = 1;
export const TABLE_METHOD_BASE = 2;
