// Textual form of an IR module, with an optional source map back to sinter source

import { SourceMapGenerator } from 'source-map';
import { SourceLocation } from '../../types';
import {
  IRFunction, IRInstruction, IRTable, IRModule, IRRecordLayout, IRSlotType, IRType, IRValue
} from './ir-types';

export interface PrintOptions {
  sourceMap?: boolean;
  // Name of the emitted IR file, recorded in the map
  file?: string;
  sourceContent?: string;
}

export interface PrintResult {
  text: string;
  sourceMap?: string;
}

export function formatValue(value: IRValue): string {
  switch (value.kind) {
    case 'reg':
      return `%${value.name}`;
    case 'symbol':
      return `@${value.name}`;
    case 'const':
      if (value.value === null) return 'null';
      if (typeof value.value === 'string') return JSON.stringify(value.value);
      if (typeof value.value === 'number' && (value.type === 'f32' || value.type === 'f64') && Number.isInteger(value.value)) {
        return `${value.value}.0`;
      }
      return String(value.value);
  }
}

function typed(value: IRValue): string {
  return `${value.type} ${formatValue(value)}`;
}

function formatSlotType(type: IRSlotType): string {
  return typeof type === 'string' ? type : `%${type.record}`;
}

function formatArgs(args: IRValue[]): string {
  return args.map(typed).join(', ');
}

function result(dest: { name: string } | undefined): string {
  return dest ? `%${dest.name} = ` : '';
}

function resultType(dest: { type: IRType } | undefined): IRType {
  return dest?.type ?? 'void';
}

export function formatInstruction(instruction: IRInstruction): string {
  switch (instruction.op) {
    case 'alloca':
      return `%${instruction.dest.name} = alloca ${instruction.type}`;
    case 'record':
      return `%${instruction.dest.name} = record %${instruction.layout}`;
    case 'alloc':
      return `%${instruction.dest.name} = alloc %${instruction.layout}`;
    case 'free':
      return `free ${typed(instruction.pointer)}`;
    case 'load':
      return `%${instruction.dest.name} = load ${instruction.dest.type}, ${typed(instruction.address)}`;
    case 'store':
      return `store ${typed(instruction.value)}, ${typed(instruction.address)}`;
    case 'getfield':
      return `%${instruction.dest.name} = getfield %${instruction.layout}, ${formatValue(instruction.object)}, ${instruction.slot}`;
    case 'setfield':
      return `setfield %${instruction.layout}, ${formatValue(instruction.object)}, ${instruction.slot}, ${typed(instruction.value)}`;
    case 'fieldaddr':
      return `%${instruction.dest.name} = fieldaddr %${instruction.layout}, ${formatValue(instruction.object)}, ${instruction.slot}`;
    case 'copy':
      return `copy %${instruction.layout}, ${formatValue(instruction.target)}, ${formatValue(instruction.source)}`;
    case 'binary':
      return `%${instruction.dest.name} = ${instruction.operator} ${instruction.type} ${formatValue(instruction.left)}, ${formatValue(instruction.right)}`;
    case 'compare':
      return `%${instruction.dest.name} = cmp ${instruction.operator} ${instruction.type} ${formatValue(instruction.left)}, ${formatValue(instruction.right)}`;
    case 'unary':
      return `%${instruction.dest.name} = ${instruction.operator} ${instruction.type} ${formatValue(instruction.operand)}`;
    case 'call':
      return `${result(instruction.dest)}call ${resultType(instruction.dest)} @${instruction.callee}(${formatArgs(instruction.args)})`;
    case 'callind':
      return `${result(instruction.dest)}call.ind ${resultType(instruction.dest)} ${formatValue(instruction.callee)}(${formatArgs(instruction.args)})`;
    case 'ifacefrom':
      return `%${instruction.dest.name} = iface.from %${instruction.layout}, ${formatValue(instruction.object)}, ${instruction.slot}`;
    case 'ifaceup':
      return `%${instruction.dest.name} = iface.up ${formatValue(instruction.value)}, ${instruction.index}`;
    case 'ifaceobj':
      return `%${instruction.dest.name} = iface.obj ${formatValue(instruction.value)}`;
    case 'ifacetable':
      return `%${instruction.dest.name} = iface.table ${formatValue(instruction.value)}`;
    case 'tableget':
      return `%${instruction.dest.name} = table.get ${formatValue(instruction.table)}, ${instruction.index}`;
    case 'br':
      return `br label %${instruction.target}`;
    case 'condbr':
      return `br ${typed(instruction.condition)}, label %${instruction.whenTrue}, label %${instruction.whenFalse}`;
    case 'ret':
      return instruction.value ? `ret ${typed(instruction.value)}` : 'ret void';
    case 'trap':
      return `trap ${JSON.stringify(instruction.message)}`;
  }
}

function formatLayout(layout: IRRecordLayout): string {
  const slots = layout.slots.map((slot, i) => `${i}: ${slot.name} ${formatSlotType(slot.type)} @${slot.offset}`);
  const base = layout.base ? ` extends %${layout.base}` : '';
  return `%${layout.name} = record${base} { ${slots.join(', ')} } ; size ${layout.size}, align ${layout.align}`;
}

function formatTable(table: IRTable): string {
  const entries = table.entries.map(e => `@${e}`).join(', ');
  const supers = table.supers.map(s => `@${s}`).join(', ');
  return `@${table.name} = table [${entries}] supers [${supers}]`;
}

class ModulePrinter {
  private lines: string[] = [];
  private map?: SourceMapGenerator;

  constructor(private readonly module: IRModule, private readonly options: PrintOptions) {
    if (options.sourceMap) {
      this.map = new SourceMapGenerator({ file: options.file ?? `${module.source}.ir` });
      if (options.sourceContent !== undefined) {
        this.map.setSourceContent(module.source, options.sourceContent);
      }
    }
  }

  print(): PrintResult {
    this.line(`; sinter IR module for ${this.module.source}`);
    if (this.module.entryPoint) this.line(`; entry @${this.module.entryPoint}`);

    if (this.module.layouts.length > 0) this.line('');
    this.module.layouts.forEach(layout => this.line(formatLayout(layout)));
    if (this.module.tables.length > 0) this.line('');
    this.module.tables.forEach(table => this.line(formatTable(table)));
    if (this.module.externs.length > 0) this.line('');
    for (const extern of this.module.externs) {
      this.line(`declare ${extern.returnType} @${extern.name}(${extern.parameterTypes.join(', ')})`);
    }
    this.module.functions.forEach(fn => this.printFunction(fn));

    return { text: this.lines.join('\n') + '\n', sourceMap: this.map?.toString() };
  }

  private printFunction(fn: IRFunction): void {
    this.line('');
    const parameters = fn.parameters.map(p => `${p.type} %${p.name}`).join(', ');
    this.line(`define ${fn.returnType} @${fn.name}(${parameters}) {`, fn.location, 0);
    for (const block of fn.blocks) {
      this.line(`${block.label}:`);
      for (const instruction of block.instructions) {
        this.line(`  ${formatInstruction(instruction)}`, instruction.location, 2);
      }
    }
    this.line('}');
  }

  private line(text: string, location?: SourceLocation, column: number = 0): void {
    this.lines.push(text);
    if (!this.map || !location) return;
    this.map.addMapping({
      generated: { line: this.lines.length, column },
      source: location.filename ?? this.module.source,
      original: { line: location.start.line, column: Math.max(0, location.start.column - 1) }
    });
  }
}

export function printModule(module: IRModule, options: PrintOptions = {}): PrintResult {
  return new ModulePrinter(module, options).print();
}
