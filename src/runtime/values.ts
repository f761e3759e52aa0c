// Values manipulated by the IR interpreter

import { IRTable, IRRecordLayout } from '../codegen/ir/ir-types';

export class RuntimeTrap extends Error {
  constructor(message: string, public readonly where?: string) {
    super(message);
    this.name = 'RuntimeTrap';
  }
}

/**
 * Storage for one record (frame record, heap object or embedded record) or
 * for one `alloca` slot. Embedded records share the freed state of the
 * block that contains them.
 */
export class MemoryBlock {
  private static nextId = 1;
  readonly id = MemoryBlock.nextId++;
  readonly slots: RuntimeValue[];
  private released = false;

  constructor(
    readonly layout: IRRecordLayout | undefined,
    size: number,
    readonly heap: boolean,
    readonly parent?: MemoryBlock
  ) {
    this.slots = new Array<RuntimeValue>(size).fill(null);
  }

  get freed(): boolean {
    return this.parent ? this.parent.freed : this.released;
  }

  markFreed(): void {
    this.released = true;
  }

  describe(): string {
    return `${this.layout?.name ?? 'slot'}#${this.id}`;
  }
}

export class SlotAddress {
  constructor(readonly block: MemoryBlock, readonly slot: number) {}
}

export class FunctionRef {
  constructor(readonly name: string) {}
}

export class TableRef {
  constructor(readonly table: IRTable) {}
}

export class InterfaceValue {
  constructor(readonly object: MemoryBlock, readonly table: TableRef) {}
}

export type XmlElement = {
  name: string;
  attributes: Map<string, string>;
  children: XmlElement[];
  text: string;
};

export type JsonObject = { [key: string]: unknown };

export class DocumentHandle {
  constructor(readonly document: { format: 'json'; value: JsonObject } | { format: 'xml'; value: XmlElement }) {}
}

export type RuntimeValue =
  | number
  | boolean
  | string
  | null
  | MemoryBlock
  | SlotAddress
  | FunctionRef
  | TableRef
  | InterfaceValue
  | DocumentHandle;
