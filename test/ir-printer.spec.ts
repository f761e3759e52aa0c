import { describe, it, expect } from 'vitest';
import { SourceMapConsumer } from 'source-map';
import { formatInstruction, formatValue, printModule } from '../src/codegen/ir/ir-printer';
import { constant } from '../src/codegen/ir/ir-builder';
import { IRModule, IRRegister } from '../src/codegen/ir/ir-types';

const a: IRRegister = { kind: 'reg', name: 'a', type: 'i32' };
const t: IRRegister = { kind: 'reg', name: 't', type: 'i32' };

function smallModule(): IRModule {
  return {
    source: 'm.sn',
    layouts: [],
    tables: [],
    externs: [{ name: 'rt.println', parameterTypes: ['str'], returnType: 'void' }],
    functions: [{
      name: 'main',
      parameters: [],
      returnType: 'i32',
      blocks: [{
        label: 'entry',
        instructions: [
          { op: 'call', callee: 'rt.println', args: [constant('str', 'hi')] },
          {
            op: 'ret',
            value: constant('i32', 0),
            location: { start: { line: 3, column: 5 }, end: { line: 3, column: 14 }, filename: 'm.sn' }
          }
        ]
      }]
    }],
    entryPoint: 'main'
  };
}

describe('IR printer', () => {
  it('formats constants by type', () => {
    expect(formatValue(constant('f64', 2))).toBe('2.0');
    expect(formatValue(constant('i32', 2))).toBe('2');
    expect(formatValue(constant('str', 'a "b"'))).toBe('"a \\"b\\""');
    expect(formatValue(constant('ptr', null))).toBe('null');
  });

  it('formats instructions', () => {
    expect(formatInstruction({ op: 'binary', dest: t, operator: 'add', type: 'i32', left: a, right: constant('i32', 1) }))
      .toBe('%t = add i32 %a, 1');
    expect(formatInstruction({ op: 'compare', dest: { kind: 'reg', name: 'c', type: 'i1' }, operator: 'lt', type: 'i32', left: a, right: t }))
      .toBe('%c = cmp lt i32 %a, %t');
    expect(formatInstruction({ op: 'compare', dest: { kind: 'reg', name: 'c', type: 'i1' }, operator: 'same', type: 'f64', left: a, right: t }))
      .toBe('%c = cmp same f64 %a, %t');
    expect(formatInstruction({ op: 'condbr', condition: constant('i1', true), whenTrue: 'then', whenFalse: 'else' }))
      .toBe('br i1 true, label %then, label %else');
    expect(formatInstruction({ op: 'getfield', dest: t, layout: 'Point', object: a, slot: 1 }))
      .toBe('%t = getfield %Point, %a, 1');
    expect(formatInstruction({ op: 'trap', message: 'division by zero' })).toBe('trap "division by zero"');
  });

  it('prints a module', () => {
    expect(printModule(smallModule()).text).toBe([
      '; sinter IR module for m.sn',
      '; entry @main',
      '',
      'declare void @rt.println(str)',
      '',
      'define i32 @main() {',
      'entry:',
      '  call void @rt.println(str "hi")',
      '  ret i32 0',
      '}',
      ''
    ].join('\n'));
  });

  it('maps instructions back to their source positions', async () => {
    const { sourceMap } = printModule(smallModule(), { sourceMap: true, file: 'm.ir' });
    if (sourceMap === undefined) throw new Error('no source map was written');
    const position = await SourceMapConsumer.with(sourceMap, null, consumer =>
      consumer.originalPositionFor({ line: 9, column: 2 }));
    expect(position).toMatchObject({ source: 'm.sn', line: 3, column: 4 });
  });

  it('leaves the source map out unless asked', () => {
    expect(printModule(smallModule()).sourceMap).toBeUndefined();
  });
});
