import { expect } from 'vitest';
import { Lexer } from '../../src/parser/lexer';
import { Parser } from '../../src/parser/parser';
import { AnalysisResult, Validator } from '../../src/validation/validator';
import { Compiler, CompilerOptions, CompilerResult, formatDiagnostics } from '../../src/compiler';
import { IRModule } from '../../src/codegen/ir/ir-types';
import { IRInterpreter } from '../../src/runtime/ir-interpreter';
import { Diagnostic, DiagnosticCode, Program } from '../../src/types';

export function parseSource(source: string, filename: string = 'test.sn'): Program {
  const tokens = new Lexer(source, filename).tokenize();
  const parser = new Parser(tokens, filename);
  const program = parser.parse();
  expect(parser.errors.map(e => e.message)).toEqual([]);
  return program;
}

export function analyze(source: string): AnalysisResult {
  return new Validator().validate(parseSource(source));
}

export function errors(diagnostics: Diagnostic[]): Diagnostic[] {
  return diagnostics.filter(d => d.severity === 'error');
}

export function warnings(diagnostics: Diagnostic[]): Diagnostic[] {
  return diagnostics.filter(d => d.severity === 'warning');
}

export function codes(diagnostics: Diagnostic[]): DiagnosticCode[] {
  return diagnostics.map(d => d.code);
}

export function messages(diagnostics: Diagnostic[]): string[] {
  return diagnostics.map(d => d.message);
}

export interface CompiledProgram extends CompilerResult {
  module: IRModule;
  ir: string;
}

// Compiles source that must produce no errors
export function compileOk(source: string, options?: CompilerOptions): CompiledProgram {
  const result = new Compiler(options).compile(source, 'test.sn');
  expect(formatDiagnostics(result).filter(line => line.includes(': error: '))).toEqual([]);
  const { module, ir } = result;
  if (!module || ir === undefined) throw new Error('compilation produced no module');
  return { ...result, module, ir };
}

export interface ProgramRun {
  exitCode: number;
  output: string;
  interpreter: IRInterpreter;
}

export function runSource(source: string): ProgramRun {
  const { module } = compileOk(source);
  let output = '';
  const interpreter = new IRInterpreter(module, { write: text => { output += text; } });
  const exitCode = interpreter.run();
  return { exitCode, output, interpreter };
}
