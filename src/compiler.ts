// Main compiler interface: source text to IR module

import { promises as fs } from 'fs';
import { Lexer, LexError, Token } from './parser/lexer';
import { Parser } from './parser/parser';
import { Validator, isValidated } from './validation/validator';
import { createDiagnostic, hasErrors } from './validation/diagnostics';
import { IRGenerator } from './codegen/irgen';
import { CodegenError } from './codegen/codegen-error';
import { IRModule } from './codegen/ir/ir-types';
import { Diagnostic, ParseError, Program, compareDiagnostics, formatDiagnostic } from './types';
import { logger } from './logger';

export interface CompilerOptions {
  // Emit a Source Map V3 document alongside the IR text
  sourceMap?: boolean;
  verbose?: boolean;
  entryPoint?: string;
}

export interface CompilerResult {
  diagnostics: Diagnostic[];
  tokens?: Token[];
  ast?: Program;
  module?: IRModule;
  ir?: string;
  sourceMap?: string;
}

export class Compiler {
  private options: Required<CompilerOptions>;

  constructor(options: CompilerOptions = {}) {
    this.options = {
      sourceMap: false,
      verbose: false,
      entryPoint: 'main',
      ...options
    };
  }

  compile(source: string, filename: string = 'input'): CompilerResult {
    const result: CompilerResult = { diagnostics: [] };

    let tokens: Token[];
    try {
      tokens = new Lexer(source, filename).tokenize();
    } catch (error) {
      if (error instanceof LexError) {
        result.diagnostics.push(createDiagnostic('LexicalError', error.message, error.location ?? startOf(filename)));
        return result;
      }
      throw error;
    }
    result.tokens = tokens;

    const parser = new Parser(tokens, filename);
    const ast = parser.parse();
    result.ast = ast;
    if (parser.errors.length > 0) {
      result.diagnostics.push(...parser.errors.map(error => parseDiagnostic(error, filename)));
      result.diagnostics.sort(compareDiagnostics);
      return result;
    }

    return this.compileProgram(ast, source, result);
  }

  // Runs analysis and code generation over an already parsed program
  compileProgram(ast: Program, source?: string, result: CompilerResult = { diagnostics: [] }): CompilerResult {
    result.ast = ast;
    const analysis = new Validator({ verbose: this.options.verbose }).validate(ast);
    result.diagnostics.push(...analysis.diagnostics);
    if (!isValidated(analysis)) {
      logger.debug('Compiler', `${ast.filename}: stopped after ${analysis.failedStage ?? 'analysis'}`);
      return result;
    }

    try {
      const generator = new IRGenerator({
        sourceMap: this.options.sourceMap,
        verbose: this.options.verbose,
        entryPoint: this.options.entryPoint
      });
      const generated = generator.generate(ast, analysis, `${ast.filename}.ir`, source);
      result.module = generated.module;
      result.ir = generated.source;
      result.sourceMap = generated.sourceMap;
    } catch (error) {
      if (!(error instanceof CodegenError)) throw error;
      result.diagnostics.push(createDiagnostic('CodegenError', error.message, error.location ?? ast.location));
    }
    return result;
  }

  // Rejects with the file system error when the file cannot be read
  async compileFile(path: string): Promise<CompilerResult> {
    const source = await fs.readFile(path, 'utf-8');
    return this.compile(source, path);
  }
}

function startOf(filename: string): Diagnostic['location'] {
  return { start: { line: 1, column: 1 }, end: { line: 1, column: 1 }, filename };
}

function parseDiagnostic(error: ParseError, filename: string): Diagnostic {
  const code = error instanceof LexError ? 'LexicalError' : 'SyntaxError';
  return createDiagnostic(code, error.message, error.location ?? startOf(filename));
}

export function hasErrorDiagnostics(result: CompilerResult): boolean {
  return hasErrors(result.diagnostics);
}

export function formatDiagnostics(result: CompilerResult, filename?: string): string[] {
  return result.diagnostics.map(d => formatDiagnostic(d, filename));
}

export function compile(source: string, filename?: string, options?: CompilerOptions): CompilerResult {
  return new Compiler(options).compile(source, filename);
}
