// Main exports for the sinter compiler

export { Lexer, LexError, TokenType } from './parser/lexer';
export type { Token } from './parser/lexer';
export { Parser } from './parser/parser';
export { Validator, validateProgram, isValidated } from './validation/validator';
export type { AnalysisResult, AnalysisStage, ValidatedProgram, ValidatorOptions } from './validation/validator';
export { resolveProgram } from './validation/scope-resolver';
export type { ResolutionResult } from './validation/scope-resolver';
export { checkProgram } from './validation/type-checker';
export type { TypeCheckResult, CallTarget } from './validation/type-checker';
export { processAnnotations } from './validation/annotation-processor';
export type { AnnotationResult, ClassAnnotations } from './validation/annotation-processor';
export { validateCleanup } from './validation/cleanup-validator';
export { IRGenerator } from './codegen/irgen';
export type { IRGeneratorOptions } from './codegen/irgen';
export { CodegenError } from './codegen/codegen-error';
export { printModule } from './codegen/ir/ir-printer';
export * from './codegen/ir/ir-types';
export type { ICodeGenerator, GeneratorResult, GeneratorOptions } from './codegen-interface';
export { Compiler, compile, formatDiagnostics, hasErrorDiagnostics } from './compiler';
export type { CompilerOptions, CompilerResult } from './compiler';
export { IRInterpreter, runModule } from './runtime/ir-interpreter';
export type { InterpreterOptions, InterpreterStats } from './runtime/ir-interpreter';
export { RuntimeTrap } from './runtime/values';
export { LogLevel, logger } from './logger';
export * from './types';
