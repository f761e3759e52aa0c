// Semantic analysis pipeline for sinter programs

import { Diagnostic, Program, compareDiagnostics, formatDiagnostic } from '../types';
import { LogLevel, logger } from '../logger';
import { hasErrors } from './diagnostics';
import { ResolutionResult, resolveProgram } from './scope-resolver';
import { TypeCheckResult, checkProgram } from './type-checker';
import { AnnotationResult, processAnnotations } from './annotation-processor';
import { validateCleanup } from './cleanup-validator';

export type AnalysisStage = 'resolve' | 'typecheck' | 'annotations' | 'cleanup';

export interface AnalysisResult {
  program: Program;
  resolution: ResolutionResult;
  types?: TypeCheckResult;
  annotations?: AnnotationResult;
  diagnostics: Diagnostic[];
  // The stage whose errors stopped the pipeline, if any
  failedStage?: AnalysisStage;
}

// Output of a pipeline that reached the end without errors
export interface ValidatedProgram extends AnalysisResult {
  types: TypeCheckResult;
  annotations: AnnotationResult;
}

export function isValidated(result: AnalysisResult): result is ValidatedProgram {
  return result.failedStage === undefined && result.types !== undefined && result.annotations !== undefined;
}

export interface ValidatorOptions {
  verbose?: boolean;
}

/**
 * Runs resolution, type checking, annotation processing and cleanup
 * validation in order. Each stage sees the whole program and reports
 * everything it finds; a stage that reports an error stops the pipeline.
 */
export class Validator {
  public verbose: boolean;

  constructor(opts?: ValidatorOptions) {
    this.verbose = opts?.verbose ?? false;
    if (this.verbose && !logger.isEnabled(LogLevel.DEBUG)) {
      logger.setLevel(LogLevel.DEBUG);
    }
  }

  validate(program: Program): AnalysisResult {
    this.log(`Validating ${program.filename}`);
    const diagnostics: Diagnostic[] = [];
    const finish = (result: Omit<AnalysisResult, 'diagnostics'>): AnalysisResult => {
      diagnostics.sort(compareDiagnostics);
      if (this.verbose) {
        for (const diagnostic of diagnostics) this.log(formatDiagnostic(diagnostic, program.filename));
      }
      return { ...result, diagnostics };
    };

    const resolution = resolveProgram(program);
    diagnostics.push(...resolution.diagnostics);
    this.log(`resolve: ${resolution.classes.size} class(es), ${resolution.interfaces.size} interface(s), ${resolution.functions.size} function name(s)`);
    if (hasErrors(resolution.diagnostics)) {
      return finish({ program, resolution, failedStage: 'resolve' });
    }

    const types = checkProgram(program, resolution);
    diagnostics.push(...types.diagnostics);
    this.log(`typecheck: ${types.expressionTypes.size} expression(s) typed`);
    if (hasErrors(types.diagnostics)) {
      return finish({ program, resolution, types, failedStage: 'typecheck' });
    }

    const annotations = processAnnotations(program, resolution);
    diagnostics.push(...annotations.diagnostics);
    this.log(`annotations: ${annotations.diagnostics.length} diagnostic(s)`);
    if (hasErrors(annotations.diagnostics)) {
      return finish({ program, resolution, types, annotations, failedStage: 'annotations' });
    }

    const cleanup = validateCleanup(program, resolution, types);
    diagnostics.push(...cleanup);
    this.log(`cleanup: ${cleanup.length} diagnostic(s)`);
    if (hasErrors(cleanup)) {
      return finish({ program, resolution, types, annotations, failedStage: 'cleanup' });
    }

    return finish({ program, resolution, types, annotations });
  }

  private log(message: string): void {
    if (this.verbose) logger.debug('Validator', message);
  }
}

export function validateProgram(program: Program, opts?: ValidatorOptions): AnalysisResult {
  return new Validator(opts).validate(program);
}
