// Diagnostic accumulation shared by the analysis stages

import { Diagnostic, DiagnosticCategory, DiagnosticCode, Severity, SourceLocation } from '../types';
import { logger } from '../logger';

const CATEGORY_BY_CODE: Record<DiagnosticCode, DiagnosticCategory> = {
  LexicalError: 'LexicalError',
  SyntaxError: 'SyntaxError',
  UnresolvedReferenceError: 'ResolutionError',
  DuplicateDeclarationError: 'ResolutionError',
  CyclicInheritanceError: 'ResolutionError',
  InvalidInheritanceError: 'ResolutionError',
  TypeMismatchError: 'TypeError',
  InterfaceConformanceError: 'TypeError',
  UndefinedMethodError: 'TypeError',
  VisibilityError: 'TypeError',
  MissingReturnError: 'TypeError',
  AmbiguousCallError: 'TypeError',
  ConflictingAnnotationError: 'AnnotationError',
  InvalidAnnotationError: 'AnnotationError',
  MissingDerivedMethodError: 'AnnotationError',
  AccessorConflictError: 'AnnotationError',
  RedundantAnnotation: 'AnnotationError',
  UnreleasedPointerError: 'CleanupError',
  UseAfterReleaseError: 'CleanupError',
  DoubleReleaseError: 'CleanupError',
  CodegenError: 'CodegenError'
};

export function categoryOf(code: DiagnosticCode): DiagnosticCategory {
  return CATEGORY_BY_CODE[code];
}

export function createDiagnostic(code: DiagnosticCode, message: string, location: SourceLocation, severity: Severity = 'error'): Diagnostic {
  return { severity, category: categoryOf(code), code, message, location };
}

export class DiagnosticBag {
  readonly items: Diagnostic[] = [];

  constructor(private readonly stage: string) {}

  addError(code: DiagnosticCode, message: string, location: SourceLocation): void {
    logger.debug(this.stage, `error ${code}: ${message}`);
    this.items.push(createDiagnostic(code, message, location, 'error'));
  }

  addWarning(code: DiagnosticCode, message: string, location: SourceLocation): void {
    logger.debug(this.stage, `warning ${code}: ${message}`);
    this.items.push(createDiagnostic(code, message, location, 'warning'));
  }

  hasErrors(): boolean {
    return this.items.some(d => d.severity === 'error');
  }
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}
