// Reading @attribute metadata off field declarations

import { Annotation, DiagnosticCode, FieldDeclaration, Severity, SourceLocation } from '../types';
import { capitalize } from '../type-utils';

export type AttributeFlag = 'read_only' | 'write_only' | 'derived' | 'serializable';

export const ATTRIBUTE_FLAGS: readonly AttributeFlag[] = ['read_only', 'write_only', 'derived', 'serializable'];

export const ATTRIBUTE_ANNOTATION = 'attribute';

export interface AnnotationProblem {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  location: SourceLocation;
}

export interface AttributeSettings {
  annotation: Annotation;
  flags: Record<AttributeFlag, boolean>;
  // Keys written out in source, with the value given
  explicit: Map<AttributeFlag, boolean>;
  problems: AnnotationProblem[];
}

function isAttributeFlag(key: string): key is AttributeFlag {
  return ATTRIBUTE_FLAGS.some(flag => flag === key);
}

// Flags of a field with no @attribute, or with one that leaves every key out
export function defaultFlags(field: FieldDeclaration): Record<AttributeFlag, boolean> {
  return { read_only: false, write_only: false, derived: false, serializable: field.visibility === 'public' };
}

/**
 * Reads the `@attribute` annotation of a field. Keys left out take the
 * values of {@link defaultFlags}. Returns undefined for fields without any
 * annotation; other annotation names are reported as problems.
 */
export function readAttribute(field: FieldDeclaration): AttributeSettings | undefined {
  const problems: AnnotationProblem[] = [];
  let attribute: Annotation | undefined;

  for (const annotation of field.annotations) {
    if (annotation.name !== ATTRIBUTE_ANNOTATION) {
      problems.push({
        severity: 'error',
        code: 'InvalidAnnotationError',
        message: `Unknown annotation '@${annotation.name}' on field '${field.name.name}'`,
        location: annotation.location
      });
    } else if (attribute) {
      problems.push({
        severity: 'error',
        code: 'InvalidAnnotationError',
        message: `Field '${field.name.name}' has more than one @attribute annotation`,
        location: annotation.location
      });
    } else {
      attribute = annotation;
    }
  }

  if (!attribute) {
    // Unknown annotations still need reporting
    return problems.length > 0 ? {
      annotation: field.annotations[0],
      flags: defaultFlags(field),
      explicit: new Map(),
      problems
    } : undefined;
  }

  const explicit = new Map<AttributeFlag, boolean>();
  for (const arg of attribute.arguments) {
    const key = arg.key;
    const value = arg.value;
    if (!isAttributeFlag(key)) {
      problems.push({
        severity: 'error',
        code: 'InvalidAnnotationError',
        message: `Unknown attribute key '${key}' (expected one of ${ATTRIBUTE_FLAGS.join(', ')})`,
        location: arg.location
      });
      continue;
    }
    if (value.kind !== 'literal' || typeof value.value !== 'boolean') {
      problems.push({
        severity: 'error',
        code: 'InvalidAnnotationError',
        message: `Attribute key '${key}' expects true or false`,
        location: value.location
      });
      continue;
    }
    if (explicit.has(key)) {
      problems.push({
        severity: 'warning',
        code: 'RedundantAnnotation',
        message: `Attribute key '${key}' is given more than once; the last value is used`,
        location: arg.location
      });
    }
    explicit.set(key, value.value);
  }

  const defaults = defaultFlags(field);
  const flags: Record<AttributeFlag, boolean> = {
    read_only: explicit.get('read_only') ?? defaults.read_only,
    write_only: explicit.get('write_only') ?? defaults.write_only,
    derived: explicit.get('derived') ?? defaults.derived,
    serializable: explicit.get('serializable') ?? defaults.serializable
  };

  return { annotation: attribute, flags, explicit, problems };
}

export interface AccessorPlan {
  getter?: string;
  setter?: string;
}

export function getterName(fieldName: string): string {
  return `get${capitalize(fieldName)}`;
}

export function setterName(fieldName: string): string {
  return `set${capitalize(fieldName)}`;
}

// Flags in effect for a field, annotated or not
export function effectiveFlags(field: FieldDeclaration): Record<AttributeFlag, boolean> {
  return readAttribute(field)?.flags ?? defaultFlags(field);
}

// Accessor names owed for a field; derived fields get none
export function plannedAccessors(field: FieldDeclaration, flags: Record<AttributeFlag, boolean>): AccessorPlan {
  if (flags.derived) {
    return {};
  }
  const plan: AccessorPlan = {};
  if (!flags.write_only) {
    plan.getter = getterName(field.name.name);
  }
  if (!flags.read_only && !field.isConst) {
    plan.setter = setterName(field.name.name);
  }
  return plan;
}

export function isDerivedField(field: FieldDeclaration): boolean {
  return effectiveFlags(field).derived;
}
