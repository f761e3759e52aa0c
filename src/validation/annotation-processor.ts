// Annotation processing: validates @attribute flags and works out the accessor
// and serialization obligations of every class

import { Diagnostic, Program, SinterType } from '../types';
import { commonTypes, signatureToString, typeToString, typesEqual } from '../type-utils';
import { logger } from '../logger';
import { DiagnosticBag } from './diagnostics';
import {
  ATTRIBUTE_ANNOTATION, ATTRIBUTE_FLAGS, AttributeFlag, AttributeSettings, defaultFlags, getterName, plannedAccessors,
  readAttribute, setterName
} from './attribute-flags';
import { ResolutionResult } from './scope-resolver';
import { AccessorKind, ClassInfo, FieldInfo, MethodInfo, findMethods } from './symbol-table';

export interface AccessorObligation {
  field: FieldInfo;
  kind: AccessorKind;
  method: MethodInfo;
  // False when the class defines the accessor itself
  synthesized: boolean;
}

export interface ClassAnnotations {
  cls: ClassInfo;
  attributes: Map<FieldInfo, AttributeSettings>;
  accessors: AccessorObligation[];
  derived: Map<FieldInfo, MethodInfo>;
  // Fields written by as_json/as_xml, base class fields first
  serializable: FieldInfo[];
}

export interface AnnotationResult {
  classes: Map<ClassInfo, ClassAnnotations>;
  diagnostics: Diagnostic[];
}

export class AnnotationProcessor {
  private diagnostics = new DiagnosticBag('AnnotationProcessor');
  private classes = new Map<ClassInfo, ClassAnnotations>();

  constructor(private readonly resolution: ResolutionResult) {}

  process(program: Program): AnnotationResult {
    logger.debug('AnnotationProcessor', `Processing annotations in ${program.filename}`);
    for (const cls of this.resolution.classOrder) {
      this.classes.set(cls, this.processClass(cls));
    }
    return { classes: this.classes, diagnostics: this.diagnostics.items };
  }

  private processClass(cls: ClassInfo): ClassAnnotations {
    const result: ClassAnnotations = {
      cls,
      attributes: new Map(),
      accessors: [],
      derived: new Map(),
      serializable: cls.superClass ? [...(this.classes.get(cls.superClass)?.serializable ?? [])] : []
    };

    for (const field of cls.fields.values()) {
      const settings = readAttribute(field.declaration);
      for (const problem of settings?.problems ?? []) {
        if (problem.severity === 'error') {
          this.diagnostics.addError(problem.code, problem.message, problem.location);
        } else {
          this.diagnostics.addWarning(problem.code, problem.message, problem.location);
        }
      }
      const annotated = settings?.annotation.name === ATTRIBUTE_ANNOTATION ? settings : undefined;
      const flags = annotated?.flags ?? defaultFlags(field.declaration);

      if (annotated) {
        result.attributes.set(field, annotated);
        const conflicting = this.checkConflicts(field, annotated);
        this.checkRedundancy(field, annotated);
        // A field with conflicting flags gets no further checks
        if (conflicting) continue;
      }
      if (flags.derived) {
        const method = this.checkDerived(field);
        if (method) result.derived.set(field, method);
      } else {
        result.accessors.push(...this.checkAccessors(cls, field, flags));
      }
      if (flags.serializable && this.checkSerializable(field, annotated)) {
        result.serializable.push(field);
      }
    }

    logger.debug('AnnotationProcessor',
      `${cls.name}: ${result.accessors.length} accessor(s), ${result.serializable.length} serializable field(s)`);
    return result;
  }

  // All conflicting pairs on one field are reported together
  private checkConflicts(field: FieldInfo, settings: AttributeSettings): boolean {
    const { flags } = settings;
    const conflicts: string[] = [];
    if (flags.read_only && flags.write_only) conflicts.push('read_only with write_only');
    if (flags.derived && flags.write_only) conflicts.push('derived with write_only');
    if (field.declaration.isConst && flags.write_only) conflicts.push('const with write_only');
    if (conflicts.length === 0) return false;

    this.diagnostics.addError('ConflictingAnnotationError',
      `Conflicting annotations on field '${field.name}': ${conflicts.join('; ')}`, settings.annotation.location);
    return true;
  }

  private checkRedundancy(field: FieldInfo, settings: AttributeSettings): void {
    const location = settings.annotation.location;
    const defaults = defaultFlags(field.declaration);
    for (const flag of ATTRIBUTE_FLAGS) {
      const value = settings.explicit.get(flag);
      if (value !== undefined && value === defaults[flag]) {
        this.diagnostics.addWarning('RedundantAnnotation',
          `'${flag}=${value}' on field '${field.name}' restates the default`, location);
      }
    }
    if (settings.flags.read_only && settings.flags.derived) {
      this.diagnostics.addWarning('RedundantAnnotation',
        `'read_only' on field '${field.name}' is implied by 'derived'`, location);
    } else if (settings.flags.read_only && field.declaration.isConst) {
      this.diagnostics.addWarning('RedundantAnnotation',
        `'read_only' on field '${field.name}' is implied by 'const'`, location);
    }
  }

  private checkDerived(field: FieldInfo): MethodInfo | undefined {
    const expected = signatureToString(field.name, [], field.type);
    if (field.declaration.initializer) {
      this.diagnostics.addError('InvalidAnnotationError',
        `Derived field '${field.name}' cannot have an initializer`, field.declaration.initializer.location);
    }

    const method = findMethods(field.owner, field.name, typesEqual)
      .find(m => m.parameterTypes.length === 0 && !m.isStatic && m.declaration !== undefined);
    if (!method) {
      this.diagnostics.addError('MissingDerivedMethodError',
        `Derived field '${field.name}' requires a method '${expected}'`, field.declaration.name.location);
      return undefined;
    }
    if (!typesEqual(method.returnType, field.type)) {
      this.diagnostics.addError('MissingDerivedMethodError',
        `Method '${signatureToString(method.name, [], method.returnType)}' computing derived field '${field.name}' must be '${expected}'`,
        method.declaration?.name.location ?? field.declaration.name.location);
      return undefined;
    }
    return method;
  }

  private checkAccessors(cls: ClassInfo, field: FieldInfo, flags: Record<AttributeFlag, boolean>): AccessorObligation[] {
    const obligations: AccessorObligation[] = [];
    const plan = plannedAccessors(field.declaration, flags);

    const userDefined = (name: string): MethodInfo[] =>
      (cls.methods.get(name) ?? []).filter(m => m.declaration !== undefined);

    if (flags.read_only) {
      const setter = userDefined(setterName(field.name))[0];
      if (setter?.declaration) {
        this.diagnostics.addError('AccessorConflictError',
          `Field '${field.name}' is read_only but class '${cls.name}' defines '${setter.name}'`, setter.declaration.name.location);
      }
    }
    if (flags.write_only) {
      const getter = userDefined(getterName(field.name))[0];
      if (getter?.declaration) {
        this.diagnostics.addError('AccessorConflictError',
          `Field '${field.name}' is write_only but class '${cls.name}' defines '${getter.name}'`, getter.declaration.name.location);
      }
    }

    const wanted: { kind: AccessorKind; name: string | undefined; parameterTypes: SinterType[]; returnType: SinterType }[] = [
      { kind: 'getter', name: plan.getter, parameterTypes: [], returnType: field.type },
      { kind: 'setter', name: plan.setter, parameterTypes: [field.type], returnType: commonTypes.void }
    ];
    for (const accessor of wanted) {
      if (!accessor.name) continue;
      const own = userDefined(accessor.name);
      if (own.length === 0) {
        const method = (cls.methods.get(accessor.name) ?? []).find(m => m.accessor?.field === field);
        if (method) obligations.push({ field, kind: accessor.kind, method, synthesized: true });
        continue;
      }
      const expected = signatureToString(accessor.name, accessor.parameterTypes, accessor.returnType);
      const match = own.find(m => !m.isStatic
        && m.parameterTypes.length === accessor.parameterTypes.length
        && m.parameterTypes.every((t, i) => typesEqual(t, accessor.parameterTypes[i]))
        && typesEqual(m.returnType, accessor.returnType));
      if (!match || own.length > 1) {
        const found = own[0];
        this.diagnostics.addError('AccessorConflictError',
          `Accessor '${signatureToString(found.name, found.parameterTypes, found.returnType)}' for field '${field.name}' must be declared as '${expected}'`,
          found.declaration?.name.location ?? field.declaration.name.location);
        continue;
      }
      obligations.push({ field, kind: accessor.kind, method: match, synthesized: false });
    }
    return obligations;
  }

  // Fields that are serializable only by default are skipped quietly when they cannot be
  private checkSerializable(field: FieldInfo, settings: AttributeSettings | undefined): boolean {
    const explicit = settings?.explicit.get('serializable') === true;
    const location = settings?.annotation.location ?? field.declaration.location;
    if (field.visibility !== 'public') {
      if (explicit) {
        this.diagnostics.addError('InvalidAnnotationError', `Serializable field '${field.name}' must be public`, location);
      }
      return false;
    }
    if (field.type.kind === 'pointer' && field.type.target.kind === 'interface') {
      if (explicit) {
        this.diagnostics.addError('InvalidAnnotationError',
          `Field '${field.name}' of type '${typeToString(field.type)}' cannot be serializable; interface pointers have no concrete class to rebuild`,
          location);
      }
      return false;
    }
    return true;
  }
}

export function processAnnotations(program: Program, resolution: ResolutionResult): AnnotationResult {
  return new AnnotationProcessor(resolution).process(program);
}
