// Interface for code generators over validated sinter programs

import { Program } from './types';
import { ValidatedProgram } from './validation/validator';
import { IRModule } from './codegen/ir/ir-types';

export interface GeneratorOptions {
  // Emit a Source Map V3 mapping generated lines back to sinter source
  sourceMap?: boolean;
  verbose?: boolean;
}

export interface GeneratorResult {
  module: IRModule;
  source: string;
  sourceMap?: string; // Source Map V3 JSON
}

export interface ICodeGenerator {
  generate(
    program: Program,
    analysis: ValidatedProgram,
    filename?: string,
    sourceText?: string
  ): GeneratorResult;
}
