import { SourceLocation } from '../types';

// Raised when the generator meets a construct analysis should have rejected
export class CodegenError extends Error {
  constructor(message: string, public location?: SourceLocation) {
    super(message);
    this.name = 'CodegenError';
  }
}
