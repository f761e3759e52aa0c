// Core type definitions for the sinter compiler

export class ParseError extends Error {
  constructor(message: string, public location?: SourceLocation) {
    super(message);
    this.name = 'ParseError';
  }
}

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

export type PrimitiveName = 'int' | 'float' | 'double' | 'boolean' | 'str' | 'void';

export type Visibility = 'public' | 'protected' | 'private';

// Type annotations as written in source

export type TypeNode = PrimitiveTypeNode | NamedTypeNode | PointerTypeNode;

export interface PrimitiveTypeNode extends ASTNode {
  kind: 'primitiveType';
  name: PrimitiveName;
}

export interface NamedTypeNode extends ASTNode {
  kind: 'namedType';
  name: string;
}

export interface PointerTypeNode extends ASTNode {
  kind: 'pointerType';
  target: TypeNode;
}

// Semantic types

export type SinterType =
  | PrimitiveType
  | ClassType
  | InterfaceType
  | PointerType
  | NullType
  | ErrorType;

export interface PrimitiveType {
  kind: 'primitive';
  name: PrimitiveName;
}

export interface ClassType {
  kind: 'class';
  name: string;
}

export interface InterfaceType {
  kind: 'interface';
  name: string;
}

export interface PointerType {
  kind: 'pointer';
  target: SinterType;
}

export interface NullType {
  kind: 'null';
}

// Produced after a reported error so that follow-on checks stay quiet
export interface ErrorType {
  kind: 'error';
}

// AST

export interface ASTNode {
  kind: string;
  location: SourceLocation;
}

export type Expression =
  | Literal
  | DStringLiteral
  | Identifier
  | UnaryExpression
  | BinaryExpression
  | MemberExpression
  | CallExpression;

export type LiteralType = 'int' | 'float' | 'double' | 'boolean' | 'str' | 'null';

export interface Literal extends ASTNode {
  kind: 'literal';
  literalType: LiteralType;
  value: number | string | boolean | null;
}

export type DStringPart = DStringText | DStringReference;

export interface DStringText {
  kind: 'text';
  value: string;
}

export interface DStringReference {
  kind: 'reference';
  identifier: Identifier;
}

export interface DStringLiteral extends ASTNode {
  kind: 'dstring';
  parts: DStringPart[];
  raw: string;
}

export interface Identifier extends ASTNode {
  kind: 'identifier';
  name: string;
}

export type UnaryOperator = '-' | '!' | '*' | '&';

export interface UnaryExpression extends ASTNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '>' | '<=' | '>=';
export type LogicalOperator = '&&' | '||';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;

export interface BinaryExpression extends ASTNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface MemberExpression extends ASTNode {
  kind: 'member';
  object: Expression;
  property: Identifier;
}

export interface CallExpression extends ASTNode {
  kind: 'call';
  callee: Identifier | MemberExpression;
  arguments: Expression[];
}

export type Statement =
  | BlockStatement
  | VariableDeclaration
  | AssignmentStatement
  | IncrementStatement
  | ExpressionStatement
  | IfStatement
  | WhileStatement
  | ForStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement;

export interface BlockStatement extends ASTNode {
  kind: 'block';
  body: Statement[];
}

export interface VariableDeclaration extends ASTNode {
  kind: 'variable';
  name: Identifier;
  isConst: boolean;
  typeAnnotation?: TypeNode;
  initializer?: Expression;
}

export type AssignmentOperator = '=' | '+=' | '-=' | '*=' | '/=' | '%=';

export interface AssignmentStatement extends ASTNode {
  kind: 'assignment';
  target: Expression;
  operator: AssignmentOperator;
  value: Expression;
}

export interface IncrementStatement extends ASTNode {
  kind: 'increment';
  target: Expression;
  operator: '++' | '--';
}

export interface ExpressionStatement extends ASTNode {
  kind: 'expression';
  expression: Expression;
}

export interface IfStatement extends ASTNode {
  kind: 'if';
  condition: Expression;
  thenBranch: BlockStatement;
  elseBranch?: BlockStatement | IfStatement;
}

export interface WhileStatement extends ASTNode {
  kind: 'while';
  condition: Expression;
  body: BlockStatement;
}

export type ForInitializer = VariableDeclaration | AssignmentStatement | IncrementStatement | ExpressionStatement;
export type ForUpdate = AssignmentStatement | IncrementStatement | ExpressionStatement;

export interface ForStatement extends ASTNode {
  kind: 'for';
  init?: ForInitializer;
  condition?: Expression;
  update?: ForUpdate;
  body: BlockStatement;
}

export interface ReturnStatement extends ASTNode {
  kind: 'return';
  value?: Expression;
}

export interface BreakStatement extends ASTNode {
  kind: 'break';
}

export interface ContinueStatement extends ASTNode {
  kind: 'continue';
}

// Declarations

export type Declaration = ClassDeclaration | InterfaceDeclaration | FunctionDeclaration;

export interface Program extends ASTNode {
  kind: 'program';
  declarations: Declaration[];
  filename: string;
}

export interface Parameter extends ASTNode {
  kind: 'parameter';
  name: Identifier;
  typeAnnotation: TypeNode;
}

export interface FunctionDeclaration extends ASTNode {
  kind: 'function';
  name: Identifier;
  parameters: Parameter[];
  returnType: TypeNode;
  body: BlockStatement;
}

export interface AnnotationArgument extends ASTNode {
  kind: 'annotationArgument';
  key: string;
  value: Literal | Identifier;
}

export interface Annotation extends ASTNode {
  kind: 'annotation';
  name: string;
  // false for a bare `@attribute` with no parentheses
  hasArguments: boolean;
  arguments: AnnotationArgument[];
}

export interface FieldDeclaration extends ASTNode {
  kind: 'field';
  name: Identifier;
  typeAnnotation: TypeNode;
  initializer?: Expression;
  visibility: Visibility;
  isConst: boolean;
  annotations: Annotation[];
}

export interface MethodDeclaration extends ASTNode {
  kind: 'method';
  name: Identifier;
  parameters: Parameter[];
  returnType: TypeNode;
  body: BlockStatement;
  visibility: Visibility;
  // `function` members of a class take no receiver
  isStatic: boolean;
}

export interface ClassDeclaration extends ASTNode {
  kind: 'class';
  name: Identifier;
  superClass?: Identifier;
  interfaces: Identifier[];
  fields: FieldDeclaration[];
  methods: MethodDeclaration[];
}

export interface InterfaceMethodSignature extends ASTNode {
  kind: 'interfaceMethod';
  name: Identifier;
  parameters: Parameter[];
  returnType: TypeNode;
}

export interface InterfaceDeclaration extends ASTNode {
  kind: 'interface';
  name: Identifier;
  superInterfaces: Identifier[];
  methods: InterfaceMethodSignature[];
}

// Diagnostics

export type Severity = 'error' | 'warning';

export type DiagnosticCategory =
  | 'LexicalError'
  | 'SyntaxError'
  | 'ResolutionError'
  | 'TypeError'
  | 'AnnotationError'
  | 'CleanupError'
  | 'CodegenError';

export type DiagnosticCode =
  | 'LexicalError'
  | 'SyntaxError'
  | 'UnresolvedReferenceError'
  | 'DuplicateDeclarationError'
  | 'CyclicInheritanceError'
  | 'InvalidInheritanceError'
  | 'TypeMismatchError'
  | 'InterfaceConformanceError'
  | 'UndefinedMethodError'
  | 'VisibilityError'
  | 'MissingReturnError'
  | 'AmbiguousCallError'
  | 'ConflictingAnnotationError'
  | 'InvalidAnnotationError'
  | 'MissingDerivedMethodError'
  | 'AccessorConflictError'
  | 'RedundantAnnotation'
  | 'UnreleasedPointerError'
  | 'UseAfterReleaseError'
  | 'DoubleReleaseError'
  | 'CodegenError';

export interface Diagnostic {
  severity: Severity;
  category: DiagnosticCategory;
  code: DiagnosticCode;
  message: string;
  location: SourceLocation;
}

export function formatLocation(location: SourceLocation, fallbackFile: string = 'input'): string {
  return `${location.filename || fallbackFile}:${location.start.line}:${location.start.column}`;
}

export function formatDiagnostic(diagnostic: Diagnostic, fallbackFile?: string): string {
  return `${formatLocation(diagnostic.location, fallbackFile)}: ${diagnostic.severity}: ${diagnostic.code}: ${diagnostic.message}`;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return a.location.start.line - b.location.start.line || a.location.start.column - b.location.start.column;
}
