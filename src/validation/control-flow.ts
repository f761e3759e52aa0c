// Control-flow graphs over function and method bodies

import {
  AssignmentStatement, BlockStatement, Expression, ExpressionStatement, IncrementStatement, ReturnStatement,
  SourceLocation, Statement, VariableDeclaration
} from '../types';

export type SimpleStatement = VariableDeclaration | AssignmentStatement | IncrementStatement | ExpressionStatement;

export type CFGElement =
  | { kind: 'statement'; node: SimpleStatement }
  | { kind: 'condition'; node: Expression }
  | { kind: 'return'; node: ReturnStatement }
  // Bindings going out of scope on this edge of control flow
  | { kind: 'scopeExit'; declarations: VariableDeclaration[]; location: SourceLocation };

export interface BasicBlock {
  id: number;
  elements: CFGElement[];
  successors: BasicBlock[];
  predecessors: BasicBlock[];
}

export interface ControlFlowGraph {
  entry: BasicBlock;
  exit: BasicBlock;
  blocks: BasicBlock[];
  // True when the end of the body can be reached without a return
  fallsThrough: boolean;
}

interface LoopTarget {
  breakTarget: BasicBlock;
  continueTarget: BasicBlock;
  scopeDepth: number;
}

function isConstantTrue(expression: Expression | undefined): boolean {
  return expression === undefined
    || (expression.kind === 'literal' && expression.literalType === 'boolean' && expression.value === true);
}

class ControlFlowBuilder {
  private blocks: BasicBlock[] = [];
  private scopes: VariableDeclaration[][] = [];
  private loops: LoopTarget[] = [];
  private current: BasicBlock;
  private readonly entry: BasicBlock;
  private readonly exit: BasicBlock;

  constructor() {
    this.entry = this.newBlock();
    this.exit = this.newBlock();
    this.current = this.entry;
  }

  build(body: BlockStatement): ControlFlowGraph {
    this.scopes.push([]);
    body.body.forEach(statement => this.visit(statement));
    const end = this.current;
    this.popScope(body.location);
    this.connect(this.current, this.exit);

    return {
      entry: this.entry,
      exit: this.exit,
      blocks: this.blocks,
      fallsThrough: this.reachable().has(end)
    };
  }

  private newBlock(): BasicBlock {
    const block: BasicBlock = { id: this.blocks.length, elements: [], successors: [], predecessors: [] };
    this.blocks.push(block);
    return block;
  }

  private connect(from: BasicBlock, to: BasicBlock): void {
    if (from.successors.includes(to)) return;
    from.successors.push(to);
    to.predecessors.push(from);
  }

  private emit(element: CFGElement): void {
    this.current.elements.push(element);
  }

  private popScope(location: SourceLocation): void {
    const declarations = this.scopes.pop() ?? [];
    if (declarations.length > 0) {
      this.emit({ kind: 'scopeExit', declarations, location });
    }
  }

  // Scope exits for every scope deeper than `depth`, innermost first
  private exitScopesTo(depth: number, location: SourceLocation): void {
    for (let i = this.scopes.length - 1; i >= depth; i--) {
      if (this.scopes[i].length > 0) {
        this.emit({ kind: 'scopeExit', declarations: [...this.scopes[i]], location });
      }
    }
  }

  private visitBlock(block: BlockStatement): void {
    this.scopes.push([]);
    block.body.forEach(statement => this.visit(statement));
    this.popScope(block.location);
  }

  private visit(statement: Statement): void {
    switch (statement.kind) {
      case 'variable':
        this.emit({ kind: 'statement', node: statement });
        this.scopes[this.scopes.length - 1].push(statement);
        break;
      case 'assignment':
      case 'increment':
      case 'expression':
        this.emit({ kind: 'statement', node: statement });
        break;
      case 'block':
        this.visitBlock(statement);
        break;
      case 'if': {
        this.emit({ kind: 'condition', node: statement.condition });
        const branchPoint = this.current;
        const join = this.newBlock();

        this.current = this.newBlock();
        this.connect(branchPoint, this.current);
        this.visitBlock(statement.thenBranch);
        this.connect(this.current, join);

        if (statement.elseBranch) {
          this.current = this.newBlock();
          this.connect(branchPoint, this.current);
          if (statement.elseBranch.kind === 'if') {
            this.visit(statement.elseBranch);
          } else {
            this.visitBlock(statement.elseBranch);
          }
          this.connect(this.current, join);
        } else {
          this.connect(branchPoint, join);
        }
        this.current = join;
        break;
      }
      case 'while': {
        const header = this.newBlock();
        const body = this.newBlock();
        const after = this.newBlock();
        this.connect(this.current, header);
        this.current = header;
        this.emit({ kind: 'condition', node: statement.condition });
        this.connect(header, body);
        if (!isConstantTrue(statement.condition)) this.connect(header, after);

        this.loops.push({ breakTarget: after, continueTarget: header, scopeDepth: this.scopes.length });
        this.current = body;
        this.visitBlock(statement.body);
        this.connect(this.current, header);
        this.loops.pop();
        this.current = after;
        break;
      }
      case 'for': {
        this.scopes.push([]);
        if (statement.init) this.visit(statement.init);

        const header = this.newBlock();
        const body = this.newBlock();
        const update = this.newBlock();
        const after = this.newBlock();
        this.connect(this.current, header);
        this.current = header;
        if (statement.condition) this.emit({ kind: 'condition', node: statement.condition });
        this.connect(header, body);
        if (!isConstantTrue(statement.condition)) this.connect(header, after);

        this.loops.push({ breakTarget: after, continueTarget: update, scopeDepth: this.scopes.length });
        this.current = body;
        this.visitBlock(statement.body);
        this.connect(this.current, update);
        this.loops.pop();

        this.current = update;
        if (statement.update) this.visit(statement.update);
        this.connect(this.current, header);

        this.current = after;
        this.popScope(statement.location);
        break;
      }
      case 'return':
        this.emit({ kind: 'return', node: statement });
        this.exitScopesTo(0, statement.location);
        this.connect(this.current, this.exit);
        this.current = this.newBlock();
        break;
      case 'break':
      case 'continue': {
        const loop = this.loops[this.loops.length - 1];
        if (!loop) break;
        this.exitScopesTo(loop.scopeDepth, statement.location);
        this.connect(this.current, statement.kind === 'break' ? loop.breakTarget : loop.continueTarget);
        this.current = this.newBlock();
        break;
      }
    }
  }

  private reachable(): Set<BasicBlock> {
    const seen = new Set<BasicBlock>();
    const stack = [this.entry];
    while (stack.length > 0) {
      const block = stack.pop();
      if (!block || seen.has(block)) continue;
      seen.add(block);
      stack.push(...block.successors);
    }
    return seen;
  }
}

export function buildControlFlowGraph(body: BlockStatement): ControlFlowGraph {
  return new ControlFlowBuilder().build(body);
}
