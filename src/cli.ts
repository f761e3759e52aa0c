#!/usr/bin/env node

// CLI for the sinter compiler

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { Compiler, CompilerResult, formatDiagnostics, hasErrorDiagnostics } from './compiler';
import { IRInterpreter } from './runtime/ir-interpreter';
import { RuntimeTrap } from './runtime/values';
import { logger, LogLevel } from './logger';

// Get version from package.json
function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(path.join(dir, 'package.json'), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      logger.debug('CLI', `No package.json in ${dir}`);
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

export interface CliOptions {
  input?: string;
  output?: string;
  emitIr?: boolean;
  sourceMap?: boolean;
  run?: boolean;
  ast?: boolean;
  tokens?: boolean;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-o':
      case '--output':
        if (i + 1 >= args.length) {
          throw new Error(`Option ${arg} needs a file name`);
        }
        options.output = args[++i];
        break;
      case '--emit-ir':
        options.emitIr = true;
        break;
      case '--source-map':
        options.sourceMap = true;
        break;
      case '-r':
      case '--run':
        options.run = true;
        break;
      case '--ast':
        options.ast = true;
        break;
      case '--tokens':
        options.tokens = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (options.input) {
          throw new Error(`Only one input file is supported (got '${options.input}' and '${arg}')`);
        }
        options.input = arg;
        break;
    }
  }
  return options;
}

export function helpText(): string {
  return `
sinterc - sinter compiler

Usage: sinterc [options] <input-file>

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -o, --output <file>     IR output file (default: <input>.ir)
  --emit-ir               Print the IR module to stdout instead of writing a file
  --source-map            Also write a source map (<output>.map)
  -r, --run               Run the program with the IR interpreter
  --ast                   Print the parsed AST as JSON and stop
  --tokens                Print the token stream and stop
  --verbose               Print stage-by-stage debug output

Examples:
  sinterc program.sn
  sinterc -o build/program.ir --source-map program.sn
  sinterc --run program.sn
`;
}

function reportDiagnostics(result: CompilerResult, filename: string): void {
  for (const line of formatDiagnostics(result, filename)) {
    console.error(line);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

// Returns the process exit code
export async function runCli(args: string[]): Promise<number> {
  const options = parseArgs(args);
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);

  if (options.help) {
    console.log(helpText());
    return 0;
  }
  if (options.version) {
    console.log(`sinterc ${getVersion()}`);
    return 0;
  }
  if (!options.input) {
    console.error('Error: No input file specified');
    console.error('Use --help for usage information');
    return 1;
  }

  const input = options.input;
  const compiler = new Compiler({ sourceMap: options.sourceMap, verbose: options.verbose });
  let result: CompilerResult;
  try {
    result = await compiler.compileFile(input);
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    console.error(`Error: Input file '${input}' does not exist`);
    return 1;
  }

  if (options.tokens && result.tokens) {
    for (const token of result.tokens) {
      console.log(`${token.location.start.line}:${token.location.start.column}\t${token.type}\t${JSON.stringify(token.value)}`);
    }
    return hasErrorDiagnostics(result) ? 1 : 0;
  }
  if (options.ast && result.ast) {
    console.log(JSON.stringify(result.ast, null, 2));
    return hasErrorDiagnostics(result) ? 1 : 0;
  }

  reportDiagnostics(result, input);
  if (hasErrorDiagnostics(result) || !result.module || result.ir === undefined) {
    return 1;
  }

  if (options.emitIr) {
    process.stdout.write(result.ir);
  } else {
    const output = options.output ?? `${input.replace(/\.[^./\\]+$/, '')}.ir`;
    await fs.mkdir(path.dirname(path.resolve(output)), { recursive: true });
    await fs.writeFile(output, result.ir);
    console.error(`Generated ${output}`);
    if (result.sourceMap) {
      await fs.writeFile(`${output}.map`, result.sourceMap);
      console.error(`Generated ${output}.map`);
    }
  }

  if (options.run) {
    try {
      return new IRInterpreter(result.module).run();
    } catch (error) {
      if (error instanceof RuntimeTrap) {
        console.error(`Runtime trap${error.where ? ` in @${error.where}` : ''}: ${error.message}`);
        return 134;
      }
      throw error;
    }
  }
  return 0;
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
}
