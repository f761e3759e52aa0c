import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { helpText, parseArgs, runCli } from '../src/cli';

describe('parseArgs', () => {
  it('reads options and the input file', () => {
    expect(parseArgs(['-o', 'out.ir', '--source-map', '--run', 'prog.sn'])).toEqual({
      output: 'out.ir',
      sourceMap: true,
      run: true,
      input: 'prog.sn'
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
  });

  it('requires a file name after -o', () => {
    expect(() => parseArgs(['prog.sn', '-o'])).toThrow('Option -o needs a file name');
  });

  it('accepts a single input file', () => {
    expect(() => parseArgs(['a.sn', 'b.sn'])).toThrow("Only one input file is supported (got 'a.sn' and 'b.sn')");
  });
});

describe('runCli', () => {
  let dir: string;
  let errors: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sinterc-'));
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function sourceFile(name: string, text: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, text);
    return file;
  }

  it('prints help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(await runCli(['--help'])).toBe(0);
    expect(log).toHaveBeenCalledWith(helpText());
  });

  it('fails without an input file', async () => {
    expect(await runCli([])).toBe(1);
    expect(errors[0]).toBe('Error: No input file specified');
  });

  it('fails for a missing input file', async () => {
    const missing = path.join(dir, 'missing.sn');
    expect(await runCli([missing])).toBe(1);
    expect(errors).toEqual([`Error: Input file '${missing}' does not exist`]);
  });

  it('writes the IR module and its source map next to the input', async () => {
    const input = await sourceFile('prog.sn', 'function main() -> int { return 0; }\n');
    expect(await runCli(['--source-map', input])).toBe(0);

    const output = path.join(dir, 'prog.ir');
    const ir = await fs.readFile(output, 'utf-8');
    expect(ir.split('\n')[0]).toBe(`; sinter IR module for ${input}`);
    const map: unknown = JSON.parse(await fs.readFile(`${output}.map`, 'utf-8'));
    expect(map).toMatchObject({ version: 3, sources: [input] });
    expect(errors).toEqual([`Generated ${output}`, `Generated ${output}.map`]);
  });

  it('reports diagnostics and fails', async () => {
    const input = await sourceFile('bad.sn', 'function main() -> int { return y; }\n');
    expect(await runCli([input])).toBe(1);
    expect(errors).toEqual([`${input}:1:33: error: UnresolvedReferenceError: Undefined identifier 'y'`]);
  });

  it('runs the program and returns its exit code', async () => {
    const input = await sourceFile('seven.sn', 'function main() -> int { return 3 + 4; }\n');
    expect(await runCli(['--run', '-o', path.join(dir, 'out', 'seven.ir'), input])).toBe(7);
  });

  it('returns 134 when the program traps', async () => {
    const input = await sourceFile('trap.sn',
      'function divide(a: int, b: int) -> int { return a / b; }\nfunction main() -> int { return divide(1, 0); }\n');
    expect(await runCli(['--run', input])).toBe(134);
    expect(errors[errors.length - 1]).toBe('Runtime trap: Integer division by zero');
  });
});
