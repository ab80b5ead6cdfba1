import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { BUILTIN_LIBRARY_PATH, DEFAULT_REPEAT, parseArgs } from '../src/config.js';
import { formatResult, parseArguments, parseValue, run } from '../src/cli.js';
import { HeapAllocator } from '../src/allocator.js';
import { createString } from '../src/routines/string-lib.js';
import type { FunctionSignature } from '../src/signatures.js';

const HERE = path.dirname(fileURLToPath(import.meta.url));
const TEST_LIBRARY = path.resolve(HERE, '../test-library/src');

describe('parseArgs', () => {
  it('parses library, function and arguments', () => {
    const config = parseArgs(['fib', 'fibonacci', '90']);
    expect(config.library).toBe('fib');
    expect(config.functionName).toBe('fibonacci');
    expect(config.args).toEqual(['90']);
    expect(config.libraryPath).toBe(BUILTIN_LIBRARY_PATH);
    expect(config.tsconfigPath).toBeUndefined();
    expect(config.repeat).toBe(DEFAULT_REPEAT);
    expect(config.list).toBe(false);
    expect(config.profile).toBe(false);
    expect(config.skipCheck).toBe(false);
    expect(config.verbose).toBe(false);
    expect(config.help).toBe(false);
  });

  it('parses optional flags', () => {
    const config = parseArgs([
      '-L', 'libs',
      '-p', 'tsconfig.json',
      '--profile',
      '-n', '5',
      '--skip-check',
      '--verbose',
      'fib', 'fibonacci', '3',
    ]);
    expect(config.libraryPath).toBe(path.resolve('libs'));
    expect(config.tsconfigPath).toBe(path.resolve('tsconfig.json'));
    expect(config.profile).toBe(true);
    expect(config.repeat).toBe(5);
    expect(config.skipCheck).toBe(true);
    expect(config.verbose).toBe(true);
  });

  it('treats negative numbers as arguments', () => {
    expect(parseArgs(['fib', 'fibonacci', '-3']).args).toEqual(['-3']);
  });

  it('stops option parsing at --', () => {
    expect(parseArgs(['greet', 'greet', '--', '--verbose']).args).toEqual(['--verbose']);
  });

  it('only needs a library with --list or --help', () => {
    expect(parseArgs(['--list', 'fib']).functionName).toBeUndefined();
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('throws on bad input', () => {
    expect(() => parseArgs([])).toThrow('<library> is required');
    expect(() => parseArgs(['fib'])).toThrow('<function> is required unless --list is given');
    expect(() => parseArgs(['--bogus', 'fib', 'fibonacci'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['-n', '0', 'fib', 'fibonacci'])).toThrow('--repeat must be a positive integer, got 0');
    expect(() => parseArgs(['fib', 'fibonacci', '-L'])).toThrow('-L requires a value');
  });
});

describe('parseValue', () => {
  it('converts raw strings by kind', () => {
    expect(parseValue('42', 'number')).toBe(42);
    expect(parseValue('-7', 'bigint')).toBe(-7n);
    expect(parseValue('true', 'boolean')).toBe(true);
    expect(parseValue('1, 2,3', 'number-array')).toEqual([1, 2, 3]);
    expect(parseValue('', 'number-array')).toEqual([]);
    expect(parseValue('text', 'opaque')).toBe('text');
  });

  it('rejects malformed values', () => {
    expect(() => parseValue('abc', 'number')).toThrow('Not a number: abc');
    expect(() => parseValue('1.5', 'bigint')).toThrow('Not an integer: 1.5');
    expect(() => parseValue('', 'bigint')).toThrow('Not an integer: ');
    expect(() => parseValue('  ', 'bigint')).toThrow('Not an integer:   ');
    expect(() => parseValue('yes', 'boolean')).toThrow('Not a boolean: yes');
    expect(() => parseValue('1,,2', 'number-array')).toThrow('Not a number: ');
  });
});

describe('parseArguments', () => {
  const signature: FunctionSignature = {
    name: 'mix',
    params: [
      { name: 'label', type: 'string', kind: 'string', optional: false, rest: false },
      { name: 'values', type: 'number[]', kind: 'number', optional: true, rest: true },
    ],
    returnType: 'string',
    returnKind: 'string',
  };

  it('converts each argument with its parameter kind, rest included', () => {
    expect(parseArguments(['a', '1', '2'], signature)).toEqual(['a', 1, 2]);
  });
});

describe('formatResult', () => {
  it('formats values for output', () => {
    expect(formatResult(55n)).toBe('55');
    expect(formatResult('text')).toBe('text');
    expect(formatResult(undefined)).toBe('');
    expect(formatResult(null)).toBe('null');
    expect(formatResult({ big: 1n, list: [1, 2] })).toBe('{"big":"1","list":[1,2]}');
  });

  it('prints the contents of an owned string', () => {
    expect(formatResult(createString('owned', new HeapAllocator()))).toBe('owned');
  });
});

describe('run', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('calls a built-in routine and prints the result', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['fib', 'fibonacci', '10'])).toBe(0);
    expect(log.mock.calls).toEqual([['55']]);
  });

  it('parses array arguments', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['array', 'sumOfSquares', '1,2,3'])).toBe(0);
    expect(log.mock.calls).toEqual([['14']]);
  });

  it('prints created strings', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['string-lib', 'createString', 'hello'])).toBe(0);
    expect(log.mock.calls).toEqual([['hello']]);
  });

  it('lists signatures', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--list', 'fib'])).toBe(0);
    expect(log.mock.calls).toEqual([['fibonacci(n: number): bigint']]);
  });

  it('profiles repeated calls', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--profile', '-n', '3', 'fib', 'fibonacci', '20'])).toBe(0);
    expect(log).toHaveBeenCalledTimes(3);
    log.mock.calls.forEach(([line], i) => {
      expect(line).toMatch(new RegExp(`^Run ${i + 1}: 6765 \\(\\d+\\.\\d{3} ms\\)$`));
    });
  });

  it('loads libraries from another directory', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['-L', TEST_LIBRARY, 'greet', 'greet', 'Ada', 'true'])).toBe(0);
    expect(log.mock.calls).toEqual([['Hello, Ada!']]);
  });

  it('waits for async results', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['-L', TEST_LIBRARY, 'later', 'later', '5'])).toBe(0);
    expect(log.mock.calls).toEqual([['10']]);
  });

  it('reports rejected async results and returns 1', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await run(['-L', TEST_LIBRARY, 'later', 'later', '-1'])).toBe(1);
    expect(error.mock.calls).toEqual([['Error: negative']]);
  });

  it('profiles async calls with their settled result', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--profile', '-L', TEST_LIBRARY, 'later', 'later', '4'])).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^Run 1: 8 \(\d+\.\d{3} ms\)$/);
  });

  it('prints configuration and library details with --verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--verbose', 'fib', 'fibonacci', '3'])).toBe(0);

    expect(log).toHaveBeenCalledTimes(3);
    const [label, json] = log.mock.calls[0];
    expect(label).toBe('Configuration:');
    expect(JSON.parse(json)).toMatchObject({ library: 'fib', functionName: 'fibonacci', args: ['3'], verbose: true });
    expect(log.mock.calls[1]).toEqual([`Loaded library 'fib' from ${BUILTIN_LIBRARY_PATH}`]);
    expect(log.mock.calls[2]).toEqual(['2']);
  });

  it('prints usage for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--help'])).toBe(0);
    expect(log.mock.calls[0][0]).toMatch(/^Usage: libporter/);
  });

  it('reports errors and returns 1', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(await run(['fib', 'fibonacci', '-1'])).toBe(1);
    expect(error.mock.calls).toEqual([['Error: Fibonacci index must be a non-negative integer, got -1']]);
  });
});
