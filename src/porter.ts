import ts from 'typescript';
import fs from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { pathToFileURL } from 'node:url';
import { BUILTIN_LIBRARY_PATH } from './config.js';
import { collectDiagnostics, createLibraryProgram, DEFAULT_LIBRARY_OPTIONS, loadCompilerOptions } from './program.js';
import { readFunctionSignatures, type FunctionSignature, type ParameterSignature, type ValueKind } from './signatures.js';

export interface PorterOptions {
  libraryPath?: string;
  /** tsconfig whose compiler options are used to check libraries. */
  tsconfigPath?: string;
  skipCheck?: boolean;
}

export interface Profile<R> {
  result: R;
  elapsedMs: number;
}

/** A library export that checks its arguments against the declared signature. */
export interface PortedFunction {
  (...args: unknown[]): unknown;
  readonly library: string;
  readonly signature: FunctionSignature;
}

interface LoadedLibrary {
  name: string;
  sourcePath: string;
  modulePath: string;
  signatures: Map<string, FunctionSignature>;
  exports: Record<string, unknown>;
}

const SOURCE_EXTENSIONS = ['.ts', '.mts', '.d.ts', '.d.mts'];
const MODULE_EXTENSIONS = ['.js', '.mjs', '.ts', '.mts'];

export class Porter {
  private readonly libraries = new Map<string, LoadedLibrary>();
  private readonly compilerOptions: ts.CompilerOptions;
  private readonly skipCheck: boolean;
  private libraryPath: string;

  constructor(options: PorterOptions = {}) {
    this.libraryPath = path.resolve(options.libraryPath ?? BUILTIN_LIBRARY_PATH);
    this.compilerOptions = options.tsconfigPath ? loadCompilerOptions(options.tsconfigPath) : DEFAULT_LIBRARY_OPTIONS;
    this.skipCheck = options.skipCheck ?? false;
  }

  setLibraryPath(libraryPath: string): void {
    this.libraryPath = path.resolve(libraryPath);
  }

  getLibraryPath(): string {
    return this.libraryPath;
  }

  /**
   * Checks, describes and imports `<libraryPath>/<name>`. A library added
   * again under the same name replaces the earlier one.
   */
  async addLibrary(name: string): Promise<void> {
    const sourcePath = findFile(this.libraryPath, name, SOURCE_EXTENSIONS);
    const modulePath = findFile(this.libraryPath, name, MODULE_EXTENSIONS);
    if (!sourcePath || !modulePath) {
      throw new Error(`Library '${name}' not found in ${this.libraryPath}`);
    }

    const program = createLibraryProgram(sourcePath, this.compilerOptions);
    if (!this.skipCheck) {
      const errors = collectDiagnostics(program);
      if (errors.length > 0) {
        throw new Error(`Failed to check library '${name}':\n${errors.join('\n')}`);
      }
    }
    const signatures = readFunctionSignatures(program, sourcePath);

    // A module namespace object always exists, even for a module with no exports
    let loaded: Record<string, unknown>;
    try {
      loaded = await import(pathToFileURL(modulePath).href);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to load library '${name}': ${reason}`, { cause: err });
    }
    this.libraries.set(name, { name, sourcePath, modulePath, signatures, exports: loaded });
  }

  hasLibrary(name: string): boolean {
    return this.libraries.has(name);
  }

  listFunctions(libName: string): FunctionSignature[] {
    return [...this.requireLibrary(libName).signatures.values()];
  }

  getFunction(libName: string, funcName: string): PortedFunction {
    const lib = this.requireLibrary(libName);
    const signature = lib.signatures.get(funcName);
    const target = lib.exports[funcName];
    if (!signature || typeof target !== 'function') {
      throw new Error(`Function '${funcName}' not found in library '${libName}'.`);
    }

    const call = (...args: unknown[]): unknown => {
      checkArguments(`${libName}.${funcName}`, signature, args);
      return Reflect.apply(target, undefined, args);
    };
    return Object.assign(call, { library: libName, signature });
  }

  executeFunction(libName: string, funcName: string, ...args: unknown[]): unknown {
    return this.getFunction(libName, funcName)(...args);
  }

  profileFunction(libName: string, funcName: string, ...args: unknown[]): Profile<unknown> {
    return profileCallable(this.getFunction(libName, funcName), ...args);
  }

  /** Like {@link profileFunction}, but waits for an async result inside the timing. */
  profileFunctionAsync(libName: string, funcName: string, ...args: unknown[]): Promise<Profile<unknown>> {
    return profileAsync(this.getFunction(libName, funcName), ...args);
  }

  private requireLibrary(name: string): LoadedLibrary {
    const lib = this.libraries.get(name);
    if (!lib) throw new Error(`Library '${name}' not loaded.`);
    return lib;
  }
}

export function profileCallable<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): Profile<R> {
  const start = performance.now();
  const result = fn(...args);
  const elapsedMs = performance.now() - start;
  return { result, elapsedMs };
}

export async function profileAsync<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  ...args: A
): Promise<Profile<Awaited<R>>> {
  const start = performance.now();
  const result = await fn(...args);
  const elapsedMs = performance.now() - start;
  return { result, elapsedMs };
}

function findFile(dir: string, name: string, extensions: string[]): string | undefined {
  for (const ext of extensions) {
    const candidate = path.join(dir, name + ext);
    if (fs.existsSync(candidate)) return candidate;
  }
  return undefined;
}

function checkArguments(qualifiedName: string, signature: FunctionSignature, args: unknown[]): void {
  const params = signature.params;
  const last = params[params.length - 1];
  const restParam = last?.rest ? last : undefined;

  if (!restParam && args.length > params.length) {
    throw new TypeError(`${qualifiedName} expects at most ${params.length} argument(s), got ${args.length}`);
  }

  for (let i = 0; i < Math.max(args.length, params.length); i++) {
    const param: ParameterSignature | undefined = i < params.length ? params[i] : restParam;
    if (!param) break;
    const arg = args[i];
    if (arg === undefined) {
      if (param.optional || acceptsUndefined(param.type)) continue;
      throw new TypeError(`${qualifiedName}: missing argument '${param.name}'`);
    }
    if (!matchesKind(arg, param.kind)) {
      throw new TypeError(`Argument '${param.name}' of ${qualifiedName} expects ${param.kind}, got ${describeValue(arg)}`);
    }
  }
}

function acceptsUndefined(typeText: string): boolean {
  if (typeText === 'unknown' || typeText === 'any') return true;
  return typeText.split('|').some(part => part.trim() === 'undefined');
}

function matchesKind(value: unknown, kind: ValueKind): boolean {
  switch (kind) {
    case 'number':
    case 'bigint':
    case 'string':
    case 'boolean':
      return typeof value === kind;
    case 'number-array':
      if (Array.isArray(value)) return value.every(v => typeof v === 'number');
      return ArrayBuffer.isView(value)
        && !(value instanceof DataView)
        && !(value instanceof BigInt64Array)
        && !(value instanceof BigUint64Array);
    case 'void':
    case 'opaque':
      return true;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
