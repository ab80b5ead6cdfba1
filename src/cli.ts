#!/usr/bin/env node
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs, USAGE } from './config.js';
import { OwnedString } from './owned-string.js';
import { Porter, profileAsync } from './porter.js';
import { formatSignature, type FunctionSignature, type ValueKind } from './signatures.js';

export function parseValue(raw: string, kind: ValueKind): unknown {
  switch (kind) {
    case 'number':
      return parseNumber(raw);
    case 'bigint':
      if (raw.trim() === '') throw new Error(`Not an integer: ${raw}`);
      try {
        return BigInt(raw);
      } catch {
        throw new Error(`Not an integer: ${raw}`);
      }
    case 'boolean':
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      throw new Error(`Not a boolean: ${raw}`);
    case 'number-array':
      return raw.trim() === '' ? [] : raw.split(',').map(part => parseNumber(part.trim()));
    case 'string':
    case 'void':
    case 'opaque':
      return raw;
  }
}

function parseNumber(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) throw new Error(`Not a number: ${raw}`);
  return value;
}

export function parseArguments(raw: string[], signature: FunctionSignature): unknown[] {
  const params = signature.params;
  const last = params[params.length - 1];
  return raw.map((value, i) => {
    const param = i < params.length ? params[i] : last?.rest ? last : undefined;
    return param ? parseValue(value, param.kind) : value;
  });
}

export function formatResult(value: unknown): string {
  if (value instanceof OwnedString) return value.value;
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)) ?? String(value);
}

function releaseResult(value: unknown): void {
  if (value instanceof OwnedString && !value.released) value.release();
}

export async function run(argv: string[]): Promise<number> {
  try {
    const config = parseArgs(argv);
    if (config.help) {
      console.log(USAGE);
      return 0;
    }

    if (config.verbose) {
      console.log('Configuration:', JSON.stringify(config, null, 2));
    }

    const porter = new Porter({
      libraryPath: config.libraryPath,
      tsconfigPath: config.tsconfigPath,
      skipCheck: config.skipCheck,
    });
    await porter.addLibrary(config.library);

    if (config.verbose) {
      console.log(`Loaded library '${config.library}' from ${porter.getLibraryPath()}`);
    }

    if (config.list || !config.functionName) {
      for (const signature of porter.listFunctions(config.library)) {
        console.log(formatSignature(signature));
      }
      return 0;
    }

    const fn = porter.getFunction(config.library, config.functionName);
    const args = parseArguments(config.args, fn.signature);

    if (config.profile) {
      for (let i = 0; i < config.repeat; i++) {
        const { result, elapsedMs } = await profileAsync(fn, ...args);
        console.log(`Run ${i + 1}: ${formatResult(result)} (${elapsedMs.toFixed(3)} ms)`);
        releaseResult(result);
      }
    } else {
      const result = await fn(...args);
      console.log(formatResult(result));
      releaseResult(result);
    }
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

// Only run when executed directly, including through an npm bin symlink
const isDirectRun = process.argv[1] !== undefined
  && fs.existsSync(process.argv[1])
  && fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
if (isDirectRun) {
  process.exitCode = await run(process.argv.slice(2));
}
