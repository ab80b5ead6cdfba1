import path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface PorterConfig {
  libraryPath: string;
  tsconfigPath?: string;
  library: string;
  functionName?: string;
  args: string[];
  list: boolean;
  profile: boolean;
  repeat: number;
  skipCheck: boolean;
  verbose: boolean;
  help: boolean;
}

export const BUILTIN_LIBRARY_PATH = fileURLToPath(new URL('./routines', import.meta.url));
export const DEFAULT_REPEAT = 1;

export const USAGE = `Usage: libporter [options] <library> [function] [args...]

Options:
  -L, --lib-path <dir>      Directory holding library modules (default: built-in routines)
  -p, --project <path>      tsconfig.json whose compiler options check the library
  -l, --list                List the library's functions and their signatures
      --profile             Report the wall-clock time of each call
  -n, --repeat <count>      Number of profiled calls (default: ${DEFAULT_REPEAT})
      --skip-check          Load the library without type-checking it
      --verbose             Print configuration and library details
  -h, --help                Show this help message

Arrays are passed as comma-separated numbers.

Example:
  libporter --profile -n 5 fib fibonacci 90`;

const NEGATIVE_NUMBER = /^-\d/;

export function parseArgs(args: string[]): PorterConfig {
  let libraryPath = BUILTIN_LIBRARY_PATH;
  let tsconfigPath: string | undefined;
  let list = false;
  let profile = false;
  let repeat = DEFAULT_REPEAT;
  let skipCheck = false;
  let verbose = false;
  let help = false;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--lib-path':
      case '-L':
        libraryPath = requireValue(args, ++i, arg);
        break;
      case '--project':
      case '-p':
        tsconfigPath = requireValue(args, ++i, arg);
        break;
      case '--list':
      case '-l':
        list = true;
        break;
      case '--profile':
        profile = true;
        break;
      case '--repeat':
      case '-n': {
        const raw = requireValue(args, ++i, arg);
        repeat = Number(raw);
        if (!Number.isInteger(repeat) || repeat < 1) {
          throw new Error(`--repeat must be a positive integer, got ${raw}`);
        }
        break;
      }
      case '--skip-check':
        skipCheck = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--':
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('-') && !NEGATIVE_NUMBER.test(arg)) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [library = '', functionName, ...rest] = positional;
  if (!help) {
    if (!library) throw new Error('<library> is required');
    if (!list && !functionName) throw new Error('<function> is required unless --list is given');
  }

  return {
    libraryPath: path.resolve(libraryPath),
    tsconfigPath: tsconfigPath ? path.resolve(tsconfigPath) : undefined,
    library,
    functionName,
    args: rest,
    list,
    profile,
    repeat,
    skipCheck,
    verbose,
    help,
  };
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) throw new Error(`${flag} requires a value`);
  return value;
}
